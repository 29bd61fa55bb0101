import { readFile, writeFile } from 'node:fs/promises';

import { createSystemError } from '../errors.js';
import type { FetchLike } from './http.js';

export interface Cookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds, 0 for session cookies. */
  expires: number;
  name: string;
  value: string;
}

const NETSCAPE_HEADER = '# Netscape HTTP Cookie File';

/**
 * Per-item cookie state. Every request made through `fetch` sends the matching
 * cookies and stores the ones the response sets.
 */
export class Session {
  private readonly jar = new Map<string, Cookie>();

  constructor(
    private readonly http: FetchLike,
    cookies: Cookie[] = [],
  ) {
    for (const cookie of cookies) {
      this.store(cookie);
    }
  }

  static async fromCookieFile(path: string, http: FetchLike): Promise<Session> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw createSystemError("can't read cookies file", { path }, { cause: error });
    }
    return new Session(http, parseNetscapeCookies(text));
  }

  get size(): number {
    return this.jar.size;
  }

  readonly fetch: FetchLike = async (input, init = {}) => {
    const headers = new Headers(init.headers);
    const cookieHeader = this.cookieHeader(input);
    if (cookieHeader && !headers.has('cookie')) {
      headers.set('cookie', cookieHeader);
    }

    const response = await this.http(input, { ...init, headers });
    this.absorb(response, input);
    return response;
  };

  get(name: string): string | undefined {
    for (const cookie of this.jar.values()) {
      if (cookie.name === name) {
        return cookie.value;
      }
    }
    return undefined;
  }

  set(name: string, value: string, domain: string, path = '/'): void {
    this.store({
      domain: domain.replace(/^\./, '').toLowerCase(),
      includeSubdomains: true,
      path,
      secure: false,
      expires: 0,
      name,
      value,
    });
  }

  cookieHeader(url: string): string {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return '';
    }

    const nowSeconds = Date.now() / 1_000;
    return [...this.jar.values()]
      .filter((cookie) => cookieMatches(cookie, target, nowSeconds))
      .map((cookie) => `${cookie.name}=${cookie.value}`)
      .join('; ');
  }

  absorb(response: Response, requestUrl: string): void {
    for (const header of response.headers.getSetCookie()) {
      const cookie = parseSetCookie(header, requestUrl);
      if (cookie) {
        this.store(cookie);
      }
    }
  }

  list(): Cookie[] {
    return [...this.jar.values()];
  }

  toNetscape(): string {
    return serializeNetscapeCookies(this.list());
  }

  async saveTo(path: string): Promise<void> {
    try {
      await writeFile(path, this.toNetscape(), 'utf8');
    } catch (error) {
      throw createSystemError("can't write cookies file", { path }, { cause: error });
    }
  }

  private store(cookie: Cookie): void {
    const key = `${cookie.domain}\t${cookie.path}\t${cookie.name}`;
    if (cookie.expires > 0 && cookie.expires * 1_000 < Date.now()) {
      this.jar.delete(key);
      return;
    }
    this.jar.set(key, cookie);
  }
}

export function parseNetscapeCookies(text: string): Cookie[] {
  const cookies: Cookie[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.startsWith('#HttpOnly_')) {
      line = line.slice('#HttpOnly_'.length);
    } else if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const fields = line.split('\t');
    if (fields.length < 7) {
      continue;
    }

    const [domain, includeSubdomains, path, secure, expires, name, ...rest] = fields;
    cookies.push({
      domain: domain.replace(/^\./, '').toLowerCase(),
      includeSubdomains: includeSubdomains.toUpperCase() === 'TRUE',
      path: path || '/',
      secure: secure.toUpperCase() === 'TRUE',
      expires: Number.parseInt(expires, 10) || 0,
      name,
      value: rest.join('\t'),
    });
  }

  return cookies;
}

export function serializeNetscapeCookies(cookies: Cookie[]): string {
  const lines = cookies.map((cookie) =>
    [
      cookie.includeSubdomains ? `.${cookie.domain}` : cookie.domain,
      cookie.includeSubdomains ? 'TRUE' : 'FALSE',
      cookie.path,
      cookie.secure ? 'TRUE' : 'FALSE',
      String(cookie.expires),
      cookie.name,
      cookie.value,
    ].join('\t'),
  );

  return `${[NETSCAPE_HEADER, '', ...lines].join('\n')}\n`;
}

export function parseSetCookie(header: string, requestUrl: string): Cookie | undefined {
  const [pair, ...attributes] = header.split(';');
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    return undefined;
  }

  let host: string;
  try {
    host = new URL(requestUrl).hostname.toLowerCase();
  } catch {
    return undefined;
  }

  const cookie: Cookie = {
    domain: host,
    includeSubdomains: false,
    path: '/',
    secure: false,
    expires: 0,
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
  };

  for (const attribute of attributes) {
    const [rawKey, ...rawValue] = attribute.split('=');
    const key = rawKey.trim().toLowerCase();
    const value = rawValue.join('=').trim();

    if (key === 'domain' && value) {
      cookie.domain = value.replace(/^\./, '').toLowerCase();
      cookie.includeSubdomains = true;
    } else if (key === 'path' && value) {
      cookie.path = value;
    } else if (key === 'secure') {
      cookie.secure = true;
    } else if (key === 'max-age') {
      const seconds = Number.parseInt(value, 10);
      if (Number.isFinite(seconds)) {
        cookie.expires = seconds <= 0 ? 1 : Math.floor(Date.now() / 1_000) + seconds;
      }
    } else if (key === 'expires' && cookie.expires === 0) {
      const parsed = Date.parse(value);
      if (Number.isFinite(parsed)) {
        cookie.expires = Math.max(1, Math.floor(parsed / 1_000));
      }
    }
  }

  return cookie;
}

function cookieMatches(cookie: Cookie, target: URL, nowSeconds: number): boolean {
  if (cookie.expires > 0 && cookie.expires < nowSeconds) {
    return false;
  }
  if (cookie.secure && target.protocol !== 'https:') {
    return false;
  }

  const host = target.hostname.toLowerCase();
  const domainMatches =
    host === cookie.domain || (cookie.includeSubdomains && host.endsWith(`.${cookie.domain}`));
  if (!domainMatches) {
    return false;
  }

  return target.pathname.startsWith(cookie.path);
}
