import type { CaptchaSolver } from '../captcha/types.js';
import type { Outcome } from '../engine/outcome.js';
import type { WaitFn } from '../engine/waitBudget.js';
import type { LoggerLike } from '../logger.js';
import type { FetchLike } from '../network/http.js';
import type { Session } from '../network/session.js';

export type Capability = 'download' | 'probe' | 'list' | 'delete' | 'upload';

export const CAPABILITIES: readonly Capability[] = ['download', 'probe', 'list', 'delete', 'upload'];

export interface ModuleCapabilities {
  /** The final link accepts HTTP range requests. */
  resume: boolean;
  /** The final link must be fetched with the session cookies. */
  finalLinkNeedsCookie: boolean;
}

export interface ModuleOptions {
  /** Premium/account credentials, `user:password`. */
  auth?: string;
  /** Free account credentials, `user:password`. */
  authFree?: string;
  linkPassword?: string;
  /** Module specific switches from `-o name=value` or the configuration file. */
  extra: Readonly<Record<string, string>>;
}

export interface ModuleContext {
  session: Session;
  /** Cookie-aware fetch bound to `session`. */
  fetch: FetchLike;
  captcha: CaptchaSolver;
  wait: WaitFn;
  options: ModuleOptions;
  /** Only report whether the link is alive; no final link is needed. */
  checkLinkOnly: boolean;
  log: LoggerLike;
}

export interface DownloadLink {
  url: string;
  filename?: string;
}

/** `c` check link, `f` filename, `h` hash, `s` size in bytes. */
export type ProbeField = 'c' | 'f' | 'h' | 's';

export interface ProbeResult {
  filename?: string;
  /** Bytes, may be approximate. */
  size?: number;
  hash?: string;
}

export interface ListEntry {
  url: string;
  name?: string;
}

export interface UploadSource {
  path: string;
  /** Remote name, defaults to the local basename. */
  name: string;
  description?: string;
}

export interface UploadResult {
  downloadUrl: string;
  deleteUrl?: string;
  adminUrl?: string;
}

/**
 * A hosting site adapter. Every operation reports through an Outcome; a module
 * may also throw, which the drivers treat as the thrown error's kind.
 */
export interface SiteModule {
  readonly name: string;
  readonly urlPattern: RegExp;
  readonly capabilities: ModuleCapabilities;
  download?(ctx: ModuleContext, url: string): Promise<Outcome<DownloadLink>>;
  probe?(ctx: ModuleContext, url: string, requested: readonly ProbeField[]): Promise<Outcome<ProbeResult>>;
  list?(ctx: ModuleContext, url: string, recurse: boolean): Promise<Outcome<ListEntry[]>>;
  delete?(ctx: ModuleContext, url: string): Promise<Outcome<void>>;
  upload?(ctx: ModuleContext, source: UploadSource): Promise<Outcome<UploadResult>>;
}

export const DEFAULT_CAPABILITIES: ModuleCapabilities = Object.freeze({
  resume: false,
  finalLinkNeedsCookie: false,
});

export function supports(module: SiteModule, capability: Capability): boolean {
  return typeof module[capability] === 'function';
}

export function isSiteModule(value: unknown): value is SiteModule {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('name' in value) || typeof value.name !== 'string' || value.name.length === 0) {
    return false;
  }
  if (!('urlPattern' in value) || !(value.urlPattern instanceof RegExp)) {
    return false;
  }
  if (!('capabilities' in value) || !isCapabilities(value.capabilities)) {
    return false;
  }
  return CAPABILITIES.some((capability) => typeof Reflect.get(value, capability) === 'function');
}

function isCapabilities(value: unknown): value is ModuleCapabilities {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resume' in value &&
    typeof value.resume === 'boolean' &&
    'finalLinkNeedsCookie' in value &&
    typeof value.finalLinkNeedsCookie === 'boolean'
  );
}
