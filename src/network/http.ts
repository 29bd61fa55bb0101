import { createNetworkError, isHosterError, type HosterError } from '../errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** Time allowed until response headers arrive. */
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0';
const DEFAULT_TIMEOUT_MS = 240_000;

const ERROR_CODE_MESSAGES: Record<string, string> = {
  ENOTFOUND: "couldn't resolve host",
  EAI_AGAIN: "couldn't resolve host",
  ECONNREFUSED: "couldn't connect to host",
  ECONNRESET: 'connection reset by peer',
  ETIMEDOUT: 'operation timeout',
};

/**
 * Wraps fetch with a default user agent and a header timeout. Transport failures
 * surface as `network` HosterErrors; HTTP statuses are left to the caller.
 */
export function createHttpClient(options: HttpClientOptions = {}): FetchLike {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  return async (input, init = {}) => {
    const headers = new Headers(init.headers);
    if (!headers.has('user-agent')) {
      headers.set('user-agent', userAgent);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    init.signal?.addEventListener('abort', () => controller.abort(), { once: true });

    try {
      return await fetchImpl(input, { ...init, headers, signal: controller.signal });
    } catch (error) {
      throw toNetworkError(error, input, controller.signal.aborted ? timeoutMs : undefined);
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

export function toNetworkError(error: unknown, url: string, timedOutAfterMs?: number): HosterError {
  if (isHosterError(error)) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const code = extractErrorCode(err);
  const message =
    timedOutAfterMs !== undefined
      ? `Request timed out after ${timedOutAfterMs}ms`
      : (code && ERROR_CODE_MESSAGES[code]) || err.message || 'Request failed';

  return createNetworkError(
    message,
    {
      url,
      ...(typeof code === 'string' ? { code } : {}),
    },
    { cause: err },
  );
}

export function extractErrorCode(error: Error): string | undefined {
  if (isHosterError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}

/** Body as text, mapping read failures to `network`. */
export async function readText(response: Response, url: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw toNetworkError(error, url);
  }
}
