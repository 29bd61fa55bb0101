import { createConfigurationError, createFatalError } from '../../errors.js';
import { fail, failureFromError, succeed, type Failure, type Outcome } from '../../engine/outcome.js';
import type { WaitFn } from '../../engine/waitBudget.js';
import type { FetchLike } from '../../network/http.js';

export type PollStep<T> =
  | { state: 'pending' }
  | { state: 'done'; value: T }
  | { state: 'failed'; failure: Failure };

export type PollResult<T> = Outcome<T> | { ok: 'exhausted' };

/**
 * Runs `pollOnce` after each wait of the ladder until it yields an answer or a
 * hard error. Wait failures (budget exhausted) end the loop with that failure.
 */
export async function pollLadder<T>(
  ladder: readonly number[],
  wait: WaitFn,
  pollOnce: () => Promise<PollStep<T>>,
): Promise<PollResult<T>> {
  for (const seconds of ladder) {
    const waited = await wait(seconds);
    if (!waited.ok) {
      return waited;
    }

    const step = await pollOnce();
    if (step.state === 'done') {
      return succeed(step.value);
    }
    if (step.state === 'failed') {
      return step.failure;
    }
  }

  return { ok: 'exhausted' };
}

/** Trimmed response body; transport failures become `network` outcomes. */
export async function fetchText(
  http: FetchLike,
  url: string,
  init?: RequestInit,
): Promise<Outcome<string>> {
  try {
    const response = await http(url, init);
    const body = await response.text();
    return succeed(body.trim());
  } catch (error) {
    return failureFromError(error);
  }
}

export async function fetchJson(
  http: FetchLike,
  url: string,
  init?: RequestInit,
): Promise<Outcome<Record<string, unknown>>> {
  const text = await fetchText(http, url, init);
  if (!text.ok) {
    return text;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.value);
  } catch (error) {
    return fail('fatal', {
      hint: text.value,
      error: createFatalError('unexpected non-JSON answer', { url }, { cause: error }),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return fail('fatal', { hint: text.value });
  }
  return succeed(Object.fromEntries(Object.entries(parsed)));
}

export function imageBlob(bytes: Buffer): Blob {
  return new Blob([new Uint8Array(bytes)], { type: 'image/jpeg' });
}

export interface Account {
  username: string;
  password: string;
}

/** `user:password`, the password may itself contain colons. */
export function splitAccount(account: string, provider: string): Account {
  const separator = account.indexOf(':');
  if (separator <= 0 || separator === account.length - 1) {
    throw createConfigurationError(`${provider}: account must be given as USER:PASSWORD`, {
      provider,
    });
  }
  return {
    username: account.slice(0, separator),
    password: account.slice(separator + 1),
  };
}

export function withQuery(base: string, params: Record<string, string>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
