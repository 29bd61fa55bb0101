import {
  EXIT_CODES,
  HosterError,
  ensureHosterError,
  type ErrorKind,
} from '../errors.js';

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  kind: ErrorKind;
  /** Free-form hint from the producer, e.g. the wait seconds of a temporarily unavailable link. */
  hint?: string;
  error?: HosterError;
}

export type Outcome<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function succeedVoid(): Success<void> {
  return { ok: true, value: undefined };
}

export function fail(kind: ErrorKind, options: { hint?: string; error?: HosterError } = {}): Failure {
  return { ok: false, kind, ...options };
}

export function tempUnavailable(waitSeconds?: number): Failure {
  return fail('link-temp-unavailable', {
    hint: waitSeconds === undefined ? undefined : String(waitSeconds),
  });
}

/** Thrown HosterErrors keep their kind; anything else becomes `fatal`. */
export function failureFromError(error: unknown): Failure {
  const hosterError = ensureHosterError(error, { kind: 'fatal' });
  return fail(hosterError.kind, { error: hosterError });
}

export function outcomeCode(outcome: Outcome<unknown>): number {
  return outcome.ok ? 0 : EXIT_CODES[outcome.kind];
}

const FAILURE_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  fatal: 'Unexpected content, module must be updated',
  'no-module': 'No module found for link',
  network: 'Network failure, try again later',
  'login-failed': 'Login process failed. Bad username/password or unexpected content',
  'max-wait-reached': 'Delay limit reached',
  'max-tries-reached': 'Retry limit reached',
  captcha: 'Error: decoding captcha',
  system: 'System failure',
  'link-temp-unavailable': 'Warning: file link is alive but not currently available, try later',
  'link-password-required': 'You must provide a valid password',
  'link-need-permissions': 'Insufficient permissions (premium link?)',
  'link-dead': 'Link is not alive: file not found',
  'size-limit-exceeded': 'File is too big for this account',
  'bad-command-line': 'Bad command line',
};

export function describeFailure(kind: ErrorKind): string {
  return FAILURE_MESSAGES[kind];
}
