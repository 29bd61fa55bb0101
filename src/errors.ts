export type ErrorKind =
  | 'fatal'
  | 'no-module'
  | 'network'
  | 'login-failed'
  | 'max-wait-reached'
  | 'max-tries-reached'
  | 'captcha'
  | 'system'
  | 'link-temp-unavailable'
  | 'link-password-required'
  | 'link-need-permissions'
  | 'link-dead'
  | 'size-limit-exceeded'
  | 'bad-command-line';

export type ErrorSeverity = 'recoverable' | 'fatal';

/** What the retry ladder does when a module reports the kind. */
export type RetryPolicy = 'abort' | 'wait-and-retry' | 'retry';

export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = {
  fatal: 1,
  'no-module': 2,
  network: 3,
  'login-failed': 4,
  'max-wait-reached': 5,
  'max-tries-reached': 6,
  captcha: 7,
  system: 8,
  'link-temp-unavailable': 10,
  'link-password-required': 11,
  'link-need-permissions': 12,
  'link-dead': 13,
  'size-limit-exceeded': 14,
  'bad-command-line': 15,
};

export const ERR_FATAL_MULTIPLE = 100;

export const RETRY_POLICIES: Readonly<Record<ErrorKind, RetryPolicy>> = {
  fatal: 'abort',
  'no-module': 'abort',
  network: 'abort',
  'login-failed': 'abort',
  'max-wait-reached': 'abort',
  'max-tries-reached': 'abort',
  captcha: 'retry',
  system: 'abort',
  'link-temp-unavailable': 'wait-and-retry',
  'link-password-required': 'abort',
  'link-need-permissions': 'abort',
  'link-dead': 'abort',
  'size-limit-exceeded': 'abort',
  'bad-command-line': 'abort',
};

const RECOVERABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'network',
  'captcha',
  'link-temp-unavailable',
]);

export interface HosterErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class HosterError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity, details, cause }: HosterErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${toPascalCase(kind)}Error`;
    this.kind = kind;
    this.severity = severity ?? defaultSeverity(kind);
    this.details = details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

export function isHosterError(value: unknown): value is HosterError {
  return value instanceof HosterError;
}

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && Object.hasOwn(EXIT_CODES, value);
}

export function exitCodeOf(kind: ErrorKind | 'ok'): number {
  return kind === 'ok' ? 0 : EXIT_CODES[kind];
}

export function kindFromExitCode(code: number): ErrorKind | undefined {
  const entry = Object.entries(EXIT_CODES).find(([, value]) => value === code);
  return entry && isErrorKind(entry[0]) ? entry[0] : undefined;
}

export function defaultSeverity(kind: ErrorKind): ErrorSeverity {
  return RECOVERABLE_KINDS.has(kind) ? 'recoverable' : 'fatal';
}

export function ensureHosterError(
  error: unknown,
  fallback: Partial<HosterErrorProps> & Pick<HosterErrorProps, 'kind'> = { kind: 'fatal' },
): HosterError {
  if (isHosterError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new HosterError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createHosterError(
  kind: ErrorKind,
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): HosterError {
  return new HosterError({
    message,
    kind,
    severity: options.severity,
    details,
    cause: options.cause,
  });
}

export function createNetworkError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HosterError {
  return createHosterError('network', message, details, options);
}

export function createSystemError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HosterError {
  return createHosterError('system', message, details, options);
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HosterError {
  return new HosterError({
    message,
    kind: 'bad-command-line',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createFatalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): HosterError {
  return createHosterError('fatal', message, details, options);
}

function toPascalCase(value: string): string {
  return value
    .split('-')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}
