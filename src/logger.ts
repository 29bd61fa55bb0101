import pino, { type DestinationStream } from 'pino';

export const LOG_LEVELS = ['silent', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Calls read `log.info({ url }, 'message')` or `log.info('message')`. */
export interface LoggerLike {
  trace(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  debug(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  info(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  warn(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  error(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  fatal(fieldsOrMessage: Record<string, unknown> | string, message?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LogLevel;
  /** Defaults to stderr: stdout carries command results. */
  destination?: DestinationStream;
}

const SERVICE_BINDINGS = { service: 'hostkit' } as const;

// Structured logs stay off until --log-level asks for them.
let activeLogger: LoggerLike = pino({ level: 'silent', base: SERVICE_BINDINGS });

export function configureLogger({ level = 'silent', destination }: LoggerConfiguration = {}): void {
  activeLogger = pino({ level, base: SERVICE_BINDINGS }, destination ?? pino.destination(2));
}

/** Swaps the process-wide logger, e.g. for a test double. */
export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/** Child of the current logger bound to one component (`retry-ladder`, `module:<name>`, ...). */
export function componentLogger(component: string): LoggerLike {
  return getLogger().child({ component });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
