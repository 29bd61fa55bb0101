import { ensureHosterError, type ErrorKind, type ErrorSeverity, type HosterError } from '../errors.js';
import { getLogger } from '../logger.js';
import { logError, logNotice } from './output.js';

/** Where an error surfaced; printed after the message as sorted `key=value` pairs. */
export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  module?: string;
  url?: string;
  attempt?: number;
}

export interface ReportOptions {
  /** Kind given to values that are not HosterErrors yet. */
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  /** Rethrow fatal errors once logged; on by default. */
  throwOnFatal?: boolean;
}

/**
 * Prints one diagnostic line for the error: recoverable ones as notices, fatal
 * ones as errors.
 */
export function reportHosterError(
  error: unknown,
  context: ErrorContext = {},
  options: ReportOptions = {},
): HosterError {
  const reported = ensureHosterError(error, {
    kind: options.defaultKind ?? 'fatal',
    severity: options.defaultSeverity,
    details: context,
  });
  const details: Record<string, unknown> = { ...reported.details, ...context };

  getLogger().debug({ err: reported, ...details }, reported.message);

  if (reported.severity !== 'fatal') {
    logNotice(formatHosterError(reported, details));
    return reported;
  }

  logError(formatHosterError(reported, details));
  if (options.throwOnFatal ?? true) {
    throw reported;
  }
  return reported;
}

/** `[kind/severity] message (key=value ...)` */
export function formatHosterError(error: HosterError, details: Record<string, unknown> = {}): string {
  const pairs = Object.entries(details)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);

  const head = `[${error.kind}/${error.severity}] ${error.message}`;
  return pairs.length > 0 ? `${head} (${pairs.join(' ')})` : head;
}
