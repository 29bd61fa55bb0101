import { RETRY_POLICIES } from '../errors.js';
import { componentLogger } from '../logger.js';
import { logDebug, logNotice } from '../util/output.js';
import { fail, failureFromError, type Failure, type Outcome } from './outcome.js';
import type { WaitBudget } from './waitBudget.js';

/** Used when a temporarily unavailable link gives no wait hint. */
export const DEFAULT_UNAVAILABLE_WAIT_SECONDS = 60;

/** Per-item state; `attemptCount` only grows. */
export class RetryContext {
  private attempts = 0;

  constructor(
    readonly budget: WaitBudget,
    /** `undefined` is unlimited, 0 disables retries. */
    readonly maxRetries?: number,
  ) {}

  get attemptCount(): number {
    return this.attempts;
  }

  nextAttempt(): number {
    this.attempts += 1;
    return this.attempts;
  }
}

export interface RetryLadderOptions {
  /** Give up on temporarily unavailable links instead of waiting. */
  noExtraWait: boolean;
  /** Captcha failures are final when solving is disabled. */
  captchaDisabled: boolean;
  /** Prefix of the retry notice, e.g. `download (mymodule)`. */
  label: string;
}

export type Attempt<T> = () => Promise<Outcome<T>>;

/**
 * Runs `attempt` until it succeeds or reports a failure the ladder does not
 * recover from. Temporarily unavailable links wait through the item's budget;
 * captcha failures retry at once. The retry cap is checked once the wait is spent.
 */
export async function runRetryLadder<T>(
  attempt: Attempt<T>,
  context: RetryContext,
  options: RetryLadderOptions,
): Promise<Outcome<T>> {
  const log = componentLogger('retry-ladder');

  for (;;) {
    const outcome = await invoke(attempt);
    if (outcome.ok) {
      return outcome;
    }

    const policy = RETRY_POLICIES[outcome.kind];
    if (policy === 'abort') {
      return outcome;
    }
    if (policy === 'wait-and-retry' && options.noExtraWait) {
      return outcome;
    }
    if (outcome.kind === 'captcha' && options.captchaDisabled) {
      logDebug('captcha method set to none, abort');
      return outcome;
    }

    if (policy === 'wait-and-retry') {
      const waited = await context.budget.consume(waitSecondsFrom(outcome));
      if (!waited.ok) {
        return waited;
      }
    }

    const attemptNumber = context.nextAttempt();
    const maxRetries = context.maxRetries;
    if (maxRetries === 0) {
      logDebug('no retry explicitly requested');
      return outcome;
    }
    if (maxRetries !== undefined && attemptNumber > maxRetries) {
      log.info({ attempts: attemptNumber, maxRetries, kind: outcome.kind }, 'retry limit reached');
      return fail('max-tries-reached');
    }

    logNotice(
      maxRetries === undefined
        ? `Starting ${options.label}: retry ${attemptNumber}`
        : `Starting ${options.label}: retry ${attemptNumber}/${maxRetries}`,
    );
  }
}

export function waitSecondsFrom(failure: Failure): number {
  const seconds = failure.hint === undefined ? Number.NaN : Number.parseInt(failure.hint, 10);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds;
  }
  logDebug('arbitrary wait');
  return DEFAULT_UNAVAILABLE_WAIT_SECONDS;
}

async function invoke<T>(attempt: Attempt<T>): Promise<Outcome<T>> {
  try {
    return await attempt();
  } catch (error) {
    return failureFromError(error);
  }
}
