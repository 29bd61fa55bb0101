import { componentLogger } from '../logger.js';
import { formatSeconds, logDebug, logNotice } from '../util/output.js';
import { fail, succeedVoid, type Outcome } from './outcome.js';

export type WaitUnit = 'seconds' | 'minutes';

export type Sleeper = (ms: number) => Promise<void>;

/** Signature handed to captcha providers and site modules. */
export type WaitFn = (value: number, unit?: WaitUnit) => Promise<Outcome<void>>;

/**
 * Bounds the wall-clock time one item may spend sleeping across all of its retries.
 * The check happens before a sleep starts; a sleep in progress is never interrupted.
 */
export class WaitBudget {
  private remainingSeconds: number | undefined;
  private spentSeconds = 0;
  private readonly log = componentLogger('wait-budget');

  constructor(
    totalSeconds?: number,
    private readonly sleep: Sleeper = delay,
  ) {
    this.remainingSeconds = totalSeconds;
  }

  /** `undefined` means unlimited. */
  get remaining(): number | undefined {
    return this.remainingSeconds;
  }

  get spent(): number {
    return this.spentSeconds;
  }

  get unlimited(): boolean {
    return this.remainingSeconds === undefined;
  }

  readonly consume: WaitFn = async (value, unit = 'seconds') => {
    if (value <= 0) {
      logDebug('wait called with null duration');
      return succeedVoid();
    }

    const totalSeconds = unit === 'minutes' ? value * 60 : value;

    if (this.remainingSeconds !== undefined) {
      logDebug(`time left to timeout: ${this.remainingSeconds} secs`);
      if (this.remainingSeconds < totalSeconds) {
        logNotice(
          `Timeout reached (asked to wait ${totalSeconds} seconds, but remaining time is ${this.remainingSeconds})`,
        );
        this.log.info(
          { requested: totalSeconds, remaining: this.remainingSeconds },
          'wait budget exhausted',
        );
        return fail('max-wait-reached');
      }
      this.remainingSeconds -= totalSeconds;
    }

    logNotice(`Waiting ${value} ${unit} (${formatSeconds(totalSeconds)})...`);
    this.spentSeconds += totalSeconds;
    await this.sleep(totalSeconds * 1_000);
    return succeedVoid();
  };
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
