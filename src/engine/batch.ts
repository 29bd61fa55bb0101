import pLimit from 'p-limit';

import { ERR_FATAL_MULTIPLE, type ErrorKind } from '../errors.js';
import { reportHosterError } from '../util/errorHandler.js';
import { failureFromError, outcomeCode, type Outcome } from './outcome.js';

export interface ItemResult {
  /** The argument the URL came from (the URL itself or a links file). */
  item: string;
  url: string;
  outcome: Outcome<unknown>;
}

/** Per-item outcomes of one invocation, in processing order. */
export class BatchResult {
  private readonly items: ItemResult[] = [];

  add(result: ItemResult): void {
    this.items.push(result);
  }

  /** Runs one item and records its outcome; a thrown error becomes that item's failure. */
  async settle(item: string, url: string, run: () => Promise<Outcome<unknown>>): Promise<void> {
    let outcome: Outcome<unknown>;
    try {
      outcome = await run();
    } catch (error) {
      const reported = reportHosterError(error, { stage: 'item', url }, { throwOnFatal: false });
      outcome = failureFromError(reported);
    }
    this.add({ item, url, outcome });
  }

  get results(): readonly ItemResult[] {
    return this.items;
  }

  get codes(): number[] {
    return this.items.map((result) => outcomeCode(result.outcome));
  }

  get firstFailure(): ErrorKind | undefined {
    for (const { outcome } of this.items) {
      if (!outcome.ok) {
        return outcome.kind;
      }
    }
    return undefined;
  }

  get exitCode(): number {
    return summarizeExitCode(this.codes);
  }
}

/**
 * Single representative status: nothing processed is 0, one item is its own
 * code, several items are 0 when all succeeded and otherwise 100 plus the first
 * non-zero code.
 */
export function summarizeExitCode(codes: readonly number[]): number {
  if (codes.length === 0) {
    return 0;
  }
  if (codes.length === 1) {
    return codes[0];
  }

  const firstFailure = codes.find((code) => code !== 0);
  return firstFailure === undefined ? 0 : ERR_FATAL_MULTIPLE + firstFailure;
}

/** One task at a time, in order; the shared cookie file is rewritten after each item. */
export async function runSequentially<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
): Promise<T[]> {
  const limit = pLimit(1);
  return Promise.all(tasks.map((task) => limit(task)));
}
