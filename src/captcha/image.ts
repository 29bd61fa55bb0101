import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createFatalError, createSystemError } from '../errors.js';
import { fail, failureFromError, succeed, type Outcome } from '../engine/outcome.js';
import type { FetchLike } from '../network/http.js';
import { logError } from '../util/output.js';
import type { CaptchaImage } from './types.js';

export interface PreparedImage extends CaptchaImage {
  /** Removes the temporary copy; the caller's own file is left alone. */
  release(): Promise<void>;
}

export interface ImageSourceOptions {
  http: FetchLike;
  tempDirectory?: string;
}

const REMOTE_URL = /^https?:\/\//i;

/** Materializes a challenge image as a non-empty file on disk. */
export async function prepareImage(
  source: Buffer | string,
  options: ImageSourceOptions,
): Promise<Outcome<PreparedImage>> {
  let bytes: Buffer;
  let ownPath: string | undefined;

  if (typeof source === 'string' && !REMOTE_URL.test(source)) {
    try {
      bytes = await readFile(source);
    } catch (error) {
      logError('captcha: image file not found');
      return fail('fatal', {
        error: createFatalError('image file not found', { path: source }, { cause: error }),
      });
    }
    ownPath = source;
  } else if (typeof source === 'string') {
    try {
      const response = await options.http(source);
      bytes = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      return failureFromError(error);
    }
  } else {
    bytes = source;
  }

  if (bytes.length === 0) {
    logError('captcha: empty image file');
    return fail('fatal', { error: createFatalError('empty image file') });
  }

  if (ownPath !== undefined) {
    return succeed({ path: ownPath, bytes, release: async () => undefined });
  }

  try {
    const directory = await mkdtemp(join(options.tempDirectory ?? tmpdir(), 'hostkit-captcha-'));
    const path = join(directory, 'captcha.img');
    await writeFile(path, bytes);
    return succeed({
      path,
      bytes,
      release: () => rm(directory, { recursive: true, force: true }),
    });
  } catch (error) {
    return fail('system', {
      error: createSystemError("can't create temporary captcha file", {}, { cause: error }),
    });
  }
}
