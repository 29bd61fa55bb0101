import { open, stat, type FileHandle } from 'node:fs/promises';

import { createSystemError } from '../errors.js';
import { logDebug, logReport } from '../util/output.js';
import type { FetchLike } from './http.js';

export interface TransferRequest {
  url: string;
  destination: string;
  /** Continue an existing partial file with a range request. */
  resume: boolean;
  fetch: FetchLike;
}

export type TransferResult =
  | { state: 'complete'; status: number; bytes: number }
  /** The connection ended before the announced length arrived. */
  | { state: 'partial'; status: number; bytes: number }
  | { state: 'http-error'; status: number };

/**
 * Streams the final link to `destination`. HTTP failures are reported in the
 * result; transport failures before the body starts throw `network`, local
 * write failures throw `system`.
 */
export async function transferFile(request: TransferRequest): Promise<TransferResult> {
  const offset = request.resume ? await existingSize(request.destination) : 0;
  const headers: Record<string, string> = offset > 0 ? { range: `bytes=${offset}-` } : {};

  const response = await request.fetch(request.url, { headers });
  logReport(`HTTP ${response.status} ${request.url}${offset > 0 ? ` (from byte ${offset})` : ''}`);
  if (!response.ok || !response.body) {
    await response.body?.cancel();
    return { state: 'http-error', status: response.status };
  }

  const append = offset > 0 && response.status === 206;
  const announced = Number.parseInt(response.headers.get('content-length') ?? '', 10);

  let handle: FileHandle;
  try {
    handle = await open(request.destination, append ? 'a' : 'w');
  } catch (error) {
    await response.body.cancel();
    throw createSystemError("can't open output file", { path: request.destination }, { cause: error });
  }

  let bytes = 0;
  let interrupted = false;
  const reader = response.body.getReader();
  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        logDebug(`transfer interrupted: ${error instanceof Error ? error.message : String(error)}`);
        return undefined;
      });
      if (chunk === undefined) {
        interrupted = true;
        break;
      }
      if (chunk.done) {
        break;
      }
      await writeChunk(handle, chunk.value, request.destination);
      bytes += chunk.value.byteLength;
    }
  } catch (error) {
    await reader.cancel().catch((cancelError: unknown) => {
      logDebug(`transfer cancel failed: ${cancelError instanceof Error ? cancelError.message : String(cancelError)}`);
    });
    throw error;
  } finally {
    reader.releaseLock();
    await handle.close();
  }

  if (interrupted || (Number.isFinite(announced) && bytes < announced)) {
    return { state: 'partial', status: response.status, bytes };
  }
  return { state: 'complete', status: response.status, bytes };
}

async function writeChunk(handle: FileHandle, chunk: Uint8Array, path: string): Promise<void> {
  try {
    await handle.write(chunk);
  } catch (error) {
    throw createSystemError("can't write output file", { path }, { cause: error });
  }
}

async function existingSize(path: string): Promise<number> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : 0;
  } catch {
    return 0;
  }
}
