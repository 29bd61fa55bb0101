import { vi } from 'vitest';

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
}

/** Collects what is written to stdout and stderr until `vi.restoreAllMocks()`. */
export function captureOutput(): CapturedOutput {
  const captured: CapturedOutput = { stdout: [], stderr: [] };
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    captured.stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    captured.stderr.push(String(chunk));
    return true;
  });
  return captured;
}
