import { spawn } from 'node:child_process';

import { EXIT_CODES, createFatalError, createSystemError } from '../errors.js';
import { fail, succeed, type Outcome } from '../engine/outcome.js';
import { logError } from '../util/output.js';
import { NO_TICKET, type SolvedCaptcha } from './types.js';

export interface ProgramResult {
  exitCode: number;
  stdout: string;
}

export type ProgramRunner = (command: string, args: string[]) => Promise<ProgramResult>;

export interface ProgramRequest {
  program: string;
  moduleName: string;
  imagePath: string;
  type: string;
  minLength?: number;
}

/**
 * Hands the image to a user-supplied solver. `undefined` means the program
 * declined (exit code of `no-module`) and the configured method should run.
 */
export async function solveWithProgram(
  request: ProgramRequest,
  run: ProgramRunner = runProgram,
): Promise<Outcome<SolvedCaptcha> | undefined> {
  const args = [request.moduleName, request.imagePath, `${request.type}-${request.minLength ?? ''}`];

  let result: ProgramResult;
  try {
    result = await run(request.program, args);
  } catch (error) {
    const systemError = createSystemError(
      'captcha program could not be started',
      { program: request.program },
      { cause: error },
    );
    logError(systemError.message);
    return fail('system', { error: systemError });
  }

  if (result.exitCode === 0) {
    const word = result.stdout.split(/\r?\n/, 1)[0] ?? '';
    return succeed({ word: word.trim(), ticket: NO_TICKET });
  }
  if (result.exitCode === EXIT_CODES['no-module']) {
    return undefined;
  }

  logError(`captchaprogram exit with status ${result.exitCode}`);
  return fail('fatal', {
    error: createFatalError('captcha program failed', {
      program: request.program,
      exitCode: result.exitCode,
    }),
  });
}

export function runProgram(command: string, args: string[]): Promise<ProgramResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'inherit'] });
    const chunks: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.once('error', reject);
    child.once('close', (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(chunks).toString('utf8'),
      });
    });
  });
}
