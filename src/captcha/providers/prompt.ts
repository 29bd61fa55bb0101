import { createInterface } from 'node:readline/promises';

import { succeed, succeedVoid, type Outcome } from '../../engine/outcome.js';
import { logNotice } from '../../util/output.js';
import { NO_TICKET, type CaptchaImage, type CaptchaProvider, type SolveHint, type SolvedCaptcha } from '../types.js';

export type Asker = (question: string) => Promise<string>;

const RELOAD_TYPES = new Set(['recaptcha', 'solvemedia']);
const RELOAD_HINT = 'Leave this field blank and hit enter to get another captcha image';
const QUESTION = 'Enter captcha response (drop punctuation marks, case insensitive): ';

/** Asks the user on the terminal; the image is left on disk for them to open. */
export class PromptProvider implements CaptchaProvider {
  readonly name = 'prompt';
  readonly tag = '';

  constructor(private readonly ask: Asker = askOnTerminal) {}

  async checkBalance(): Promise<Outcome<void>> {
    return succeedVoid();
  }

  async solve(image: CaptchaImage, hint: SolveHint): Promise<Outcome<SolvedCaptcha>> {
    logNotice(`Local image: ${image.path}`);
    if (RELOAD_TYPES.has(hint.type)) {
      logNotice(RELOAD_HINT);
    }

    const word = (await this.ask(QUESTION)).trim();
    return succeed({ word, ticket: NO_TICKET });
  }

  async ack(): Promise<void> {}

  async nack(): Promise<void> {}
}

/** Prompts on stderr so stdout stays reserved for results. */
export async function askOnTerminal(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
