import { fail, succeed, succeedVoid, type Outcome } from '../../engine/outcome.js';
import type { WaitFn } from '../../engine/waitBudget.js';
import type { FetchLike } from '../../network/http.js';
import { logDebug, logError, logNotice } from '../../util/output.js';
import { createTicket } from '../ticket.js';
import type { CaptchaImage, CaptchaProvider, SolveHint, SolvedCaptcha } from '../types.js';
import { fetchText, imageBlob, pollLadder, splitAccount, withQuery, type Account } from './remote.js';

const BASE_URL = 'http://www.captchabrotherhood.com';
const POLL_LADDER = [6, 5, 5, 6, 6, 7, 7, 8] as const;
const MINIMUM_CREDITS = 10;

export class BrotherhoodProvider implements CaptchaProvider {
  readonly name = 'captchabrotherhood';
  readonly tag = 'b';
  private readonly account: Account;

  /** @param account `user:password` */
  constructor(
    account: string,
    private readonly http: FetchLike,
  ) {
    this.account = splitAccount(account, this.name);
  }

  async checkBalance(): Promise<Outcome<void>> {
    const answer = await fetchText(this.http, this.endpoint('askCredits.aspx'));
    if (!answer.ok) {
      return answer;
    }

    if (!answer.value.startsWith('OK-')) {
      logError(`CaptchaBrotherhood error: ${stripErrorPrefix(answer.value)}`);
      return fail('fatal');
    }

    const credits = Number.parseInt(answer.value.slice(3), 10);
    if (!Number.isFinite(credits) || credits < MINIMUM_CREDITS) {
      logNotice(`CaptchaBrotherhood: not enough credits (${this.account.username})`);
      return fail('fatal');
    }

    logDebug(`CaptchaBrotherhood credits: ${credits}`);
    return succeedVoid();
  }

  async solve(image: CaptchaImage, _hint: SolveHint, wait: WaitFn): Promise<Outcome<SolvedCaptcha>> {
    logNotice(`Using captcha brotherhood bypass service (${this.account.username})`);

    // The service insists on this content type for the raw image body.
    const upload = await fetchText(
      this.http,
      this.endpoint('sendNewCaptcha.aspx', {
        captchaSource: 'hostkit',
        timeout: '30',
        captchaSite: '-1',
      }),
      {
        method: 'POST',
        headers: { 'content-type': 'text/html' },
        body: imageBlob(image.bytes),
      },
    );
    if (!upload.ok) {
      return upload;
    }

    const transactionId = upload.value.startsWith('OK-') ? upload.value.slice(3) : '';
    if (transactionId.length === 0) {
      logError(
        `Captcha Brotherhood error: ${upload.value.startsWith('OK-') ? 'empty tid?' : stripErrorPrefix(upload.value)}`,
      );
      return fail('fatal');
    }

    const polled = await pollLadder<string>(POLL_LADDER, wait, async () => {
      const answer = await fetchText(
        this.http,
        this.endpoint('askCaptchaResult.aspx', { captchaID: transactionId }),
      );
      if (!answer.ok) {
        return { state: 'failed', failure: answer };
      }
      if (answer.value.startsWith('OK-answered-')) {
        const word = answer.value.slice('OK-answered-'.length);
        if (word.length > 0) {
          return { state: 'done', value: word };
        }
        logError('Captcha Brotherhood error: empty word?');
        return { state: 'failed', failure: fail('fatal') };
      }
      if (answer.value.startsWith('OK-')) {
        return { state: 'pending' };
      }
      logError(`Captcha Brotherhood error: ${stripErrorPrefix(answer.value)}`);
      return { state: 'failed', failure: fail('fatal') };
    });

    if (polled.ok === 'exhausted') {
      logError('Captcha Brotherhood error: no answer in time');
      return fail('fatal');
    }
    if (!polled.ok) {
      return polled;
    }
    return succeed({ word: polled.value, ticket: createTicket(this.tag, transactionId) });
  }

  async ack(_transactionId: string): Promise<void> {
    // Only wrong answers are reported.
  }

  async nack(transactionId: string): Promise<void> {
    logDebug(`captcha brotherhood report nack (${this.account.username})`);
    const answer = await fetchText(
      this.http,
      this.endpoint('complainCaptcha.aspx', { captchaID: transactionId }),
    );
    if (!answer.ok || answer.value !== 'OK-Complained') {
      logError(`Captcha Brotherhood complaint rejected: ${answer.ok ? answer.value : answer.kind}`);
    }
  }

  private endpoint(page: string, extra: Record<string, string> = {}): string {
    return withQuery(`${BASE_URL}/${page}`, {
      username: this.account.username,
      password: this.account.password,
      ...extra,
    });
  }
}

function stripErrorPrefix(answer: string): string {
  return answer.replace(/^Error-/, '');
}
