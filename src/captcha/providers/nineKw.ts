import { fail, succeed, succeedVoid, type Outcome } from '../../engine/outcome.js';
import type { WaitFn } from '../../engine/waitBudget.js';
import type { FetchLike } from '../../network/http.js';
import { logDebug, logError, logNotice } from '../../util/output.js';
import { createTicket } from '../ticket.js';
import type { CaptchaImage, CaptchaProvider, SolveHint, SolvedCaptcha } from '../types.js';
import { fetchText, imageBlob, pollLadder, withQuery } from './remote.js';

const API_URL = 'http://www.9kw.eu/index.cgi';
const POLL_LADDER = [8, 5, 5, 6, 6, 7, 7, 8, 9, 9] as const;

/** Remote errors are numbered 0001..0019, followed by a German message. */
const REMOTE_ERROR = /^00[01]\d\s/;
const INSUFFICIENT_BALANCE = '0011 ';

export class NineKwProvider implements CaptchaProvider {
  readonly name = '9kweu';
  readonly tag = '9';

  constructor(
    private readonly apiKey: string,
    private readonly http: FetchLike,
  ) {}

  async checkBalance(): Promise<Outcome<void>> {
    const answer = await fetchText(
      this.http,
      withQuery(API_URL, { action: 'usercaptchaguthaben', apikey: this.apiKey }),
    );
    if (!answer.ok) {
      logNotice('9kweu: site seems to be down');
      return fail('network', { error: answer.error });
    }

    if (answer.value.startsWith(INSUFFICIENT_BALANCE)) {
      logNotice('9kw.eu: no more credits');
      return fail('fatal');
    }
    if (REMOTE_ERROR.test(answer.value)) {
      logError(`9kw.eu remote error: ${answer.value.slice(5)}`);
      return fail('fatal');
    }

    logDebug(`9kw.eu credits: ${answer.value}`);
    return succeedVoid();
  }

  async solve(image: CaptchaImage, _hint: SolveHint, wait: WaitFn): Promise<Outcome<SolvedCaptcha>> {
    logNotice('Using 9kw.eu captcha recognition system');

    const form = new FormData();
    form.set('method', 'post');
    form.set('action', 'usercaptchaupload');
    form.set('apikey', this.apiKey);
    form.set('file-upload-01', imageBlob(image.bytes), 'file.jpg');

    const upload = await fetchText(this.http, API_URL, { method: 'POST', body: form });
    if (!upload.ok) {
      return upload;
    }
    if (upload.value.length === 0) {
      logError('9kw.eu empty answer');
      return fail('network');
    }
    if (REMOTE_ERROR.test(upload.value)) {
      logError(`9kw.eu error: ${upload.value.slice(5)}`);
      return fail('fatal');
    }
    const transactionId = upload.value;

    const polled = await pollLadder<string>(POLL_LADDER, wait, async () => {
      const answer = await fetchText(
        this.http,
        withQuery(API_URL, {
          action: 'usercaptchacorrectdata',
          apikey: this.apiKey,
          id: transactionId,
          info: '1',
        }),
      );
      if (!answer.ok) {
        return { state: 'failed', failure: answer };
      }
      if (answer.value === 'NO DATA' || answer.value.length === 0) {
        return { state: 'pending' };
      }
      return { state: 'done', value: answer.value };
    });

    if (polled.ok === 'exhausted') {
      logError('9kw.eu error: service not available');
      return fail('captcha');
    }
    if (!polled.ok) {
      return polled;
    }
    return succeed({ word: polled.value, ticket: createTicket(this.tag, transactionId) });
  }

  ack(transactionId: string): Promise<void> {
    return this.reportBack(transactionId, '1');
  }

  nack(transactionId: string): Promise<void> {
    return this.reportBack(transactionId, '2');
  }

  private async reportBack(transactionId: string, correct: '1' | '2'): Promise<void> {
    const answer = await fetchText(
      this.http,
      withQuery(API_URL, {
        action: 'usercaptchacorrectback',
        apikey: this.apiKey,
        id: transactionId,
        correct,
      }),
    );
    if (!answer.ok || answer.value !== 'OK') {
      logError(`9kw.eu error: ${answer.ok ? answer.value : answer.kind}`);
    }
  }
}
