import { fail, succeed, succeedVoid, type Failure, type Outcome } from '../../engine/outcome.js';
import type { WaitFn } from '../../engine/waitBudget.js';
import type { FetchLike } from '../../network/http.js';
import { logDebug, logError, logNotice } from '../../util/output.js';
import { createTicket } from '../ticket.js';
import type { CaptchaImage, CaptchaProvider, SolveHint, SolvedCaptcha } from '../types.js';
import { fetchText, imageBlob, pollLadder, withQuery } from './remote.js';

const BASE_URL = 'http://antigate.com';
const POLL_LADDER = [8, 5, 5, 6, 6, 7, 7, 8] as const;

const SERVER_ERROR_PAGES: ReadonlyArray<[string, string]> = [
  ['500 Internal Server Error', 'internal server error (HTTP 500)'],
  ['502 Bad Gateway', 'bad gateway (HTTP 502)'],
  ['503 Service Unavailable', 'service unavailable (HTTP 503)'],
];

export class AntigateProvider implements CaptchaProvider {
  readonly name = 'antigate';
  readonly tag = 'a';

  constructor(
    private readonly key: string,
    private readonly http: FetchLike,
  ) {}

  async checkBalance(): Promise<Outcome<void>> {
    const answer = await fetchText(
      this.http,
      withQuery(`${BASE_URL}/res.php`, { key: this.key, action: 'getbalance' }),
    );
    if (!answer.ok) {
      logNotice('antigate: site seems to be down');
      return fail('network', { error: answer.error });
    }

    const amount = answer.value;
    const serverError = SERVER_ERROR_PAGES.find(([marker]) => amount.includes(marker));
    if (serverError) {
      logError(`antigate: ${serverError[1]}`);
      return fail('captcha');
    }
    if (amount.startsWith('ERROR')) {
      logError(`antigate error: ${amount}`);
      return fail('fatal');
    }
    if (amount === '0.0000' || amount.startsWith('-')) {
      logNotice('antigate: no more credits (or bad key)');
      return fail('fatal');
    }

    logDebug(`antigate credits: $${amount}`);
    return succeedVoid();
  }

  async solve(image: CaptchaImage, _hint: SolveHint, wait: WaitFn): Promise<Outcome<SolvedCaptcha>> {
    logNotice('Using antigate captcha recognition system');

    const form = new FormData();
    form.set('method', 'post');
    form.set('file', imageBlob(image.bytes), 'file.jpg');
    form.set('key', this.key);
    form.set('is_russian', '0');

    const upload = await fetchText(this.http, `${BASE_URL}/in.php`, { method: 'POST', body: form });
    if (!upload.ok) {
      return upload;
    }

    const rejected = classifyUploadAnswer(upload.value);
    if (rejected) {
      return rejected;
    }
    const transactionId = upload.value.slice('OK|'.length);

    const polled = await pollLadder<string>(POLL_LADDER, wait, async () => {
      const answer = await fetchText(
        this.http,
        withQuery(`${BASE_URL}/res.php`, { key: this.key, action: 'get', id: transactionId }),
      );
      if (!answer.ok) {
        return { state: 'failed', failure: answer };
      }
      if (answer.value === 'CAPCHA_NOT_READY') {
        return { state: 'pending' };
      }
      if (answer.value.startsWith('OK|')) {
        return { state: 'done', value: answer.value.slice('OK|'.length) };
      }
      logError(`antigate error: ${answer.value}`);
      return { state: 'failed', failure: fail('fatal') };
    });

    if (polled.ok === 'exhausted') {
      logError('antigate error: service not available');
      return fail('captcha');
    }
    if (!polled.ok) {
      return polled;
    }
    return succeed({ word: polled.value, ticket: createTicket(this.tag, transactionId) });
  }

  async ack(_transactionId: string): Promise<void> {
    // antigate has no positive feedback call.
  }

  async nack(transactionId: string): Promise<void> {
    const answer = await fetchText(
      this.http,
      withQuery(`${BASE_URL}/res.php`, { key: this.key, action: 'reportbad', id: transactionId }),
    );
    if (!answer.ok || answer.value !== 'OK_REPORT_RECORDED') {
      logError(`antigate error: ${answer.ok ? answer.value : answer.kind}`);
    }
  }
}

function classifyUploadAnswer(answer: string): Failure | undefined {
  if (answer.length === 0) {
    logError('antigate empty answer');
    return fail('network');
  }
  if (answer === 'ERROR_IP_NOT_ALLOWED') {
    logError('antigate error: IP not allowed');
    return fail('fatal');
  }
  if (answer === 'ERROR_ZERO_BALANCE') {
    logError('antigate error: no credits');
    return fail('fatal');
  }
  if (answer === 'ERROR_NO_SLOT_AVAILABLE') {
    logError('antigate error: no slot available');
    return fail('captcha');
  }
  if (answer.includes('ERROR_') || !answer.startsWith('OK|')) {
    logError(`antigate error: ${answer}`);
    return fail('fatal');
  }
  return undefined;
}
