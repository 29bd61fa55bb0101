import { fail, failureFromError, succeed, succeedVoid, type Outcome } from '../../engine/outcome.js';
import type { WaitFn } from '../../engine/waitBudget.js';
import type { FetchLike } from '../../network/http.js';
import { logDebug, logError, logNotice } from '../../util/output.js';
import { createTicket } from '../ticket.js';
import type { CaptchaImage, CaptchaProvider, SolveHint, SolvedCaptcha } from '../types.js';
import { fetchJson, imageBlob, pollLadder, splitAccount, type Account } from './remote.js';

const API_URL = 'http://api.dbcapi.me/api';
const POLL_LADDER = [4, 3, 3, 4, 4, 5, 5] as const;
const JSON_HEADERS = { accept: 'application/json' } as const;

export class DeathByCaptchaProvider implements CaptchaProvider {
  readonly name = 'deathbycaptcha';
  readonly tag = 'd';
  private readonly account: Account;

  /** @param account `user:password` */
  constructor(
    account: string,
    private readonly http: FetchLike,
  ) {
    this.account = splitAccount(account, this.name);
  }

  async checkBalance(): Promise<Outcome<void>> {
    const answer = await fetchJson(this.http, `${API_URL}/user`, {
      method: 'POST',
      headers: JSON_HEADERS,
      body: this.credentialsForm(),
    });
    if (!answer.ok) {
      if (answer.kind === 'network') {
        logNotice('DeathByCaptcha: site seems to be down');
      } else {
        logError(`DeathByCaptcha unknown error: ${answer.hint ?? ''}`);
      }
      return answer;
    }

    const json = answer.value;
    if (json.status === 0) {
      if (json.is_banned === true) {
        logError(`DeathByCaptcha error: ${this.account.username} is banned`);
        return fail('fatal');
      }
      const balance = Number(json.balance);
      if (!Number.isFinite(balance) || Math.trunc(balance) <= 0) {
        logNotice(`DeathByCaptcha: not enough credits (${this.account.username})`);
        return fail('fatal');
      }
      logDebug(`DeathByCaptcha credits: ${balance}`);
      return succeedVoid();
    }

    if (json.status === 255) {
      logError(`DeathByCaptcha error: ${String(json.error ?? '')}`);
    } else {
      logError(`DeathByCaptcha unknown error: ${JSON.stringify(json)}`);
    }
    return fail('fatal');
  }

  async solve(image: CaptchaImage, _hint: SolveHint, wait: WaitFn): Promise<Outcome<SolvedCaptcha>> {
    logNotice(`Using DeathByCaptcha service (${this.account.username})`);

    const form = this.credentialsForm();
    form.set('captchafile', imageBlob(image.bytes), 'file.jpg');

    // The poll location comes from the 303 answer, not from its JSON body.
    let response: Response;
    try {
      response = await this.http(`${API_URL}/captcha`, {
        method: 'POST',
        headers: JSON_HEADERS,
        body: form,
        redirect: 'manual',
      });
    } catch (error) {
      return failureFromError(error);
    }

    const pollUrl = response.headers.get('location');
    if (response.status !== 303 || !pollUrl) {
      logError(`DeathByCaptcha wrong http answer (${response.status})`);
      return fail('captcha');
    }

    const polled = await pollLadder<SolvedCaptcha>(POLL_LADDER, wait, async () => {
      const answer = await fetchJson(this.http, new URL(pollUrl, API_URL).toString(), {
        headers: JSON_HEADERS,
      });
      if (!answer.ok) {
        return { state: 'failed', failure: answer };
      }

      const json = answer.value;
      if (json.is_correct !== true) {
        logError(`DeathByCaptcha unknown error: ${JSON.stringify(json)}`);
        return { state: 'failed', failure: fail('captcha') };
      }

      const word = typeof json.text === 'string' ? json.text : '';
      if (word.length === 0) {
        return { state: 'pending' };
      }
      return {
        state: 'done',
        value: { word, ticket: createTicket(this.tag, String(json.captcha ?? '')) },
      };
    });

    if (polled.ok === 'exhausted') {
      logError('DeathByCaptcha timeout: give up!');
      return fail('captcha');
    }
    if (!polled.ok) {
      return polled;
    }
    return succeed(polled.value);
  }

  async ack(_transactionId: string): Promise<void> {
    // Only wrong answers are reported.
  }

  async nack(transactionId: string): Promise<void> {
    logDebug(`DeathByCaptcha report nack (${this.account.username})`);
    const answer = await fetchJson(this.http, `${API_URL}/captcha/${transactionId}/report`, {
      method: 'POST',
      headers: JSON_HEADERS,
      body: this.credentialsForm(),
    });
    if (!answer.ok || answer.value.status !== 0) {
      logError(`DeathByCaptcha report failed: ${answer.ok ? JSON.stringify(answer.value) : answer.kind}`);
    }
  }

  private credentialsForm(): FormData {
    const form = new FormData();
    form.set('username', this.account.username);
    form.set('password', this.account.password);
    return form;
  }
}
