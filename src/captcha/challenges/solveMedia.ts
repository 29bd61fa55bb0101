import { load } from 'cheerio';

import { fail, succeed, type Outcome } from '../../engine/outcome.js';
import { logDebug } from '../../util/output.js';
import type { CaptchaTicket, ChallengeAnswer } from '../types.js';
import { getText, MAX_RELOADS, type ChallengeDeps } from './recaptcha.js';

export const SOLVEMEDIA_URL = 'http://api.solvemedia.com/papi';

export interface SolveMediaDeps extends ChallengeDeps {
  nack(ticket: CaptchaTicket): Promise<void>;
}

/**
 * "Gibberish" challenge driven through the noscript pages. A rejected answer
 * is reported to the provider and ends the flow with `captcha`.
 */
export async function solveSolveMedia(
  publicKey: string,
  deps: SolveMediaDeps,
): Promise<Outcome<ChallengeAnswer>> {
  let pageUrl = `${SOLVEMEDIA_URL}/challenge.noscript?k=${encodeURIComponent(publicKey)}`;

  for (let attempt = 1; attempt <= MAX_RELOADS; attempt += 1) {
    logDebug(`SolveMedia loop ${attempt}`);

    const page = await getText(deps.http, pageUrl);
    if (!page.ok) {
      return page;
    }
    const $ = load(page.value);
    const magic = $('input[name="magic"]').attr('value');
    const challenge = $('input[name="adcopy_challenge"]').attr('value');
    if (magic === undefined || challenge === undefined) {
      return fail('fatal', { hint: 'solvemedia form not found' });
    }

    const solved = await deps.solve({ image: `${SOLVEMEDIA_URL}/media?c=${challenge}`, type: 'solvemedia' });
    if (!solved.ok) {
      return solved;
    }
    const { word, ticket } = solved.value;

    const form = new URLSearchParams({
      adcopy_response: word,
      k: publicKey,
      l: 'en',
      t: 'img',
      s: 'standard',
      magic,
      adcopy_challenge: challenge,
    });
    if (word.length === 0) {
      logDebug('empty, request another image');
      form.set('t_img.x', '23');
      form.set('t_img.y', '7');
    }

    const verify = await getText(deps.http, `${SOLVEMEDIA_URL}/verify.noscript`, {
      method: 'POST',
      headers: { referer: pageUrl },
      body: form,
    });
    if (!verify.ok) {
      return verify;
    }
    if (!verify.value.includes('Redirecting...') || verify.value.includes('&error=1&')) {
      await deps.nack(ticket);
      return fail('captcha');
    }

    const next = redirectTarget(verify.value);
    if (next === undefined) {
      return fail('fatal', { hint: 'solvemedia redirect not found' });
    }
    pageUrl = next;

    if (word.length === 0) {
      continue;
    }

    const result = await getText(deps.http, pageUrl);
    if (!result.ok) {
      return result;
    }
    if (!result.value.includes('Please copy this gibberish:') || !result.value.includes(challenge)) {
      logDebug('Unexpected content. Site updated?');
      return fail('fatal');
    }
    return succeed({ word, challenge, ticket });
  }

  return fail('max-tries-reached');
}

/** `<meta http-equiv="refresh" content="0; URL=...">` */
function redirectTarget(html: string): string | undefined {
  const $ = load(html);
  const content = $('meta[http-equiv]')
    .toArray()
    .map((element) => $(element).attr('content') ?? '')
    .find((value) => /URL=/i.test(value));
  const match = content === undefined ? null : /URL=(.+)$/i.exec(content);
  return match?.[1]?.trim();
}
