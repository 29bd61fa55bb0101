import { fail, failureFromError, succeed, type Outcome } from '../../engine/outcome.js';
import type { FetchLike } from '../../network/http.js';
import { logDebug } from '../../util/output.js';
import type { CaptchaChallenge, ChallengeAnswer, SolvedCaptcha } from '../types.js';

export const RECAPTCHA_SERVER = 'http://www.google.com/recaptcha/api/';
/** Upper bound on image reloads for one challenge session. */
export const MAX_RELOADS = 100;

export interface ChallengeDeps {
  http: FetchLike;
  solve(challenge: CaptchaChallenge): Promise<Outcome<SolvedCaptcha>>;
}

/**
 * Distorted-text challenge. An empty answer asks for another image in the same
 * session until a word comes back.
 */
export async function solveRecaptcha(
  publicKey: string,
  deps: ChallengeDeps,
): Promise<Outcome<ChallengeAnswer>> {
  const script = await getText(
    deps.http,
    `${RECAPTCHA_SERVER}challenge?k=${encodeURIComponent(publicKey)}&ajax=1`,
  );
  if (!script.ok) {
    return script;
  }
  if (script.value.length === 0) {
    return fail('captcha');
  }

  const server = matchQuoted(script.value, /server\s?:\s?'([^']*)'/);
  let challenge = matchQuoted(script.value, /challenge\s?:\s?'([^']*)'/);
  if (server === undefined || challenge === undefined) {
    return fail('fatal', { hint: 'recaptcha challenge script not understood' });
  }
  logDebug(`reCaptcha server: ${server}`);

  for (let attempt = 1; attempt <= MAX_RELOADS; attempt += 1) {
    logDebug(`reCaptcha loop ${attempt}`);
    logDebug(`reCaptcha challenge: ${challenge}`);

    const solved = await deps.solve({ image: `${server}image?c=${challenge}`, type: 'recaptcha' });
    if (!solved.ok) {
      return solved;
    }
    if (solved.value.word.length > 0) {
      return succeed({ word: solved.value.word, challenge, ticket: solved.value.ticket });
    }

    logDebug('empty, request another image');
    const reload = await getText(
      deps.http,
      `${server}reload?k=${encodeURIComponent(publicKey)}&c=${challenge}&reason=r&type=image&lang=en`,
    );
    if (!reload.ok) {
      return reload;
    }
    // Recaptcha.finish_reload('...', 'image');
    const next = matchQuoted(reload.value, /finish_reload\('([^']*)/);
    if (next === undefined) {
      return fail('fatal', { hint: 'recaptcha reload answer not understood' });
    }
    challenge = next;
  }

  return fail('max-tries-reached');
}

export async function getText(http: FetchLike, url: string, init?: RequestInit): Promise<Outcome<string>> {
  try {
    const response = await http(url, init);
    return succeed(await response.text());
  } catch (error) {
    return failureFromError(error);
  }
}

function matchQuoted(text: string, pattern: RegExp): string | undefined {
  return pattern.exec(text)?.[1];
}
