import type { Outcome } from '../engine/outcome.js';
import type { WaitFn } from '../engine/waitBudget.js';

export interface CaptchaChallenge {
  /** Raw image bytes, a remote URL or a local file path. */
  image: Buffer | string;
  /** Hint for the solver, e.g. `recaptcha`, `solvemedia`, `digit`. */
  type: string;
  minLength?: number;
  maxLength?: number;
}

/**
 * Handle for a later ack/nack. `providerTag` is the single-character provider identifier;
 * a `transactionId` of "0" means there is nothing to report back.
 */
export interface CaptchaTicket {
  providerTag: string;
  transactionId: string;
}

export const NO_TICKET: CaptchaTicket = Object.freeze({ providerTag: '', transactionId: '0' });

export interface SolvedCaptcha {
  word: string;
  ticket: CaptchaTicket;
}

/** Result of a reload-loop challenge flow. */
export interface ChallengeAnswer {
  word: string;
  /** Challenge/session identifier the site expects next to the answer. */
  challenge: string;
  ticket: CaptchaTicket;
}

export interface CaptchaImage {
  path: string;
  bytes: Buffer;
}

export interface SolveHint {
  type: string;
  minLength?: number;
  maxLength?: number;
}

export interface CaptchaProvider {
  readonly name: string;
  readonly tag: string;
  checkBalance(): Promise<Outcome<void>>;
  solve(image: CaptchaImage, hint: SolveHint, wait: WaitFn): Promise<Outcome<SolvedCaptcha>>;
  ack(transactionId: string): Promise<void>;
  nack(transactionId: string): Promise<void>;
}

export type RemoteProviderName = 'antigate' | '9kweu' | 'captchabrotherhood' | 'deathbycaptcha';

export type CaptchaMethod = 'none' | 'prompt' | 'nox' | 'online' | RemoteProviderName;

export const REMOTE_PROVIDER_ORDER: readonly RemoteProviderName[] = [
  'antigate',
  '9kweu',
  'captchabrotherhood',
  'deathbycaptcha',
];

export const CAPTCHA_METHODS: readonly CaptchaMethod[] = [
  'none',
  'prompt',
  'nox',
  'online',
  ...REMOTE_PROVIDER_ORDER,
];

export function isCaptchaMethod(value: string): value is CaptchaMethod {
  return CAPTCHA_METHODS.some((method) => method === value);
}

export interface CaptchaConfig {
  method?: CaptchaMethod;
  /** Executable invoked as `<program> <module> <image> <type>-<minLength>`. */
  program?: string;
  antigateKey?: string;
  nineKwKey?: string;
  /** `user:password` */
  brotherhoodAccount?: string;
  /** `user:password` */
  deathByCaptchaAccount?: string;
}

/** The captcha engine bound to one item (module name + wait budget). */
export interface CaptchaSolver {
  solve(challenge: CaptchaChallenge): Promise<Outcome<SolvedCaptcha>>;
  recaptcha(publicKey: string): Promise<Outcome<ChallengeAnswer>>;
  solveMedia(publicKey: string): Promise<Outcome<ChallengeAnswer>>;
  ack(ticket: CaptchaTicket): Promise<void>;
  nack(ticket: CaptchaTicket): Promise<void>;
}
