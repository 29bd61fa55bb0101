import { createConfigurationError } from '../errors.js';
import { componentLogger } from '../logger.js';
import { fail, type Outcome } from '../engine/outcome.js';
import type { WaitFn } from '../engine/waitBudget.js';
import type { FetchLike } from '../network/http.js';
import { logDebug, logError } from '../util/output.js';
import { solveRecaptcha } from './challenges/recaptcha.js';
import { solveSolveMedia } from './challenges/solveMedia.js';
import { prepareImage } from './image.js';
import { solveWithProgram, type ProgramRunner } from './program.js';
import { AntigateProvider } from './providers/antigate.js';
import { BrotherhoodProvider } from './providers/brotherhood.js';
import { DeathByCaptchaProvider } from './providers/deathByCaptcha.js';
import { NineKwProvider } from './providers/nineKw.js';
import { PromptProvider, type Asker } from './providers/prompt.js';
import { formatTicket, isNoTicket } from './ticket.js';
import {
  REMOTE_PROVIDER_ORDER,
  type CaptchaChallenge,
  type CaptchaConfig,
  type CaptchaMethod,
  type CaptchaProvider,
  type CaptchaSolver,
  type CaptchaTicket,
  type RemoteProviderName,
  type SolvedCaptcha,
} from './types.js';

export interface CaptchaEngineOptions {
  config: CaptchaConfig;
  http: FetchLike;
  ask?: Asker;
  runProgram?: ProgramRunner;
  tempDirectory?: string;
  /** Replaces the built-in remote provider for a name (credentials are still required). */
  remoteProviders?: Partial<Record<RemoteProviderName, CaptchaProvider>>;
}

export interface SolverBinding {
  moduleName: string;
  wait: WaitFn;
  /** Item session; challenge pages and images are fetched through it. */
  http?: FetchLike;
}

type AckKind = 'ack' | 'nack';

/**
 * Owns the provider choice for a whole invocation and the bookkeeping of
 * tickets handed out by remote services.
 */
export class CaptchaEngine {
  readonly method: CaptchaMethod | undefined;
  private readonly http: FetchLike;
  private readonly remote = new Map<RemoteProviderName, CaptchaProvider>();
  private readonly selected: CaptchaProvider | undefined;
  private readonly balanceChecked = new Set<string>();
  private readonly consumedTickets = new Set<string>();
  private readonly log = componentLogger('captcha');

  constructor(private readonly options: CaptchaEngineOptions) {
    this.http = options.http;
    this.method = options.config.method;

    for (const name of REMOTE_PROVIDER_ORDER) {
      const provider = this.createRemote(name);
      if (provider) {
        this.remote.set(name, provider);
      }
    }

    this.selected = this.select();
    this.log.debug({ provider: this.selected?.name ?? 'none' }, 'captcha provider selected');
  }

  /** `undefined` when solving is disabled (`none`). */
  get providerName(): string | undefined {
    return this.selected?.name;
  }

  bind(binding: SolverBinding): CaptchaSolver {
    const http = binding.http ?? this.http;
    const solve = (challenge: CaptchaChallenge) => this.solve(challenge, binding, http);
    const ack = (ticket: CaptchaTicket) => this.ack(ticket);
    const nack = (ticket: CaptchaTicket) => this.nack(ticket);

    return {
      solve,
      ack,
      nack,
      recaptcha: (publicKey) => solveRecaptcha(publicKey, { http, solve }),
      solveMedia: (publicKey) => solveSolveMedia(publicKey, { http, solve, nack }),
    };
  }

  ack(ticket: CaptchaTicket): Promise<void> {
    return this.report(ticket, 'ack');
  }

  nack(ticket: CaptchaTicket): Promise<void> {
    return this.report(ticket, 'nack');
  }

  private async solve(
    challenge: CaptchaChallenge,
    binding: SolverBinding,
    http: FetchLike,
  ): Promise<Outcome<SolvedCaptcha>> {
    const image = await prepareImage(challenge.image, {
      http,
      tempDirectory: this.options.tempDirectory,
    });
    if (!image.ok) {
      return image;
    }

    try {
      const program = this.options.config.program;
      if (program) {
        const answer = await solveWithProgram(
          {
            program,
            moduleName: binding.moduleName,
            imagePath: image.value.path,
            type: challenge.type,
            minLength: challenge.minLength,
          },
          this.options.runProgram,
        );
        if (answer) {
          return answer;
        }
      }

      const provider = this.selected;
      if (!provider) {
        return fail('captcha');
      }

      if (!this.balanceChecked.has(provider.name)) {
        const balance = await provider.checkBalance();
        if (!balance.ok) {
          return balance;
        }
        this.balanceChecked.add(provider.name);
      }

      return await provider.solve(
        image.value,
        { type: challenge.type, minLength: challenge.minLength, maxLength: challenge.maxLength },
        binding.wait,
      );
    } finally {
      await image.value.release();
    }
  }

  private async report(ticket: CaptchaTicket, kind: AckKind): Promise<void> {
    if (isNoTicket(ticket)) {
      return;
    }

    const key = formatTicket(ticket);
    if (this.consumedTickets.has(key)) {
      logDebug(`captcha ${kind}: ticket ${key} already reported`);
      return;
    }
    this.consumedTickets.add(key);

    const provider = [...this.remote.values()].find((candidate) => candidate.tag === ticket.providerTag);
    if (!provider) {
      const known = REMOTE_TAGS.has(ticket.providerTag);
      logError(
        known
          ? `captcha ${kind} failed: provider '${ticket.providerTag}' has no credentials`
          : `captcha ${kind} failed: unknown transaction ID: ${key}`,
      );
      return;
    }

    try {
      await (kind === 'ack' ? provider.ack(ticket.transactionId) : provider.nack(ticket.transactionId));
    } catch (error) {
      // Feedback failures never change the item result.
      this.log.warn({ err: error, provider: provider.name, kind }, 'captcha feedback failed');
      logError(`captcha ${kind} failed (${provider.name})`);
    }
  }

  private select(): CaptchaProvider | undefined {
    const method = this.method;
    if (method === 'none') {
      return undefined;
    }
    if (method === 'prompt' || method === 'nox') {
      return this.prompt();
    }
    if (method === 'online') {
      const first = this.firstRemote();
      if (!first) {
        throw createConfigurationError('captcha method "online" needs credentials for a recognition service', {
          method,
        });
      }
      return first;
    }
    if (method !== undefined) {
      const forced = this.remote.get(method);
      if (!forced) {
        throw createConfigurationError(`captcha method "${method}" has no credentials configured`, {
          method,
        });
      }
      return forced;
    }
    return this.firstRemote() ?? this.prompt();
  }

  private firstRemote(): CaptchaProvider | undefined {
    for (const name of REMOTE_PROVIDER_ORDER) {
      const provider = this.remote.get(name);
      if (provider) {
        return provider;
      }
    }
    return undefined;
  }

  private prompt(): CaptchaProvider {
    return new PromptProvider(this.options.ask);
  }

  private createRemote(name: RemoteProviderName): CaptchaProvider | undefined {
    const { config, remoteProviders = {} } = this.options;
    const credential = credentialFor(config, name);
    if (!credential) {
      return undefined;
    }

    const override = remoteProviders[name];
    if (override) {
      return override;
    }

    switch (name) {
      case 'antigate':
        return new AntigateProvider(credential, this.http);
      case '9kweu':
        return new NineKwProvider(credential, this.http);
      case 'captchabrotherhood':
        return new BrotherhoodProvider(credential, this.http);
      case 'deathbycaptcha':
        return new DeathByCaptchaProvider(credential, this.http);
    }
  }
}

const REMOTE_TAGS = new Set(['a', '9', 'b', 'd']);

function credentialFor(config: CaptchaConfig, name: RemoteProviderName): string | undefined {
  switch (name) {
    case 'antigate':
      return config.antigateKey || undefined;
    case '9kweu':
      return config.nineKwKey || undefined;
    case 'captchabrotherhood':
      return config.brotherhoodAccount || undefined;
    case 'deathbycaptcha':
      return config.deathByCaptchaAccount || undefined;
  }
}
