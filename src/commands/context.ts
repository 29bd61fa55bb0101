import { CaptchaEngine } from '../captcha/engine.js';
import type { CaptchaSolver } from '../captcha/types.js';
import { failureFromError, type Outcome } from '../engine/outcome.js';
import { WaitBudget } from '../engine/waitBudget.js';
import { componentLogger } from '../logger.js';
import type { ModuleContext, ModuleOptions, SiteModule } from '../modules/contract.js';
import { Session } from '../network/session.js';
import type { CommonOptions, Runtime } from '../types.js';

export interface ContextRequest {
  module: SiteModule;
  session: Session;
  options: CommonOptions;
  budget?: WaitBudget;
  captcha?: CaptchaSolver;
  checkLinkOnly?: boolean;
  /** Replaces the link password from the options (interactive prompt). */
  linkPassword?: string;
}

export function buildModuleContext(request: ContextRequest, runtime: Runtime): ModuleContext {
  const budget = request.budget ?? new WaitBudget(undefined, runtime.sleep);
  const options = moduleOptionsFor(request.module.name, request.options);
  if (request.linkPassword !== undefined) {
    options.linkPassword = request.linkPassword;
  }

  return {
    session: request.session,
    fetch: request.session.fetch,
    captcha: request.captcha ?? disabledCaptcha(runtime, request.module.name, budget, request.session),
    wait: budget.consume,
    options,
    checkLinkOnly: request.checkLinkOnly ?? false,
    log: componentLogger(`module:${request.module.name}`),
  };
}

/** Command-line values win over the configuration file's per-module section. */
export function moduleOptionsFor(moduleName: string, options: CommonOptions): ModuleOptions {
  const fromFile = options.perModule[moduleName] ?? {};
  const fromCli = options.moduleOptions;
  return {
    auth: fromCli.auth ?? fromFile.auth,
    authFree: fromCli.authFree ?? fromFile.authFree,
    linkPassword: fromCli.linkPassword ?? fromFile.linkPassword,
    extra: { ...(fromFile.extra ?? {}), ...fromCli.extra },
  };
}

export async function openSession(runtime: Runtime, cookieFile?: string): Promise<Session> {
  return cookieFile ? Session.fromCookieFile(cookieFile, runtime.http) : new Session(runtime.http);
}

/** Module calls may throw; the result is always an Outcome. */
export async function callModule<T>(operation: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
  try {
    return await operation();
  } catch (error) {
    return failureFromError(error);
  }
}

/** Captcha solving for commands that take no captcha configuration. */
function disabledCaptcha(
  runtime: Runtime,
  moduleName: string,
  budget: WaitBudget,
  session: Session,
): CaptchaSolver {
  const engine = new CaptchaEngine({ config: { method: 'none' }, http: runtime.http });
  return engine.bind({ moduleName, wait: budget.consume, http: session.fetch });
}
