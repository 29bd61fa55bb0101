import { isCaptchaMethod, type CaptchaConfig } from './captcha/types.js';
import type { ConfigFile } from './config/configFile.js';
import { createConfigurationError } from './errors.js';
import type { ModuleOptions } from './modules/contract.js';
import type {
  CommonOptions,
  DeleteOptions,
  DownloadOptions,
  ListOptions,
  ProbeOptions,
  UploadOptions,
} from './types.js';

/** Raw values shared by every command, as the CLI collected them. */
export interface CommonConfig {
  auth?: string;
  authFree?: string;
  linkPassword?: string;
  /** `name=value` pairs handed to the modules. */
  moduleOptions?: readonly string[];
  getModule?: boolean;
  file?: ConfigFile;
}

export interface CaptchaSettings {
  captchaMethod?: string;
  captchaProgram?: string;
  antigate?: string;
  nineKw?: string;
  brotherhood?: string;
  deathByCaptcha?: string;
}

export interface DownloadConfig extends CommonConfig, CaptchaSettings {
  timeout?: number;
  maxRetries?: number;
  noExtraWait?: boolean;
  checkLink?: boolean;
  markDownloaded?: boolean;
  noOverwrite?: boolean;
  outputDirectory?: string;
  tempDirectory?: string;
  cookies?: string;
  printf?: string;
  exec?: string;
  fallback?: boolean;
}

export interface ProbeConfig extends CommonConfig {
  printf?: string;
  follow?: boolean;
}

export interface ListConfig extends CommonConfig {
  printf?: string;
  recursive?: boolean;
  fallback?: boolean;
}

export interface UploadConfig extends CommonConfig, CaptchaSettings {
  name?: string;
  description?: string;
  timeout?: number;
  maxRetries?: number;
}

export function resolveDownloadOptions(config: DownloadConfig = {}): DownloadOptions {
  const file = config.file ?? {};
  const timeout = config.timeout ?? file.timeout;
  const maxRetries = config.maxRetries ?? file.maxRetries;

  if (config.printf !== undefined && config.exec !== undefined) {
    throw createConfigurationError('--printf and --exec cannot be used together', {});
  }
  if (config.checkLink && (config.printf !== undefined || config.exec !== undefined)) {
    throw createConfigurationError('--check-link cannot be used with --printf or --exec', {});
  }

  return {
    ...resolveCommonOptions(config),
    timeout: timeout === undefined ? undefined : coercePositiveInteger(timeout, 'timeout'),
    maxRetries: maxRetries === undefined ? undefined : coerceNonNegativeInteger(maxRetries, 'max-retries'),
    noExtraWait: config.noExtraWait ?? file.noExtraWait ?? false,
    checkLink: config.checkLink ?? false,
    markDownloaded: config.markDownloaded ?? false,
    noOverwrite: config.noOverwrite ?? false,
    outputDirectory: config.outputDirectory ?? file.outputDirectory,
    tempDirectory: config.tempDirectory ?? file.tempDirectory,
    cookies: config.cookies,
    printf: config.printf,
    exec: config.exec,
    fallback: config.fallback ?? file.fallback ?? false,
    captcha: resolveCaptchaConfig(config, file),
  };
}

export function resolveProbeOptions(config: ProbeConfig = {}): ProbeOptions {
  return {
    ...resolveCommonOptions(config),
    printf: config.printf,
    follow: config.follow ?? false,
  };
}

export function resolveListOptions(config: ListConfig = {}): ListOptions {
  return {
    ...resolveCommonOptions(config),
    printf: config.printf,
    recursive: config.recursive ?? false,
    fallback: config.fallback ?? config.file?.fallback ?? false,
  };
}

export function resolveDeleteOptions(config: CommonConfig = {}): DeleteOptions {
  return resolveCommonOptions(config);
}

export function resolveUploadOptions(config: UploadConfig = {}): UploadOptions {
  const file = config.file ?? {};
  const timeout = config.timeout ?? file.timeout;
  const maxRetries = config.maxRetries ?? file.maxRetries;
  return {
    ...resolveCommonOptions(config),
    name: config.name,
    description: config.description,
    timeout: timeout === undefined ? undefined : coercePositiveInteger(timeout, 'timeout'),
    maxRetries: maxRetries === undefined ? undefined : coerceNonNegativeInteger(maxRetries, 'max-retries'),
    captcha: resolveCaptchaConfig(config, file),
  };
}

function resolveCommonOptions(config: CommonConfig): CommonOptions {
  const moduleOptions: ModuleOptions = {
    auth: config.auth,
    authFree: config.authFree,
    linkPassword: config.linkPassword,
    extra: parseModuleOptionPairs(config.moduleOptions ?? []),
  };
  if (moduleOptions.auth !== undefined) {
    requireAccount(moduleOptions.auth, 'auth');
  }
  if (moduleOptions.authFree !== undefined) {
    requireAccount(moduleOptions.authFree, 'auth-free');
  }

  return {
    moduleOptions,
    perModule: config.file?.modules ?? {},
    getModule: config.getModule ?? false,
  };
}

function resolveCaptchaConfig(config: CaptchaSettings, file: ConfigFile): CaptchaConfig {
  const fromFile = file.captcha ?? {};
  const method = config.captchaMethod ?? fromFile.method;
  if (method !== undefined && !isCaptchaMethod(method)) {
    throw createConfigurationError(`unknown captcha method: ${method}`, { method });
  }

  const captcha: CaptchaConfig = {
    method,
    program: config.captchaProgram ?? fromFile.program,
    antigateKey: config.antigate ?? fromFile.antigate,
    nineKwKey: config.nineKw ?? fromFile['9kweu'],
    brotherhoodAccount: config.brotherhood ?? fromFile.captchabrotherhood,
    deathByCaptchaAccount: config.deathByCaptcha ?? fromFile.deathbycaptcha,
  };

  if (captcha.brotherhoodAccount !== undefined) {
    requireAccount(captcha.brotherhoodAccount, 'captchabhood');
  }
  if (captcha.deathByCaptchaAccount !== undefined) {
    requireAccount(captcha.deathByCaptchaAccount, 'deathbycaptcha');
  }
  return captcha;
}

export function parseModuleOptionPairs(pairs: readonly string[]): Record<string, string> {
  const extra: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw createConfigurationError(`module option must look like name=value: ${pair}`, { pair });
    }
    extra[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return extra;
}

function requireAccount(value: string, field: string): void {
  if (!/^[^:]+:/.test(value)) {
    throw createConfigurationError(`${field} must look like user:password`, { field });
  }
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { runDownload, finalizeLink } from './commands/download.js';
export { runProbe } from './commands/probe.js';
export { runList } from './commands/list.js';
export { runDelete } from './commands/delete.js';
export { runUpload } from './commands/upload.js';
export { CaptchaEngine } from './captcha/engine.js';
export { loadConfigFile, defaultConfigPath, parseConfigFile } from './config/configFile.js';
export { BatchResult, summarizeExitCode } from './engine/batch.js';
export { fail, succeed, succeedVoid, tempUnavailable, type Outcome } from './engine/outcome.js';
export { RetryContext, runRetryLadder } from './engine/retryLadder.js';
export { WaitBudget } from './engine/waitBudget.js';
export { HosterError, EXIT_CODES, createHosterError, type ErrorKind } from './errors.js';
export { fallbackModule } from './modules/fallback.js';
export { loadModuleFile } from './modules/loader.js';
export { ModuleRegistry } from './modules/registry.js';
export { createHttpClient } from './network/http.js';
export type { ConfigFile };
export {
  DEFAULT_CAPABILITIES,
  isSiteModule,
  supports,
  type Capability,
  type DownloadLink,
  type ListEntry,
  type ModuleCapabilities,
  type ModuleContext,
  type ModuleOptions,
  type ProbeField,
  type ProbeResult,
  type SiteModule,
  type UploadResult,
  type UploadSource,
} from './modules/contract.js';
export type { CaptchaConfig } from './captcha/types.js';
export type {
  CommonOptions,
  DeleteOptions,
  DownloadOptions,
  ListOptions,
  ProbeOptions,
  Runtime,
  UploadOptions,
} from './types.js';
