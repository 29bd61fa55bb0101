import type { ProgramRunner } from './captcha/program.js';
import type { Asker } from './captcha/providers/prompt.js';
import type { CaptchaConfig, CaptchaProvider, RemoteProviderName } from './captcha/types.js';
import type { Sleeper } from './engine/waitBudget.js';
import type { ModuleOptions } from './modules/contract.js';
import type { ModuleRegistry } from './modules/registry.js';
import type { FetchLike } from './network/http.js';

/** Options every command shares. */
export interface CommonOptions {
  /** Module options given on the command line; they override `perModule`. */
  moduleOptions: ModuleOptions;
  /** Per-module options from the configuration file, by module name. */
  perModule: Readonly<Record<string, Partial<ModuleOptions>>>;
  getModule: boolean;
}

export interface DownloadOptions extends CommonOptions {
  /** Seconds an item may spend waiting; unset is unlimited. */
  timeout?: number;
  /** Unset is unlimited, 0 disables retries. */
  maxRetries?: number;
  noExtraWait: boolean;
  checkLink: boolean;
  markDownloaded: boolean;
  noOverwrite: boolean;
  outputDirectory?: string;
  tempDirectory?: string;
  cookies?: string;
  printf?: string;
  exec?: string;
  fallback: boolean;
  captcha: CaptchaConfig;
}

export interface ProbeOptions extends CommonOptions {
  printf?: string;
  /** Follow one HTTP redirect when no module matches. */
  follow: boolean;
}

export interface ListOptions extends CommonOptions {
  printf?: string;
  recursive: boolean;
  fallback: boolean;
}

export type DeleteOptions = CommonOptions;

export interface UploadOptions extends CommonOptions {
  /** Remote file name, only valid with a single file. */
  name?: string;
  description?: string;
  timeout?: number;
  maxRetries?: number;
  captcha: CaptchaConfig;
}

export type ExecRunner = (command: string) => Promise<number>;

/** Collaborators of the command drivers; tests replace the side-effecting ones. */
export interface Runtime {
  registry: ModuleRegistry;
  http: FetchLike;
  sleep?: Sleeper;
  /** Terminal question for captcha answers and link passwords. */
  ask?: Asker;
  runProgram?: ProgramRunner;
  runCommand?: ExecRunner;
  interactive?: boolean;
  remoteProviders?: Partial<Record<RemoteProviderName, CaptchaProvider>>;
}
