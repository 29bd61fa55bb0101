import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { createConfigurationError, createSystemError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ModuleOptions } from '../modules/contract.js';

/** Settings read from `config.json`; every field is optional. */
export interface ConfigFile {
  timeout?: number;
  maxRetries?: number;
  noExtraWait?: boolean;
  fallback?: boolean;
  outputDirectory?: string;
  tempDirectory?: string;
  captcha?: {
    method?: string;
    program?: string;
    antigate?: string;
    '9kweu'?: string;
    captchabrotherhood?: string;
    deathbycaptcha?: string;
  };
  /** Per-module defaults keyed by module name. */
  modules?: Record<string, Partial<ModuleOptions>>;
}

const CAPTCHA_KEYS = ['method', 'program', 'antigate', '9kweu', 'captchabrotherhood', 'deathbycaptcha'] as const;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'hostkit', 'config.json');
}

/**
 * Reads the configuration file. A missing default file is an empty
 * configuration; a missing explicit file is an error.
 */
export async function loadConfigFile(path?: string): Promise<ConfigFile> {
  const target = path ?? defaultConfigPath();

  let text: string;
  try {
    text = await readFile(target, 'utf8');
  } catch (error) {
    if (path === undefined && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw createSystemError(`can't read configuration file: ${target}`, { path: target }, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw createConfigurationError(`configuration file is not valid JSON: ${target}`, { path: target }, {
      cause: error,
    });
  }

  const config = parseConfigFile(raw, target);
  getLogger().debug({ path: target }, 'configuration file loaded');
  return config;
}

export function parseConfigFile(raw: unknown, source = 'configuration'): ConfigFile {
  if (!isRecord(raw)) {
    throw createConfigurationError(`${source}: top level must be an object`, { source });
  }

  const config: ConfigFile = {};
  config.timeout = optionalNumber(raw, 'timeout', source);
  config.maxRetries = optionalNumber(raw, 'maxRetries', source);
  config.noExtraWait = optionalBoolean(raw, 'noExtraWait', source);
  config.fallback = optionalBoolean(raw, 'fallback', source);
  config.outputDirectory = optionalString(raw, 'outputDirectory', source);
  config.tempDirectory = optionalString(raw, 'tempDirectory', source);

  if (raw.captcha !== undefined) {
    const captcha = raw.captcha;
    if (!isRecord(captcha)) {
      throw createConfigurationError(`${source}: "captcha" must be an object`, { source });
    }
    const section: NonNullable<ConfigFile['captcha']> = {};
    for (const key of CAPTCHA_KEYS) {
      const value = optionalString(captcha, key, `${source} captcha`);
      if (value !== undefined) {
        section[key] = value;
      }
    }
    config.captcha = section;
  }

  const rawModules = raw.modules;
  if (rawModules !== undefined) {
    if (!isRecord(rawModules)) {
      throw createConfigurationError(`${source}: "modules" must be an object`, { source });
    }
    const modules: Record<string, Partial<ModuleOptions>> = {};
    for (const [name, section] of Object.entries(rawModules)) {
      modules[name] = parseModuleSection(section, `${source} module ${name}`);
    }
    config.modules = modules;
  }

  return config;
}

function parseModuleSection(section: unknown, source: string): Partial<ModuleOptions> {
  if (!isRecord(section)) {
    throw createConfigurationError(`${source}: section must be an object`, { source });
  }

  const options: Partial<ModuleOptions> = {
    auth: optionalString(section, 'auth', source),
    authFree: optionalString(section, 'authFree', source),
    linkPassword: optionalString(section, 'linkPassword', source),
  };

  const rawOptions = section.options;
  if (rawOptions !== undefined) {
    if (!isRecord(rawOptions)) {
      throw createConfigurationError(`${source}: "options" must be an object`, { source });
    }
    const extra: Record<string, string> = {};
    for (const [key, value] of Object.entries(rawOptions)) {
      extra[key] = String(value);
    }
    options.extra = extra;
  }
  return options;
}

function optionalNumber(record: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw createConfigurationError(`${source}: "${key}" must be a number`, { source, value });
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw createConfigurationError(`${source}: "${key}" must be true or false`, { source, value });
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw createConfigurationError(`${source}: "${key}" must be a string`, { source, value });
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
