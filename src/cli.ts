#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { loadConfigFile, type ConfigFile } from './config/configFile.js';
import {
  resolveDeleteOptions,
  resolveDownloadOptions,
  resolveListOptions,
  resolveProbeOptions,
  resolveUploadOptions,
  type CaptchaSettings,
  type CommonConfig,
} from './index.js';
import { runDelete } from './commands/delete.js';
import { runDownload } from './commands/download.js';
import { runList } from './commands/list.js';
import { runProbe } from './commands/probe.js';
import { runUpload } from './commands/upload.js';
import { createConfigurationError } from './errors.js';
import type { BatchResult } from './engine/batch.js';
import { configureLogger, isLogLevel } from './logger.js';
import { loadModuleFile } from './modules/loader.js';
import { ModuleRegistry } from './modules/registry.js';
import { createHttpClient } from './network/http.js';
import type { Runtime } from './types.js';
import { reportHosterError } from './util/errorHandler.js';
import { logDebug, setOutputConfig, toVerbosity } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

type RawOptions = Record<string, unknown>;

const program = new Command();

program
  .name('hostkit')
  .description('Download, probe, list, delete and upload files on one-click hosting sites.')
  .version(version);

withCommonOptions(
  withCaptchaOptions(
    program
      .command('download')
      .description('Download files from the given links (URLs or files of links).')
      .argument('[items...]', 'URLs or text files holding one link per line.')
      .option('-c, --check-link', 'Only check whether the links are alive.')
      .option('-m, --mark-downloaded', 'Mark processed links in their links file (#OK, #NOTFOUND, ...).')
      .option('-o, --output-directory <dir>', 'Directory where files are saved.')
      .option('--temp-directory <dir>', 'Directory for files being downloaded.')
      .option('--no-overwrite', 'Never overwrite an existing file, append .1, .2, ... instead.')
      .option('-t, --timeout <seconds>', 'Time an item may spend waiting, across all retries.')
      .option('-r, --max-retries <count>', 'Retries after a temporary failure (0 disables retries).')
      .option('--no-extra-wait', 'Do not wait when a link is temporarily unavailable.')
      .option('--cookies <file>', 'Netscape cookie file shared by every item (read and rewritten).')
      .option('--printf <format>', 'Print the final link instead of downloading (%c %C %d %f %F %m %u %n %t %%).')
      .option('--exec <command>', 'Run a command instead of downloading, same sequences as --printf.')
      .option('--fallback', 'Without a matching module, download the URL with a plain HTTP GET.'),
  ),
).action(async (items: string[], options: RawOptions) =>
  execute(items, options, (runtime, file) =>
    runDownload(
      items,
      resolveDownloadOptions({
        ...commonConfig(options, file),
        ...captchaSettings(options),
        checkLink: flag(options, 'checkLink'),
        markDownloaded: flag(options, 'markDownloaded'),
        outputDirectory: text(options, 'outputDirectory'),
        tempDirectory: text(options, 'tempDirectory'),
        noOverwrite: options.overwrite === false,
        timeout: numeric(options, 'timeout', 'timeout'),
        maxRetries: numeric(options, 'maxRetries', 'max-retries'),
        noExtraWait: options.extraWait === false ? true : undefined,
        cookies: text(options, 'cookies'),
        printf: text(options, 'printf'),
        exec: text(options, 'exec'),
        fallback: options.fallback === true ? true : undefined,
        file,
      }),
      runtime,
    ),
  ),
);

withCommonOptions(
  program
    .command('probe')
    .description('Print information about the given links (URLs or files of links).')
    .argument('[items...]', 'URLs or text files holding one link per line.')
    .option('--printf <format>', 'Format of each entry (%c %f %F %h %m %s %u %n %t %%), default "%F%u".')
    .option('--follow', 'Without a matching module, follow one HTTP redirect.'),
).action(async (items: string[], options: RawOptions) =>
  execute(items, options, (runtime, file) =>
    runProbe(
      items,
      resolveProbeOptions({
        ...commonConfig(options, file),
        printf: text(options, 'printf'),
        follow: flag(options, 'follow'),
      }),
      runtime,
    ),
  ),
);

withCommonOptions(
  program
    .command('list')
    .description('Print the links held by shared folders.')
    .argument('[urls...]', 'Folder URLs.')
    .option('-R, --recursive', 'Recurse into sub folders.')
    .option('--printf <format>', 'Format of each entry (%f %F %m %u %n %t %%), default "%F%u".')
    .option('--fallback', 'Without a matching module, list the links found in the page.'),
).action(async (urls: string[], options: RawOptions) =>
  execute(urls, options, (runtime, file) =>
    runList(
      urls,
      resolveListOptions({
        ...commonConfig(options, file),
        printf: text(options, 'printf'),
        recursive: flag(options, 'recursive'),
        fallback: options.fallback === true ? true : undefined,
      }),
      runtime,
    ),
  ),
);

withCommonOptions(
  program
    .command('delete')
    .description('Delete files using their delete or admin links.')
    .argument('[urls...]', 'Delete or admin URLs.'),
).action(async (urls: string[], options: RawOptions) =>
  execute(urls, options, (runtime, file) =>
    runDelete(urls, resolveDeleteOptions(commonConfig(options, file)), runtime),
  ),
);

withCommonOptions(
  withCaptchaOptions(
    program
      .command('upload')
      .description('Upload files to a hosting site.')
      .argument('<module>', 'Name of the module to upload with.')
      .argument('[files...]', 'Local files.')
      .option('--name <name>', 'Remote file name (single file only).')
      .option('-d, --description <text>', 'File description.')
      .option('-t, --timeout <seconds>', 'Time a file may spend waiting, across all retries.')
      .option('-r, --max-retries <count>', 'Retries after a temporary failure (0 disables retries).'),
  ),
).action(async (moduleName: string, files: string[], options: RawOptions) =>
  execute(files, options, (runtime, file) =>
    runUpload(
      moduleName,
      files,
      resolveUploadOptions({
        ...commonConfig(options, file),
        ...captchaSettings(options),
        name: text(options, 'name'),
        description: text(options, 'description'),
        timeout: numeric(options, 'timeout', 'timeout'),
        maxRetries: numeric(options, 'maxRetries', 'max-retries'),
        file,
      }),
      runtime,
    ),
  ),
);

await program.parseAsync(process.argv);

function withCommonOptions(command: Command): Command {
  return command
    .option('-v, --verbose <level>', 'Verbosity: 0 none, 1 errors, 2 notices (default), 3 debug, 4 report.')
    .option('-q, --quiet', 'Alias for --verbose 0.')
    .option('--log-level <level>', 'Structured log level (pino levels: trace|debug|info|warn|error|fatal).')
    .option('--config <file>', 'Configuration file (JSON).')
    .option('--no-config', 'Do not read any configuration file.')
    .option('--load-module <file>', 'Load site modules from a file (repeatable).', collect, [])
    .option('-a, --auth <user:password>', 'Premium account.')
    .option('-b, --auth-free <user:password>', 'Free account.')
    .option('-p, --link-password <password>', 'Password of protected links.')
    .option('--module-option <name=value>', 'Option handed to the module (repeatable).', collect, [])
    .option('--get-module', 'Print the name of the module handling each link and exit.');
}

function withCaptchaOptions(command: Command): Command {
  return command
    .option('--captchamethod <method>', 'none, prompt, nox, online, antigate, 9kweu, captchabrotherhood or deathbycaptcha.')
    .option('--captchaprogram <program>', 'Program called as: <program> <module> <image> <type>-<min length>.')
    .option('--antigate <key>', 'Antigate account key.')
    .option('--9kweu <key>', '9kw.eu account key.')
    .option('--captchabhood <user:password>', 'Captcha Brotherhood account.')
    .option('--deathbycaptcha <user:password>', 'DeathByCaptcha account.');
}

async function execute(
  items: readonly string[],
  options: RawOptions,
  run: (runtime: Runtime, file: ConfigFile) => Promise<BatchResult>,
): Promise<void> {
  try {
    applyOutputOptions(options);
    if (items.length === 0) {
      throw createConfigurationError('no item specified, try --help for more information', {});
    }

    const file = options.config === false ? {} : await loadConfigFile(text(options, 'config'));
    if (options.config === false) {
      logDebug('--no-config selected');
    }

    const registry = new ModuleRegistry();
    for (const path of list(options, 'loadModule')) {
      for (const module of await loadModuleFile(path)) {
        registry.register(module);
      }
    }

    const batch = await run({ registry, http: createHttpClient() }, file);
    process.exitCode = batch.exitCode;
  } catch (error) {
    reportCliError(error);
  }
}

function applyOutputOptions(options: RawOptions): void {
  const logLevel = text(options, 'logLevel');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw createConfigurationError(`Unsupported log level: ${logLevel}`, { value: logLevel });
    }
    configureLogger({ level: logLevel });
  }

  if (options.quiet === true) {
    setOutputConfig({ verbosity: 0 });
  } else {
    const level = numeric(options, 'verbose', 'verbose');
    if (level !== undefined) {
      setOutputConfig({ verbosity: toVerbosity(level) });
    }
  }
}

function commonConfig(options: RawOptions, file: ConfigFile): CommonConfig {
  return {
    auth: text(options, 'auth'),
    authFree: text(options, 'authFree'),
    linkPassword: text(options, 'linkPassword'),
    moduleOptions: list(options, 'moduleOption'),
    getModule: flag(options, 'getModule'),
    file,
  };
}

function captchaSettings(options: RawOptions): CaptchaSettings {
  return {
    captchaMethod: text(options, 'captchamethod'),
    captchaProgram: text(options, 'captchaprogram'),
    antigate: text(options, 'antigate'),
    nineKw: text(options, '9kweu'),
    brotherhood: text(options, 'captchabhood'),
    deathByCaptcha: text(options, 'deathbycaptcha'),
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function text(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function flag(options: RawOptions, key: string): boolean | undefined {
  return options[key] === true ? true : undefined;
}

function list(options: RawOptions, key: string): string[] {
  const value = options[key];
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function numeric(options: RawOptions, key: string, label: string): number | undefined {
  const value = options[key];
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const hosterError = reportHosterError(error, { stage: 'cli' }, {
    defaultKind: 'fatal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  process.exitCode = hosterError.exitCode;
}
