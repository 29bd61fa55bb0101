import { spawn } from 'node:child_process';
import { copyFile, mkdir, rename, rm, unlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CaptchaEngine } from '../captcha/engine.js';
import { createSystemError, exitCodeOf, type ErrorKind } from '../errors.js';
import { runSequentially, BatchResult } from '../engine/batch.js';
import {
  describeFailure,
  fail,
  failureFromError,
  outcomeCode,
  succeed,
  succeedVoid,
  type Outcome,
} from '../engine/outcome.js';
import { RetryContext, runRetryLadder } from '../engine/retryLadder.js';
import { WaitBudget } from '../engine/waitBudget.js';
import { expandItem, type ExpandedItem } from '../items/expandItems.js';
import { markLink } from '../items/markLink.js';
import { componentLogger, type LoggerLike } from '../logger.js';
import type { DownloadLink, SiteModule } from '../modules/contract.js';
import { fallbackModule } from '../modules/fallback.js';
import { isRemoteUrl, resolveModule } from '../modules/registry.js';
import { transferFile, type TransferResult } from '../network/transfer.js';
import type { Session } from '../network/session.js';
import type { DownloadOptions, ExecRunner, Runtime } from '../types.js';
import {
  alternateFilename,
  fileExists,
  filenameFromUrl,
  sanitizeFilename,
  truncateFilename,
} from '../util/filename.js';
import { logDebug, logError, logNotice, writeRaw, writeResult } from '../util/output.js';
import { DOWNLOAD_SEQUENCES, renderTemplate, validateTemplate } from '../util/template.js';
import { askOnTerminal } from '../captcha/providers/prompt.js';
import { buildModuleContext, callModule, openSession } from './context.js';

/** Seconds to wait once after an HTTP 503 on the final link. */
export const SERVICE_UNAVAILABLE_WAIT_SECONDS = 120;
/** Restarts allowed after unexpected HTTP answers on the final link. */
export const MAX_TRANSFER_RESTARTS = 3;

const ALIVE_KINDS: ReadonlySet<ErrorKind | 'ok'> = new Set<ErrorKind | 'ok'>([
  'ok',
  'link-temp-unavailable',
  'link-need-permissions',
  'link-password-required',
]);

/** Downloads every URL of every item, one at a time. */
export async function runDownload(
  items: readonly string[],
  options: DownloadOptions,
  runtime: Runtime,
): Promise<BatchResult> {
  if (options.printf !== undefined) {
    validateTemplate(options.printf, DOWNLOAD_SEQUENCES);
  }
  if (options.exec !== undefined) {
    validateTemplate(options.exec, DOWNLOAD_SEQUENCES);
  }
  await prepareDirectory(options.tempDirectory, 'Temporary directory');
  await prepareDirectory(options.outputDirectory, 'Output directory');
  if (options.cookies !== undefined) {
    if (!(await fileExists(options.cookies))) {
      throw createSystemError("can't find cookies file", { path: options.cookies });
    }
    logNotice('using provided cookies file');
  }
  if (options.captcha.method !== undefined) {
    logNotice(`force captcha method (${options.captcha.method})`);
  }
  if (options.noOverwrite) {
    logDebug('--no-overwrite selected');
  }
  if (options.noExtraWait) {
    logDebug('--no-extra-wait selected');
  }

  const engine = new CaptchaEngine({
    config: options.captcha,
    http: runtime.http,
    ask: runtime.ask,
    runProgram: runtime.runProgram,
    tempDirectory: options.tempDirectory,
    remoteProviders: runtime.remoteProviders,
  });

  const batch = new BatchResult();
  const expanded = await runSequentially(items.map((item) => () => expandItem(item)));

  const tasks = expanded
    .filter((entry): entry is ExpandedItem => entry !== undefined)
    .flatMap((entry) =>
      entry.urls.map(
        (url) => () => batch.settle(entry.item, url, () => downloadUrl(entry, url, options, runtime, engine)),
      ),
    );
  await runSequentially(tasks);

  if (batch.results.length > 1) {
    logDebug(`retvals: ${batch.codes.join(' ')}`);
  }
  return batch;
}

async function downloadUrl(
  entry: ExpandedItem,
  url: string,
  options: DownloadOptions,
  runtime: Runtime,
  engine: CaptchaEngine,
): Promise<Outcome<unknown>> {
  if (!isRemoteUrl(url)) {
    logError(`Skip: not an URL (${url})`);
    return fail('bad-command-line');
  }

  let resolved = await resolveModule(runtime.registry, url, 'download', {
    http: runtime.http,
    followRedirect: true,
  });

  if (!resolved && options.fallback) {
    logNotice('No module found, do a simple HTTP GET as requested');
    resolved = { module: fallbackModule, url };
  }

  if (!resolved) {
    logError(`Skip: no module for URL (${url})`);
    if (options.markDownloaded) {
      await markLink(entry, url, 'NOMODULE');
    }
    return fail('no-module');
  }

  if (options.getModule) {
    writeResult(resolved.module.name);
    return succeedVoid();
  }

  return new ItemDownload(entry, url, resolved.url, resolved.module, options, runtime, engine).run();
}

/** One item from first module call to the file on disk (or the printf/exec hand-off). */
class ItemDownload {
  private readonly budget: WaitBudget;
  private readonly retry: RetryContext;
  private readonly log: LoggerLike;
  private serviceUnavailableWaits = 0;
  private transferRestarts = 0;
  private linkPassword: string | undefined;
  private passwordAsked = false;

  constructor(
    private readonly entry: ExpandedItem,
    /** As given by the user; used for link marks. */
    private readonly rawUrl: string,
    private readonly url: string,
    private readonly module: SiteModule,
    private readonly options: DownloadOptions,
    private readonly runtime: Runtime,
    private readonly engine: CaptchaEngine,
  ) {
    this.budget = new WaitBudget(options.timeout, runtime.sleep);
    this.retry = new RetryContext(this.budget, options.maxRetries);
    this.log = componentLogger('download').child({ module: module.name, url });
  }

  async run(): Promise<Outcome<unknown>> {
    logNotice(`Starting download (${this.module.name}): ${this.url}`);

    for (;;) {
      const session = await openSession(this.runtime, this.options.cookies);
      const pass = await this.runPass(session);
      await this.saveCookies(session);

      if (pass.state === 'again') {
        continue;
      }
      this.log.info({ code: outcomeCode(pass.outcome) }, 'item finished');
      return pass.outcome;
    }
  }

  private async runPass(
    session: Session,
  ): Promise<{ state: 'done'; outcome: Outcome<unknown> } | { state: 'again' }> {
    const ctx = buildModuleContext(
      {
        module: this.module,
        session,
        options: this.options,
        budget: this.budget,
        captcha: this.engine.bind({
          moduleName: this.module.name,
          wait: this.budget.consume,
          http: session.fetch,
        }),
        checkLinkOnly: this.options.checkLink,
        linkPassword: this.linkPassword,
      },
      this.runtime,
    );

    const download = this.module.download;
    if (!download) {
      return { state: 'done', outcome: fail('no-module') };
    }
    const attempt = () => callModule(() => download.call(this.module, ctx, this.url));

    if (this.options.checkLink) {
      const outcome = await attempt();
      const kind = outcome.ok ? 'ok' : outcome.kind;
      if (ALIVE_KINDS.has(kind)) {
        logNotice(`Link active: ${this.url}`);
        writeResult(this.url);
        return { state: 'done', outcome: succeedVoid() };
      }
      return { state: 'done', outcome: await this.reportFailure(kind, outcome) };
    }

    const outcome = await runRetryLadder(attempt, this.retry, {
      noExtraWait: this.options.noExtraWait,
      captchaDisabled: this.engine.method === 'none',
      label: `download (${this.module.name})`,
    });

    if (!outcome.ok) {
      if (outcome.kind === 'link-password-required' && (await this.askLinkPassword())) {
        return { state: 'again' };
      }
      return { state: 'done', outcome: await this.reportFailure(outcome.kind, outcome) };
    }

    const link = finalizeLink(outcome.value);
    if (!link.ok) {
      return { state: 'done', outcome: link };
    }
    logNotice(`File URL: ${link.value.url}`);
    logNotice(`Filename: ${link.value.filename}`);

    if (this.options.printf !== undefined || this.options.exec !== undefined) {
      return { state: 'done', outcome: await this.handOff(link.value, session) };
    }
    return this.transfer(link.value, session);
  }

  private async transfer(
    link: ResolvedLink,
    session: Session,
  ): Promise<{ state: 'done'; outcome: Outcome<unknown> } | { state: 'again' }> {
    const { outputDirectory, tempDirectory, noOverwrite } = this.options;
    let finalPath = outputDirectory ? join(outputDirectory, link.filename) : link.filename;
    let tempPath = tempDirectory ? join(tempDirectory, link.filename) : finalPath;

    if (noOverwrite && (await fileExists(finalPath))) {
      const sameFile = finalPath === tempPath;
      finalPath = await alternateFilename(finalPath);
      if (sameFile) {
        tempPath = finalPath;
      }
    }

    const resumable = this.module.capabilities.resume && !noOverwrite;
    let result: TransferResult;
    try {
      result = await transferFile({
        url: link.url,
        destination: tempPath,
        resume: resumable,
        fetch: this.module.capabilities.finalLinkNeedsCookie ? session.fetch : this.runtime.http,
      });
    } catch (error) {
      const failure = failureFromError(error);
      return { state: 'done', outcome: await this.reportFailure(failure.kind, failure) };
    }

    if (result.state === 'partial') {
      if (this.module.capabilities.resume) {
        logNotice('Partial content downloaded, recall download function');
        return { state: 'again' };
      }
      return { state: 'done', outcome: await this.reportFailure('network', fail('network')) };
    }

    if (result.state === 'http-error') {
      const status = result.status;
      if (status === 503) {
        if (this.serviceUnavailableWaits > 0) {
          return { state: 'done', outcome: await this.reportFailure('network', fail('network')) };
        }
        this.serviceUnavailableWaits += 1;
        logError(`Unexpected HTTP code ${status}, retry after a safety wait`);
        const waited = await this.budget.consume(SERVICE_UNAVAILABLE_WAIT_SECONDS);
        if (!waited.ok) {
          return { state: 'done', outcome: await this.reportFailure(waited.kind, waited) };
        }
        return { state: 'again' };
      }

      if (status === 416 && this.module.capabilities.resume) {
        logError('Resume error (bad range), skip download');
      } else {
        if (this.transferRestarts >= MAX_TRANSFER_RESTARTS) {
          logError(`Unexpected HTTP code ${status}, giving up`);
          return { state: 'done', outcome: await this.reportFailure('network', fail('network')) };
        }
        this.transferRestarts += 1;
        if (status === 416) {
          logError('Resume error (bad range), restart download');
          await rm(tempPath, { force: true });
        } else {
          logError(`Unexpected HTTP code ${status}, restart download`);
        }
        return { state: 'again' };
      }
    }

    if (tempPath !== finalPath) {
      logNotice(`Moving file to output directory: ${outputDirectory ?? '.'}`);
      const moved = await moveFile(tempPath, finalPath);
      if (!moved.ok) {
        return { state: 'done', outcome: moved };
      }
    }

    writeResult(finalPath);
    await this.mark('OK', `|${finalPath}`);
    return { state: 'done', outcome: succeed({ path: finalPath }) };
  }

  private async handOff(link: ResolvedLink, session: Session): Promise<Outcome<unknown>> {
    logDebug("don't use regular transfer to download final link");
    const { printf, exec, outputDirectory } = this.options;
    const needsCookieFile = [printf, exec].some((format) => format !== undefined && /%[cC]/.test(format));
    const cookieFile = needsCookieFile ? await this.writeCookieCopy(session) : '';

    const values = {
      m: this.module.name,
      f: link.filename,
      F: outputDirectory ? join(outputDirectory, link.filename) : link.filename,
      u: this.url,
      d: link.url,
      c: cookieFile,
      C: this.module.capabilities.finalLinkNeedsCookie ? cookieFile : '',
    };

    if (printf !== undefined) {
      writeRaw(`${renderTemplate(printf, values)}\n`);
    }

    if (exec !== undefined) {
      const command = renderTemplate(exec, values);
      const run: ExecRunner = this.runtime.runCommand ?? runShellCommand;
      let code: number;
      try {
        code = await run(command);
      } catch (error) {
        return failureFromError(createSystemError('command could not be started', { command }, { cause: error }));
      }
      if (code !== 0) {
        logError(`Command exited with retcode: ${code}`);
        return fail('fatal');
      }
    }

    await this.mark('OK', `|${values.F}`);
    return succeedVoid();
  }

  private async reportFailure(kind: ErrorKind | 'ok', outcome: Outcome<unknown>): Promise<Outcome<unknown>> {
    if (kind === 'ok') {
      return outcome;
    }

    const where = `${this.module.name}.download`;
    if (kind === 'fatal' || kind === 'network' || kind === 'no-module' || kind === 'bad-command-line') {
      logError(`failed inside ${where}() [${exitCodeOf(kind)}]`);
    } else if (kind === 'login-failed' || ALIVE_KINDS.has(kind) || kind === 'link-dead') {
      logNotice(describeFailure(kind));
    } else {
      logNotice(`${describeFailure(kind)} (${where})`);
    }

    if (kind === 'link-dead') {
      await this.mark('NOTFOUND');
    } else if (kind === 'link-password-required') {
      await this.mark('PASSWORD');
    }
    return outcome;
  }

  /** One interactive retry with a password typed by the user. */
  private async askLinkPassword(): Promise<boolean> {
    const interactive = this.runtime.interactive ?? Boolean(process.stdin.isTTY);
    if (this.passwordAsked || !interactive) {
      return false;
    }
    this.passwordAsked = true;

    const ask = this.runtime.ask ?? askOnTerminal;
    const password = (await ask('Enter link password: ')).trim();
    if (password.length === 0) {
      return false;
    }
    this.linkPassword = password;
    return true;
  }

  private async mark(mark: 'OK' | 'NOTFOUND' | 'PASSWORD', tail = ''): Promise<void> {
    if (this.options.markDownloaded) {
      await markLink(this.entry, this.rawUrl, mark, tail);
    }
  }

  private async saveCookies(session: Session): Promise<void> {
    if (this.options.cookies !== undefined) {
      await session.saveTo(this.options.cookies);
    }
  }

  private async writeCookieCopy(session: Session): Promise<string> {
    const path = join(this.options.tempDirectory ?? tmpdir(), `hostkit.cookies.${process.pid}.txt`);
    await session.saveTo(path);
    return path;
  }
}

export interface ResolvedLink {
  url: string;
  filename: string;
}

/**
 * Checks what a module returned and settles the local filename: derived from
 * the URL when missing or equal to the URL, cleaned and length-limited.
 */
export function finalizeLink(link: DownloadLink): Outcome<ResolvedLink> {
  if (!link.url) {
    logError('Output URL expected');
    return fail('fatal');
  }

  let filename = link.filename;
  if (filename === link.url) {
    logError('Output filename is wrong, check module download function');
    filename = undefined;
  }

  if (!filename) {
    filename = filenameFromUrl(link.url);
    if (!filename) {
      logError('Output filename not specified, module download function must be wrong');
      filename = `dummy-${process.pid}`;
    }
  }

  const cleaned = truncateFilename(sanitizeFilename(filename));
  if (cleaned.length < filename.length) {
    logDebug('filename is too long, truncating it');
  }
  return succeed({ url: link.url, filename: cleaned });
}

async function prepareDirectory(path: string | undefined, label: string): Promise<void> {
  if (path === undefined) {
    return;
  }
  logNotice(`${label}: ${path}`);
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw createSystemError('error: no write permission', { path }, { cause: error });
  }
}

async function moveFile(from: string, to: string): Promise<Outcome<void>> {
  try {
    await rename(from, to);
    return succeedVoid();
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) {
      return failureFromError(createSystemError("can't move file", { from, to }, { cause: error }));
    }
  }

  try {
    await copyFile(from, to);
    await unlink(from);
    return succeedVoid();
  } catch (error) {
    return failureFromError(createSystemError("can't move file", { from, to }, { cause: error }));
  }
}

export function runShellCommand(command: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: 'inherit' });
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? 1));
  });
}
