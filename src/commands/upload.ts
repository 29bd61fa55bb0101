import { stat } from 'node:fs/promises';
import { basename } from 'node:path';

import { CaptchaEngine } from '../captcha/engine.js';
import { createConfigurationError, exitCodeOf } from '../errors.js';
import { BatchResult, runSequentially } from '../engine/batch.js';
import { fail, type Outcome } from '../engine/outcome.js';
import { RetryContext, runRetryLadder } from '../engine/retryLadder.js';
import { WaitBudget } from '../engine/waitBudget.js';
import type { SiteModule, UploadResult } from '../modules/contract.js';
import type { Runtime, UploadOptions } from '../types.js';
import { logDebug, logError, logNotice, writeResult } from '../util/output.js';
import { buildModuleContext, callModule, openSession } from './context.js';

/** Uploads every file to the named module and prints the links it returns. */
export async function runUpload(
  moduleName: string,
  files: readonly string[],
  options: UploadOptions,
  runtime: Runtime,
): Promise<BatchResult> {
  const module = runtime.registry.get(moduleName);
  if (!module?.upload) {
    throw createConfigurationError(`unsupported module (${moduleName})`, { module: moduleName });
  }
  if (options.name !== undefined && files.length > 1) {
    throw createConfigurationError('--name can only be used with a single file', { files: files.length });
  }

  const engine = new CaptchaEngine({
    config: options.captcha,
    http: runtime.http,
    ask: runtime.ask,
    runProgram: runtime.runProgram,
    remoteProviders: runtime.remoteProviders,
  });

  const batch = new BatchResult();
  await runSequentially(
    files.map((path) => () => batch.settle(path, path, () => uploadFile(module, path, options, runtime, engine))),
  );

  if (batch.results.length > 1) {
    logDebug(`retvals: ${batch.codes.join(' ')}`);
  }
  return batch;
}

async function uploadFile(
  module: SiteModule,
  path: string,
  options: UploadOptions,
  runtime: Runtime,
  engine: CaptchaEngine,
): Promise<Outcome<UploadResult>> {
  const upload = module.upload;
  if (!upload) {
    return fail('no-module');
  }

  const isFile = await stat(path).then(
    (info) => info.isFile(),
    () => false,
  );
  if (!isFile) {
    logError(`Skip: file not found (${path})`);
    return fail('system');
  }

  const source = { path, name: options.name ?? basename(path), description: options.description };
  logNotice(`Starting upload (${module.name}): ${path}`);
  logNotice(`Destination file: ${source.name}`);

  const budget = new WaitBudget(options.timeout, runtime.sleep);
  const retry = new RetryContext(budget, options.maxRetries);
  const session = await openSession(runtime);
  const ctx = buildModuleContext(
    {
      module,
      session,
      options,
      budget,
      captcha: engine.bind({ moduleName: module.name, wait: budget.consume, http: session.fetch }),
    },
    runtime,
  );

  const outcome = await runRetryLadder(() => callModule(() => upload.call(module, ctx, source)), retry, {
    noExtraWait: false,
    captchaDisabled: engine.method === 'none',
    label: `upload (${module.name})`,
  });

  if (outcome.ok) {
    const { downloadUrl, deleteUrl, adminUrl } = outcome.value;
    writeResult(downloadUrl);
    if (deleteUrl) {
      writeResult(`#DEL ${deleteUrl}`);
    }
    if (adminUrl) {
      writeResult(`#ADM ${adminUrl}`);
    }
    return outcome;
  }

  if (outcome.kind === 'size-limit-exceeded') {
    logError('Insufficient space in account or file is too big');
  } else if (outcome.kind === 'login-failed') {
    logError('Login process failed. Bad username/password or unexpected content');
  } else {
    logError(`Failed inside ${module.name}.upload() [${exitCodeOf(outcome.kind)}]`);
  }
  return outcome;
}
