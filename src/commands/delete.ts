import { exitCodeOf } from '../errors.js';
import { BatchResult, runSequentially } from '../engine/batch.js';
import { fail, succeedVoid, type Outcome } from '../engine/outcome.js';
import { isRemoteUrl } from '../modules/registry.js';
import type { DeleteOptions, Runtime } from '../types.js';
import { logDebug, logError, logNotice, writeResult } from '../util/output.js';
import { buildModuleContext, callModule, openSession } from './context.js';

/** Deletes every link with the module that matches it. */
export async function runDelete(
  urls: readonly string[],
  options: DeleteOptions,
  runtime: Runtime,
): Promise<BatchResult> {
  const batch = new BatchResult();
  await runSequentially(
    urls.map((url) => () => batch.settle(url, url, () => deleteUrl(url, options, runtime))),
  );

  if (batch.results.length > 1) {
    logDebug(`retvals: ${batch.codes.join(' ')}`);
  }
  return batch;
}

async function deleteUrl(url: string, options: DeleteOptions, runtime: Runtime): Promise<Outcome<void>> {
  if (!isRemoteUrl(url)) {
    logError(`Skip: not an URL (${url})`);
    return fail('no-module');
  }

  const module = runtime.registry.find(url, 'delete');
  const remove = module?.delete;
  if (!module || !remove) {
    logError(`Skip: no module for URL (${url})`);
    return fail('no-module');
  }

  if (options.getModule) {
    writeResult(module.name);
    return succeedVoid();
  }

  logNotice(`Starting delete (${module.name}): ${url}`);
  const session = await openSession(runtime);
  const ctx = buildModuleContext({ module, session, options }, runtime);
  const outcome = await callModule(() => remove.call(module, ctx, url));

  if (outcome.ok) {
    logNotice('File removed successfully');
    return outcome;
  }

  switch (outcome.kind) {
    case 'link-need-permissions':
      logError('Anonymous users cannot delete links');
      break;
    case 'link-dead':
      logError('Not found or already deleted');
      break;
    case 'login-failed':
      logError('Login process failed. Bad username/password or unexpected content');
      break;
    default:
      logError(`Failed inside ${module.name}.delete() [${exitCodeOf(outcome.kind)}]`);
  }
  return outcome;
}
