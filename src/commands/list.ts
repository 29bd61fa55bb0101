import { exitCodeOf } from '../errors.js';
import { BatchResult, runSequentially } from '../engine/batch.js';
import { fail, succeed, type Outcome } from '../engine/outcome.js';
import type { ListEntry, SiteModule } from '../modules/contract.js';
import { fallbackModule } from '../modules/fallback.js';
import { isRemoteUrl } from '../modules/registry.js';
import type { ListOptions, Runtime } from '../types.js';
import { logDebug, logError, logNotice, writeRaw, writeResult } from '../util/output.js';
import {
  DEFAULT_LISTING_FORMAT,
  LIST_SEQUENCES,
  renderListingLine,
  validateTemplate,
} from '../util/template.js';
import { buildModuleContext, callModule, openSession } from './context.js';

/** Prints the links of every folder URL, one formatted entry per link. */
export async function runList(
  urls: readonly string[],
  options: ListOptions,
  runtime: Runtime,
): Promise<BatchResult> {
  const format = options.printf ?? DEFAULT_LISTING_FORMAT;
  validateTemplate(format, LIST_SEQUENCES);
  if (options.recursive) {
    logDebug('--recursive selected');
  }

  const batch = new BatchResult();
  await runSequentially(
    urls.map((url) => () => batch.settle(url, url, () => listUrl(url, format, options, runtime))),
  );

  if (batch.results.length > 1) {
    logDebug(`retvals: ${batch.codes.join(' ')}`);
  }
  return batch;
}

async function listUrl(
  url: string,
  format: string,
  options: ListOptions,
  runtime: Runtime,
): Promise<Outcome<ListEntry[] | undefined>> {
  if (!isRemoteUrl(url)) {
    logError(`Skip: not an URL (${url})`);
    return fail('no-module');
  }

  let module: SiteModule | undefined = runtime.registry.find(url, 'list');
  if (!module && options.fallback) {
    logNotice('No module found, list URLs in page as requested');
    module = fallbackModule;
  }
  if (!module) {
    logError(`Skip: no module for URL (${url})`);
    return fail('no-module');
  }

  if (options.getModule) {
    writeResult(module.name);
    return succeed(undefined);
  }

  const list = module.list;
  if (!list) {
    return fail('no-module');
  }

  logNotice(`Retrieving list (${module.name}): ${url}`);
  const session = await openSession(runtime);
  const ctx = buildModuleContext({ module, session, options }, runtime);
  const owner = module;
  let outcome = await callModule(() => list.call(owner, ctx, url, options.recursive));
  if (outcome.ok && outcome.value.length === 0) {
    outcome = fail('link-dead');
  }

  if (outcome.ok) {
    for (const entry of outcome.value) {
      writeRaw(renderListingLine(format, { f: entry.name ?? '', m: owner.name, u: entry.url }));
    }
    return outcome;
  }

  switch (outcome.kind) {
    case 'link-dead':
      logError('Non existing or empty folder');
      if (!options.recursive && owner !== fallbackModule) {
        logNotice('Try adding -R/--recursive option to look into sub folders');
      }
      break;
    case 'link-password-required':
      logError('You must provide a valid password');
      break;
    case 'link-temp-unavailable':
      logError('Links are temporarily unavailable. Maybe uploads are still being processed');
      break;
    default:
      logError(`Failed inside ${owner.name}.list() [${exitCodeOf(outcome.kind)}]`);
  }
  return outcome;
}
