import { exitCodeOf, type ErrorKind } from '../errors.js';
import { BatchResult, runSequentially } from '../engine/batch.js';
import { fail, succeed, type Outcome } from '../engine/outcome.js';
import { expandItem, type ExpandedItem } from '../items/expandItems.js';
import type { ProbeField, ProbeResult } from '../modules/contract.js';
import { isRemoteUrl, resolveModule } from '../modules/registry.js';
import type { ProbeOptions, Runtime } from '../types.js';
import { logDebug, logError, logNotice, writeRaw, writeResult } from '../util/output.js';
import {
  DEFAULT_LISTING_FORMAT,
  PROBE_SEQUENCES,
  renderListingLine,
  validateTemplate,
} from '../util/template.js';
import { buildModuleContext, callModule, openSession } from './context.js';

const ALIVE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'link-temp-unavailable',
  'link-need-permissions',
  'link-password-required',
]);

/** Fields a format needs from the module; `%F` implies the filename. */
export function requestedFields(format: string): ProbeField[] {
  const fields = new Set<ProbeField>();
  for (const match of format.matchAll(/%(.)/g)) {
    const sequence = match[1];
    if (sequence === 'c' || sequence === 'f' || sequence === 'h' || sequence === 's') {
      fields.add(sequence);
    } else if (sequence === 'F') {
      fields.add('f');
    }
  }
  return [...fields];
}

/** Checks every link and prints one formatted entry per live link. */
export async function runProbe(
  items: readonly string[],
  options: ProbeOptions,
  runtime: Runtime,
): Promise<BatchResult> {
  const format = options.printf ?? DEFAULT_LISTING_FORMAT;
  validateTemplate(format, PROBE_SEQUENCES);
  const fields = requestedFields(format);

  const batch = new BatchResult();
  const expanded = await runSequentially(items.map((item) => () => expandItem(item)));
  const tasks = expanded
    .filter((entry): entry is ExpandedItem => entry !== undefined)
    .flatMap((entry) =>
      entry.urls.map(
        (url) => () => batch.settle(entry.item, url, () => probeUrl(url, format, fields, options, runtime)),
      ),
    );
  await runSequentially(tasks);

  if (batch.results.length > 1) {
    logDebug(`retvals: ${batch.codes.join(' ')}`);
  }
  return batch;
}

async function probeUrl(
  url: string,
  format: string,
  fields: ProbeField[],
  options: ProbeOptions,
  runtime: Runtime,
): Promise<Outcome<ProbeResult | undefined>> {
  if (!isRemoteUrl(url)) {
    logDebug(`Skip: '${url}' doesn't seem to be a link`);
    return fail('no-module');
  }

  const resolved = await resolveModule(runtime.registry, url, 'probe', {
    http: runtime.http,
    followRedirect: options.follow,
  });
  if (!resolved) {
    logError(`Skip: no module for URL (${url})`);
    const lister = runtime.registry.find(url, 'list');
    if (lister) {
      logNotice(`Note: This URL (${lister.name}) is supported by list`);
    }
    return fail('no-module');
  }

  const { module } = resolved;
  if (options.getModule) {
    writeResult(module.name);
    return succeed(undefined);
  }

  const probe = module.probe;
  if (!probe) {
    return fail('no-module');
  }

  logDebug(`Starting probing (${module.name}): ${resolved.url}`);
  const session = await openSession(runtime);
  const ctx = buildModuleContext({ module, session, options, checkLinkOnly: true }, runtime);
  const outcome = await callModule(() => probe.call(module, ctx, resolved.url, fields));

  if (outcome.ok || ALIVE_KINDS.has(outcome.kind)) {
    logDebug(`Link active: ${resolved.url}`);
    const data: ProbeResult = outcome.ok ? outcome.value : {};
    writeRaw(
      renderListingLine(format, {
        c: String(outcome.ok ? 0 : exitCodeOf(outcome.kind)),
        f: data.filename ?? '',
        h: data.hash ?? '',
        m: module.name,
        s: data.size === undefined ? '' : String(data.size),
        u: resolved.url,
      }),
    );
    return outcome;
  }

  if (outcome.kind === 'link-dead') {
    logNotice(`Link is not alive: ${resolved.url}`);
  } else {
    logError(`Skip: \`${resolved.url}': failed inside ${module.name}.probe() [${exitCodeOf(outcome.kind)}]`);
  }
  return outcome;
}
