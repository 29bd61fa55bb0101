import { createConfigurationError } from '../errors.js';
import type { FetchLike } from '../network/http.js';
import { logDebug } from '../util/output.js';
import { supports, type Capability, type SiteModule } from './contract.js';

export const REMOTE_URL = /^https?:\/\//i;

export function isRemoteUrl(value: string): boolean {
  return REMOTE_URL.test(value);
}

/** Maps URLs to site modules; the first registered match wins. */
export class ModuleRegistry {
  private readonly modules = new Map<string, SiteModule>();

  constructor(modules: Iterable<SiteModule> = []) {
    for (const module of modules) {
      this.register(module);
    }
  }

  register(module: SiteModule): void {
    if (this.modules.has(module.name)) {
      throw createConfigurationError(`module "${module.name}" is already registered`, {
        module: module.name,
      });
    }
    this.modules.set(module.name, module);
  }

  get(name: string): SiteModule | undefined {
    return this.modules.get(name);
  }

  list(capability?: Capability): SiteModule[] {
    const all = [...this.modules.values()];
    return capability ? all.filter((module) => supports(module, capability)) : all;
  }

  find(url: string, capability: Capability): SiteModule | undefined {
    return this.list(capability).find((module) => matches(module, url));
  }
}

export interface ResolvedModule {
  module: SiteModule;
  /** The redirect target when the module was found after following one hop. */
  url: string;
}

/**
 * Looks the URL up and, when nothing matches a remote URL, follows a single
 * HTTP redirect and looks the target up.
 */
export async function resolveModule(
  registry: ModuleRegistry,
  url: string,
  capability: Capability,
  options: { http: FetchLike; followRedirect: boolean },
): Promise<ResolvedModule | undefined> {
  const direct = registry.find(url, capability);
  if (direct) {
    return { module: direct, url };
  }
  if (!options.followRedirect || !isRemoteUrl(url)) {
    return undefined;
  }

  logDebug('No module found, try simple redirection');
  let target: string | undefined;
  try {
    target = await redirectTarget(options.http, url);
  } catch (error) {
    logDebug(`redirection probe failed: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
  if (!target) {
    return undefined;
  }

  const redirected = registry.find(target, capability);
  return redirected ? { module: redirected, url: target } : undefined;
}

/** `Location` of a 3xx answer, resolved against the request URL. */
export async function redirectTarget(http: FetchLike, url: string): Promise<string | undefined> {
  // Some proxies fake the user agent, so none is sent here.
  const response = await http(url, { redirect: 'manual', headers: { 'user-agent': '' } });
  await response.body?.cancel();

  const location = response.headers.get('location');
  if (response.status < 300 || response.status >= 400 || !location) {
    return undefined;
  }
  return new URL(location, url).toString();
}

function matches(module: SiteModule, url: string): boolean {
  module.urlPattern.lastIndex = 0;
  return module.urlPattern.test(url);
}
