import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { createConfigurationError } from '../errors.js';
import { isSiteModule, type SiteModule } from './contract.js';

/**
 * Imports an external module file. The file exports a module as `default`, or
 * several under `modules`.
 */
export async function loadModuleFile(path: string): Promise<SiteModule[]> {
  let exported: unknown;
  try {
    exported = await import(pathToFileURL(resolve(path)).href);
  } catch (error) {
    throw createConfigurationError(`can't load module file: ${path}`, { path }, { cause: error });
  }

  const candidates = collectCandidates(exported);
  const modules = candidates.filter(isSiteModule);
  if (modules.length === 0 || modules.length !== candidates.length) {
    throw createConfigurationError(`module file does not export valid site modules: ${path}`, {
      path,
      exported: candidates.length,
      valid: modules.length,
    });
  }
  return modules;
}

function collectCandidates(exported: unknown): unknown[] {
  if (typeof exported !== 'object' || exported === null) {
    return [];
  }

  const list = Reflect.get(exported, 'modules');
  if (Array.isArray(list)) {
    return list;
  }

  const single = Reflect.get(exported, 'default');
  return single === undefined ? [] : [single];
}
