import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { isRemoteUrl } from '../modules/registry.js';
import { logError } from '../util/output.js';

export type ItemSource = 'url' | 'file';

export interface ExpandedItem {
  /** The command-line argument. */
  item: string;
  source: ItemSource;
  urls: string[];
}

const BINARY_EXTENSIONS = new Set(['zip', 'rar', 'tar', 'gz', '7z', 'bz2', 'mp3', 'avi']);

/**
 * An argument is either a URL or a text file of links; blank lines and `#`
 * comments are ignored. Unusable arguments are reported and expand to nothing.
 */
export async function expandItem(item: string): Promise<ExpandedItem | undefined> {
  if (isRemoteUrl(item)) {
    return { item, source: 'url', urls: [item.trim()] };
  }

  const extension = extname(item).slice(1).toLowerCase();
  if (BINARY_EXTENSIONS.has(extension)) {
    logError(`Skip: '${item}' seems to be a binary file, not a list of links`);
    return undefined;
  }

  let text: string;
  try {
    text = await readFile(item, 'utf8');
  } catch {
    logError(`Skip: cannot stat '${item}': No such file or directory`);
    return undefined;
  }

  return { item, source: 'file', urls: parseLinkList(text) };
}

export function parseLinkList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
