import { readFile, writeFile } from 'node:fs/promises';

import { logError, logNotice, writeResult } from '../util/output.js';
import type { ExpandedItem } from './expandItems.js';

export type LinkMark = 'OK' | 'NOTFOUND' | 'PASSWORD' | 'NOMODULE';

/**
 * Comments out a processed link in its links file (`#OK url|path`), or prints
 * the marker for a URL given on the command line.
 */
export async function markLink(
  item: Pick<ExpandedItem, 'item' | 'source'>,
  url: string,
  mark: LinkMark,
  tail = '',
): Promise<void> {
  if (item.source === 'url') {
    writeResult(`#${mark} ${url}`);
    return;
  }

  let text: string;
  try {
    text = await readFile(item.item, 'utf8');
  } catch (error) {
    logNotice(`error: can't mark link, no read permission (${item.item})`);
    logError(error instanceof Error ? error.message : String(error));
    return;
  }

  const updated = markInText(text, url, mark, tail);
  try {
    await writeFile(item.item, updated, 'utf8');
    logNotice(`link marked in file: ${item.item} (#${mark})`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logError(`failed marking link in file: ${item.item} (#${mark}): ${reason}`);
  }
}

/** Rewrites every line that holds exactly `url` (surrounding blanks allowed). */
export function markInText(text: string, url: string, mark: LinkMark, tail = ''): string {
  return text
    .split('\n')
    .map((line) => {
      const content = line.replace(/\r$/, '');
      if (content.trim() !== url) {
        return line;
      }
      const carriage = line.endsWith('\r') ? '\r' : '';
      return `#${mark} ${url}${tail}${carriage}`;
    })
    .join('\n');
}
