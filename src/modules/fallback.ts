import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createHosterError } from '../errors.js';
import { failureFromError, succeed, type Outcome } from '../engine/outcome.js';
import { readText } from '../network/http.js';
import { DEFAULT_CAPABILITIES, type ListEntry, type ModuleContext, type SiteModule } from './contract.js';
import { REMOTE_URL } from './registry.js';

/**
 * Used with `--fallback` when no module matches: downloads are a plain GET of
 * the URL itself, lists are the absolute links found in the page.
 */
export const fallbackModule: SiteModule = {
  name: 'fallback',
  urlPattern: REMOTE_URL,
  capabilities: DEFAULT_CAPABILITIES,

  async download(_ctx, url) {
    return succeed({ url });
  },

  async list(ctx: ModuleContext, url: string): Promise<Outcome<ListEntry[]>> {
    try {
      const response = await ctx.fetch(url);
      if (!response.ok) {
        throw createHosterError('link-dead', `page answered HTTP ${response.status}`, { url });
      }
      const html = await readText(response, url);
      return succeed(parsePageLinks(html).map((link) => ({ url: link })));
    } catch (error) {
      return failureFromError(error);
    }
  },
};

/** Absolute http(s) `href` and `src` targets, in document order, without duplicates. */
export function parsePageLinks(html: string): string[] {
  const $ = load(html);
  const links = new Set<string>();

  $('[href], [src]').each((_idx: number, element: CheerioElement) => {
    for (const attribute of ['href', 'src']) {
      const value = $(element).attr(attribute)?.trim();
      if (value && REMOTE_URL.test(value)) {
        links.add(value);
      }
    }
  });

  return [...links];
}
