import * as cheerio from 'cheerio';
import { ParseError, getErrorMessage } from './errors.js';
import type { CrawlScope, TargetRole } from './types.js';
import { canonicalUrl, ensureAbsoluteUrl, isAncestorOrSelf, isHttpUrl, isWithinScope } from './utils.js';

export const DEFAULT_LINK_SELECTOR = 'a[href]';

export type ListingLink = {
  url: string;
  key: string;
  role: TargetRole;
};

export type ListingOptions = {
  /** Anchors to consider, e.g. `tbody a` when the file table sits in a tbody. */
  linkSelector?: string;
  /**
   * Anchors that always lead to a sub-listing, for browsers whose folder links
   * carry no trailing slash (Gitea: `.octicon-file-directory-fill + a`).
   */
  dirSelector?: string;
};

/**
 * Extract the links of a listing page in document order, resolved against
 * `pageUrl` and confined to `scope`. A link without a trailing slash that is
 * neither the page nor one of its ancestors, nor matched by `dirSelector`, is
 * a file; everything else is a listing candidate.
 */
export function parseListing(html: string, pageUrl: string, scope: CrawlScope, opts: ListingOptions = {}): ListingLink[] {
  if (!html.trim()) return [];

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (err) {
    throw new ParseError(`Could not parse listing ${pageUrl}: ${getErrorMessage(err)}`, { cause: err });
  }

  const page = new URL(pageUrl);
  const seen = new Set<string>();
  const dirs = new Set(opts.dirSelector ? $(opts.dirSelector).toArray() : []);
  const links: ListingLink[] = [];

  $(opts.linkSelector ?? DEFAULT_LINK_SELECTOR).each((_, a) => {
    const href = $(a).attr('href');
    if (!href || href.startsWith('#')) return;
    const u = ensureAbsoluteUrl(page.toString(), href);
    if (!u || !isHttpUrl(u)) return;
    if (!isWithinScope(u, scope)) return;

    const key = canonicalUrl(u);
    if (seen.has(key)) return;
    seen.add(key);

    const role: TargetRole = dirs.has(a) || u.pathname.endsWith('/') || isAncestorOrSelf(u, page) ? 'listing' : 'file';
    links.push({ url: u.toString(), key, role });
  });

  return links;
}
