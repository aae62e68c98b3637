import { ParseError, getErrorMessage, toFailure } from './errors.js';
import { HttpClient, readBody, type HttpResponse } from './http.js';
import { parseListing, type ListingLink } from './listing.js';
import { log } from './logger.js';
import type { CrawlTarget, FetchContext, FetchResult, Fetcher, UrlRewrite } from './types.js';

export type HttpFetcherOptions = {
  linkSelector?: string;
  dirSelector?: string;
  fileUrlRewrites?: UrlRewrite[];
};

type Page = { kind: 'content'; res: HttpResponse } | { kind: 'html'; url: string; html: string };

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime === 'text/html' || mime === 'application/xhtml+xml';
}

export function rewriteUrl(url: string, rewrites: UrlRewrite[] = []): string {
  return rewrites.reduce((acc, { find, replace }) => acc.replace(find, replace), url);
}

/**
 * Fetcher over HTTP. File targets always come back as content; listing
 * targets are expanded when the server answers with HTML and handed back as
 * content otherwise. Never throws: failures are returned as data.
 */
export class HttpFetcher implements Fetcher {
  private http: HttpClient;
  private opts: HttpFetcherOptions;

  constructor(http: HttpClient, opts: HttpFetcherOptions = {}) {
    this.http = http;
    this.opts = opts;
  }

  async fetch(target: CrawlTarget, ctx: FetchContext): Promise<FetchResult> {
    const requestUrl = target.role === 'file' ? rewriteUrl(target.url, this.opts.fileUrlRewrites) : target.url;

    let page: Page;
    try {
      page = await this.http.request(requestUrl, { signal: ctx.signal }, async (res): Promise<Page> => {
        if (target.role === 'file' || !isHtmlContentType(res.contentType)) return { kind: 'content', res };
        return { kind: 'html', url: res.url, html: (await readBody(res.body)).toString('utf-8') };
      });
    } catch (err) {
      return { kind: 'failure', url: target.url, error: toFailure(err) };
    }

    if (page.kind === 'content') {
      return { kind: 'content', url: target.url, contentType: page.res.contentType, body: page.res.body };
    }

    let links: ListingLink[];
    try {
      links = parseListing(page.html, page.url, ctx.scope, {
        linkSelector: this.opts.linkSelector,
        dirSelector: this.opts.dirSelector
      });
    } catch (err) {
      const message = err instanceof ParseError ? err.message : `Could not parse listing ${target.url}: ${getErrorMessage(err)}`;
      log.warn(`${message}; treating as empty listing`, target.url);
      links = [];
    }

    return {
      kind: 'links',
      url: target.url,
      targets: links.map((link) => ({ url: link.url, key: link.key, role: link.role, depth: target.depth + 1 }))
    };
  }
}
