import type { CrawlScope, TargetRole } from './types.js';

export function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
  if (base === '.' || base === '..') return '-';
  return base || 'file';
}

export function safeUrl(input: string, base?: string | URL): URL | null {
  try {
    return new URL(input, base);
  } catch {
    return null;
  }
}

export function isHttpUrl(u: URL): boolean {
  return u.protocol === 'http:' || u.protocol === 'https:';
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): URL | null {
  if (!href) return null;
  const u = safeUrl(href.trim(), baseUrl);
  if (!u) return null;
  u.hash = '';
  return u;
}

// Dedup key: no fragment, no trailing slash (except the bare origin), query kept
export function canonicalUrl(input: string | URL): string {
  const u = new URL(input.toString());
  const pathname = u.pathname.length > 1 ? u.pathname.replace(/\/+$/, '') || '/' : u.pathname;
  return `${u.origin}${pathname}${u.search}`;
}

function withTrailingSlash(pathname: string): string {
  return pathname.endsWith('/') ? pathname : `${pathname}/`;
}

function parentDir(dir: string): string {
  if (dir === '/') return '/';
  const trimmed = dir.slice(0, -1);
  return trimmed.slice(0, trimmed.lastIndexOf('/') + 1) || '/';
}

export function hasFileExtension(pathname: string): boolean {
  const last = pathname.split('/').pop() ?? '';
  return /\.[A-Za-z0-9]{1,10}$/.test(last);
}

/**
 * A root ending in '/' is a listing, one whose last segment carries an
 * extension is a file; anything else is fetched as a listing and its
 * content type decides.
 */
export function classifyRoot(root: URL): TargetRole {
  if (root.pathname.endsWith('/')) return 'listing';
  return hasFileExtension(root.pathname) ? 'file' : 'listing';
}

export function createScope(root: URL, role: TargetRole): CrawlScope {
  if (role === 'file') {
    const dir = root.pathname.slice(0, root.pathname.lastIndexOf('/') + 1) || '/';
    return { origin: root.origin, prefix: dir, base: dir };
  }
  const dir = withTrailingSlash(root.pathname);
  return { origin: root.origin, prefix: dir, base: parentDir(dir) };
}

export function isWithinScope(u: URL, scope: CrawlScope): boolean {
  if (u.origin !== scope.origin) return false;
  return u.pathname.startsWith(scope.prefix) || u.pathname === scope.prefix.slice(0, -1);
}

export function isAncestorOrSelf(link: URL, page: URL): boolean {
  if (link.origin !== page.origin) return false;
  return withTrailingSlash(page.pathname).startsWith(withTrailingSlash(link.pathname));
}

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

/**
 * Manifest path of a URL: its pathname relative to the scope base, decoded.
 * Listings keep a trailing '/'.
 */
export function manifestPath(input: string | URL, scope: CrawlScope, role: TargetRole): string {
  const u = new URL(input.toString());
  const pathname = u.pathname.startsWith(scope.base) ? u.pathname.slice(scope.base.length) : u.pathname.replace(/^\/+/, '');
  const rel = decodePath(pathname);
  if (role === 'listing') return rel.endsWith('/') ? rel || '/' : `${rel}/`;
  return rel.replace(/\/+$/, '');
}
