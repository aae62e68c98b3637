import type { Readable, Writable } from 'node:stream';

export type TargetRole = 'listing' | 'file';

export type DigestAlgorithm = 'sha256' | 'sha1' | 'sha512' | 'md5';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type CrawlTarget = {
  url: string; // absolute URL to request
  key: string; // canonical URL, the dedup key
  role: TargetRole;
  depth: number; // 0 for the root
};

export type CrawlScope = {
  origin: string;
  prefix: string; // every crawled pathname sits under this, ends with '/'
  base: string; // manifest paths are relative to this, ends with '/'
};

export type FailureKind = 'network' | 'http-status' | 'parse' | 'digest' | 'cancelled';

export type CrawlFailure = {
  kind: FailureKind;
  message: string;
  status?: number;
};

export type FetchResult =
  | { kind: 'links'; url: string; targets: CrawlTarget[] }
  | { kind: 'content'; url: string; contentType: string | null; body: Readable }
  | { kind: 'failure'; url: string; error: CrawlFailure };

export type FetchContext = {
  scope: CrawlScope;
  signal?: AbortSignal;
};

export interface Fetcher {
  fetch(target: CrawlTarget, context: FetchContext): Promise<FetchResult>;
}

export interface ContentSink {
  open(relPath: string): Promise<Writable>;
}

export type FileRecord =
  | { status: 'ok'; path: string; url: string; digest: string; size: number }
  | { status: 'error'; path: string; url: string; role: TargetRole; error: string; errorKind: FailureKind };

export type ManifestSummary = {
  total: number;
  succeeded: number;
  failed: number;
  bytes: number; // sum of digested sizes
};

export type Manifest = {
  algorithm: DigestAlgorithm;
  entries: FileRecord[]; // sorted by path
  failures: FileRecord[];
  summary: ManifestSummary;
};

export type CrawlProgress = {
  visited: number;
  inFlight: number;
  completed: number;
  failed: number;
  currentUrl?: string;
};

export type UrlRewrite = {
  find: string | RegExp;
  replace: string;
};

export type CrawlConfig = {
  rootUrl: string;
  concurrency?: number; // parallel fetch slots
  maxDepth?: number; // links more levels below the root are not followed
  maxPages?: number; // hard cap on listing pages fetched
  algorithm?: DigestAlgorithm;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  delayMs?: number; // optional delay before each request
  userAgent?: string;
  linkSelector?: string;
  dirSelector?: string; // anchors that always lead to a sub-listing
  fileUrlRewrites?: UrlRewrite[];
  signal?: AbortSignal;
  onProgress?: (progress: CrawlProgress) => void;
  onLog?: (level: LogLevel, message: string, url?: string) => void;
};

export type CrawlReport = {
  rootUrl: string;
  manifest: Manifest;
  visitedCount: number;
  listingsExpanded: number;
  listingsSkipped: number;
  cancelled: boolean;
  durationMs: number;
};
