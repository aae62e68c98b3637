import pLimit from 'p-limit';
import type { Readable } from 'node:stream';
import { digestStream } from './digest.js';
import { CrawlError, DigestError, EmptyCrawlError, InvalidRootUrlError, getErrorMessage, toFailure } from './errors.js';
import { HttpFetcher } from './fetcher.js';
import { HttpClient, isTransientError, transportCause, withRetry } from './http.js';
import { log, runWithLogCallback } from './logger.js';
import { CrawlState } from './state.js';
import type {
  ContentSink,
  CrawlConfig,
  CrawlFailure,
  CrawlReport,
  CrawlScope,
  CrawlTarget,
  DigestAlgorithm,
  FetchResult,
  Fetcher
} from './types.js';
import { canonicalUrl, classifyRoot, createScope, isHttpUrl, manifestPath, safeUrl } from './utils.js';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_USER_AGENT = 'listing-digest/0.1';

type ResolvedConfig = {
  rootUrl: string;
  concurrency: number;
  maxDepth: number;
  maxPages: number;
  algorithm: DigestAlgorithm;
  retries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  onProgress?: CrawlConfig['onProgress'];
  onLog?: CrawlConfig['onLog'];
};

export type CrawlerDeps = {
  fetcher?: Fetcher;
  sink?: ContentSink; // receives each file's bytes while they are digested
};

type DigestOutcome = { ok: true; digest: string; size: number } | { ok: false; failure: CrawlFailure };

const CANCELLED: CrawlFailure = { kind: 'cancelled', message: 'cancelled' };

export class Crawler {
  private cfg: ResolvedConfig;
  private fetcher: Fetcher;
  private sink?: ContentSink;

  constructor(cfg: CrawlConfig, deps: CrawlerDeps = {}) {
    this.cfg = {
      rootUrl: cfg.rootUrl,
      concurrency: Math.max(1, Math.floor(cfg.concurrency ?? DEFAULT_CONCURRENCY)),
      maxDepth: cfg.maxDepth ?? Infinity,
      maxPages: cfg.maxPages ?? Infinity,
      algorithm: cfg.algorithm ?? 'sha256',
      retries: Math.max(0, cfg.retries ?? 2),
      retryDelayMs: Math.max(0, cfg.retryDelayMs ?? 1000),
      signal: cfg.signal,
      onProgress: cfg.onProgress,
      onLog: cfg.onLog
    };

    this.fetcher =
      deps.fetcher ??
      new HttpFetcher(
        new HttpClient({
          userAgent: cfg.userAgent ?? DEFAULT_USER_AGENT,
          timeoutMs: cfg.timeoutMs,
          delayMs: cfg.delayMs,
          retries: cfg.retries,
          retryDelayMs: cfg.retryDelayMs
        }),
        { linkSelector: cfg.linkSelector, dirSelector: cfg.dirSelector, fileUrlRewrites: cfg.fileUrlRewrites }
      );
    this.sink = deps.sink;
  }

  /**
   * Walk every listing reachable from the root and digest every file found.
   * Per-target failures end up in the manifest; only an invalid root or a
   * crawl without a single digested file is thrown.
   */
  async crawl(): Promise<CrawlReport> {
    const root = safeUrl(this.cfg.rootUrl);
    if (!root || !isHttpUrl(root)) throw new InvalidRootUrlError(this.cfg.rootUrl);
    root.hash = '';
    return runWithLogCallback(this.cfg.onLog ?? null, () => this.run(root));
  }

  private async run(root: URL): Promise<CrawlReport> {
    const startedAt = Date.now();
    const role = classifyRoot(root);
    const scope = createScope(root, role);
    const state = new CrawlState(this.cfg.algorithm);
    const limit = pLimit(this.cfg.concurrency);

    log.info(`[crawl] root: ${root.toString()} (${role}), concurrency: ${this.cfg.concurrency}`);

    // claim() runs synchronously before a target enters the pool queue, so
    // each canonical URL is dispatched at most once
    const schedule = (target: CrawlTarget): Promise<void> => {
      if (!state.claim(target.key)) return Promise.resolve();
      return limit(() => this.visit(target, scope, state)).then(async (children) => {
        await Promise.all(children.map(schedule));
      });
    };

    await schedule({ url: root.toString(), key: canonicalUrl(root), role, depth: 0 });

    const manifest = state.manifest.build();
    const report: CrawlReport = {
      rootUrl: root.toString(),
      manifest,
      visitedCount: state.visitedCount,
      listingsExpanded: state.listingsExpanded,
      listingsSkipped: state.listingsSkipped,
      cancelled: this.cfg.signal?.aborted ?? false,
      durationMs: Date.now() - startedAt
    };
    this.cfg.onProgress?.(state.progress());

    log.info(
      `[crawl] visited: ${report.visitedCount}, listings: ${report.listingsExpanded}, files: ${manifest.summary.succeeded}, failed: ${manifest.summary.failed}`
    );
    if (report.listingsSkipped) {
      log.warn(`[crawl] ${report.listingsSkipped} listings skipped after reaching maxPages=${this.cfg.maxPages}`);
    }
    if (report.cancelled) {
      log.warn('[crawl] cancelled; manifest is partial');
    } else if (manifest.summary.succeeded === 0) {
      throw new EmptyCrawlError(report);
    }
    return report;
  }

  private async visit(target: CrawlTarget, scope: CrawlScope, state: CrawlState): Promise<CrawlTarget[]> {
    const signal = this.cfg.signal;
    if (signal?.aborted) return [];

    if (target.role === 'listing') {
      if (state.listingsFetched >= this.cfg.maxPages) {
        state.listingsSkipped++;
        log.debug(`[crawl] skip ${target.url}: page limit reached`, target.url);
        return [];
      }
      state.listingsFetched++;
    }

    state.begin();
    this.cfg.onProgress?.(state.progress(target.url));
    try {
      let result: FetchResult;
      try {
        result = await this.fetcher.fetch(target, { scope, signal });
      } catch (err) {
        this.fail(target, scope, state, signal?.aborted ? CANCELLED : toFailure(err));
        return [];
      }

      if (result.kind === 'links') {
        state.listingsExpanded++;
        const children = result.targets.filter((t) => t.depth <= this.cfg.maxDepth);
        log.debug(`[crawl] ${target.url} -> ${children.length} links`, target.url);
        return children;
      }
      if (result.kind === 'content') {
        await this.digest(target, result.body, scope, state);
      } else {
        this.fail(target, scope, state, result.error);
      }
      return [];
    } finally {
      state.end();
    }
  }

  /**
   * Digest `body`, teeing it into the sink. A transport failure while the body
   * is streaming (idle timeout, reset) fetches the file again, up to
   * `retries` times.
   */
  private async digest(target: CrawlTarget, body: Readable, scope: CrawlScope, state: CrawlState): Promise<void> {
    const signal = this.cfg.signal;
    const path = manifestPath(target.url, scope, 'file');
    let pending: Readable | undefined = body;

    const attempt = async (): Promise<DigestOutcome> => {
      let stream: Readable;
      if (pending) {
        stream = pending;
        pending = undefined;
      } else {
        const again = await this.fetcher.fetch(target, { scope, signal });
        if (again.kind === 'failure') return { ok: false, failure: again.error };
        if (again.kind === 'links') return { ok: false, failure: { kind: 'parse', message: 'Expected file content, got a listing' } };
        stream = again.body;
      }
      try {
        const copyTo = this.sink ? await this.sink.open(path) : undefined;
        return { ok: true, ...(await digestStream(stream, { algorithm: this.cfg.algorithm, copyTo })) };
      } catch (err) {
        stream.destroy();
        const cause = transportCause(err, signal);
        if (isTransientError(cause)) throw cause;
        const error = cause instanceof CrawlError ? cause : new DigestError(getErrorMessage(cause), { cause });
        return { ok: false, failure: toFailure(error) };
      }
    };

    let outcome: DigestOutcome;
    try {
      outcome = await withRetry(attempt, { retries: this.cfg.retries, baseDelayMs: this.cfg.retryDelayMs, label: target.url, signal });
    } catch (err) {
      outcome = { ok: false, failure: toFailure(err) };
    }

    if (outcome.ok) {
      state.record({ status: 'ok', path, url: target.url, digest: outcome.digest, size: outcome.size });
      log.debug(`[crawl] ${path} ${outcome.digest}`, target.url);
    } else {
      this.fail({ ...target, role: 'file' }, scope, state, signal?.aborted ? CANCELLED : outcome.failure);
    }
  }

  private fail(target: CrawlTarget, scope: CrawlScope, state: CrawlState, failure: CrawlFailure): void {
    const path = manifestPath(target.url, scope, target.role);
    state.record({ status: 'error', path, url: target.url, role: target.role, error: failure.message, errorKind: failure.kind });
    log.warn(`[crawl] failed ${path}: ${failure.message}`, target.url);
  }
}
