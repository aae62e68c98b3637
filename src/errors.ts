import type { CrawlFailure, CrawlReport, FailureKind } from './types.js';

export type CrawlErrorKind = FailureKind | 'invalid-root' | 'empty-crawl' | 'config';

export class CrawlError extends Error {
  readonly kind: CrawlErrorKind;

  constructor(message: string, kind: CrawlErrorKind, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
  }
}

export class NetworkError extends CrawlError {
  readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, 'network', options);
    this.code = options?.code;
  }
}

export class HttpStatusError extends CrawlError {
  readonly status: number;

  constructor(status: number, statusText?: string) {
    super(statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`, 'http-status');
    this.status = status;
  }
}

export class ParseError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'parse', options);
  }
}

export class DigestError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'digest', options);
  }
}

export class CancelledError extends CrawlError {
  constructor(message = 'cancelled') {
    super(message, 'cancelled');
  }
}

export class InvalidRootUrlError extends CrawlError {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid root URL: ${JSON.stringify(input)}`, 'invalid-root');
    this.input = input;
  }
}

export class EmptyCrawlError extends CrawlError {
  readonly report: CrawlReport;

  constructor(report: CrawlReport) {
    const failed = report.manifest.summary.failed;
    super(`No files could be digested under ${report.rootUrl} (${failed} failures)`, 'empty-crawl');
    this.report = report;
  }
}

export class ConfigError extends CrawlError {
  constructor(message: string) {
    super(message, 'config');
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Fold any thrown value into per-target failure data. Unknown errors count as
 * network failures since they come out of the transport.
 */
export function toFailure(err: unknown): CrawlFailure {
  if (err instanceof HttpStatusError) {
    return { kind: 'http-status', message: err.message, status: err.status };
  }
  if (err instanceof ParseError) return { kind: 'parse', message: err.message };
  if (err instanceof DigestError) return { kind: 'digest', message: err.message };
  if (err instanceof CancelledError) return { kind: 'cancelled', message: err.message };
  return { kind: 'network', message: getErrorMessage(err) };
}
