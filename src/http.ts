import got, { RequestError, type Got, type Response } from 'got';
import type { Readable } from 'node:stream';
import { CancelledError, CrawlError, HttpStatusError, NetworkError, getErrorMessage } from './errors.js';
import { log } from './logger.js';
import { sleep } from './utils.js';

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  delayMs?: number;
  retries?: number;
  retryDelayMs?: number;
};

export type HttpResponse = {
  url: string; // final URL after redirects
  statusCode: number;
  contentType: string | null;
  body: Readable;
};

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'EPIPE', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);

/**
 * Timeouts, dropped connections and 5xx are worth another attempt. 4xx, DNS
 * failures and refused connections are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) return error.status >= 500 && error.status <= 599;
  if (error instanceof NetworkError) return error.code !== undefined && TRANSIENT_CODES.has(error.code);
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: { retries: number; baseDelayMs: number; label: string; signal?: AbortSignal }
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isTransientError(error) || attempt === opts.retries || opts.signal?.aborted) {
        throw error;
      }
      const delay = opts.baseDelayMs * Math.pow(2, attempt);
      log.warn(`Retrying ${opts.label} (attempt ${attempt + 2}/${opts.retries + 1}) after ${delay}ms: ${getErrorMessage(error)}`, opts.label);
      if (delay > 0) await sleep(delay);
    }
  }
  throw lastError;
}

function describeRequestError(err: RequestError): string {
  switch (err.code) {
    case 'ETIMEDOUT':
      return 'Request timed out';
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return `DNS lookup failed: ${err.options?.url?.toString() ?? 'unknown host'}`;
    case 'ECONNREFUSED':
      return 'Connection refused';
    case 'ECONNRESET':
      return 'Connection reset by server';
    case 'ERR_TLS_CERT_ALTNAME_INVALID':
      return 'SSL certificate error';
    default:
      return err.message;
  }
}

export function toTransportError(err: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) return new CancelledError();
  if (err instanceof HttpStatusError || err instanceof NetworkError || err instanceof CancelledError) return err;
  if (err instanceof RequestError) {
    return new NetworkError(describeRequestError(err), { code: err.code, cause: err });
  }
  return new NetworkError(getErrorMessage(err), { cause: err });
}

/**
 * A transport failure hidden inside an error raised while the body was being
 * consumed (a got timeout wrapped by the digest, say) comes back as the
 * NetworkError it stands for. Anything else is returned unchanged.
 */
export function transportCause(err: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted) return new CancelledError();
  if (err instanceof RequestError) return toTransportError(err, signal);
  if (err instanceof CrawlError && err.cause instanceof RequestError) return toTransportError(err.cause, signal);
  return err;
}

// got streams emit Buffers
export async function readBody(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) chunks.push(chunk);
  return Buffer.concat(chunks);
}

export class HttpClient {
  private client: Got;
  private delayMs: number;
  private retries: number;
  private retryDelayMs: number;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, delayMs, retries, retryDelayMs } = opts;
    const timeout = timeoutMs ?? 30000;
    this.client = got.extend({
      headers: userAgent ? { 'user-agent': userAgent } : {},
      // retries are driven by withRetry so they also cover streamed requests
      retry: { limit: 0 },
      throwHttpErrors: false,
      // per phase and per idle socket, never for the whole download
      timeout: {
        lookup: timeout,
        connect: timeout,
        secureConnect: timeout,
        response: timeout,
        socket: timeout
      }
    });
    this.delayMs = Math.max(0, delayMs ?? 0);
    this.retries = Math.max(0, retries ?? 2);
    this.retryDelayMs = Math.max(0, retryDelayMs ?? 1000);
  }

  get retryPolicy(): { retries: number; baseDelayMs: number } {
    return { retries: this.retries, baseDelayMs: this.retryDelayMs };
  }

  /**
   * GET `url` and resolve once a 2xx response has arrived. The body is left
   * unread for the caller to consume or destroy.
   */
  async open(url: string, opts: { signal?: AbortSignal } = {}): Promise<HttpResponse> {
    return this.request(url, opts, async (res) => res);
  }

  /**
   * GET `url` and hand the 2xx response to `consume`. A transient failure
   * while consuming the body retries the whole request.
   */
  async request<T>(url: string, opts: { signal?: AbortSignal }, consume: (res: HttpResponse) => Promise<T>): Promise<T> {
    const { signal } = opts;
    return withRetry(
      async () => {
        const res = await this.openOnce(url, signal);
        try {
          return await consume(res);
        } catch (err) {
          res.body.destroy();
          throw transportCause(err, signal);
        }
      },
      { ...this.retryPolicy, label: url, signal }
    );
  }

  private async openOnce(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    if (signal?.aborted) throw new CancelledError();
    if (this.delayMs) await sleep(this.delayMs);

    const stream = this.client.stream(url, { signal });
    let response: Response;
    try {
      response = await new Promise<Response>((resolve, reject) => {
        stream.once('response', resolve);
        stream.once('error', reject);
      });
    } catch (err) {
      stream.destroy();
      throw toTransportError(err, signal);
    }

    const { statusCode } = response;
    if (statusCode < 200 || statusCode > 299) {
      stream.destroy();
      throw new HttpStatusError(statusCode, response.statusMessage);
    }

    const contentType = response.headers['content-type'];
    return {
      url: response.url,
      statusCode,
      contentType: typeof contentType === 'string' ? contentType : null,
      body: stream
    };
  }
}
