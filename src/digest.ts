import crypto from 'node:crypto';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DigestError, getErrorMessage } from './errors.js';
import type { DigestAlgorithm } from './types.js';

export const DIGEST_ALGORITHMS: readonly DigestAlgorithm[] = ['sha256', 'sha1', 'sha512', 'md5'];

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return (DIGEST_ALGORITHMS as readonly string[]).includes(value);
}

export type ByteSource = AsyncIterable<unknown> | Iterable<unknown>;

export type DigestResult = {
  digest: string;
  size: number;
};

/**
 * Incremental hasher. Feeding "AB" at once or as "A" then "B" gives the same hex.
 */
export class ContentDigest {
  private hash: crypto.Hash;
  private bytes = 0;

  constructor(readonly algorithm: DigestAlgorithm = 'sha256') {
    this.hash = crypto.createHash(algorithm);
  }

  update(chunk: Uint8Array): this {
    this.hash.update(chunk);
    this.bytes += chunk.byteLength;
    return this;
  }

  get size(): number {
    return this.bytes;
  }

  hex(): string {
    return this.hash.digest('hex');
  }
}

export function createDigest(algorithm: DigestAlgorithm = 'sha256'): ContentDigest {
  return new ContentDigest(algorithm);
}

export function digestBytes(data: Uint8Array | string, algorithm: DigestAlgorithm = 'sha256'): string {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  return createDigest(algorithm).update(bytes).hex();
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf-8');
  throw new DigestError(`Unexpected chunk type: ${typeof chunk}`);
}

/**
 * Hash a byte stream chunk by chunk. With `copyTo` every chunk is also written
 * to the given stream; the result resolves only after that stream finished.
 * A failing `copyTo` rejects the digest as soon as it errors.
 */
export async function digestStream(
  source: ByteSource,
  opts: { algorithm?: DigestAlgorithm; copyTo?: Writable } = {}
): Promise<DigestResult> {
  const hasher = createDigest(opts.algorithm);
  const tap = async function* (chunks: ByteSource): AsyncGenerator<Uint8Array> {
    for await (const raw of chunks) {
      const chunk = toBytes(raw);
      hasher.update(chunk);
      yield chunk;
    }
  };

  try {
    if (opts.copyTo) {
      await pipeline(source, tap, opts.copyTo);
    } else {
      for await (const raw of source) hasher.update(toBytes(raw));
    }
  } catch (err) {
    opts.copyTo?.destroy();
    if (err instanceof DigestError) throw err;
    throw new DigestError(`Failed while reading content: ${getErrorMessage(err)}`, { cause: err });
  }
  return { digest: hasher.hex(), size: hasher.size };
}
