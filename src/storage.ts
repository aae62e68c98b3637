import fs from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { joinOutput } from './paths.js';
import type { ContentSink } from './types.js';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Mirrors downloaded files under `rootDir`, laid out like their manifest paths.
 */
export class FileMirror implements ContentSink {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async open(relPath: string): Promise<Writable> {
    const outPath = joinOutput(this.rootDir, relPath);
    await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
    return fs.createWriteStream(outPath);
  }
}
