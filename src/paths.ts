import path from 'node:path';
import { sanitizeFilename } from './utils.js';

export function outputRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.OUTPUT_DIR || 'output');
}

/**
 * Turn a manifest path into a relative filesystem path. Each segment is
 * sanitised, so '..' and absolute paths cannot leave the target directory.
 */
export function safeRelativePath(relPath: string): string {
  const segments = relPath
    .split('/')
    .filter((s) => s.length > 0)
    .map(sanitizeFilename);
  return segments.length ? path.join(...segments) : 'file';
}

export function joinOutput(root: string, relPath: string): string {
  return path.join(root, safeRelativePath(relPath));
}
