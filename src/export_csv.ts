import fs from 'node:fs';
import path from 'node:path';
import type { FileRecord, Manifest } from './types.js';

export function csvEscape(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  let s = String(value);
  const needsQuotes = /[",\n\r]/.test(s);
  if (needsQuotes) {
    s = '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function csvHeader(manifest: Manifest): string[] {
  return ['path', manifest.algorithm, 'error'];
}

function csvRow(record: FileRecord): string {
  const cols = record.status === 'ok' ? [record.path, record.digest, ''] : [record.path, '', record.error];
  return cols.map(csvEscape).join(',');
}

export function manifestToCsv(manifest: Manifest): string {
  const lines = [csvHeader(manifest).join(','), ...manifest.entries.map(csvRow)];
  return lines.join('\n') + '\n';
}

export async function writeManifestCsv(manifest: Manifest, filePath: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const stream = fs.createWriteStream(filePath, { encoding: 'utf8' });
  stream.write(csvHeader(manifest).join(',') + '\n');
  for (const record of manifest.entries) {
    stream.write(csvRow(record) + '\n');
  }
  await new Promise<void>((res, rej) => {
    stream.once('error', rej);
    stream.end(() => res());
  });
  return filePath;
}
