import type { DigestAlgorithm, FileRecord, Manifest } from './types.js';

// Code-unit order: the same on every machine, unlike localeCompare
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareRecords(a: FileRecord, b: FileRecord): number {
  return compareStrings(a.path, b.path) || compareStrings(a.url, b.url);
}

/**
 * Collects records in completion order and hands them back sorted by path.
 */
export class ManifestBuilder {
  private records: FileRecord[] = [];

  constructor(private algorithm: DigestAlgorithm = 'sha256') {}

  add(record: FileRecord): void {
    this.records.push(record);
  }

  get size(): number {
    return this.records.length;
  }

  build(): Manifest {
    const entries = [...this.records].sort(compareRecords);
    const failures = entries.filter((r) => r.status === 'error');
    const bytes = entries.reduce((sum, r) => (r.status === 'ok' ? sum + r.size : sum), 0);
    return {
      algorithm: this.algorithm,
      entries,
      failures,
      summary: {
        total: entries.length,
        succeeded: entries.length - failures.length,
        failed: failures.length,
        bytes
      }
    };
  }
}
