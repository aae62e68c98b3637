import { ManifestBuilder } from './manifest.js';
import type { CrawlProgress, DigestAlgorithm, FileRecord } from './types.js';

/**
 * Mutable state of one crawl run. Only the scheduler touches it, and never
 * across an await, so check-and-mark stays atomic.
 */
export class CrawlState {
  readonly manifest: ManifestBuilder;
  private visited = new Set<string>();
  private _inFlight = 0;
  private failed = 0;
  listingsExpanded = 0;
  listingsSkipped = 0;
  listingsFetched = 0;

  constructor(algorithm: DigestAlgorithm) {
    this.manifest = new ManifestBuilder(algorithm);
  }

  /** Returns false when the key was already visited or queued. */
  claim(key: string): boolean {
    if (this.visited.has(key)) return false;
    this.visited.add(key);
    return true;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get inFlight(): number {
    return this._inFlight;
  }

  begin(): void {
    this._inFlight++;
  }

  end(): void {
    this._inFlight--;
  }

  record(rec: FileRecord): void {
    if (rec.status === 'error') this.failed++;
    this.manifest.add(rec);
  }

  progress(currentUrl?: string): CrawlProgress {
    return {
      visited: this.visited.size,
      inFlight: this._inFlight,
      completed: this.manifest.size - this.failed,
      failed: this.failed,
      currentUrl
    };
  }
}
