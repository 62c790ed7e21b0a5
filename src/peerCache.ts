import { PeerCacheEntry } from './types';

/** Bridges short gaps in the peer signal with the last positive count. */
export class PeerCache {
  private entry: PeerCacheEntry | null = null;

  constructor(private staleMs: number, private now: () => number = Date.now) {}

  /**
   * Display value for an observation. A missing observation (null) may be
   * replaced by a cached count younger than the staleness window; an
   * observed zero is reported as zero.
   */
  resolve(observed: number | null): string {
    const ts = this.now();
    if (observed !== null && observed > 0) {
      this.entry = { value: observed, observedAt: ts };
      return String(observed);
    }
    if (observed !== null) return String(observed);
    if (this.entry && ts - this.entry.observedAt <= this.staleMs) return String(this.entry.value);
    return 'N/A';
  }
}
