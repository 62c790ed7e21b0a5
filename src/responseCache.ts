/**
 * Holds one value for `ttlMs` after it was stored. Deliberately not keyed:
 * every caller inside the window gets the same value whatever it asked for.
 */
export class ResponseCache<T> {
  private entry: { value: T; storedAt: number } | null = null;

  constructor(private ttlMs: number, private now: () => number = Date.now) {}

  get(): T | null {
    if (!this.entry) return null;
    if (this.now() - this.entry.storedAt > this.ttlMs) return null;
    return this.entry.value;
  }

  set(value: T): void {
    this.entry = { value, storedAt: this.now() };
  }

  invalidate(): void {
    this.entry = null;
  }
}
