/**
 * Cache mémoire à durée de vie (par process)
 */

export interface TtlCacheOptions {
  /** Durée de vie en ms */
  ttlMs: number;
  /** Nombre max d'entrées (la plus ancienne est évincée) */
  maxSize?: number;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxSize: number;

  constructor(private readonly options: TtlCacheOptions) {
    this.maxSize = options.maxSize ?? 200;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.options.ttlMs): void {
    if (ttlMs <= 0) return;
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }
}
