import { systemClock, type Clock } from './clock';

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * In-memory cache whose entries expire after a fixed TTL.
 * A TTL of 0 disables caching.
 */
export class TtlCache<K, V> {
  private entries = new Map<K, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.ttlMs <= 0) {
      return;
    }
    this.entries.set(key, { value, expiresAt: this.clock.now() + this.ttlMs });
  }
}
