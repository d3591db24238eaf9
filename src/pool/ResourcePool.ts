import { Logger } from '../core/Logger';
import { requireNonEmpty, requireNonNegative } from '../core/errors';
import type { EventBus } from '../core/EventBus';
import type { Clock } from '../core/Scheduler';

export type EvictionReason = 'capacity' | 'trim' | 'reconfigure' | 'replaced' | 'removed' | 'cleared';

export interface PooledResource<T> {
  key: string;
  payload: T;
  sizeBytes: number;
  lastAccess: number;
}

export type EvictHook<T> = (key: string, payload: T, reason: EvictionReason) => void;

export interface ResourcePoolOptions<T> {
  maxEntries: number;
  maxBytes: number;
  clock?: Clock;
  /** Disposal hook, called once per entry leaving the pool. */
  onEvict?: EvictHook<T>;
  events?: EventBus;
}

export interface PoolStats {
  entries: number;
  bytes: number;
  maxEntries: number;
  maxBytes: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

const systemClock: Clock = { now: () => Date.now() };

/**
 * LRU pool bounded by entry count and total bytes.
 * Map insertion order is the recency order: oldest first.
 */
export class ResourcePool<T> {
  public readonly name: string;
  private readonly entries = new Map<string, PooledResource<T>>();
  private readonly clock: Clock;
  private readonly onEvict?: EvictHook<T>;
  private readonly events?: EventBus;
  private maxEntries = 0;
  private maxBytes = 0;
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(name: string, opts: ResourcePoolOptions<T>) {
    this.name = requireNonEmpty('name', name);
    this.clock = opts.clock ?? systemClock;
    this.onEvict = opts.onEvict;
    this.events = opts.events;
    this.configure(opts.maxEntries, opts.maxBytes);
  }

  public get size(): number { return this.entries.size; }

  public get bytes(): number { return this.totalBytes; }

  public get limits(): { maxEntries: number; maxBytes: number } {
    return { maxEntries: this.maxEntries, maxBytes: this.maxBytes };
  }

  /** Returns the payload and marks it most recently used. */
  public get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    entry.lastAccess = this.clock.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.payload;
  }

  /** Lookup without touching recency or hit counters. */
  public peek(key: string): T | undefined {
    return this.entries.get(key)?.payload;
  }

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Insert or replace. Evicts least recently used entries until within bounds.
   * @returns false when the resource cannot be retained at the current limits
   */
  public put(key: string, resource: T, sizeBytes: number): boolean {
    requireNonEmpty('key', key);
    requireNonNegative('sizeBytes', sizeBytes);

    const existing = this.entries.get(key);
    if (existing) {
      this.entries.delete(key);
      this.totalBytes -= existing.sizeBytes;
      if (existing.payload !== resource) this.dispose(existing, 'replaced');
    }

    if (this.maxEntries === 0 || sizeBytes > this.maxBytes) {
      Logger.debug(`[ResourcePool:${this.name}] Not retaining "${key}" (${sizeBytes}B) at current limits`);
      return false;
    }

    this.entries.set(key, { key, payload: resource, sizeBytes, lastAccess: this.clock.now() });
    this.totalBytes += sizeBytes;
    this.evictTo(this.maxEntries, this.maxBytes, 'capacity');
    return true;
  }

  public remove(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.totalBytes -= entry.sizeBytes;
    this.dispose(entry, 'removed');
    return true;
  }

  /**
   * Change limits; negative or NaN values are clamped to 0 (Infinity = unbounded).
   * Shrinks immediately and returns the number of evicted entries.
   */
  public configure(maxEntries: number, maxBytes: number): number {
    this.maxEntries = this.sanitizeLimit('maxEntries', maxEntries, true);
    this.maxBytes = this.sanitizeLimit('maxBytes', maxBytes, false);
    return this.evictTo(this.maxEntries, this.maxBytes, 'reconfigure');
  }

  /** Evict LRU entries down to floor(limit × ratio). */
  public trim(ratio = 1): number {
    const r = Number.isFinite(ratio) ? Math.min(1, Math.max(0, ratio)) : 1;
    const scaled = (limit: number): number => (r === 0 ? 0 : Math.floor(limit * r));
    const evicted = this.evictTo(scaled(this.maxEntries), scaled(this.maxBytes), 'trim');
    if (evicted > 0) {
      Logger.debug(`[ResourcePool:${this.name}] Trimmed ${evicted} entries (ratio ${r})`);
    }
    return evicted;
  }

  public clear(): void {
    const all = Array.from(this.entries.values());
    this.entries.clear();
    this.totalBytes = 0;
    for (const entry of all) this.dispose(entry, 'cleared');
  }

  public stats(): PoolStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      maxEntries: this.maxEntries,
      maxBytes: this.maxBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  private evictTo(entryLimit: number, byteLimit: number, reason: EvictionReason): number {
    let evicted = 0;
    while (this.entries.size > entryLimit || this.totalBytes > byteLimit) {
      const oldest = this.entries.values().next();
      if (oldest.done) break;
      const entry = oldest.value;
      this.entries.delete(entry.key);
      this.totalBytes -= entry.sizeBytes;
      this.dispose(entry, reason);
      evicted++;
    }
    return evicted;
  }

  private dispose(entry: PooledResource<T>, reason: EvictionReason): void {
    if (reason === 'capacity' || reason === 'trim' || reason === 'reconfigure') this.evictions++;
    this.events?.emit('poolEvicted', { pool: this.name, key: entry.key, sizeBytes: entry.sizeBytes, reason });
    if (!this.onEvict) return;
    try {
      this.onEvict(entry.key, entry.payload, reason);
    } catch (e) {
      Logger.error(`[ResourcePool:${this.name}] onEvict failed for "${entry.key}"`, e);
    }
  }

  private sanitizeLimit(label: string, value: number, integer: boolean): number {
    if (Number.isNaN(value) || value < 0) {
      Logger.warn(`[ResourcePool:${this.name}] ${label}=${String(value)} clamped to 0`);
      return 0;
    }
    return integer ? Math.floor(value) : value;
  }
}
