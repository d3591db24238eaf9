import { Logger } from '../core/Logger';
import { PreconditionError, formatBytes } from '../core/errors';
import type { EventBus } from '../core/EventBus';
import type { Clock } from '../core/Scheduler';
import type { PoolSpec } from '../config/renderCoreConfig';
import { lodModeName, type LodConfig, type LodDependent, type LodMode } from '../lod/types';
import { ResourcePool, type EvictHook, type PoolStats } from './ResourcePool';

export interface ResourcePoolManagerOptions<T> {
  pools?: readonly PoolSpec[];
  clock?: Clock;
  events?: EventBus;
  onEvict?: EvictHook<T>;
}

interface ManagedPool<T> {
  pool: ResourcePool<T>;
  share: number;
}

/**
 * Independent named pools (one per resource kind) sharing the tier budget.
 * Each pool gets `share` × the tier's entry and byte capacity.
 */
export class ResourcePoolManager<T> implements LodDependent {
  private readonly pools = new Map<string, ManagedPool<T>>();
  private readonly clock?: Clock;
  private readonly events?: EventBus;
  private readonly onEvict?: EvictHook<T>;
  private budgetEntries = 0;
  private budgetBytes = 0;

  constructor(opts: ResourcePoolManagerOptions<T> = {}) {
    this.clock = opts.clock;
    this.events = opts.events;
    this.onEvict = opts.onEvict;
    for (const spec of opts.pools ?? []) this.register(spec.name, spec.share);
  }

  /** Creates a pool sized from the current budget. Names are unique. */
  public register(name: string, share = 1): ResourcePool<T> {
    if (this.pools.has(name)) {
      throw new PreconditionError('name', name, `Pool "${name}" is already registered`);
    }
    const s = Number.isFinite(share) && share >= 0 ? share : 0;
    const pool = new ResourcePool<T>(name, {
      maxEntries: Math.floor(this.budgetEntries * s),
      maxBytes: Math.floor(this.budgetBytes * s),
      clock: this.clock,
      events: this.events,
      onEvict: this.onEvict,
    });
    this.pools.set(name, { pool, share: s });
    return pool;
  }

  public pool(name: string): ResourcePool<T> | undefined {
    return this.pools.get(name)?.pool;
  }

  public names(): string[] {
    return Array.from(this.pools.keys());
  }

  public applyLodConfig(mode: LodMode, config: Readonly<LodConfig>): void {
    this.budgetEntries = config.poolCapacityEntries;
    this.budgetBytes = config.poolCapacityBytes;
    const parts: string[] = [];
    let evicted = 0;
    for (const [name, { pool, share }] of this.pools) {
      const maxEntries = Math.floor(this.budgetEntries * share);
      const maxBytes = Math.floor(this.budgetBytes * share);
      evicted += pool.configure(maxEntries, maxBytes);
      parts.push(`${name} ${maxEntries}/${formatBytes(maxBytes)}`);
    }
    Logger.info(`[ResourcePools] Configured for ${lodModeName(mode)}: ${parts.join(', ') || 'no pools'}${evicted > 0 ? ` (evicted ${evicted})` : ''}`);
  }

  public trimAll(ratio = 1): number {
    let evicted = 0;
    for (const { pool } of this.pools.values()) evicted += pool.trim(ratio);
    return evicted;
  }

  public clearAll(): void {
    for (const { pool } of this.pools.values()) pool.clear();
  }

  public stats(): Record<string, PoolStats> {
    const out: Record<string, PoolStats> = {};
    for (const [name, { pool }] of this.pools) out[name] = pool.stats();
    return out;
  }

  /** Combined hit rate over all pools (0 before any lookup). */
  public hitRate(): number {
    let hits = 0;
    let lookups = 0;
    for (const { pool } of this.pools.values()) {
      const s = pool.stats();
      hits += s.hits;
      lookups += s.hits + s.misses;
    }
    return lookups > 0 ? hits / lookups : 0;
  }
}
