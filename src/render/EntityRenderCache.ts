import { Logger } from '../core/Logger';
import { PreconditionError } from '../core/errors';
import { LodMode, type LodConfig, type LodDependent } from '../lod/types';

const NOT_BUILT: unique symbol = Symbol('not-built');

export interface Position {
  lat: number;
  lng: number;
}

export type StateValue = string | number | boolean | null;

export type StateFields = Readonly<Record<string, StateValue>>;

export interface EntityUpdate {
  id: string;
  position: Position;
  stateFields?: StateFields;
}

export interface EntitySnapshot<T> {
  id: string;
  /** Position at the last build, not the latest update. */
  position: Position;
  stateFields: StateFields;
  selected: boolean;
  object: T;
  /** Batch sequence number in which the entity was last kept. */
  lastSeen: number;
  missedBatches: number;
}

export interface DiffFilter {
  /** Keep only entities in the selected set. */
  selectionOnly?: boolean;
  predicate?: (update: EntityUpdate) => boolean;
}

export interface EntityChange {
  id: string;
  reason: 'first-time' | 'changed';
  /** `position`, `selection` or `state:<field>` */
  fields: string[];
}

export interface DiffResult<T> {
  created: number;
  reused: number;
  rebuilt: number;
  removed: number;
  skipped: number;
  culled: number;
  /** Every object to render for this batch, in render order. */
  objects: Map<string, T>;
  removedIds: string[];
  /** Populated only with diagnostics enabled. */
  changes: EntityChange[];
}

export interface EntityCacheStats {
  size: number;
  batches: number;
  totalCreated: number;
  totalReused: number;
  totalRebuilt: number;
  totalRemoved: number;
  errorCount: number;
  efficiency: number;
}

export type BuildFn<T> = (update: EntityUpdate, selected: boolean, config: Readonly<LodConfig> | null) => T;

export interface EntityRenderCacheOptions<T> {
  build: BuildFn<T>;
  dispose?: (object: T, id: string) => void;
  positionEpsilon?: number;
  staleAfterBatches?: number;
  enableDiagnostics?: boolean;
}

export function emptyDiffResult<T>(): DiffResult<T> {
  return {
    created: 0,
    reused: 0,
    rebuilt: 0,
    removed: 0,
    skipped: 0,
    culled: 0,
    objects: new Map<string, T>(),
    removedIds: [],
    changes: [],
  };
}

/**
 * Decides per entity whether the previously built visual object can be
 * reused, by comparing the incoming state with the state it was built from.
 * Constructions per batch never exceed the number of real content changes.
 */
export class EntityRenderCache<T> implements LodDependent {
  private readonly snapshots = new Map<string, EntitySnapshot<T>>();
  private readonly build: BuildFn<T>;
  private readonly disposeObject?: (object: T, id: string) => void;
  private readonly positionEpsilon: number;
  private readonly staleAfterBatches: number;
  private readonly enableDiagnostics: boolean;
  private config: Readonly<LodConfig> | null = null;
  private mode: LodMode = LodMode.High;

  private batchSeq = 0;
  private totalCreated = 0;
  private totalReused = 0;
  private totalRebuilt = 0;
  private totalRemoved = 0;
  private errorCount = 0;

  constructor(opts: EntityRenderCacheOptions<T>) {
    if (typeof opts.build !== 'function') {
      throw new PreconditionError('build', opts.build, 'EntityRenderCache requires a build callback');
    }
    this.build = opts.build;
    this.disposeObject = opts.dispose;
    const eps = opts.positionEpsilon ?? 1e-7;
    this.positionEpsilon = Number.isFinite(eps) && eps >= 0 ? eps : 0;
    const stale = opts.staleAfterBatches ?? 2;
    this.staleAfterBatches = Number.isFinite(stale) && stale >= 1 ? Math.floor(stale) : 1;
    this.enableDiagnostics = opts.enableDiagnostics ?? false;
  }

  public get size(): number { return this.snapshots.size; }

  public get lodMode(): LodMode { return this.mode; }

  public applyLodConfig(mode: LodMode, config: Readonly<LodConfig>): void {
    this.mode = mode;
    this.config = config;
  }

  public snapshot(id: string): Readonly<EntitySnapshot<T>> | undefined {
    return this.snapshots.get(id);
  }

  public diff(
    updates: ReadonlyArray<EntityUpdate>,
    selectedIds: ReadonlySet<string> = new Set<string>(),
    filter: DiffFilter = {},
  ): DiffResult<T> {
    const seq = ++this.batchSeq;
    const result = emptyDiffResult<T>();

    const kept = this.selectKept(updates, selectedIds, filter, result);

    for (const update of kept) {
      const selected = selectedIds.has(update.id);
      const prev = this.snapshots.get(update.id);
      if (!prev) {
        const object = this.tryBuild(update, selected, result);
        if (object === NOT_BUILT) continue;
        this.snapshots.set(update.id, this.toSnapshot(update, selected, object, seq));
        result.created++;
        result.objects.set(update.id, object);
        if (this.enableDiagnostics) result.changes.push({ id: update.id, reason: 'first-time', fields: [] });
        continue;
      }

      const fields = this.changedFields(prev, update, selected);
      if (fields.length === 0) {
        prev.lastSeen = seq;
        prev.missedBatches = 0;
        result.reused++;
        result.objects.set(update.id, prev.object);
        continue;
      }

      const object = this.tryBuild(update, selected, result);
      if (object === NOT_BUILT) {
        // Keep showing the old object rather than dropping the entity
        prev.lastSeen = seq;
        prev.missedBatches = 0;
        result.objects.set(update.id, prev.object);
        continue;
      }
      // A builder may hand back the same object (keyed icon cache, in-place update)
      if (object !== prev.object) this.safeDispose(prev.object, update.id);
      this.snapshots.set(update.id, this.toSnapshot(update, selected, object, seq));
      result.rebuilt++;
      result.objects.set(update.id, object);
      if (this.enableDiagnostics) result.changes.push({ id: update.id, reason: 'changed', fields });
    }

    this.evictStale(seq, result);

    this.totalCreated += result.created;
    this.totalReused += result.reused;
    this.totalRebuilt += result.rebuilt;
    this.totalRemoved += result.removed;

    if (this.enableDiagnostics) {
      Logger.debug(
        `[EntityCache] batch ${seq}: created ${result.created}, reused ${result.reused}, rebuilt ${result.rebuilt}, ` +
        `removed ${result.removed}, skipped ${result.skipped}, culled ${result.culled}`,
      );
    }
    return result;
  }

  /** Disposes every cached object. */
  public clear(): void {
    const all = Array.from(this.snapshots.values());
    this.snapshots.clear();
    for (const s of all) this.safeDispose(s.object, s.id);
  }

  public stats(): EntityCacheStats {
    return {
      size: this.snapshots.size,
      batches: this.batchSeq,
      totalCreated: this.totalCreated,
      totalReused: this.totalReused,
      totalRebuilt: this.totalRebuilt,
      totalRemoved: this.totalRemoved,
      errorCount: this.errorCount,
      efficiency: this.efficiency(),
    };
  }

  /** reused / (reused + constructions); 0 before any work. */
  public efficiency(): number {
    const total = this.totalReused + this.totalCreated + this.totalRebuilt;
    return total > 0 ? this.totalReused / total : 0;
  }

  private selectKept(
    updates: ReadonlyArray<EntityUpdate>,
    selectedIds: ReadonlySet<string>,
    filter: DiffFilter,
    result: DiffResult<T>,
  ): EntityUpdate[] {
    const seen = new Set<string>();
    const valid: EntityUpdate[] = [];
    for (const update of updates) {
      if (!EntityRenderCache.isWellFormed(update) || seen.has(update.id)) {
        result.skipped++;
        this.errorCount++;
        continue;
      }
      seen.add(update.id);
      if (filter.selectionOnly && !selectedIds.has(update.id)) {
        result.culled++;
        continue;
      }
      if (filter.predicate && !this.passes(filter.predicate, update)) {
        result.culled++;
        continue;
      }
      valid.push(update);
    }

    const cap = this.config?.entityCap ?? null;
    if (cap === null || valid.length <= cap) return valid;

    const limit = Math.max(0, Math.floor(cap));
    const selected = valid.filter((u) => selectedIds.has(u.id));
    const others = valid.filter((u) => !selectedIds.has(u.id));
    const kept = selected.concat(others).slice(0, limit);
    result.culled += valid.length - kept.length;
    return kept;
  }

  private passes(predicate: (update: EntityUpdate) => boolean, update: EntityUpdate): boolean {
    try {
      return predicate(update);
    } catch (e) {
      Logger.error(`[EntityCache] Filter predicate failed for "${update.id}"`, e);
      return false;
    }
  }

  private static isWellFormed(update: EntityUpdate): boolean {
    return (
      typeof update === 'object' && update !== null &&
      typeof update.id === 'string' && update.id.length > 0 &&
      typeof update.position === 'object' && update.position !== null &&
      Number.isFinite(update.position.lat) && Number.isFinite(update.position.lng)
    );
  }

  private changedFields(prev: EntitySnapshot<T>, update: EntityUpdate, selected: boolean): string[] {
    const fields: string[] = [];
    if (
      Math.abs(prev.position.lat - update.position.lat) > this.positionEpsilon ||
      Math.abs(prev.position.lng - update.position.lng) > this.positionEpsilon
    ) {
      fields.push('position');
    }
    const next = update.stateFields ?? {};
    const keys = new Set([...Object.keys(prev.stateFields), ...Object.keys(next)]);
    for (const key of keys) {
      if (!Object.is(prev.stateFields[key], next[key])) fields.push(`state:${key}`);
    }
    if (prev.selected !== selected) fields.push('selection');
    return fields;
  }

  private toSnapshot(update: EntityUpdate, selected: boolean, object: T, seq: number): EntitySnapshot<T> {
    return {
      id: update.id,
      position: { lat: update.position.lat, lng: update.position.lng },
      stateFields: { ...(update.stateFields ?? {}) },
      selected,
      object,
      lastSeen: seq,
      missedBatches: 0,
    };
  }

  private tryBuild(update: EntityUpdate, selected: boolean, result: DiffResult<T>): T | typeof NOT_BUILT {
    try {
      return this.build(update, selected, this.config);
    } catch (e) {
      Logger.error(`[EntityCache] Build failed for "${update.id}"`, e);
      result.skipped++;
      this.errorCount++;
      return NOT_BUILT;
    }
  }

  private evictStale(seq: number, result: DiffResult<T>): void {
    for (const [id, snap] of this.snapshots) {
      if (snap.lastSeen === seq) continue;
      snap.missedBatches++;
      if (snap.missedBatches < this.staleAfterBatches) continue;
      this.snapshots.delete(id);
      this.safeDispose(snap.object, id);
      result.removed++;
      result.removedIds.push(id);
    }
  }

  private safeDispose(object: T, id: string): void {
    if (!this.disposeObject) return;
    try {
      this.disposeObject(object, id);
    } catch (e) {
      Logger.error(`[EntityCache] Dispose failed for "${id}"`, e);
    }
  }
}
