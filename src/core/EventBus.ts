import { Logger } from './Logger';
import type { LodMode } from '../lod/types';
import type { EvictionReason } from '../pool/ResourcePool';

/**
 * Tiny typed event bus for core diagnostics and hooks.
 * One instance per RenderCore; collaborators get it injected.
 */
export type EventMap = {
  lodChanged: { from: LodMode; to: LodMode; fps: number | null; forced: boolean; at: number };
  poolEvicted: { pool: string; key: string; sizeBytes: number; reason: EvictionReason };
  idleTaskOverrun: { name: string; elapsedMs: number; budgetMs: number };
  warmCycleFinished: { completed: number; failed: number; total: number; cancelled: boolean; elapsedMs: number };
};

export type Handler<T> = (payload: T) => void;

type HandlerSets = { [K in keyof EventMap]: Set<Handler<EventMap[K]>> };

export class EventBus {
  private readonly listeners: HandlerSets = {
    lodChanged: new Set(),
    poolEvicted: new Set(),
    idleTaskOverrun: new Set(),
    warmCycleFinished: new Set(),
  };

  on<K extends keyof EventMap>(type: K, fn: Handler<EventMap[K]>): () => void {
    this.listeners[type].add(fn);
    return () => this.off(type, fn);
  }

  off<K extends keyof EventMap>(type: K, fn: Handler<EventMap[K]>): void {
    this.listeners[type].delete(fn);
  }

  emit<K extends keyof EventMap>(type: K, payload: EventMap[K]): void {
    const set: Set<Handler<EventMap[K]>> = this.listeners[type];
    if (set.size === 0) return;
    // Copy so a handler may unsubscribe itself mid-dispatch
    for (const fn of Array.from(set)) {
      try { fn(payload); } catch (e) { Logger.error(`[EventBus] Handler for "${type}" failed`, e); }
    }
  }

  listenerCount(type: keyof EventMap): number {
    return this.listeners[type].size;
  }

  clear(): void {
    this.listeners.lodChanged.clear();
    this.listeners.poolEvicted.clear();
    this.listeners.idleTaskOverrun.clear();
    this.listeners.warmCycleFinished.clear();
  }
}
