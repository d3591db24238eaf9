import { formatBytes } from './errors';
import type { FrameStats } from './FrameTimeMonitor';
import type { LodMode, LodModeName } from '../lod/types';
import type { ThrottleStats } from '../lod/UpdateThrottle';
import type { PoolStats } from '../pool/ResourcePool';
import type { EntityCacheStats } from '../render/EntityRenderCache';
import type { IdleTaskStats } from '../systems/IdleTaskScheduler';
import type { WarmProgress, WarmState } from '../systems/StartupWarmCycle';

export interface DiagnosticsSnapshot {
  fps: number | null;
  mode: LodMode;
  modeName: LodModeName;
  modeChangeCount: number;
  /** Entity cache reuse rate. */
  cacheHitRate: number;
  entityCache: EntityCacheStats;
  poolStats: Record<string, PoolStats>;
  throttleStats: ThrottleStats[];
  idleTaskStats: IdleTaskStats;
  frameStats: FrameStats;
  warmUp: { state: WarmState; progress: WarmProgress };
}

const pct = (ratio: number, digits = 0): string => `${(ratio * 100).toFixed(digits)}%`;

/** Short text lines for a debug overlay or a periodic log. */
export function formatDiagnostics(s: DiagnosticsSnapshot): string[] {
  const lines: string[] = [];
  const fps = s.fps === null ? '-' : String(Math.round(s.fps));
  lines.push(`FPS ${fps} mode ${s.modeName} (changes ${s.modeChangeCount})`);
  lines.push(
    `Frame avg ${s.frameStats.avgFrameMs.toFixed(1)}ms p95 ${s.frameStats.p95FrameMs}ms ` +
    `drop ${s.frameStats.droppedFrames} hitch ${s.frameStats.hitchFrames}`,
  );
  lines.push(`Cache reuse ${pct(s.cacheHitRate, 1)} size ${s.entityCache.size} errors ${s.entityCache.errorCount}`);
  for (const name of Object.keys(s.poolStats)) {
    const p = s.poolStats[name];
    lines.push(
      `Pool ${name}: ${p.entries}/${p.maxEntries} ${formatBytes(p.bytes)}/${formatBytes(p.maxBytes)} ` +
      `hit ${pct(p.hitRate)} evicted ${p.evictions}`,
    );
  }
  for (const t of s.throttleStats) {
    lines.push(`Throttle ${t.channel}: ${t.intervalMs}ms accepted ${t.totalUpdates} skipped ${t.skipped}`);
  }
  const idle = s.idleTaskStats;
  lines.push(
    `Idle queued ${idle.queued} done ${idle.completed} failed ${idle.failed} ` +
    `overrun ${pct(idle.overrunRate, 2)} wait ${idle.oldestWaitMs.toFixed(0)}ms`,
  );
  lines.push(`Warm ${s.warmUp.state} ${s.warmUp.progress.completed}/${s.warmUp.progress.total}`);
  return lines;
}
