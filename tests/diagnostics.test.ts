import { describe, it, expect } from 'vitest';
import { formatDiagnostics, type DiagnosticsSnapshot } from '../src/core/diagnostics';
import { formatBytes, PreconditionError, requireNonEmpty, requireNonNegative } from '../src/core/errors';
import { LodMode } from '../src/lod/types';
import { TaskPriority } from '../src/systems/IdleTaskScheduler';

const MB = 1024 * 1024;

function snapshot(): DiagnosticsSnapshot {
  return {
    fps: 57.6,
    mode: LodMode.Medium,
    modeName: 'medium',
    modeChangeCount: 1,
    cacheHitRate: 0.875,
    entityCache: {
      size: 12, batches: 8, totalCreated: 12, totalReused: 84, totalRebuilt: 0, totalRemoved: 0, errorCount: 0, efficiency: 0.875,
    },
    poolStats: {
      icons: { entries: 40, bytes: 2048, maxEntries: 50, maxBytes: 20 * MB, hits: 3, misses: 1, evictions: 4, hitRate: 0.75 },
    },
    throttleStats: [{ channel: 'viewport', totalUpdates: 10, skipped: 5, lastAcceptedAt: 900, intervalMs: 30 }],
    idleTaskStats: {
      queued: 2,
      queuedByPriority: { [TaskPriority.Low]: 2, [TaskPriority.Medium]: 0, [TaskPriority.High]: 0, [TaskPriority.Critical]: 0 },
      totalScheduled: 102,
      completed: 100,
      failed: 1,
      deferredSlots: 3,
      overrunCount: 1,
      overrunRate: 0.01,
      oldestWaitMs: 12.4,
      gcHintCount: 0,
    },
    frameStats: {
      fps: 57.6, avgFrameMs: 17.36, p95FrameMs: 24, totalFrames: 500, droppedFrames: 3, hitchFrames: 1, sampleCount: 115,
    },
    warmUp: { state: 'completed', progress: { completed: 3, failed: 0, total: 3 } },
  };
}

describe('formatDiagnostics', () => {
  it('renders one line per concern', () => {
    expect(formatDiagnostics(snapshot())).toEqual([
      'FPS 58 mode medium (changes 1)',
      'Frame avg 17.4ms p95 24ms drop 3 hitch 1',
      'Cache reuse 87.5% size 12 errors 0',
      'Pool icons: 40/50 2.0KB/20.0MB hit 75% evicted 4',
      'Throttle viewport: 30ms accepted 10 skipped 5',
      'Idle queued 2 done 100 failed 1 overrun 1.00% wait 12ms',
      'Warm completed 3/3',
    ]);
  });

  it('shows a dash before the first fps reading', () => {
    const s = { ...snapshot(), fps: null, poolStats: {}, throttleStats: [] };
    expect(formatDiagnostics(s)[0]).toBe('FPS - mode medium (changes 1)');
    expect(formatDiagnostics(s)).toHaveLength(5);
  });
});

describe('errors', () => {
  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0B');
    expect(formatBytes(512)).toBe('512B');
    expect(formatBytes(1536)).toBe('1.5KB');
    expect(formatBytes(3 * MB)).toBe('3.0MB');
  });

  it('carries the argument name on precondition failures', () => {
    expect(requireNonNegative('size', 0)).toBe(0);
    expect(requireNonEmpty('key', 'k')).toBe('k');
    try {
      requireNonEmpty('key', '');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(PreconditionError);
      if (e instanceof PreconditionError) {
        expect(e.argument).toBe('key');
        expect(e.name).toBe('PreconditionError');
        expect(e.message).toBe('"key" must be a non-empty string');
      }
    }
  });
});
