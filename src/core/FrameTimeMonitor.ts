import { Logger } from './Logger';
import type { Clock } from './Scheduler';

export interface FrameTimeMonitorOptions {
  windowMs?: number;
  maxFps?: number;
  /** Durations above this are idle gaps, not frames. */
  maxSampleMs?: number;
  idleAfterMs?: number;
  /** Skip the callback while |Δfps| stays below this (0 = every sample). */
  notifyDeltaFps?: number;
  droppedFrameMs?: number;
  hitchFrameMs?: number;
  onFps?: (fps: number) => void;
}

export interface FrameStats {
  fps: number | null;
  avgFrameMs: number;
  p95FrameMs: number;
  totalFrames: number;
  droppedFrames: number;
  hitchFrames: number;
  sampleCount: number;
}

const JITTER_SLOTS = 240;
const HISTOGRAM_MAX_MS = 200;
const HISTOGRAM_STEP_MS = 2;

/**
 * Rolling-window frame timing. Samples live in a deque (parallel arrays plus
 * a head index) with a running sum, so each sample costs O(1) amortized.
 */
export class FrameTimeMonitor {
  private readonly clock: Clock;
  private readonly windowMs: number;
  private readonly maxFps: number;
  private readonly maxSampleMs: number;
  private readonly idleAfterMs: number;
  private readonly notifyDeltaFps: number;
  private readonly droppedFrameMs: number;
  private readonly hitchFrameMs: number;
  private readonly onFps?: (fps: number) => void;

  private durations: number[] = [];
  private timestamps: number[] = [];
  private head = 0;
  private sum = 0;

  // Raw durations for p95 jitter; fixed ring independent of the time window
  private readonly jitter: number[] = new Array<number>(JITTER_SLOTS).fill(0);
  private jitterIndex = 0;
  private jitterFilled = false;

  private running = false;
  private startedAt = 0;
  private lastSignalAt: number | null = null;
  private currentFps: number | null = null;
  private lastNotifiedFps: number | null = null;
  private totalFrames = 0;
  private droppedFrames = 0;
  private hitchFrames = 0;

  constructor(clock: Clock, opts: FrameTimeMonitorOptions = {}) {
    this.clock = clock;
    this.windowMs = opts.windowMs ?? 2000;
    this.maxFps = opts.maxFps ?? 120;
    this.maxSampleMs = opts.maxSampleMs ?? 1000;
    this.idleAfterMs = opts.idleAfterMs ?? 3000;
    this.notifyDeltaFps = opts.notifyDeltaFps ?? 0;
    this.droppedFrameMs = opts.droppedFrameMs ?? 33;
    this.hitchFrameMs = opts.hitchFrameMs ?? 100;
    this.onFps = opts.onFps;
  }

  public get isRunning(): boolean { return this.running; }

  /** Latest windowed FPS, or null before the first sample. */
  public get fps(): number | null { return this.currentFps; }

  public get sampleCount(): number { return this.durations.length - this.head; }

  public start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.clock.now();
    this.lastSignalAt = null;
  }

  public stop(): void {
    if (!this.running) return;
    this.running = false;
    this.clearWindow();
    this.currentFps = null;
    this.lastNotifiedFps = null;
  }

  /**
   * Feed one frame duration. Returns the recomputed FPS, or null when the
   * sample was ignored (not running, invalid value, idle gap).
   */
  public onSample(durationMs: number): number | null {
    if (!this.running) return null;
    if (!Number.isFinite(durationMs) || durationMs < 0) return null;
    const now = this.clock.now();
    this.lastSignalAt = now;
    if (durationMs > this.maxSampleMs) {
      // Resumed after a suspend; the old window no longer describes current load
      this.clearWindow();
      Logger.debug(`[FrameMonitor] Idle gap of ${durationMs.toFixed(0)}ms, window reset`);
      return null;
    }

    this.durations.push(durationMs);
    this.timestamps.push(now);
    this.sum += durationMs;
    this.prune(now);
    this.trackJitter(durationMs);

    const count = this.sampleCount;
    const avg = count > 0 ? this.sum / count : 0;
    const fps = avg <= 0 ? this.maxFps : Math.min(this.maxFps, 1000 / avg);
    this.currentFps = fps;
    this.notify(fps);
    return fps;
  }

  /** True when no frame signal arrived for `idleAfterMs` (or the monitor is stopped). */
  public isIdle(): boolean {
    if (!this.running) return true;
    const since = this.lastSignalAt ?? this.startedAt;
    return this.clock.now() - since >= this.idleAfterMs;
  }

  public stats(): FrameStats {
    const count = this.sampleCount;
    return {
      fps: this.currentFps,
      avgFrameMs: count > 0 ? this.sum / count : 0,
      p95FrameMs: this.p95(),
      totalFrames: this.totalFrames,
      droppedFrames: this.droppedFrames,
      hitchFrames: this.hitchFrames,
      sampleCount: count,
    };
  }

  private notify(fps: number): void {
    if (!this.onFps) return;
    if (this.lastNotifiedFps !== null && Math.abs(fps - this.lastNotifiedFps) < this.notifyDeltaFps) return;
    this.lastNotifiedFps = fps;
    try {
      this.onFps(fps);
    } catch (e) {
      Logger.error('[FrameMonitor] onFps listener failed', e);
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.head < this.timestamps.length && this.timestamps[this.head] < cutoff) {
      this.sum -= this.durations[this.head];
      this.head++;
    }
    // Compact once the dead prefix dominates
    if (this.head > 64 && this.head * 2 > this.timestamps.length) {
      this.durations = this.durations.slice(this.head);
      this.timestamps = this.timestamps.slice(this.head);
      this.head = 0;
    }
    if (this.sampleCount === 0) this.sum = 0;
  }

  private clearWindow(): void {
    this.durations = [];
    this.timestamps = [];
    this.head = 0;
    this.sum = 0;
  }

  private trackJitter(durationMs: number): void {
    this.totalFrames++;
    if (durationMs > this.droppedFrameMs) this.droppedFrames++;
    if (durationMs > this.hitchFrameMs) this.hitchFrames++;
    this.jitter[this.jitterIndex++] = durationMs;
    if (this.jitterIndex >= JITTER_SLOTS) { this.jitterIndex = 0; this.jitterFilled = true; }
  }

  // Coarse 2ms-bucket histogram (0-200ms) instead of a full sort
  private p95(): number {
    const count = this.jitterFilled ? JITTER_SLOTS : this.jitterIndex;
    if (count === 0) return 0;
    const buckets = new Array<number>(HISTOGRAM_MAX_MS / HISTOGRAM_STEP_MS + 1).fill(0);
    for (let i = 0; i < count; i++) {
      const v = Math.min(this.jitter[i], HISTOGRAM_MAX_MS);
      buckets[Math.floor(v / HISTOGRAM_STEP_MS)]++;
    }
    const targetRank = Math.max(1, Math.ceil(count * 0.95));
    let cumulative = 0;
    for (let b = 0; b < buckets.length; b++) {
      cumulative += buckets[b];
      if (cumulative >= targetRank) return b * HISTOGRAM_STEP_MS;
    }
    return HISTOGRAM_MAX_MS;
  }
}
