import type { Clock } from '../core/Scheduler';
import { LodMode, type LodConfig, type LodDependent } from './types';

export interface ThrottleStats {
  channel: string;
  totalUpdates: number;
  skipped: number;
  lastAcceptedAt: number | null;
  intervalMs: number;
}

/**
 * Rate limit for one high-frequency trigger channel (camera moves, tile
 * requests). Drop semantics: a rejected trigger is gone, the caller
 * re-derives current state on the next accepted one.
 */
export class UpdateThrottle implements LodDependent {
  public readonly channel: string;
  private readonly clock: Clock;
  private readonly intervals: Record<LodMode, number>;
  private currentMode: LodMode = LodMode.High;
  private lastAcceptedAt: number | null = null;
  private totalUpdates = 0;
  private skipped = 0;

  constructor(channel: string, clock: Clock, intervals?: Partial<Record<LodMode, number>>) {
    this.channel = channel;
    this.clock = clock;
    this.intervals = {
      [LodMode.High]: intervals?.[LodMode.High] ?? 0,
      [LodMode.Medium]: intervals?.[LodMode.Medium] ?? 0,
      [LodMode.Low]: intervals?.[LodMode.Low] ?? 0,
    };
  }

  public get mode(): LodMode { return this.currentMode; }

  public intervalFor(mode: LodMode = this.currentMode): number {
    const v = this.intervals[mode];
    return Number.isFinite(v) && v > 0 ? v : 0;
  }

  /** Tracks the tier; the tier's `updateThrottleMs` becomes its interval. */
  public applyLodConfig(mode: LodMode, config: Readonly<LodConfig>): void {
    this.currentMode = mode;
    this.intervals[mode] = config.updateThrottleMs;
  }

  public shouldUpdate(mode: LodMode = this.currentMode): boolean {
    if (this.lastAcceptedAt === null) return true;
    const interval = this.intervalFor(mode);
    if (interval === 0) return true;
    return this.clock.now() - this.lastAcceptedAt >= interval;
  }

  public recordUpdate(): void {
    this.lastAcceptedAt = this.clock.now();
    this.totalUpdates++;
  }

  public recordSkip(): void {
    this.skipped++;
  }

  /** shouldUpdate + record in one call. */
  public tryAccept(mode?: LodMode): boolean {
    if (this.shouldUpdate(mode)) {
      this.recordUpdate();
      return true;
    }
    this.recordSkip();
    return false;
  }

  public reset(): void {
    this.lastAcceptedAt = null;
    this.totalUpdates = 0;
    this.skipped = 0;
  }

  public stats(): ThrottleStats {
    return {
      channel: this.channel,
      totalUpdates: this.totalUpdates,
      skipped: this.skipped,
      lastAcceptedAt: this.lastAcceptedAt,
      intervalMs: this.intervalFor(),
    };
  }
}
