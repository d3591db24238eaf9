import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import type { Clock } from '../core/Scheduler';
import { getLodProfile, type LodProfileName } from '../config/lodProfiles';
import {
  LodMode,
  lodModeName,
  type LodConfig,
  type LodDependent,
  type LodProfile,
  type LodThresholds,
} from './types';

export interface AdaptiveLodControllerOptions {
  clock: Clock;
  profile?: LodProfile | LodProfileName;
  gracePeriodMs?: number;
  /** Receives the tier config from `configurePools()`. */
  pools?: LodDependent;
  events?: EventBus;
}

/**
 * Discrete quality tier driven by FPS with hysteresis:
 * at most one step per evaluation, and never before the grace period
 * since the previous transition has elapsed. Nothing is queued: an FPS
 * reading inside the grace period is simply not acted on.
 */
export class AdaptiveLodController {
  private readonly clock: Clock;
  private readonly events?: EventBus;
  private readonly pools?: LodDependent;
  private readonly dependents = new Set<LodDependent>();
  private readonly thresholds: LodThresholds;
  private readonly tiers: Record<LodMode, Readonly<LodConfig>>;
  public readonly profileName: string;
  public readonly gracePeriodMs: number;

  private currentMode: LodMode = LodMode.High;
  private lastTransitionAt: number;
  private changes = 0;
  private lastFps: number | null = null;

  constructor(opts: AdaptiveLodControllerOptions) {
    this.clock = opts.clock;
    this.events = opts.events;
    this.pools = opts.pools;
    const profile = typeof opts.profile === 'object' ? opts.profile : getLodProfile(opts.profile ?? 'standard');
    this.profileName = profile.name;
    this.thresholds = AdaptiveLodController.validateThresholds(profile.thresholds, profile.name);
    this.tiers = {
      [LodMode.High]: Object.freeze({ ...profile.tiers[LodMode.High] }),
      [LodMode.Medium]: Object.freeze({ ...profile.tiers[LodMode.Medium] }),
      [LodMode.Low]: Object.freeze({ ...profile.tiers[LodMode.Low] }),
    };
    const grace = opts.gracePeriodMs ?? 3000;
    if (!Number.isFinite(grace) || grace < 0) {
      Logger.warn(`[AdaptiveLOD] gracePeriodMs=${String(grace)} clamped to 0`);
    }
    this.gracePeriodMs = Number.isFinite(grace) && grace > 0 ? grace : 0;
    this.lastTransitionAt = this.clock.now();
  }

  /**
   * Each lower tier's raise threshold must sit strictly above the drop
   * threshold of the tier above it; otherwise the controller oscillates.
   */
  private static validateThresholds(t: LodThresholds, profile: string): LodThresholds {
    const out: LodThresholds = {
      dropFps: { ...t.dropFps },
      raiseFps: { ...t.raiseFps },
    };
    if (!(out.raiseFps.medium > out.dropFps.high)) {
      Logger.warn(`[AdaptiveLOD] Profile "${profile}": medium raise ${out.raiseFps.medium} <= high drop ${out.dropFps.high}, clamped`);
      out.raiseFps.medium = out.dropFps.high + 1;
    }
    if (!(out.raiseFps.low > out.dropFps.medium)) {
      Logger.warn(`[AdaptiveLOD] Profile "${profile}": low raise ${out.raiseFps.low} <= medium drop ${out.dropFps.medium}, clamped`);
      out.raiseFps.low = out.dropFps.medium + 1;
    }
    return out;
  }

  public get mode(): LodMode { return this.currentMode; }

  public get modeChangeCount(): number { return this.changes; }

  public get lastEvaluatedFps(): number | null { return this.lastFps; }

  public get thresholdsInUse(): Readonly<LodThresholds> { return this.thresholds; }

  public config(): Readonly<LodConfig> {
    return this.tiers[this.currentMode];
  }

  public configFor(mode: LodMode): Readonly<LodConfig> {
    return this.tiers[mode];
  }

  public isPerformanceMode(): boolean {
    return this.currentMode !== LodMode.High;
  }

  public isAggressiveMode(): boolean {
    return this.currentMode === LodMode.Low;
  }

  /**
   * Register a dependent; it immediately receives the current tier config.
   * @returns detach function
   */
  public attach(dependent: LodDependent): () => void {
    this.dependents.add(dependent);
    this.applyTo(dependent);
    return () => { this.dependents.delete(dependent); };
  }

  /** Evaluate one FPS reading. Returns the (possibly new) mode. */
  public updateByFps(fps: number): LodMode {
    if (!Number.isFinite(fps) || fps < 0) return this.currentMode;
    this.lastFps = fps;
    const now = this.clock.now();
    if (now - this.lastTransitionAt < this.gracePeriodMs) return this.currentMode;

    if (fps < this.dropFps(this.currentMode)) {
      this.transition(AdaptiveLodController.cheaper(this.currentMode), fps, false);
    } else if (fps > this.raiseFps(this.currentMode)) {
      this.transition(AdaptiveLodController.richer(this.currentMode), fps, false);
    }
    return this.currentMode;
  }

  /** Push the current tier's pool capacities to the pool manager. */
  public configurePools(): void {
    if (this.pools) this.applyTo(this.pools);
  }

  /** Debug override: jumps straight to `mode`, bypassing hysteresis. */
  public forceMode(mode: LodMode): void {
    if (mode === this.currentMode) {
      this.lastTransitionAt = this.clock.now();
      return;
    }
    this.transition(mode, null, true);
  }

  public reset(): void {
    this.forceMode(LodMode.High);
    this.lastFps = null;
  }

  private static cheaper(mode: LodMode): LodMode {
    return mode === LodMode.High ? LodMode.Medium : LodMode.Low;
  }

  private static richer(mode: LodMode): LodMode {
    return mode === LodMode.Low ? LodMode.Medium : LodMode.High;
  }

  private dropFps(mode: LodMode): number {
    switch (mode) {
      case LodMode.High: return this.thresholds.dropFps.high;
      case LodMode.Medium: return this.thresholds.dropFps.medium;
      case LodMode.Low: return -Infinity;
    }
  }

  private raiseFps(mode: LodMode): number {
    switch (mode) {
      case LodMode.High: return Infinity;
      case LodMode.Medium: return this.thresholds.raiseFps.medium;
      case LodMode.Low: return this.thresholds.raiseFps.low;
    }
  }

  private transition(target: LodMode, fps: number | null, forced: boolean): void {
    const from = this.currentMode;
    const at = this.clock.now();
    this.currentMode = target;
    this.lastTransitionAt = at;
    this.changes++;

    this.configurePools();
    for (const dependent of this.dependents) this.applyTo(dependent);

    Logger.info(
      `[AdaptiveLOD] ${lodModeName(from)} -> ${lodModeName(target)}` +
      (forced ? ' (forced)' : ` at ${fps === null ? '?' : fps.toFixed(1)} fps`),
    );
    this.events?.emit('lodChanged', { from, to: target, fps, forced, at });
  }

  private applyTo(dependent: LodDependent): void {
    try {
      dependent.applyLodConfig(this.currentMode, this.tiers[this.currentMode]);
    } catch (e) {
      Logger.error('[AdaptiveLOD] Dependent failed to apply config', e);
    }
  }
}
