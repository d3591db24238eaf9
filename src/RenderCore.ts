import { Logger } from './core/Logger';
import { EventBus } from './core/EventBus';
import { FrameTimeMonitor } from './core/FrameTimeMonitor';
import { TimerScheduler, type CancelFn, type Scheduler } from './core/Scheduler';
import { formatDiagnostics, type DiagnosticsSnapshot } from './core/diagnostics';
import {
  resolveRenderCoreConfig,
  type EnvSource,
  type RenderCoreConfig,
  type RenderCoreConfigOverrides,
} from './config/renderCoreConfig';
import { AdaptiveLodController } from './lod/AdaptiveLodController';
import { UpdateThrottle } from './lod/UpdateThrottle';
import { LodMode, lodModeName, type LodProfile } from './lod/types';
import { ResourcePoolManager } from './pool/ResourcePoolManager';
import type { EvictHook } from './pool/ResourcePool';
import {
  EntityRenderCache,
  emptyDiffResult,
  type BuildFn,
  type DiffFilter,
  type DiffResult,
  type EntityUpdate,
  type Position,
} from './render/EntityRenderCache';
import { IdleTaskScheduler, TaskPriority } from './systems/IdleTaskScheduler';
import { StartupWarmCycle, type WarmProgress, type WarmStep, type WarmSummary } from './systems/StartupWarmCycle';
import {
  createDefaultWarmSteps,
  type TilePrefetcher,
  type VisualAssetFactory,
  type WarmContext,
} from './systems/warmSteps';

export interface ViewportEvent {
  center: Position;
  zoom: number;
}

export interface RenderCoreOptions<T> {
  /** Builds the visual object for an entity. */
  build: BuildFn<T>;
  dispose?: (object: T, id: string) => void;
  scheduler?: Scheduler;
  config?: RenderCoreConfigOverrides;
  env?: EnvSource;
  /** Custom profile; takes precedence over `config.lodProfile`. */
  profile?: LodProfile;
  assets?: VisualAssetFactory<T>;
  prefetcher?: TilePrefetcher;
  /** Replaces the default warm-up steps. */
  warmSteps?: WarmStep<WarmContext>[];
  gcHint?: (reason: string) => void;
  onPoolEvict?: EvictHook<T>;
}

const isValidView = (view: ViewportEvent): boolean =>
  Number.isFinite(view.center.lat) && Number.isFinite(view.center.lng) && Number.isFinite(view.zoom);

/**
 * Composition root: builds every component for one map view, wires them
 * together and exposes the host hooks. Components, pools and events belong
 * to one core; the log level is process-wide, so the most recently built
 * core's `logLevel` wins.
 */
export class RenderCore<T> {
  public readonly config: RenderCoreConfig;
  public readonly events = new EventBus();
  public readonly scheduler: Scheduler;
  public readonly monitor: FrameTimeMonitor;
  public readonly controller: AdaptiveLodController;
  public readonly pools: ResourcePoolManager<T>;
  public readonly cache: EntityRenderCache<T>;
  public readonly viewportThrottle: UpdateThrottle;
  public readonly idle: IdleTaskScheduler;
  public readonly warmCycle: StartupWarmCycle<WarmContext>;

  private maintenanceTimer: CancelFn | null = null;
  private disposed = false;

  constructor(opts: RenderCoreOptions<T>) {
    this.config = resolveRenderCoreConfig(opts.config, opts.env);
    Logger.setLogLevel(this.config.logLevel);
    this.scheduler = opts.scheduler ?? new TimerScheduler();
    const cfg = this.config;

    this.pools = new ResourcePoolManager<T>({
      pools: cfg.pools,
      clock: this.scheduler,
      events: this.events,
      onEvict: opts.onPoolEvict,
    });
    this.controller = new AdaptiveLodController({
      clock: this.scheduler,
      profile: opts.profile ?? cfg.lodProfile,
      gracePeriodMs: cfg.gracePeriodMs,
      pools: this.pools,
      events: this.events,
    });
    this.monitor = new FrameTimeMonitor(this.scheduler, {
      windowMs: cfg.fpsWindowMs,
      maxFps: cfg.maxFps,
      maxSampleMs: cfg.maxSampleMs,
      idleAfterMs: cfg.idleAfterMs,
      notifyDeltaFps: cfg.notifyDeltaFps,
      droppedFrameMs: cfg.frameBudgetMs * 2,
      onFps: (fps) => { this.controller.updateByFps(fps); },
    });
    this.cache = new EntityRenderCache<T>({
      build: opts.build,
      dispose: opts.dispose,
      positionEpsilon: cfg.positionEpsilon,
      staleAfterBatches: cfg.staleAfterBatches,
      enableDiagnostics: cfg.enableDiagnostics,
    });
    this.viewportThrottle = new UpdateThrottle('viewport', this.scheduler, {
      [LodMode.High]: this.controller.configFor(LodMode.High).updateThrottleMs,
      [LodMode.Medium]: this.controller.configFor(LodMode.Medium).updateThrottleMs,
      [LodMode.Low]: this.controller.configFor(LodMode.Low).updateThrottleMs,
    });
    this.idle = new IdleTaskScheduler({
      scheduler: this.scheduler,
      frameBudgetMs: cfg.frameBudgetMs,
      minTaskBudgetMs: cfg.minTaskBudgetMs,
      gcHintCooldownMs: cfg.gcHintCooldownMs,
      gcHint: opts.gcHint,
      events: this.events,
    });
    this.warmCycle = new StartupWarmCycle<WarmContext>({
      idle: this.idle,
      clock: this.scheduler,
      sliceBudgetMs: cfg.warmSliceBudgetMs,
      events: this.events,
      steps: opts.warmSteps ?? createDefaultWarmSteps<T>({
        pools: this.pools,
        assetPool: cfg.warmAssetPool,
        controller: this.controller,
        assets: opts.assets,
        prefetcher: opts.prefetcher,
      }),
    });

    this.controller.configurePools();
    this.controller.attach(this.cache);
    this.controller.attach(this.viewportThrottle);
    this.monitor.start();
    Logger.info(`[RenderCore] Ready (profile ${this.controller.profileName}, ${this.pools.names().length} pool(s))`);
  }

  public get mode(): LodMode { return this.controller.mode; }

  public get isDisposed(): boolean { return this.disposed; }

  /** Per-frame hook: sample, evaluate LOD, then spend what is left of the frame on idle work. */
  public onFrame(durationMs: number): LodMode {
    if (this.disposed) return this.controller.mode;
    this.monitor.onSample(durationMs);
    this.idle.runSlot(durationMs);
    return this.controller.mode;
  }

  public applyEntityBatch(
    updates: ReadonlyArray<EntityUpdate>,
    selectedIds?: ReadonlySet<string>,
    filter?: DiffFilter,
  ): DiffResult<T> {
    if (this.disposed) return emptyDiffResult<T>();
    return this.cache.diff(updates, selectedIds, filter);
  }

  /** @returns whether the caller should act on this viewport change */
  public onViewportChange(event: ViewportEvent): boolean {
    if (this.disposed) return false;
    if (!isValidView(event)) {
      Logger.debug('[RenderCore] Ignoring malformed viewport event');
      return false;
    }
    return this.viewportThrottle.tryAccept();
  }

  public warmUp(
    context: WarmContext,
    onComplete?: (summary: WarmSummary) => void,
    onProgress?: (progress: WarmProgress) => void,
  ): boolean {
    if (this.disposed) return false;
    if (!isValidView(context)) {
      Logger.warn('[RenderCore] Ignoring warm-up with a non-finite center or zoom');
      return false;
    }
    return this.warmCycle.run(context, onComplete, onProgress);
  }

  public cancelWarmUp(): boolean {
    return this.warmCycle.cancel();
  }

  /** Periodic Low-priority pool trim plus an advisory GC hint. */
  public startMaintenance(): void {
    if (this.disposed || this.maintenanceTimer) return;
    const tick = (): void => {
      this.maintenanceTimer = this.scheduler.scheduleOnce(this.config.maintenanceIntervalMs, tick);
      this.idle.scheduleTask(() => this.runMaintenance(), TaskPriority.Low, 'maintenance');
    };
    this.maintenanceTimer = this.scheduler.scheduleOnce(this.config.maintenanceIntervalMs, tick);
  }

  public stopMaintenance(): void {
    this.maintenanceTimer?.();
    this.maintenanceTimer = null;
  }

  public diagnostics(): DiagnosticsSnapshot {
    const entityCache = this.cache.stats();
    return {
      fps: this.monitor.fps,
      mode: this.controller.mode,
      modeName: lodModeName(this.controller.mode),
      modeChangeCount: this.controller.modeChangeCount,
      cacheHitRate: entityCache.efficiency,
      entityCache,
      poolStats: this.pools.stats(),
      throttleStats: [this.viewportThrottle.stats()],
      idleTaskStats: this.idle.stats(),
      frameStats: this.monitor.stats(),
      warmUp: { state: this.warmCycle.state, progress: this.warmCycle.progress },
    };
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopMaintenance();
    this.warmCycle.cancel();
    this.idle.shutdown();
    this.monitor.stop();
    this.cache.clear();
    this.pools.clearAll();
    this.events.clear();
    Logger.info('[RenderCore] Disposed');
  }

  private runMaintenance(): void {
    const evicted = this.pools.trimAll(this.config.maintenanceTrimRatio);
    this.idle.maybeGcHint('idle-maintenance');
    Logger.debug(`[RenderCore] Maintenance trimmed ${evicted} pooled resource(s)`);
    if (this.config.enableDiagnostics) {
      Logger.info(`[RenderCore] Diagnostics\n${formatDiagnostics(this.diagnostics()).join('\n')}`);
    }
  }
}
