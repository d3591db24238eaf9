export { RenderCore } from './RenderCore';
export type { RenderCoreOptions, ViewportEvent } from './RenderCore';

export { Logger, isLogLevel } from './core/Logger';
export type { LogLevel, TelemetryHook } from './core/Logger';
export { EventBus } from './core/EventBus';
export type { EventMap, Handler } from './core/EventBus';
export { PreconditionError, formatBytes } from './core/errors';
export { TimerScheduler } from './core/Scheduler';
export type { CancelFn, Clock, Scheduler } from './core/Scheduler';
export { FrameTimeMonitor } from './core/FrameTimeMonitor';
export type { FrameStats, FrameTimeMonitorOptions } from './core/FrameTimeMonitor';
export { formatDiagnostics } from './core/diagnostics';
export type { DiagnosticsSnapshot } from './core/diagnostics';

export { DEFAULT_RENDER_CORE_CONFIG, resolveRenderCoreConfig } from './config/renderCoreConfig';
export type { EnvSource, PoolSpec, RenderCoreConfig, RenderCoreConfigOverrides } from './config/renderCoreConfig';
export { LOD_PROFILES, getLodProfile, isLodProfileName } from './config/lodProfiles';
export type { LodProfileName } from './config/lodProfiles';

export { LodMode, LOD_MODES, lodModeName } from './lod/types';
export type { LodConfig, LodDependent, LodModeName, LodProfile, LodThresholds } from './lod/types';
export { AdaptiveLodController } from './lod/AdaptiveLodController';
export type { AdaptiveLodControllerOptions } from './lod/AdaptiveLodController';
export { UpdateThrottle } from './lod/UpdateThrottle';
export type { ThrottleStats } from './lod/UpdateThrottle';

export { ResourcePool } from './pool/ResourcePool';
export type { EvictHook, EvictionReason, PoolStats, PooledResource, ResourcePoolOptions } from './pool/ResourcePool';
export { ResourcePoolManager } from './pool/ResourcePoolManager';
export type { ResourcePoolManagerOptions } from './pool/ResourcePoolManager';

export { EntityRenderCache, emptyDiffResult } from './render/EntityRenderCache';
export type {
  BuildFn,
  DiffFilter,
  DiffResult,
  EntityCacheStats,
  EntityChange,
  EntitySnapshot,
  EntityUpdate,
  Position,
  StateFields,
  StateValue,
} from './render/EntityRenderCache';

export { IdleTaskScheduler, TaskPriority } from './systems/IdleTaskScheduler';
export type { IdleTask, IdleTaskSchedulerOptions, IdleTaskStats } from './systems/IdleTaskScheduler';
export { StartupWarmCycle } from './systems/StartupWarmCycle';
export type { WarmProgress, WarmState, WarmStep, WarmSummary } from './systems/StartupWarmCycle';
export { createDefaultWarmSteps, tileForPosition, tileRing } from './systems/warmSteps';
export type { PrebuiltAsset, TileCoord, TilePrefetcher, VisualAssetFactory, WarmContext } from './systems/warmSteps';
