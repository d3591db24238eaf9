import { Logger, isLogLevel, type LogLevel } from '../core/Logger';
import { isLodProfileName, type LodProfileName } from './lodProfiles';

/** A named pool and its share of the tier's entry/byte budget. */
export interface PoolSpec {
  name: string;
  share: number;
}

export interface RenderCoreConfig {
  lodProfile: LodProfileName;
  /** Minimum dwell time between LOD transitions. */
  gracePeriodMs: number;
  fpsWindowMs: number;
  maxFps: number;
  /** Frame durations above this are idle gaps (tab switch, suspend), not samples. */
  maxSampleMs: number;
  idleAfterMs: number;
  notifyDeltaFps: number;
  frameBudgetMs: number;
  minTaskBudgetMs: number;
  /** Position change (map units) below which an entity counts as unmoved. */
  positionEpsilon: number;
  staleAfterBatches: number;
  gcHintCooldownMs: number;
  maintenanceIntervalMs: number;
  maintenanceTrimRatio: number;
  warmSliceBudgetMs: number;
  /** Pool the warm cycle pre-builds fixed assets into. */
  warmAssetPool: string;
  pools: PoolSpec[];
  enableDiagnostics: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_RENDER_CORE_CONFIG: Readonly<RenderCoreConfig> = Object.freeze({
  lodProfile: 'standard',
  gracePeriodMs: 3000,
  fpsWindowMs: 2000,
  maxFps: 120,
  maxSampleMs: 1000,
  idleAfterMs: 3000,
  notifyDeltaFps: 0,
  frameBudgetMs: 16,
  minTaskBudgetMs: 1,
  positionEpsilon: 1e-7,
  staleAfterBatches: 2,
  gcHintCooldownMs: 2 * 60 * 1000,
  maintenanceIntervalMs: 5 * 60 * 1000,
  maintenanceTrimRatio: 0.8,
  warmSliceBudgetMs: 4,
  warmAssetPool: 'icons',
  pools: [
    { name: 'icons', share: 1 },
    { name: 'clusterBadges', share: 0.5 },
  ],
  enableDiagnostics: false,
  logLevel: 'info',
});

export type RenderCoreConfigOverrides = Partial<RenderCoreConfig>;

export type EnvSource = Record<string, string | undefined>;

type NumericKey = { [K in keyof RenderCoreConfig]: RenderCoreConfig[K] extends number ? K : never }[keyof RenderCoreConfig];

const NUMERIC_BOUNDS: ReadonlyArray<{ key: NumericKey; min: number; max?: number; integer?: boolean }> = [
  { key: 'gracePeriodMs', min: 0 },
  { key: 'fpsWindowMs', min: 1 },
  { key: 'maxFps', min: 1 },
  { key: 'maxSampleMs', min: 1 },
  { key: 'idleAfterMs', min: 0 },
  { key: 'notifyDeltaFps', min: 0 },
  { key: 'frameBudgetMs', min: 1 },
  { key: 'minTaskBudgetMs', min: 0 },
  { key: 'positionEpsilon', min: 0 },
  { key: 'staleAfterBatches', min: 1, integer: true },
  { key: 'gcHintCooldownMs', min: 0 },
  { key: 'maintenanceIntervalMs', min: 1 },
  { key: 'maintenanceTrimRatio', min: 0, max: 1 },
  { key: 'warmSliceBudgetMs', min: 0 },
];

const TRUE_FLAGS = new Set(['1', 'true', 'on', 'yes']);
const FALSE_FLAGS = new Set(['0', 'false', 'off', 'no']);

/** null when unset or unrecognised */
function parseEnvFlag(raw: string | undefined): boolean | null {
  const flag = raw?.trim().toLowerCase();
  if (flag === undefined) return null;
  if (TRUE_FLAGS.has(flag)) return true;
  if (FALSE_FLAGS.has(flag)) return false;
  return null;
}

function processEnv(): EnvSource {
  return typeof process !== 'undefined' && process.env ? process.env : {};
}

function readEnvOverrides(env: EnvSource): RenderCoreConfigOverrides {
  const out: RenderCoreConfigOverrides = {};
  const level = env.RENDER_CORE_LOG_LEVEL?.trim().toLowerCase();
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) out.logLevel = level;
    else Logger.warn(`[Config] Ignoring RENDER_CORE_LOG_LEVEL="${level}"`);
  }
  const diagnostics = parseEnvFlag(env.RENDER_CORE_DIAGNOSTICS);
  if (diagnostics !== null) out.enableDiagnostics = diagnostics;
  const profile = env.RENDER_CORE_LOD_PROFILE?.trim();
  if (profile !== undefined && profile !== '') {
    if (isLodProfileName(profile)) out.lodProfile = profile;
    else Logger.warn(`[Config] Ignoring unknown RENDER_CORE_LOD_PROFILE="${profile}"`);
  }
  return out;
}

function sanitizePools(pools: readonly PoolSpec[]): PoolSpec[] {
  const seen = new Set<string>();
  const out: PoolSpec[] = [];
  for (const p of pools) {
    if (!p.name || seen.has(p.name)) {
      Logger.warn(`[Config] Dropping pool spec with empty or duplicate name "${p.name}"`);
      continue;
    }
    seen.add(p.name);
    let share = p.share;
    if (!Number.isFinite(share) || share < 0) {
      Logger.warn(`[Config] Pool "${p.name}" share ${String(share)} clamped to 0`);
      share = 0;
    }
    out.push({ name: p.name, share });
  }
  return out;
}

/**
 * Merge defaults, environment overrides and explicit overrides (in that order),
 * then clamp every number into its valid range. Invalid values are logged, never thrown.
 */
export function resolveRenderCoreConfig(
  overrides: RenderCoreConfigOverrides = {},
  env: EnvSource = processEnv(),
): RenderCoreConfig {
  const merged: RenderCoreConfig = {
    ...DEFAULT_RENDER_CORE_CONFIG,
    ...readEnvOverrides(env),
    ...overrides,
  };
  const defined: RenderCoreConfig = { ...merged };

  for (const { key, min, max, integer } of NUMERIC_BOUNDS) {
    const raw = merged[key];
    let value = Number.isFinite(raw) ? raw : DEFAULT_RENDER_CORE_CONFIG[key];
    if (integer) value = Math.floor(value);
    if (value < min) value = min;
    if (max !== undefined && value > max) value = max;
    if (value !== raw) {
      Logger.warn(`[Config] ${key}=${String(raw)} out of range, using ${value}`);
    }
    defined[key] = value;
  }

  if (!isLodProfileName(merged.lodProfile)) {
    Logger.warn(`[Config] Unknown lodProfile "${String(merged.lodProfile)}", using "standard"`);
    defined.lodProfile = 'standard';
  }
  if (!isLogLevel(merged.logLevel)) {
    defined.logLevel = DEFAULT_RENDER_CORE_CONFIG.logLevel;
  }
  defined.pools = sanitizePools(Array.isArray(merged.pools) ? merged.pools : DEFAULT_RENDER_CORE_CONFIG.pools);
  return defined;
}
