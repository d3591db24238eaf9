/** Ordered quality tiers; a higher value means cheaper rendering. */
export enum LodMode {
  High = 0,
  Medium = 1,
  Low = 2,
}

export const LOD_MODES: readonly LodMode[] = [LodMode.High, LodMode.Medium, LodMode.Low];

export type LodModeName = 'high' | 'medium' | 'low';

export function lodModeName(mode: LodMode): LodModeName {
  switch (mode) {
    case LodMode.High: return 'high';
    case LodMode.Medium: return 'medium';
    case LodMode.Low: return 'low';
  }
}

/** Per-tier limits handed to whatever builds geometry, and to pools/throttle/cache. */
export interface LodConfig {
  /** Maximum entities rendered; `null` means unbounded. */
  entityCap: number | null;
  /** Polyline simplification tolerance (0 = none). */
  simplificationEpsilon: number;
  poolCapacityEntries: number;
  poolCapacityBytes: number;
  /** Minimum gap between accepted high-frequency triggers (0 = unthrottled). */
  updateThrottleMs: number;
}

/**
 * FPS thresholds. Dropping from a tier happens below its `dropFps`,
 * raising out of a tier happens above its `raiseFps`.
 * The lower tier's raise threshold must sit strictly above the upper tier's drop threshold.
 */
export interface LodThresholds {
  dropFps: { high: number; medium: number };
  raiseFps: { medium: number; low: number };
}

export interface LodProfile {
  name: string;
  thresholds: LodThresholds;
  tiers: Record<LodMode, LodConfig>;
}

/** Anything reconfigured synchronously on a confirmed LOD transition. */
export interface LodDependent {
  applyLodConfig(mode: LodMode, config: Readonly<LodConfig>): void;
}
