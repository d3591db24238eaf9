/**
 * LOD profiles: hysteresis thresholds plus per-tier limits.
 * Values are product-tuning defaults; every number can be overridden.
 */
import { LodMode, type LodProfile } from '../lod/types';

const MB = 1024 * 1024;

export const LOD_PROFILES = {
  // Typical devices
  standard: {
    name: 'standard',
    thresholds: {
      dropFps: { high: 50, medium: 45 },
      raiseFps: { medium: 58, low: 60 },
    },
    tiers: {
      [LodMode.High]: { entityCap: null, simplificationEpsilon: 0, poolCapacityEntries: 100, poolCapacityBytes: 30 * MB, updateThrottleMs: 0 },
      [LodMode.Medium]: { entityCap: 900, simplificationEpsilon: 1.5, poolCapacityEntries: 50, poolCapacityBytes: 20 * MB, updateThrottleMs: 30 },
      [LodMode.Low]: { entityCap: 400, simplificationEpsilon: 3.0, poolCapacityEntries: 30, poolCapacityBytes: 10 * MB, updateThrottleMs: 150 },
    },
  },
  // Low-end devices: drop earlier, tighter caps
  lowEnd: {
    name: 'lowEnd',
    thresholds: {
      dropFps: { high: 45, medium: 40 },
      raiseFps: { medium: 55, low: 57 },
    },
    tiers: {
      [LodMode.High]: { entityCap: null, simplificationEpsilon: 0, poolCapacityEntries: 50, poolCapacityBytes: 20 * MB, updateThrottleMs: 0 },
      [LodMode.Medium]: { entityCap: 600, simplificationEpsilon: 2.5, poolCapacityEntries: 30, poolCapacityBytes: 10 * MB, updateThrottleMs: 50 },
      [LodMode.Low]: { entityCap: 250, simplificationEpsilon: 5.0, poolCapacityEntries: 20, poolCapacityBytes: 6 * MB, updateThrottleMs: 250 },
    },
  },
  // High-end devices: drop quickly on any dip but keep more detail per tier
  highEnd: {
    name: 'highEnd',
    thresholds: {
      dropFps: { high: 55, medium: 50 },
      raiseFps: { medium: 58, low: 60 },
    },
    tiers: {
      [LodMode.High]: { entityCap: null, simplificationEpsilon: 0, poolCapacityEntries: 150, poolCapacityBytes: 48 * MB, updateThrottleMs: 0 },
      [LodMode.Medium]: { entityCap: 1200, simplificationEpsilon: 1.0, poolCapacityEntries: 100, poolCapacityBytes: 30 * MB, updateThrottleMs: 16 },
      [LodMode.Low]: { entityCap: 600, simplificationEpsilon: 2.0, poolCapacityEntries: 50, poolCapacityBytes: 16 * MB, updateThrottleMs: 100 },
    },
  },
} as const satisfies Record<string, LodProfile>;

export type LodProfileName = keyof typeof LOD_PROFILES;

export function isLodProfileName(value: unknown): value is LodProfileName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOD_PROFILES, value);
}

/** Deep copy so callers can tweak a profile without touching the shared table. */
export function getLodProfile(name: LodProfileName): LodProfile {
  const src: LodProfile = LOD_PROFILES[name];
  return {
    name: src.name,
    thresholds: {
      dropFps: { ...src.thresholds.dropFps },
      raiseFps: { ...src.thresholds.raiseFps },
    },
    tiers: {
      [LodMode.High]: { ...src.tiers[LodMode.High] },
      [LodMode.Medium]: { ...src.tiers[LodMode.Medium] },
      [LodMode.Low]: { ...src.tiers[LodMode.Low] },
    },
  };
}
