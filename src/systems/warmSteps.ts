import { Logger } from '../core/Logger';
import type { LodMode } from '../lod/types';
import type { ResourcePoolManager } from '../pool/ResourcePoolManager';
import type { Position } from '../render/EntityRenderCache';
import type { WarmStep } from './StartupWarmCycle';

export interface WarmContext {
  center: Position;
  zoom: number;
}

export interface TileCoord {
  x: number;
  y: number;
  z: number;
}

/** External tile loader; the core only decides which tiles to ask for. */
export interface TilePrefetcher {
  prefetch(tiles: TileCoord[]): void;
}

export interface PrebuiltAsset<T> {
  key: string;
  payload: T;
  sizeBytes: number;
}

/** Builds the fixed visual assets (icons, badges) needed before the first frame. */
export interface VisualAssetFactory<T> {
  buildFixedAssets(mode: LodMode): PrebuiltAsset<T>[];
}

const MAX_ZOOM = 22;
const MAX_LAT = 85.05112878;

/** Slippy-map tile containing a point. */
export function tileForPosition(position: Position, zoom: number): TileCoord {
  const z = Math.max(0, Math.min(MAX_ZOOM, Math.floor(zoom)));
  const n = 2 ** z;
  const lat = Math.max(-MAX_LAT, Math.min(MAX_LAT, position.lat));
  const latRad = (lat * Math.PI) / 180;
  const x = Math.floor(((position.lng + 180) / 360) * n);
  const y = Math.floor(((1 - Math.log(Math.tan(latRad) + 1 / Math.cos(latRad)) / Math.PI) / 2) * n);
  return {
    x: ((x % n) + n) % n,
    y: Math.max(0, Math.min(n - 1, y)),
    z,
  };
}

/**
 * Tiles in a (2r+1)² square around the center tile, row by row.
 * x wraps around the antimeridian; rows past the poles are dropped.
 */
export function tileRing(center: Position, zoom: number, radius = 1): TileCoord[] {
  const c = tileForPosition(center, zoom);
  const n = 2 ** c.z;
  const seen = new Set<string>();
  const out: TileCoord[] = [];
  for (let dy = -radius; dy <= radius; dy++) {
    const y = c.y + dy;
    if (y < 0 || y >= n) continue;
    for (let dx = -radius; dx <= radius; dx++) {
      const x = (((c.x + dx) % n) + n) % n;
      const key = `${x}/${y}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ x, y, z: c.z });
    }
  }
  return out;
}

export interface DefaultWarmStepDeps<T> {
  pools: ResourcePoolManager<T>;
  assetPool: string;
  controller: { readonly mode: LodMode; configurePools(): void };
  assets?: VisualAssetFactory<T>;
  prefetcher?: TilePrefetcher;
}

/** Standard warm-up: fixed assets, pool capacities, neighbouring tiles. Steps without a collaborator are left out. */
export function createDefaultWarmSteps<T>(deps: DefaultWarmStepDeps<T>): WarmStep<WarmContext>[] {
  const steps: WarmStep<WarmContext>[] = [];
  const { assets, prefetcher } = deps;

  if (assets) {
    steps.push({
      name: 'prebuild-assets',
      run: () => {
        const pool = deps.pools.pool(deps.assetPool);
        if (!pool) {
          Logger.warn(`[WarmCycle] Asset pool "${deps.assetPool}" is not registered`);
          return;
        }
        let retained = 0;
        const built = assets.buildFixedAssets(deps.controller.mode);
        for (const asset of built) {
          if (pool.put(asset.key, asset.payload, asset.sizeBytes)) retained++;
        }
        Logger.debug(`[WarmCycle] Prebuilt ${retained}/${built.length} fixed assets`);
      },
    });
  }

  steps.push({
    name: 'configure-pools',
    run: () => deps.controller.configurePools(),
  });

  if (prefetcher) {
    steps.push({
      name: 'prefetch-tiles',
      run: (context) => {
        const tiles = tileRing(context.center, context.zoom);
        prefetcher.prefetch(tiles);
      },
    });
  }

  return steps;
}
