/**
 * Per-tile anomaly detection.
 *
 * A tile is masked to sparse-canopy, elevated terrain (NDVI below a threshold
 * and elevation above one), the mask is vectorized, and every polygon gets its
 * mean NDVI, mean elevation and area. Tiles run on a bounded worker pool; a
 * tile that fails or times out is logged and skipped.
 */
import { runWithConcurrency, withTimeout } from './concurrency';
import { PartialTileFailure, TileTimeoutError, logErrorDetails } from './errors';
import { geodesicArea } from './geometry';
import { ELEVATION_BAND, NDVI_BAND, type AnalysisStack, type MaskExpression, type RasterService } from './raster/types';
import type { CandidateSite, Tile } from './types';

// ==========================================
// TYPES
// ==========================================

export type DetectionOptions = {
  stack: AnalysisStack;
  /** Pixels with NDVI below this are candidates */
  ndviThreshold: number;
  /** Pixels with elevation (m) above this are candidates */
  elevThreshold: number;
  /** Polygons at or below this area (m²) are dropped */
  minArea: number;
  /** Vectorization pixel size in metres */
  vectorScale: number;
  aggregationFactor: number;
  signal?: AbortSignal;
};

export type DetectSitesOptions = Omit<DetectionOptions, 'signal'> & {
  concurrency: number;
  tileTimeoutMs: number;
};

export type DetectSitesResult = {
  sites: CandidateSite[];
  failures: PartialTileFailure[];
};

// ==========================================
// SINGLE TILE
// ==========================================

export function anomalyMask(ndviThreshold: number, elevThreshold: number): MaskExpression {
  return {
    all: [
      { band: NDVI_BAND, op: 'lt', value: ndviThreshold },
      { band: ELEVATION_BAND, op: 'gt', value: elevThreshold },
    ],
  };
}

export async function detectInTile(
  service: RasterService,
  tile: Tile,
  options: DetectionOptions
): Promise<CandidateSite[]> {
  const { stack, vectorScale, aggregationFactor, signal } = options;
  const tileIndex = tile.properties.tile_index;

  const vectors = await service.vectorizeMask({
    stack,
    region: tile.geometry,
    mask: anomalyMask(options.ndviThreshold, options.elevThreshold),
    scale: vectorScale,
    aggregationFactor,
    signal,
  });
  console.log(`[Detector] Tile ${tileIndex}: ${vectors.length} raw vectors`);

  const sites: CandidateSite[] = [];
  for (const vector of vectors) {
    const area = geodesicArea(vector.geometry);
    if (!(area > options.minArea)) continue;

    const stats = await service.reduceRegion({
      stack,
      region: vector.geometry,
      bands: [NDVI_BAND, ELEVATION_BAND],
      scale: vectorScale,
      aggregationFactor,
      signal,
    });
    sites.push({
      type: 'Feature',
      geometry: vector.geometry,
      properties: {
        mean_ndvi: stats[NDVI_BAND] ?? null,
        mean_elev: stats[ELEVATION_BAND] ?? null,
        area_m2: area,
        tile_index: tileIndex,
      },
    });
  }
  return sites;
}

// ==========================================
// ALL TILES
// ==========================================

/**
 * Detect across every tile. Tile order in the output is completion order;
 * nothing downstream depends on it.
 */
export async function detectSites(
  service: RasterService,
  tiles: Tile[],
  options: DetectSitesOptions
): Promise<DetectSitesResult> {
  const { concurrency, tileTimeoutMs, ...detection } = options;
  const sites: CandidateSite[] = [];
  const failures: PartialTileFailure[] = [];

  await runWithConcurrency(tiles, concurrency, async (tile, i) => {
    const tileIndex = tile.properties.tile_index;
    console.log(`[Detector] Processing tile ${i + 1}/${tiles.length}...`);
    try {
      const found = await withTimeout(
        (signal) => detectInTile(service, tile, { ...detection, signal }),
        tileTimeoutMs,
        () => new TileTimeoutError(tileIndex, tileTimeoutMs)
      );
      console.log(`[Detector] Tile ${tileIndex}: found ${found.length} sites`);
      sites.push(...found);
    } catch (error) {
      const failure = new PartialTileFailure(tileIndex, error);
      logErrorDetails(`[Detector] ⚠️ `, failure);
      failures.push(failure);
    }
  });

  console.log(`[Detector] Total candidate sites: ${sites.length} (${failures.length} tile(s) failed)`);
  return { sites, failures };
}
