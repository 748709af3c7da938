import type { Feature } from 'geojson';
import { EmptyResultError } from './errors';
import { ELEVATION_BAND, NDVI_BAND, type AnalysisStack, type RasterService, type StackBand } from './raster/types';
import type { AnalysisCell, Areal, Properties, Scalar } from './types';

export type AggregateOptions = {
  stack: AnalysisStack;
  /** Reduction pixel size in metres */
  scale: number;
  aggregationFactor: number;
  /** Cells per reduceRegions request (default: all at once) */
  batchSize?: number;
  signal?: AbortSignal;
};

export type CellRecord = Feature<Areal, Properties & { mean_ndvi: number | null; mean_elev: number | null }>;

/** Backend band → canonical record field */
const CANONICAL_FIELDS: Record<StackBand, string> = {
  [NDVI_BAND]: 'mean_ndvi',
  [ELEVATION_BAND]: 'mean_elev',
};

function toMetric(value: Scalar | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Fold `<band>` / `<band>_mean` into the canonical field and drop the raw
 * names. Everything else on the feature passes through untouched.
 */
export function normalizeReducedProperties(properties: Properties): CellRecord['properties'] {
  const out: Properties = {};
  const bandKeys = new Set<string>();
  for (const band of Object.keys(CANONICAL_FIELDS)) {
    bandKeys.add(band);
    bandKeys.add(`${band}_mean`);
  }
  for (const [key, value] of Object.entries(properties)) {
    if (!bandKeys.has(key)) out[key] = value;
  }
  const ndvi = toMetric(properties[NDVI_BAND]) ?? toMetric(properties[`${NDVI_BAND}_mean`]);
  const elev = toMetric(properties[ELEVATION_BAND]) ?? toMetric(properties[`${ELEVATION_BAND}_mean`]);
  return { ...out, mean_ndvi: ndvi, mean_elev: elev };
}

/**
 * Mean NDVI and elevation for every cell through bulk reduceRegions calls.
 * A batch that comes back empty is an error: it means the request itself
 * was unusable, and the batch bounds are reported so it can be retried narrower.
 */
export async function aggregateCellStats(
  service: RasterService,
  cells: AnalysisCell[],
  options: AggregateOptions
): Promise<CellRecord[]> {
  const batchSize = Math.max(1, options.batchSize ?? cells.length);
  const records: CellRecord[] = [];

  for (let start = 0, batch = 0; start < cells.length; start += batchSize, batch++) {
    const end = Math.min(start + batchSize, cells.length);
    console.log(`[Aggregator] reduceRegions batch ${batch} (cells ${start}-${end - 1})...`);

    const result = await service.reduceRegions({
      stack: options.stack,
      collection: { type: 'FeatureCollection', features: cells.slice(start, end) },
      bands: [NDVI_BAND, ELEVATION_BAND],
      scale: options.scale,
      aggregationFactor: options.aggregationFactor,
      signal: options.signal,
    });

    if (result.features.length === 0) {
      throw new EmptyResultError(`reduceRegions returned no features for ${end - start} cells`, {
        index: batch,
        start,
        end,
      });
    }

    for (const feature of result.features) {
      records.push({
        type: 'Feature',
        geometry: feature.geometry,
        properties: normalizeReducedProperties(feature.properties),
      });
    }
  }

  console.log(`[Aggregator] ${records.length} cell records`);
  return records;
}
