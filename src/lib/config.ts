import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { SITE_WEIGHTS, SUBREGION_WEIGHTS } from './scoring';

dotenv.config();

// ==========================================
// DEFAULTS (environment overridable)
// ==========================================

export const DEFAULT_TILE_SIZE_DEG = Number(process.env.TILE_SIZE_DEG || 0.5);
export const DEFAULT_NDVI_THRESHOLD = Number(process.env.NDVI_THRESHOLD || 0.3);
export const DEFAULT_ELEV_THRESHOLD = Number(process.env.ELEV_THRESHOLD || 200);
export const DEFAULT_MIN_AREA_M2 = Number(process.env.MIN_AREA_M2 || 10_000);
export const DEFAULT_VECTOR_SCALE_M = Number(process.env.VECTOR_SCALE_M || 1000);
export const DEFAULT_AGGREGATION_FACTOR = Number(process.env.AGGREGATION_FACTOR || 4);
export const DEFAULT_CELL_SIZE_M = Number(process.env.CELL_SIZE_M || 100);
export const DEFAULT_CELL_SCALE_M = Number(process.env.CELL_SCALE_M || 100);
export const DEFAULT_CELL_AGGREGATION_FACTOR = Number(process.env.CELL_AGGREGATION_FACTOR || 16);
export const DEFAULT_SUBREGION_TOP_K = Number(process.env.SUBREGION_TOP_K || 300);
export const DEFAULT_SITE_TOP_K = Number(process.env.SITE_TOP_K || 25);
export const DEFAULT_CONCURRENCY = Number(process.env.CONCURRENCY || 4);
export const DEFAULT_TILE_TIMEOUT_MS = Number(process.env.TILE_TIMEOUT_MS || 120_000);
export const DEFAULT_MAX_PIXELS = Number(process.env.MAX_PIXELS || 10_000_000);
export const DEFAULT_MODEL_NAME = process.env.MODEL_NAME || 'gemini-1.5-flash';
export const DEFAULT_ADVICE_LIMIT = Number(process.env.ADVICE_LIMIT || 25);

// ==========================================
// SCHEMA
// ==========================================

export const AnalysisStackSchema = z.object({
  imagery: z.object({
    collection: z.string().min(1),
    startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    maxCloudPercent: z.number().min(0).max(100),
    redBand: z.string().min(1),
    nirBand: z.string().min(1),
  }),
  elevation: z.object({
    image: z.string().min(1),
    band: z.string().min(1),
  }),
});

const WeightTableSchema = z.record(z.number().finite()).refine((w) => Object.keys(w).length > 0, {
  message: 'Weight table must name at least one metric',
});

export const PipelineConfigSchema = z.object({
  stack: AnalysisStackSchema,
  tileSizeDeg: z.number().positive(),
  ndviThreshold: z.number().min(-1).max(1),
  elevThreshold: z.number().finite(),
  minArea: z.number().min(0),
  vectorScale: z.number().positive(),
  aggregationFactor: z.number().int().min(1).max(16),
  cellSize: z.number().positive(),
  cellScale: z.number().positive(),
  cellAggregationFactor: z.number().int().min(1).max(16),
  cellBatchSize: z.number().int().positive().optional(),
  subregionTopK: z.number().int().positive(),
  siteTopK: z.number().int().positive(),
  subregionWeights: WeightTableSchema,
  siteWeights: WeightTableSchema,
  concurrency: z.number().int().min(1).max(64),
  tileTimeoutMs: z.number().int().positive(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_STACK: PipelineConfig['stack'] = {
  imagery: {
    collection: process.env.IMAGERY_COLLECTION || 'COPERNICUS/S2_SR_HARMONIZED',
    startDate: process.env.IMAGERY_START || '2024-01-01',
    endDate: process.env.IMAGERY_END || '2024-12-31',
    maxCloudPercent: Number(process.env.MAX_CLOUD_PERCENT || 10),
    redBand: 'B4',
    nirBand: 'B8',
  },
  elevation: {
    image: process.env.ELEVATION_IMAGE || 'USGS/SRTMGL1_003',
    band: 'elevation',
  },
};

export function defaultPipelineConfig(): PipelineConfig {
  return {
    stack: DEFAULT_STACK,
    tileSizeDeg: DEFAULT_TILE_SIZE_DEG,
    ndviThreshold: DEFAULT_NDVI_THRESHOLD,
    elevThreshold: DEFAULT_ELEV_THRESHOLD,
    minArea: DEFAULT_MIN_AREA_M2,
    vectorScale: DEFAULT_VECTOR_SCALE_M,
    aggregationFactor: DEFAULT_AGGREGATION_FACTOR,
    cellSize: DEFAULT_CELL_SIZE_M,
    cellScale: DEFAULT_CELL_SCALE_M,
    cellAggregationFactor: DEFAULT_CELL_AGGREGATION_FACTOR,
    subregionTopK: DEFAULT_SUBREGION_TOP_K,
    siteTopK: DEFAULT_SITE_TOP_K,
    subregionWeights: SUBREGION_WEIGHTS,
    siteWeights: SITE_WEIGHTS,
    concurrency: DEFAULT_CONCURRENCY,
    tileTimeoutMs: DEFAULT_TILE_TIMEOUT_MS,
  };
}

/** Merge overrides onto the defaults and validate the result */
export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse({ ...defaultPipelineConfig(), ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues}`);
  }
  return parsed.data;
}
