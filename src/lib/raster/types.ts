import type { Feature, FeatureCollection, Polygon } from 'geojson';
import type { Areal, Properties } from '../types';

// ==========================================
// IMAGE SOURCES
// ==========================================

/** Multi-scene optical imagery, composited by median before use */
export type ImagerySource = {
  collection: string;
  startDate: string; // ISO date, inclusive
  endDate: string; // ISO date, inclusive
  maxCloudPercent: number;
  redBand: string;
  nirBand: string;
};

export type ElevationSource = {
  image: string;
  band: string;
};

/**
 * Band stack every request is evaluated against. The backend exposes it as
 * two bands: `NDVI` (normalized difference of NIR and red) and `elevation`.
 */
export type AnalysisStack = {
  imagery: ImagerySource;
  elevation: ElevationSource;
};

export const NDVI_BAND = 'NDVI';
export const ELEVATION_BAND = 'elevation';

export type StackBand = typeof NDVI_BAND | typeof ELEVATION_BAND;

// ==========================================
// REQUESTS
// ==========================================

export type BandThreshold = {
  band: StackBand;
  op: 'lt' | 'gt';
  value: number;
};

/** Pixels pass when every threshold holds */
export type MaskExpression = {
  all: BandThreshold[];
};

type RequestBase = {
  stack: AnalysisStack;
  /** Pixel size in metres */
  scale: number;
  /**
   * Fan-out hint for large reductions. Raises what a request can afford but
   * never changes its result.
   */
  aggregationFactor: number;
  signal?: AbortSignal;
};

export type VectorizeRequest = RequestBase & {
  region: Areal;
  mask: MaskExpression;
};

export type ReduceRegionRequest = RequestBase & {
  region: Areal;
  bands: StackBand[];
};

export type ReduceRegionsRequest = RequestBase & {
  collection: FeatureCollection<Areal, Properties>;
  bands: StackBand[];
};

export type BandMeans = Partial<Record<StackBand, number | null>>;

// ==========================================
// SERVICE
// ==========================================

export interface RasterService {
  /** Masked pixels as 4-connected polygons */
  vectorizeMask(request: VectorizeRequest): Promise<Feature<Polygon, Properties>[]>;

  /** Mean of each band over one region */
  reduceRegion(request: ReduceRegionRequest): Promise<BandMeans>;

  /**
   * Mean of each band over every feature of a collection in one request. Band
   * results land in the feature properties, either under the band name or
   * with a `_mean` suffix depending on the backend.
   */
  reduceRegions(request: ReduceRegionsRequest): Promise<FeatureCollection<Areal, Properties>>;
}
