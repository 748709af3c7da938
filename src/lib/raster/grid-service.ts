/**
 * In-process RasterService over georeferenced grids.
 *
 * Requests are evaluated on a sampling lattice laid over the request region
 * at the requested scale; a lattice pixel belongs to the region when its
 * centre falls inside it. Source grids are read nearest-pixel.
 */
import * as turf from '@turf/turf';
import type { Feature, FeatureCollection, Polygon } from 'geojson';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { ConfigurationError, RasterLimitError } from '../errors';
import { bboxOf, metresToDegrees } from '../geometry';
import type { Areal, Properties } from '../types';
import { medianComposite, normalizedDifference, sampleGrid, type RasterCatalogue, type RasterGrid } from './grid';
import {
  ELEVATION_BAND,
  NDVI_BAND,
  type AnalysisStack,
  type BandMeans,
  type RasterService,
  type ReduceRegionRequest,
  type ReduceRegionsRequest,
  type StackBand,
  type VectorizeRequest,
} from './types';
import { polygonizeMask, type Lattice } from './vectorize';

// ==========================================
// TYPES
// ==========================================

export type GridServiceConfig = {
  catalogue: RasterCatalogue;
  /** Lattice pixels one request may touch at aggregationFactor 1 (default: 10M) */
  maxPixels?: number;
  /** Report reduced bands as `<band>_mean` instead of `<band>` */
  suffixReducedBands?: boolean;
  /** Enable debug logging */
  debug?: boolean;
};

type BandLayer = {
  grid: RasterGrid;
  values: Float64Array;
};

type ResolvedStack = Record<StackBand, BandLayer>;

// Rows processed between event-loop yields, so timeouts and aborts can land
const ROWS_PER_YIELD = 64;

// ==========================================
// SERVICE
// ==========================================

export class GridRasterService implements RasterService {
  private config: Required<GridServiceConfig>;
  private stacks = new Map<string, ResolvedStack>();

  constructor(config: GridServiceConfig) {
    this.config = {
      catalogue: config.catalogue,
      maxPixels: config.maxPixels ?? 10_000_000,
      suffixReducedBands: config.suffixReducedBands ?? false,
      debug: config.debug ?? false,
    };
  }

  async vectorizeMask(request: VectorizeRequest): Promise<Feature<Polygon, Properties>[]> {
    const { region, mask, signal } = request;
    const stack = this.resolveStack(request.stack);
    const lattice = this.buildLattice(region, request.scale, request.aggregationFactor);
    const { width, height, west, north, dx, dy } = lattice;

    const pixels = new Uint8Array(width * height);
    for (let row = 0; row < height; row++) {
      if (row % ROWS_PER_YIELD === 0) await this.checkpoint(signal);
      const lat = north - (row + 0.5) * dy;
      for (let col = 0; col < width; col++) {
        const lon = west + (col + 0.5) * dx;
        if (!turf.booleanPointInPolygon([lon, lat], region)) continue;
        const passes = mask.all.every(({ band, op, value }) => {
          const layer = stack[band];
          const sample = sampleGrid(layer.grid, layer.values, lon, lat);
          if (Number.isNaN(sample)) return false;
          return op === 'lt' ? sample < value : sample > value;
        });
        if (passes) pixels[row * width + col] = 1;
      }
    }

    const polygons = polygonizeMask(pixels, lattice);
    this.log(`vectorizeMask: ${width}x${height} lattice -> ${polygons.length} polygons`);
    return polygons.map((geometry, i): Feature<Polygon, Properties> => ({
      type: 'Feature',
      geometry,
      properties: { label: i + 1 },
    }));
  }

  async reduceRegion(request: ReduceRegionRequest): Promise<BandMeans> {
    const stack = this.resolveStack(request.stack);
    return this.meanOver(stack, request.region, request.bands, request.scale, request.aggregationFactor, request.signal);
  }

  async reduceRegions(request: ReduceRegionsRequest): Promise<FeatureCollection<Areal, Properties>> {
    const stack = this.resolveStack(request.stack);
    const features: Feature<Areal, Properties>[] = [];

    for (const feature of request.collection.features) {
      const means = await this.meanOver(
        stack,
        feature.geometry,
        request.bands,
        request.scale,
        request.aggregationFactor,
        request.signal
      );
      const properties: Properties = { ...feature.properties };
      for (const band of request.bands) {
        const key = this.config.suffixReducedBands ? `${band}_mean` : band;
        properties[key] = means[band] ?? null;
      }
      features.push({ type: 'Feature', geometry: feature.geometry, properties });
    }

    this.log(`reduceRegions: ${features.length} features`);
    return { type: 'FeatureCollection', features };
  }

  // ==========================================
  // Private Methods
  // ==========================================

  private async meanOver(
    stack: ResolvedStack,
    region: Areal,
    bands: StackBand[],
    scale: number,
    aggregationFactor: number,
    signal?: AbortSignal
  ): Promise<BandMeans> {
    const { width, height, west, north, dx, dy } = this.buildLattice(region, scale, aggregationFactor);
    const sums = bands.map(() => 0);
    const counts = bands.map(() => 0);
    let covered = 0;

    const accumulate = (lon: number, lat: number) => {
      bands.forEach((band, i) => {
        const layer = stack[band];
        const value = sampleGrid(layer.grid, layer.values, lon, lat);
        if (!Number.isNaN(value)) {
          sums[i] += value;
          counts[i] += 1;
        }
      });
    };

    for (let row = 0; row < height; row++) {
      if (row % ROWS_PER_YIELD === 0) await this.checkpoint(signal);
      const lat = north - (row + 0.5) * dy;
      for (let col = 0; col < width; col++) {
        const lon = west + (col + 0.5) * dx;
        if (!turf.booleanPointInPolygon([lon, lat], region)) continue;
        covered++;
        accumulate(lon, lat);
      }
    }

    // Regions smaller than one lattice pixel still get a value
    if (covered === 0) {
      const [lon, lat] = turf.pointOnFeature(region).geometry.coordinates;
      accumulate(lon, lat);
    }

    const means: BandMeans = {};
    bands.forEach((band, i) => {
      means[band] = counts[i] > 0 ? sums[i] / counts[i] : null;
    });
    return means;
  }

  private buildLattice(region: Areal, scale: number, aggregationFactor: number): Lattice {
    if (!(scale > 0)) {
      throw new ConfigurationError(`Scale must be positive (got ${scale})`);
    }
    const [west, south, east, north] = bboxOf(region);
    const { dLon, dLat } = metresToDegrees(scale, (south + north) / 2);
    const width = Math.max(1, Math.ceil((east - west) / dLon - 1e-9));
    const height = Math.max(1, Math.ceil((north - south) / dLat - 1e-9));

    const pixels = width * height;
    const budget = this.config.maxPixels * Math.max(1, aggregationFactor);
    if (pixels > budget) {
      throw new RasterLimitError(
        `Request needs ${pixels} pixels at ${scale}m, over the budget of ${budget}`,
        pixels,
        budget
      );
    }
    return { west, north, dx: dLon, dy: dLat, width, height };
  }

  private resolveStack(stack: AnalysisStack): ResolvedStack {
    const key = JSON.stringify(stack);
    const cached = this.stacks.get(key);
    if (cached) return cached;

    const { imagery, elevation } = stack;
    const scenes = this.config.catalogue.collections[imagery.collection];
    if (!scenes) {
      throw new ConfigurationError(`Unknown imagery collection "${imagery.collection}"`);
    }
    const selected = scenes.filter(
      (scene) =>
        scene.date >= imagery.startDate && scene.date <= imagery.endDate && scene.cloudPercent < imagery.maxCloudPercent
    );
    if (selected.length === 0) {
      throw new ConfigurationError(
        `No scenes in "${imagery.collection}" between ${imagery.startDate} and ${imagery.endDate} under ${imagery.maxCloudPercent}% cloud`
      );
    }
    const composite = medianComposite(
      selected.map((scene) => scene.grid),
      [imagery.redBand, imagery.nirBand]
    );

    const dem = this.config.catalogue.images[elevation.image];
    if (!dem) {
      throw new ConfigurationError(`Unknown elevation image "${elevation.image}"`);
    }
    const heights = dem.bands[elevation.band];
    if (!heights) {
      throw new ConfigurationError(`Elevation image "${elevation.image}" has no band "${elevation.band}"`);
    }

    const resolved: ResolvedStack = {
      [NDVI_BAND]: { grid: composite, values: normalizedDifference(composite, imagery.nirBand, imagery.redBand) },
      [ELEVATION_BAND]: { grid: dem, values: heights },
    };
    this.stacks.set(key, resolved);
    this.log(`Composited ${selected.length} scene(s) from ${imagery.collection}`);
    return resolved;
  }

  private async checkpoint(signal?: AbortSignal) {
    signal?.throwIfAborted();
    await yieldToEventLoop();
    signal?.throwIfAborted();
  }

  private log(message: string) {
    if (this.config.debug) {
      console.log(`[GridRasterService] ${message}`);
    }
  }
}
