import type { BBox } from '../types';

// ==========================================
// TYPES
// ==========================================

/**
 * Georeferenced raster in EPSG:4326. Row 0 is the northern edge; no-data
 * pixels hold NaN.
 */
export type RasterGrid = {
  width: number;
  height: number;
  bbox: BBox;
  bands: Record<string, Float64Array>;
};

export type ImageryScene = {
  id: string;
  date: string;
  cloudPercent: number;
  grid: RasterGrid;
};

export type RasterCatalogue = {
  collections: Record<string, ImageryScene[]>;
  images: Record<string, RasterGrid>;
};

// ==========================================
// SAMPLING
// ==========================================

/** Nearest-pixel value at a position, NaN outside the grid */
export function sampleGrid(grid: RasterGrid, band: Float64Array, lon: number, lat: number): number {
  const [west, south, east, north] = grid.bbox;
  if (lon < west || lon > east || lat < south || lat > north) return NaN;
  const col = Math.min(grid.width - 1, Math.floor(((lon - west) / (east - west)) * grid.width));
  const row = Math.min(grid.height - 1, Math.floor(((north - lat) / (north - south)) * grid.height));
  return band[row * grid.width + col];
}

export function sameFootprint(a: RasterGrid, b: RasterGrid): boolean {
  return a.width === b.width && a.height === b.height && a.bbox.every((v, i) => v === b.bbox[i]);
}

// ==========================================
// COMPOSITING
// ==========================================

function median(values: number[]): number {
  if (values.length === 0) return NaN;
  values.sort((a, b) => a - b);
  const mid = Math.floor(values.length / 2);
  return values.length % 2 === 1 ? values[mid] : (values[mid - 1] + values[mid]) / 2;
}

/**
 * Per-pixel median across scenes, skipping no-data. Scenes must share one
 * footprint.
 */
export function medianComposite(scenes: RasterGrid[], bands: string[]): RasterGrid {
  if (scenes.length === 0) {
    throw new Error('Cannot composite an empty scene list');
  }
  const [first] = scenes;
  for (const scene of scenes) {
    if (!sameFootprint(first, scene)) {
      throw new Error('Scenes in a composite must share the same grid footprint');
    }
  }

  const size = first.width * first.height;
  const out: Record<string, Float64Array> = {};
  for (const band of bands) {
    const layers = scenes.map((scene) => {
      const layer = scene.bands[band];
      if (!layer) throw new Error(`Scene is missing band "${band}"`);
      return layer;
    });
    const values = new Float64Array(size);
    const stack: number[] = [];
    for (let i = 0; i < size; i++) {
      stack.length = 0;
      for (const layer of layers) {
        if (!Number.isNaN(layer[i])) stack.push(layer[i]);
      }
      values[i] = median(stack);
    }
    out[band] = values;
  }
  return { width: first.width, height: first.height, bbox: first.bbox, bands: out };
}

/** (nir - red) / (nir + red), NaN where the sum is zero or data is missing */
export function normalizedDifference(grid: RasterGrid, nirBand: string, redBand: string): Float64Array {
  const nir = grid.bands[nirBand];
  const red = grid.bands[redBand];
  if (!nir || !red) {
    throw new Error(`Grid is missing band "${nir ? redBand : nirBand}"`);
  }
  const out = new Float64Array(nir.length);
  for (let i = 0; i < nir.length; i++) {
    const sum = nir[i] + red[i];
    out[i] = sum === 0 ? NaN : (nir[i] - red[i]) / sum;
  }
  return out;
}
