// FILE: src/lib/__tests__/fixtures.ts
// Synthetic rasters shared by the backend, detector and pipeline tests.

import type { Polygon, Position } from 'geojson';
import type { ImageryScene, RasterCatalogue, RasterGrid } from '../raster/grid';
import type { AnalysisStack } from '../raster/types';
import type { BBox, Properties, RecordFeature } from '../types';

// ============================================================================
// STACK
// ============================================================================

export const TEST_STACK: AnalysisStack = {
  imagery: {
    collection: 'test/optical',
    startDate: '2024-01-01',
    endDate: '2024-12-31',
    maxCloudPercent: 10,
    redBand: 'B4',
    nirBand: 'B8',
  },
  elevation: { image: 'test/dem', band: 'elevation' },
};

/** Metres that make one lattice pixel 0.01° tall, i.e. one source pixel of the survey grid */
export const PIXEL_M = 1113.2;

// ============================================================================
// GRIDS
// ============================================================================

export function makeGrid(
  bbox: BBox,
  width: number,
  height: number,
  bands: Record<string, (col: number, row: number) => number>
): RasterGrid {
  const out: Record<string, Float64Array> = {};
  for (const [name, fn] of Object.entries(bands)) {
    const values = new Float64Array(width * height);
    for (let row = 0; row < height; row++) {
      for (let col = 0; col < width; col++) {
        values[row * width + col] = fn(col, row);
      }
    }
    out[name] = values;
  }
  return { width, height, bbox, bands: out };
}

export const SURVEY_BBOX: BBox = [0, 0, 0.1, 0.1];

/**
 * 10 x 10 pixels of 0.01°. Rows 2-4 / cols 2-4 form a 3 x 3 anomalous block
 * and (col 7, row 7) is a lone anomalous pixel. Anomalous pixels have NDVI
 * 0.2 and elevation 300; the rest NDVI 0.6 and elevation 100.
 */
export function isAnomalous(col: number, row: number): boolean {
  return (row >= 2 && row <= 4 && col >= 2 && col <= 4) || (row === 7 && col === 7);
}

function opticalScene(id: string, date: string, cloudPercent: number, nir: (col: number, row: number) => number): ImageryScene {
  return {
    id,
    date,
    cloudPercent,
    grid: makeGrid(SURVEY_BBOX, 10, 10, { B4: () => 1, B8: nir }),
  };
}

export function surveyCatalogue(): RasterCatalogue {
  // NIR 1.5 over red 1 is NDVI 0.2; NIR 4 is NDVI 0.6
  const nir = (col: number, row: number) => (isAnomalous(col, row) ? 1.5 : 4);
  return {
    collections: {
      'test/optical': [
        opticalScene('clear-a', '2024-03-01', 2, nir),
        opticalScene('clear-b', '2024-06-01', 5, nir),
        // Excluded by cloud cover and by date; with them every median NIR would exceed 10
        opticalScene('cloudy', '2024-07-01', 60, () => 19),
        opticalScene('last-year', '2023-07-01', 1, () => 19),
      ],
    },
    images: {
      'test/dem': makeGrid(SURVEY_BBOX, 10, 10, {
        elevation: (col, row) => (isAnomalous(col, row) ? 300 : 100),
      }),
    },
  };
}

// ============================================================================
// GEOMETRY
// ============================================================================

export function box(west: number, south: number, east: number, north: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [west, south],
        [east, south],
        [east, north],
        [west, north],
        [west, south],
      ],
    ],
  };
}

/** Signed shoelace area in coordinate units, positive for counter-clockwise rings */
export function shoelace(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i][0] * ring[i + 1][1] - ring[i + 1][0] * ring[i][1];
  }
  return sum / 2;
}

export function record(properties: Properties, geometry: Polygon = box(0, 0, 0.01, 0.01)): RecordFeature {
  return { type: 'Feature', geometry, properties };
}
