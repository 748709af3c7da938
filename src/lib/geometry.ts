/**
 * Geometry helpers shared by the tiler, the subdivider and the scorer.
 *
 * Everything is GeoJSON in EPSG:4326 unless a function says otherwise. Shape
 * metrics are computed after projecting to EPSG:3857 so that lengths and areas
 * come out in comparable planar units.
 */
import * as turf from '@turf/turf';
import proj4 from 'proj4';
import type { Position } from 'geojson';
import type { Areal, BBox } from './types';

// ==========================================
// BOUNDING BOXES & GRIDS
// ==========================================

/** Metres per degree of latitude on the WGS84 mean sphere */
export const METRES_PER_DEGREE = 111_320;

export function bboxOf(geometry: Areal): BBox {
  const [west, south, east, north] = turf.bbox(geometry);
  return [west, south, east, north];
}

export function isDegenerate(bbox: BBox): boolean {
  return !(bbox[2] > bbox[0]) || !(bbox[3] > bbox[1]);
}

export type GridCell = {
  row: number;
  col: number;
  bbox: BBox;
};

/**
 * Regular grid over a bbox, row-major from the south-west corner. The last
 * row and column are clamped to the bbox edge, so they can be narrower than
 * the step.
 */
export function gridCells(bbox: BBox, stepX: number, stepY: number): GridCell[] {
  if (!(stepX > 0) || !(stepY > 0)) {
    throw new RangeError(`Grid step must be positive (got ${stepX} x ${stepY})`);
  }
  if (isDegenerate(bbox)) return [];

  const [west, south, east, north] = bbox;
  // Tolerance keeps float drift (e.g. 10 * 0.1) from adding a sliver column
  const cols = Math.max(1, Math.ceil((east - west) / stepX - 1e-9));
  const rows = Math.max(1, Math.ceil((north - south) / stepY - 1e-9));

  const cells: GridCell[] = [];
  for (let row = 0; row < rows; row++) {
    const y0 = south + row * stepY;
    const y1 = row === rows - 1 ? north : Math.min(south + (row + 1) * stepY, north);
    for (let col = 0; col < cols; col++) {
      const x0 = west + col * stepX;
      const x1 = col === cols - 1 ? east : Math.min(west + (col + 1) * stepX, east);
      cells.push({ row, col, bbox: [x0, y0, x1, y1] });
    }
  }
  return cells;
}

export function rectangle(bbox: BBox): Areal {
  return turf.bboxPolygon(bbox).geometry;
}

/**
 * Exact polygon intersection (no simplification tolerance). Returns null when
 * the shapes only touch or do not overlap.
 */
export function intersect(a: Areal, b: Areal): Areal | null {
  const result = turf.intersect(turf.featureCollection([turf.feature(a), turf.feature(b)]));
  return result ? result.geometry : null;
}

/**
 * Size of `metres` in degrees at a given latitude. Longitude degrees shrink
 * with the cosine of the latitude.
 */
export function metresToDegrees(metres: number, latitude: number): { dLon: number; dLat: number } {
  const dLat = metres / METRES_PER_DEGREE;
  const cosLat = Math.max(Math.cos((latitude * Math.PI) / 180), 1e-6);
  return { dLon: dLat / cosLat, dLat };
}

export function closeRing(ring: Position[]): Position[] {
  if (ring.length === 0) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) return ring;
  return [...ring, [first[0], first[1]]];
}

// ==========================================
// AREA & SHAPE
// ==========================================

/** Geodesic area in square metres */
export function geodesicArea(geometry: Areal): number {
  return turf.area(geometry);
}

function polygonsOf(geometry: Areal): Position[][][] {
  return geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
}

function toMercator(position: Position): Position {
  return proj4('EPSG:4326', 'EPSG:3857', [position[0], position[1]]);
}

function ringArea(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i][0] * ring[i + 1][1] - ring[i + 1][0] * ring[i][1];
  }
  return Math.abs(sum) / 2;
}

function ringLength(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += Math.hypot(ring[i + 1][0] - ring[i][0], ring[i + 1][1] - ring[i][1]);
  }
  return sum;
}

export type ShapeMetrics = {
  area_m2: number;
  perimeter: number;
  compactness: number | null;
};

/**
 * Area, perimeter and compactness (perimeter / sqrt(area)) in EPSG:3857.
 * Holes subtract from the area and add to the perimeter. Compactness is null
 * for zero-area shapes.
 */
export function shapeMetrics(geometry: Areal): ShapeMetrics {
  let area = 0;
  let perimeter = 0;
  for (const polygon of polygonsOf(geometry)) {
    polygon.forEach((ring, i) => {
      const projected = ring.map(toMercator);
      const a = ringArea(projected);
      area += i === 0 ? a : -a;
      perimeter += ringLength(projected);
    });
  }
  return {
    area_m2: area,
    perimeter,
    compactness: area > 0 ? perimeter / Math.sqrt(area) : null,
  };
}
