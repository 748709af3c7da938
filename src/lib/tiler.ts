import type { Polygon } from 'geojson';
import { z } from 'zod';
import { bboxOf, closeRing, gridCells, intersect, isDegenerate, rectangle } from './geometry';
import type { AreaOfInterest, Tile } from './types';

// ==========================================
// AOI INPUT
// ==========================================

const PositionSchema = z.tuple([z.number().finite(), z.number().finite()]).rest(z.number());

/**
 * Accepts a bare ring, a GeoJSON Polygon, or a Feature wrapping one. Rings
 * are closed if the caller left them open.
 */
export const AreaOfInterestSchema = z
  .union([
    z.array(PositionSchema),
    z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(PositionSchema)).min(1) }),
    z.object({
      type: z.literal('Feature'),
      geometry: z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(PositionSchema)).min(1) }),
    }),
  ])
  .transform((value): AreaOfInterest => {
    if (Array.isArray(value)) return closeRing(value);
    const coordinates = value.type === 'Feature' ? value.geometry.coordinates : value.coordinates;
    return closeRing(coordinates[0]);
  })
  .refine((ring) => ring.length >= 4, { message: 'AOI ring needs at least three distinct positions' });

export function aoiPolygon(aoi: AreaOfInterest): Polygon {
  return { type: 'Polygon', coordinates: [closeRing(aoi)] };
}

// ==========================================
// TILING
// ==========================================

/**
 * Split an AOI into a grid of tiles `tileSizeDeg` wide, each clipped to the AOI.
 * Grid cells that miss the AOI are dropped, so a concave AOI yields fewer
 * tiles than its bounding box would.
 */
export function tileAoi(aoi: AreaOfInterest, tileSizeDeg: number): Tile[] {
  if (!(tileSizeDeg > 0)) {
    throw new RangeError(`Tile size must be positive (got ${tileSizeDeg})`);
  }
  const polygon = aoiPolygon(aoi);
  const bbox = bboxOf(polygon);
  if (isDegenerate(bbox)) return [];

  const tiles: Tile[] = [];
  for (const cell of gridCells(bbox, tileSizeDeg, tileSizeDeg)) {
    const clipped = intersect(rectangle(cell.bbox), polygon);
    if (!clipped) continue;
    tiles.push({
      type: 'Feature',
      geometry: clipped,
      properties: { tile_index: tiles.length, row: cell.row, col: cell.col },
    });
  }

  console.log(`[Tiler] Split AOI into ${tiles.length} tiles of ~${tileSizeDeg}°`);
  return tiles;
}
