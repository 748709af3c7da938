// FILE: src/lib/__tests__/geometry.test.ts

import { describe, it, expect } from 'vitest';
import type { Polygon } from 'geojson';

import {
  bboxOf,
  closeRing,
  gridCells,
  intersect,
  isDegenerate,
  metresToDegrees,
  shapeMetrics,
} from '../geometry';
import { box } from './fixtures';

// ============================================================================
// gridCells
// ============================================================================

describe('gridCells', () => {
  it('does not add a sliver column from float drift', () => {
    const cells = gridCells([0, 0, 1, 1], 0.1, 0.1);
    expect(cells).toHaveLength(100);
    expect(cells[99].bbox[2]).toBe(1);
    expect(cells[99].bbox[3]).toBe(1);
  });

  it('clamps the last row and column to the bbox edge', () => {
    const cells = gridCells([0, 0, 1, 0.5], 0.3, 0.3);
    // 4 columns (0.3 x 3 + 0.1), 2 rows (0.3 + 0.2)
    expect(cells).toHaveLength(8);
    const last = cells[cells.length - 1];
    expect(last.row).toBe(1);
    expect(last.col).toBe(3);
    expect(last.bbox[0]).toBeCloseTo(0.9, 12);
    expect(last.bbox[1]).toBeCloseTo(0.3, 12);
    expect(last.bbox[2]).toBe(1);
    expect(last.bbox[3]).toBe(0.5);
  });

  it('walks row-major from the south-west corner', () => {
    const cells = gridCells([10, 20, 12, 22], 1, 1);
    expect(cells.map((c) => [c.row, c.col])).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
    expect(cells[0].bbox).toEqual([10, 20, 11, 21]);
  });

  it('returns nothing for a degenerate bbox', () => {
    expect(gridCells([0, 0, 0, 1], 0.5, 0.5)).toEqual([]);
  });

  it('rejects a non-positive step', () => {
    expect(() => gridCells([0, 0, 1, 1], 0, 0.5)).toThrow(RangeError);
  });
});

// ============================================================================
// bbox / rings / conversion
// ============================================================================

describe('bbox helpers', () => {
  it('computes the bbox of a polygon', () => {
    expect(bboxOf(box(-3, 1, 2, 4))).toEqual([-3, 1, 2, 4]);
  });

  it('flags zero-width and zero-height boxes', () => {
    expect(isDegenerate([0, 0, 0, 1])).toBe(true);
    expect(isDegenerate([0, 1, 1, 1])).toBe(true);
    expect(isDegenerate([0, 0, 1, 1])).toBe(false);
  });

  it('closes an open ring and leaves a closed one alone', () => {
    expect(
      closeRing([
        [0, 0],
        [1, 0],
        [1, 1],
      ])
    ).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ]);
    const closed = [
      [0, 0],
      [1, 0],
      [0, 0],
    ];
    expect(closeRing(closed)).toBe(closed);
  });
});

describe('metresToDegrees', () => {
  it('is one degree per 111320 m at the equator', () => {
    const { dLon, dLat } = metresToDegrees(111_320, 0);
    expect(dLat).toBe(1);
    expect(dLon).toBeCloseTo(1, 12);
  });

  it('widens longitude with latitude', () => {
    const { dLon, dLat } = metresToDegrees(111_320, 60);
    expect(dLat).toBe(1);
    expect(dLon).toBeCloseTo(2, 9);
  });
});

// ============================================================================
// intersect
// ============================================================================

describe('intersect', () => {
  it('clips overlapping squares', () => {
    const result = intersect(box(0, 0, 2, 2), box(1, 1, 3, 3));
    expect(result).not.toBeNull();
    expect(result && bboxOf(result)).toEqual([1, 1, 2, 2]);
  });

  it('returns null for disjoint shapes', () => {
    expect(intersect(box(0, 0, 1, 1), box(5, 5, 6, 6))).toBeNull();
  });
});

// ============================================================================
// shapeMetrics
// ============================================================================

describe('shapeMetrics', () => {
  it('gives a square compactness 4', () => {
    const { compactness } = shapeMetrics(box(0, 0, 0.01, 0.01));
    expect(compactness).toBeCloseTo(4, 5);
  });

  it('scores a 2:1 rectangle as less compact than a square', () => {
    const { compactness } = shapeMetrics(box(0, 0, 0.02, 0.01));
    // 6s / sqrt(2 s²)
    expect(compactness).toBeCloseTo(6 / Math.SQRT2, 5);
  });

  it('measures in projected metres, not degrees', () => {
    const { area_m2, perimeter } = shapeMetrics(box(0, 0, 0.01, 0.01));
    // 0.01° of longitude on the Web Mercator sphere
    const side = (6378137 * Math.PI * 0.01) / 180;
    expect(perimeter).toBeCloseTo(4 * side, 2);
    expect(area_m2 / (side * side)).toBeCloseTo(1, 5);
  });

  it('subtracts holes from the area and adds them to the perimeter', () => {
    const outer = box(0, 0, 0.03, 0.03).coordinates[0];
    const hole = box(0.01, 0.01, 0.02, 0.02).coordinates[0].slice().reverse();
    const donut: Polygon = { type: 'Polygon', coordinates: [outer, hole] };

    const solid = shapeMetrics(box(0, 0, 0.03, 0.03));
    const inner = shapeMetrics(box(0.01, 0.01, 0.02, 0.02));
    const result = shapeMetrics(donut);
    expect(result.area_m2).toBeCloseTo(solid.area_m2 - inner.area_m2, 3);
    expect(result.perimeter).toBeCloseTo(solid.perimeter + inner.perimeter, 3);
  });

  it('reports null compactness for a zero-area shape', () => {
    const flat: Polygon = {
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [2, 0],
          [0, 0],
        ],
      ],
    };
    expect(shapeMetrics(flat).compactness).toBeNull();
  });
});
