// FILE: src/lib/__tests__/grid.test.ts

import { describe, it, expect } from 'vitest';

import { medianComposite, normalizedDifference, sampleGrid } from '../raster/grid';
import { makeGrid } from './fixtures';

describe('sampleGrid', () => {
  const grid = makeGrid([0, 0, 2, 2], 2, 2, { v: (col, row) => row * 10 + col });
  const band = grid.bands.v;

  it('reads the nearest pixel with row 0 in the north', () => {
    expect(sampleGrid(grid, band, 0.5, 1.5)).toBe(0);
    expect(sampleGrid(grid, band, 1.5, 1.5)).toBe(1);
    expect(sampleGrid(grid, band, 0.5, 0.5)).toBe(10);
    expect(sampleGrid(grid, band, 1.5, 0.5)).toBe(11);
  });

  it('keeps the east and south edges inside the grid', () => {
    expect(sampleGrid(grid, band, 2, 0)).toBe(11);
  });

  it('is NaN outside the footprint', () => {
    expect(sampleGrid(grid, band, -0.1, 1)).toBeNaN();
    expect(sampleGrid(grid, band, 1, 2.1)).toBeNaN();
  });
});

describe('medianComposite', () => {
  const scene = (values: number[]) => makeGrid([0, 0, 1, 1], 2, 1, { b: (col) => values[col] });

  it('takes the per-pixel median, skipping no-data', () => {
    const composite = medianComposite([scene([1, 1]), scene([NaN, 2]), scene([3, 5])], ['b']);
    expect(Array.from(composite.bands.b)).toEqual([2, 2]);
  });

  it('averages the middle pair for an even count', () => {
    const composite = medianComposite([scene([1, 4]), scene([2, 8])], ['b']);
    expect(Array.from(composite.bands.b)).toEqual([1.5, 6]);
  });

  it('leaves a pixel with no data in any scene as NaN', () => {
    const composite = medianComposite([scene([NaN, 1]), scene([NaN, 1])], ['b']);
    expect(composite.bands.b[0]).toBeNaN();
  });

  it('rejects scenes with different footprints', () => {
    const other = makeGrid([0, 0, 2, 1], 2, 1, { b: () => 0 });
    expect(() => medianComposite([scene([1, 1]), other], ['b'])).toThrow(/footprint/);
  });

  it('rejects an empty scene list', () => {
    expect(() => medianComposite([], ['b'])).toThrow();
  });
});

describe('normalizedDifference', () => {
  it('computes (nir - red) / (nir + red)', () => {
    const grid = makeGrid([0, 0, 1, 1], 3, 1, {
      red: () => 1,
      nir: (col) => [4, 1.5, -1][col],
    });
    const ndvi = normalizedDifference(grid, 'nir', 'red');
    expect(ndvi[0]).toBe(0.6);
    expect(ndvi[1]).toBe(0.2);
    expect(ndvi[2]).toBeNaN();
  });

  it('names the missing band', () => {
    const grid = makeGrid([0, 0, 1, 1], 1, 1, { red: () => 1 });
    expect(() => normalizedDifference(grid, 'nir', 'red')).toThrow('Grid is missing band "nir"');
  });
});
