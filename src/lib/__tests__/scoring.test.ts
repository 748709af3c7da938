// FILE: src/lib/__tests__/scoring.test.ts

import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../errors';
import {
  SITE_WEIGHTS,
  SUBREGION_WEIGHTS,
  parseWeights,
  populationStats,
  rankSites,
  rankSubregions,
  scoreRecords,
  scoredToFeature,
  selectTopK,
  zScores,
} from '../scoring';
import type { RecordFeature } from '../types';
import { box, record } from './fixtures';

// ============================================================================
// HELPERS
// ============================================================================

/** Record 2 has the lowest NDVI and the highest elevation */
function survey(): RecordFeature[] {
  return [
    record({ mean_ndvi: 0.6, mean_elev: 100 }),
    record({ mean_ndvi: 0.55, mean_elev: 120 }),
    record({ mean_ndvi: 0.1, mean_elev: 300 }),
    record({ mean_ndvi: 0.5, mean_elev: 110 }),
    record({ mean_ndvi: 0.6, mean_elev: 105 }),
  ];
}

// ============================================================================
// zScores
// ============================================================================

describe('zScores', () => {
  it('uses the population standard deviation', () => {
    const z = zScores([1, 2, 3]);
    expect(z[0]).toBeCloseTo(-Math.sqrt(1.5), 12);
    expect(z[1]).toBe(0);
    expect(z[2]).toBeCloseTo(Math.sqrt(1.5), 12);
  });

  it('scores a constant series as zero', () => {
    expect(zScores([5, 5, 5])).toEqual([0, 0, 0]);
  });

  it('scores a constant series as zero despite rounding in the mean', () => {
    expect(zScores([0.1, 0.1, 0.1])).toEqual([0, 0, 0]);
  });

  it('reports NaN stats for an empty series', () => {
    expect(populationStats([]).mean).toBeNaN();
  });
});

// ============================================================================
// scoreRecords
// ============================================================================

describe('scoreRecords', () => {
  it('normalizes each weighted metric to mean 0 and deviation 1', () => {
    const scored = scoreRecords(survey(), SUBREGION_WEIGHTS);
    for (const metric of Object.keys(SUBREGION_WEIGHTS)) {
      const stats = populationStats(scored.map((s) => s.zScores[metric]));
      expect(stats.mean).toBeCloseTo(0, 12);
      expect(stats.std).toBeCloseTo(1, 12);
    }
  });

  it('ranks the extreme low-NDVI, high-elevation record first', () => {
    const scored = scoreRecords(survey(), SUBREGION_WEIGHTS);
    const ndviZ = scored.map((s) => s.zScores.mean_ndvi);
    const elevZ = scored.map((s) => s.zScores.mean_elev);
    expect(scored[2].zScores.mean_ndvi).toBe(Math.min(...ndviZ));
    expect(scored[2].zScores.mean_elev).toBe(Math.max(...elevZ));
    expect(selectTopK(scored, 1)[0].index).toBe(2);
  });

  it('computes the score as the weighted sum of z-scores', () => {
    const [first] = scoreRecords(survey(), { mean_ndvi: -2, mean_elev: 0.5 });
    expect(first.score).toBeCloseTo(-2 * first.zScores.mean_ndvi + 0.5 * first.zScores.mean_elev, 12);
  });

  it('ignores metrics that are not weighted', () => {
    const plain = scoreRecords(survey(), SUBREGION_WEIGHTS);
    const noisy = scoreRecords(
      survey().map((r, i) => record({ ...r.properties, foo: i * 1000 })),
      SUBREGION_WEIGHTS
    );
    expect(noisy.map((s) => s.score)).toEqual(plain.map((s) => s.score));
  });

  it('fails when a weighted metric is absent from every record', () => {
    expect(() => scoreRecords(survey(), SITE_WEIGHTS)).toThrow(ConfigurationError);
    expect(() => scoreRecords(survey(), SITE_WEIGHTS)).toThrow('Metric "compactness" is weighted');
  });

  it('skips records missing a weighted metric', () => {
    const records = survey();
    records[1] = record({ mean_ndvi: null, mean_elev: 120 });
    const scored = scoreRecords(records, SUBREGION_WEIGHTS);
    expect(scored.map((s) => s.index)).toEqual([0, 2, 3, 4]);
  });

  it('returns nothing for no records', () => {
    expect(scoreRecords([], SITE_WEIGHTS)).toEqual([]);
  });
});

// ============================================================================
// selectTopK
// ============================================================================

describe('selectTopK', () => {
  it('breaks ties by input order', () => {
    const same = [0, 1, 2].map(() => record({ mean_ndvi: 0.3, mean_elev: 200 }));
    const top = selectTopK(scoreRecords(same, SUBREGION_WEIGHTS), 2);
    expect(top.map((s) => s.index)).toEqual([0, 1]);
  });

  it('is idempotent', () => {
    const scored = scoreRecords(survey(), SUBREGION_WEIGHTS);
    const once = selectTopK(scored, 3);
    expect(selectTopK(once, 3)).toEqual(once);
  });

  it('selecting top-K then top-K′ equals selecting top-K′ directly', () => {
    const scored = scoreRecords(survey(), SUBREGION_WEIGHTS);
    expect(selectTopK(selectTopK(scored, 4), 2)).toEqual(selectTopK(scored, 2));
  });

  it('returns everything when k exceeds the record count', () => {
    expect(selectTopK(scoreRecords(survey(), SUBREGION_WEIGHTS), 50)).toHaveLength(5);
  });
});

// ============================================================================
// parseWeights
// ============================================================================

describe('parseWeights', () => {
  it('parses metric=weight pairs', () => {
    expect(parseWeights('mean_ndvi=-1, mean_elev=2.5')).toEqual({ mean_ndvi: -1, mean_elev: 2.5 });
  });

  it.each(['mean_ndvi', 'mean_ndvi=', '=1', 'mean_ndvi=abc'])('rejects %j', (text) => {
    expect(() => parseWeights(text)).toThrow(ConfigurationError);
  });
});

// ============================================================================
// stages
// ============================================================================

describe('scoredToFeature', () => {
  it('adds a z column per metric and the score', () => {
    const [top] = selectTopK(scoreRecords(survey(), SUBREGION_WEIGHTS), 1);
    const feature = scoredToFeature(top);
    expect(Object.keys(feature.properties).sort()).toEqual(['mean_elev', 'mean_elev_z', 'mean_ndvi', 'mean_ndvi_z', 'score']);
    expect(feature.properties.score).toBe(top.score);
  });
});

describe('rankSubregions', () => {
  it('keeps the k most anomalous records, best first', () => {
    const top = rankSubregions(survey(), 2);
    expect(top).toHaveLength(2);
    expect(top[0].properties.mean_ndvi).toBe(0.1);
  });
});

describe('rankSites', () => {
  it('prefers the more compact of two otherwise identical candidates', () => {
    const elongated = record({ mean_ndvi: 0.2, mean_elev: 300, area_m2: 5 }, box(0, 0, 0.04, 0.01));
    const square = record({ mean_ndvi: 0.2, mean_elev: 300, area_m2: 5 }, box(1, 0, 1.01, 0.01));
    const [best] = rankSites([elongated, square], 1);

    expect(best.geometry).toEqual(square.geometry);
    expect(best.properties.compactness).toBeCloseTo(4, 5);
    expect(best.properties.compactness_z).toBeCloseTo(-1, 12);
    expect(best.properties.score).toBeCloseTo(1, 12);
  });

  it('replaces area_m2 with the projected area', () => {
    const [best] = rankSites([record({ mean_ndvi: 0.2, mean_elev: 300, area_m2: 5 })], 1);
    const side = (6378137 * Math.PI * 0.01) / 180;
    expect(best.properties.area_m2).toBeCloseTo(side * side, -1);
  });
});
