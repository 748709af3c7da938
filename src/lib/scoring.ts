/**
 * Anomaly scoring and top-k selection.
 *
 * Each weighted metric is turned into a population z-score across the whole
 * record set, and the composite score is the weighted sum of those z-scores.
 * The same scorer runs twice: per-cell NDVI/elevation anomaly first, then the
 * survivors again with shape compactness folded in.
 */
import { ConfigurationError } from './errors';
import { shapeMetrics } from './geometry';
import type { RecordFeature, ScoredRecord, WeightTable } from './types';

// ==========================================
// WEIGHTS
// ==========================================

/** Lower NDVI and higher ground are more anomalous */
export const SUBREGION_WEIGHTS: WeightTable = {
  mean_ndvi: -1.0,
  mean_elev: 1.0,
};

/** Stage two also prefers compact shapes (lower perimeter / sqrt(area)) */
export const SITE_WEIGHTS: WeightTable = {
  mean_ndvi: -1.0,
  mean_elev: 1.0,
  compactness: -1.0,
};

/** Parse `metric=weight,metric=weight` */
export function parseWeights(text: string): WeightTable {
  const weights: WeightTable = {};
  for (const part of text.split(',')) {
    const [metric, raw] = part.split('=').map((s) => s.trim());
    const weight = Number(raw);
    if (!metric || raw === undefined || raw === '' || !Number.isFinite(weight)) {
      throw new ConfigurationError(`Invalid weight "${part}" (expected metric=number)`);
    }
    weights[metric] = weight;
  }
  return weights;
}

// ==========================================
// NORMALIZATION
// ==========================================

export function populationStats(values: number[]): { mean: number; std: number } {
  if (values.length === 0) return { mean: NaN, std: NaN };
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

/**
 * Population z-scores. A constant series (stddev zero, up to rounding in the
 * mean) scores 0 everywhere.
 */
export function zScores(values: number[]): number[] {
  const { mean, std } = populationStats(values);
  if (!(std > 1e-12 * Math.max(1, Math.abs(mean)))) return values.map(() => 0);
  return values.map((v) => (v - mean) / std);
}

function metricValue(record: RecordFeature, metric: string): number | null {
  const value = record.properties[metric];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// ==========================================
// SCORING & SELECTION
// ==========================================

/**
 * Score every record against `weights`. Metrics not in `weights` are ignored.
 * Records missing a value for a weighted metric sit out of both the
 * normalization and the result.
 */
export function scoreRecords(records: RecordFeature[], weights: WeightTable): ScoredRecord[] {
  const metrics = Object.keys(weights);
  if (records.length === 0) return [];

  for (const metric of metrics) {
    if (!records.some((record) => metricValue(record, metric) !== null)) {
      throw new ConfigurationError(`Metric "${metric}" is weighted but absent from all ${records.length} records`);
    }
  }

  const complete = records
    .map((feature, index) => ({ feature, index }))
    .filter(({ feature }) => metrics.every((metric) => metricValue(feature, metric) !== null));
  if (complete.length < records.length) {
    console.warn(`[Scoring] ⚠️ ${records.length - complete.length} record(s) lack a weighted metric and were skipped`);
  }

  const zByMetric = new Map<string, number[]>();
  for (const metric of metrics) {
    zByMetric.set(
      metric,
      zScores(complete.map(({ feature }) => metricValue(feature, metric) ?? 0))
    );
  }

  return complete.map(({ feature, index }, i) => {
    const z: Record<string, number> = {};
    let score = 0;
    for (const metric of metrics) {
      const value = zByMetric.get(metric)?.[i] ?? 0;
      z[metric] = value;
      score += value * weights[metric];
    }
    return { feature, index, zScores: z, score };
  });
}

/** Highest `k` scores, ties in input order */
export function selectTopK(scored: ScoredRecord[], k: number): ScoredRecord[] {
  return [...scored].sort((a, b) => b.score - a.score || a.index - b.index).slice(0, Math.max(0, k));
}

export function scoreAndSelect(records: RecordFeature[], weights: WeightTable, k: number): ScoredRecord[] {
  return selectTopK(scoreRecords(records, weights), k);
}

/** Flatten a scored record back into a feature with `<metric>_z` and `score` columns */
export function scoredToFeature(record: ScoredRecord): RecordFeature {
  const properties = { ...record.feature.properties };
  for (const [metric, z] of Object.entries(record.zScores)) {
    properties[`${metric}_z`] = z;
  }
  properties.score = record.score;
  return { type: 'Feature', geometry: record.feature.geometry, properties };
}

// ==========================================
// STAGES
// ==========================================

/** Add projected `area_m2`, `perimeter` and `compactness` to each record */
export function withShapeMetrics(records: RecordFeature[]): RecordFeature[] {
  return records.map((record): RecordFeature => {
    const { area_m2, perimeter, compactness } = shapeMetrics(record.geometry);
    return {
      type: 'Feature',
      geometry: record.geometry,
      properties: { ...record.properties, area_m2, perimeter, compactness },
    };
  });
}

/** Stage one: coarse per-cell vegetation/elevation anomaly */
export function rankSubregions(
  records: RecordFeature[],
  k: number,
  weights: WeightTable = SUBREGION_WEIGHTS
): RecordFeature[] {
  console.log(`[Scoring] Stage 1: scoring ${records.length} subregions, keeping top ${k}`);
  const top = scoreAndSelect(records, weights, k);
  console.log(`[Scoring] Selected ${top.length} subregions by anomaly score`);
  return top.map(scoredToFeature);
}

/** Stage two: anomaly plus shape compactness, for the final shortlist */
export function rankSites(records: RecordFeature[], k: number, weights: WeightTable = SITE_WEIGHTS): RecordFeature[] {
  console.log(`[Scoring] Stage 2: scoring ${records.length} candidates with shape metrics, keeping top ${k}`);
  const top = scoreAndSelect(withShapeMetrics(records), weights, k);
  console.log(`[Scoring] Selected ${top.length} sites`);
  return top.map(scoredToFeature);
}
