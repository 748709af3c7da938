// FILE: src/lib/__tests__/config.test.ts

import { describe, it, expect } from 'vitest';

import { defaultPipelineConfig, resolvePipelineConfig } from '../config';
import { ConfigurationError } from '../errors';
import { SITE_WEIGHTS, SUBREGION_WEIGHTS } from '../scoring';

describe('resolvePipelineConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    const config = resolvePipelineConfig();
    expect(config).toEqual(defaultPipelineConfig());
    expect(config.subregionWeights).toEqual(SUBREGION_WEIGHTS);
    expect(config.siteWeights).toEqual(SITE_WEIGHTS);
  });

  it('applies overrides on top of the defaults', () => {
    const config = resolvePipelineConfig({ tileSizeDeg: 0.25, siteTopK: 10 });
    expect(config.tileSizeDeg).toBe(0.25);
    expect(config.siteTopK).toBe(10);
    expect(config.cellSize).toBe(defaultPipelineConfig().cellSize);
  });

  it('rejects an out-of-range aggregation factor', () => {
    expect(() => resolvePipelineConfig({ aggregationFactor: 32 })).toThrow(ConfigurationError);
  });

  it('names every invalid field', () => {
    expect(() => resolvePipelineConfig({ tileSizeDeg: 0, siteWeights: {} })).toThrow(/tileSizeDeg: .*; siteWeights: /);
  });
});
