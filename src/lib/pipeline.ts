/**
 * Stage orchestration: AOI → tiles → candidate sites, then candidate sites →
 * cells → stage-one subregions → stage-two shortlist.
 */
import { aggregateCellStats } from './aggregator';
import type { PipelineConfig } from './config';
import { detectSites, type DetectSitesResult } from './detector';
import type { RasterService } from './raster/types';
import { rankSites, rankSubregions } from './scoring';
import { subdivideSites } from './subdivider';
import { tileAoi } from './tiler';
import type { AreaOfInterest, RecordFeature } from './types';

export type CandidateSearchResult = DetectSitesResult & {
  tileCount: number;
};

export type RankingResult = {
  subregions: RecordFeature[];
  shortlist: RecordFeature[];
};

function banner(title: string) {
  console.log(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
  console.log(title);
  console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
}

export async function findCandidateSites(
  service: RasterService,
  aoi: AreaOfInterest,
  config: PipelineConfig
): Promise<CandidateSearchResult> {
  banner('STAGE: Tiling & Detection');
  const tiles = tileAoi(aoi, config.tileSizeDeg);
  const result = await detectSites(service, tiles, {
    stack: config.stack,
    ndviThreshold: config.ndviThreshold,
    elevThreshold: config.elevThreshold,
    minArea: config.minArea,
    vectorScale: config.vectorScale,
    aggregationFactor: config.aggregationFactor,
    concurrency: config.concurrency,
    tileTimeoutMs: config.tileTimeoutMs,
  });
  return { ...result, tileCount: tiles.length };
}

export async function rankCandidates(
  service: RasterService,
  sites: RecordFeature[],
  config: PipelineConfig
): Promise<RankingResult> {
  banner('STAGE: Subdivision & Cell Statistics');
  const cells = subdivideSites(sites, config.cellSize);
  const records = await aggregateCellStats(service, cells, {
    stack: config.stack,
    scale: config.cellScale,
    aggregationFactor: config.cellAggregationFactor,
    batchSize: config.cellBatchSize,
  });

  banner('STAGE: Anomaly Scoring');
  const subregions = rankSubregions(records, config.subregionTopK, config.subregionWeights);
  const shortlist = rankSites(subregions, config.siteTopK, config.siteWeights);
  return { subregions, shortlist };
}
