#!/usr/bin/env npx tsx
/**
 * CLI: subdivide candidate sites into cells, score them and write the
 * stage-one subregions and the stage-two shortlist
 */
import fs from 'fs';
import path from 'path';
import { fail, guardOutputs, reportFatal, requireNumber, requireValue } from '../src/lib/cli';
import { defaultPipelineConfig, resolvePipelineConfig, DEFAULT_MAX_PIXELS, type PipelineConfig } from '../src/lib/config';
import { formatError } from '../src/lib/errors';
import { rankCandidates } from '../src/lib/pipeline';
import { loadCatalogue } from '../src/lib/raster/catalogue';
import { GridRasterService } from '../src/lib/raster/grid-service';
import { parseWeights } from '../src/lib/scoring';
import { readTable, writeTable } from '../src/lib/table';
import type { WeightTable } from '../src/lib/types';

const DEFAULT_INPUT = 'candidate_sites.csv';
const DEFAULT_SUBREGIONS_OUTPUT = 'subregions_evaluated.csv';
const DEFAULT_OUTPUT = 'top_sites.csv';

function formatWeights(weights: WeightTable): string {
  return Object.entries(weights)
    .map(([metric, weight]) => `${metric}=${weight}`)
    .join(',');
}

function printHelp() {
  const d = defaultPipelineConfig();
  console.log(`
Usage: npx tsx scripts/rank-sites.ts --catalogue <catalogue.json> [options]

Cuts every candidate site into fixed-size cells, measures NDVI and elevation
per cell, keeps the most anomalous cells, then re-ranks them with shape
compactness into a final shortlist.

Options:
  -i, --input <path>               Candidate sites CSV (default: ${DEFAULT_INPUT})
      --catalogue <path>           Raster catalogue JSON (required)
      --subregions-output <path>   Stage-one CSV (default: ${DEFAULT_SUBREGIONS_OUTPUT})
  -o, --output <path>              Shortlist CSV (default: ${DEFAULT_OUTPUT})
      --force                      Overwrite existing outputs
      --cell-size <m>              Cell edge length (default: ${d.cellSize})
      --cell-scale <m>             Reduction pixel size for cells (default: ${d.cellScale})
      --aggregation-factor <n>     Backend fan-out hint, 1-16 (default: ${d.cellAggregationFactor})
      --batch-size <n>             Cells per backend request (default: all)
      --subregion-top-k <n>        Cells kept after stage one (default: ${d.subregionTopK})
      --top-k <n>                  Sites in the shortlist (default: ${d.siteTopK})
      --subregion-weights <m=w,..> Stage-one weights (default: ${formatWeights(d.subregionWeights)})
      --site-weights <m=w,..>      Stage-two weights (default: ${formatWeights(d.siteWeights)})
      --max-pixels <n>             Backend pixel budget per request (default: ${DEFAULT_MAX_PIXELS})
      --debug                      Verbose backend logging
  -h, --help                       Show help
`);
}

type CLIConfig = {
  inputFile: string;
  cataloguePath: string;
  subregionsOutput: string;
  outputFile: string;
  maxPixels: number;
  debug: boolean;
  force: boolean;
  overrides: Partial<PipelineConfig>;
};

function weightsArg(args: string[], i: number, flag: string): WeightTable {
  try {
    return parseWeights(requireValue(args, i, flag));
  } catch (error) {
    fail(`Invalid value for ${flag}: ${formatError(error)}`);
  }
}

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    inputFile: DEFAULT_INPUT,
    cataloguePath: '',
    subregionsOutput: DEFAULT_SUBREGIONS_OUTPUT,
    outputFile: DEFAULT_OUTPUT,
    maxPixels: DEFAULT_MAX_PIXELS,
    debug: false,
    force: false,
    overrides: {},
  };
  const o = config.overrides;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--input':
        config.inputFile = requireValue(args, i++, arg);
        break;
      case '--catalogue':
        config.cataloguePath = requireValue(args, i++, arg);
        break;
      case '--subregions-output':
        config.subregionsOutput = requireValue(args, i++, arg);
        break;
      case '-o':
      case '--output':
        config.outputFile = requireValue(args, i++, arg);
        break;
      case '--force':
        config.force = true;
        break;
      case '--cell-size':
        o.cellSize = requireNumber(args, i++, arg, { min: 1 });
        break;
      case '--cell-scale':
        o.cellScale = requireNumber(args, i++, arg, { min: 1 });
        break;
      case '--aggregation-factor':
        o.cellAggregationFactor = requireNumber(args, i++, arg, { min: 1, max: 16, integer: true });
        break;
      case '--batch-size':
        o.cellBatchSize = requireNumber(args, i++, arg, { min: 1, integer: true });
        break;
      case '--subregion-top-k':
        o.subregionTopK = requireNumber(args, i++, arg, { min: 1, integer: true });
        break;
      case '--top-k':
        o.siteTopK = requireNumber(args, i++, arg, { min: 1, integer: true });
        break;
      case '--subregion-weights':
        o.subregionWeights = weightsArg(args, i++, arg);
        break;
      case '--site-weights':
        o.siteWeights = weightsArg(args, i++, arg);
        break;
      case '--max-pixels':
        config.maxPixels = requireNumber(args, i++, arg, { min: 1 });
        break;
      case '--debug':
        config.debug = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if (!config.cataloguePath) fail('No raster catalogue specified (--catalogue <path>)');
  if (!fs.existsSync(config.inputFile)) fail(`Input not found: ${config.inputFile}`);
  return config;
}

async function main() {
  const cli = parseArgs();
  guardOutputs([cli.subregionsOutput, cli.outputFile], cli.force);

  try {
    const config = resolvePipelineConfig(cli.overrides);
    console.log(`📊 Ranking candidate sites`);
    console.log(`   Input:      ${cli.inputFile}`);
    console.log(`   Subregions: ${cli.subregionsOutput} (top ${config.subregionTopK})`);
    console.log(`   Shortlist:  ${cli.outputFile} (top ${config.siteTopK})`);

    const sites = await readTable(cli.inputFile);
    const service = new GridRasterService({
      catalogue: await loadCatalogue(cli.cataloguePath),
      maxPixels: cli.maxPixels,
      debug: cli.debug,
    });
    const { subregions, shortlist } = await rankCandidates(service, sites, config);

    for (const file of [cli.subregionsOutput, cli.outputFile]) {
      fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    }
    await writeTable(cli.subregionsOutput, subregions);
    await writeTable(cli.outputFile, shortlist);

    console.log(`\n🎉 Done! ${shortlist.length} sites shortlisted from ${sites.length} candidates`);
  } catch (error) {
    reportFatal(error);
  }
}

void main();
