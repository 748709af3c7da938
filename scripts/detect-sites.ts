#!/usr/bin/env npx tsx
/**
 * CLI: tile an AOI and detect candidate sites in every tile
 */
import fs from 'fs';
import path from 'path';
import { fail, guardOutputs, reportFatal, requireNumber, requireValue } from '../src/lib/cli';
import { defaultPipelineConfig, resolvePipelineConfig, DEFAULT_MAX_PIXELS, type PipelineConfig } from '../src/lib/config';
import { findCandidateSites } from '../src/lib/pipeline';
import { loadCatalogue } from '../src/lib/raster/catalogue';
import { GridRasterService } from '../src/lib/raster/grid-service';
import { writeTable } from '../src/lib/table';
import { AreaOfInterestSchema } from '../src/lib/tiler';

const DEFAULT_OUTPUT = 'candidate_sites.csv';

function printHelp() {
  const d = defaultPipelineConfig();
  console.log(`
Usage: npx tsx scripts/detect-sites.ts --aoi <aoi.json> --catalogue <catalogue.json> [options]

Splits the AOI into tiles, masks low-NDVI / high-elevation terrain in each
tile, vectorizes it and writes one row per candidate site.

Options:
      --aoi <path>                 AOI as a ring, GeoJSON Polygon or Feature (required)
      --catalogue <path>           Raster catalogue JSON (required)
  -o, --output <path>              Output CSV (default: ${DEFAULT_OUTPUT})
      --force                      Overwrite existing output
      --tile-size <deg>            Tile size in degrees (default: ${d.tileSizeDeg})
      --ndvi-threshold <n>         NDVI below this is a candidate (default: ${d.ndviThreshold})
      --elev-threshold <m>         Elevation above this is a candidate (default: ${d.elevThreshold})
      --min-area <m2>              Minimum site area (default: ${d.minArea})
      --vector-scale <m>           Vectorization pixel size (default: ${d.vectorScale})
      --aggregation-factor <n>     Backend fan-out hint, 1-16 (default: ${d.aggregationFactor})
      --concurrency <n>            Tiles processed in parallel (default: ${d.concurrency})
      --tile-timeout <ms>          Per-tile timeout (default: ${d.tileTimeoutMs})
      --max-pixels <n>             Backend pixel budget per request (default: ${DEFAULT_MAX_PIXELS})
      --debug                      Verbose backend logging
  -h, --help                       Show help
`);
}

type CLIConfig = {
  aoiPath: string;
  cataloguePath: string;
  outputFile: string;
  maxPixels: number;
  debug: boolean;
  force: boolean;
  overrides: Partial<PipelineConfig>;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    aoiPath: '',
    cataloguePath: '',
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
      case '--aoi':
        config.aoiPath = requireValue(args, i++, arg);
        break;
      case '--catalogue':
        config.cataloguePath = requireValue(args, i++, arg);
        break;
      case '-o':
      case '--output':
        config.outputFile = requireValue(args, i++, arg);
        break;
      case '--force':
        config.force = true;
        break;
      case '--tile-size':
        o.tileSizeDeg = requireNumber(args, i++, arg, { min: 0.001, max: 90 });
        break;
      case '--ndvi-threshold':
        o.ndviThreshold = requireNumber(args, i++, arg, { min: -1, max: 1 });
        break;
      case '--elev-threshold':
        o.elevThreshold = requireNumber(args, i++, arg);
        break;
      case '--min-area':
        o.minArea = requireNumber(args, i++, arg, { min: 0 });
        break;
      case '--vector-scale':
        o.vectorScale = requireNumber(args, i++, arg, { min: 1 });
        break;
      case '--aggregation-factor':
        o.aggregationFactor = requireNumber(args, i++, arg, { min: 1, max: 16, integer: true });
        break;
      case '--concurrency':
        o.concurrency = requireNumber(args, i++, arg, { min: 1, max: 64, integer: true });
        break;
      case '--tile-timeout':
        o.tileTimeoutMs = requireNumber(args, i++, arg, { min: 1, integer: true });
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

  if (!config.aoiPath) fail('No AOI specified (--aoi <path>)');
  if (!config.cataloguePath) fail('No raster catalogue specified (--catalogue <path>)');
  return config;
}

async function main() {
  const cli = parseArgs();
  guardOutputs([cli.outputFile], cli.force);

  try {
    const config = resolvePipelineConfig(cli.overrides);
    const parsed = AreaOfInterestSchema.safeParse(JSON.parse(fs.readFileSync(cli.aoiPath, 'utf-8')));
    if (!parsed.success) fail(`Invalid AOI in ${cli.aoiPath}: ${parsed.error.message}`);

    console.log(`🛰️  Detecting candidate sites`);
    console.log(`   AOI:       ${cli.aoiPath}`);
    console.log(`   Catalogue: ${cli.cataloguePath}`);
    console.log(`   Output:    ${cli.outputFile}`);
    console.log(
      `   Tile: ${config.tileSizeDeg}°, NDVI < ${config.ndviThreshold}, elevation > ${config.elevThreshold}m, area > ${config.minArea}m²`
    );

    const service = new GridRasterService({
      catalogue: await loadCatalogue(cli.cataloguePath),
      maxPixels: cli.maxPixels,
      debug: cli.debug,
    });
    const result = await findCandidateSites(service, parsed.data, config);

    fs.mkdirSync(path.dirname(path.resolve(cli.outputFile)), { recursive: true });
    await writeTable(cli.outputFile, result.sites);

    console.log(`\n🎉 Done! ${result.sites.length} sites from ${result.tileCount} tiles`);
    if (result.failures.length > 0) {
      console.warn(`⚠️ ${result.failures.length} tile(s) failed: ${result.failures.map((f) => f.tileIndex).join(', ')}`);
    }
  } catch (error) {
    reportFatal(error);
  }
}

void main();
