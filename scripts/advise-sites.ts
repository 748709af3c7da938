#!/usr/bin/env npx tsx
/**
 * CLI: ask the advisory model about every shortlisted site
 */
import fs from 'fs';
import { adviseSites } from '../src/lib/advisor';
import { fail, guardOutputs, reportFatal, requireNumber, requireValue } from '../src/lib/cli';
import { DEFAULT_ADVICE_LIMIT, DEFAULT_CONCURRENCY, DEFAULT_MODEL_NAME } from '../src/lib/config';
import { createAdvisoryPool } from '../src/lib/pool';
import { readTable, writeTable } from '../src/lib/table';

const DEFAULT_INPUT = 'top_sites.csv';
const DEFAULT_OUTPUT = 'site_advice.csv';

function printHelp() {
  console.log(`
Usage: npx tsx scripts/advise-sites.ts [options]

Requires GOOGLE_GENERATIVE_AI_API_KEY in the environment (or .env).

Options:
  -i, --input <path>        Shortlist CSV (default: ${DEFAULT_INPUT})
  -o, --output <path>       Output CSV (default: ${DEFAULT_OUTPUT})
      --force               Overwrite existing output
      --model <name>        Model (default: ${DEFAULT_MODEL_NAME})
      --concurrency <n>     Max concurrent API calls (default: ${DEFAULT_CONCURRENCY})
      --limit <n>           Evaluate only the first n rows (default: ${DEFAULT_ADVICE_LIMIT})
      --debug               Verbose pool logging
  -h, --help                Show help
`);
}

type CLIConfig = {
  inputFile: string;
  outputFile: string;
  modelName: string;
  concurrency: number;
  limit: number;
  debug: boolean;
  force: boolean;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    inputFile: DEFAULT_INPUT,
    outputFile: DEFAULT_OUTPUT,
    modelName: DEFAULT_MODEL_NAME,
    concurrency: DEFAULT_CONCURRENCY,
    limit: DEFAULT_ADVICE_LIMIT,
    debug: false,
    force: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--input':
        config.inputFile = requireValue(args, i++, arg);
        break;
      case '-o':
      case '--output':
        config.outputFile = requireValue(args, i++, arg);
        break;
      case '--force':
        config.force = true;
        break;
      case '--model':
        config.modelName = requireValue(args, i++, arg);
        break;
      case '--concurrency':
        config.concurrency = requireNumber(args, i++, arg, { min: 1, max: 20, integer: true });
        break;
      case '--limit':
        config.limit = requireNumber(args, i++, arg, { min: 1, integer: true });
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

  if (!fs.existsSync(config.inputFile)) fail(`Input not found: ${config.inputFile}`);
  return config;
}

async function main() {
  const cli = parseArgs();
  guardOutputs([cli.outputFile], cli.force);

  try {
    const sites = (await readTable(cli.inputFile)).slice(0, cli.limit);
    console.log(`🧭 Evaluating ${sites.length} sites with ${cli.modelName}`);

    const pool = createAdvisoryPool({
      maxConcurrency: cli.concurrency,
      model: cli.modelName,
      debug: cli.debug,
    });
    const advised = await adviseSites(pool, sites);
    await writeTable(cli.outputFile, advised);

    const stats = pool.getUsageStats();
    console.log(`\n📊 Usage Stats:`);
    console.log(`   - API Calls: ${stats.totalCalls}`);
    console.log(`   - Prompt Tokens: ${stats.totalPromptTokens.toLocaleString()}`);
    console.log(`   - Completion Tokens: ${stats.totalCompletionTokens.toLocaleString()}`);
    console.log(`   - Estimated Cost: $${stats.estimatedCost.toFixed(4)}`);
    console.log(`\n🎉 Done!`);
  } catch (error) {
    reportFatal(error);
  }
}

void main();
