#!/usr/bin/env node
import { config as appConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { PipelineFactory } from '../services/pipeline/PipelineFactory.js';
import { BatchStructurer } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import type { FileSummary, StructureRunConfig, StructureRunResult } from './types.js';

interface CliArgs {
  input?: string;
  output?: string;
  reorganization?: string;
  format?: StructureRunConfig['format'];
  invalidFormat?: string;
  print?: boolean;
  help?: boolean;
}

const HELP = `
Form Structure - Turn layout detections into a nested form hierarchy

Usage:
  npm run structure -- --input <file|folder> [options]

Options:
  --input <path>            Detection JSON file, or folder of them (required)
  --output <dir>            Output directory (default: OUTPUT_DIR or ./output)
  --reorganization <file>   Reorganization plan applied to every input
  --format <fmt>            Output format: table or json (default: table)
  --print                   Print the final hierarchy of each input
  --help                    Show this help message

Examples:
  npm run structure -- --input ./detections/page1.json
  npm run structure -- --input ./detections --output ./structured
  npm run structure -- --input ./detections/page1.json --reorganization ./plan.json --print
`;

const isFormat = (value: string | undefined): value is StructureRunConfig['format'] =>
  value === 'table' || value === 'json';

const parseArgs = (): CliArgs => {
  const args: CliArgs = {};
  const argv = process.argv.slice(2);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--output':
        args.output = argv[++i];
        break;
      case '--reorganization':
        args.reorganization = argv[++i];
        break;
      case '--format': {
        const format = argv[++i];
        if (isFormat(format)) {
          args.format = format;
        } else {
          args.invalidFormat = format ?? '';
        }
        break;
      }
      case '--print':
        args.print = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

const printTable = (files: FileSummary[]) => {
  const maxName = Math.max(20, ...files.map(f => f.fileName.length));
  const header = `${'File'.padEnd(maxName)} | Status    | Tables | Warnings`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);

  for (const file of files) {
    const tables = String(Object.keys(file.tables ?? {}).length);
    const warnings = String(file.warnings?.length ?? 0);
    console.log(`${file.fileName.padEnd(maxName)} | ${file.status.padEnd(9)} | ${tables.padEnd(6)} | ${warnings}`);
  }
  console.log(separator);
};

const printSummary = (result: StructureRunResult) => {
  const { summary } = result;
  console.log('\nSummary:');
  console.log(`  Total:     ${summary.total}`);
  console.log(`  Processed: ${summary.processed}`);
  console.log(`  Failed:    ${summary.failed}`);
  console.log(`  Tables:    ${summary.tables}`);
  console.log(`  Warnings:  ${summary.warnings}`);
};

const main = async (): Promise<void> => {
  const args = parseArgs();

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (!args.input) {
    console.error('Error: --input is required');
    console.log(HELP);
    process.exit(1);
  }

  if (args.invalidFormat !== undefined) {
    console.error(`Error: unknown format "${args.invalidFormat}"`);
    process.exit(1);
  }

  const runConfig: StructureRunConfig = {
    input: args.input,
    output: args.output ?? appConfig.output.directory,
    reorganization: args.reorganization,
    format: args.format ?? 'table',
    print: args.print ?? false,
  };

  const reporter = new ProgressReporter(runConfig.format !== 'json');
  const { pipeline } = PipelineFactory.create(appConfig, logger);
  const structurer = new BatchStructurer(pipeline, logger);

  try {
    logger.info({ input: runConfig.input, output: runConfig.output }, 'Starting form structuring');

    const result = await structurer.run(runConfig, reporter);

    if (runConfig.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nStructured ${result.files.length} files into ${runConfig.output}:\n`);
      printTable(result.files);
      printSummary(result);

      for (const file of result.files) {
        if (file.rendering) {
          console.log(`\n${file.fileName}`);
          console.log(file.rendering);
        }
      }
    }

    if (result.summary.failed > 0) process.exitCode = 1;
  } catch (error) {
    logger.error({ error }, 'Form structuring failed');
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
};

await main();
