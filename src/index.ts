#!/usr/bin/env node

import fs from 'fs/promises';
import { loadConversionConfig, type ConfigOverrides } from './config.js';
import { convertDirectory, convertFile, defaultOutputPath } from './conversion/pipeline.js';
import { ConversionError, ConversionErrorCode, withErrorContext } from './conversion/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage: docx-bits <input.docx|document.xml|directory> [--out <dir>] [--style-map <file>] [--labels <file>]`;

interface CliArguments {
  input: string;
  outDir?: string;
  overrides: ConfigOverrides;
}

function parseArguments(argv: readonly string[]): CliArguments | null {
  const overrides: ConfigOverrides = {};
  let input: string | undefined;
  let outDir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = (): string => {
      const next = argv[++i];
      if (next === undefined || next.startsWith('--')) throw new Error(`Missing value for ${arg}`);
      return next;
    };
    switch (arg) {
      case '--out':
        outDir = value();
        break;
      case '--style-map':
        overrides.styleMapPath = value();
        break;
      case '--labels':
        overrides.labelsPath = value();
        break;
      case '--help':
      case '-h':
        return null;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}`);
        if (input !== undefined) throw new Error(`Unexpected argument ${arg}`);
        input = arg;
    }
  }
  if (input === undefined) throw new Error('No input given');
  return { input, outDir, overrides };
}

async function run(argv: readonly string[]): Promise<number> {
  let args: CliArguments | null;
  try {
    args = parseArguments(argv);
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${USAGE}\n`);
    return 1;
  }
  if (!args) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = loadConversionConfig(args.overrides);
  const input = args.input;
  const stats = await withErrorContext(() => fs.stat(input), ConversionErrorCode.INPUT_READ_FAILED, { inputPath: input });

  if (stats.isDirectory()) {
    const outcomes = await convertDirectory(args.input, args.outDir, { config });
    const failed = outcomes.filter((outcome) => outcome.error !== null);
    logger.info(`${outcomes.length - failed.length} of ${outcomes.length} documents converted`);
    return failed.length > 0 ? 1 : 0;
  }

  const outcome = await convertFile(args.input, defaultOutputPath(args.input, args.outDir), { config });
  logger.info(`wrote ${outcome.outputPath}`);
  return 0;
}

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConversionError) {
      logger.error(`${error.code}: ${error.message}`);
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    process.exitCode = 1;
  });
