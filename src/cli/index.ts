#!/usr/bin/env node
/**
 * Asset Harness CLI
 * Validate and simulate asset descriptions from the command line
 */

import process from 'node:process';

import { Logger } from '../utils/logger.js';

import { flagOption, numberOption, parseArgs, stringOption } from './args.js';
import { checkCommand, examplesCommand, simulateCommand } from './commands/index.js';

function printHelp(): void {
  console.log(`
Asset Harness CLI

Usage:
  asset-harness <command> [options]

Commands:
  check <source>          Load an asset and report validation issues
    --assets-dir <dir>    Directory the source is resolved against (default: .)
    --verbose             Show informational findings

  simulate <source>       Run the fixed-step simulation and print the final state
    --assets-dir <dir>    Directory the source is resolved against (default: .)
    --steps <n>           Number of steps (default: HARNESS_STEPS or 3)
    --dt <seconds>        Virtual time per step (default: HARNESS_DT or 0.1)
    --format <json|table> Output format (default: table)
    --seed-defaults       Seed the mirror with control-parameter defaults

  examples                Check every example asset in a directory
    --dir <dir>           Examples directory (default: HARNESS_ASSETS_DIR or ./examples)
    --steps <n>           Number of steps per example
    --dt <seconds>        Virtual time per step
    --verbose             Show details for every example

  help                    Show this help message

Environment:
  LOG_LEVEL               debug | info | warn | error (default: info)
  LOG_STRUCTURED          Emit JSON Lines logs when "true"
  HARNESS_ASSETS_DIR      Default examples directory
  HARNESS_STEPS           Default step count
  HARNESS_DT              Default step size

Examples:
  asset-harness check examples/SynestheticAsset_Example1.json
  asset-harness simulate examples/SynestheticAsset_Example1.json --steps 8 --dt 0.25
  asset-harness examples --verbose
`);
}

function requireSource(args: string[], command: string): string {
  const [source] = args;
  if (!source) {
    throw new Error(`${command} requires a <source> argument`);
  }
  return source;
}

async function main(): Promise<void> {
  const { command, args, options } = parseArgs(process.argv.slice(2));
  const logger = Logger.getInstance('CLI');

  try {
    switch (command) {
      case 'check':
        process.exitCode = await checkCommand({
          source: requireSource(args, 'check'),
          assetsDir: stringOption(options, 'assets-dir'),
          verbose: flagOption(options, 'verbose'),
        });
        break;

      case 'simulate': {
        const format = stringOption(options, 'format');
        process.exitCode = await simulateCommand({
          source: requireSource(args, 'simulate'),
          assetsDir: stringOption(options, 'assets-dir'),
          steps: numberOption(options, 'steps'),
          dt: numberOption(options, 'dt'),
          format: format === 'json' ? 'json' : 'table',
          seedDefaults: flagOption(options, 'seed-defaults'),
        });
        break;
      }

      case 'examples':
        process.exitCode = await examplesCommand({
          dir: stringOption(options, 'dir'),
          steps: numberOption(options, 'steps'),
          dt: numberOption(options, 'dt'),
          verbose: flagOption(options, 'verbose'),
        });
        break;

      case 'help':
      case undefined:
        printHelp();
        break;

      default:
        logger.error(`Unknown command: ${command}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', error);
    process.exitCode = 1;
  }
}

void main();
