/**
 * Example Runner
 * Batch diagnostics over a directory of asset descriptions. One asset failing
 * never stops the batch; the caller decides what a failure means.
 */

import { readdir } from 'node:fs/promises';

import { SimulationAbortedError } from '../agents/errors.js';
import { OrchestrationAgent } from '../agents/orchestration-agent.js';
import { getHarnessConfig } from '../config.js';
import { createFileReader, type AssetReader } from '../loaders/asset-loader.js';
import { Logger } from '../utils/logger.js';
import type { StructureFinding } from '../validators/asset-validator.js';

export type ExampleStatus = 'pass' | 'warning' | 'failure';

export interface ExampleResult {
  file: string;
  status: ExampleStatus;
  assetName?: string;
  issues: readonly string[];
  findings: readonly StructureFinding[];
  stateKeys: string[];
  error?: string;
}

export interface ExampleSummary {
  results: ExampleResult[];
  passed: number;
  warnings: number;
  failed: number;
  total: number;
}

export interface RunExamplesOptions {
  steps?: number;
  dt?: number;
  /** Called after each example, in file order */
  onResult?: (result: ExampleResult) => void;
}

const logger = Logger.getInstance('ExampleRunner');

/**
 * JSON files in dir, sorted by name; files with "hold" in the name are parked
 * drafts and skipped.
 */
export async function listExampleFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .filter((name) => !name.includes('hold'))
    .sort();
}

export function classify(
  issues: readonly string[],
  findings: readonly StructureFinding[],
): ExampleStatus {
  return issues.length > 0 || findings.length > 0 ? 'warning' : 'pass';
}

export async function checkExample(
  file: string,
  reader: AssetReader,
  steps: number,
  dt: number,
): Promise<ExampleResult> {
  const orchestration = new OrchestrationAgent(file, { reader });
  await orchestration.start();

  try {
    const result = await orchestration.run(steps, dt);
    return {
      file,
      status: classify(result.issues, result.findings),
      assetName: result.assetName,
      issues: result.issues,
      findings: result.findings,
      stateKeys: Array.from(result.state.keys()),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`Example failed: ${file}`, { source: file, event: 'example-failed' });
    const partial = error instanceof SimulationAbortedError ? error.partial : undefined;
    return {
      file,
      status: 'failure',
      issues: partial?.issues ?? [],
      findings: partial?.findings ?? [],
      stateKeys: partial ? Array.from(partial.state.keys()) : [],
      error: message,
    };
  } finally {
    await orchestration.stop();
  }
}

export async function runExamples(
  dir: string,
  options: RunExamplesOptions = {},
): Promise<ExampleSummary> {
  const config = getHarnessConfig();
  const steps = options.steps ?? config.simulation.steps;
  const dt = options.dt ?? config.simulation.dt;
  const reader = createFileReader(dir);

  const files = await listExampleFiles(dir);
  logger.info(`Checking ${files.length} example(s)`, { dir, steps, dt });

  const results: ExampleResult[] = [];
  for (const file of files) {
    const result = await checkExample(file, reader, steps, dt);
    results.push(result);
    options.onResult?.(result);
  }

  const count = (status: ExampleStatus): number =>
    results.filter((result) => result.status === status).length;

  return {
    results,
    passed: count('pass'),
    warnings: count('warning'),
    failed: count('failure'),
    total: results.length,
  };
}
