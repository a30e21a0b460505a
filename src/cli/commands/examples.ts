/**
 * CLI Command: asset-harness examples
 * Runs diagnostics over every example asset in a directory
 */

import { resolve } from 'node:path';

import { getHarnessConfig } from '../../config.js';
import { runExamples, type ExampleResult } from '../../diagnostics/example-runner.js';
import { cliOutput } from '../output.js';

export interface ExamplesOptions {
  dir?: string;
  steps?: number;
  dt?: number;
  verbose?: boolean;
}

function printDetails(result: ExampleResult): void {
  if (result.assetName) {
    cliOutput.print(`    Loaded: ${result.assetName}`);
  }
  if (result.stateKeys.length > 0) {
    cliOutput.print(`    Final state keys: ${result.stateKeys.join(', ')}`);
  }
  for (const issue of result.issues) {
    cliOutput.print(`    - ${issue}`, 'yellow');
  }
  for (const finding of result.findings) {
    cliOutput.print(`    - ${finding.message} (${finding.location})`, 'yellow');
  }
  if (result.error) {
    cliOutput.print(`    ${result.error}`, 'magenta');
  }
}

/**
 * @returns process exit code: 1 when any example failed
 */
export async function examplesCommand(options: ExamplesOptions = {}): Promise<number> {
  const dir = resolve(process.cwd(), options.dir ?? getHarnessConfig().assets.dir);
  const spinner = cliOutput.spinner(`Checking examples in ${dir}`);

  const summary = await runExamples(dir, {
    steps: options.steps,
    dt: options.dt,
    onResult: (result) => {
      spinner.text = `Checked ${result.file}`;
    },
  });
  spinner.stop();

  for (const result of summary.results) {
    if (result.status === 'pass') {
      cliOutput.success(result.file);
    } else if (result.status === 'warning') {
      cliOutput.warn(`${result.file} passed with warnings`);
    } else {
      cliOutput.error(`${result.file} failed`);
    }
    if (options.verbose || result.status === 'failure') {
      printDetails(result);
    }
  }

  cliOutput.blank();
  cliOutput.print('**Summary**');
  cliOutput.print(`  Passed:   ${summary.passed}`, 'cyan');
  cliOutput.print(`  Warnings: ${summary.warnings}`, 'yellow');
  cliOutput.print(`  Failed:   ${summary.failed}`, 'magenta');
  cliOutput.print(`  Total:    ${summary.total}`);

  return summary.failed > 0 ? 1 : 0;
}
