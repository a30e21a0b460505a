/**
 * CLI Command: asset-harness check
 * Loads one asset and reports validation issues and structural findings
 */

import { resolve } from 'node:path';

import { ConfigAgent } from '../../agents/config-agent.js';
import { ConfigLoadError } from '../../agents/errors.js';
import { createFileReader } from '../../loaders/asset-loader.js';
import { cliOutput } from '../output.js';

export interface CheckOptions {
  source: string;
  /** Directory the source is resolved against (default: cwd) */
  assetsDir?: string;
  verbose?: boolean;
}

/**
 * @returns process exit code
 */
export async function checkCommand(options: CheckOptions): Promise<number> {
  const reader = createFileReader(resolve(process.cwd(), options.assetsDir ?? '.'));
  const agent = new ConfigAgent(options.source, { reader });

  cliOutput.print(`Checking \`${options.source}\`...`);
  cliOutput.blank();

  try {
    await agent.start();
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      cliOutput.error(error.message);
      return 1;
    }
    throw error;
  }

  try {
    const { asset, issues, findings } = agent;
    cliOutput.success(`Loaded **${asset.name}**`);
    if (options.verbose && asset.description) {
      cliOutput.print(`  ${asset.description}`);
    }

    for (const issue of issues) {
      cliOutput.warn(issue);
    }
    for (const finding of findings) {
      const line = `${finding.message} (${finding.location})`;
      if (finding.severity === 'error') {
        cliOutput.error(line);
      } else if (finding.severity === 'warning' || options.verbose) {
        cliOutput.warn(line);
      }
    }

    cliOutput.blank();
    if (issues.length === 0 && findings.length === 0) {
      cliOutput.success('All validations passed');
    } else {
      cliOutput.print(`${issues.length} issue(s), ${findings.length} finding(s)`, 'yellow');
    }
    return 0;
  } finally {
    await agent.stop();
  }
}
