/**
 * CLI Command: asset-harness simulate
 * Runs the fixed-step simulation for one asset and prints the final state
 */

import { resolve } from 'node:path';

import { ConfigLoadError, SimulationAbortedError } from '../../agents/errors.js';
import { OrchestrationAgent } from '../../agents/orchestration-agent.js';
import type { MirrorState } from '../../agents/types.js';
import { getHarnessConfig } from '../../config.js';
import { createFileReader } from '../../loaders/asset-loader.js';
import { cliOutput } from '../output.js';

export interface SimulateOptions {
  source: string;
  assetsDir?: string;
  steps?: number;
  dt?: number;
  format?: 'json' | 'table';
  seedDefaults?: boolean;
}

function printTable(state: MirrorState): void {
  if (state.size === 0) {
    cliOutput.info('Mirror state is empty');
    return;
  }
  const width = Math.max(...Array.from(state.keys(), (key) => key.length));
  for (const [key, value] of state) {
    cliOutput.print(`  ${key.padEnd(width)}  ${JSON.stringify(value)}`);
  }
}

/**
 * @returns process exit code
 */
export async function simulateCommand(options: SimulateOptions): Promise<number> {
  const config = getHarnessConfig();
  const steps = options.steps ?? config.simulation.steps;
  const dt = options.dt ?? config.simulation.dt;
  const reader = createFileReader(resolve(process.cwd(), options.assetsDir ?? '.'));

  const agent = new OrchestrationAgent(options.source, {
    reader,
    seedControlDefaults: options.seedDefaults,
  });
  await agent.start();

  try {
    const result = await agent.run(steps, dt);

    if (options.format === 'json') {
      console.log(
        JSON.stringify(
          {
            asset: result.assetName,
            steps,
            dt,
            // [key, value] pairs, in update order
            state: Array.from(result.state),
            issues: result.issues,
          },
          null,
          2,
        ),
      );
      return 0;
    }

    cliOutput.success(`Simulated **${result.assetName}** for ${steps} step(s), dt=${dt}`);
    printTable(result.state);
    for (const issue of result.issues) {
      cliOutput.warn(issue);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      cliOutput.error(error.message);
      return 1;
    }
    if (error instanceof SimulationAbortedError) {
      cliOutput.error(error.message);
      cliOutput.print(`State after ${error.partial.stepsCompleted} complete step(s):`);
      printTable(error.partial.state);
      return 1;
    }
    throw error;
  } finally {
    await agent.stop();
  }
}
