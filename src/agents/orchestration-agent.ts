import { v7 as uuidv7 } from 'uuid';

import { requireTarget } from '../modulation/waveforms.js';
import {
  listControlParameters,
  listModulationRules,
  type SynestheticAsset,
} from '../schemas/asset.schema.js';
import type { StructureFinding } from '../validators/asset-validator.js';

import { BaseAgent } from './base-agent.js';
import { ConfigAgent, type ConfigAgentOptions } from './config-agent.js';
import { SimulationAbortedError } from './errors.js';
import { ModulationAgent } from './modulation-agent.js';
import { StateMirrorAgent } from './state-mirror-agent.js';
import type { MirrorState, SnapshotCallback, SnapshotObserver } from './types.js';

export interface OrchestrationOptions extends ConfigAgentOptions {
  /** Attached to the internal mirror for the duration of each run */
  observers?: ReadonlyArray<SnapshotObserver | SnapshotCallback>;
  /** Seed the mirror with control-parameter defaults instead of an empty state */
  seedControlDefaults?: boolean;
}

export interface OrchestrationResult {
  runId: string;
  assetName: string;
  state: MirrorState;
  issues: readonly string[];
  findings: readonly StructureFinding[];
  stepsCompleted: number;
}

function controlDefaults(asset: SynestheticAsset): MirrorState {
  const initial: MirrorState = new Map();
  for (const param of listControlParameters(asset)) {
    initial.set(param.parameter, param.default ?? 0);
  }
  return initial;
}

/**
 * Drives a fixed-step simulation of one asset's modulation rules against a
 * fresh mirror. Every run builds its own config, mirror and modulation agents.
 */
export class OrchestrationAgent extends BaseAgent {
  constructor(
    public readonly source: string,
    private readonly options: OrchestrationOptions = {},
  ) {
    super('OrchestrationAgent');
  }

  protected onStart(): void {}

  /**
   * @param steps - Number of steps; zero is a valid no-op run
   * @param dt - Virtual time between steps; step n runs at t = n * dt
   * @throws ConfigLoadError when the asset cannot be loaded (no mirror is created)
   * @throws SimulationAbortedError when a step fails, carrying the partial state
   */
  async run(steps: number, dt: number): Promise<OrchestrationResult> {
    this.assertStarted('run');
    if (!Number.isInteger(steps) || steps < 0) {
      throw new RangeError(`steps must be a non-negative integer, got ${steps}`);
    }
    if (!Number.isFinite(dt) || dt <= 0) {
      throw new RangeError(`dt must be a positive number, got ${dt}`);
    }

    const runId = uuidv7();
    const context = { runId, agent: this.name, source: this.source };
    this.logger.debug('Starting simulation', { ...context, steps, dt });

    const config = new ConfigAgent(this.source, {
      reader: this.options.reader,
      assetsDir: this.options.assetsDir,
    });
    await config.start();

    const { asset, issues, findings } = config;
    const rules = listModulationRules(asset);

    const mirror = new StateMirrorAgent();
    const modulation = new ModulationAgent();
    await mirror.start(this.options.seedControlDefaults ? controlDefaults(asset) : undefined);
    for (const observer of this.options.observers ?? []) {
      mirror.subscribe(observer);
    }
    await modulation.start();

    let step = 0;
    try {
      for (; step < steps; step++) {
        const t = step * dt;
        for (const rule of rules) {
          mirror.update(requireTarget(rule), modulation.valueAt(rule, t));
        }
      }
    } catch (error) {
      const partial = { runId, state: mirror.state, issues, findings, stepsCompleted: step };
      this.logger.error('Simulation aborted', error, { ...context, step });
      throw new SimulationAbortedError(step, partial, error);
    } finally {
      await modulation.stop();
      await mirror.stop();
      await config.stop();
    }

    const state = mirror.state;
    this.logger.info('Simulation complete', {
      ...context,
      steps,
      rules: rules.length,
      keys: state.size,
      issues: issues.length,
    });

    return { runId, assetName: asset.name, state, issues, findings, stepsCompleted: steps };
  }
}
