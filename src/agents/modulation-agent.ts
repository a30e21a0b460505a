import { evaluateRule } from '../modulation/waveforms.js';
import type { ModulationRule } from '../schemas/modulation.schema.js';

import { BaseAgent } from './base-agent.js';

/**
 * Computes LFO values for modulation rules. Holds no state between calls and
 * never writes to a mirror; the caller applies the value.
 */
export class ModulationAgent extends BaseAgent {
  constructor() {
    super('ModulationAgent');
  }

  protected onStart(): void {}

  valueAt(rule: ModulationRule, t: number): number {
    this.assertStarted('compute modulation');
    return evaluateRule(rule, t);
  }
}
