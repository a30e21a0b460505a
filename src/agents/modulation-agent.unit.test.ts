import { describe, it, expect, beforeEach } from 'vitest';

import type { ModulationRule } from '../schemas/modulation.schema.js';

import { LifecycleError, ModulationError } from './errors.js';
import { ModulationAgent } from './modulation-agent.js';

const sine: ModulationRule = {
  target_key: 'x',
  waveform: 'sine',
  amplitude: 1,
  frequency: 1,
  phase: 0,
};

describe('ModulationAgent', () => {
  let agent: ModulationAgent;

  beforeEach(() => {
    agent = new ModulationAgent();
  });

  it('should produce 0, 1, 0, -1 for a unit sine at quarter periods', async () => {
    await agent.start();

    const values = [0, 0.25, 0.5, 0.75].map((t) => agent.valueAt(sine, t));

    [0, 1, 0, -1].forEach((expected, i) => {
      expect(values[i]).toBeCloseTo(expected, 9);
    });
  });

  it('should give the same value for the same rule and time', async () => {
    await agent.start();

    expect(agent.valueAt(sine, 0.37)).toBe(agent.valueAt(sine, 0.37));
  });

  it('should surface unknown waveforms as modulation errors', async () => {
    await agent.start();

    expect(() => agent.valueAt({ ...sine, waveform: 'noise' }, 0)).toThrow(ModulationError);
  });

  it('should only compute while started', async () => {
    expect(() => agent.valueAt(sine, 0)).toThrow(LifecycleError);

    await agent.start();
    await agent.stop();

    expect(() => agent.valueAt(sine, 0)).toThrow(
      'ModulationAgent: cannot compute modulation while stopped',
    );
  });
});
