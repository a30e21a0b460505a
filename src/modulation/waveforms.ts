import { ModulationError } from '../agents/errors.js';
import { isWaveform, type ModulationRule, type Waveform } from '../schemas/modulation.schema.js';

const TWO_PI = 2 * Math.PI;

export interface Oscillator {
  amplitude: number;
  /** Cycles per unit of virtual time */
  frequency: number;
  /** Radians */
  phase: number;
}

/**
 * Position within the current cycle, in [0, 1). Zero where the sine crosses
 * zero going up, so every waveform shares the sine's phase.
 */
function cyclePosition(angle: number): number {
  const turns = angle / TWO_PI;
  return turns - Math.floor(turns);
}

export function evaluateWaveform(waveform: Waveform, osc: Oscillator, t: number): number {
  const angle = TWO_PI * osc.frequency * t + osc.phase;
  const A = osc.amplitude;

  switch (waveform) {
    case 'sine':
      return A * Math.sin(angle);
    case 'square':
      return Math.sin(angle) >= 0 ? A : -A;
    case 'triangle': {
      const p = cyclePosition(angle);
      if (p < 0.25) return A * 4 * p;
      if (p < 0.75) return A * (2 - 4 * p);
      return A * (4 * p - 4);
    }
    case 'sawtooth': {
      const p = cyclePosition(angle);
      return A * (p < 0.5 ? 2 * p : 2 * p - 2);
    }
  }
}

function clamp(value: number, min: number | undefined, max: number | undefined): number {
  let result = value;
  if (min !== undefined) result = Math.max(min, result);
  if (max !== undefined) result = Math.min(max, result);
  return result;
}

/**
 * Mirror key a rule writes to
 * @throws ModulationError when the rule has no target
 */
export function requireTarget(rule: ModulationRule): string {
  if (!rule.target_key) {
    throw new ModulationError(`Modulation '${rule.id ?? rule.waveform}' has no target key`, {
      id: rule.id,
      waveform: rule.waveform,
    });
  }
  return rule.target_key;
}

/**
 * Value of one rule at virtual time t: offset + scale * wave, clamped to
 * [min, max] when bounds are given.
 * @throws ModulationError for an unknown waveform or a rule without a target
 */
export function evaluateRule(rule: ModulationRule, t: number): number {
  const target = requireTarget(rule);
  if (!isWaveform(rule.waveform)) {
    throw new ModulationError(`Unknown waveform '${rule.waveform}' for target '${target}'`, {
      id: rule.id,
      target_key: target,
      waveform: rule.waveform,
    });
  }

  const wave = evaluateWaveform(rule.waveform, rule, t);
  return clamp((rule.offset ?? 0) + (rule.scale ?? 1) * wave, rule.min, rule.max);
}
