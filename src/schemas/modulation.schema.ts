import { z } from 'zod';

/**
 * Modulation Schema
 * LFO rules that drive mirror keys over virtual time
 */

export const WAVEFORMS = ['sine', 'triangle', 'square', 'sawtooth'] as const;

export const WaveformSchema = z.enum(WAVEFORMS);

// Waveform and target stay loosely typed here: an unknown waveform or a rule
// without a target is a run-time ModulationError, not a load failure.
export const ModulationRuleSchema = z
  .object({
    id: z.string().optional(),
    target_key: z.string().optional(),
    target: z.string().optional(),
    waveform: z.string(),
    amplitude: z.number().finite(),
    frequency: z.number().finite(),
    phase: z.number().finite().default(0),
    offset: z.number().finite().default(0),
    scale: z.number().finite().default(1),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  })
  .refine((rule) => rule.min === undefined || rule.max === undefined || rule.min <= rule.max, {
    message: 'min must not exceed max',
    path: ['min'],
  })
  .transform(({ target, target_key, ...rule }) => ({
    ...rule,
    target_key: target_key ?? target,
  }));

export const ModulationSetSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  modulations: z.array(ModulationRuleSchema).default([]),
});

export type Waveform = z.infer<typeof WaveformSchema>;
export type ModulationSet = z.output<typeof ModulationSetSchema>;

/**
 * A rule as evaluated by the modulation agent. Parsed rules always carry
 * offset and scale; hand-built rules may omit them.
 */
export interface ModulationRule {
  id?: string;
  target_key?: string;
  waveform: string;
  amplitude: number;
  frequency: number;
  phase: number;
  offset?: number;
  scale?: number;
  min?: number;
  max?: number;
}

export function isWaveform(value: string): value is Waveform {
  return WaveformSchema.safeParse(value).success;
}
