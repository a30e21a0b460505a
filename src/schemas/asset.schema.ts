import { z } from 'zod';

import { ModulationRuleSchema, ModulationSetSchema } from './modulation.schema.js';

/**
 * Synesthetic Asset Schema
 * Typed nested representation of one asset description. Every section is
 * optional; semantic completeness is checked afterwards by the asset validator.
 */

export const UniformSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['vec2', 'vec3', 'vec4', 'float', 'int', 'bool']),
  stage: z.enum(['vertex', 'fragment']),
  default: z.unknown().optional(),
});

export const InputParameterSchema = z.object({
  name: z.string().optional(),
  parameter: z.string().min(1),
  path: z.string().optional(),
  type: z.string().optional(),
  default: z.number().finite().optional(),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
  step: z.number().finite().optional(),
});

export const ShaderSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  vertex_shader: z.string().nullish(),
  fragment_shader: z.string().nullish(),
  uniforms: z.array(UniformSchema).nullish(),
  input_parameters: z.array(InputParameterSchema).nullish(),
});

export const ToneSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  synth: z.record(z.string(), z.unknown()).nullish(),
  effects: z.array(z.unknown()).nullish(),
  input_parameters: z.array(InputParameterSchema).nullish(),
});

export const HapticSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  device: z.record(z.string(), z.unknown()).nullish(),
  input_parameters: z.array(InputParameterSchema).nullish(),
});

export const ControlParameterSchema = z.object({
  parameter: z.string().min(1),
  label: z.string().optional(),
  type: z.string().optional(),
  unit: z.string().optional(),
  default: z.union([z.number().finite(), z.boolean(), z.string()]).optional(),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
  step: z.number().finite().optional(),
});

export const ControlSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  control_parameters: z.array(ControlParameterSchema).nullish(),
});

export const SynestheticAssetSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  meta_info: z.record(z.string(), z.unknown()).nullish(),
  shader: ShaderSchema.nullish(),
  tone: ToneSchema.nullish(),
  haptic: HapticSchema.nullish(),
  control: ControlSchema.nullish(),
  control_parameters: z.array(ControlParameterSchema).nullish(),
  modulations: z.array(ModulationRuleSchema).nullish(),
  modulation: ModulationSetSchema.nullish(),
});

export type Uniform = z.infer<typeof UniformSchema>;
export type InputParameter = z.infer<typeof InputParameterSchema>;
export type Shader = z.infer<typeof ShaderSchema>;
export type Tone = z.infer<typeof ToneSchema>;
export type Haptic = z.infer<typeof HapticSchema>;
export type ControlParameter = z.infer<typeof ControlParameterSchema>;
export type Control = z.infer<typeof ControlSchema>;
export type SynestheticAsset = z.output<typeof SynestheticAssetSchema>;
export type ParsedModulationRule = z.output<typeof ModulationRuleSchema>;

/**
 * Modulation rules in application order: inline rules first, then the
 * nested modulation set.
 */
export function listModulationRules(asset: SynestheticAsset): ParsedModulationRule[] {
  return [...(asset.modulations ?? []), ...(asset.modulation?.modulations ?? [])];
}

/**
 * Control parameters in declaration order: top-level list first, then the
 * control section.
 */
export function listControlParameters(asset: SynestheticAsset): ControlParameter[] {
  return [...(asset.control_parameters ?? []), ...(asset.control?.control_parameters ?? [])];
}
