/**
 * Asset Validator
 * Semantic checks on an already-typed asset. The schema guarantees shape;
 * these checks look for sections that parse but would not render or move.
 */

import {
  listControlParameters,
  listModulationRules,
  type InputParameter,
  type SynestheticAsset,
} from '../schemas/asset.schema.js';

export const MISSING_FRAGMENT_SHADER = 'Missing shader fragment code';
export const MISSING_SHADER_UNIFORMS = 'No shader uniforms defined';
export const DUPLICATE_CONTROL_PARAMETERS = 'Duplicate control parameters';

export type FindingSeverity = 'error' | 'warning' | 'info';

export interface StructureFinding {
  category: 'structure' | 'modulation';
  severity: FindingSeverity;
  message: string;
  location: string;
}

/**
 * Names occurring more than once, each listed once in order of first occurrence
 */
export function findDuplicateNames(names: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .filter(([, count]) => count > 1)
    .map(([name]) => name);
}

/**
 * Missing / duplicate issues reported by the config agent
 */
export function collectValidationIssues(asset: SynestheticAsset): string[] {
  const issues: string[] = [];

  if (asset.shader) {
    if (!asset.shader.fragment_shader?.trim()) {
      issues.push(MISSING_FRAGMENT_SHADER);
    }
    if (!asset.shader.uniforms || asset.shader.uniforms.length === 0) {
      issues.push(MISSING_SHADER_UNIFORMS);
    }
  }

  const duplicates = findDuplicateNames(listControlParameters(asset).map((p) => p.parameter));
  if (duplicates.length > 0) {
    issues.push(`${DUPLICATE_CONTROL_PARAMETERS}: ${duplicates.join(', ')}`);
  }

  return issues;
}

function addTargets(
  targets: Set<string>,
  component: string,
  params: readonly InputParameter[] | null | undefined,
): void {
  for (const param of params ?? []) {
    if (param.path) {
      targets.add(param.path);
    }
    targets.add(`${component}.${param.parameter}`);
  }
}

/**
 * Every key a modulation may legitimately drive
 */
export function collectKnownTargets(asset: SynestheticAsset): Set<string> {
  const targets = new Set<string>();
  addTargets(targets, 'shader', asset.shader?.input_parameters);
  addTargets(targets, 'tone', asset.tone?.input_parameters);
  addTargets(targets, 'haptic', asset.haptic?.input_parameters);
  for (const param of listControlParameters(asset)) {
    targets.add(param.parameter);
  }
  return targets;
}

export function inspectAssetStructure(asset: SynestheticAsset): StructureFinding[] {
  const findings: StructureFinding[] = [];
  const { shader, tone, haptic, control } = asset;

  if (shader?.input_parameters && shader.input_parameters.length > 0) {
    const uniformNames = new Set((shader.uniforms ?? []).map((uniform) => uniform.name));
    for (const param of shader.input_parameters) {
      if (!uniformNames.has(param.parameter)) {
        findings.push({
          category: 'structure',
          severity: 'warning',
          message: `Shader input parameter '${param.parameter}' has no corresponding uniform`,
          location: `shader.input_parameters.${param.parameter}`,
        });
      }
    }
  }

  if (tone && !tone.synth) {
    findings.push({
      category: 'structure',
      severity: 'warning',
      message: 'Embedded tone missing synth configuration',
      location: 'tone.synth',
    });
  }

  if (haptic && !haptic.device) {
    findings.push({
      category: 'structure',
      severity: 'warning',
      message: 'Embedded haptic missing device configuration',
      location: 'haptic.device',
    });
  }

  if (control && (!control.control_parameters || control.control_parameters.length === 0)) {
    findings.push({
      category: 'structure',
      severity: 'warning',
      message: 'Embedded control missing control_parameters',
      location: 'control.control_parameters',
    });
  }

  const knownTargets = collectKnownTargets(asset);
  listModulationRules(asset).forEach((rule, index) => {
    const label = rule.id ?? String(index);
    if (!rule.target_key) {
      findings.push({
        category: 'modulation',
        severity: 'error',
        message: `Modulation '${label}' has no target`,
        location: `modulations[${label}]`,
      });
      return;
    }
    // Only meaningful when the asset declares its parameters at all
    if (knownTargets.size > 0 && !knownTargets.has(rule.target_key)) {
      findings.push({
        category: 'modulation',
        severity: 'warning',
        message: `Modulation target '${rule.target_key}' does not match any declared parameter`,
        location: `modulations[${label}]`,
      });
    }
  });

  return findings;
}
