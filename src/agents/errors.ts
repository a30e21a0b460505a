/**
 * Harness error kinds
 * Load and lifecycle errors are fail-fast; run failures carry partial results.
 */

import type { AgentLifecycle } from './lifecycle.js';
import type { StructureFinding } from '../validators/asset-validator.js';

import type { MirrorState } from './types.js';

export class LifecycleError extends Error {
  constructor(
    public readonly agent: string,
    public readonly status: AgentLifecycle,
    public readonly operation: string,
    message?: string,
  ) {
    super(message ?? `${agent}: cannot ${operation} while ${status}`);
    this.name = 'LifecycleError';
  }
}

export class ConfigLoadError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigLoadError';
  }
}

export interface ModulationRuleRef {
  id?: string;
  target_key?: string;
  waveform?: string;
}

export class ModulationError extends Error {
  constructor(
    message: string,
    public readonly rule?: ModulationRuleRef,
  ) {
    super(message);
    this.name = 'ModulationError';
  }
}

export interface SubscriberFailure {
  /** Registration index of the observer that threw */
  index: number;
  error: unknown;
}

export class SubscriberError extends Error {
  constructor(
    public readonly key: string,
    public readonly failures: readonly SubscriberFailure[],
  ) {
    const detail = failures
      .map(({ index, error }) => {
        const reason = error instanceof Error ? error.message : String(error);
        return `  - subscriber #${index}: ${reason}`;
      })
      .join('\n');
    super(`${failures.length} subscriber(s) failed on update of "${key}":\n${detail}`);
    this.name = 'SubscriberError';
  }
}

export interface PartialRunResult {
  runId: string;
  state: MirrorState;
  issues: readonly string[];
  findings: readonly StructureFinding[];
  /** Steps fully applied before the failure */
  stepsCompleted: number;
}

export class SimulationAbortedError extends Error {
  constructor(
    public readonly step: number,
    public readonly partial: PartialRunResult,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Simulation aborted at step ${step}: ${reason}`, { cause });
    this.name = 'SimulationAbortedError';
  }
}
