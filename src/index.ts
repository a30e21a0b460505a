export { AgentLifecycle, canTransition, validTransitions } from './agents/lifecycle.js';
export { BaseAgent } from './agents/base-agent.js';
export { ConfigAgent, type ConfigAgentOptions } from './agents/config-agent.js';
export { StateMirrorAgent } from './agents/state-mirror-agent.js';
export { ModulationAgent } from './agents/modulation-agent.js';
export {
  OrchestrationAgent,
  type OrchestrationOptions,
  type OrchestrationResult,
} from './agents/orchestration-agent.js';
export * from './agents/errors.js';
export type * from './agents/types.js';

export { evaluateRule, evaluateWaveform, requireTarget } from './modulation/waveforms.js';
export * from './schemas/index.js';
export * from './validators/asset-validator.js';
export {
  createFileReader,
  loadAsset,
  resolveAssetPath,
  type AssetReader,
  type LoadedAsset,
} from './loaders/asset-loader.js';

export { SnapshotCollector } from './diagnostics/snapshot-collector.js';
export * from './diagnostics/example-runner.js';

export { getHarnessConfig, loadHarnessConfig, reloadConfig, type HarnessConfig } from './config.js';
export { Logger, LogLevel, logger, type LogContext } from './utils/logger.js';
