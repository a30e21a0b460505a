import { getHarnessConfig } from '../config.js';
import { createFileReader, loadAsset, type AssetReader } from '../loaders/asset-loader.js';
import type { SynestheticAsset } from '../schemas/asset.schema.js';
import {
  collectValidationIssues,
  inspectAssetStructure,
  type StructureFinding,
} from '../validators/asset-validator.js';

import { BaseAgent } from './base-agent.js';
import { ConfigLoadError } from './errors.js';

export interface ConfigAgentOptions {
  /** Defaults to a file reader rooted at the configured assets directory */
  reader?: AssetReader;
  assetsDir?: string;
}

interface LoadedConfig {
  source: string;
  asset: SynestheticAsset;
  issues: readonly string[];
  findings: readonly StructureFinding[];
}

/**
 * Loads one asset description and derives its validation issues.
 * Read-only with respect to the source.
 */
export class ConfigAgent extends BaseAgent<[source?: string]> {
  private readonly reader: AssetReader;
  private loaded: LoadedConfig | undefined;

  constructor(
    private readonly defaultSource?: string,
    options: ConfigAgentOptions = {},
  ) {
    super('ConfigAgent');
    this.reader =
      options.reader ?? createFileReader(options.assetsDir ?? getHarnessConfig().assets.dir);
  }

  protected async onStart(source?: string): Promise<void> {
    const name = source ?? this.defaultSource;
    if (!name) {
      throw new ConfigLoadError('(none)', 'No asset source given');
    }

    const { asset } = await loadAsset(name, this.reader);
    const issues = collectValidationIssues(asset);
    const findings = inspectAssetStructure(asset);

    for (const issue of issues) {
      this.logger.warn(issue, { agent: this.name, source: name, event: 'validation-issue' });
    }
    this.logger.debug(`Loaded asset "${asset.name}"`, {
      agent: this.name,
      source: name,
      issues: issues.length,
      findings: findings.length,
    });

    this.loaded = {
      source: name,
      asset,
      issues: Object.freeze([...issues]),
      findings: Object.freeze(findings.map((finding) => Object.freeze({ ...finding }))),
    };
  }

  protected onStop(): void {
    this.loaded = undefined;
  }

  get asset(): SynestheticAsset {
    return this.current('read asset').asset;
  }

  get issues(): readonly string[] {
    return this.current('read issues').issues;
  }

  get findings(): readonly StructureFinding[] {
    return this.current('read findings').findings;
  }

  get source(): string {
    return this.current('read source').source;
  }

  private current(operation: string): LoadedConfig {
    this.assertStarted(operation);
    if (!this.loaded) {
      // Unreachable once started; onStart always sets it
      throw new ConfigLoadError(this.defaultSource ?? '(none)', 'Asset not loaded');
    }
    return this.loaded;
  }
}
