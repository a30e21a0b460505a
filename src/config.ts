import { z } from 'zod';

import { Logger } from './utils/logger.js';

/**
 * HarnessConfig Schema
 *
 * Runtime concerns only: where assets live, how chatty the logger is and the
 * default step count / step size used by batch diagnostics. Asset content
 * itself is validated by the schemas under src/schemas.
 */
export const HarnessConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    structured: z.boolean().default(false),
  }),

  assets: z.object({
    dir: z.string().min(1).default('./examples'),
  }),

  simulation: z.object({
    steps: z.number().int().nonnegative().default(3),
    dt: z.number().positive().finite().default(0.1),
  }),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

/**
 * Build a validated config from environment variables.
 * Unset variables fall back to schema defaults.
 */
export function loadHarnessConfig(env: Env = process.env): HarnessConfig {
  const rawConfig = {
    logging: {
      level: env['LOG_LEVEL']?.toLowerCase(),
      structured: parseBoolean(env['LOG_STRUCTURED']),
    },
    assets: {
      dir: env['HARNESS_ASSETS_DIR'],
    },
    simulation: {
      steps: parseNumber(env['HARNESS_STEPS']),
      dt: parseNumber(env['HARNESS_DT']),
    },
  };

  const result = HarnessConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const logger = Logger.getInstance('Config');
    logger.error('Configuration validation failed');
    for (const issue of result.error.issues) {
      logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid configuration');
  }
  return result.data;
}

class ConfigManager {
  private static instance: ConfigManager | undefined;
  private _config: HarnessConfig | undefined;

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  // Lazy so that importing the harness never throws on a bad environment
  public get(): HarnessConfig {
    if (!this._config) {
      this._config = loadHarnessConfig();
    }
    return this._config;
  }

  public reload(): void {
    this._config = loadHarnessConfig();
  }
}

export const getHarnessConfig = (): HarnessConfig => ConfigManager.getInstance().get();

export const reloadConfig = (): void => ConfigManager.getInstance().reload();
