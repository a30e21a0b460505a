import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

import { ConfigLoadError } from '../agents/errors.js';
import { SynestheticAssetSchema, type SynestheticAsset } from '../schemas/asset.schema.js';

/**
 * Reads the raw text of a named asset source
 */
export type AssetReader = (source: string) => Promise<string>;

export interface LoadedAsset {
  asset: SynestheticAsset;
  source: string;
}

/**
 * Resolve a source name against the assets directory.
 * Absolute paths are used as given.
 */
export function resolveAssetPath(source: string, assetsDir: string): string {
  return isAbsolute(source) ? source : resolve(assetsDir, source);
}

export function createFileReader(assetsDir: string): AssetReader {
  return (source) => readFile(resolveAssetPath(source, assetsDir), 'utf-8');
}

export function formatPath(segments: ReadonlyArray<string | number>): string {
  if (segments.length === 0) {
    return '(root)';
  }

  return segments
    .map((segment, index) => {
      if (typeof segment === 'number') {
        return `[${segment}]`;
      }
      return index === 0 ? segment : `.${segment}`;
    })
    .join('');
}

/**
 * Read, parse and validate one asset description
 * @param source - Source name handed to the reader
 * @param reader - Where the text comes from
 * @throws ConfigLoadError when the source is unreadable, not JSON or fails the schema
 */
export async function loadAsset(source: string, reader: AssetReader): Promise<LoadedAsset> {
  let text: string;
  try {
    text = await reader(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(source, `Failed to read asset from ${source}: ${reason}`, [], {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(source, `Failed to parse asset from ${source}: ${reason}`, [], {
      cause: error,
    });
  }

  const result = SynestheticAssetSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`);
    throw new ConfigLoadError(
      source,
      `Invalid asset in ${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      issues,
      { cause: result.error },
    );
  }

  return { asset: result.data, source };
}
