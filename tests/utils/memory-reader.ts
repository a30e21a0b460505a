import type { AssetReader } from '../../src/loaders/asset-loader.js';

/**
 * In-memory stand-in for the file reader. Objects are served as JSON,
 * strings as-is; unknown names reject like a missing file.
 */
export function createMemoryReader(sources: Record<string, unknown>): AssetReader {
  return async (source) => {
    if (!Object.prototype.hasOwnProperty.call(sources, source)) {
      throw new Error(`ENOENT: no such asset '${source}'`);
    }
    const value = sources[source];
    return typeof value === 'string' ? value : JSON.stringify(value);
  };
}

export function sineAsset(target = 'x'): Record<string, unknown> {
  return {
    name: 'Single Sine',
    modulations: [
      { target_key: target, waveform: 'sine', amplitude: 1, frequency: 1, phase: 0 },
    ],
  };
}
