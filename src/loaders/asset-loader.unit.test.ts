import { describe, it, expect } from 'vitest';

import { ConfigLoadError } from '../agents/errors.js';
import { listModulationRules } from '../schemas/asset.schema.js';
import { createMemoryReader } from '../../tests/utils/memory-reader.js';

import { formatPath, loadAsset, resolveAssetPath } from './asset-loader.js';

describe('formatPath', () => {
  it('should render the root for an empty path', () => {
    expect(formatPath([])).toBe('(root)');
  });

  it('should join keys with dots and indices with brackets', () => {
    expect(formatPath(['shader', 'uniforms', 0, 'name'])).toBe('shader.uniforms[0].name');
  });
});

describe('resolveAssetPath', () => {
  it('should resolve relative sources under the assets directory', () => {
    expect(resolveAssetPath('a.json', '/srv/assets')).toBe('/srv/assets/a.json');
  });

  it('should keep absolute sources', () => {
    expect(resolveAssetPath('/tmp/b.json', '/srv/assets')).toBe('/tmp/b.json');
  });
});

describe('loadAsset', () => {
  it('should parse a minimal asset', async () => {
    const { asset, source } = await loadAsset(
      'min.json',
      createMemoryReader({ 'min.json': { name: 'Minimal' } }),
    );

    expect(source).toBe('min.json');
    expect(asset.name).toBe('Minimal');
    expect(listModulationRules(asset)).toEqual([]);
  });

  it('should fill rule defaults and accept target as an alias', async () => {
    const reader = createMemoryReader({
      'alias.json': {
        name: 'Alias',
        modulations: [{ target: 'tone.volume', waveform: 'sine', amplitude: 1, frequency: 2 }],
      },
    });

    const { asset } = await loadAsset('alias.json', reader);

    expect(listModulationRules(asset)).toEqual([
      {
        target_key: 'tone.volume',
        waveform: 'sine',
        amplitude: 1,
        frequency: 2,
        phase: 0,
        offset: 0,
        scale: 1,
      },
    ]);
  });

  it('should order inline rules before the nested modulation set', async () => {
    const rule = { waveform: 'sine', amplitude: 1, frequency: 1 };
    const reader = createMemoryReader({
      'both.json': {
        name: 'Both',
        modulations: [{ ...rule, target_key: 'first' }],
        modulation: { name: 'set', modulations: [{ ...rule, target_key: 'second' }] },
      },
    });

    const { asset } = await loadAsset('both.json', reader);

    expect(listModulationRules(asset).map((r) => r.target_key)).toEqual(['first', 'second']);
  });

  it('should list every schema issue with its path', async () => {
    const reader = createMemoryReader({
      'bad.json': {
        name: 'Bad',
        shader: { uniforms: [{ name: 'u_r', type: 'float', stage: 'geometry' }] },
        modulations: [{ target_key: 'x', waveform: 'sine', amplitude: 'loud', frequency: 1 }],
      },
    });

    try {
      await loadAsset('bad.json', reader);
      expect.unreachable('loadAsset should reject');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigLoadError);
      if (error instanceof ConfigLoadError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^shader\.uniforms\[0\]\.stage: /);
        expect(error.issues[1]).toBe('modulations[0].amplitude: Expected number, received string');
        expect(error.message.startsWith('Invalid asset in bad.json:\n  - shader.uniforms[0].stage'))
          .toBe(true);
      }
    }
  });

  it('should reject bounds where min exceeds max', async () => {
    const reader = createMemoryReader({
      'bounds.json': {
        name: 'Bounds',
        modulations: [
          { target_key: 'x', waveform: 'sine', amplitude: 1, frequency: 1, min: 2, max: 1 },
        ],
      },
    });

    await expect(loadAsset('bounds.json', reader)).rejects.toThrow(
      'modulations[0].min: min must not exceed max',
    );
  });

  it('should wrap parse failures with the source name', async () => {
    const reader = createMemoryReader({ 'text.json': 'not json' });

    await expect(loadAsset('text.json', reader)).rejects.toThrow(
      /^Failed to parse asset from text\.json: /,
    );
  });
});
