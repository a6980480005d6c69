import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, OptionValidationError } from '../../src/common/errors';
import { buildSampleConfig, DEFAULT_CONFIG, loadConfig, mergeConfigs, resolveConfig } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'envshroud-config-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('Config loader', () => {
  it('loads YAML config and merges profiles', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        `defaultStrategy: partial\npatterns:\n  "*_SECRET": full\n  "*_URL": none\nprofiles:\n  ci:\n    maskChar: "#"\n    patterns:\n      "*_URL": full\n`,
      );

      const base = await loadConfig(configPath);
      expect(base.defaultStrategy).toBe('partial');
      expect(base.maskChar).toBe('*');
      expect(base.patterns).toEqual({ '*_SECRET': 'full', '*_URL': 'none' });
      expect(base.cacheCapacity).toBe(200);

      const profile = await loadConfig(configPath, 'ci');
      expect(profile.maskChar).toBe('#');
      expect(profile.defaultStrategy).toBe('partial');
      expect(profile.patterns).toEqual({ '*_SECRET': 'full', '*_URL': 'full' });
    });
  });

  it('loads TOML and JSON config', async () => {
    await withTempDir(async (dir) => {
      const tomlPath = join(dir, 'config.toml');
      await writeFile(tomlPath, `skipComments = false\ndebounceMs = 50\n\n[strategies.partial]\nshow_start = 1\n`);
      const fromToml = await loadConfig(tomlPath);
      expect(fromToml.skipComments).toBe(false);
      expect(fromToml.debounceMs).toBe(50);
      expect(fromToml.strategies).toEqual({ partial: { show_start: 1 } });

      const jsonPath = join(dir, 'config.json');
      await writeFile(jsonPath, JSON.stringify({ sources: { '.env.example': 'none' }, logging: { level: 'debug' } }));
      const fromJson = await loadConfig(jsonPath);
      expect(fromJson.sources).toEqual({ '.env.example': 'none' });
      expect(fromJson.logging).toEqual({ level: 'debug' });
    });
  });

  it('parses the sample config it writes', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.envshroud.yaml');
      await writeFile(configPath, buildSampleConfig());
      const config = await loadConfig(configPath, 'ci');
      expect(config.patterns).toEqual({ '*_PUBLIC': 'full', '*_TOKEN': 'partial' });
      expect(config.sources).toEqual({ '.env.example': 'none' });
    });
  });

  it('rejects unknown formats, missing profiles and invalid values', async () => {
    await withTempDir(async (dir) => {
      const iniPath = join(dir, 'config.ini');
      await writeFile(iniPath, 'maskChar=*');
      await expect(loadConfig(iniPath)).rejects.toThrow(/Unsupported config format/);

      const yamlPath = join(dir, 'config.yml');
      await writeFile(yamlPath, 'maskChar: "##"\n');
      await expect(loadConfig(yamlPath)).rejects.toThrow(OptionValidationError);
      await expect(loadConfig(yamlPath)).rejects.toThrow('option "maskChar" must be exactly 1 character(s) long, got 2');

      const okPath = join(dir, 'ok.yml');
      await writeFile(okPath, 'maskChar: "#"\n');
      await expect(loadConfig(okPath, 'missing')).rejects.toThrow('Profile missing not found in config');
    });
  });
});

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({ cacheCapacity: 5 }).cacheCapacity).toBe(5);
  });

  it('validates scalar and map fields', () => {
    expect(() => resolveConfig({ cacheCapacity: 0 })).toThrow(
      'Invalid options for "config": option "cacheCapacity" must be >= 1, got 0',
    );
    expect(() => resolveConfig({ patterns: { '*_KEY': '' } })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ patterns: { '*_KEY': '' } })).toThrow('config: "patterns.*_KEY" must be a strategy name');
  });

  it('merges pattern maps per key', () => {
    const merged = mergeConfigs({ patterns: { A: 'full' }, maskChar: '*' }, { patterns: { B: 'none' }, maskChar: '#' });
    expect(merged).toEqual({ patterns: { A: 'full', B: 'none' }, maskChar: '#' });
  });
});
