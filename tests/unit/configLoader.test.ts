import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../src/common/errors';
import { findConfigFile, loadConfig, resolveScanConfig } from '../../src/config';
import { DEFAULT_SECRET_PATTERNS } from '../../src/scanner/patterns';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'secret-guard-config-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('Config loader', () => {
  it('loads YAML config and merges it with the defaults', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.secret-guard.yaml');
      await writeFile(
        configPath,
        `patterns:\n  - id: internal-token\n    description: Internal service token\n    pattern: "itk_[A-Za-z0-9]{24,}"\nskip:\n  prefixes:\n    - fixtures/\n`,
      );

      const loaded = await loadConfig(configPath);
      expect(loaded.patterns).toEqual([
        { id: 'internal-token', description: 'Internal service token', pattern: 'itk_[A-Za-z0-9]{24,}' },
      ]);

      const config = resolveScanConfig(loaded);
      expect(config.patterns).toHaveLength(DEFAULT_SECRET_PATTERNS.length + 1);
      expect(config.patterns[config.patterns.length - 1].pattern.source).toBe('itk_[A-Za-z0-9]{24,}');
      expect(config.skip.prefixes).toEqual(['.github/', 'fixtures/']);
    });
  });

  it('loads TOML config that replaces the default patterns', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.secret-guard.toml');
      await writeFile(
        configPath,
        `replaceDefaultPatterns = true\n\n[[patterns]]\nid = "internal-token"\npattern = "itk_[A-Za-z0-9]{24,}"\n`,
      );

      const config = resolveScanConfig(await loadConfig(configPath));
      expect(config.patterns.map((pattern) => pattern.id)).toEqual(['internal-token']);
      expect(config.patterns[0].description).toBe('internal-token');
    });
  });

  it('treats an empty YAML file as no configuration', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.secret-guard.yml');
      await writeFile(configPath, '');
      await expect(loadConfig(configPath)).resolves.toEqual({});
    });
  });

  it('rejects fields of the wrong type', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.secret-guard.yaml');
      await writeFile(configPath, 'skip:\n  prefixes: fixtures/\n');
      await expect(loadConfig(configPath)).rejects.toThrow('"skip.prefixes" must be a list of strings');
    });
  });

  it('rejects unsupported formats', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'guard.ini');
      await writeFile(configPath, 'patterns=');
      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadConfig(configPath)).rejects.toThrow(/unsupported config format/);
    });
  });

  it('rejects invalid JSON', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, '.secret-guard.json');
      await writeFile(configPath, '{ "patterns": ');
      await expect(loadConfig(configPath)).rejects.toThrow(/cannot parse/);
    });
  });

  it('finds the config file in a directory', async () => {
    await withTempDir(async (dir) => {
      await expect(findConfigFile(dir)).resolves.toBeUndefined();
      await writeFile(join(dir, '.secret-guard.toml'), '');
      await expect(findConfigFile(dir)).resolves.toBe(join(dir, '.secret-guard.toml'));
    });
  });
});

describe('resolveScanConfig', () => {
  it('uses the defaults without a config file', () => {
    const config = resolveScanConfig();
    expect(config.patterns).toEqual(DEFAULT_SECRET_PATTERNS);
    expect(config.skip.names).toEqual(['.env.example', 'LICENSE', 'COPYING']);
  });

  it('rejects an invalid regular expression', () => {
    expect(() => resolveScanConfig({ patterns: [{ id: 'broken', pattern: '(' }] })).toThrow(
      /pattern broken is not a valid regular expression/,
    );
  });

  it('rejects custom patterns that cannot share one union', () => {
    const clash = {
      patterns: [
        { id: 'alpha', pattern: 'A_(?<v>[a-z]{8})' },
        { id: 'beta', pattern: 'B_(?<v>[a-z]{8})' },
      ],
    };
    expect(() => resolveScanConfig(clash, '/repo/.secret-guard.yaml')).toThrow(ConfigError);
    expect(() => resolveScanConfig(clash, '/repo/.secret-guard.yaml')).toThrow(
      /^\/repo\/\.secret-guard\.yaml: patterns alpha, beta cannot be combined/,
    );
  });

  it('rejects an empty pattern set', () => {
    expect(() => resolveScanConfig({ replaceDefaultPatterns: true })).toThrow('no secret patterns configured');
  });
});
