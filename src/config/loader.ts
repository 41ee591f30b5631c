import { readFile, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigError, describeError } from '../common/errors';
import { compilePatternUnion, mergeSecretPatterns } from '../scanner/patterns';
import { mergeSkipRules } from '../scanner/skip';
import type { ScanConfig, SecretPattern, SkipRuleSet } from '../scanner/types';
import type { GuardConfig, PatternConfig } from './types';

export const CONFIG_FILE_NAMES = [
  '.secret-guard.yaml',
  '.secret-guard.yml',
  '.secret-guard.toml',
  '.secret-guard.json',
];

const SKIP_KEYS: ReadonlyArray<keyof SkipRuleSet> = ['extensions', 'names', 'prefixes', 'globs'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseContents(contents: string, ext: string, source: string): unknown {
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return loadYaml(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        throw new ConfigError('unsupported config format', source);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`cannot parse: ${describeError(error)}`, source);
  }
}

function readStringList(value: unknown, field: string, source: string): string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new ConfigError(`"${field}" must be a list of strings`, source);
  }
  return value;
}

function readPattern(value: unknown, index: number, source: string): PatternConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`patterns[${index}] must be a table`, source);
  }
  const { id, description, pattern } = value;
  if (typeof id !== 'string' || id.trim() === '') {
    throw new ConfigError(`patterns[${index}].id must be a non-empty string`, source);
  }
  if (typeof pattern !== 'string' || pattern === '') {
    throw new ConfigError(`patterns[${index}].pattern must be a non-empty string`, source);
  }
  if (description !== undefined && typeof description !== 'string') {
    throw new ConfigError(`patterns[${index}].description must be a string`, source);
  }
  return { id, pattern, description };
}

export function validateConfig(raw: unknown, source: string): GuardConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError('top level must be a table', source);
  }

  const config: GuardConfig = {};
  if (raw.patterns !== undefined) {
    if (!Array.isArray(raw.patterns)) {
      throw new ConfigError('"patterns" must be a list', source);
    }
    config.patterns = raw.patterns.map((entry, index) => readPattern(entry, index, source));
  }
  if (raw.replaceDefaultPatterns !== undefined) {
    if (typeof raw.replaceDefaultPatterns !== 'boolean') {
      throw new ConfigError('"replaceDefaultPatterns" must be a boolean', source);
    }
    config.replaceDefaultPatterns = raw.replaceDefaultPatterns;
  }
  if (raw.skip !== undefined) {
    const skip = raw.skip;
    if (!isRecord(skip)) {
      throw new ConfigError('"skip" must be a table', source);
    }
    const rules: Partial<SkipRuleSet> = {};
    for (const key of SKIP_KEYS) {
      if (skip[key] !== undefined) {
        rules[key] = readStringList(skip[key], `skip.${key}`, source);
      }
    }
    config.skip = rules;
  }
  return config;
}

export async function loadConfig(path: string): Promise<GuardConfig> {
  const absolute = resolve(path);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read: ${describeError(error)}`, absolute);
  }
  const parsed = parseContents(contents, extname(absolute).toLowerCase(), absolute);
  return validateConfig(parsed, absolute);
}

/**
 * Look for a config file in `dir`, in CONFIG_FILE_NAMES order.
 */
export async function findConfigFile(dir: string): Promise<string | undefined> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(dir, name);
    const info = await stat(candidate).catch(() => undefined);
    if (info?.isFile()) {
      return candidate;
    }
  }
  return undefined;
}

function compilePattern(entry: PatternConfig, source?: string): SecretPattern {
  try {
    return { id: entry.id, description: entry.description ?? entry.id, pattern: new RegExp(entry.pattern) };
  } catch (error) {
    throw new ConfigError(`pattern ${entry.id} is not a valid regular expression: ${describeError(error)}`, source);
  }
}

/**
 * Merge a config with the defaults. The pattern union the scanner builds is compiled
 * here too, so patterns that are valid alone but clash together (a repeated named
 * group) are reported as a configuration problem.
 */
export function resolveScanConfig(config: GuardConfig = {}, source?: string): ScanConfig {
  const custom = (config.patterns ?? []).map((entry) => compilePattern(entry, source));
  const patterns = mergeSecretPatterns(custom, { replaceDefaults: config.replaceDefaultPatterns });
  if (patterns.length === 0) {
    throw new ConfigError('no secret patterns configured', source);
  }
  try {
    compilePatternUnion(patterns);
  } catch (error) {
    const ids = custom.map((pattern) => pattern.id).join(', ');
    throw new ConfigError(`patterns ${ids} cannot be combined: ${describeError(error)}`, source);
  }
  return {
    patterns,
    skip: mergeSkipRules(config.skip),
  };
}
