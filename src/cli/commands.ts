import { resolve } from 'node:path';
import type { Writable } from 'node:stream';
import { ConfigError, describeError, SetupError } from '../common/errors';
import { getLogger } from '../common/logger';
import { findConfigFile, loadConfig, resolveScanConfig } from '../config';
import { GitStagingArea } from '../git';
import type { StagingArea } from '../git';
import { installHook } from '../installer';
import { renderBlockedReport, renderJsonReport, scanStaged, shouldUseColor } from '../scanner';
import type { ScanConfig } from '../scanner';

export const EXIT_ALLOW = 0;
export const EXIT_BLOCK = 1;
export const EXIT_FAILURE = 2;

export interface CommandIo {
  stdout: Writable & { isTTY?: boolean };
  stderr: Writable & { isTTY?: boolean };
  env: NodeJS.ProcessEnv;
}

export const processIo: CommandIo = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
};

export interface ScanCommandOptions {
  cwd: string;
  config?: string;
  json?: boolean;
  /** Defaults to the git index of `cwd`. */
  staging?: StagingArea;
}

async function readScanConfig(cwd: string, explicit?: string): Promise<ScanConfig> {
  const path = explicit ?? (await findConfigFile(cwd));
  if (!path) {
    return resolveScanConfig();
  }
  getLogger('config').debug(`Using config ${path}`);
  return resolveScanConfig(await loadConfig(path), resolve(path));
}

/**
 * Scan the index and report. Anything that prevents a verdict (bad config, git failing)
 * also blocks the commit, with a distinct exit code.
 */
export async function executeScan(options: ScanCommandOptions, io: CommandIo = processIo): Promise<number> {
  const log = getLogger('cli:scan');
  try {
    const config = await readScanConfig(options.cwd, options.config);
    const staging = options.staging ?? new GitStagingArea({ cwd: options.cwd });
    const result = await scanStaged(staging, config);

    if (options.json) {
      io.stdout.write(renderJsonReport(result));
    } else if (result.status === 'blocked') {
      io.stderr.write(renderBlockedReport(result, { color: shouldUseColor(io.stderr, io.env), details: true }));
    }
    return result.status === 'blocked' ? EXIT_BLOCK : EXIT_ALLOW;
  } catch (error) {
    const prefix = error instanceof ConfigError ? 'Invalid configuration' : 'Secret scan failed';
    log.error(`${prefix}: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}

export interface InstallCommandOptions {
  repo: string;
}

export async function executeInstall(options: InstallCommandOptions, io: CommandIo = processIo): Promise<number> {
  try {
    const result = await installHook({ repoRoot: options.repo });
    io.stdout.write(`Installed pre-commit hook: ${result.hookPath}\n`);
    io.stdout.write('It will block commits that include API keys or tokens.\n');
    return EXIT_ALLOW;
  } catch (error) {
    if (error instanceof SetupError) {
      io.stderr.write(`${error.message}\n`);
      return EXIT_BLOCK;
    }
    throw error;
  }
}

export interface PatternsCommandOptions {
  cwd: string;
  config?: string;
}

export async function executeListPatterns(options: PatternsCommandOptions, io: CommandIo = processIo): Promise<number> {
  try {
    const config = await readScanConfig(options.cwd, options.config);
    const width = Math.max(...config.patterns.map((pattern) => pattern.id.length));
    for (const pattern of config.patterns) {
      io.stdout.write(`${pattern.id.padEnd(width)}  ${pattern.description}\n`);
    }
    return EXIT_ALLOW;
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return EXIT_FAILURE;
  }
}
