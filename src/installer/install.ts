import { chmod, copyFile, mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { describeError, SetupError } from '../common/errors';
import { getLogger } from '../common/logger';

export const DEFAULT_HOOK_NAME = 'pre-commit';
export const HOOK_MODE = 0o755;

/** The hook script shipped with the package. */
export const PACKAGED_HOOK_SCRIPT = resolve(__dirname, '../../hooks/pre-commit');

export interface InstallOptions {
  /** Repository root; `.git` must be a directory directly below it. */
  repoRoot: string;
  source?: string;
  hookName?: string;
}

export interface InstallResult {
  hookPath: string;
  source: string;
  /** An earlier hook at the same path was overwritten. */
  replaced: boolean;
}

async function isDirectory(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => undefined);
  return info?.isDirectory() ?? false;
}

/**
 * Copy the hook script into `.git/hooks`, replacing whatever hook is there. Existing
 * hooks are not merged; chain them externally if several are needed.
 */
export async function installHook(options: InstallOptions): Promise<InstallResult> {
  const log = getLogger('install');
  const repoRoot = resolve(options.repoRoot);
  const source = resolve(options.source ?? PACKAGED_HOOK_SCRIPT);
  const gitDir = join(repoRoot, '.git');

  if (!(await isDirectory(gitDir))) {
    throw new SetupError(
      `No .git directory in ${repoRoot}. Run the installer from the repository root (where .git exists).`,
    );
  }
  const sourceInfo = await stat(source).catch(() => undefined);
  if (!sourceInfo?.isFile()) {
    throw new SetupError(`Hook script not found at ${source}`);
  }

  const hooksDir = join(gitDir, 'hooks');
  const hookPath = join(hooksDir, options.hookName ?? DEFAULT_HOOK_NAME);
  await mkdir(hooksDir, { recursive: true });
  const replaced = (await stat(hookPath).catch(() => undefined)) !== undefined;

  try {
    await chmod(source, HOOK_MODE);
  } catch (error) {
    log.warn(`Could not mark ${source} executable`, { reason: describeError(error) });
  }
  await copyFile(source, hookPath);
  await chmod(hookPath, HOOK_MODE);

  log.info(`Installed ${options.hookName ?? DEFAULT_HOOK_NAME} hook`, { hookPath, replaced });
  return { hookPath, source, replaced };
}
