import { runCommand, runCommandBuffer } from '../common/exec';
import { describeError, StagedContentError } from '../common/errors';

export type StagedContent =
  | { ok: true; content: Buffer }
  | { ok: false; error: StagedContentError };

/**
 * Read-only view of the index (staging area) of a repository.
 */
export interface StagingArea {
  /** Paths whose staged blob should be inspected: added, copied, modified and renamed. */
  listChangedPaths(): Promise<string[]>;
  readStagedContent(path: string): Promise<StagedContent>;
}

export interface GitStagingAreaOptions {
  /** Repository root (or any directory inside the work tree). */
  cwd: string;
  timeoutMs?: number;
}

// Renames are included so the post-rename path is scanned even with no content change.
const DIFF_FILTER = 'ACMR';

export function parseNulSeparated(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

export class GitStagingArea implements StagingArea {
  constructor(private readonly options: GitStagingAreaOptions) {}

  async listChangedPaths(): Promise<string[]> {
    const { stdout } = await runCommand(
      'git',
      ['diff', '--cached', '--name-only', '-z', `--diff-filter=${DIFF_FILTER}`],
      this.execOptions(),
    );
    return parseNulSeparated(stdout);
  }

  async readStagedContent(path: string): Promise<StagedContent> {
    try {
      const { stdout } = await runCommandBuffer('git', ['show', `:${path}`], this.execOptions());
      return { ok: true, content: stdout };
    } catch (error) {
      return { ok: false, error: new StagedContentError(path, describeError(error)) };
    }
  }

  private execOptions() {
    return {
      cwd: this.options.cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      timeoutMs: this.options.timeoutMs,
    };
  }
}
