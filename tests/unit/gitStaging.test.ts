import { describe, it, expect, beforeEach, vi } from 'vitest';

const execMocks = vi.hoisted(() => ({
  runCommandMock: vi.fn(),
  runCommandBufferMock: vi.fn(),
}));

vi.mock('../../src/common/exec', () => ({
  runCommand: execMocks.runCommandMock,
  runCommandBuffer: execMocks.runCommandBufferMock,
}));

import { CommandError, StagedContentError } from '../../src/common/errors';
import { GitStagingArea, parseNulSeparated } from '../../src/git/staging';

beforeEach(() => {
  execMocks.runCommandMock.mockReset();
  execMocks.runCommandBufferMock.mockReset();
});

describe('GitStagingArea', () => {
  it('lists added, copied, modified and renamed paths from the index', async () => {
    execMocks.runCommandMock.mockResolvedValue({ stdout: 'a.py\0dir/with space.ts\0', stderr: '' });
    const staging = new GitStagingArea({ cwd: '/repo' });

    await expect(staging.listChangedPaths()).resolves.toEqual(['a.py', 'dir/with space.ts']);
    expect(execMocks.runCommandMock).toHaveBeenCalledWith(
      'git',
      ['diff', '--cached', '--name-only', '-z', '--diff-filter=ACMR'],
      expect.objectContaining({ cwd: '/repo' }),
    );
  });

  it('returns an empty list when nothing is staged', async () => {
    execMocks.runCommandMock.mockResolvedValue({ stdout: '', stderr: '' });
    await expect(new GitStagingArea({ cwd: '/repo' }).listChangedPaths()).resolves.toEqual([]);
  });

  it('reads the staged blob, not the working tree file', async () => {
    const content = Buffer.from('staged');
    execMocks.runCommandBufferMock.mockResolvedValue({ stdout: content, stderr: '' });
    const staging = new GitStagingArea({ cwd: '/repo' });

    await expect(staging.readStagedContent('src/a.py')).resolves.toEqual({ ok: true, content });
    expect(execMocks.runCommandBufferMock).toHaveBeenCalledWith(
      'git',
      ['show', ':src/a.py'],
      expect.objectContaining({ cwd: '/repo' }),
    );
  });

  it('turns a failed fetch into a StagedContentError result', async () => {
    execMocks.runCommandBufferMock.mockRejectedValue(
      new CommandError('git show :gone.py', 128, '', "fatal: path 'gone.py' does not exist"),
    );
    const result = await new GitStagingArea({ cwd: '/repo' }).readStagedContent('gone.py');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StagedContentError);
      expect(result.error.path).toBe('gone.py');
    }
  });

  it('propagates a failure to list the index', async () => {
    execMocks.runCommandMock.mockRejectedValue(new CommandError('git diff', 128, '', 'not a git repository'));
    await expect(new GitStagingArea({ cwd: '/tmp' }).listChangedPaths()).rejects.toBeInstanceOf(CommandError);
  });
});

describe('parseNulSeparated', () => {
  it('drops the trailing separator', () => {
    expect(parseNulSeparated('a\0b\0')).toEqual(['a', 'b']);
  });
});
