import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandError } from './errors';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface BufferExecResult {
  stdout: Buffer;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  maxBufferBytes?: number;
}

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

function outputOf(error: Error, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(error, key);
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

function exitCodeOf(error: Error): number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'number' ? code : undefined;
}

/**
 * Execute a command and return stdout as raw bytes.
 * Throws a CommandError if the command exits with non-zero status.
 */
export async function runCommandBuffer(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<BufferExecResult> {
  const { cwd, env, timeoutMs, maxBufferBytes } = options;

  try {
    const result = await execFileAsync(file, args, {
      cwd,
      env,
      timeout: timeoutMs,
      maxBuffer: maxBufferBytes ?? DEFAULT_MAX_BUFFER,
      encoding: 'buffer',
    });
    return { stdout: result.stdout, stderr: result.stderr.toString('utf8') };
  } catch (error) {
    if (error instanceof Error) {
      const command = [file, ...args].join(' ');
      throw new CommandError(command, exitCodeOf(error), outputOf(error, 'stdout'), outputOf(error, 'stderr'), error);
    }
    throw error;
  }
}

/**
 * Execute a command and return stdout/stderr as UTF-8 strings.
 */
export async function runCommand(file: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  const { stdout, stderr } = await runCommandBuffer(file, args, options);
  return { stdout: stdout.toString('utf8'), stderr };
}
