export class SetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | undefined,
    readonly stdout: string,
    readonly stderr: string,
    cause?: Error,
  ) {
    super(`Command failed (${command}): ${cause?.message ?? `exit code ${exitCode ?? 'unknown'}`}\nstderr: ${stderr}`);
    this.name = 'CommandError';
  }
}

/**
 * Raised when a staged blob cannot be fetched or decoded. The scanner treats the file as
 * unscannable and moves on.
 */
export class StagedContentError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`Cannot read staged content of ${path}: ${reason}`);
    this.name = 'StagedContentError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
