/**
 * Error types shared by the CLI and the cleanup pipeline
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Render an unknown thrown value as `CODE: message`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = errorCode(error);
    return code && !error.message.startsWith(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

