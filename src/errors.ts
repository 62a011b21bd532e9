export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPathError';
  }
}

export class UnreadableTagError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    super(`Unreadable tags in ${filePath}: ${describeError(cause)}`);
    this.name = 'UnreadableTagError';
  }
}

export class PathTooLongError extends Error {
  constructor(readonly path: string) {
    super(`Path is too long: ${path}`);
    this.name = 'PathTooLongError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return null;
}
