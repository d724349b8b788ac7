export class DirectoryListError extends Error {
  public readonly name = 'DirectoryListError';

  public constructor(
    public readonly path: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot list directory ${path} (${code})`, options);
  }
}

export class ConfigError extends Error {
  public readonly name = 'ConfigError';
}

export const getErrorCode = (error: unknown): string => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN';
};
