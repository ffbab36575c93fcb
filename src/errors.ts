export class BenchmarkError extends Error {
  code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'BenchmarkError';
    this.code = code;
  }
}

/** Invalid run parameters or environment. Fatal: the run never starts. */
export class ConfigurationError extends BenchmarkError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

const ERROR_TRUNCATE_LEN = 300;

/** First line of an error message, capped for the detail trace. */
export function truncateError(message: string): string {
  const firstLine = message.split(/\r?\n/, 1)[0] ?? '';
  if (firstLine.length > ERROR_TRUNCATE_LEN) {
    return `${firstLine.slice(0, ERROR_TRUNCATE_LEN)}...`;
  }
  return firstLine;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
