// Errors raised inside Node's own modules can come from another realm
// (e.g. under Jest), where `instanceof Error` is false.
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Raised by a translation engine for a single request: network failure,
 * quota or rate-limit rejection, or a response that cannot be used.
 * Callers treat it as a per-unit failure.
 */
export class TranslationServiceError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider}: ${message}`, { cause: options.cause });
    this.name = 'TranslationServiceError';
    this.provider = provider;
    this.status = options.status;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

export class DocumentLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to read or parse ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'DocumentLoadError';
    this.filePath = filePath;
  }
}

export class OutputWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'OutputWriteError';
    this.filePath = filePath;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
