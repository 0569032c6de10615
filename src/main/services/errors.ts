/**
 * Error types for the Backup Generator, one per stage of a run. The category
 * travels into log entries; toUserMessage() is what the CLI prints.
 */

export type ErrorCategory =
  | 'ConfigError'
  | 'AuthError'
  | 'APIError'
  | 'ScanError'
  | 'ExtractionError'
  | 'CacheError'
  | 'WriteError'
  | 'CancelledError';

/** Context accepted by every PipelineError subclass */
export interface PipelineErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Root of every error the backup generator raises on purpose. Anything else
 * reaching the CLI is a bug.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;
  /** Local or Dropbox path involved, if any */
  readonly filePath: string | null;
  /** Stage of the run, defaulted per subclass */
  readonly step: string;
  readonly cause: Error | null;

  constructor(message: string, category: ErrorCategory, options: PipelineErrorOptions = {}) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options.filePath ?? null;
    this.step = options.step ?? category;
    this.cause = options.cause ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** One-line message for the terminal, e.g. `ScanError [/music]: Cannot read directory` */
  toUserMessage(): string {
    return this.filePath
      ? `${this.category} [${this.filePath}]: ${this.message}`
      : `${this.category}: ${this.message}`;
  }
}

/**
 * Missing or invalid configuration: no --local flag, Dropbox desktop not
 * installed, local folder outside the Dropbox folder, unreadable credentials.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ConfigError', { step: 'configuration', ...options });
  }
}

/**
 * Invalid or expired bearer token, rejected refresh, failed code exchange.
 * Never retried automatically.
 */
export class AuthError extends PipelineError {
  /** Set when the failure came from an HTTP response */
  readonly statusCode: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { statusCode?: number }) {
    super(message, 'AuthError', { step: 'authentication', ...options });
    this.statusCode = options?.statusCode ?? null;
  }
}

/**
 * Any other non-success response from the Dropbox API, or a transport failure.
 */
export class APIError extends PipelineError {
  /** null for transport failures */
  readonly statusCode: number | null;
  readonly endpoint: string | null;
  /** Raw response body, as Dropbox error summaries live there */
  readonly body: string | null;

  constructor(
    message: string,
    options?: PipelineErrorOptions & {
      statusCode?: number;
      endpoint?: string;
      body?: string;
    },
  ) {
    super(message, 'APIError', { step: 'api_call', ...options });
    this.statusCode = options?.statusCode ?? null;
    this.endpoint = options?.endpoint ?? null;
    this.body = options?.body ?? null;
  }
}

/**
 * Filesystem walk failure. Fatal to the run.
 */
export class ScanError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ScanError', { step: 'scanning', ...options });
  }
}

/**
 * Reading tags from a single file failed. Recorded against that file only.
 */
export class ExtractionError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ExtractionError', { step: 'reading_tags', ...options });
  }
}

/**
 * Corrupt or unwritable tag cache. Never fatal.
 */
export class CacheError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'CacheError', { step: 'cache', ...options });
  }
}

/**
 * Writing the backup file or the credentials file failed.
 */
export class WriteError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'WriteError', { step: 'writing', ...options });
  }
}

/**
 * The run was interrupted (SIGINT) while waiting on the network or the pool.
 */
export class CancelledError extends PipelineError {
  constructor(message: string = 'Operation cancelled', options?: PipelineErrorOptions) {
    super(message, 'CancelledError', { step: 'cancelled', ...options });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

type PipelineErrorClass = new (message: string, options: PipelineErrorOptions) => PipelineError;

const ERROR_CLASSES: Record<ErrorCategory, PipelineErrorClass> = {
  ConfigError,
  AuthError,
  APIError,
  ScanError,
  ExtractionError,
  CacheError,
  WriteError,
  CancelledError,
};

/**
 * Converts a caught value into a PipelineError of `category`, keeping the
 * original as `cause`. PipelineErrors pass through untouched.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  context: Omit<PipelineErrorOptions, 'cause'> = {},
): PipelineError {
  if (isPipelineError(error)) return error;

  const cause = error instanceof Error ? error : new Error(String(error));
  return new ERROR_CLASSES[category](cause.message || 'Unknown error', { ...context, cause });
}
