/**
 * Error Classes for Crate Tagger
 *
 * Every failure is classified so the batch processor can decide whether to
 * retry it, record it against the file, or abort the whole run.
 *
 * - RateLimitedError / TransientError: queued for a later retry round
 * - FatalError: aborts the run (bad credentials, malformed request)
 * - everything else: recorded on the file's audit row, never retried
 */

/**
 * Error categories matching the failure taxonomy.
 */
export type ErrorCategory =
  | 'RateLimitedError'
  | 'TransientError'
  | 'FatalError'
  | 'APIError'
  | 'FileReadError'
  | 'UnsupportedFormatError'
  | 'WriteError'
  | 'DownloadError';

/** Context accepted by every error constructor */
export interface ErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all Crate Tagger errors.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The file being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The processing step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  override readonly cause: Error | null;
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: ErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    filePath: string | null;
    step: string;
    timestamp: string;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      filePath: this.filePath,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a short message without stack traces, suitable for the audit CSV.
   */
  toUserMessage(): string {
    return `${this.category}: ${this.message}`;
  }
}

/** The catalog asked us to slow down (HTTP 429). */
export class RateLimitedError extends PipelineError {
  /** Seconds the server asked us to wait, when it said so */
  readonly retryAfterSeconds: number | null;

  constructor(message: string, options?: ErrorOptions & { retryAfterSeconds?: number }) {
    super(message, 'RateLimitedError', { step: 'catalog', ...options });
    this.retryAfterSeconds = options?.retryAfterSeconds ?? null;
  }
}

/** Timeouts, dropped connections and 5xx responses. */
export class TransientError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TransientError', { step: 'catalog', ...options });
  }
}

/** Invalid credentials or a request the catalog will never accept. Aborts the run. */
export class FatalError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FatalError', { step: 'configuration', ...options });
  }
}

/**
 * A catalog call that failed for this file only (e.g. 404 on a detail record).
 */
export class APIError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;

  constructor(message: string, options?: ErrorOptions & { statusCode?: number }) {
    super(message, 'APIError', { step: 'catalog', ...options });
    this.statusCode = options?.statusCode ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & { statusCode: number | null } {
    return { ...super.toLogObject(), statusCode: this.statusCode };
  }
}

/** Reading or parsing an audio file failed. */
export class FileReadError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FileReadError', { step: 'reading', ...options });
  }
}

/** The file's format has no tag mapping or writer. */
export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'UnsupportedFormatError', { step: 'writing', ...options });
  }
}

/** Writing tags or art to disk failed. */
export class WriteError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'WriteError', { step: 'writing', ...options });
  }
}

/** Downloading replacement artwork failed. */
export class DownloadError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DownloadError', { step: 'fetching_art', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Rate-limit and transient failures go back through the retry queue. */
export function isRetryableError(error: unknown): error is RateLimitedError | TransientError {
  return error instanceof RateLimitedError || error instanceof TransientError;
}

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError;
}

/**
 * Wraps a generic error in the given PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: {
    filePath?: string;
    step?: string;
  },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';
  const withCause = { ...options, cause };

  switch (category) {
    case 'RateLimitedError':
      return new RateLimitedError(message, withCause);
    case 'TransientError':
      return new TransientError(message, withCause);
    case 'FatalError':
      return new FatalError(message, withCause);
    case 'APIError':
      return new APIError(message, withCause);
    case 'FileReadError':
      return new FileReadError(message, withCause);
    case 'UnsupportedFormatError':
      return new UnsupportedFormatError(message, withCause);
    case 'WriteError':
      return new WriteError(message, withCause);
    case 'DownloadError':
      return new DownloadError(message, withCause);
  }
}

/** Extracts a message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
