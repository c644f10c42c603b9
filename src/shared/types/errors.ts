/**
 * Structured error types for clipkeep.
 *
 * ClipKeepError provides error codes, severity levels, and recovery hints
 * across every service of the engine.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_SAVE_ERROR = 'CONFIG_SAVE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Database
  DB_CONNECTION_ERROR = 'DB_CONNECTION_ERROR',
  DB_MIGRATION_ERROR = 'DB_MIGRATION_ERROR',
  DB_SAVE_ERROR = 'DB_SAVE_ERROR',

  // Capture
  CLIPBOARD_READ_ERROR = 'CLIPBOARD_READ_ERROR',

  // Enrichment / derived assets
  ENRICHMENT_ERROR = 'ENRICHMENT_ERROR',
  IMAGE_DECODE_ERROR = 'IMAGE_DECODE_ERROR',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  INVALID_STATE = 'INVALID_STATE',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

// ─── ClipKeepError ───

export class ClipKeepError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** How severe is this error */
  public readonly severity: ErrorSeverity;
  /** Can the engine keep running after this error */
  public readonly recoverable: boolean;
  /** Additional structured context */
  public readonly context?: Record<string, unknown>;
  /** Original error that caused this one */
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      severity?: ErrorSeverity;
      recoverable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ClipKeepError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  static isClipKeepError(value: unknown): value is ClipKeepError {
    return value instanceof ClipKeepError;
  }

  /** Wrap any thrown value into a ClipKeepError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): ClipKeepError {
    if (error instanceof ClipKeepError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipKeepError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
