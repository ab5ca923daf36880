/**
 * Structured error types for ClipTrail.
 *
 * ClipTrailError carries an error code, a severity level and a recovery hint,
 * so callers can tell a transient clipboard hiccup from a broken database.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Clipboard source
  ADAPTER_READ_ERROR = 'ADAPTER_READ_ERROR',
  ADAPTER_WRITE_ERROR = 'ADAPTER_WRITE_ERROR',
  ADAPTER_TIMEOUT = 'ADAPTER_TIMEOUT',

  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_SAVE_ERROR = 'CONFIG_SAVE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Database
  DB_CONNECTION_ERROR = 'DB_CONNECTION_ERROR',
  DB_QUERY_ERROR = 'DB_QUERY_ERROR',
  DB_MIGRATION_ERROR = 'DB_MIGRATION_ERROR',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

// ─── ClipTrailError ───

export class ClipTrailError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** How severe is this error */
  public readonly severity: ErrorSeverity;
  /** Can the app keep going without a restart */
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
    this.name = 'ClipTrailError';
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

  static isClipTrailError(value: unknown): value is ClipTrailError {
    return value instanceof ClipTrailError;
  }

  /** Wrap any thrown value into a ClipTrailError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): ClipTrailError {
    if (error instanceof ClipTrailError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipTrailError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
