/**
 * Defines the severity levels for redcap-logic errors.
 */
export enum ErrorSeverity {
  /** The caller can skip the failing item and carry on */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal'
}

/**
 * A position inside a logic string. Columns and lines are 1-based.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * Base interface for error details. Specific error types extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a RedcapLogicError instance.
 */
export interface RedcapLogicErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  position?: SourcePosition;
  cause?: unknown;
}

/**
 * Base class for all custom errors raised by the value layer and the
 * logic translator. Carries an error code, a severity, free-form details
 * and an optional position inside the logic string being translated.
 */
export class RedcapLogicError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Where in the logic string the error occurred, if anywhere */
  public readonly position?: SourcePosition;

  constructor(message: string, options: RedcapLogicErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.position = options.position;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Whether a caller iterating over many inputs may log this error and move on.
   */
  public canBeSkipped(): boolean {
    return this.severity === ErrorSeverity.Recoverable;
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.position) {
      result += ` at column ${this.position.column}`;
    }

    return `${result} (Severity: ${this.severity})`;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.position) {
      result.position = { ...this.position };
    }

    return result;
  }
}
