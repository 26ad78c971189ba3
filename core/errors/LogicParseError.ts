import { RedcapLogicError, ErrorSeverity, type SourcePosition } from './RedcapLogicError';

export interface LogicParseErrorOptions {
  cause?: unknown;
  /** Descriptions of the tokens the grammar would have accepted */
  expected?: readonly string[];
  /** The text found at the failing position, null at end of input */
  found?: string | null;
}

/**
 * Raised when a logic string violates the branching-logic grammar, or when
 * a syntactically valid comparison cannot be lowered (two literals).
 *
 * Parse errors are recoverable: a caller translating every field of a
 * project decides whether to skip the field or fail the whole run.
 */
export class LogicParseError extends RedcapLogicError {
  public readonly logic: string;
  public readonly expected: readonly string[];
  public readonly found: string | null;

  constructor(
    message: string,
    logic: string,
    position?: SourcePosition,
    options: LogicParseErrorOptions = {}
  ) {
    const locationStr = position ? ` at column ${position.column}` : '';
    super(`Parse error: ${message}${locationStr}`, {
      code: 'PARSE_ERROR',
      severity: ErrorSeverity.Recoverable,
      details: {
        logic,
        expected: options.expected ? [...options.expected] : undefined,
        found: options.found
      },
      position,
      cause: options.cause
    });
    this.logic = logic;
    this.expected = options.expected ?? [];
    this.found = options.found ?? null;
    Object.setPrototypeOf(this, LogicParseError.prototype);
  }

  /**
   * The offending line of the logic string with a caret under the failing
   * column, e.g.
   *
   *     > [a] >=
   *     |       ^
   */
  public excerpt(): string {
    const lines = this.logic.split('\n');
    const lineNumber = this.position?.line ?? 1;
    const line = lines[lineNumber - 1] ?? '';
    if (!this.position) {
      return `> ${line}`;
    }
    const pointer = ' '.repeat(Math.max(0, this.position.column - 1)) + '^';
    return `> ${line}\n| ${pointer}`;
  }
}
