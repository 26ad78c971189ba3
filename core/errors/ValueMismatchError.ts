import { RedcapLogicError, ErrorSeverity } from './RedcapLogicError';

/**
 * Raised when a bulk operation is invoked on operands of unequal length,
 * or when the parallel storage of a value array disagrees on its length.
 */
export class ValueMismatchError extends RedcapLogicError {
  public readonly expectedLength: number;
  public readonly actualLength: number;

  constructor(operation: string, expectedLength: number, actualLength: number) {
    super(
      `${operation} is only supported between operands of equal length (expected ${expectedLength}, got ${actualLength})`,
      {
        code: 'VALUE_MISMATCH',
        severity: ErrorSeverity.Fatal,
        details: { operation, expectedLength, actualLength }
      }
    );
    this.expectedLength = expectedLength;
    this.actualLength = actualLength;
    Object.setPrototypeOf(this, ValueMismatchError.prototype);
  }
}
