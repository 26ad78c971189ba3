import { RedcapLogicError, ErrorSeverity } from './RedcapLogicError';

export class ValueIndexError extends RedcapLogicError {
  constructor(index: number, length: number, reason = 'out of range') {
    super(`Index ${index} is ${reason} for an array of length ${length}`, {
      code: 'VALUE_INDEX_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { index, length }
    });
    Object.setPrototypeOf(this, ValueIndexError.prototype);
  }
}
