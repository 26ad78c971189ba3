import { RedcapLogicError, ErrorSeverity } from './RedcapLogicError';

/**
 * Raised before evaluation when a predicate references columns that the
 * table does not have. Lists every missing column, not just the first.
 */
export class UnknownFieldError extends RedcapLogicError {
  public readonly fields: readonly string[];

  constructor(fields: readonly string[], logic?: string) {
    const noun = fields.length === 1 ? 'field' : 'fields';
    super(`Unknown ${noun}: ${fields.join(', ')}`, {
      code: 'UNKNOWN_FIELD',
      severity: ErrorSeverity.Recoverable,
      details: { fields: [...fields], logic }
    });
    this.fields = fields;
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}
