import { RedcapLogicError, ErrorSeverity } from './RedcapLogicError';

/**
 * Describes a runtime value for error messages without dumping it whole.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor = value.constructor;
    return ctor && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * Raised when a raw value is not a string, or when a comparison or
 * arithmetic call receives an operand that is not a value, string or number.
 */
export class InputTypeError extends RedcapLogicError {
  public readonly received: string;

  constructor(message: string, received: unknown) {
    const receivedType = describeType(received);
    super(`${message}, but got type: ${receivedType}`, {
      code: 'INPUT_TYPE_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { received: receivedType }
    });
    this.received = receivedType;
    Object.setPrototypeOf(this, InputTypeError.prototype);
  }
}
