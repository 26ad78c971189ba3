/**
 * Central export point for redcap-logic error types.
 */
export { RedcapLogicError, ErrorSeverity } from './RedcapLogicError';
export type { SourcePosition, BaseErrorDetails, RedcapLogicErrorOptions } from './RedcapLogicError';
export { InputTypeError, describeType } from './InputTypeError';
export { LogicParseError } from './LogicParseError';
export type { LogicParseErrorOptions } from './LogicParseError';
export { ValueMismatchError } from './ValueMismatchError';
export { ValueIndexError } from './ValueIndexError';
export { UnknownFieldError } from './UnknownFieldError';
