import { describe, it, expect } from 'vitest';
import {
  RedcapLogicError,
  ErrorSeverity,
  InputTypeError,
  LogicParseError,
  UnknownFieldError,
  ValueIndexError,
  ValueMismatchError,
  describeType
} from '@core/errors';

describe('RedcapLogicError hierarchy', () => {
  it('keeps subclasses distinguishable with instanceof', () => {
    const error = new UnknownFieldError(['age']);
    expect(error).toBeInstanceOf(UnknownFieldError);
    expect(error).toBeInstanceOf(RedcapLogicError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('UnknownFieldError');
  });

  it('marks translation problems as recoverable', () => {
    expect(new UnknownFieldError(['a']).canBeSkipped()).toBe(true);
    expect(new LogicParseError('bad', '[a]').severity).toBe(ErrorSeverity.Recoverable);
    expect(new ValueMismatchError('Equality', 2, 1).canBeSkipped()).toBe(false);
    expect(new ValueIndexError(3, 2).canBeSkipped()).toBe(false);
  });

  it('formats code and severity in toString', () => {
    expect(new UnknownFieldError(['a']).toString()).toBe('[UNKNOWN_FIELD] Unknown field: a (Severity: recoverable)');
  });

  it('serializes to JSON', () => {
    expect(new ValueIndexError(3, 2).toJSON()).toEqual({
      name: 'ValueIndexError',
      message: 'Index 3 is out of range for an array of length 2',
      code: 'VALUE_INDEX_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { index: 3, length: 2 }
    });
  });
});

describe('UnknownFieldError', () => {
  it('lists every missing field', () => {
    const error = new UnknownFieldError(['age', 'sex'], '[age] > 1 and [sex] = 1');
    expect(error.message).toBe('Unknown fields: age, sex');
    expect(error.fields).toEqual(['age', 'sex']);
  });
});

describe('InputTypeError', () => {
  it('names the received type', () => {
    const error = new InputTypeError('Response values must be strings', 12);
    expect(error.message).toBe('Response values must be strings, but got type: number');
    expect(error.received).toBe('number');
  });

  it('describes objects by constructor', () => {
    expect(describeType(new Map())).toBe('Map');
    expect(describeType([])).toBe('array');
    expect(describeType(undefined)).toBe('undefined');
  });
});

describe('LogicParseError', () => {
  it('points at the failing column', () => {
    const error = new LogicParseError('Expected a value', '[a] >=', { offset: 6, line: 1, column: 7 });
    expect(error.message).toBe('Parse error: Expected a value at column 7');
    expect(error.excerpt()).toBe('> [a] >=\n|       ^');
    expect(error.toJSON().position).toEqual({ offset: 6, line: 1, column: 7 });
  });

  it('keeps expected tokens and the found text', () => {
    const error = new LogicParseError('x', '[a] ?', undefined, { expected: ['comparison operator'], found: '?' });
    expect(error.expected).toEqual(['comparison operator']);
    expect(error.found).toBe('?');
    expect(error.excerpt()).toBe('> [a] ?');
  });
});
