import { describe, it, expect } from 'vitest';
import { makeValue } from './ValueFactory';
import { resolveOperand } from './RedcapValue';
import { Category } from './Category';
import { InputTypeError } from '@core/errors/InputTypeError';

describe('RedcapValue', () => {
  describe('accessors', () => {
    it('keeps the raw string and classification', () => {
      const value = makeValue('1.0');
      expect(value.rawString()).toBe('1.0');
      expect(value.numericValue()).toBe(1);
      expect(value.category()).toBe(Category.Number);
      expect(value.isTextual()).toBe(false);
    });

    it('gives missing values numeric value 0', () => {
      const value = makeValue('');
      expect(value.isMissing()).toBe(true);
      expect(value.numericValue()).toBe(0);
    });

    it('gives textual values NaN', () => {
      const date = makeValue('2024-01-15');
      expect(date.category()).toBe(Category.Date);
      expect(date.isTextual()).toBe(true);
      expect(date.numericValue()).toBeNaN();
    });

    it('classifies missing-data codes from the given config', () => {
      expect(makeValue('-99', { missingDataCodes: ['-99'] }).category()).toBe(Category.Code);
      expect(makeValue('-99').category()).toBe(Category.Number);
    });

    it('renders as its raw string', () => {
      expect(`${makeValue('abc')}`).toBe('abc');
      expect(JSON.stringify({ answer: makeValue('1.0') })).toBe('{"answer":"1.0"}');
    });
  });

  describe('equality', () => {
    it('compares with numbers numerically', () => {
      expect(makeValue('1.0').equals(1)).toBe(true);
      expect(makeValue('2').equals(1)).toBe(false);
    });

    it('compares with strings by exact raw text', () => {
      expect(makeValue('1.0').equals('1')).toBe(false);
      expect(makeValue('1').equals('1')).toBe(true);
    });

    it('treats missing as equal to 0 and "" but not "0"', () => {
      const missing = makeValue('');
      expect(missing.equals(0)).toBe(true);
      expect(missing.equals('')).toBe(true);
      expect(missing.equals('0')).toBe(false);
      expect(missing.equals(makeValue(''))).toBe(true);
    });

    it('never matches a number for textual values', () => {
      expect(makeValue('abc').equals(0)).toBe(false);
      expect(makeValue('NA', { missingDataCodes: ['NA'] }).equals(0)).toBe(false);
    });

    it('compares two values by raw text', () => {
      expect(makeValue('1').equals(makeValue('1.0'))).toBe(false);
      expect(makeValue('abc').equals(makeValue('abc'))).toBe(true);
    });

    it('negates equality for notEquals', () => {
      expect(makeValue('1.0').notEquals(1)).toBe(false);
      expect(makeValue('abc').notEquals(0)).toBe(true);
      expect(makeValue('').notEquals('0')).toBe(true);
    });
  });

  describe('ordering', () => {
    it('orders against strings lexicographically', () => {
      expect(makeValue('13').lt('13.0')).toBe(true);
      expect(makeValue('4').gt('13')).toBe(true);
      expect(makeValue('4').gt(makeValue('13'))).toBe(true);
    });

    it('orders by code point beyond the basic multilingual plane', () => {
      expect(makeValue('\uFF5E').lt('\u{1F600}')).toBe(true);
      expect(makeValue('\uFF5E').lt(makeValue('\u{1F600}'))).toBe(true);
      expect(makeValue('\u{1F600}').gt('\uFF5E')).toBe(true);
      expect(makeValue('a\u{1F600}').lt('a\u{1F600}b')).toBe(true);
    });

    it('orders against numbers numerically', () => {
      expect(makeValue('4').lt(13)).toBe(true);
      expect(makeValue('13.0').ge(13)).toBe(true);
      expect(makeValue('').lt(1)).toBe(true);
      expect(makeValue('').ge(0)).toBe(true);
    });

    it('is false for textual values against numbers', () => {
      const text = makeValue('abc');
      expect(text.lt(5)).toBe(false);
      expect(text.le(5)).toBe(false);
      expect(text.gt(5)).toBe(false);
      expect(text.ge(5)).toBe(false);
    });

    it('accepts the operator as an argument', () => {
      expect(makeValue('7').compare('<=', 7)).toBe(true);
      expect(makeValue('7').compare('>', 7)).toBe(false);
    });
  });

  describe('arithmetic', () => {
    it('coerces both sides to numbers', () => {
      expect(makeValue('2').add(3)).toBe(5);
      expect(makeValue('6').div('3')).toBe(2);
      expect(makeValue('5').sub(makeValue('1.5'))).toBe(3.5);
      expect(makeValue('4').mul(makeValue(''))).toBe(0);
    });

    it('treats missing as 0', () => {
      expect(makeValue('').add(2)).toBe(2);
    });

    it('gives NaN for textual operands and unparsable strings', () => {
      expect(makeValue('abc').add(1)).toBeNaN();
      expect(makeValue('1').add(makeValue('abc'))).toBeNaN();
      expect(makeValue('6').mul('')).toBeNaN();
    });

    it('gives NaN when dividing by zero', () => {
      expect(makeValue('6').div(0)).toBeNaN();
      expect(makeValue('6').div(makeValue(''))).toBeNaN();
    });
  });

  describe('resolveOperand', () => {
    it('tags each supported operand kind', () => {
      expect(resolveOperand('x', 'equals')).toEqual({ kind: 'string', text: 'x' });
      expect(resolveOperand(2, 'equals')).toEqual({ kind: 'number', num: 2 });
      expect(resolveOperand(makeValue('2'), 'equals').kind).toBe('value');
    });

    it('rejects anything else', () => {
      expect(() => resolveOperand(null, 'equals')).toThrow(InputTypeError);
      expect(() => resolveOperand(true, 'equals'))
        .toThrow('Unsupported operand for equals: expected a value, string or number, but got type: boolean');
    });
  });
});
