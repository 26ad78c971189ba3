import { Category, isTextual } from './Category';
import { parseDecimal } from './classify';

export type OrderingOperator = '<' | '<=' | '>' | '>=';
export type ArithmeticOperator = '+' | '-' | '*' | '/';

/** Raw string stored for an element whose arithmetic failed */
export const CALC_ERROR_RAW = '$$CALC_ERR';

/**
 * The three stored facets of a single response value.
 */
export interface ValueParts {
  readonly raw: string;
  readonly numeric: number;
  readonly category: Category;
}

/**
 * An operand after its runtime type has been checked.
 */
export type ResolvedOperand =
  | { kind: 'value'; parts: ValueParts }
  | { kind: 'string'; text: string }
  | { kind: 'number'; num: number };

export const MISSING_PARTS: ValueParts = { raw: '', numeric: 0, category: Category.Missing };

export const CALC_ERROR_PARTS: ValueParts = { raw: CALC_ERROR_RAW, numeric: NaN, category: Category.Text };

/**
 * Three-way comparison; NaN when either side is NaN.
 */
export function compareNumbers(left: number, right: number): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return left === right ? 0 : NaN;
}

/**
 * Three-way comparison by Unicode code point, shorter prefix first. This is
 * the order of the UTF-8 bytes, so characters outside the BMP sort after
 * every BMP character.
 */
export function compareStrings(left: string, right: string): number {
  const length = Math.min(left.length, right.length);
  let i = 0;
  while (i < length) {
    const a = left.codePointAt(i) ?? 0;
    const b = right.codePointAt(i) ?? 0;
    if (a !== b) {
      return a < b ? -1 : 1;
    }
    i += a > 0xffff ? 2 : 1;
  }
  return Math.sign(left.length - right.length);
}

/**
 * Whether a three-way comparison result satisfies the operator. A NaN
 * result satisfies none.
 */
export function orderingHolds(op: OrderingOperator, comparison: number): boolean {
  switch (op) {
    case '<': return comparison < 0;
    case '<=': return comparison <= 0;
    case '>': return comparison > 0;
    case '>=': return comparison >= 0;
  }
}

/**
 * Plain float arithmetic, except that dividing by zero gives NaN.
 */
export function applyArithmetic(op: ArithmeticOperator, left: number, right: number): number {
  switch (op) {
    case '+': return left + right;
    case '-': return left - right;
    case '*': return left * right;
    case '/': return right === 0 ? NaN : left / right;
  }
}

/**
 * Equality between a stored value and an operand. Strings and other values
 * compare by exact raw text; numbers compare numerically, which only
 * NUMBER and MISSING values can satisfy.
 */
export function equalsOperand(self: ValueParts, operand: ResolvedOperand): boolean {
  switch (operand.kind) {
    case 'value':
      return self.raw === operand.parts.raw;
    case 'string':
      return self.raw === operand.text;
    case 'number':
      switch (self.category) {
        case Category.Missing:
          return operand.num === 0;
        case Category.Number:
          return self.numeric === operand.num;
        case Category.Text:
        case Category.Date:
        case Category.Code:
          return false;
      }
  }
}

/**
 * Ordering between a stored value and an operand. Strings and values are
 * ordered lexicographically by raw text, so "13" < "13.0" and "4" > "13".
 * Numbers order numerically and never match a textual value.
 */
export function compareOperand(op: OrderingOperator, self: ValueParts, operand: ResolvedOperand): boolean {
  switch (operand.kind) {
    case 'value':
      return orderingHolds(op, compareStrings(self.raw, operand.parts.raw));
    case 'string':
      return orderingHolds(op, compareStrings(self.raw, operand.text));
    case 'number':
      return isTextual(self.category) ? false : orderingHolds(op, compareNumbers(self.numeric, operand.num));
  }
}

/**
 * The numeric value an operand contributes to arithmetic. Unparsable
 * strings, including "", give NaN.
 */
export function operandNumeric(operand: ResolvedOperand): number {
  switch (operand.kind) {
    case 'value': return operand.parts.numeric;
    case 'string': return parseDecimal(operand.text);
    case 'number': return operand.num;
  }
}

/**
 * Arithmetic between two values producing a new stored value rather than a
 * bare number. A textual side, division by zero or any other NaN result
 * becomes a calculation error; two MISSING sides stay MISSING.
 */
export function calculateParts(op: ArithmeticOperator, self: ValueParts, operand: ResolvedOperand): ValueParts {
  if (isTextual(self.category)) {
    return CALC_ERROR_PARTS;
  }

  const otherMissing = operand.kind === 'value' && operand.parts.category === Category.Missing;
  if (self.category === Category.Missing && otherMissing) {
    return MISSING_PARTS;
  }

  const result = applyArithmetic(op, self.numeric, operandNumeric(operand));
  if (Number.isNaN(result)) {
    return CALC_ERROR_PARTS;
  }

  return { raw: String(result), numeric: result, category: Category.Number };
}
