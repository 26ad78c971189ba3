import { Category, isTextual } from './Category';
import { InputTypeError } from '@core/errors/InputTypeError';
import {
  applyArithmetic,
  compareOperand,
  equalsOperand,
  operandNumeric,
  type ArithmeticOperator,
  type OrderingOperator,
  type ResolvedOperand,
  type ValueParts
} from './semantics';

/**
 * What a response value can be compared with or combined with.
 */
export type Operand = RedcapValue | string | number;

/**
 * Checks the runtime type of an operand. Values coming out of untyped data
 * (JSON, spreadsheets) are not trusted to match the static signature.
 */
export function resolveOperand(other: unknown, operation: string): ResolvedOperand {
  if (other instanceof RedcapValue) {
    return { kind: 'value', parts: other.parts };
  }
  if (typeof other === 'string') {
    return { kind: 'string', text: other };
  }
  if (typeof other === 'number') {
    return { kind: 'number', num: other };
  }
  throw new InputTypeError(`Unsupported operand for ${operation}: expected a value, string or number`, other);
}

/**
 * A single response value. The platform stores every response as a
 * string and decides per operation whether to treat it as a number or as
 * text; this class reproduces those decisions.
 *
 * Instances are immutable. Build them through {@link ValueFactory} or
 * `makeValue` so the raw string is classified with the right config.
 */
export class RedcapValue {
  /** @internal */
  readonly parts: ValueParts;

  constructor(raw: string, numeric: number, category: Category) {
    this.parts = { raw, numeric, category };
  }

  static fromParts(parts: ValueParts): RedcapValue {
    return new RedcapValue(parts.raw, parts.numeric, parts.category);
  }

  /** The unmodified original response */
  rawString(): string {
    return this.parts.raw;
  }

  /** The numeric reading of the response; NaN for textual categories */
  numericValue(): number {
    return this.parts.numeric;
  }

  category(): Category {
    return this.parts.category;
  }

  isMissing(): boolean {
    return this.parts.category === Category.Missing;
  }

  isTextual(): boolean {
    return isTextual(this.parts.category);
  }

  /**
   * Equality as the platform evaluates it:
   *   value("1.0") == 1      => true
   *   value("1.0") == "1"    => false
   *   value("")    == 0      => true
   *   value("")    == "0"    => false
   *   value("abc") == 0      => false
   */
  equals(other: Operand): boolean {
    return equalsOperand(this.parts, resolveOperand(other, 'equals'));
  }

  notEquals(other: Operand): boolean {
    return !this.equals(other);
  }

  /**
   * Ordering against strings and values is lexicographic on the raw text;
   * ordering against numbers is numeric and false for textual values.
   */
  compare(op: OrderingOperator, other: Operand): boolean {
    return compareOperand(op, this.parts, resolveOperand(other, `'${op}'`));
  }

  lt(other: Operand): boolean {
    return this.compare('<', other);
  }

  le(other: Operand): boolean {
    return this.compare('<=', other);
  }

  gt(other: Operand): boolean {
    return this.compare('>', other);
  }

  ge(other: Operand): boolean {
    return this.compare('>=', other);
  }

  /**
   * Arithmetic coerces both sides to numbers: number-like strings are
   * parsed, MISSING counts as 0 and text gives NaN. Never throws for a
   * supported operand type.
   */
  calculate(op: ArithmeticOperator, other: Operand): number {
    const operand = resolveOperand(other, `'${op}'`);
    if (this.isTextual()) {
      return NaN;
    }
    return applyArithmetic(op, this.parts.numeric, operandNumeric(operand));
  }

  add(other: Operand): number {
    return this.calculate('+', other);
  }

  sub(other: Operand): number {
    return this.calculate('-', other);
  }

  mul(other: Operand): number {
    return this.calculate('*', other);
  }

  div(other: Operand): number {
    return this.calculate('/', other);
  }

  toString(): string {
    return this.parts.raw;
  }

  toJSON(): string {
    return this.parts.raw;
  }
}
