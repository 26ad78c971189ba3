import { Category, isTextual } from './Category';
import { defaultClassifier, type Classifier } from './classify';
import { RedcapValue, resolveOperand, type Operand } from './RedcapValue';
import {
  calculateParts,
  compareOperand,
  equalsOperand,
  type ArithmeticOperator,
  type OrderingOperator,
  type ResolvedOperand,
  type ValueParts
} from './semantics';
import { ValueMismatchError } from '@core/errors/ValueMismatchError';
import { ValueIndexError } from '@core/errors/ValueIndexError';
import { InputTypeError } from '@core/errors/InputTypeError';

/**
 * Right-hand side of a bulk operation: a scalar broadcast to every
 * element, another value array, or a plain sequence of operands.
 */
export type ArrayOperand = Operand | RedcapValueArray | readonly Operand[];

export interface TakeOptions {
  /** Treat -1 as "insert the fill value" instead of "last element" */
  allowFill?: boolean;
  /** Raw string used for filled positions; blank (MISSING) by default */
  fillValue?: string;
  /** Classifier for the fill value */
  classifier?: Classifier;
}

/**
 * A column of response values kept as three parallel arrays: numeric
 * values, raw strings and categories. Every operation is element-wise with
 * the same rules as {@link RedcapValue} and returns a new array or mask.
 */
export class RedcapValueArray implements Iterable<RedcapValue> {
  private readonly numeric: Float64Array;
  private readonly raw: readonly string[];
  private readonly cats: readonly Category[];

  constructor(numeric: ArrayLike<number>, raw: readonly string[], categories: readonly Category[]) {
    this.numeric = Float64Array.from(numeric);
    this.raw = [...raw];
    this.cats = [...categories];

    if (this.raw.length !== this.numeric.length) {
      throw new ValueMismatchError('RedcapValueArray storage', this.numeric.length, this.raw.length);
    }
    if (this.cats.length !== this.numeric.length) {
      throw new ValueMismatchError('RedcapValueArray storage', this.numeric.length, this.cats.length);
    }
  }

  /**
   * Classify each raw string into the three parallel arrays.
   */
  static fromStrings(raws: Iterable<unknown>, classifier: Classifier = defaultClassifier): RedcapValueArray {
    const numeric: number[] = [];
    const raw: string[] = [];
    const categories: Category[] = [];

    for (const item of raws) {
      if (item instanceof RedcapValue) {
        numeric.push(item.numericValue());
        raw.push(item.rawString());
        categories.push(item.category());
        continue;
      }
      if (typeof item !== 'string') {
        throw new InputTypeError('Response values must be strings', item);
      }
      const { category, numericValue } = classifier.classify(item);
      raw.push(item);
      numeric.push(numericValue);
      categories.push(category);
    }

    return new RedcapValueArray(numeric, raw, categories);
  }

  static fromParts(parts: readonly ValueParts[]): RedcapValueArray {
    return new RedcapValueArray(
      parts.map(part => part.numeric),
      parts.map(part => part.raw),
      parts.map(part => part.category)
    );
  }

  static empty(): RedcapValueArray {
    return new RedcapValueArray([], [], []);
  }

  /**
   * Join arrays end to end, keeping their order.
   */
  static concat(...arrays: readonly RedcapValueArray[]): RedcapValueArray {
    const numeric: number[] = [];
    const raw: string[] = [];
    const categories: Category[] = [];

    for (const array of arrays) {
      for (let i = 0; i < array.length; i++) {
        numeric.push(array.numeric[i]);
        raw.push(array.raw[i]);
        categories.push(array.cats[i]);
      }
    }

    return new RedcapValueArray(numeric, raw, categories);
  }

  get length(): number {
    return this.numeric.length;
  }

  concat(...others: readonly RedcapValueArray[]): RedcapValueArray {
    return RedcapValueArray.concat(this, ...others);
  }

  /**
   * Positional access; negative indices count from the end.
   */
  at(index: number): RedcapValue {
    return RedcapValue.fromParts(this.partsAt(this.normalizeIndex(index)));
  }

  /**
   * Same bounds rules as Array.prototype.slice.
   */
  slice(start?: number, end?: number): RedcapValueArray {
    return new RedcapValueArray(
      this.numeric.slice(start, end),
      this.raw.slice(start, end),
      this.cats.slice(start, end)
    );
  }

  /**
   * Gather elements by position.
   *
   * Without `allowFill`, negative indices count from the end. With it, -1
   * marks a position to fill with `fillValue` and any other negative index
   * is rejected.
   */
  take(indices: readonly number[], options: TakeOptions = {}): RedcapValueArray {
    const { allowFill = false, fillValue = '', classifier = defaultClassifier } = options;
    let fill: ValueParts | undefined;

    const parts = indices.map(index => {
      if (allowFill && index < 0) {
        if (index !== -1) {
          throw new ValueIndexError(index, this.length, 'not allowed with allowFill (only -1 marks a fill)');
        }
        if (!fill) {
          const { category, numericValue } = classifier.classify(fillValue);
          fill = { raw: fillValue, numeric: numericValue, category };
        }
        return fill;
      }
      return this.partsAt(this.normalizeIndex(index));
    });

    return RedcapValueArray.fromParts(parts);
  }

  /** True where the element has no numeric value (text, dates, codes) */
  isNaN(): boolean[] {
    return Array.from(this.numeric, value => Number.isNaN(value));
  }

  /** True where the element is blank */
  isMissing(): boolean[] {
    return this.cats.map(category => category === Category.Missing);
  }

  /** True where the element is blank or a configured missing-data code */
  isMissingOrCode(): boolean[] {
    return this.cats.map(category => category === Category.Missing || category === Category.Code);
  }

  equals(other: ArrayOperand): boolean[] {
    return this.elementwise(other, 'Equality', (parts, operand) => equalsOperand(parts, operand));
  }

  notEquals(other: ArrayOperand): boolean[] {
    return this.equals(other).map(result => !result);
  }

  compare(op: OrderingOperator, other: ArrayOperand): boolean[] {
    return this.elementwise(other, `Comparison '${op}'`, (parts, operand) => compareOperand(op, parts, operand));
  }

  lt(other: ArrayOperand): boolean[] {
    return this.compare('<', other);
  }

  le(other: ArrayOperand): boolean[] {
    return this.compare('<=', other);
  }

  gt(other: ArrayOperand): boolean[] {
    return this.compare('>', other);
  }

  ge(other: ArrayOperand): boolean[] {
    return this.compare('>=', other);
  }

  /**
   * Element-wise arithmetic. Results are NUMBER elements, MISSING where both
   * sides were blank, or calculation errors (TEXT, NaN, "$$CALC_ERR") where
   * either side was textual or the division was by zero.
   */
  calculate(op: ArithmeticOperator, other: ArrayOperand): RedcapValueArray {
    return RedcapValueArray.fromParts(
      this.elementwise(other, `Arithmetic '${op}'`, (parts, operand) => calculateParts(op, parts, operand))
    );
  }

  add(other: ArrayOperand): RedcapValueArray {
    return this.calculate('+', other);
  }

  sub(other: ArrayOperand): RedcapValueArray {
    return this.calculate('-', other);
  }

  mul(other: ArrayOperand): RedcapValueArray {
    return this.calculate('*', other);
  }

  div(other: ArrayOperand): RedcapValueArray {
    return this.calculate('/', other);
  }

  rawStrings(): string[] {
    return [...this.raw];
  }

  numericValues(): number[] {
    return Array.from(this.numeric);
  }

  categories(): Category[] {
    return [...this.cats];
  }

  /** Number of elements with a textual category */
  countTextual(): number {
    return this.cats.filter(isTextual).length;
  }

  toValues(): RedcapValue[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<RedcapValue> {
    for (let i = 0; i < this.length; i++) {
      yield RedcapValue.fromParts(this.partsAt(i));
    }
  }

  private partsAt(index: number): ValueParts {
    return { raw: this.raw[index], numeric: this.numeric[index], category: this.cats[index] };
  }

  private normalizeIndex(index: number): number {
    if (!Number.isInteger(index)) {
      throw new ValueIndexError(index, this.length, 'not an integer');
    }
    const resolved = index < 0 ? this.length + index : index;
    if (resolved < 0 || resolved >= this.length) {
      throw new ValueIndexError(index, this.length);
    }
    return resolved;
  }

  private elementwise<T>(
    other: ArrayOperand,
    operation: string,
    apply: (parts: ValueParts, operand: ResolvedOperand) => T
  ): T[] {
    if (other instanceof RedcapValueArray) {
      this.assertSameLength(other.length, operation);
      return this.mapParts((parts, i) => apply(parts, { kind: 'value', parts: other.partsAt(i) }));
    }

    if (Array.isArray(other)) {
      this.assertSameLength(other.length, operation);
      const operands = other.map(item => resolveOperand(item, operation));
      return this.mapParts((parts, i) => apply(parts, operands[i]));
    }

    const operand = resolveOperand(other, operation);
    return this.mapParts(parts => apply(parts, operand));
  }

  private mapParts<T>(fn: (parts: ValueParts, index: number) => T): T[] {
    const result: T[] = new Array(this.length);
    for (let i = 0; i < this.length; i++) {
      result[i] = fn(this.partsAt(i), i);
    }
    return result;
  }

  private assertSameLength(length: number, operation: string): void {
    if (length !== this.length) {
      throw new ValueMismatchError(operation, this.length, length);
    }
  }
}
