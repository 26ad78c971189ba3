import type { LogicExpression } from './ast';
import { formatExpression } from './ast';
import type { ColumnLookup, MaskFunction } from './compile';
import { RedcapValueArray } from '@core/values/RedcapValueArray';
import { defaultValueFactory, ValueFactory } from '@core/values/ValueFactory';
import type { ValueConfig } from '@core/config/types';
import { UnknownFieldError } from '@core/errors/UnknownFieldError';
import { ValueMismatchError } from '@core/errors/ValueMismatchError';

/**
 * A column of an exported table: raw strings straight from the export, or
 * values that were already classified.
 */
export type Column = readonly string[] | RedcapValueArray;

/**
 * An exported table keyed by column name.
 */
export type DataTable = Readonly<Record<string, Column>>;

export interface EvaluateOptions {
  /** Classification config for raw string columns */
  values?: Partial<ValueConfig>;
  /** Factory to classify raw string columns with; wins over `values` */
  factory?: ValueFactory;
}

function columnLength(column: Column): number {
  return column.length;
}

/**
 * The output of translating one logic string: the expression tree, the
 * export columns it reads and the compiled, vectorized test.
 *
 * Instances are immutable and safe to share; the translator caches them
 * by logic string.
 */
export class CompiledPredicate {
  readonly source: string;
  readonly expression: LogicExpression;
  readonly fields: ReadonlySet<string>;
  private readonly test: MaskFunction;

  constructor(source: string, expression: LogicExpression, fields: ReadonlySet<string>, test: MaskFunction) {
    this.source = source;
    this.expression = expression;
    this.fields = new Set(fields);
    this.test = test;
    Object.freeze(this);
  }

  /**
   * Referenced columns the table does not have.
   */
  missingFields(table: DataTable): string[] {
    return [...this.fields].filter(field => !Object.prototype.hasOwnProperty.call(table, field));
  }

  /**
   * Evaluate against a whole table, producing one boolean per row.
   *
   * @throws {UnknownFieldError} If a referenced column is absent
   * @throws {ValueMismatchError} If the referenced columns differ in length
   */
  evaluate(table: DataTable, options: EvaluateOptions = {}): boolean[] {
    const missing = this.missingFields(table);
    if (missing.length > 0) {
      throw new UnknownFieldError(missing, this.source);
    }

    const names = [...this.fields];
    const expected = columnLength(table[names[0]]);
    for (const name of names.slice(1)) {
      const actual = columnLength(table[name]);
      if (actual !== expected) {
        throw new ValueMismatchError(`Predicate evaluation over column '${name}'`, expected, actual);
      }
    }

    const factory = options.factory
      ?? (options.values ? new ValueFactory({ ...options.values, intern: false }) : defaultValueFactory);

    const classified = new Map<string, RedcapValueArray>();
    const lookup: ColumnLookup = name => {
      let values = classified.get(name);
      if (!values) {
        const column = table[name];
        values = column instanceof RedcapValueArray ? column : factory.makeArray(column);
        classified.set(name, values);
      }
      return values;
    };

    return this.test(lookup);
  }

  /**
   * Evaluate against a single record.
   */
  evaluateRow(row: Readonly<Record<string, string>>, options: EvaluateOptions = {}): boolean {
    const table: Record<string, string[]> = {};
    for (const [name, value] of Object.entries(row)) {
      table[name] = [value];
    }
    return this.evaluate(table, options)[0];
  }

  toString(): string {
    return formatExpression(this.expression);
  }
}
