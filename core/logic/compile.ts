import type { Comparison, LogicExpression } from './ast';
import type { RedcapValueArray } from '@core/values/RedcapValueArray';

/**
 * Resolves a referenced column to its classified values.
 */
export type ColumnLookup = (name: string) => RedcapValueArray;

/**
 * A compiled expression: given the referenced columns, one boolean per row.
 */
export type MaskFunction = (columns: ColumnLookup) => boolean[];

function combine(left: boolean[], right: boolean[], both: boolean): boolean[] {
  return left.map((value, i) => (both ? value && right[i] : value || right[i]));
}

function compileComparison(node: Comparison): MaskFunction {
  const { op, left, right } = node;

  if (right.type === 'FieldRef') {
    if (op === '=' || op === '<>') {
      return columns => {
        const mask = columns(left.name).equals(columns(right.name));
        return op === '=' ? mask : mask.map(value => !value);
      };
    }
    // Ordering between two fields reads both as numbers
    return columns => columns(left.name).compare(op, columns(right.name).numericValues());
  }

  const literal = right.value;
  switch (op) {
    case '=':
      return columns => columns(left.name).equals(literal);
    case '<>':
      return columns => columns(left.name).notEquals(literal);
    default:
      return columns => columns(left.name).compare(op, literal);
  }
}

/**
 * Compile an expression tree into nested closures once, so evaluating a
 * cached predicate does no tree dispatch beyond the closures themselves.
 */
export function compileExpression(expression: LogicExpression): MaskFunction {
  switch (expression.type) {
    case 'Comparison':
      return compileComparison(expression);
    case 'Not': {
      const operand = compileExpression(expression.operand);
      return columns => operand(columns).map(value => !value);
    }
    case 'And':
    case 'Or': {
      const left = compileExpression(expression.left);
      const right = compileExpression(expression.right);
      const both = expression.type === 'And';
      return columns => combine(left(columns), right(columns), both);
    }
  }
}
