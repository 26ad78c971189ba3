import type { OrderingOperator } from '@core/values/semantics';

export type ComparisonOperator = '=' | '<>' | OrderingOperator;

/**
 * How a comparison reads its operands:
 * - numeric: column against a bare number, by numeric value
 * - categorical: column against a quoted literal, by raw text
 * - field: column against column; ordering is numeric, equality is textual
 */
export type ComparisonMode = 'numeric' | 'categorical' | 'field';

export interface FieldRef {
  readonly type: 'FieldRef';
  /** Export column name; checkbox options resolve to `field___code` */
  readonly name: string;
}

export type Literal =
  | { readonly type: 'Literal'; readonly kind: 'numeric'; readonly value: number }
  | { readonly type: 'Literal'; readonly kind: 'categorical'; readonly value: string };

export interface Comparison {
  readonly type: 'Comparison';
  readonly op: ComparisonOperator;
  readonly left: FieldRef;
  readonly right: FieldRef | Literal;
  readonly mode: ComparisonMode;
}

export interface And {
  readonly type: 'And';
  readonly left: LogicExpression;
  readonly right: LogicExpression;
}

export interface Or {
  readonly type: 'Or';
  readonly left: LogicExpression;
  readonly right: LogicExpression;
}

export interface Not {
  readonly type: 'Not';
  readonly operand: LogicExpression;
}

export type LogicExpression = Comparison | And | Or | Not;

function quoteLiteral(text: string): string {
  return text.includes("'") ? `"${text}"` : `'${text}'`;
}

/**
 * Render an expression back to logic syntax with every sub-expression
 * parenthesized. Two strings that translate to equal trees render the
 * same way.
 */
export function formatExpression(expression: LogicExpression): string {
  switch (expression.type) {
    case 'Comparison': {
      const right = expression.right.type === 'FieldRef'
        ? `[${expression.right.name}]`
        : expression.right.kind === 'numeric'
          ? String(expression.right.value)
          : quoteLiteral(expression.right.value);
      return `[${expression.left.name}] ${expression.op} ${right}`;
    }
    case 'And':
      return `(${formatExpression(expression.left)}) and (${formatExpression(expression.right)})`;
    case 'Or':
      return `(${formatExpression(expression.left)}) or (${formatExpression(expression.right)})`;
    case 'Not':
      return `!(${formatExpression(expression.operand)})`;
  }
}
