import type {
  ComparisonNode,
  ComparisonToken,
  ExpressionNode,
  FieldNode,
  GrammarLocation,
  NumberNode,
  QuotedNode
} from '@grammar/types';
import type { And, Comparison, ComparisonOperator, FieldRef, Literal, LogicExpression, Not, Or } from './ast';
import { exportColumnName } from './fields';
import { LogicParseError } from '@core/errors/LogicParseError';

export interface LoweredLogic {
  expression: LogicExpression;
  /** Export columns the expression reads, in order of first reference */
  fields: ReadonlySet<string>;
}

const MIRRORED: Record<ComparisonToken, ComparisonOperator> = {
  '=': '=',
  '<>': '<>',
  '<': '>',
  '<=': '>=',
  '>': '<',
  '>=': '<='
};

/**
 * Second stage of translation: turns the parser's concrete syntax tree
 * into the evaluable expression tree. Groups disappear, n-ary chains fold
 * left into binary nodes, and each comparison gets its mode.
 */
class Lowering {
  readonly fields = new Set<string>();

  constructor(private readonly logic: string) {}

  expression(node: ExpressionNode): LogicExpression {
    switch (node.type) {
      case 'group':
        return this.expression(node.expression);
      case 'not':
        return Object.freeze<Not>({ type: 'Not', operand: this.expression(node.operand) });
      case 'and':
        return this.chain(node.operands, (left, right) => Object.freeze<And>({ type: 'And', left, right }));
      case 'or':
        return this.chain(node.operands, (left, right) => Object.freeze<Or>({ type: 'Or', left, right }));
      case 'comparison':
        return this.comparison(node);
    }
  }

  private chain(
    operands: ExpressionNode[],
    join: (left: LogicExpression, right: LogicExpression) => LogicExpression
  ): LogicExpression {
    const [first, ...rest] = operands.map(operand => this.expression(operand));
    return rest.reduce(join, first);
  }

  private comparison(node: ComparisonNode): Comparison {
    // 5 < [x] reads as [x] > 5
    const mirrored = node.left.type !== 'field';
    const fieldNode = mirrored ? node.right : node.left;
    const other = mirrored ? node.left : node.right;
    const op = mirrored ? MIRRORED[node.operator] : node.operator;

    if (fieldNode.type !== 'field') {
      throw this.error('a comparison must reference at least one field', node.location);
    }

    const left = this.field(fieldNode);

    switch (other.type) {
      case 'field':
        return Object.freeze<Comparison>({ type: 'Comparison', op, left, right: this.field(other), mode: 'field' });
      case 'number':
        return Object.freeze<Comparison>({ type: 'Comparison', op, left, right: this.number(other), mode: 'numeric' });
      case 'quoted':
        return Object.freeze<Comparison>({ type: 'Comparison', op, left, right: this.quoted(other), mode: 'categorical' });
    }
  }

  private field(node: FieldNode): FieldRef {
    const name = exportColumnName(node.name, node.choice);
    this.fields.add(name);
    return Object.freeze<FieldRef>({ type: 'FieldRef', name });
  }

  private number(node: NumberNode): Literal {
    return Object.freeze<Literal>({ type: 'Literal', kind: 'numeric', value: Number(node.text) });
  }

  private quoted(node: QuotedNode): Literal {
    return Object.freeze<Literal>({ type: 'Literal', kind: 'categorical', value: node.text });
  }

  private error(message: string, location: GrammarLocation): LogicParseError {
    const { offset, line, column } = location.start;
    return new LogicParseError(message, this.logic, { offset, line, column });
  }
}

/**
 * Lower a parsed logic string into an expression and its referenced fields.
 *
 * @param tree The concrete syntax tree from parseLogic
 * @param logic The original logic string, for error messages
 */
export function lowerLogic(tree: ExpressionNode, logic: string): LoweredLogic {
  const lowering = new Lowering(logic);
  const expression = lowering.expression(tree);
  return { expression, fields: lowering.fields };
}
