/**
 * Concrete syntax tree produced by grammar/logic.peggy.
 */

export interface GrammarPosition {
  offset: number;
  line: number;
  column: number;
}

export interface GrammarLocation {
  start: GrammarPosition;
  end: GrammarPosition;
}

export type ComparisonToken = '=' | '<>' | '<' | '<=' | '>' | '>=';

export interface FieldNode {
  type: 'field';
  name: string;
  /** Checkbox option code in `[name(code)]`, null for plain fields */
  choice: string | null;
  location: GrammarLocation;
}

export interface QuotedNode {
  type: 'quoted';
  text: string;
  location: GrammarLocation;
}

export interface NumberNode {
  type: 'number';
  /** The literal as written, sign and exponent included */
  text: string;
  location: GrammarLocation;
}

export type OperandNode = FieldNode | QuotedNode | NumberNode;

export interface ComparisonNode {
  type: 'comparison';
  left: OperandNode;
  operator: ComparisonToken;
  right: OperandNode;
  location: GrammarLocation;
}

export interface GroupNode {
  type: 'group';
  expression: ExpressionNode;
  location: GrammarLocation;
}

export interface NotNode {
  type: 'not';
  operand: GroupNode;
  location: GrammarLocation;
}

export interface AndNode {
  type: 'and';
  operands: ExpressionNode[];
  location: GrammarLocation;
}

export interface OrNode {
  type: 'or';
  operands: ExpressionNode[];
  location: GrammarLocation;
}

export type ExpressionNode = OrNode | AndNode | NotNode | GroupNode | ComparisonNode;
