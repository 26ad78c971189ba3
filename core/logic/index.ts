export { LogicTranslator, defaultTranslator, translate, evaluate } from './LogicTranslator';
export type { ILogicTranslator } from './LogicTranslator';
export { CompiledPredicate } from './CompiledPredicate';
export type { Column, DataTable, EvaluateOptions } from './CompiledPredicate';
export { compileExpression } from './compile';
export type { ColumnLookup, MaskFunction } from './compile';
export { lowerLogic } from './lower';
export type { LoweredLogic } from './lower';
export { formatExpression } from './ast';
export type {
  And,
  Comparison,
  ComparisonMode,
  ComparisonOperator,
  FieldRef,
  Literal,
  LogicExpression,
  Not,
  Or
} from './ast';
export { exportColumnName, checkboxColumns, choiceCodes } from './fields';
