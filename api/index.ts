/**
 * redcap-logic API Entry Point
 *
 * Classifies exported response values and evaluates branching logic over
 * exported tables.
 */
import { ConfigLoader } from '@core/config/loader';
import { LogicTranslator } from '@core/logic/LogicTranslator';
import { ValueFactory } from '@core/values/ValueFactory';
import type { ResolvedConfig } from '@core/config/types';

// Values
export {
  Category,
  isTextual,
  classify,
  createClassifier,
  parseDecimal,
  RedcapValue,
  RedcapValueArray,
  ValueFactory,
  makeValue,
  makeArray,
  CALC_ERROR_RAW
} from '@core/values';
export type {
  Classification,
  Classifier,
  Operand,
  ArrayOperand,
  TakeOptions,
  ValueFactoryOptions,
  OrderingOperator,
  ArithmeticOperator
} from '@core/values';

// Branching logic
export {
  LogicTranslator,
  CompiledPredicate,
  translate,
  evaluate,
  formatExpression,
  exportColumnName
} from '@core/logic';
export type {
  DataTable,
  Column,
  EvaluateOptions,
  LogicExpression,
  Comparison,
  ComparisonMode,
  ComparisonOperator,
  FieldRef,
  Literal
} from '@core/logic';

export { BranchingLogicService } from '@services/BranchingLogicService';
export type { MetadataRow, FieldPredicate, IBranchingLogicService } from '@services/BranchingLogicService';

// Errors
export {
  RedcapLogicError,
  ErrorSeverity,
  InputTypeError,
  LogicParseError,
  ValueMismatchError,
  ValueIndexError,
  UnknownFieldError
} from '@core/errors';

// Configuration
export { ConfigLoader, CONFIG_FILE_NAME } from '@core/config/loader';
export { DEFAULT_CONFIG, DEFAULT_DATE_FORMATS } from '@core/config/defaults';
export { parseMissingDataCodes } from '@core/config/utils';
export type { ValueConfig, TranslatorConfig, ResolvedConfig } from '@core/config/types';

export interface Project {
  config: ResolvedConfig;
  values: ValueFactory;
  translator: LogicTranslator;
}

/**
 * Build a value factory and translator from a project's
 * redcap-logic.config.json, falling back to defaults.
 *
 * @example
 * ```ts
 * const { translator, values } = openProject('./study');
 * const shown = translator.translate("[age] >= 18").evaluate(table, { factory: values });
 * ```
 */
export function openProject(projectPath?: string): Project {
  const config = new ConfigLoader(projectPath).load();
  return {
    config,
    values: new ValueFactory(config.values),
    translator: new LogicTranslator(config.translator)
  };
}
