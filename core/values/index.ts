export { Category, isTextual } from './Category';
export { classify, createClassifier, defaultClassifier, parseDecimal, isDecimalString, matchDateFormat } from './classify';
export type { Classification, Classifier } from './classify';
export { RedcapValue, resolveOperand } from './RedcapValue';
export type { Operand } from './RedcapValue';
export { RedcapValueArray } from './RedcapValueArray';
export type { ArrayOperand, TakeOptions } from './RedcapValueArray';
export { ValueFactory, defaultValueFactory, makeValue, makeArray } from './ValueFactory';
export type { ValueFactoryOptions } from './ValueFactory';
export { InternTable } from './InternTable';
export { CALC_ERROR_RAW } from './semantics';
export type { OrderingOperator, ArithmeticOperator, ValueParts } from './semantics';
