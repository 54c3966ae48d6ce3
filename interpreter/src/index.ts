/**
 * Public API of the Sable interpreter.
 */

export { evaluate, tryBool, tryInt, applyOperator, setMaxDepth } from './evaluator';
export type { EvalState } from './evaluator';
export {
  OPERATOR_SYMBOLS,
  variable,
  binary,
  literal,
  listIndex,
  listLength,
  not,
  evalOf,
  call,
  expressionToString,
} from './ast';
export type { Expression, Operator, Statement } from './ast';
export {
  mkInt,
  mkBool,
  mkString,
  mkList,
  typeOf,
  valueToString,
  valuesEqual,
} from './values';
export type { SableValue } from './values';
export { typeToString } from './types';
export type { SableType } from './types';
export { Environment } from './environment';
export { mkBuiltin, mkLazyBuiltin, mkUserFunction } from './functions';
export type { SableFunction, NativeImpl } from './functions';
export { Interpreter } from './interpreter';
export { parseExpression, parseProgram } from './parser';
export { registerStdlib } from './stdlib';
export { loadConfig } from './config';
export type { SableConfig } from './config';
export * from './errors';
