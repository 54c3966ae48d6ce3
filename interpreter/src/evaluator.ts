/**
 * Expression evaluator for the Sable language.
 *
 * Reduces an AST node to a value against an environment. Variable and
 * literal results are returned as the stored objects themselves;
 * operators and function calls produce fresh values. Values are
 * immutable, so callers cannot tell the two apart.
 *
 * Every failure propagates to the caller unchanged. Nothing is
 * recovered or defaulted here.
 */

import type { Expression, Operator } from './ast';
import { SableValue, mkInt, stringChars } from './values';
import * as ops from './operations';
import { parseExpression } from './parser';
import { loadConfig } from './config';
import {
  RecursionLimitError,
  UnexpectedTypeError,
  UnindexableTypeError,
} from './errors';

/**
 * The environment contract the evaluator reads from. Errors raised by
 * these methods (unknown names, arity, bounds) belong to the
 * environment and pass through untouched.
 */
export interface EvalState {
  get(name: string): SableValue;
  /** Resolve `name[index]`; the implementation evaluates `index` and checks bounds. */
  listIndex(name: string, index: Expression): SableValue;
  /** Invoke a function with its unevaluated argument expressions. */
  callFunction(name: string, args: readonly Expression[]): SableValue;
}

// Evaluation is synchronous, so one counter covers the whole call stack,
// including re-entry through eval() and user functions.
let depth = 0;
let maxDepth: number | null = null;

function depthLimit(): number {
  if (maxDepth === null) {
    maxDepth = loadConfig().maxDepth;
  }
  return maxDepth;
}

/**
 * Override the maximum evaluation depth. Passing null restores the
 * configured value.
 */
export function setMaxDepth(limit: number | null): void {
  maxDepth = limit;
}

export function evaluate(expr: Expression, state: EvalState): SableValue {
  const limit = depthLimit();
  if (depth >= limit) {
    throw new RecursionLimitError(limit);
  }
  depth++;
  try {
    return evalNode(expr, state);
  } finally {
    depth--;
  }
}

function evalNode(expr: Expression, state: EvalState): SableValue {
  switch (expr.kind) {
    case 'variable':
      return state.get(expr.name);
    case 'binary': {
      // Both sides are always evaluated, in order; && and || do not short-circuit.
      const left = evaluate(expr.left, state);
      const right = evaluate(expr.right, state);
      return applyOperator(expr.operator, left, right);
    }
    case 'literal':
      return expr.value;
    case 'list_index':
      return state.listIndex(expr.name, expr.index);
    case 'not':
      return ops.not(evaluate(expr.operand, state));
    case 'list_length':
      return lengthOf(state.get(expr.name));
    case 'eval':
      return evalSource(expr.source, state);
    case 'call':
      return state.callFunction(expr.name, expr.args);
  }
}

export function applyOperator(op: Operator, left: SableValue, right: SableValue): SableValue {
  switch (op) {
    case 'add': return ops.add(left, right);
    case 'subtract': return ops.subtract(left, right);
    case 'multiply': return ops.multiply(left, right);
    case 'divide': return ops.divide(left, right);
    case 'equality': return ops.equals(left, right);
    case 'less_than': return ops.lessThan(left, right);
    case 'greater_than': return ops.greaterThan(left, right);
    case 'less_than_equal': return ops.lessThanEqual(left, right);
    case 'greater_than_equal': return ops.greaterThanEqual(left, right);
    case 'shift_left': return ops.shiftLeft(left, right);
    case 'shift_right': return ops.shiftRight(left, right);
    case 'and': return ops.and(left, right);
    case 'or': return ops.or(left, right);
    case 'modulus': return ops.modulus(left, right);
  }
}

function lengthOf(value: SableValue): SableValue {
  switch (value.kind) {
    case 'list': return mkInt(value.elements.length);
    case 'string': return mkInt(stringChars(value.value).length);
    default: throw new UnindexableTypeError(value.kind);
  }
}

function evalSource(sourceExpr: Expression, state: EvalState): SableValue {
  const source = evaluate(sourceExpr, state);
  if (source.kind !== 'string') {
    throw new UnexpectedTypeError('string', source.kind);
  }
  const parsed = parseExpression(source.value);
  return evaluate(parsed, state);
}

/**
 * Evaluate an expression that must produce a Bool.
 */
export function tryBool(expr: Expression, state: EvalState): boolean {
  const value = evaluate(expr, state);
  if (value.kind !== 'bool') {
    throw new UnexpectedTypeError('bool', value.kind);
  }
  return value.value;
}

/**
 * Evaluate an expression that must produce an Int.
 */
export function tryInt(expr: Expression, state: EvalState): number {
  const value = evaluate(expr, state);
  if (value.kind !== 'int') {
    throw new UnexpectedTypeError('int', value.kind);
  }
  return value.value;
}
