/**
 * Operator semantics for Sable values.
 *
 * One function per binary operator, plus `not`. None of them coerce:
 * operands of the wrong kind raise an OperandTypeError. `equals` is the
 * only total operation.
 */

import { OPERATOR_SYMBOLS, Operator } from './ast';
import { SableValue, mkBool, mkList, mkString, checkedInt, valuesEqual } from './values';
import { ArithmeticError, OperandTypeError, UnexpectedTypeError } from './errors';

function mismatch(op: Operator, left: SableValue, right: SableValue): OperandTypeError {
  return new OperandTypeError(OPERATOR_SYMBOLS[op], left.kind, right.kind);
}

function intOperands(op: Operator, left: SableValue, right: SableValue): [number, number] {
  if (left.kind === 'int' && right.kind === 'int') {
    return [left.value, right.value];
  }
  throw mismatch(op, left, right);
}

function boolOperands(op: Operator, left: SableValue, right: SableValue): [boolean, boolean] {
  if (left.kind === 'bool' && right.kind === 'bool') {
    return [left.value, right.value];
  }
  throw mismatch(op, left, right);
}

/**
 * Order two Ints or two Strs. Strings compare by UTF-16 code unit.
 */
function compare(op: Operator, left: SableValue, right: SableValue): number {
  if (left.kind === 'int' && right.kind === 'int') {
    return left.value - right.value;
  }
  if (left.kind === 'string' && right.kind === 'string') {
    if (left.value === right.value) return 0;
    return left.value < right.value ? -1 : 1;
  }
  throw mismatch(op, left, right);
}

// ---- Arithmetic ----

export function add(left: SableValue, right: SableValue): SableValue {
  if (left.kind === 'int' && right.kind === 'int') {
    return checkedInt(left.value + right.value);
  }
  if (left.kind === 'string' && right.kind === 'string') {
    return mkString(left.value + right.value);
  }
  if (left.kind === 'list' && right.kind === 'list') {
    return mkList([...left.elements, ...right.elements]);
  }
  throw mismatch('add', left, right);
}

export function subtract(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('subtract', left, right);
  return checkedInt(a - b);
}

export function multiply(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('multiply', left, right);
  return checkedInt(a * b);
}

/** Integer division, truncating toward zero. */
export function divide(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('divide', left, right);
  if (b === 0) throw new ArithmeticError('division by zero');
  return checkedInt(Math.trunc(a / b));
}

/** Remainder; the result takes the sign of the dividend. */
export function modulus(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('modulus', left, right);
  if (b === 0) throw new ArithmeticError('division by zero');
  return checkedInt(a % b);
}

// ---- Comparison ----

export function equals(left: SableValue, right: SableValue): SableValue {
  return mkBool(valuesEqual(left, right));
}

export function lessThan(left: SableValue, right: SableValue): SableValue {
  return mkBool(compare('less_than', left, right) < 0);
}

export function greaterThan(left: SableValue, right: SableValue): SableValue {
  return mkBool(compare('greater_than', left, right) > 0);
}

export function lessThanEqual(left: SableValue, right: SableValue): SableValue {
  return mkBool(compare('less_than_equal', left, right) <= 0);
}

export function greaterThanEqual(left: SableValue, right: SableValue): SableValue {
  return mkBool(compare('greater_than_equal', left, right) >= 0);
}

// ---- Shifts ----

function shiftAmount(op: Operator, amount: number): number {
  if (amount < 0) {
    throw new ArithmeticError(`negative shift amount in '${OPERATOR_SYMBOLS[op]}'`);
  }
  return amount;
}

export function shiftLeft(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('shift_left', left, right);
  const n = shiftAmount('shift_left', b);
  if (a === 0) return checkedInt(0);
  return checkedInt(a * 2 ** n);
}

/** Arithmetic shift: rounds toward negative infinity. */
export function shiftRight(left: SableValue, right: SableValue): SableValue {
  const [a, b] = intOperands('shift_right', left, right);
  const n = shiftAmount('shift_right', b);
  // every safe integer is below 2^53
  if (n >= 64) return checkedInt(a < 0 ? -1 : 0);
  return checkedInt(Math.floor(a / 2 ** n));
}

// ---- Logic ----

export function and(left: SableValue, right: SableValue): SableValue {
  const [a, b] = boolOperands('and', left, right);
  return mkBool(a && b);
}

export function or(left: SableValue, right: SableValue): SableValue {
  const [a, b] = boolOperands('or', left, right);
  return mkBool(a || b);
}

export function not(value: SableValue): SableValue {
  if (value.kind !== 'bool') {
    throw new UnexpectedTypeError('bool', value.kind);
  }
  return mkBool(!value.value);
}
