/**
 * Error types for the Sable interpreter.
 *
 * Every failure surfaced by the evaluator, the environment, the value
 * operations or the parser is a SableError. The `kind` field lets hosts
 * switch over failures without instanceof chains.
 */

import { SableType, typeToString } from './types';

export type SableErrorKind =
  | 'unexpected_type'
  | 'argument_type'
  | 'unindexable'
  | 'syntax'
  | 'operand_type'
  | 'arithmetic'
  | 'undefined_variable'
  | 'undefined_function'
  | 'arity'
  | 'index_out_of_bounds'
  | 'immutable_binding'
  | 'recursion_limit'
  | 'assertion'
  | 'runtime'
  | 'config';

export abstract class SableError extends Error {
  abstract readonly kind: SableErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'SableError';
  }
}

// ---- Evaluator errors ----

export class UnexpectedTypeError extends SableError {
  readonly kind = 'unexpected_type';

  constructor(public readonly expected: SableType, public readonly actual: SableType) {
    super(`TypeError: expected ${typeToString(expected)}, found ${typeToString(actual)}`);
    this.name = 'UnexpectedTypeError';
  }
}

export class UnindexableTypeError extends SableError {
  readonly kind = 'unindexable';

  constructor(public readonly actual: SableType) {
    super(`TypeError: values of type ${typeToString(actual)} cannot be indexed`);
    this.name = 'UnindexableTypeError';
  }
}

export class SableSyntaxError extends SableError {
  readonly kind = 'syntax';

  /** The parser's diagnostic, unmodified. */
  public readonly detail: string;

  constructor(detail: string) {
    super(`SyntaxError: ${detail}`);
    this.name = 'SableSyntaxError';
    this.detail = detail;
  }
}

export class RecursionLimitError extends SableError {
  readonly kind = 'recursion_limit';

  constructor(public readonly limit: number) {
    super(`RecursionError: maximum evaluation depth of ${limit} exceeded`);
    this.name = 'RecursionLimitError';
  }
}

// ---- Value errors ----

export class OperandTypeError extends SableError {
  readonly kind = 'operand_type';

  constructor(
    public readonly operator: string,
    public readonly left: SableType,
    public readonly right: SableType,
  ) {
    super(`TypeError: cannot apply '${operator}' to ${typeToString(left)} and ${typeToString(right)}`);
    this.name = 'OperandTypeError';
  }
}

export class ArithmeticError extends SableError {
  readonly kind = 'arithmetic';

  constructor(message: string) {
    super(`ArithmeticError: ${message}`);
    this.name = 'ArithmeticError';
  }
}

// ---- Environment errors ----

export class UndefinedVariableError extends SableError {
  readonly kind = 'undefined_variable';

  constructor(public readonly variable: string) {
    super(`NameError: undefined variable '${variable}'`);
    this.name = 'UndefinedVariableError';
  }
}

export class UndefinedFunctionError extends SableError {
  readonly kind = 'undefined_function';

  constructor(public readonly functionName: string) {
    super(`NameError: undefined function '${functionName}'`);
    this.name = 'UndefinedFunctionError';
  }
}

export class ArityError extends SableError {
  readonly kind = 'arity';

  constructor(
    public readonly functionName: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`ArityError: ${functionName}() takes ${expected} argument${expected === 1 ? '' : 's'} but ${actual} ${actual === 1 ? 'was' : 'were'} given`);
    this.name = 'ArityError';
  }
}

export class IndexOutOfBoundsError extends SableError {
  readonly kind = 'index_out_of_bounds';

  constructor(
    public readonly variable: string,
    public readonly index: number,
    public readonly length: number,
  ) {
    super(`IndexError: index ${index} out of bounds for '${variable}' of length ${length}`);
    this.name = 'IndexOutOfBoundsError';
  }
}

export class ImmutableBindingError extends SableError {
  readonly kind = 'immutable_binding';

  constructor(public readonly variable: string) {
    super(`ImmutableError: cannot reassign let binding '${variable}'`);
    this.name = 'ImmutableBindingError';
  }
}

// ---- Library and host errors ----

export class ArgumentTypeError extends SableError {
  readonly kind = 'argument_type';

  constructor(
    public readonly functionName: string,
    public readonly accepted: readonly SableType[],
    public readonly actual: SableType,
  ) {
    super(`TypeError: ${functionName}() expects ${describeKinds(accepted)}, found ${typeToString(actual)}`);
    this.name = 'ArgumentTypeError';
  }
}

function describeKinds(kinds: readonly SableType[]): string {
  const names = kinds.map(typeToString);
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} or ${names[names.length - 1]}`;
}

export class AssertionFailedError extends SableError {
  readonly kind = 'assertion';

  constructor(message: string) {
    super(`AssertionError: ${message}`);
    this.name = 'AssertionFailedError';
  }
}

export class SableRuntimeError extends SableError {
  readonly kind = 'runtime';

  constructor(message: string) {
    super(`RuntimeError: ${message}`);
    this.name = 'SableRuntimeError';
  }
}

export class ConfigError extends SableError {
  readonly kind = 'config';

  constructor(message: string) {
    super(`ConfigError: ${message}`);
    this.name = 'ConfigError';
  }
}
