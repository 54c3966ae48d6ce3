/**
 * Callable functions stored in an environment.
 *
 * Native functions receive their argument expressions unevaluated and
 * choose their own evaluation strategy; most use `mkBuiltin`, which
 * evaluates every argument left to right first. User functions are
 * defined by `fn` statements and always evaluate their arguments.
 */

import type { Expression } from './ast';
import type { Environment } from './environment';
import type { SableValue } from './values';
import { evaluate } from './evaluator';
import { UnexpectedTypeError } from './errors';

export type NativeImpl = (args: readonly Expression[], env: Environment) => SableValue;

export type SableFunction =
  | {
    readonly kind: 'native';
    readonly name: string;
    /** null for variadic functions, which check their own argument counts */
    readonly arity: number | null;
    readonly call: NativeImpl;
  }
  | {
    readonly kind: 'user';
    readonly name: string;
    readonly params: readonly string[];
    readonly body: Expression;
    readonly closure: Environment;
  };

export function evaluateArgs(args: readonly Expression[], env: Environment): SableValue[] {
  return args.map(arg => evaluate(arg, env));
}

/**
 * A native function over already-evaluated arguments.
 */
export function mkBuiltin(
  name: string,
  arity: number | null,
  fn: (args: SableValue[]) => SableValue,
): SableFunction {
  return {
    kind: 'native',
    name,
    arity,
    call: (args, env) => fn(evaluateArgs(args, env)),
  };
}

/**
 * A native function that evaluates (or skips) its arguments itself.
 */
export function mkLazyBuiltin(name: string, arity: number | null, call: NativeImpl): SableFunction {
  return { kind: 'native', name, arity, call };
}

export function mkUserFunction(
  name: string,
  params: readonly string[],
  body: Expression,
  closure: Environment,
): SableFunction {
  return { kind: 'user', name, params, body, closure };
}

export function functionArity(fn: SableFunction): number | null {
  return fn.kind === 'native' ? fn.arity : fn.params.length;
}

// ---- Argument checks for native functions ----

export function expectInt(v: SableValue): number {
  if (v.kind !== 'int') throw new UnexpectedTypeError('int', v.kind);
  return v.value;
}

export function expectBool(v: SableValue): boolean {
  if (v.kind !== 'bool') throw new UnexpectedTypeError('bool', v.kind);
  return v.value;
}

export function expectString(v: SableValue): string {
  if (v.kind !== 'string') throw new UnexpectedTypeError('string', v.kind);
  return v.value;
}

export function expectList(v: SableValue): readonly SableValue[] {
  if (v.kind !== 'list') throw new UnexpectedTypeError('list', v.kind);
  return v.elements;
}
