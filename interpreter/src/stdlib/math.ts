/**
 * Standard library: Math functions for the Sable language.
 *
 * All functions work on Int; results outside the safe integer range
 * raise an ArithmeticError.
 */

import { Environment } from '../environment';
import { SableValue, checkedInt } from '../values';
import { expectInt, mkBuiltin } from '../functions';
import { ArithmeticError, SableRuntimeError } from '../errors';

/**
 * Register all math builtins into the given environment.
 */
export function registerMathBuiltins(env: Environment): void {
  env.defineFunction(mkBuiltin('abs', 1, (args: SableValue[]): SableValue => {
    return checkedInt(Math.abs(expectInt(args[0])));
  }));

  env.defineFunction(mkBuiltin('min', null, (args: SableValue[]): SableValue => {
    if (args.length < 1) throw new SableRuntimeError('min() takes at least 1 argument');
    return checkedInt(Math.min(...args.map(expectInt)));
  }));

  env.defineFunction(mkBuiltin('max', null, (args: SableValue[]): SableValue => {
    if (args.length < 1) throw new SableRuntimeError('max() takes at least 1 argument');
    return checkedInt(Math.max(...args.map(expectInt)));
  }));

  env.defineFunction(mkBuiltin('pow', 2, (args: SableValue[]): SableValue => {
    const base = expectInt(args[0]);
    const exp = expectInt(args[1]);
    if (exp < 0) throw new ArithmeticError('pow() exponent must be non-negative');
    return checkedInt(base ** exp);
  }));
}
