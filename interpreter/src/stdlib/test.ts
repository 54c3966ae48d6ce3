/**
 * Standard library: assertions for Sable test programs.
 */

import { Environment } from '../environment';
import { SableValue, formatElement, mkBool, valuesEqual } from '../values';
import { expectBool, expectString, mkBuiltin } from '../functions';
import { AssertionFailedError, SableRuntimeError } from '../errors';

function customMessage(args: SableValue[], position: number): string | null {
  return args.length > position ? expectString(args[position]) : null;
}

/**
 * Register all test builtins into the given environment.
 */
export function registerTestBuiltins(env: Environment): void {
  // ---- assert(condition, message?) ----

  env.defineFunction(mkBuiltin('assert', null, (args: SableValue[]): SableValue => {
    if (args.length < 1 || args.length > 2) {
      throw new SableRuntimeError('assert() takes 1 or 2 arguments (condition, message?)');
    }
    if (!expectBool(args[0])) {
      throw new AssertionFailedError(customMessage(args, 1) ?? 'expected true, got false');
    }
    return mkBool(true);
  }));

  // ---- assertEqual(actual, expected, message?) ----

  env.defineFunction(mkBuiltin('assertEqual', null, (args: SableValue[]): SableValue => {
    if (args.length < 2 || args.length > 3) {
      throw new SableRuntimeError('assertEqual() takes 2 or 3 arguments (actual, expected, message?)');
    }
    const [actual, expected] = args;
    if (!valuesEqual(actual, expected)) {
      throw new AssertionFailedError(
        customMessage(args, 2) ?? `expected ${formatElement(expected)}, got ${formatElement(actual)}`,
      );
    }
    return mkBool(true);
  }));
}
