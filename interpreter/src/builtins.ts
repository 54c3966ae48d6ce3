/**
 * Core built-in functions for the Sable interpreter.
 */

import { Environment } from './environment';
import { SableValue, checkedInt, mkString, typeOf, valueToString } from './values';
import { typeToString } from './types';
import { evaluate, tryBool } from './evaluator';
import { mkBuiltin, mkLazyBuiltin } from './functions';
import { ArgumentTypeError, SableRuntimeError } from './errors';

const INT_PATTERN = /^-?\d+$/;

/**
 * Register all core built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment): void {
  // ---- Type inspection and conversion ----

  env.defineFunction(mkBuiltin('type', 1, (args: SableValue[]): SableValue => {
    return mkString(typeToString(typeOf(args[0])));
  }));

  env.defineFunction(mkBuiltin('str', 1, (args: SableValue[]): SableValue => {
    return mkString(valueToString(args[0]));
  }));

  env.defineFunction(mkBuiltin('int', 1, (args: SableValue[]): SableValue => {
    const v = args[0];
    switch (v.kind) {
      case 'int': return v;
      case 'bool': return checkedInt(v.value ? 1 : 0);
      case 'string': {
        const text = v.value.trim();
        if (!INT_PATTERN.test(text)) {
          throw new SableRuntimeError(`cannot convert "${v.value}" to Int`);
        }
        return checkedInt(Number(text));
      }
      case 'list': throw new ArgumentTypeError('int', ['int', 'bool', 'string'], v.kind);
    }
  }));

  // ---- Lazy ----

  // Only the selected branch is evaluated.
  env.defineFunction(mkLazyBuiltin('if', 3, (args, scope) => {
    return tryBool(args[0], scope) ? evaluate(args[1], scope) : evaluate(args[2], scope);
  }));
}
