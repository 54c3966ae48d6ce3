/**
 * Standard library: I/O functions for the Sable language.
 */

import { Environment } from '../environment';
import { SableValue, mkString, valueToString } from '../values';
import { expectString, mkBuiltin } from '../functions';

/**
 * Register all I/O builtins into the given environment.
 */
export function registerIOBuiltins(env: Environment): void {
  // ---- Output ----

  // Returns the text it printed, without the trailing newline.
  env.defineFunction(mkBuiltin('print', null, (args: SableValue[]): SableValue => {
    const output = args.map(valueToString).join(' ');
    process.stdout.write(output + '\n');
    return mkString(output);
  }));

  // ---- Environment ----

  env.defineFunction(mkBuiltin('getEnv', 1, (args: SableValue[]): SableValue => {
    const val = process.env[expectString(args[0])];
    return mkString(val ?? '');
  }));
}
