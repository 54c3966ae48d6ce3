/**
 * Standard library: String utilities for the Sable language.
 */

import { Environment } from '../environment';
import { SableValue, mkList, mkString, stringChars, valueToString } from '../values';
import { expectList, expectString, mkBuiltin } from '../functions';

/**
 * Register all string builtins into the given environment.
 */
export function registerStringBuiltins(env: Environment): void {
  env.defineFunction(mkBuiltin('trim', 1, (args: SableValue[]): SableValue => {
    return mkString(expectString(args[0]).trim());
  }));

  env.defineFunction(mkBuiltin('upper', 1, (args: SableValue[]): SableValue => {
    return mkString(expectString(args[0]).toUpperCase());
  }));

  env.defineFunction(mkBuiltin('lower', 1, (args: SableValue[]): SableValue => {
    return mkString(expectString(args[0]).toLowerCase());
  }));

  env.defineFunction(mkBuiltin('split', 2, (args: SableValue[]): SableValue => {
    const s = expectString(args[0]);
    const delim = expectString(args[1]);
    // an empty delimiter splits into characters, counted by code point
    const parts = delim === '' ? stringChars(s) : s.split(delim);
    return mkList(parts.map(part => mkString(part)));
  }));

  // Elements of any kind are joined by their display form.
  env.defineFunction(mkBuiltin('join', 2, (args: SableValue[]): SableValue => {
    const elements = expectList(args[0]);
    const sep = expectString(args[1]);
    return mkString(elements.map(valueToString).join(sep));
  }));
}
