/**
 * Standard library: Collection utilities for the Sable language.
 *
 * Lists are immutable, so every operation returns a new list.
 */

import { Environment } from '../environment';
import { SableValue, mkBool, mkInt, mkList, valuesEqual } from '../values';
import { expectInt, expectList, mkBuiltin } from '../functions';
import { SableRuntimeError } from '../errors';

/** Largest list `range` will build. */
const MAX_RANGE = 1_000_000;

/**
 * Register all collection builtins into the given environment.
 */
export function registerCollectionBuiltins(env: Environment): void {
  // ---- range(end) / range(start, end) ----

  env.defineFunction(mkBuiltin('range', null, (args: SableValue[]): SableValue => {
    if (args.length < 1 || args.length > 2) {
      throw new SableRuntimeError('range() takes 1 or 2 arguments (end) or (start, end)');
    }
    const start = args.length === 2 ? expectInt(args[0]) : 0;
    const end = expectInt(args[args.length - 1]);
    if (end - start > MAX_RANGE) {
      throw new SableRuntimeError(`range() would produce more than ${MAX_RANGE} elements`);
    }
    const elements: SableValue[] = [];
    for (let i = start; i < end; i++) {
      elements.push(mkInt(i));
    }
    return mkList(elements);
  }));

  env.defineFunction(mkBuiltin('reverse', 1, (args: SableValue[]): SableValue => {
    return mkList([...expectList(args[0])].reverse());
  }));

  env.defineFunction(mkBuiltin('contains', 2, (args: SableValue[]): SableValue => {
    const needle = args[1];
    return mkBool(expectList(args[0]).some(el => valuesEqual(el, needle)));
  }));

  env.defineFunction(mkBuiltin('push', 2, (args: SableValue[]): SableValue => {
    return mkList([...expectList(args[0]), args[1]]);
  }));
}
