/**
 * Lexical scoping environment for the Sable interpreter.
 *
 * Each environment holds a map of variable bindings, a map of
 * functions, and a reference to its parent scope. Variables are either
 * mutable (var) or immutable (let). This is the State the evaluator
 * reads from: it owns name resolution, index bounds checking and
 * function invocation.
 */

import type { Expression } from './ast';
import { SableValue, mkString, stringChars } from './values';
import { EvalState, evaluate, tryInt } from './evaluator';
import { SableFunction, evaluateArgs, functionArity } from './functions';
import {
  ArityError,
  ImmutableBindingError,
  IndexOutOfBoundsError,
  SableRuntimeError,
  UndefinedFunctionError,
  UndefinedVariableError,
  UnindexableTypeError,
} from './errors';

export interface Binding {
  value: SableValue;
  mutable: boolean;
}

export class Environment implements EvalState {
  private vars: Map<string, Binding>;
  private functions: Map<string, SableFunction>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.functions = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): SableValue {
    const binding = this.vars.get(name);
    if (binding !== undefined) {
      return binding.value;
    }
    if (this.parent !== null) {
      return this.parent.get(name);
    }
    throw new UndefinedVariableError(name);
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Reassign a variable (must be mutable and already defined).
   */
  set(name: string, value: SableValue): void {
    const binding = this.vars.get(name);
    if (binding !== undefined) {
      if (!binding.mutable) {
        throw new ImmutableBindingError(name);
      }
      binding.value = value;
      return;
    }
    if (this.parent !== null) {
      this.parent.set(name, value);
      return;
    }
    throw new UndefinedVariableError(name);
  }

  /**
   * Define a new variable in the current scope.
   */
  define(name: string, value: SableValue, mutable: boolean): void {
    if (this.vars.has(name)) {
      throw new SableRuntimeError(`variable '${name}' is already defined in this scope`);
    }
    this.vars.set(name, { value, mutable });
  }

  /**
   * Define or overwrite a variable in the current scope.
   */
  defineOrUpdate(name: string, value: SableValue, mutable: boolean): void {
    this.vars.set(name, { value, mutable });
  }

  /**
   * Resolve `name[index]` for lists and strings. The index is evaluated
   * before the variable is looked up.
   */
  listIndex(name: string, index: Expression): SableValue {
    const i = tryInt(index, this);
    const value = this.get(name);
    switch (value.kind) {
      case 'list':
        if (i < 0 || i >= value.elements.length) {
          throw new IndexOutOfBoundsError(name, i, value.elements.length);
        }
        return value.elements[i];
      case 'string': {
        const chars = stringChars(value.value);
        if (i < 0 || i >= chars.length) {
          throw new IndexOutOfBoundsError(name, i, chars.length);
        }
        return mkString(chars[i]);
      }
      default:
        throw new UnindexableTypeError(value.kind);
    }
  }

  // ---- Functions ----

  /**
   * Define or redefine a function in the current scope.
   */
  defineFunction(fn: SableFunction): void {
    this.functions.set(fn.name, fn);
  }

  hasFunction(name: string): boolean {
    return this.lookupFunction(name) !== undefined;
  }

  private lookupFunction(name: string): SableFunction | undefined {
    const fn = this.functions.get(name);
    if (fn !== undefined) return fn;
    return this.parent?.lookupFunction(name);
  }

  /**
   * Call a function with unevaluated argument expressions. Native
   * functions decide how to evaluate them; user functions evaluate
   * them here, left to right, and run their body in a child of the
   * scope they were defined in.
   */
  callFunction(name: string, args: readonly Expression[]): SableValue {
    const fn = this.lookupFunction(name);
    if (fn === undefined) {
      throw new UndefinedFunctionError(name);
    }
    const arity = functionArity(fn);
    if (arity !== null && args.length !== arity) {
      throw new ArityError(name, arity, args.length);
    }
    switch (fn.kind) {
      case 'native':
        return fn.call(args, this);
      case 'user': {
        const values = evaluateArgs(args, this);
        const scope = fn.closure.child();
        fn.params.forEach((param, i) => scope.define(param, values[i], false));
        return evaluate(fn.body, scope);
      }
    }
  }

  // ---- Scopes ----

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  /**
   * Variables bound directly in this scope, in definition order.
   */
  bindings(): ReadonlyMap<string, Readonly<Binding>> {
    return this.vars;
  }

  /**
   * Names of the functions visible from this scope, sorted.
   */
  functionNames(): string[] {
    const names = new Set<string>(this.parent?.functionNames() ?? []);
    for (const name of this.functions.keys()) names.add(name);
    return [...names].sort();
  }
}
