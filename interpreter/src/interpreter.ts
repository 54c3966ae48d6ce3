/**
 * Host interpreter for Sable programs.
 *
 * A program is a sequence of host statements (bindings, assignments,
 * function definitions and bare expressions). All expression work is
 * delegated to the evaluator; this class only manages the global
 * environment the statements populate.
 */

import { Environment } from './environment';
import type { Statement } from './ast';
import type { SableValue } from './values';
import { evaluate } from './evaluator';
import { mkUserFunction } from './functions';
import { parseProgram } from './parser';
import { registerStdlib } from './stdlib';

export class Interpreter {
  private globalEnv: Environment;

  constructor() {
    this.globalEnv = Interpreter.createGlobalEnv();
  }

  private static createGlobalEnv(): Environment {
    const env = new Environment();
    registerStdlib(env);
    return env;
  }

  /**
   * Parse and execute a program. Returns the value of the last bare
   * expression statement, or null if the program has none.
   */
  run(source: string): SableValue | null {
    let result: SableValue | null = null;
    for (const statement of parseProgram(source)) {
      const value = this.execute(statement);
      if (value !== null) result = value;
    }
    return result;
  }

  /**
   * Execute one statement against the global environment. Only bare
   * expressions produce a value.
   */
  execute(statement: Statement): SableValue | null {
    const env = this.globalEnv;
    switch (statement.kind) {
      case 'let':
        env.define(statement.name, evaluate(statement.value, env), statement.mutable);
        return null;
      case 'assign':
        env.set(statement.name, evaluate(statement.value, env));
        return null;
      case 'fn':
        env.defineFunction(mkUserFunction(statement.name, statement.params, statement.body, env));
        return null;
      case 'expression':
        return evaluate(statement.expression, env);
    }
  }

  /**
   * Get the global environment (useful for testing).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  /**
   * Discard every user binding and function.
   */
  reset(): void {
    this.globalEnv = Interpreter.createGlobalEnv();
  }
}
