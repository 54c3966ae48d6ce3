/**
 * Sable REPL: interactive read-eval-print loop.
 *
 * Usage: sable repl
 *
 * Features:
 *   - Persistent interpreter state across inputs
 *   - Multi-line input (detects unclosed parens/brackets)
 *   - Special commands: :help, :quit, :env, :type, :ast, :clear, :reset
 *   - Errors are printed and the loop continues
 */

import * as readline from 'readline';
import { Interpreter } from './interpreter';
import { parseExpression } from './parser';
import { evaluate } from './evaluator';
import { loadConfig } from './config';
import { expressionToString } from './ast';
import { SableError } from './errors';
import { typeToString } from './types';
import { SableValue, formatElement, typeOf } from './values';
import { Environment } from './environment';

const VERSION = '0.1.0';

/**
 * Start the Sable REPL.
 */
export function startRepl(): void {
  const config = loadConfig();
  const interpreter = new Interpreter();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.prompt,
    terminal: true,
  });

  console.log(`Sable REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  let buffer = '';
  let multiLine = false;

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (!multiLine && trimmed.startsWith(':')) {
      handleCommand(trimmed, interpreter, rl);
      rl.prompt();
      return;
    }

    buffer += (buffer ? '\n' : '') + line;

    if (hasUnclosedDelimiters(buffer)) {
      multiLine = true;
      process.stdout.write('  ... ');
      return;
    }

    multiLine = false;
    const input = buffer.trim();
    buffer = '';

    if (input === '') {
      rl.prompt();
      return;
    }

    try {
      const value = interpreter.run(input);
      if (value !== null) console.log(formatResult(value));
    } catch (e) {
      reportError(e);
    }

    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

export function formatResult(value: SableValue): string {
  return `=> ${formatElement(value)}`;
}

function reportError(e: unknown): void {
  if (e instanceof SableError) {
    console.error(`  ${e.message}`);
  } else if (e instanceof Error) {
    console.error(`  Error: ${e.message}`);
  } else {
    console.error(`  Unknown error: ${String(e)}`);
  }
}

/**
 * Check whether the input has unclosed parentheses or brackets,
 * ignoring string literals and `//` comments.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let parens = 0;
  let brackets = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (escaped) {
      escaped = false;
      continue;
    }

    if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '(': parens++; break;
      case ')': parens--; break;
      case '[': brackets++; break;
      case ']': brackets--; break;
    }
  }

  return parens > 0 || brackets > 0;
}

/**
 * Handle a REPL special command.
 */
function handleCommand(cmd: string, interpreter: Interpreter, rl: readline.Interface): void {
  const parts = cmd.split(/\s+/);
  const command = parts[0];
  const rest = cmd.slice(command.length).trim();

  switch (command) {
    case ':help':
    case ':h':
      console.log('');
      console.log('REPL Commands:');
      console.log('  :help, :h       Show this help message');
      console.log('  :quit, :q       Exit the REPL');
      console.log('  :env            Show the variables and functions in scope');
      console.log('  :type <expr>    Show the runtime type of an expression');
      console.log('  :ast <expr>     Show how an expression parses');
      console.log('  :clear          Clear the screen');
      console.log('  :reset          Reset the interpreter state');
      console.log('');
      console.log('Statements:');
      console.log('  let x = <expr>          Immutable binding');
      console.log('  var x = <expr>          Mutable binding (reassign with x = <expr>)');
      console.log('  fn f(a, b) = <expr>     Function definition');
      console.log('');
      break;

    case ':quit':
    case ':q':
    case ':exit':
      rl.close();
      break;

    case ':env':
      printEnvironment(interpreter.getGlobalEnv());
      break;

    case ':type': {
      if (!rest) {
        console.log('Usage: :type <expression>');
        break;
      }
      try {
        const value = evaluate(parseExpression(rest), interpreter.getGlobalEnv());
        console.log(typeToString(typeOf(value)));
      } catch (e) {
        reportError(e);
      }
      break;
    }

    case ':ast': {
      if (!rest) {
        console.log('Usage: :ast <expression>');
        break;
      }
      try {
        console.log(expressionToString(parseExpression(rest)));
      } catch (e) {
        reportError(e);
      }
      break;
    }

    case ':clear':
      console.clear();
      break;

    case ':reset':
      interpreter.reset();
      console.log('Interpreter state reset.');
      break;

    default:
      console.log(`Unknown command: ${command}. Type :help for available commands.`);
      break;
  }
}

/**
 * Print the user bindings of the global scope, then the function names.
 */
function printEnvironment(env: Environment): void {
  const vars = env.bindings();
  console.log('');
  if (vars.size === 0) {
    console.log('  (no variables defined)');
  }
  for (const [name, binding] of vars) {
    const mutLabel = binding.mutable ? 'var' : 'let';
    const typeLabel = typeToString(typeOf(binding.value));
    const preview = formatElement(binding.value);
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    console.log(`  ${mutLabel} ${name}: ${typeLabel} = ${truncated}`);
  }
  console.log(`  functions: ${env.functionNames().join(', ')}`);
  console.log('');
}
