#!/usr/bin/env node
/**
 * Sable interpreter CLI entry point.
 *
 * Usage: sable <file.sable>
 *        sable run <file.sable>
 *        sable repl
 *        sable --eval "<code>"
 */

import * as fs from 'fs';
import * as path from 'path';
import { Interpreter } from './interpreter';
import { SableError } from './errors';
import { formatResult, startRepl } from './repl';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'repl' }
  | { kind: 'eval'; source: string }
  | { kind: 'file'; path: string }
  | { kind: 'usage_error'; message: string };

/**
 * Decide what to do from the arguments after the program name.
 */
export function parseArgs(args: readonly string[]): CliCommand {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    return { kind: 'help' };
  }
  if (args[0] === 'repl') {
    return { kind: 'repl' };
  }
  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) return { kind: 'usage_error', message: '--eval requires a code argument' };
    return { kind: 'eval', source: args[1] };
  }
  if (args[0] === 'run') {
    if (args.length < 2) return { kind: 'usage_error', message: 'run requires a file argument' };
    return { kind: 'file', path: args[1] };
  }
  // `sable <file.sable>` (shorthand)
  return { kind: 'file', path: args[0] };
}

export function main(args: readonly string[]): void {
  const command = parseArgs(args);
  let source: string;

  switch (command.kind) {
    case 'help':
      printUsage();
      process.exit(0);
    case 'repl':
      startRepl();
      return; // REPL runs its own event loop
    case 'usage_error':
      console.error(`Error: ${command.message}`);
      printUsage();
      process.exit(1);
    case 'eval':
      source = command.source;
      break;
    case 'file':
      source = readFile(command.path);
      break;
  }

  const interpreter = new Interpreter();
  try {
    const value = interpreter.run(source);
    if (value !== null) console.log(formatResult(value));
  } catch (e) {
    if (e instanceof SableError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('Sable v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sable <file.sable>           Run a Sable program');
  console.log('  sable run <file.sable>       Run a Sable program');
  console.log('  sable repl                   Start interactive REPL');
  console.log('  sable --eval "<code>"        Evaluate inline code');
  console.log('  sable --help                 Show this help');
  console.log('');
  console.log('Environment:');
  console.log('  SABLE_MAX_DEPTH              Maximum evaluation depth (default 1000)');
  console.log('  SABLE_PROMPT                 REPL prompt (default "sable> ")');
}

if (require.main === module) {
  main(process.argv.slice(2));
}
