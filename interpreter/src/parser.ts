/**
 * Parser module: compiles the Sable grammar with peggy and parses
 * source text into AST nodes.
 *
 * The grammar is read from grammar/sable.peggy and compiled once, on
 * first use.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as peggy from 'peggy';
import type { Expression, Statement } from './ast';
import { SableSyntaxError } from './errors';

const GRAMMAR_PATH = path.join(__dirname, '..', 'grammar', 'sable.peggy');

type StartRule = 'Expression' | 'Program';

let compiled: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (compiled === null) {
    const grammar = fs.readFileSync(GRAMMAR_PATH, 'utf-8');
    compiled = peggy.generate(grammar, {
      allowedStartRules: ['Expression', 'Program'],
      grammarSource: GRAMMAR_PATH,
    });
  }
  return compiled;
}

function run(parser: peggy.Parser, source: string, startRule: StartRule) {
  try {
    return parser.parse(source, { startRule });
  } catch (e) {
    if (e instanceof parser.SyntaxError) {
      throw new SableSyntaxError(e.message);
    }
    throw e;
  }
}

/**
 * Parse a single expression. Surrounding whitespace is allowed.
 *
 * @throws SableSyntaxError wrapping the parser's diagnostic
 */
export function parseExpression(source: string): Expression {
  const expr: Expression = run(getParser(), source, 'Expression');
  return expr;
}

/**
 * Parse a program: host statements separated by newlines or `;`.
 *
 * @throws SableSyntaxError wrapping the parser's diagnostic
 */
export function parseProgram(source: string): Statement[] {
  const statements: Statement[] = run(getParser(), source, 'Program');
  return statements;
}
