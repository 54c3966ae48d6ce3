/**
 * AST node types for Sable expressions and host statements.
 *
 * Trees are built once by the parser and never mutated afterwards;
 * every node owns its children.
 */

import { SableValue, formatElement } from './values';

// ---- Operators ----

export type Operator =
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'equality'
  | 'less_than'
  | 'greater_than'
  | 'less_than_equal'
  | 'greater_than_equal'
  | 'shift_left'
  | 'shift_right'
  | 'and'
  | 'or'
  | 'modulus';

export const OPERATOR_SYMBOLS: Readonly<Record<Operator, string>> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
  equality: '==',
  less_than: '<',
  greater_than: '>',
  less_than_equal: '<=',
  greater_than_equal: '>=',
  shift_left: '<<',
  shift_right: '>>',
  and: '&&',
  or: '||',
  modulus: '%',
};

// ---- Expressions ----

export type Expression =
  | { readonly kind: 'variable'; readonly name: string }
  | { readonly kind: 'binary'; readonly left: Expression; readonly operator: Operator; readonly right: Expression }
  | { readonly kind: 'literal'; readonly value: SableValue }
  | { readonly kind: 'list_index'; readonly name: string; readonly index: Expression }
  | { readonly kind: 'list_length'; readonly name: string }
  | { readonly kind: 'not'; readonly operand: Expression }
  | { readonly kind: 'eval'; readonly source: Expression }
  | { readonly kind: 'call'; readonly name: string; readonly args: readonly Expression[] };

// ---- Host statements ----

export type Statement =
  | { readonly kind: 'let'; readonly name: string; readonly value: Expression; readonly mutable: boolean }
  | { readonly kind: 'assign'; readonly name: string; readonly value: Expression }
  | { readonly kind: 'fn'; readonly name: string; readonly params: readonly string[]; readonly body: Expression }
  | { readonly kind: 'expression'; readonly expression: Expression };

// ---- Node constructors ----

export function variable(name: string): Expression {
  return { kind: 'variable', name };
}

export function binary(left: Expression, operator: Operator, right: Expression): Expression {
  return { kind: 'binary', left, operator, right };
}

export function literal(value: SableValue): Expression {
  return { kind: 'literal', value };
}

export function listIndex(name: string, index: Expression): Expression {
  return { kind: 'list_index', name, index };
}

export function listLength(name: string): Expression {
  return { kind: 'list_length', name };
}

export function not(operand: Expression): Expression {
  return { kind: 'not', operand };
}

export function evalOf(source: Expression): Expression {
  return { kind: 'eval', source };
}

export function call(name: string, args: readonly Expression[]): Expression {
  return { kind: 'call', name, args };
}

/**
 * Render an expression back to source text. Binary expressions are
 * fully parenthesized, so the output re-parses to the same tree.
 */
export function expressionToString(expr: Expression): string {
  switch (expr.kind) {
    case 'variable': return expr.name;
    case 'binary':
      return `(${expressionToString(expr.left)} ${OPERATOR_SYMBOLS[expr.operator]} ${expressionToString(expr.right)})`;
    case 'literal': return formatElement(expr.value);
    case 'list_index': return `${expr.name}[${expressionToString(expr.index)}]`;
    case 'list_length': return `${expr.name}.length`;
    case 'not': return `!${expressionToString(expr.operand)}`;
    case 'eval': return `eval(${expressionToString(expr.source)})`;
    case 'call': return `${expr.name}(${expr.args.map(expressionToString).join(', ')})`;
  }
}
