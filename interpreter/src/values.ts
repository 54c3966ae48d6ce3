/**
 * Runtime value representations for the Sable interpreter.
 *
 * Values are immutable: an operation never changes its operands, so a
 * value stored in an environment or embedded in an AST can be handed
 * out by reference without copying.
 */

import { SableType } from './types';
import { ArithmeticError } from './errors';

export type SableValue =
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'list'; readonly elements: readonly SableValue[] };

// ---- Value constructors ----

export function mkInt(value: number): SableValue {
  return { kind: 'int', value };
}

export function mkBool(value: boolean): SableValue {
  return { kind: 'bool', value };
}

export function mkString(value: string): SableValue {
  return { kind: 'string', value };
}

export function mkList(elements: readonly SableValue[]): SableValue {
  return { kind: 'list', elements };
}

/**
 * Build an Int from the result of integer arithmetic, rejecting
 * results that cannot be represented exactly.
 */
export function checkedInt(value: number): SableValue {
  if (!Number.isSafeInteger(value)) {
    throw new ArithmeticError('integer overflow');
  }
  // -0 is not a distinct Int
  return mkInt(value === 0 ? 0 : value);
}

// ---- Value utilities ----

export function typeOf(v: SableValue): SableType {
  return v.kind;
}

export function valueToString(v: SableValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'bool': return String(v.value);
    case 'string': return v.value;
    case 'list': return `[${v.elements.map(formatElement).join(', ')}]`;
  }
}

/**
 * Render a value the way it would be written in source, so strings
 * inside lists stay distinguishable from numbers.
 */
export function formatElement(v: SableValue): string {
  if (v.kind === 'string') return JSON.stringify(v.value);
  return valueToString(v);
}

/**
 * Structural equality. Total over every pair of kinds: values of
 * different kinds are never equal.
 */
export function valuesEqual(a: SableValue, b: SableValue): boolean {
  switch (a.kind) {
    case 'int': return b.kind === 'int' && b.value === a.value;
    case 'bool': return b.kind === 'bool' && b.value === a.value;
    case 'string': return b.kind === 'string' && b.value === a.value;
    case 'list': {
      if (b.kind !== 'list') return false;
      if (a.elements.length !== b.elements.length) return false;
      const other = b.elements;
      return a.elements.every((el, i) => valuesEqual(el, other[i]));
    }
  }
}

/**
 * Characters of a string value, counted by code point.
 */
export function stringChars(s: string): string[] {
  return Array.from(s);
}
