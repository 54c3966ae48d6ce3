/**
 * Runtime type representations for the Sable interpreter.
 *
 * Every runtime value carries one of these kind tags. They are used
 * in diagnostics and by the `type()` builtin.
 */

export type SableType = 'int' | 'bool' | 'string' | 'list';

export function typeToString(t: SableType): string {
  switch (t) {
    case 'int': return 'Int';
    case 'bool': return 'Bool';
    case 'string': return 'Str';
    case 'list': return 'List';
  }
}
