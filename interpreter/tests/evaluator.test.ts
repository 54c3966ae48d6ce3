/**
 * Tests for the expression evaluator.
 *
 * Most tests run against a real Environment; a few use a stand-in
 * state to observe exactly which collaborator calls are made.
 */

import { Environment } from '../src/environment';
import { EvalState, evaluate, setMaxDepth, tryBool, tryInt } from '../src/evaluator';
import {
  Expression,
  Operator,
  binary,
  call,
  evalOf,
  listIndex,
  listLength,
  literal,
  not,
  variable,
} from '../src/ast';
import { SableValue, mkBool, mkInt, mkList, mkString, valueToString } from '../src/values';
import { mkBuiltin, mkLazyBuiltin, mkUserFunction } from '../src/functions';
import {
  ArithmeticError,
  ArityError,
  IndexOutOfBoundsError,
  OperandTypeError,
  RecursionLimitError,
  SableSyntaxError,
  UndefinedFunctionError,
  UndefinedVariableError,
  UnexpectedTypeError,
  UnindexableTypeError,
} from '../src/errors';

/** A state that fails the test if the evaluator consults it. */
const untouchable: EvalState = {
  get: () => { throw new Error('get should not be called'); },
  listIndex: () => { throw new Error('listIndex should not be called'); },
  callFunction: () => { throw new Error('callFunction should not be called'); },
};

const int = (n: number) => literal(mkInt(n));
const bool = (b: boolean) => literal(mkBool(b));
const str = (s: string) => literal(mkString(s));
const list = (...elements: SableValue[]) => literal(mkList(elements));

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error to be thrown');
}

// ==================================================================
// Literals and variables
// ==================================================================

describe('literals', () => {
  const samples: SableValue[] = [
    mkInt(0),
    mkInt(-17),
    mkBool(true),
    mkString(''),
    mkString('héllo'),
    mkList([]),
    mkList([mkInt(1), mkString('a'), mkList([mkBool(false)])]),
  ];

  test.each(samples)('evaluates %j to itself without consulting state', (value) => {
    expect(evaluate(literal(value), untouchable)).toEqual(value);
  });

  test('returns the embedded value object, not a copy', () => {
    const value = mkList([mkInt(1), mkInt(2)]);
    expect(evaluate(literal(value), untouchable)).toBe(value);
  });
});

describe('variables', () => {
  test('looks up a defined variable', () => {
    const env = new Environment();
    env.define('x', mkInt(42), false);
    expect(evaluate(variable('x'), env)).toEqual(mkInt(42));
  });

  test('returns the stored value object, not a copy', () => {
    const env = new Environment();
    const big = mkList([mkString('a'), mkString('b')]);
    env.define('xs', big, false);
    expect(evaluate(variable('xs'), env)).toBe(big);
  });

  test('propagates the environment error for an undefined name unchanged', () => {
    const notFound = new UndefinedVariableError('ghost');
    const state: EvalState = {
      ...untouchable,
      get: () => { throw notFound; },
    };
    expect(catchError(() => evaluate(variable('ghost'), state))).toBe(notFound);
  });

  test('undefined variable in a real environment is a NameError', () => {
    expect(() => evaluate(variable('ghost'), new Environment()))
      .toThrow("NameError: undefined variable 'ghost'");
  });
});

// ==================================================================
// Binary operators
// ==================================================================

describe('binary operators', () => {
  const env = new Environment();

  const cases: Array<[Expression, Operator, Expression, SableValue]> = [
    [int(2), 'add', int(3), mkInt(5)],
    [str('ab'), 'add', str('cd'), mkString('abcd')],
    [list(mkInt(1)), 'add', list(mkInt(2)), mkList([mkInt(1), mkInt(2)])],
    [int(10), 'subtract', int(15), mkInt(-5)],
    [int(6), 'multiply', int(7), mkInt(42)],
    [int(7), 'divide', int(2), mkInt(3)],
    [int(-7), 'divide', int(2), mkInt(-3)],
    [int(7), 'modulus', int(3), mkInt(1)],
    [int(-7), 'modulus', int(3), mkInt(-1)],
    [int(1), 'less_than', int(2), mkBool(true)],
    [int(2), 'greater_than', int(2), mkBool(false)],
    [int(2), 'less_than_equal', int(2), mkBool(true)],
    [str('b'), 'greater_than_equal', str('a'), mkBool(true)],
    [int(1), 'shift_left', int(4), mkInt(16)],
    [int(-9), 'shift_right', int(1), mkInt(-5)],
    [bool(true), 'and', bool(false), mkBool(false)],
    [bool(false), 'or', bool(true), mkBool(true)],
    [int(3), 'equality', int(3), mkBool(true)],
  ];

  test.each(cases)('%j %s %j', (left, op, right, expected) => {
    expect(evaluate(binary(left, op, right), env)).toEqual(expected);
  });

  test('nested expressions reduce depth first', () => {
    // (1 + 2) * (10 - 4)
    const expr = binary(binary(int(1), 'add', int(2)), 'multiply', binary(int(10), 'subtract', int(4)));
    expect(evaluate(expr, env)).toEqual(mkInt(18));
  });

  const mismatched: Array<[Operator, Expression, Expression]> = [
    ['add', int(1), list(mkInt(1))],
    ['add', str('1'), int(1)],
    ['subtract', str('a'), str('b')],
    ['multiply', bool(true), int(2)],
    ['divide', list(), int(1)],
    ['modulus', int(1), bool(false)],
    ['less_than', int(1), str('1')],
    ['greater_than', bool(true), bool(false)],
    ['less_than_equal', list(), list()],
    ['greater_than_equal', str('a'), int(0)],
    ['shift_left', int(1), str('2')],
    ['shift_right', bool(true), int(1)],
    ['and', bool(true), int(1)],
    ['or', int(0), bool(true)],
  ];

  test.each(mismatched)('%s rejects mismatched operands instead of coercing', (op, left, right) => {
    expect(() => evaluate(binary(left, op, right), env)).toThrow(OperandTypeError);
  });

  test('the error names the operator and both operand types', () => {
    expect(() => evaluate(binary(int(1), 'add', list(mkInt(1))), env))
      .toThrow("TypeError: cannot apply '+' to Int and List");
  });

  test('division by zero is an arithmetic error', () => {
    expect(() => evaluate(binary(int(1), 'divide', int(0)), env)).toThrow(ArithmeticError);
    expect(() => evaluate(binary(int(1), 'modulus', int(0)), env)).toThrow('ArithmeticError: division by zero');
  });

  test('an error in the left operand stops evaluation before the right', () => {
    const calls: string[] = [];
    const state = new Environment();
    state.defineFunction(mkBuiltin('mark', 0, () => {
      calls.push('mark');
      return mkBool(true);
    }));
    expect(() => evaluate(binary(variable('ghost'), 'and', call('mark', [])), state))
      .toThrow(UndefinedVariableError);
    expect(calls).toEqual([]);
  });
});

describe('equality', () => {
  const env = new Environment();
  const values: SableValue[] = [
    mkInt(5),
    mkBool(false),
    mkString('five'),
    mkList([mkInt(5)]),
    mkList([]),
  ];

  test.each(values)('is reflexive for %j', (v) => {
    expect(evaluate(binary(literal(v), 'equality', literal(v)), env)).toEqual(mkBool(true));
  });

  test('is false across kinds and never throws', () => {
    for (const a of values) {
      for (const b of values) {
        if (a === b) continue;
        expect(evaluate(binary(literal(a), 'equality', literal(b)), env)).toEqual(mkBool(false));
      }
    }
  });

  test('compares lists structurally', () => {
    const expr = binary(list(mkInt(1), mkString('x')), 'equality', list(mkInt(1), mkString('x')));
    expect(evaluate(expr, env)).toEqual(mkBool(true));
  });
});

// Logical operators deliberately evaluate both operands; these tests pin
// that behaviour down so a change to short-circuiting is a visible decision.
describe('logical operators do not short-circuit', () => {
  function envWithCounter(): { env: Environment; calls: string[] } {
    const calls: string[] = [];
    const env = new Environment();
    env.defineFunction(mkBuiltin('touch', 1, ([label]) => {
      calls.push(valueToString(label));
      return mkBool(true);
    }));
    return { env, calls };
  }

  test('false && f() still calls f', () => {
    const { env, calls } = envWithCounter();
    const result = evaluate(binary(bool(false), 'and', call('touch', [str('right')])), env);
    expect(result).toEqual(mkBool(false));
    expect(calls).toEqual(['right']);
  });

  test('true || f() still calls f', () => {
    const { env, calls } = envWithCounter();
    const result = evaluate(binary(bool(true), 'or', call('touch', [str('right')])), env);
    expect(result).toEqual(mkBool(true));
    expect(calls).toEqual(['right']);
  });

  test('operands are evaluated left to right', () => {
    const { env, calls } = envWithCounter();
    evaluate(binary(call('touch', [str('left')]), 'or', call('touch', [str('right')])), env);
    expect(calls).toEqual(['left', 'right']);
  });
});

// ==================================================================
// Not
// ==================================================================

describe('not', () => {
  test('negates booleans', () => {
    expect(evaluate(not(bool(true)), untouchable)).toEqual(mkBool(false));
    expect(evaluate(not(bool(false)), untouchable)).toEqual(mkBool(true));
  });

  test('is an involution', () => {
    expect(evaluate(not(not(bool(true))), untouchable)).toEqual(mkBool(true));
  });

  test('rejects non-boolean operands with the expected and actual types', () => {
    const error = catchError(() => evaluate(not(int(1)), untouchable));
    expect(error).toBeInstanceOf(UnexpectedTypeError);
    expect(error).toMatchObject({ kind: 'unexpected_type', expected: 'bool', actual: 'int' });
  });
});

// ==================================================================
// List indexing and length
// ==================================================================

describe('list_index', () => {
  function env(): Environment {
    const e = new Environment();
    e.define('xs', mkList([mkInt(10), mkInt(20), mkInt(30)]), false);
    e.define('word', mkString('héllo'), false);
    e.define('n', mkInt(4), false);
    e.define('i', mkInt(1), false);
    return e;
  }

  test('indexes a list with a computed index', () => {
    expect(evaluate(listIndex('xs', binary(variable('i'), 'add', int(1))), env())).toEqual(mkInt(30));
  });

  test('indexes a string by character', () => {
    expect(evaluate(listIndex('word', int(1)), env())).toEqual(mkString('é'));
  });

  test('delegates to the state with the unevaluated index expression', () => {
    const index = binary(int(1), 'add', int(1));
    const seen: Array<[string, Expression]> = [];
    const state: EvalState = {
      ...untouchable,
      listIndex: (name, idx) => {
        seen.push([name, idx]);
        return mkInt(99);
      },
    };
    expect(evaluate(listIndex('xs', index), state)).toEqual(mkInt(99));
    expect(seen).toEqual([['xs', index]]);
  });

  test('out of range indexes are reported by the environment', () => {
    expect(() => evaluate(listIndex('xs', int(3)), env())).toThrow(IndexOutOfBoundsError);
    expect(() => evaluate(listIndex('xs', int(-1)), env()))
      .toThrow("IndexError: index -1 out of bounds for 'xs' of length 3");
  });

  test('a non-integer index is a type error', () => {
    const error = catchError(() => evaluate(listIndex('xs', str('0')), env()));
    expect(error).toMatchObject({ expected: 'int', actual: 'string' });
  });

  test('indexing an integer is rejected as unindexable', () => {
    expect(() => evaluate(listIndex('n', int(0)), env())).toThrow(UnindexableTypeError);
  });
});

describe('list_length', () => {
  test('counts list elements and string characters', () => {
    const env = new Environment();
    env.define('xs', mkList([mkInt(1), mkInt(2), mkInt(3)]), false);
    env.define('word', mkString('abcd'), false);
    env.define('accented', mkString('né'), false);
    expect(evaluate(listLength('xs'), env)).toEqual(mkInt(3));
    expect(evaluate(listLength('word'), env)).toEqual(mkInt(4));
    expect(evaluate(listLength('accented'), env)).toEqual(mkInt(2));
  });

  test('fails with the actual kind for values without a length', () => {
    const env = new Environment();
    env.define('n', mkInt(3), false);
    env.define('flag', mkBool(true), false);
    expect(catchError(() => evaluate(listLength('n'), env))).toMatchObject({ kind: 'unindexable', actual: 'int' });
    expect(catchError(() => evaluate(listLength('flag'), env))).toMatchObject({ kind: 'unindexable', actual: 'bool' });
  });

  test('reads the variable directly', () => {
    const looked: string[] = [];
    const state: EvalState = {
      ...untouchable,
      get: (name) => {
        looked.push(name);
        return mkList([]);
      },
    };
    expect(evaluate(listLength('empty'), state)).toEqual(mkInt(0));
    expect(looked).toEqual(['empty']);
  });
});

// ==================================================================
// Eval
// ==================================================================

describe('eval', () => {
  test('parses and evaluates a string', () => {
    expect(evaluate(evalOf(str('1 + 2')), new Environment())).toEqual(mkInt(3));
  });

  test('evaluates against the same environment', () => {
    const env = new Environment();
    env.define('x', mkInt(20), false);
    env.define('code', mkString('x * 2 + 2'), false);
    expect(evaluate(evalOf(variable('code')), env)).toEqual(mkInt(42));
  });

  test('can evaluate a string built at run time', () => {
    const env = new Environment();
    const source = binary(str('3 '), 'add', str('<< 2'));
    expect(evaluate(evalOf(source), env)).toEqual(mkInt(12));
  });

  test('nested eval re-enters the parser', () => {
    expect(evaluate(evalOf(str('eval("5 % 3")')), new Environment())).toEqual(mkInt(2));
  });

  test('rejects non-string sources', () => {
    const error = catchError(() => evaluate(evalOf(int(5)), untouchable));
    expect(error).toBeInstanceOf(UnexpectedTypeError);
    expect(error).toMatchObject({ expected: 'string', actual: 'int' });
    expect(error).toHaveProperty('message', 'TypeError: expected Str, found Int');
  });

  test('wraps parse failures as syntax errors', () => {
    const error = catchError(() => evaluate(evalOf(str('1 +')), untouchable));
    expect(error).toBeInstanceOf(SableSyntaxError);
    expect(error).toHaveProperty('detail', expect.stringContaining('end of input'));
  });

  test('errors from the evaluated code propagate', () => {
    expect(() => evaluate(evalOf(str('missing + 1')), new Environment())).toThrow(UndefinedVariableError);
  });
});

// ==================================================================
// Function calls
// ==================================================================

describe('function calls', () => {
  test('passes the unevaluated argument expressions to the state', () => {
    const args = [binary(int(1), 'add', int(1)), variable('y')];
    const received: Array<[string, readonly Expression[]]> = [];
    const state: EvalState = {
      ...untouchable,
      callFunction: (name, a) => {
        received.push([name, a]);
        return mkString('done');
      },
    };
    expect(evaluate(call('f', args), state)).toEqual(mkString('done'));
    expect(received).toEqual([['f', args]]);
  });

  test('a lazy native never evaluates an argument it ignores', () => {
    const env = new Environment();
    env.defineFunction(mkLazyBuiltin('first', 2, (args, scope) => evaluate(args[0], scope)));
    expect(evaluate(call('first', [int(1), variable('undefined_name')]), env)).toEqual(mkInt(1));
  });

  test('user functions bind parameters in a fresh scope', () => {
    const env = new Environment();
    env.define('a', mkInt(100), false);
    env.defineFunction(mkUserFunction('sum', ['a', 'b'], binary(variable('a'), 'add', variable('b')), env));
    expect(evaluate(call('sum', [int(1), int(2)]), env)).toEqual(mkInt(3));
    expect(env.get('a')).toEqual(mkInt(100));
  });

  test('unknown functions and arity mismatches come from the environment', () => {
    const env = new Environment();
    env.defineFunction(mkBuiltin('one', 1, (args) => args[0]));
    expect(() => evaluate(call('nope', []), env)).toThrow(UndefinedFunctionError);
    expect(() => evaluate(call('one', [int(1), int(2)]), env))
      .toThrow('ArityError: one() takes 1 argument but 2 were given');
    expect(() => evaluate(call('one', []), env)).toThrow(ArityError);
  });
});

// ==================================================================
// Typed extraction
// ==================================================================

describe('tryBool / tryInt', () => {
  test('tryInt returns the integer', () => {
    expect(tryInt(int(7), untouchable)).toBe(7);
    expect(tryInt(binary(int(3), 'multiply', int(3)), untouchable)).toBe(9);
  });

  test('tryInt rejects other kinds', () => {
    const error = catchError(() => tryInt(bool(true), untouchable));
    expect(error).toBeInstanceOf(UnexpectedTypeError);
    expect(error).toMatchObject({ expected: 'int', actual: 'bool' });
  });

  test('tryBool returns the boolean', () => {
    expect(tryBool(binary(int(1), 'less_than', int(2)), untouchable)).toBe(true);
  });

  test('tryBool rejects other kinds', () => {
    expect(catchError(() => tryBool(str('true'), untouchable))).toMatchObject({ expected: 'bool', actual: 'string' });
  });
});

// ==================================================================
// Recursion limit
// ==================================================================

describe('recursion limit', () => {
  afterEach(() => setMaxDepth(null));

  test('self-referential eval strings stop at the limit', () => {
    setMaxDepth(50);
    const env = new Environment();
    env.define('loop', mkString('eval(loop)'), false);
    const error = catchError(() => evaluate(evalOf(variable('loop')), env));
    expect(error).toBeInstanceOf(RecursionLimitError);
    expect(error).toMatchObject({ limit: 50 });
  });

  test('recursive user functions stop at the limit', () => {
    setMaxDepth(100);
    const env = new Environment();
    env.defineFunction(mkUserFunction('down', ['n'], call('down', [binary(variable('n'), 'add', int(1))]), env));
    expect(() => evaluate(call('down', [int(0)]), env)).toThrow(RecursionLimitError);
  });

  test('the depth counter unwinds after a failure', () => {
    setMaxDepth(3);
    const env = new Environment();
    expect(() => evaluate(binary(binary(binary(int(1), 'add', int(1)), 'add', int(1)), 'add', int(1)), env))
      .toThrow(RecursionLimitError);
    expect(evaluate(binary(int(1), 'add', int(1)), env)).toEqual(mkInt(2));
  });
});
