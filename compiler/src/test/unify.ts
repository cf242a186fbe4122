
import test from "ava";

import { DiagnosticIndex } from "../diagnostics";
import { UnboundVariableError } from "../errors";
import { Prefix } from "../prefix";
import {
  type Bound,
  booleanType,
  bottomType,
  ErrorType,
  Flexibility,
  FunctionType,
  intType,
  type Monotype,
  numberType,
  type Polytype,
  QuantifiedType,
  rowEmptyType,
  type RowEntry,
  RowExtensionType,
  VariableType,
} from "../types";
import { unify } from "../unify";
import { prettyPrint } from "../util";

function v(name: string): VariableType {
  return new VariableType(name);
}

function fn(parameter: Monotype, body: Monotype): FunctionType {
  return new FunctionType(parameter, body);
}

function row(entries: RowEntry[], extension: Monotype = rowEmptyType): RowExtensionType {
  return new RowExtensionType(entries, extension);
}

function flexible(type: Polytype = bottomType): Bound {
  return { flexibility: Flexibility.Flexible, type };
}

function rigid(type: Polytype): Bound {
  return { flexibility: Flexibility.Rigid, type };
}

function identity(name: string): QuantifiedType {
  return new QuantifiedType([[ name, flexible() ]], fn(v(name), v(name)));
}

function createPrefix(entries: Array<[string, Bound]>): Prefix {
  const prefix = new Prefix();
  for (const [name, bound] of entries) {
    prefix.add(name, bound);
  }
  return prefix;
}

/**
 * Unifies both types and returns the resulting prefix, or the messages of
 * whatever went wrong.
 */
function check(prefix: Prefix, expected: Monotype, actual: Monotype): string {
  const diagnostics = new DiagnosticIndex();
  unify(prefix, expected, actual, diagnostics);
  if (diagnostics.size > 0) {
    return [...diagnostics.getAllDiagnostics()].map(d => d.messageText).join('\n');
  }
  return prettyPrint(prefix);
}

test('two unbounded variables are merged', t => {
  t.is(check(createPrefix([[ 'a', flexible() ], [ 'b', flexible() ]]), v('a'), v('b')), '(a, b = a)');
  t.is(check(createPrefix([[ 'a', flexible() ], [ 'b', flexible() ]]), v('b'), v('a')), '(b, a = b)');
});

test('an unbounded variable takes the type it is unified with', t => {
  const prefix = createPrefix([[ 'a', flexible() ], [ 'b', flexible() ]]);
  t.is(check(prefix, v('a'), fn(v('b'), v('b'))), '(b, a = b → b)');
});

test('a variable that is rigidly bottom can not become a number', t => {
  const prefix = createPrefix([[ 'a', rigid(bottomType) ]]);
  t.is(check(prefix, v('a'), numberType), '⊥ ≢ Num');
  t.is(prettyPrint(prefix), '(a = ⊥)');
});

test('a variable bounded by another variable updates that variable', t => {
  const prefix = createPrefix([[ 'b', flexible() ], [ 'a', flexible(v('b')) ]]);
  t.is(check(prefix, v('a'), numberType), '(b = Num, a ≥ b)');
});

test('unifying a variable with a type that contains it is an infinite type', t => {
  const prefix = createPrefix([
    [ 'b', flexible() ],
    [ 'c', rigid(fn(v('b'), v('b'))) ],
    [ 'a', rigid(fn(v('c'), v('c'))) ],
  ]);
  t.is(check(prefix, v('a'), v('b')), 'Infinite type since `b` occurs in `c → c`.');
});

test('a flexible polymorphic bound can be instantiated', t => {
  const prefix = createPrefix([[ 'a', flexible(identity('x')) ]]);
  t.is(check(prefix, v('a'), fn(numberType, numberType)), '(a = Num → Num)');
});

test('two variables with equal polymorphic bounds keep the bound of the first', t => {
  const prefix = createPrefix([[ 'a', flexible(identity('x')) ], [ 'b', flexible(identity('y')) ]]);
  t.is(check(prefix, v('a'), v('b')), '(a ≥ ∀x.x → x, b = a)');
});

test('a rigid polymorphic bound can not be instantiated', t => {
  const prefix = createPrefix([[ 'a', rigid(identity('x')) ]]);
  t.is(check(prefix, v('a'), fn(numberType, numberType)), '∀x.x → x ≢ Num → Num');
});

test('unifying a type with itself succeeds without diagnostics', t => {
  const prefix = createPrefix([[ 'a', flexible() ], [ 'b', flexible() ], [ 'r', flexible() ]]);
  const types: Monotype[] = [
    booleanType,
    numberType,
    rowEmptyType,
    v('a'),
    fn(v('a'), v('b')),
    row([[ 'x', v('a') ], [ 'y', booleanType ]], v('r')),
  ];
  for (const type of types) {
    t.is(check(prefix, type, type), '(a, b, r)');
  }
});

test('an error type unifies with anything', t => {
  const prefix = new Prefix();
  const error = new ErrorType(new UnboundVariableError('x'));
  t.is(check(prefix, error, booleanType), '(∅)');
  t.is(check(prefix, fn(numberType, numberType), error), '(∅)');
});

test('Int and Num unify with each other', t => {
  t.is(check(new Prefix(), intType, numberType), '(∅)');
});

test('a mismatch in both the parameter and the result of a function is reported twice', t => {
  const prefix = new Prefix();
  t.is(check(prefix, fn(booleanType, booleanType), fn(intType, intType)), 'Int ≢ Bool\nBool ≢ Int');
});

test('function parameters are checked in the opposite direction', t => {
  const prefix = createPrefix([[ 'a', rigid(bottomType) ], [ 'b', flexible() ]]);
  t.is(check(prefix, fn(v('b'), booleanType), fn(v('a'), booleanType)), '(a = ⊥, b = a)');
});

test('a record with a label twice matches its left-most entry first', t => {
  const prefix = createPrefix([[ 't', flexible() ], [ 'r', flexible() ]]);
  const expected = row([[ 'a', v('t') ]], v('r'));
  const actual = row([[ 'a', numberType ], [ 'a', booleanType ]]);
  t.is(check(prefix, expected, actual), '(t = Num, r = (| a: Bool |))');
});

test('a closed record resolves a label it has twice to the left-most entry', t => {
  const once = row([[ 'a', booleanType ]]);
  const twice = row([[ 'a', booleanType ], [ 'a', numberType ]]);
  t.is(check(new Prefix(), once, twice), '(∅)');
  t.is(check(new Prefix(), twice, once), '(∅)');
});

test('a shadowed entry does not hide a label the other record lacks', t => {
  t.is(
    check(new Prefix(), row([[ 'a', booleanType ]]), row([[ 'a', booleanType ], [ 'a', numberType ], [ 'b', numberType ]])),
    '(| a: Bool |) ≢ (| a: Bool, a: Num, b: Num |)',
  );
});

test('a closed record does not have labels it does not mention', t => {
  const prefix = new Prefix();
  t.is(
    check(prefix, row([[ 'a', numberType ]]), row([[ 'b', numberType ]])),
    '(| a: Num |) ≢ (| b: Num |)',
  );
});

test('an open record takes the labels it is missing', t => {
  const prefix = createPrefix([[ 'r', flexible() ]]);
  const expected = row([[ 'a', numberType ], [ 'b', booleanType ]]);
  const actual = row([[ 'a', numberType ]], v('r'));
  t.is(check(prefix, expected, actual), '(r = (| b: Bool |))');
});

test('two open records share a fresh tail', t => {
  const prefix = createPrefix([[ 'r1', flexible() ], [ 'r2', flexible() ]]);
  const expected = row([[ 'a', numberType ]], v('r1'));
  const actual = row([[ 'b', booleanType ]], v('r2'));
  t.is(check(prefix, expected, actual), '(t1, r1 = (| b: Bool | t1 |), r2 = (| a: Num | t1 |))');
});

test('two records with the same tail can not have different labels', t => {
  const prefix = createPrefix([[ 'r', flexible() ]]);
  const expected = row([[ 'a', numberType ]], v('r'));
  const actual = row([[ 'b', booleanType ]], v('r'));
  t.is(check(prefix, expected, actual), '(| a: Num | r |) ≢ (| b: Bool | r |)');
});

test('a record is not a function', t => {
  t.is(check(new Prefix(), fn(numberType, numberType), rowEmptyType), 'Num → Num ≢ (||)');
});
