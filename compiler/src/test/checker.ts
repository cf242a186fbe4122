
import test from "ava";
import fs from "fs";
import path from "path";

import {
  createAnnotationExpression,
  createBlockExpression,
  createCallExpression,
  createConditionalExpression,
  createConstantExpression,
  createExpressionStatement,
  createFunctionDeclaration,
  createFunctionExpression,
  createFunctionTypeExpression,
  createLetStatement,
  createParameter,
  createPropertyExpression,
  createRecordExpression,
  createRecordExpressionField,
  createRecordTypeExpression,
  createRecordTypeField,
  createReferenceExpression,
  createReferenceTypeExpression,
  createSourceFile,
  createTypeParameter,
  type Expression,
  type FunctionDeclaration,
  type Parameter,
  type SourceElement,
  type TypeExpression,
  type TypeParameter,
} from "../ast";
import { TypeChecker } from "../checker";
import { DiagnosticIndex, parseCheckerTest, printCheckerTest, printDiagnosticList } from "../diagnostics";
import { CompileError } from "../errors";
import { TextFile, TextSpan } from "../text";
import {
  areTypesEqual,
  bottomType,
  Flexibility,
  FunctionType,
  QuantifiedType,
  VariableType,
} from "../types";
import { prettyPrint } from "../util";

// Most tests only look at messages and types, so every node shares a span.
const span = new TextFile('test.ite', '').getSpan(0, 0);

function num(value: number): Expression {
  return createConstantExpression(value, span);
}

function bool(value: boolean): Expression {
  return createConstantExpression(value, span);
}

function ref(name: string): Expression {
  return createReferenceExpression(name, span);
}

function call(callee: Expression, ...args: Expression[]): Expression {
  return createCallExpression(callee, args, span, span);
}

function param(name: string, typeExpression: TypeExpression | null = null): Parameter {
  return createParameter(name, typeExpression, span);
}

function tref(name: string): TypeExpression {
  return createReferenceTypeExpression(name, span);
}

function tfun(params: TypeExpression[], returnType: TypeExpression): TypeExpression {
  return createFunctionTypeExpression(params, returnType, span);
}

function fun(
  name: string,
  params: Parameter[],
  body: Expression,
  { returnType = null, typeParameters = [] }: { returnType?: TypeExpression | null, typeParameters?: TypeParameter[] } = {},
): FunctionDeclaration {
  return createFunctionDeclaration(name, typeParameters, params, span, returnType, body, span);
}

function annotate(expression: Expression, typeExpression: TypeExpression): Expression {
  return createAnnotationExpression(expression, typeExpression, span);
}

interface CheckResult {
  checker: TypeChecker;
  messages: string[];
}

function check(elements: SourceElement[]): CheckResult {
  const diagnostics = new DiagnosticIndex();
  const checker = new TypeChecker(diagnostics);
  checker.checkSourceFile(createSourceFile(elements, span));
  return {
    checker,
    messages: [...diagnostics.getAllDiagnostics()].map(diagnostic => diagnostic.messageText),
  };
}

/**
 * The span of the `nth` occurrence of `needle` in the file.
 */
function locate(file: TextFile, needle: string, nth = 0): TextSpan {
  const text = file.getText();
  let offset = -1;
  for (let i = 0; i <= nth; i++) {
    offset = text.indexOf(needle, offset+1);
    if (offset === -1) {
      throw new Error(`Could not find '${needle}' in ${file.origPath}.`);
    }
  }
  return file.getSpan(offset, offset + needle.length);
}

test('an integer constant has the type Int', t => {
  const statement = createExpressionStatement(num(1));
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Int');
});

test('a fractional constant has the type Num', t => {
  const statement = createExpressionStatement(num(1.5));
  const { checker } = check([ statement ]);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Num');
});

test('the identity function is generalized', t => {
  const id = fun('id', [ param('x') ], ref('x'));
  const { checker, messages } = check([ id ]);
  t.deepEqual(messages, []);
  const a = new VariableType('a');
  const expected = new QuantifiedType([[ 'a', { flexibility: Flexibility.Flexible, type: bottomType } ]], new FunctionType(a, a));
  t.assert(areTypesEqual(checker.getTypeOfNode(id), expected));
  t.is(prettyPrint(checker.getTypeOfNode(id)), '∀t2.t2 → t2');
});

test('an application of the identity function to an integer has the type Int', t => {
  const id = fun('id', [ param('x') ], ref('x'));
  const statement = createExpressionStatement(call(ref('id'), num(1)));
  const { checker, messages } = check([ id, statement ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Int');
});

test('a let-bound function is polymorphic in the rest of its block', t => {
  const block = createBlockExpression([
    createLetStatement('id', createFunctionExpression([ param('y') ], span, null, ref('y'), span), span),
    createExpressionStatement(call(ref('id'), bool(true))),
  ], call(ref('id'), num(1)), span);
  const statement = createExpressionStatement(block);
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Int');
});

test('a type parameter is quantified under its own name', t => {
  const id = fun('id', [ param('x', tref('T')) ], ref('x'), {
    typeParameters: [ createTypeParameter('T', null, span) ],
    returnType: tref('T'),
  });
  const { checker, messages } = check([ id ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(id)), '∀T.T → T');
});

test('a recursive function may call itself', t => {
  const loop = fun('loop', [ param('x') ], call(ref('loop'), ref('x')));
  const { checker, messages } = check([ loop ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(loop)), '∀(t2, t3).t2 → t3');
});

test('a function returning Never may be used where it returns Bool', t => {
  const body = annotate(ref('a'), tfun([ tref('Never') ], tref('Bool')));
  const { messages } = check([
    fun('test', [ param('a', tfun([ tref('Bool') ], tref('Never'))) ], body),
  ]);
  t.deepEqual(messages, []);
});

test('Int and Num may be used for each other in a function type', t => {
  const { messages } = check([
    fun('first', [ param('c', tfun([ tref('Int') ], tref('Int'))) ], annotate(ref('c'), tfun([ tref('Num') ], tref('Int')))),
    fun('second', [ param('c', tfun([ tref('Int') ], tref('Int'))) ], annotate(ref('c'), tfun([ tref('Int') ], tref('Num')))),
  ]);
  t.deepEqual(messages, []);
});

test('a function of Int is not a function of Bool', t => {
  const { messages } = check([
    fun('test', [ param('c', tfun([ tref('Int') ], tref('Int'))) ], annotate(ref('c'), tfun([ tref('Bool') ], tref('Bool')))),
  ]);
  t.deepEqual(messages, [
    'Can not change the type of `c` because a `Bool` is not an `Int`.',
    'Can not change the type of `c` because an `Int` is not a `Bool`.',
  ]);
});

test('an annotation that does not match the constant is reported', t => {
  const { messages } = check([
    createExpressionStatement(annotate(num(42), tref('Bool'))),
  ]);
  t.deepEqual(messages, [ 'Can not change the type of `42` because an `Int` is not a `Bool`.' ]);
});

test('too many arguments are reported once', t => {
  const { messages } = check([
    fun('f', [ param('a', tref('Int')), param('b', tref('Int')) ], ref('a')),
    createExpressionStatement(call(ref('f'), num(1), num(2), num(3))),
  ]);
  t.deepEqual(messages, [ 'Can not call `f` because we have three arguments but we only need two.' ]);
});

test('a function without parameters is called without arguments', t => {
  const f = fun('f', [], bool(true));
  const statement = createExpressionStatement(call(ref('f')));
  const { checker, messages } = check([ f, statement ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(f)), '(||) → Bool');
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Bool');
});

test('a reference to a name that was never declared is reported', t => {
  const statement = createExpressionStatement(ref('x'));
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, [ 'Unbound variable `x`.' ]);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), '%error');
});

test('a type that was never declared is reported', t => {
  const { messages } = check([
    fun('f', [ param('x', tref('T')) ], ref('x')),
  ]);
  t.deepEqual(messages, [ 'Unbound type variable `T`.' ]);
});

test('a record type can not be extended with a value type', t => {
  const recordType = createRecordTypeExpression([
    createRecordTypeField('a', tref('Int'), span),
  ], tref('Bool'), span);
  const { messages } = check([
    fun('f', [ param('x', recordType) ], ref('x')),
  ]);
  t.deepEqual(messages, [ 'Row ≢ Value' ]);
});

test('the test of a conditional must be a boolean', t => {
  const { messages } = check([
    createExpressionStatement(createConditionalExpression(num(1), bool(true), bool(false), span)),
  ]);
  t.deepEqual(messages, [ 'Can not test `1` because an `Int` is not a `Bool`.' ]);
});

test('a function body must match the return annotation', t => {
  const { messages } = check([
    fun('f', [ param('x', tref('Bool')) ], ref('x'), { returnType: tref('Int') }),
  ]);
  t.deepEqual(messages, [ 'Can not return `x` because a `Bool` is not an `Int`.' ]);
});

test('a property of a record has the type of its field', t => {
  const record = createRecordExpression([
    createRecordExpressionField('a', num(1), span),
    createRecordExpressionField('b', bool(true), span),
  ], span);
  const statement = createExpressionStatement(createPropertyExpression(record, 'b', span));
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, []);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), 'Bool');
});

test('a property that the record does not have is reported', t => {
  const record = createRecordExpression([
    createRecordExpressionField('a', num(1), span),
  ], span);
  const statement = createExpressionStatement(createPropertyExpression(record, 'b', span));
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, [ 'Can not access `{ ... }.b` because a record has no property `b`.' ]);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), '%error');
});

test('a property of something that is not a record is reported', t => {
  const statement = createExpressionStatement(createPropertyExpression(num(1), 'b', span));
  const { checker, messages } = check([ statement ]);
  t.deepEqual(messages, [ 'Can not access `1.b` because an `Int` is not a record.' ]);
  t.is(prettyPrint(checker.getTypeOfNode(statement)), '%error');
});

test('the branches of a conditional must agree', t => {
  const { messages } = check([
    createExpressionStatement(createConditionalExpression(bool(true), bool(false), num(1), span)),
  ]);
  t.deepEqual(messages, [ 'Can not use `1` as a conditional branch because an `Int` is not a `Bool`.' ]);
});

test('a type mismatch points at where both types were written down', t => {

  const file = new TextFile('test.ite', 'do { let x = true; (x: Int) }');

  // let x = true
  const value = createConstantExpression(true, locate(file, 'true'));
  const binding = createLetStatement('x', value, locate(file, 'let x = true'));

  // (x: Int)
  const annotation = createAnnotationExpression(
    createReferenceExpression('x', locate(file, 'x', 1)),
    createReferenceTypeExpression('Int', locate(file, 'Int')),
    locate(file, 'x: Int'),
  );

  const block = createBlockExpression([ binding ], annotation, file.getSpan(0, file.getText().length));

  const diagnostics = new DiagnosticIndex();
  const checker = new TypeChecker(diagnostics);
  checker.checkSourceFile(createSourceFile([ createExpressionStatement(block) ], block.span));

  t.is(
    printDiagnosticList(diagnostics.getAllDiagnostics()),
    '- (1:21-1:22) Can not change the type of `x` because a `Bool` is not an `Int`.\n'
      + '  - (1:14-1:18) `Bool`\n'
      + '  - (1:24-1:27) `Int`\n',
  );
});

test('the call fixture produces the expected diagnostics', t => {

  const markdown = fs.readFileSync(path.join(__dirname, 'fixtures', 'call.ite.md'), 'utf8');
  const fixture = parseCheckerTest(markdown);
  const file = new TextFile('call.ite', fixture.source);

  // fun f(a: Int, b: Int) { a }
  const f = createFunctionDeclaration(
    'f',
    [],
    [
      createParameter('a', createReferenceTypeExpression('Int', locate(file, 'Int', 0)), locate(file, 'a: Int')),
      createParameter('b', createReferenceTypeExpression('Int', locate(file, 'Int', 1)), locate(file, 'b: Int')),
    ],
    locate(file, '(a: Int, b: Int)'),
    null,
    createReferenceExpression('a', locate(file, 'a', 1)),
    locate(file, 'fun f(a: Int, b: Int) { a }'),
  );

  // f(true)
  const callSpan = locate(file, 'f(true)');
  const callee = createReferenceExpression('f', file.getSpan(callSpan.start.offset, callSpan.start.offset+1));
  const argument = createConstantExpression(true, locate(file, 'true'));
  const statement = createExpressionStatement(createCallExpression(callee, [ argument ], locate(file, '(true)'), callSpan));

  const diagnostics = new DiagnosticIndex();
  const checker = new TypeChecker(diagnostics);
  checker.checkSourceFile(createSourceFile([ f, statement ], file.getSpan(0, fixture.source.length)));

  const errors: CompileError[] = [...diagnostics.getAllDiagnostics()];
  t.is(errors.length, fixture.errors.length);
  t.is(printCheckerTest(fixture.name, file, errors), markdown);
});
