
import { TextSpan } from "./text";

export enum SyntaxKind {

  SourceFile,
  FunctionDeclaration,
  TypeParameter,
  Parameter,
  ExpressionStatement,
  LetStatement,

  ConstantExpression,
  ReferenceExpression,
  CallExpression,
  FunctionExpression,
  ConditionalExpression,
  RecordExpression,
  RecordExpressionField,
  PropertyExpression,
  AnnotationExpression,
  BlockExpression,

  ReferenceTypeExpression,
  FunctionTypeExpression,
  RecordTypeExpression,
  RecordTypeField,

}

interface SyntaxBase {
  readonly kind: SyntaxKind;
  readonly span: TextSpan;
}

export interface SourceFile extends SyntaxBase {
  readonly kind: SyntaxKind.SourceFile;
  readonly elements: readonly SourceElement[];
}

export interface TypeParameter extends SyntaxBase {
  readonly kind: SyntaxKind.TypeParameter;
  readonly name: string;
  readonly bound: TypeExpression | null;
}

export interface Parameter extends SyntaxBase {
  readonly kind: SyntaxKind.Parameter;
  readonly name: string;
  readonly typeExpression: TypeExpression | null;
}

/**
 * What the checker needs to know about the parameters of something that
 * can be called, besides its type.
 */
export interface ParameterList {
  readonly params: readonly Parameter[];
  readonly parametersSpan: TextSpan;
}

export interface FunctionDeclaration extends SyntaxBase, ParameterList {
  readonly kind: SyntaxKind.FunctionDeclaration;
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly returnType: TypeExpression | null;
  readonly body: Expression;
}

export interface ExpressionStatement extends SyntaxBase {
  readonly kind: SyntaxKind.ExpressionStatement;
  readonly expression: Expression;
}

export interface LetStatement extends SyntaxBase {
  readonly kind: SyntaxKind.LetStatement;
  readonly name: string;
  readonly value: Expression;
}

export interface ConstantExpression extends SyntaxBase {
  readonly kind: SyntaxKind.ConstantExpression;
  readonly value: boolean | number;
  readonly text: string;
}

export interface ReferenceExpression extends SyntaxBase {
  readonly kind: SyntaxKind.ReferenceExpression;
  readonly name: string;
}

export interface CallExpression extends SyntaxBase {
  readonly kind: SyntaxKind.CallExpression;
  readonly callee: Expression;
  readonly args: readonly Expression[];
  readonly argumentsSpan: TextSpan;
}

export interface FunctionExpression extends SyntaxBase, ParameterList {
  readonly kind: SyntaxKind.FunctionExpression;
  readonly returnType: TypeExpression | null;
  readonly body: Expression;
}

export interface ConditionalExpression extends SyntaxBase {
  readonly kind: SyntaxKind.ConditionalExpression;
  readonly test: Expression;
  readonly consequent: Expression;
  readonly alternate: Expression;
}

export interface RecordExpressionField extends SyntaxBase {
  readonly kind: SyntaxKind.RecordExpressionField;
  readonly name: string;
  readonly value: Expression;
}

export interface RecordExpression extends SyntaxBase {
  readonly kind: SyntaxKind.RecordExpression;
  readonly fields: readonly RecordExpressionField[];
}

export interface PropertyExpression extends SyntaxBase {
  readonly kind: SyntaxKind.PropertyExpression;
  readonly expression: Expression;
  readonly name: string;
}

export interface AnnotationExpression extends SyntaxBase {
  readonly kind: SyntaxKind.AnnotationExpression;
  readonly expression: Expression;
  readonly typeExpression: TypeExpression;
}

export interface BlockExpression extends SyntaxBase {
  readonly kind: SyntaxKind.BlockExpression;
  readonly statements: readonly Statement[];
  readonly result: Expression | null;
}

export interface ReferenceTypeExpression extends SyntaxBase {
  readonly kind: SyntaxKind.ReferenceTypeExpression;
  readonly name: string;
}

export interface FunctionTypeExpression extends SyntaxBase {
  readonly kind: SyntaxKind.FunctionTypeExpression;
  readonly params: readonly TypeExpression[];
  readonly returnType: TypeExpression;
}

export interface RecordTypeField extends SyntaxBase {
  readonly kind: SyntaxKind.RecordTypeField;
  readonly name: string;
  readonly typeExpression: TypeExpression;
}

export interface RecordTypeExpression extends SyntaxBase {
  readonly kind: SyntaxKind.RecordTypeExpression;
  readonly fields: readonly RecordTypeField[];
  readonly extension: TypeExpression | null;
}

export type Expression
  = ConstantExpression
  | ReferenceExpression
  | CallExpression
  | FunctionExpression
  | ConditionalExpression
  | RecordExpression
  | PropertyExpression
  | AnnotationExpression
  | BlockExpression

export type TypeExpression
  = ReferenceTypeExpression
  | FunctionTypeExpression
  | RecordTypeExpression

export type Statement
  = LetStatement
  | ExpressionStatement

export type SourceElement
  = FunctionDeclaration
  | ExpressionStatement

export type Syntax
  = SourceFile
  | TypeParameter
  | Parameter
  | SourceElement
  | Statement
  | Expression
  | RecordExpressionField
  | TypeExpression
  | RecordTypeField

export function createSourceFile(elements: SourceElement[], span: TextSpan): SourceFile {
  return { kind: SyntaxKind.SourceFile, elements, span };
}

export function createTypeParameter(name: string, bound: TypeExpression | null, span: TextSpan): TypeParameter {
  return { kind: SyntaxKind.TypeParameter, name, bound, span };
}

export function createParameter(name: string, typeExpression: TypeExpression | null, span: TextSpan): Parameter {
  return { kind: SyntaxKind.Parameter, name, typeExpression, span };
}

export function createFunctionDeclaration(
  name: string,
  typeParameters: TypeParameter[],
  params: Parameter[],
  parametersSpan: TextSpan,
  returnType: TypeExpression | null,
  body: Expression,
  span: TextSpan,
): FunctionDeclaration {
  return {
    kind: SyntaxKind.FunctionDeclaration,
    name,
    typeParameters,
    params,
    parametersSpan,
    returnType,
    body,
    span,
  };
}

export function createExpressionStatement(expression: Expression, span: TextSpan = expression.span): ExpressionStatement {
  return { kind: SyntaxKind.ExpressionStatement, expression, span };
}

export function createLetStatement(name: string, value: Expression, span: TextSpan): LetStatement {
  return { kind: SyntaxKind.LetStatement, name, value, span };
}

export function createConstantExpression(value: boolean | number, span: TextSpan): ConstantExpression {
  return { kind: SyntaxKind.ConstantExpression, value, text: String(value), span };
}

export function createReferenceExpression(name: string, span: TextSpan): ReferenceExpression {
  return { kind: SyntaxKind.ReferenceExpression, name, span };
}

export function createCallExpression(
  callee: Expression,
  args: Expression[],
  argumentsSpan: TextSpan,
  span: TextSpan,
): CallExpression {
  return { kind: SyntaxKind.CallExpression, callee, args, argumentsSpan, span };
}

export function createFunctionExpression(
  params: Parameter[],
  parametersSpan: TextSpan,
  returnType: TypeExpression | null,
  body: Expression,
  span: TextSpan,
): FunctionExpression {
  return { kind: SyntaxKind.FunctionExpression, params, parametersSpan, returnType, body, span };
}

export function createConditionalExpression(
  test: Expression,
  consequent: Expression,
  alternate: Expression,
  span: TextSpan,
): ConditionalExpression {
  return { kind: SyntaxKind.ConditionalExpression, test, consequent, alternate, span };
}

export function createRecordExpressionField(name: string, value: Expression, span: TextSpan): RecordExpressionField {
  return { kind: SyntaxKind.RecordExpressionField, name, value, span };
}

export function createRecordExpression(fields: RecordExpressionField[], span: TextSpan): RecordExpression {
  return { kind: SyntaxKind.RecordExpression, fields, span };
}

export function createPropertyExpression(expression: Expression, name: string, span: TextSpan): PropertyExpression {
  return { kind: SyntaxKind.PropertyExpression, expression, name, span };
}

export function createAnnotationExpression(
  expression: Expression,
  typeExpression: TypeExpression,
  span: TextSpan,
): AnnotationExpression {
  return { kind: SyntaxKind.AnnotationExpression, expression, typeExpression, span };
}

export function createBlockExpression(statements: Statement[], result: Expression | null, span: TextSpan): BlockExpression {
  return { kind: SyntaxKind.BlockExpression, statements, result, span };
}

export function createReferenceTypeExpression(name: string, span: TextSpan): ReferenceTypeExpression {
  return { kind: SyntaxKind.ReferenceTypeExpression, name, span };
}

export function createFunctionTypeExpression(
  params: TypeExpression[],
  returnType: TypeExpression,
  span: TextSpan,
): FunctionTypeExpression {
  return { kind: SyntaxKind.FunctionTypeExpression, params, returnType, span };
}

export function createRecordTypeField(name: string, typeExpression: TypeExpression, span: TextSpan): RecordTypeField {
  return { kind: SyntaxKind.RecordTypeField, name, typeExpression, span };
}

export function createRecordTypeExpression(
  fields: RecordTypeField[],
  extension: TypeExpression | null,
  span: TextSpan,
): RecordTypeExpression {
  return { kind: SyntaxKind.RecordTypeExpression, fields, extension, span };
}

/**
 * A short rendering of an expression for use inside a diagnostic message.
 */
export function describeExpression(node: Expression): string {
  switch (node.kind) {
    case SyntaxKind.ConstantExpression:
      return node.text;
    case SyntaxKind.ReferenceExpression:
      return node.name;
    case SyntaxKind.CallExpression:
      return `${describeExpression(node.callee)}()`;
    case SyntaxKind.FunctionExpression:
    {
      const names = node.params.map(param => param.name);
      const params = names.length > 2
        ? `${names[0]}, ${names[1]}, ...`
        : names.join(', ');
      return `fun(${params}) { ... }`;
    }
    case SyntaxKind.ConditionalExpression:
      return `if ${describeExpression(node.test)} { ... }`;
    case SyntaxKind.RecordExpression:
      return '{ ... }';
    case SyntaxKind.PropertyExpression:
      return `${describeExpression(node.expression)}.${node.name}`;
    case SyntaxKind.AnnotationExpression:
      return describeExpression(node.expression);
    case SyntaxKind.BlockExpression:
      return 'do { ... }';
  }
}
