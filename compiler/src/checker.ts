
import {
  type AnnotationExpression,
  type BlockExpression,
  type CallExpression,
  describeExpression,
  type Expression,
  type FunctionDeclaration,
  type FunctionExpression,
  type ParameterList,
  type SourceFile,
  type Syntax,
  SyntaxKind,
  type TypeExpression,
  type TypeParameter,
} from "./ast";
import { DiagnosticIndex, type Diagnostics } from "./diagnostics";
import {
  ArgumentCountMismatchError,
  CompileError,
  describeArgumentCount,
  describeType,
  IncompatibleKindsError,
  IncompatibleTypesError,
  InfiniteTypeError,
  MissingPropertyError,
  type Operation,
  OperationInfiniteTypeError,
  OperationKind,
  OperationTypeMismatchError,
  UnboundTypeVariableError,
  UnboundVariableError,
} from "./errors";
import { Prefix } from "./prefix";
import { TextSpan } from "./text";
import {
  booleanType,
  type Bound,
  bottomType,
  createFunctionType,
  ErrorType,
  Flexibility,
  FunctionType,
  intType,
  isMonotype,
  Kind,
  kindOf,
  type Monotype,
  normalizeType,
  numberType,
  type Polytype,
  type RowEntry,
  rowEmptyType,
  RowExtensionType,
  TypeKind,
} from "./types";
import { Unifier } from "./unify";
import { prettyPrint, verbose } from "./util";

export interface ValueBinding {
  type: Polytype;
  /**
   * The parameter list of the function this name was declared with, if any.
   * Used to count arguments at call sites.
   */
  signature: ParameterList | null;
  /**
   * Where the type of this name was written down.
   */
  origin: TextSpan;
}

export class TypeEnv {

  private values = new Map<string, ValueBinding>();

  private types = new Map<string, Monotype>();

  constructor(public parentTypeEnv: TypeEnv | null = null) {

  }

  public set(name: string, binding: ValueBinding): void {
    this.values.set(name, binding);
  }

  public lookup(name: string): ValueBinding | null {
    let currTypeEnv: TypeEnv | null = this;
    while (currTypeEnv !== null) {
      const binding = currTypeEnv.values.get(name);
      if (binding !== undefined) {
        return binding;
      }
      currTypeEnv = currTypeEnv.parentTypeEnv;
    }
    return null;
  }

  public setType(name: string, type: Monotype): void {
    this.types.set(name, type);
  }

  public lookupType(name: string): Monotype | null {
    let currTypeEnv: TypeEnv | null = this;
    while (currTypeEnv !== null) {
      const type = currTypeEnv.types.get(name);
      if (type !== undefined) {
        return type;
      }
      currTypeEnv = currTypeEnv.parentTypeEnv;
    }
    return null;
  }

}

/**
 * Where a check happens in the source, and what to tell the programmer when
 * it fails.
 */
interface CheckSite {
  operation: Operation | null;
  span: TextSpan;
  expectedSpan: TextSpan | null;
  actualSpan: TextSpan | null;
  /**
   * Set when checking an access of this property on a record.
   */
  property?: string;
}

export class TypeChecker {

  private prefix = new Prefix();

  private nodeToType = new Map<Syntax, Polytype>();

  private referenceToOrigin = new Map<Expression, TextSpan>();

  constructor(private diagnostics: Diagnostics) {

  }

  public checkSourceFile(sourceFile: SourceFile, typeEnv = new TypeEnv()): void {
    for (const element of sourceFile.elements) {
      switch (element.kind) {
        case SyntaxKind.FunctionDeclaration:
          this.checkFunctionDeclaration(element, typeEnv);
          break;
        case SyntaxKind.ExpressionStatement:
        {
          const type = normalizeType(this.prefix.level(() => this.prefix.generalize(this.infer(element.expression, typeEnv))));
          this.nodeToType.set(element, type);
          break;
        }
      }
    }
  }

  /**
   * The generalized type of a function declaration, `let` binding or
   * expression statement that was checked before.
   */
  public getTypeOfNode(node: Syntax): Polytype {
    const type = this.nodeToType.get(node);
    if (type === undefined) {
      throw new Error(`No type was inferred for this node.`);
    }
    return type;
  }

  private checkFunctionDeclaration(node: FunctionDeclaration, typeEnv: TypeEnv): void {

    const type = normalizeType(this.prefix.level(() => {

      const innerTypeEnv = new TypeEnv(typeEnv);
      this.declareTypeParameters(node.typeParameters, innerTypeEnv);

      // Recursive calls see the function at a single monotype.
      const self = this.prefix.fresh();
      innerTypeEnv.set(node.name, { type: self, signature: node, origin: node.span });

      const fnType = this.inferFunction(node, innerTypeEnv);
      this.checkType(self, fnType, { operation: null, span: node.span, expectedSpan: null, actualSpan: null });

      return this.prefix.generalize(fnType);
    }));

    verbose(`${node.name} : ${prettyPrint(type)}`);

    this.nodeToType.set(node, type);
    typeEnv.set(node.name, { type, signature: node, origin: node.span });
  }

  private declareTypeParameters(typeParameters: readonly TypeParameter[], typeEnv: TypeEnv): void {
    for (const typeParameter of typeParameters) {
      const bound: Bound = {
        flexibility: Flexibility.Flexible,
        type: typeParameter.bound === null ? bottomType : this.convertType(typeParameter.bound, typeEnv),
      };
      const variable = this.prefix.add(typeParameter.name, bound) ?? this.prefix.freshWithBound(bound);
      typeEnv.setType(typeParameter.name, variable);
    }
  }

  private inferFunction(node: FunctionDeclaration | FunctionExpression, typeEnv: TypeEnv): Monotype {

    const bodyTypeEnv = new TypeEnv(typeEnv);

    const paramTypes: Monotype[] = [];
    for (const param of node.params) {
      const paramType = param.typeExpression === null
        ? this.prefix.fresh()
        : this.convertType(param.typeExpression, bodyTypeEnv);
      bodyTypeEnv.set(param.name, {
        type: paramType,
        signature: null,
        origin: param.typeExpression === null ? param.span : param.typeExpression.span,
      });
      paramTypes.push(paramType);
    }

    const bodyType = this.infer(node.body, bodyTypeEnv);

    if (node.returnType === null) {
      return createFunctionType(paramTypes, bodyType);
    }

    const returnType = this.convertType(node.returnType, bodyTypeEnv);
    const returned = getReturnedExpression(node.body);
    this.checkType(returnType, bodyType, {
      operation: { kind: OperationKind.FunctionReturn, subject: describeExpression(returned) },
      span: returned.span,
      expectedSpan: node.returnType.span,
      actualSpan: this.getOrigin(returned),
    });
    return createFunctionType(paramTypes, returnType);
  }

  private infer(node: Expression, typeEnv: TypeEnv): Monotype {

    switch (node.kind) {

      case SyntaxKind.ConstantExpression:
        if (typeof node.value === 'boolean') {
          return booleanType;
        }
        return Number.isInteger(node.value) ? intType : numberType;

      case SyntaxKind.ReferenceExpression:
      {
        const binding = typeEnv.lookup(node.name);
        if (binding === null) {
          const error = new UnboundVariableError(node.name);
          error.span = node.span;
          this.diagnostics.add(error);
          return new ErrorType(error);
        }
        this.referenceToOrigin.set(node, binding.origin);
        return this.instantiate(binding.type);
      }

      case SyntaxKind.CallExpression:
        return this.inferCall(node, typeEnv);

      case SyntaxKind.FunctionExpression:
      {
        const type = this.prefix.level(() => this.prefix.generalize(this.inferFunction(node, typeEnv)));
        return isMonotype(type)
          ? type
          : this.prefix.freshWithBound({ flexibility: Flexibility.Flexible, type });
      }

      case SyntaxKind.ConditionalExpression:
      {
        const testType = this.infer(node.test, typeEnv);
        this.checkType(booleanType, testType, {
          operation: { kind: OperationKind.ConditionalTest, subject: describeExpression(node.test) },
          span: node.test.span,
          expectedSpan: null,
          actualSpan: this.getOrigin(node.test),
        });
        const resultType = this.prefix.fresh();
        this.checkType(resultType, this.infer(node.consequent, typeEnv), {
          operation: { kind: OperationKind.ConditionalBranch, subject: describeExpression(node.consequent) },
          span: node.consequent.span,
          expectedSpan: null,
          actualSpan: this.getOrigin(node.consequent),
        });
        this.checkType(resultType, this.infer(node.alternate, typeEnv), {
          operation: { kind: OperationKind.ConditionalBranch, subject: describeExpression(node.alternate) },
          span: node.alternate.span,
          expectedSpan: this.getOrigin(node.consequent),
          actualSpan: this.getOrigin(node.alternate),
        });
        return resultType;
      }

      case SyntaxKind.RecordExpression:
      {
        if (node.fields.length === 0) {
          return rowEmptyType;
        }
        const entries: RowEntry[] = node.fields.map(field => [ field.name, this.infer(field.value, typeEnv) ]);
        return new RowExtensionType(entries);
      }

      case SyntaxKind.PropertyExpression:
      {
        const objectType = this.infer(node.expression, typeEnv);
        const fieldType = this.prefix.fresh();
        const error = this.checkType(
          new RowExtensionType([[ node.name, fieldType ]], this.prefix.fresh()),
          objectType,
          {
            operation: { kind: OperationKind.PropertyAccess, subject: describeExpression(node) },
            span: node.span,
            expectedSpan: null,
            actualSpan: this.getOrigin(node.expression),
            property: node.name,
          },
        );
        return error === null ? fieldType : new ErrorType(error);
      }

      case SyntaxKind.AnnotationExpression:
        return this.inferAnnotation(node, typeEnv);

      case SyntaxKind.BlockExpression:
        return this.inferBlock(node, typeEnv);

    }

  }

  private inferCall(node: CallExpression, typeEnv: TypeEnv): Monotype {

    const calleeType = this.infer(node.callee, typeEnv);
    const operation: Operation = { kind: OperationKind.FunctionCall, subject: describeExpression(node.callee) };

    // Counting arguments is only possible when we know which declaration is
    // being called.
    const signature = this.getSignature(node.callee, typeEnv);
    let arityError: CompileError | null = null;
    let checkedCount = node.args.length;
    if (signature !== null && signature.params.length !== node.args.length) {
      arityError = new ArgumentCountMismatchError(operation, node.args.length, signature.params.length);
      arityError.span = node.argumentsSpan;
      arityError.addRelated(signature.parametersSpan, describeArgumentCount(signature.params.length));
      this.diagnostics.add(arityError);
      checkedCount = Math.min(node.args.length, signature.params.length);
    }

    const argTypes = node.args.map(arg => this.infer(arg, typeEnv));

    if (node.args.length === 0 && arityError === null) {
      const resultType = this.prefix.fresh();
      this.checkType(new FunctionType(rowEmptyType, resultType), calleeType, {
        operation,
        span: node.span,
        expectedSpan: null,
        actualSpan: this.getOrigin(node.callee),
      });
      return resultType;
    }

    let currentType = calleeType;
    for (let i = 0; i < checkedCount; i++) {
      const param = signature === null ? null : signature.params[i];
      const resultType = this.prefix.fresh();
      this.checkType(new FunctionType(argTypes[i], resultType), currentType, {
        operation,
        span: node.args[i].span,
        expectedSpan: param === null || param.typeExpression === null ? null : param.typeExpression.span,
        actualSpan: this.getOrigin(node.args[i]),
      });
      currentType = resultType;
    }

    return arityError === null ? currentType : new ErrorType(arityError);
  }

  private getSignature(callee: Expression, typeEnv: TypeEnv): ParameterList | null {
    switch (callee.kind) {
      case SyntaxKind.ReferenceExpression:
      {
        const binding = typeEnv.lookup(callee.name);
        return binding === null ? null : binding.signature;
      }
      case SyntaxKind.FunctionExpression:
        return callee;
      default:
        return null;
    }
  }

  private inferAnnotation(node: AnnotationExpression, typeEnv: TypeEnv): Monotype {
    const actualType = this.infer(node.expression, typeEnv);
    const annotatedType = this.convertType(node.typeExpression, typeEnv);
    this.checkType(annotatedType, actualType, {
      operation: { kind: OperationKind.ExpressionAnnotation, subject: describeExpression(node.expression) },
      span: node.expression.span,
      expectedSpan: node.typeExpression.span,
      actualSpan: this.getOrigin(node.expression),
    });
    return annotatedType;
  }

  private inferBlock(node: BlockExpression, typeEnv: TypeEnv): Monotype {
    const blockTypeEnv = new TypeEnv(typeEnv);
    for (const statement of node.statements) {
      switch (statement.kind) {
        case SyntaxKind.LetStatement:
        {
          const type = normalizeType(this.prefix.level(() => this.prefix.generalize(this.infer(statement.value, blockTypeEnv))));
          this.nodeToType.set(statement, type);
          blockTypeEnv.set(statement.name, {
            type,
            signature: statement.value.kind === SyntaxKind.FunctionExpression ? statement.value : null,
            origin: this.getOrigin(statement.value),
          });
          break;
        }
        case SyntaxKind.ExpressionStatement:
          this.infer(statement.expression, blockTypeEnv);
          break;
      }
    }
    return node.result === null ? rowEmptyType : this.infer(node.result, blockTypeEnv);
  }

  /**
   * Where the type of an expression that was already inferred was written
   * down. A reference leads to its binding and an annotation to its type.
   */
  private getOrigin(node: Expression): TextSpan {
    switch (node.kind) {
      case SyntaxKind.ReferenceExpression:
        return this.referenceToOrigin.get(node) ?? node.span;
      case SyntaxKind.AnnotationExpression:
        return node.typeExpression.span;
      case SyntaxKind.BlockExpression:
        return node.result === null ? node.span : this.getOrigin(node.result);
      default:
        return node.span;
    }
  }

  private instantiate(type: Polytype): Monotype {
    switch (type.kind) {
      case TypeKind.Bottom:
        return this.prefix.fresh();
      case TypeKind.Quantify:
        return this.prefix.instantiate(type.bounds, type.body);
      default:
        return type;
    }
  }

  private convertType(node: TypeExpression, typeEnv: TypeEnv): Monotype {

    switch (node.kind) {

      case SyntaxKind.ReferenceTypeExpression:
      {
        const type = typeEnv.lookupType(node.name);
        if (type !== null) {
          return type;
        }
        switch (node.name) {
          case 'Bool':
            return booleanType;
          case 'Int':
            return intType;
          case 'Num':
            return numberType;
          case 'Never':
            return this.prefix.fresh();
        }
        const error = new UnboundTypeVariableError(node.name);
        error.span = node.span;
        this.diagnostics.add(error);
        return new ErrorType(error);
      }

      case SyntaxKind.FunctionTypeExpression:
        return createFunctionType(
          node.params.map(param => this.convertType(param, typeEnv)),
          this.convertType(node.returnType, typeEnv),
        );

      case SyntaxKind.RecordTypeExpression:
      {
        const entries: RowEntry[] = node.fields.map(field => [ field.name, this.convertType(field.typeExpression, typeEnv) ]);
        const extension = node.extension === null
          ? rowEmptyType
          : this.convertRowExtension(node.extension, typeEnv);
        return entries.length === 0 ? extension : new RowExtensionType(entries, extension);
      }

    }

  }

  private convertRowExtension(node: TypeExpression, typeEnv: TypeEnv): Monotype {
    const type = this.convertType(node, typeEnv);
    const kind = this.getKind(type);
    if (kind === Kind.Value) {
      const error = new IncompatibleKindsError(Kind.Row, kind);
      error.span = node.span;
      this.diagnostics.add(error);
      return new ErrorType(error);
    }
    return type;
  }

  private getKind(type: Polytype): Kind | null {
    if (type.kind === TypeKind.Variable) {
      return this.getKind(this.prefix.lookup(type.name).type);
    }
    return kindOf(type);
  }

  /**
   * Unifies both types and reports whatever went wrong at `site`. Returns
   * the first diagnostic that was reported, if any.
   */
  private checkType(expected: Monotype, actual: Monotype, site: CheckSite): CompileError | null {
    const collected = new DiagnosticIndex();
    new Unifier(this.prefix, collected).unify(expected, actual);
    let first: CompileError | null = null;
    for (const diagnostic of collected.getAllDiagnostics()) {
      const positioned = positionDiagnostic(diagnostic, site);
      this.diagnostics.add(positioned);
      if (first === null) {
        first = positioned;
      }
    }
    return first;
  }

}

function positionDiagnostic(diagnostic: CompileError, site: CheckSite): CompileError {
  let positioned = diagnostic;
  if (site.operation !== null) {
    if (diagnostic instanceof IncompatibleTypesError) {
      positioned = site.property !== undefined && isRecordType(diagnostic.expected) && isRecordType(diagnostic.actual)
        ? new MissingPropertyError(site.operation, site.property, diagnostic)
        : new OperationTypeMismatchError(site.operation, diagnostic);
    } else if (diagnostic instanceof InfiniteTypeError) {
      positioned = new OperationInfiniteTypeError(site.operation, diagnostic);
    }
  }
  positioned.span = site.span;
  if (diagnostic instanceof IncompatibleTypesError) {
    if (site.actualSpan !== null) {
      positioned.addRelated(site.actualSpan, describeType(diagnostic.actual, false));
    }
    if (site.expectedSpan !== null) {
      positioned.addRelated(site.expectedSpan, describeType(diagnostic.expected, false));
    }
  }
  return positioned;
}

function isRecordType(type: Polytype): boolean {
  return type.kind === TypeKind.RowEmpty
      || type.kind === TypeKind.RowExtension;
}

function getReturnedExpression(node: Expression): Expression {
  if (node.kind === SyntaxKind.BlockExpression && node.result !== null) {
    return getReturnedExpression(node.result);
  }
  return node;
}
