
import type { CompileError } from "./errors";
import { assert, prettyPrintTag, uniqueName } from "./util";

export enum TypeKind {
  Variable,
  Boolean,
  Number,
  Function,
  RowEmpty,
  RowExtension,
  Error,
  Bottom,
  Quantify,
}

export enum Flexibility {
  Flexible,
  Rigid,
}

export enum Kind {
  Value = 'Value',
  Row = 'Row',
}

export interface Bound {
  flexibility: Flexibility;
  type: Polytype;
}

export type Monotype
  = VariableType
  | BooleanType
  | NumberType
  | FunctionType
  | RowEmptyType
  | RowExtensionType
  | ErrorType

export type Polytype
  = Monotype
  | BottomType
  | QuantifiedType

export type RowEntry = [string, Monotype];

export type QuantifiedBound = [string, Bound];

export type TypeSubstitution = Map<string, Monotype>;

export abstract class TypeBase {

  public abstract readonly kind: TypeKind;

  public abstract getFreeVariables(): Iterable<string>;

  public abstract applySubstitution(substitution: TypeSubstitution): Polytype;

  public abstract [prettyPrintTag](): string;

}

export abstract class MonotypeBase extends TypeBase {

  public abstract applySubstitution(substitution: TypeSubstitution): Monotype;

}

export class VariableType extends MonotypeBase {

  public readonly kind = TypeKind.Variable;

  constructor(public name: string) {
    super();
  }

  public *getFreeVariables(): Iterable<string> {
    yield this.name;
  }

  public applySubstitution(substitution: TypeSubstitution): Monotype {
    return substitution.get(this.name) ?? this;
  }

  public [prettyPrintTag](): string {
    return this.name;
  }

}

export class BooleanType extends MonotypeBase {

  public readonly kind = TypeKind.Boolean;

  public *getFreeVariables(): Iterable<string> {

  }

  public applySubstitution(_substitution: TypeSubstitution): Monotype {
    return this;
  }

  public [prettyPrintTag](): string {
    return 'Bool';
  }

}

export type NumberSpelling = 'Int' | 'Num';

/**
 * `Int` and `Num` are two spellings of the same number type. They unify with
 * each other; only the printer tells them apart.
 */
export class NumberType extends MonotypeBase {

  public readonly kind = TypeKind.Number;

  constructor(public spelling: NumberSpelling = 'Num') {
    super();
  }

  public *getFreeVariables(): Iterable<string> {

  }

  public applySubstitution(_substitution: TypeSubstitution): Monotype {
    return this;
  }

  public [prettyPrintTag](): string {
    return this.spelling;
  }

}

export class FunctionType extends MonotypeBase {

  public readonly kind = TypeKind.Function;

  constructor(
    public parameter: Monotype,
    public body: Monotype,
  ) {
    super();
  }

  public *getFreeVariables(): Iterable<string> {
    yield* this.parameter.getFreeVariables();
    yield* this.body.getFreeVariables();
  }

  public applySubstitution(substitution: TypeSubstitution): Monotype {
    return new FunctionType(
      this.parameter.applySubstitution(substitution),
      this.body.applySubstitution(substitution),
    );
  }

  public [prettyPrintTag](): string {
    const parameter = this.parameter[prettyPrintTag]();
    return this.parameter.kind === TypeKind.Function
      ? `(${parameter}) → ${this.body[prettyPrintTag]()}`
      : `${parameter} → ${this.body[prettyPrintTag]()}`;
  }

}

export class RowEmptyType extends MonotypeBase {

  public readonly kind = TypeKind.RowEmpty;

  public *getFreeVariables(): Iterable<string> {

  }

  public applySubstitution(_substitution: TypeSubstitution): Monotype {
    return this;
  }

  public [prettyPrintTag](): string {
    return '(||)';
  }

}

export class RowExtensionType extends MonotypeBase {

  public readonly kind = TypeKind.RowExtension;

  constructor(
    public entries: RowEntry[],
    public extension: Monotype = rowEmptyType,
  ) {
    super();
    assert(entries.length > 0, `A row extension needs at least one entry.`);
  }

  public *getFreeVariables(): Iterable<string> {
    for (const [_label, type] of this.entries) {
      yield* type.getFreeVariables();
    }
    yield* this.extension.getFreeVariables();
  }

  public applySubstitution(substitution: TypeSubstitution): Monotype {
    return new RowExtensionType(
      this.entries.map(([label, type]) => [label, type.applySubstitution(substitution)]),
      this.extension.applySubstitution(substitution),
    );
  }

  public [prettyPrintTag](): string {
    const entries = this.entries
      .map(([label, type]) => `${label}: ${type[prettyPrintTag]()}`)
      .join(', ');
    if (this.extension.kind === TypeKind.RowEmpty) {
      return `(| ${entries} |)`;
    }
    return `(| ${entries} | ${this.extension[prettyPrintTag]()} |)`;
  }

}

/**
 * Stands in for an expression that already failed to check. It unifies with
 * anything so that the failure is reported once.
 */
export class ErrorType extends MonotypeBase {

  public readonly kind = TypeKind.Error;

  constructor(public diagnostic: CompileError) {
    super();
  }

  public *getFreeVariables(): Iterable<string> {

  }

  public applySubstitution(_substitution: TypeSubstitution): Monotype {
    return this;
  }

  public [prettyPrintTag](): string {
    return '%error';
  }

}

export class BottomType extends TypeBase {

  public readonly kind = TypeKind.Bottom;

  public *getFreeVariables(): Iterable<string> {

  }

  public applySubstitution(_substitution: TypeSubstitution): Polytype {
    return this;
  }

  public [prettyPrintTag](): string {
    return '⊥';
  }

}

export class QuantifiedType extends TypeBase {

  public readonly kind = TypeKind.Quantify;

  constructor(
    public bounds: QuantifiedBound[],
    public body: Monotype,
  ) {
    super();
    assert(bounds.length > 0, `A quantified type needs at least one bound.`);
  }

  public *getFreeVariables(): Iterable<string> {
    const quantified = new Set<string>();
    for (const [name, bound] of this.bounds) {
      for (const free of bound.type.getFreeVariables()) {
        if (!quantified.has(free)) {
          yield free;
        }
      }
      quantified.add(name);
    }
    for (const free of this.body.getFreeVariables()) {
      if (!quantified.has(free)) {
        yield free;
      }
    }
  }

  public applySubstitution(substitution: TypeSubstitution): Polytype {

    const freeVariables = new Set(this.getFreeVariables());

    // Names that a binder must not take, or it would capture a free variable
    // of one of the types we substitute in.
    const captured = new Set<string>();
    for (const name of freeVariables) {
      const replacement = substitution.get(name);
      if (replacement !== undefined) {
        for (const free of replacement.getFreeVariables()) {
          captured.add(free);
        }
      }
    }

    const taken = new Set(freeVariables);
    for (const [name] of this.bounds) {
      taken.add(name);
    }

    const local = new Map(substitution);
    const bounds: QuantifiedBound[] = [];
    for (const [name, bound] of this.bounds) {
      const type = bound.type.applySubstitution(local);
      let newName = name;
      if (captured.has(name)) {
        newName = uniqueName(name, candidate => taken.has(candidate) || captured.has(candidate));
        taken.add(newName);
        local.set(name, new VariableType(newName));
      } else {
        local.delete(name);
      }
      bounds.push([newName, { flexibility: bound.flexibility, type }]);
    }

    return new QuantifiedType(bounds, this.body.applySubstitution(local));
  }

  public [prettyPrintTag](): string {
    if (this.bounds.length === 1) {
      const [name, bound] = this.bounds[0];
      if (isTriviallyBottom(bound)) {
        return `∀${name}.${this.body[prettyPrintTag]()}`;
      }
    }
    const bounds = this.bounds.map(([name, bound]) => printBound(name, bound)).join(', ');
    return `∀(${bounds}).${this.body[prettyPrintTag]()}`;
  }

}

export const booleanType = new BooleanType();
export const numberType = new NumberType('Num');
export const intType = new NumberType('Int');
export const rowEmptyType = new RowEmptyType();
export const bottomType = new BottomType();

export function isMonotype(type: Polytype): type is Monotype {
  return type.kind !== TypeKind.Bottom
      && type.kind !== TypeKind.Quantify;
}

export function isRowType(type: Monotype): type is RowEmptyType | RowExtensionType {
  return type.kind === TypeKind.RowEmpty
      || type.kind === TypeKind.RowExtension;
}

/**
 * The kind of a type constructor, or `null` for variables and errors whose
 * kind is not known from their shape.
 */
export function kindOf(type: Polytype): Kind | null {
  switch (type.kind) {
    case TypeKind.RowEmpty:
    case TypeKind.RowExtension:
      return Kind.Row;
    case TypeKind.Boolean:
    case TypeKind.Number:
    case TypeKind.Function:
      return Kind.Value;
    case TypeKind.Quantify:
      return kindOf(type.body);
    default:
      return null;
  }
}

/**
 * Builds the curried function type of a parameter list. A function without
 * parameters takes the empty row.
 */
export function createFunctionType(parameters: Monotype[], body: Monotype): Monotype {
  if (parameters.length === 0) {
    return new FunctionType(rowEmptyType, body);
  }
  let result = body;
  for (let i = parameters.length-1; i >= 0; i--) {
    result = new FunctionType(parameters[i], result);
  }
  return result;
}

export function isTriviallyBottom(bound: Bound): boolean {
  return bound.flexibility === Flexibility.Flexible
      && bound.type.kind === TypeKind.Bottom;
}

export function printBound(name: string, bound: Bound): string {
  if (isTriviallyBottom(bound)) {
    return name;
  }
  const operator = bound.flexibility === Flexibility.Flexible ? '≥' : '=';
  return `${name} ${operator} ${bound.type[prettyPrintTag]()}`;
}

export function printBounds(bounds: Iterable<QuantifiedBound>): string {
  const printed = [...bounds].map(([name, bound]) => printBound(name, bound));
  if (printed.length === 0) {
    return '(∅)';
  }
  return `(${printed.join(', ')})`;
}

type Renaming = Map<string, number>;

/**
 * Structural equality up to a consistent renaming of quantified variables.
 * The spelling of a number type does not matter.
 */
export function areTypesEqual(a: Polytype, b: Polytype): boolean {
  let nextBinder = 0;
  return visit(a, b, new Map(), new Map());

  function visit(a: Polytype, b: Polytype, left: Renaming, right: Renaming): boolean {

    if (a === b && left.size === 0 && right.size === 0) {
      return true;
    }

    switch (a.kind) {

      case TypeKind.Variable:
      {
        if (b.kind !== TypeKind.Variable) {
          return false;
        }
        const leftBinder = left.get(a.name);
        const rightBinder = right.get(b.name);
        if (leftBinder === undefined && rightBinder === undefined) {
          return a.name === b.name;
        }
        return leftBinder === rightBinder;
      }

      case TypeKind.Function:
        return b.kind === TypeKind.Function
            && visit(a.parameter, b.parameter, left, right)
            && visit(a.body, b.body, left, right);

      case TypeKind.RowExtension:
        if (b.kind !== TypeKind.RowExtension || a.entries.length !== b.entries.length) {
          return false;
        }
        for (let i = 0; i < a.entries.length; i++) {
          const [labelA, typeA] = a.entries[i];
          const [labelB, typeB] = b.entries[i];
          if (labelA !== labelB || !visit(typeA, typeB, left, right)) {
            return false;
          }
        }
        return visit(a.extension, b.extension, left, right);

      case TypeKind.Quantify:
      {
        if (b.kind !== TypeKind.Quantify || a.bounds.length !== b.bounds.length) {
          return false;
        }
        let newLeft = left;
        let newRight = right;
        for (let i = 0; i < a.bounds.length; i++) {
          const [nameA, boundA] = a.bounds[i];
          const [nameB, boundB] = b.bounds[i];
          if (boundA.flexibility !== boundB.flexibility
              || !visit(boundA.type, boundB.type, newLeft, newRight)) {
            return false;
          }
          const binder = nextBinder++;
          newLeft = new Map(newLeft).set(nameA, binder);
          newRight = new Map(newRight).set(nameB, binder);
        }
        return visit(a.body, b.body, newLeft, newRight);
      }

      default:
        return a.kind === b.kind;

    }

  }

}

/**
 * Rewrites a polytype into normal form: bounds that are monotypes are
 * inlined, unused bounds are dropped and `∀(a ≥ σ).a` becomes `σ`.
 */
export function normalizeType(type: Polytype): Polytype {

  if (type.kind !== TypeKind.Quantify) {
    return type;
  }

  const substitution: TypeSubstitution = new Map();
  const captured = new Set<string>();
  const kept: QuantifiedBound[] = [];
  for (const [name, bound] of type.bounds) {
    const boundType = bound.type.applySubstitution(substitution);
    if (isMonotype(boundType)) {
      substitution.set(name, boundType);
      for (const free of boundType.getFreeVariables()) {
        captured.add(free);
      }
      continue;
    }
    let newName = name;
    if (captured.has(name)) {
      newName = uniqueName(name, candidate => captured.has(candidate) || type.bounds.some(([other]) => other === candidate));
      substitution.set(name, new VariableType(newName));
    } else {
      substitution.delete(name);
    }
    kept.push([newName, { flexibility: bound.flexibility, type: boundType }]);
  }

  let body = type.body.applySubstitution(substitution);
  let bounds: QuantifiedBound[] = [];
  let free = new Set(body.getFreeVariables());
  for (let i = kept.length-1; i >= 0; i--) {
    const [name, bound] = kept[i];
    if (bounds.length === 0 && body.kind === TypeKind.Variable && body.name === name) {
      if (bound.type.kind === TypeKind.Bottom) {
        return bound.type;
      }
      if (bound.type.kind === TypeKind.Quantify) {
        bounds = [...bound.type.bounds];
        body = bound.type.body;
        free = new Set(bound.type.getFreeVariables());
        continue;
      }
    }
    if (free.has(name)) {
      free.delete(name);
      for (const other of bound.type.getFreeVariables()) {
        free.add(other);
      }
      bounds.unshift([name, bound]);
    }
  }

  if (bounds.length === 0) {
    return body;
  }
  return new QuantifiedType(bounds, body);
}
