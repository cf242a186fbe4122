
import { DiagnosticIndex, type Diagnostics } from "./diagnostics";
import { CompileError, IncompatibleTypesError } from "./errors";
import { Prefix } from "./prefix";
import {
  Flexibility,
  isMonotype,
  isRowType,
  type Monotype,
  normalizeType,
  type Polytype,
  type RowEntry,
  RowExtensionType,
  TypeKind,
} from "./types";
import { err, ok, type Result } from "./util";

interface FlatRow {
  entries: RowEntry[];
  tail: Monotype;
}

export type UnifyResult = Result<CompileError, void>;

/**
 * Checks that an actual type may be used where an expected type is
 * required, strengthening the variables of the prefix as needed.
 *
 * Every failure is added to the diagnostics as soon as it is found, so a
 * single call may report more than one. The returned result carries the
 * first of them.
 */
export class Unifier {

  constructor(
    public prefix: Prefix,
    private diagnostics: Diagnostics,
  ) {

  }

  public unify(expected: Monotype, actual: Monotype): UnifyResult {

    // An error was already reported for whatever produced this type.
    if (expected.kind === TypeKind.Error || actual.kind === TypeKind.Error) {
      return ok(undefined);
    }

    if (expected.kind === TypeKind.Variable
        && actual.kind === TypeKind.Variable
        && expected.name === actual.name) {
      return ok(undefined);
    }

    if (expected.kind === TypeKind.Variable) {
      const expectedBound = this.prefix.lookup(expected.name);
      if (isMonotype(expectedBound.type)) {
        return this.unify(expectedBound.type, actual);
      }
      if (actual.kind === TypeKind.Variable) {
        const actualBound = this.prefix.lookup(actual.name);
        if (isMonotype(actualBound.type)) {
          return this.unify(expected, actualBound.type);
        }
        const result = this.unifyPolytypes(expectedBound.type, actualBound.type);
        if ('err' in result) {
          return result;
        }
        const flexibility = expectedBound.flexibility === Flexibility.Flexible
                         && actualBound.flexibility === Flexibility.Flexible
          ? Flexibility.Flexible
          : Flexibility.Rigid;
        return this.commit(this.prefix.update2(expected.name, actual.name, { flexibility, type: result.ok }));
      }
      const result = this.unifyPolytypes(expectedBound.type, actual);
      if ('err' in result) {
        return result;
      }
      return this.commit(this.prefix.update(expected.name, { flexibility: Flexibility.Rigid, type: actual }));
    }

    if (actual.kind === TypeKind.Variable) {
      const actualBound = this.prefix.lookup(actual.name);
      if (isMonotype(actualBound.type)) {
        return this.unify(expected, actualBound.type);
      }
      const result = this.unifyPolytypes(expected, actualBound.type);
      if ('err' in result) {
        return result;
      }
      return this.commit(this.prefix.update(actual.name, { flexibility: Flexibility.Rigid, type: expected }));
    }

    if (expected.kind === TypeKind.Boolean && actual.kind === TypeKind.Boolean) {
      return ok(undefined);
    }

    if (expected.kind === TypeKind.Number && actual.kind === TypeKind.Number) {
      return ok(undefined);
    }

    if (expected.kind === TypeKind.Function && actual.kind === TypeKind.Function) {
      // The parameter is contravariant and the body covariant. Both sides are
      // checked so that both mistakes get reported.
      const parameter = this.unify(actual.parameter, expected.parameter);
      const body = this.unify(expected.body, actual.body);
      return 'err' in parameter ? parameter : body;
    }

    if (expected.kind === TypeKind.RowEmpty && actual.kind === TypeKind.RowEmpty) {
      return ok(undefined);
    }

    if (isRowType(expected) && isRowType(actual)) {
      return this.unifyRows(expected, actual);
    }

    return this.report(new IncompatibleTypesError(expected, actual));
  }

  /**
   * Unifies two bounds and returns the polytype both variables can share.
   * Quantified types are opened in a new scope and closed again afterwards.
   */
  public unifyPolytypes(expected: Polytype, actual: Polytype): Result<CompileError, Polytype> {

    if (expected.kind === TypeKind.Bottom) {
      return ok(actual);
    }
    if (actual.kind === TypeKind.Bottom) {
      return ok(expected);
    }

    if (isMonotype(expected) && isMonotype(actual)) {
      const result = this.unify(expected, actual);
      return 'err' in result ? result : ok(expected);
    }

    return this.prefix.level(() => {
      const expectedType = this.open(expected);
      const actualType = this.open(actual);
      const result = this.unify(expectedType, actualType);
      if ('err' in result) {
        return result;
      }
      return ok(normalizeType(this.prefix.generalize(expectedType)));
    });
  }

  private open(type: Polytype): Monotype {
    switch (type.kind) {
      case TypeKind.Bottom:
        return this.prefix.fresh();
      case TypeKind.Quantify:
        return this.prefix.instantiate(type.bounds, type.body);
      default:
        return type;
    }
  }

  private unifyRows(expected: Monotype, actual: Monotype): UnifyResult {

    const expectedRow = this.flattenRow(expected);
    const actualRow = this.flattenRow(actual);

    // The n-th occurrence of a label on one side goes with the n-th
    // occurrence on the other side.
    const matched = new Set<number>();
    const expectedOnly: RowEntry[] = [];
    let firstError: UnifyResult | null = null;
    for (const [label, type] of expectedRow.entries) {
      const index = actualRow.entries.findIndex(([otherLabel], i) => otherLabel === label && !matched.has(i));
      if (index === -1) {
        expectedOnly.push([label, type]);
        continue;
      }
      matched.add(index);
      const result = this.unify(type, actualRow.entries[index][1]);
      if ('err' in result && firstError === null) {
        firstError = result;
      }
    }
    const actualOnly = actualRow.entries.filter((_entry, i) => !matched.has(i));

    const result = this.unifyRowTails(
      expected,
      actual,
      expectedRow.tail,
      dropShadowed(expectedOnly, actualRow),
      actualRow.tail,
      dropShadowed(actualOnly, expectedRow),
    );
    return firstError ?? result;
  }

  private unifyRowTails(
    expected: Monotype,
    actual: Monotype,
    expectedTail: Monotype,
    expectedOnly: RowEntry[],
    actualTail: Monotype,
    actualOnly: RowEntry[],
  ): UnifyResult {

    if (expectedOnly.length === 0 && actualOnly.length === 0) {
      return this.unify(expectedTail, actualTail);
    }

    if ((actualOnly.length > 0 && !isOpenTail(expectedTail))
        || (expectedOnly.length > 0 && !isOpenTail(actualTail))) {
      return this.report(new IncompatibleTypesError(expected, actual));
    }

    if (actualOnly.length === 0) {
      return this.unify(new RowExtensionType(expectedOnly, expectedTail), actualTail);
    }
    if (expectedOnly.length === 0) {
      return this.unify(expectedTail, new RowExtensionType(actualOnly, actualTail));
    }

    // Both sides have labels the other lacks. With a shared tail there is no
    // finite row that has both.
    if (expectedTail.kind === TypeKind.Variable
        && actualTail.kind === TypeKind.Variable
        && expectedTail.name === actualTail.name) {
      return this.report(new IncompatibleTypesError(expected, actual));
    }

    const rest = this.prefix.fresh();
    const left = this.unify(expectedTail, new RowExtensionType(actualOnly, rest));
    const right = this.unify(new RowExtensionType(expectedOnly, rest), actualTail);
    return 'err' in left ? left : right;
  }

  private flattenRow(row: Monotype): FlatRow {
    const entries: RowEntry[] = [];
    let tail = row;
    for (;;) {
      if (tail.kind === TypeKind.RowExtension) {
        entries.push(...tail.entries);
        tail = tail.extension;
        continue;
      }
      if (tail.kind === TypeKind.Variable) {
        const bound = this.prefix.lookup(tail.name);
        if (isMonotype(bound.type)) {
          tail = bound.type;
          continue;
        }
      }
      break;
    }
    return { entries, tail };
  }

  private commit(result: UnifyResult): UnifyResult {
    if ('err' in result) {
      this.diagnostics.add(result.err);
    }
    return result;
  }

  private report(error: CompileError): UnifyResult {
    this.diagnostics.add(error);
    return err(error);
  }

}

/**
 * A concrete record resolves a label to its left-most entry, so the later
 * occurrences of a label it already has are not leftovers.
 */
function dropShadowed(leftovers: RowEntry[], other: FlatRow): RowEntry[] {
  if (isOpenTail(other.tail)) {
    return leftovers;
  }
  return leftovers.filter(([label]) => !other.entries.some(([otherLabel]) => otherLabel === label));
}

function isOpenTail(tail: Monotype): boolean {
  return tail.kind === TypeKind.Variable
      || tail.kind === TypeKind.Error;
}

export function unify(
  prefix: Prefix,
  expected: Monotype,
  actual: Monotype,
  diagnostics: Diagnostics = new DiagnosticIndex(),
): UnifyResult {
  return new Unifier(prefix, diagnostics).unify(expected, actual);
}
