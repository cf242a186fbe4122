
import { CompileError, IncompatibleTypesError, InfiniteTypeError } from "./errors";
import {
  areTypesEqual,
  type Bound,
  bottomType,
  Flexibility,
  type Monotype,
  type Polytype,
  printBounds,
  type QuantifiedBound,
  QuantifiedType,
  type TypeSubstitution,
  VariableType,
} from "./types";
import { assert, err, ok, prettyPrintTag, type Result } from "./util";

interface PrefixEntry {
  name: string;
  bound: Bound;
  level: number;
}

/**
 * The store of type variables that inference threads through a program.
 *
 * Every entry remembers the level of the scope that introduced it. Entries
 * are kept in dependency order: a bound only refers to entries that come
 * before it. When an entry is strengthened with a bound that mentions
 * deeper entries, those entries are moved out to the level of the entry so
 * that they survive the deeper scope.
 */
export class Prefix {

  private entries: PrefixEntry[] = [];

  private entriesByName = new Map<string, PrefixEntry>();

  private currentLevel = 0;

  private nextVariableId = 1;

  public getLevel(): number {
    return this.currentLevel;
  }

  /**
   * Runs `callback` in a new scope. Entries that are still deeper than the
   * enclosing scope when the callback finishes are removed, whether it
   * returned or threw.
   */
  public level<T>(callback: () => T): T {
    const previousLevel = this.currentLevel;
    this.currentLevel = previousLevel + 1;
    try {
      return callback();
    } finally {
      this.currentLevel = previousLevel;
      this.removeEntriesAbove(previousLevel);
    }
  }

  public freshWithBound(bound: Bound): VariableType {
    let name: string;
    do {
      name = `t${this.nextVariableId++}`;
    } while (this.entriesByName.has(name));
    this.insert(name, bound);
    return new VariableType(name);
  }

  public fresh(): VariableType {
    return this.freshWithBound({ flexibility: Flexibility.Flexible, type: bottomType });
  }

  public add(name: string, bound: Bound): VariableType | null {
    if (this.entriesByName.has(name)) {
      return null;
    }
    this.insert(name, bound);
    return new VariableType(name);
  }

  public lookup(name: string): Bound {
    return this.getEntry(name).bound;
  }

  /**
   * Opens a quantified type: every bound gets a fresh entry and the body
   * refers to those entries instead of the quantified names.
   */
  public instantiate(bounds: readonly QuantifiedBound[], body: Monotype): Monotype {
    const substitution: TypeSubstitution = new Map();
    for (const [name, bound] of bounds) {
      const variable = this.freshWithBound({
        flexibility: bound.flexibility,
        type: bound.type.applySubstitution(substitution),
      });
      substitution.set(name, variable);
    }
    return body.applySubstitution(substitution);
  }

  /**
   * Quantifies `body` over the entries of the current scope that it can
   * reach. Must be the last thing done in a scope: every entry of the
   * current scope is removed, reachable or not.
   */
  public generalize(body: Monotype): Polytype {

    const level = this.currentLevel;

    const reachable = new Set<string>();
    const visit = (type: Polytype) => {
      for (const name of type.getFreeVariables()) {
        if (reachable.has(name)) {
          continue;
        }
        const entry = this.entriesByName.get(name);
        if (entry === undefined || entry.level < level) {
          continue;
        }
        reachable.add(name);
        visit(entry.bound.type);
      }
    };
    visit(body);

    const bounds: QuantifiedBound[] = [];
    const remaining: PrefixEntry[] = [];
    for (const entry of this.entries) {
      if (entry.level < level) {
        remaining.push(entry);
        continue;
      }
      this.entriesByName.delete(entry.name);
      if (reachable.has(entry.name)) {
        bounds.push([entry.name, entry.bound]);
      }
    }
    this.entries = remaining;

    if (bounds.length === 0) {
      return body;
    }
    return new QuantifiedType(bounds, body);
  }

  public update(name: string, bound: Bound): Result<CompileError, void> {

    const entry = this.getEntry(name);

    if (this.reaches(bound.type, name)) {
      return err(new InfiniteTypeError(name, bound.type));
    }

    const newBound = this.mergeBound(entry.bound, bound);
    if (newBound === null) {
      return err(new IncompatibleTypesError(entry.bound.type, bound.type));
    }

    entry.bound = newBound;
    this.lowerLevels(newBound.type, entry.level);
    this.sortEntries();
    return ok(undefined);
  }

  /**
   * Makes `name1` and `name2` the same variable. `name1` survives with
   * `bound` at the shallower of both levels, and `name2` becomes a rigid
   * alias of it.
   */
  public update2(name1: string, name2: string, bound: Bound): Result<CompileError, void> {

    assert(name1 !== name2, `Cannot merge type variable ${name1} with itself.`);

    const entry1 = this.getEntry(name1);
    const entry2 = this.getEntry(name2);

    for (const name of [ name1, name2 ]) {
      if (this.reaches(bound.type, name)) {
        return err(new InfiniteTypeError(name, bound.type));
      }
    }

    const newBound = this.mergeBound(entry1.bound, bound);
    if (newBound === null) {
      return err(new IncompatibleTypesError(entry1.bound.type, bound.type));
    }
    if (this.mergeBound(entry2.bound, bound) === null) {
      return err(new IncompatibleTypesError(entry2.bound.type, bound.type));
    }

    const level = Math.min(entry1.level, entry2.level);
    entry1.bound = newBound;
    entry1.level = level;
    entry2.bound = { flexibility: Flexibility.Rigid, type: new VariableType(name1) };
    this.lowerLevels(newBound.type, level);
    this.sortEntries();
    return ok(undefined);
  }

  public bounds(): QuantifiedBound[] {
    return this.entries.map(entry => [entry.name, entry.bound]);
  }

  public [prettyPrintTag](): string {
    return printBounds(this.bounds());
  }

  private insert(name: string, bound: Bound): void {
    const entry = { name, bound, level: this.currentLevel };
    this.entries.push(entry);
    this.entriesByName.set(name, entry);
  }

  private getEntry(name: string): PrefixEntry {
    const entry = this.entriesByName.get(name);
    if (entry === undefined) {
      throw new Error(`Type variable ${name} is not bound in this prefix.`);
    }
    return entry;
  }

  /**
   * The bound an entry gets when it is strengthened, or `null` when a rigid
   * entry would have to change. An equal type keeps the old one so that the
   * names the programmer wrote are preserved.
   */
  private mergeBound(oldBound: Bound, newBound: Bound): Bound | null {
    if (areTypesEqual(oldBound.type, newBound.type)) {
      return {
        flexibility: oldBound.flexibility === Flexibility.Rigid ? Flexibility.Rigid : newBound.flexibility,
        type: oldBound.type,
      };
    }
    if (oldBound.flexibility === Flexibility.Rigid) {
      return null;
    }
    return newBound;
  }

  private reaches(type: Polytype, name: string): boolean {
    const visited = new Set<string>();
    const visit = (type: Polytype): boolean => {
      for (const free of type.getFreeVariables()) {
        if (free === name) {
          return true;
        }
        if (visited.has(free)) {
          continue;
        }
        visited.add(free);
        const entry = this.entriesByName.get(free);
        if (entry !== undefined && visit(entry.bound.type)) {
          return true;
        }
      }
      return false;
    };
    return visit(type);
  }

  private lowerLevels(type: Polytype, level: number): void {
    for (const name of type.getFreeVariables()) {
      const entry = this.entriesByName.get(name);
      if (entry !== undefined && entry.level > level) {
        entry.level = level;
        this.lowerLevels(entry.bound.type, level);
      }
    }
  }

  // Stable topological sort: an entry moves only when it must come after
  // one of its dependencies.
  private sortEntries(): void {
    const sorted: PrefixEntry[] = [];
    const visited = new Set<string>();
    const visit = (entry: PrefixEntry) => {
      if (visited.has(entry.name)) {
        return;
      }
      visited.add(entry.name);
      for (const name of entry.bound.type.getFreeVariables()) {
        const dependency = this.entriesByName.get(name);
        if (dependency !== undefined) {
          visit(dependency);
        }
      }
      sorted.push(entry);
    };
    for (const entry of this.entries) {
      visit(entry);
    }
    this.entries = sorted;
  }

  private removeEntriesAbove(level: number): void {
    const remaining: PrefixEntry[] = [];
    for (const entry of this.entries) {
      if (entry.level > level) {
        this.entriesByName.delete(entry.name);
      } else {
        remaining.push(entry);
      }
    }
    this.entries = remaining;
  }

}
