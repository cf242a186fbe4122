
import chalk from "chalk";

import { LARCH_DIAG_NUM_EXTRA_LINES } from "./constants";
import { TextSpan } from "./text";
import { Kind, type Polytype, TypeKind } from "./types";
import { countDigits, format, type MapLike, prettyPrint } from "./util";

export const E_UNBOUND_VARIABLE = "Unbound variable `{name}`."
export const E_UNBOUND_TYPE_VARIABLE = "Unbound type variable `{name}`."
export const E_INCOMPATIBLE_TYPES = "{expected} ≢ {actual}"
export const E_INFINITE_TYPE = "Infinite type since `{name}` occurs in `{type}`."
export const E_INCOMPATIBLE_KINDS = "{expected} ≢ {actual}"
export const E_INFINITE_KIND = "Infinite kind."
export const E_OPERATION_INCOMPATIBLE_TYPES = "{operation} because {actualSnippet} is not {expectedSnippet}."
export const E_OPERATION_INFINITE_TYPE = "{operation} because the type checker infers an infinite type."
export const E_ARGUMENT_COUNT_MISMATCH = "{operation} because we have {actualArguments} but we {need} {expectedCount}."
export const E_MISSING_PROPERTY = "{operation} because {actualSnippet} has no property `{name}`."

export type Severity = 'error' | 'fatal' | 'warning' | 'info';

export interface TextOutput {
  write(text: string): unknown;
}

export interface RelatedInformation {
  span: TextSpan;
  message: string;
}

export abstract class CompileError extends Error {

  public abstract readonly severity: Severity;

  /**
   * Diagnostics made by the unifier have no location. The checker fills this
   * in when it reports them.
   */
  public span: TextSpan | null = null;

  public related: RelatedInformation[] = [];

  constructor(private messageTemplate: string) {
    super();
  }

  public get messageText(): string {
    const args: MapLike<unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(this);
    for (const [key, value] of entries) {
      args[key] = value;
    }
    return format(this.messageTemplate, args);
  }

  public addRelated(span: TextSpan, message: string): void {
    if (this.span !== null && this.span.intersects(span)) {
      return;
    }
    this.related.push({ span, message });
  }

  /**
   * The colored report for this diagnostic: a heading with the location,
   * then an excerpt for the main span and for each related span.
   */
  public render({ indentation = ' ' } = {}): string {
    let out = indentation + printSeverity(this.severity);
    if (this.span !== null) {
      out += printLocation(this.span);
    }
    out += this.messageText + '\n\n';
    if (this.span !== null) {
      out += printExcerpt(this.span, indentation) + '\n';
    }
    for (const { span, message } of this.related) {
      out += indentation + printLocation(span) + message + '\n\n';
      out += printExcerpt(span, indentation) + '\n';
    }
    return out;
  }

  public print(output: TextOutput = process.stderr): void {
    output.write(this.render());
  }

}

export class UnboundVariableError extends CompileError {

  public readonly severity = 'error';

  constructor(public name: string) {
    super(E_UNBOUND_VARIABLE);
  }

}

export class UnboundTypeVariableError extends CompileError {

  public readonly severity = 'error';

  constructor(public name: string) {
    super(E_UNBOUND_TYPE_VARIABLE);
  }

}

export class IncompatibleTypesError extends CompileError {

  public readonly severity = 'error';

  constructor(public expected: Polytype, public actual: Polytype) {
    super(E_INCOMPATIBLE_TYPES);
  }

}

export class InfiniteTypeError extends CompileError {

  public readonly severity = 'error';

  constructor(public name: string, public type: Polytype) {
    super(E_INFINITE_TYPE);
  }

}

export class IncompatibleKindsError extends CompileError {

  public readonly severity = 'error';

  constructor(public expected: Kind, public actual: Kind) {
    super(E_INCOMPATIBLE_KINDS);
  }

}

// Kinds are first-order, so nothing produces this yet.
export class InfiniteKindError extends CompileError {

  public readonly severity = 'error';

  constructor() {
    super(E_INFINITE_KIND);
  }

}

export enum OperationKind {
  FunctionCall,
  ExpressionAnnotation,
  FunctionReturn,
  ConditionalTest,
  ConditionalBranch,
  PropertyAccess,
}

/**
 * The action in the source code that failed to check, with a short
 * rendering of the expression it applies to.
 */
export interface Operation {
  kind: OperationKind;
  subject: string;
}

export function describeOperation(operation: Operation): string {
  switch (operation.kind) {
    case OperationKind.FunctionCall:
      return `Can not call \`${operation.subject}\``;
    case OperationKind.ExpressionAnnotation:
      return `Can not change the type of \`${operation.subject}\``;
    case OperationKind.FunctionReturn:
      return `Can not return \`${operation.subject}\``;
    case OperationKind.ConditionalTest:
      return `Can not test \`${operation.subject}\``;
    case OperationKind.ConditionalBranch:
      return `Can not use \`${operation.subject}\` as a conditional branch`;
    case OperationKind.PropertyAccess:
      return `Can not access \`${operation.subject}\``;
  }
}

/**
 * A short description of the outermost constructor of a type, as used in
 * sentences like "a `Bool` is not an `Int`".
 */
export function describeType(type: Polytype, article: boolean): string {
  switch (type.kind) {
    case TypeKind.Boolean:
      return (article ? 'a ' : '') + '`Bool`';
    case TypeKind.Number:
      if (article) {
        return (type.spelling === 'Int' ? 'an ' : 'a ') + `\`${type.spelling}\``;
      }
      return `\`${type.spelling}\``;
    case TypeKind.Function:
      return article ? 'a function' : 'function';
    case TypeKind.RowEmpty:
    case TypeKind.RowExtension:
      return article ? 'a record' : 'record';
    default:
      return `\`${prettyPrint(type)}\``;
  }
}

const CARDINALS = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight',
  'nine', 'ten', 'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen',
  'sixteen', 'seventeen', 'eighteen', 'nineteen', 'twenty',
];

export function cardinal(count: number): string {
  return count < CARDINALS.length ? CARDINALS[count] : count.toString();
}

export function describeArgumentCount(count: number): string {
  return `${cardinal(count)} ${count === 1 ? 'argument' : 'arguments'}`;
}

export class OperationTypeMismatchError extends CompileError {

  public readonly severity = 'error';

  public operation: string;
  public actualSnippet: string;
  public expectedSnippet: string;

  constructor(operation: Operation, public cause: IncompatibleTypesError) {
    super(E_OPERATION_INCOMPATIBLE_TYPES);
    this.operation = describeOperation(operation);
    this.actualSnippet = describeType(cause.actual, true);
    this.expectedSnippet = describeType(cause.expected, true);
  }

}

export class MissingPropertyError extends CompileError {

  public readonly severity = 'error';

  public operation: string;
  public actualSnippet: string;

  constructor(operation: Operation, public name: string, public cause: IncompatibleTypesError) {
    super(E_MISSING_PROPERTY);
    this.operation = describeOperation(operation);
    this.actualSnippet = describeType(cause.actual, true);
  }

}

export class OperationInfiniteTypeError extends CompileError {

  public readonly severity = 'error';

  public operation: string;

  constructor(operation: Operation, public cause: InfiniteTypeError) {
    super(E_OPERATION_INFINITE_TYPE);
    this.operation = describeOperation(operation);
  }

}

export class ArgumentCountMismatchError extends CompileError {

  public readonly severity = 'error';

  public operation: string;
  public actualArguments: string;
  public need: string;
  public expectedCount: string;

  constructor(operation: Operation, public actualCount: number, public parameterCount: number) {
    super(E_ARGUMENT_COUNT_MISMATCH);
    this.operation = describeOperation(operation);
    this.actualArguments = describeArgumentCount(actualCount);
    this.need = actualCount < parameterCount ? 'need' : 'only need';
    this.expectedCount = cardinal(parameterCount);
  }

}

function printSeverity(severity: Severity): string {
  switch (severity) {
    case 'error':
    case 'fatal':
    case 'warning':
      return chalk.bold.red(`${severity}: `);
    case 'info':
      return chalk.bold.yellow('info: ');
  }
}

function printLocation(span: TextSpan): string {
  return chalk.bold.yellow(`${span.file.origPath}:${span.start.line}:${span.start.column}: `);
}

/**
 * Prints the lines of `span` with some lines around them, each one under a
 * line-number gutter, and marks the covered columns with `~`.
 */
function printExcerpt(span: TextSpan, indentation: string): string {
  const lines = span.file.getText().split('\n');
  const first = Math.max(1, span.start.line - LARCH_DIAG_NUM_EXTRA_LINES);
  const last = Math.min(lines.length, span.end.line + LARCH_DIAG_NUM_EXTRA_LINES);
  const gutterWidth = Math.max(2, countDigits(last));
  let out = '';
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    const line = lines[lineNumber-1];
    out += indentation + '  ' + chalk.bgWhite.black(lineNumber.toString().padStart(gutterWidth)) + ' ' + line + '\n';
    const columns = markedColumns(span, lineNumber, line);
    if (columns === null) {
      continue;
    }
    const [start, end] = columns;
    out += indentation + '  ' + chalk.bgWhite.black(' '.repeat(gutterWidth)) + ' '
         + ' '.repeat(start) + chalk.red('~'.repeat(Math.max(1, end - start))) + '\n';
  }
  return out;
}

/**
 * The 0-based columns of `line` that `span` covers, end excluded. Lines
 * after the first one are marked from their first non-blank character.
 */
function markedColumns(span: TextSpan, lineNumber: number, line: string): [number, number] | null {
  if (lineNumber < span.start.line || lineNumber > span.end.line) {
    return null;
  }
  const start = lineNumber === span.start.line ? span.start.column-1 : firstIndexOfNonEmpty(line);
  const end = lineNumber === span.end.line ? span.end.column-1 : line.length;
  return [start, end];
}

function firstIndexOfNonEmpty(str: string): number {
  let j = 0;
  while (j < str.length && (str[j] === ' ' || str[j] === '\t')) {
    j++;
  }
  return j;
}
