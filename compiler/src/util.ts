
import chalk from "chalk";

import { LARCH_VERBOSE } from "./constants";

export const prettyPrintTag = Symbol('pretty printer');

export interface PrettyPrintable {
  [prettyPrintTag](): string;
}

export function isPrettyPrintable(value: unknown): value is PrettyPrintable {
  return typeof value === 'object'
      && value !== null
      && prettyPrintTag in value
      && typeof value[prettyPrintTag] === 'function';
}

export function prettyPrint(value: PrettyPrintable): string {
  return value[prettyPrintTag]();
}

export type MapLike<T> = { [key: string]: T };

export type FormatArg = string | number | boolean | PrettyPrintable | FormatArg[];

export class AssertionError extends Error {

}

export function assert(test: boolean, message = 'Assertion failed. See the stack trace for more information.'): asserts test {
  if (!test) {
    throw new AssertionError(message);
  }
}

export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export const ok = <T>(val: T) => ({ ok: val });

export const err = <T>(val: T) => ({ err: val });

function isFormatArg(value: unknown): value is FormatArg {
  if (Array.isArray(value)) {
    return value.every(isFormatArg);
  }
  return typeof value === 'string'
      || typeof value === 'number'
      || typeof value === 'boolean'
      || isPrettyPrintable(value);
}

function formatArg(value: FormatArg): string {
  if (Array.isArray(value)) {
    return value.map(formatArg).join(', ');
  }
  if (isPrettyPrintable(value)) {
    return prettyPrint(value);
  }
  return String(value);
}

/**
 * Replaces every `{name}` in the template with the printed value of
 * `args[name]`.
 */
export function format(template: string, args: MapLike<unknown>): string {
  return template.replace(/\{([a-zA-Z0-9_]+)\}/g, (_match, key: string) => {
    const value = args[key];
    if (!isFormatArg(value)) {
      throw new Error(`Could not format template argument '${key}'.`);
    }
    return formatArg(value);
  });
}

export function countDigits(num: number, base = 10): number {
  return num === 0 ? 1 : Math.floor(Math.log(num) / Math.log(base)) + 1;
}

/**
 * Derives a name from `name` that `isTaken` rejects, by bumping a numeric
 * suffix: `x` becomes `x2`, `x2` becomes `x3` and `x1` becomes `x2`.
 */
export function uniqueName(name: string, isTaken: (candidate: string) => boolean): string {
  const match = name.match(/^(.*?)(\d+)$/);
  const base = match === null ? name : match[1];
  let count = match === null ? 2 : Number(match[2]) + 1;
  let candidate = base + count;
  while (isTaken(candidate)) {
    candidate = base + ++count;
  }
  return candidate;
}

export function verbose(message: string): void {
  if (LARCH_VERBOSE) {
    process.stderr.write(chalk.dim(`verbose: ${message}`) + '\n');
  }
}
