
import { LARCH_HARD_ERRORS } from "./constants";
import { CompileError, type TextOutput } from "./errors";
import { TextFile } from "./text";

export interface Diagnostics {
  add(diagnostic: CompileError): void;
}

export class DiagnosticIndex implements Diagnostics {

  private diagnostics = new Array<CompileError>();

  public add(diagnostic: CompileError): void {
    this.diagnostics.push(diagnostic);
  }

  public get size(): number {
    return this.diagnostics.length;
  }

  public getAllDiagnostics(): IterableIterator<CompileError> {
    return this.diagnostics[Symbol.iterator]();
  }

}

export interface DiagnosticPrinterOptions {
  hardErrors?: boolean;
  output?: TextOutput;
}

/**
 * Writes every diagnostic to the output as soon as it is added. With hard
 * errors on, the first error is thrown instead.
 */
export class DiagnosticPrinter implements Diagnostics {

  public hasErrors = false;
  public hasFatal = false;

  private hardErrors: boolean;
  private output: TextOutput;

  constructor({
    hardErrors = LARCH_HARD_ERRORS,
    output = process.stderr,
  }: DiagnosticPrinterOptions = {}) {
    this.hardErrors = hardErrors;
    this.output = output;
  }

  public add(diagnostic: CompileError): void {

    switch (diagnostic.severity) {
      case 'error':
        this.hasErrors = true;
        break;
      case 'fatal':
        this.hasFatal = true;
        break;
    }

    if (this.hardErrors && (diagnostic.severity === 'error' || diagnostic.severity === 'fatal')) {
      diagnostic.message = diagnostic.messageText;
      throw diagnostic;
    }

    diagnostic.print(this.output);

  }

}

/**
 * Renders diagnostics as a Markdown list. Each diagnostic is a bullet with
 * its range and message, followed by an indented bullet per related
 * location.
 */
export function printDiagnosticList(diagnostics: Iterable<CompileError>): string {
  let out = '';
  for (const diagnostic of diagnostics) {
    out += diagnostic.span === null
      ? `- ${diagnostic.messageText}\n`
      : `- (${diagnostic.span.format()}) ${diagnostic.messageText}\n`;
    for (const { span, message } of diagnostic.related) {
      out += `  - (${span.format()}) ${message}\n`;
    }
  }
  return out;
}

export function printCheckerTest(name: string, file: TextFile, diagnostics: Iterable<CompileError>): string {
  const text = file.getText();
  let out = `# Checker Test: \`${name}\`\n\n`;
  out += '## Input\n\n';
  out += '```ite\n';
  out += text.endsWith('\n') ? text : text + '\n';
  out += '```\n';
  const errors = printDiagnosticList(diagnostics);
  if (errors.length > 0) {
    out += '\n## Errors\n\n';
    out += errors;
  }
  return out;
}

export interface CheckerTest {
  name: string;
  source: string;
  errors: string[];
}

/**
 * Reads back a fixture written by `printCheckerTest`. Related locations stay
 * attached to the line of the diagnostic they belong to.
 */
export function parseCheckerTest(markdown: string): CheckerTest {

  const lines = markdown.split('\n');

  const heading = lines[0].match(/^# Checker Test: `(.*)`$/);
  if (heading === null) {
    throw new Error(`A checker test must start with a '# Checker Test:' heading.`);
  }
  const name = heading[1];

  const inputStart = lines.indexOf('```ite');
  const inputEnd = lines.indexOf('```', inputStart+1);
  if (inputStart === -1 || inputEnd === -1) {
    throw new Error(`Checker test '${name}' has no input block.`);
  }
  const source = lines.slice(inputStart+1, inputEnd).join('\n');

  const errors: string[] = [];
  const errorsStart = lines.indexOf('## Errors');
  if (errorsStart !== -1) {
    for (const line of lines.slice(errorsStart+1)) {
      if (line.startsWith('- ')) {
        errors.push(line);
      } else if (line.startsWith('  - ') && errors.length > 0) {
        errors[errors.length-1] += '\n' + line;
      }
    }
  }

  return { name, source, errors };
}
