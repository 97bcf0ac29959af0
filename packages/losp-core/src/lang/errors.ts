/**
 * Error taxonomy shared by every stage of the pipeline.
 *
 * Lex, parse and compile errors are raised before any instruction of the
 * offending text runs. Runtime errors abort the current VM run.
 */

/**
 * Location in source
 */
export interface Location {
  file: string;
  line: number;
  column: number;
}

export abstract class LospError extends Error {
  abstract readonly kind: 'lex' | 'parse' | 'compile' | 'runtime';

  constructor(
    message: string,
    public readonly detail: string,
    public readonly location?: Location
  ) {
    super(message);
    this.name = new.target.name;
  }
}

function formatLocated(kind: string, detail: string, location: Location): string {
  return `${kind} error at ${location.file}:${location.line}:${location.column}: ${detail}`;
}

export class LexError extends LospError {
  readonly kind = 'lex';

  constructor(detail: string, location: Location) {
    super(formatLocated('Lex', detail, location), detail, location);
  }
}

export class ParseError extends LospError {
  readonly kind = 'parse';

  constructor(detail: string, location: Location) {
    super(formatLocated('Parse', detail, location), detail, location);
  }
}

export class CompileError extends LospError {
  readonly kind = 'compile';

  constructor(detail: string, location: Location) {
    super(formatLocated('Compile', detail, location), detail, location);
  }
}

export type RuntimeErrorReason = 'type' | 'arithmetic' | 'arity' | 'unresolved' | 'exhaustion';

/**
 * Raised by the VM. Only the line of the failing instruction is known at
 * run time, so the location column is always 0.
 */
export class RuntimeError extends LospError {
  readonly kind = 'runtime';

  constructor(
    public readonly reason: RuntimeErrorReason,
    detail: string,
    line: number,
    file: string = '<input>'
  ) {
    super(`Runtime error at line ${line}: ${detail}`, detail, { file, line, column: 0 });
  }
}

export class ArityError extends RuntimeError {
  constructor(
    public readonly functionName: string,
    public readonly expected: number,
    public readonly given: number,
    line: number,
    file?: string
  ) {
    super(
      'arity',
      `Function ${functionName} expects ${expected} argument${expected === 1 ? '' : 's'} but got ${given}`,
      line,
      file
    );
  }
}
