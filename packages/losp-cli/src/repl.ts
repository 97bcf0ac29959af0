/**
 * Interactive read-compile-execute-print loop
 */

import * as readline from 'node:readline';
import { Interpreter, LexError, Lexer, TokenType, UNTERMINATED_STRING, inspectValue } from 'losp-core';
import { Tracer } from './format.js';

/**
 * True while the text still has open parens or an open string. Other lexical
 * problems count as complete so that evaluation reports them.
 */
export function isIncomplete(source: string): boolean {
  let depth = 0;
  try {
    for (const token of new Lexer(source)) {
      if (token.type === TokenType.OpenParen) {
        depth++;
      } else if (token.type === TokenType.CloseParen) {
        depth--;
      }
    }
  } catch (error) {
    if (error instanceof LexError) {
      return error.detail === UNTERMINATED_STRING;
    }
    throw error;
  }
  return depth > 0;
}

/**
 * Only whitespace and comments
 */
function isBlank(source: string): boolean {
  const [first] = new Lexer(source);
  return first.type === TokenType.EOF;
}

export interface ReplSessionOptions {
  /** Trace every instruction */
  trace?: boolean;
  /** Program output, value echoes and trace lines */
  write?: (text: string) => void;
  /** Error reports */
  writeError?: (text: string) => void;
}

/**
 * One REPL session: input lines in, echoes and errors out. Every complete
 * entry runs against the same interpreter, so definitions carry over.
 */
export class ReplSession {
  readonly interpreter: Interpreter;

  private pending: string[] = [];
  private readonly trace: boolean;
  private readonly write: (text: string) => void;
  private readonly writeError: (text: string) => void;

  constructor(options: ReplSessionOptions = {}) {
    this.trace = options.trace ?? false;
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.writeError = options.writeError ?? ((text) => process.stderr.write(text));

    const tracer = this.trace ? new Tracer((line) => this.write(`${line}\n`)) : null;
    this.interpreter = new Interpreter({ output: this.write, trace: tracer?.step });
  }

  get prompt(): string {
    if (this.pending.length > 0) {
      return '... ';
    }
    return this.trace ? 'losp[debug]> ' : 'losp> ';
  }

  /**
   * Take one line of input; evaluates once the accumulated entry is complete
   */
  feed(line: string): void {
    this.pending.push(line);
    const source = this.pending.join('\n');
    if (isIncomplete(source)) {
      return;
    }

    this.pending = [];

    try {
      if (isBlank(source)) {
        return;
      }
      const value = this.interpreter.evaluate(source, '<repl>');
      this.write(`${inspectValue(value)}\n`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.writeError(`Error: ${message}\n`);
      if (process.env.DEBUG && error instanceof Error) {
        this.writeError(`${error.stack}\n`);
      }
    }
  }
}

/**
 * Run a session on stdin/stdout until end of input
 */
export function startRepl(options: { trace: boolean }): Promise<void> {
  const session = new ReplSession({ trace: options.trace });
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
  });

  return new Promise((resolve) => {
    rl.setPrompt(session.prompt);
    rl.prompt();

    rl.on('line', (line) => {
      session.feed(line);
      rl.setPrompt(session.prompt);
      rl.prompt();
    });

    rl.on('close', () => {
      process.stdout.write('\n');
      resolve();
    });
  });
}
