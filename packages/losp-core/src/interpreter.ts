/**
 * Interpreter session: one long-lived VM that successive source texts run
 * against, so later texts see the globals earlier ones defined.
 */

import type { Chunk } from './lang/chunk.js';
import { Compiler } from './lang/compiler.js';
import { Parser } from './lang/parser.js';
import { Lexer } from './lang/lexer.js';
import type { Value } from './lang/value.js';
import { VM, type VMOptions } from './lang/vm.js';

export type InterpreterOptions = VMOptions;

export class Interpreter {
  readonly vm: VM;

  constructor(options: InterpreterOptions = {}) {
    this.vm = new VM(options);
  }

  /**
   * Compile the whole text into one program chunk without running it.
   * Lex, parse and compile errors surface here, before anything executes.
   */
  compile(source: string, file: string = '<input>'): Chunk {
    const forms = new Parser(new Lexer(source, file)).parse();
    return new Compiler({ file }).compileProgram(forms);
  }

  /**
   * Compile and run a text, returning the value of its last form
   */
  evaluate(source: string, file: string = '<input>'): Value {
    return this.vm.run(this.compile(source, file));
  }
}
