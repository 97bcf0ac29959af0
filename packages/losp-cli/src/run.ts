/**
 * File runner
 */

import * as fs from 'node:fs';
import { Interpreter, type Value } from 'losp-core';
import { Tracer, disassemble } from './format.js';

export interface RunOptions {
  /** Disassemble the program and trace every instruction */
  trace?: boolean;
  write?: (text: string) => void;
}

/**
 * Compile a whole program, then run it. Nothing runs when any form fails
 * to compile.
 */
export function runProgram(source: string, file: string, options: RunOptions = {}): Value {
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  const writeLine = (line: string): void => write(`${line}\n`);
  const tracer = options.trace ? new Tracer(writeLine) : null;

  const interpreter = new Interpreter({ output: write, trace: tracer?.step });
  const chunk = interpreter.compile(source, file);
  if (options.trace) {
    disassemble(chunk).forEach(writeLine);
  }
  return interpreter.vm.run(chunk);
}

export function runFile(path: string, options: RunOptions = {}): Value {
  const source = fs.readFileSync(path, 'utf-8');
  return runProgram(source, path, options);
}
