/**
 * File runner tests
 */

import { describe, it, expect } from 'vitest';
import { ParseError, renderValue } from 'losp-core';
import { runProgram } from './run.js';

describe('runProgram', () => {
  it('should run every form and return the last value', () => {
    const out: string[] = [];
    const result = runProgram('(def n 3)\n(print (* n n))\nn', 'prog.losp', { write: (text) => out.push(text) });
    expect(out).toEqual(['9\n']);
    expect(renderValue(result)).toBe('3');
  });

  it('should disassemble the program before tracing it', () => {
    const out: string[] = [];
    runProgram('42', 'prog.losp', { trace: true, write: (text) => out.push(text) });
    expect(out).toEqual([
      '== <script> ==\n',
      '0000    1 CONSTANT 0 => 42\n',
      '0003    | RETURN\n',
      '0000    1 CONSTANT 0 => 42  []\n',
      '0003    | RETURN  [42]\n',
    ]);
  });

  it('should not run anything when the program does not parse', () => {
    const out: string[] = [];
    expect(() => runProgram('(print 1)\n(print', 'bad.losp', { write: (text) => out.push(text) })).toThrow(
      "Parse error at bad.losp:2:7: Expected ')' but found end of input"
    );
    expect(out).toEqual([]);
  });

  it('should surface runtime errors with their line', () => {
    expect(() => runProgram('(print 1)\n(+ 1 nil)', 'prog.losp', { write: () => undefined })).toThrow(
      'Runtime error at line 2: Cannot apply + to int 1 and nil'
    );
  });

  it('should use the error types of the core', () => {
    expect(() => runProgram('(', 'prog.losp', { write: () => undefined })).toThrow(ParseError);
  });
});
