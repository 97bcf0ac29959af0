/**
 * End-to-end tests - source text through the whole pipeline
 */

import { describe, it, expect } from 'vitest';
import { CompileError, ParseError, RuntimeError } from './lang/errors.js';
import { inspectValue, renderValue } from './lang/value.js';
import { Interpreter } from './interpreter.js';

function session(): { interpreter: Interpreter; output: string[]; run: (source: string) => string } {
  const output: string[] = [];
  const interpreter = new Interpreter({ output: (text) => output.push(text) });
  return { interpreter, output, run: (source) => inspectValue(interpreter.evaluate(source)) };
}

describe('Interpreter', () => {
  describe('Programs', () => {
    it('should define and read globals', () => {
      const { run } = session();
      expect(run('(def pi 3.14159) pi')).toBe('3.14159');
    });

    it('should call user functions', () => {
      const { run } = session();
      expect(run('(defn foo (a b) (+ a b)) (foo 2 3)')).toBe('5');
    });

    it('should evaluate let', () => {
      const { run } = session();
      expect(run('(let ((a 1) (b 2)) (+ a b))')).toBe('3');
    });

    it('should loop with while over globals', () => {
      const { run } = session();
      expect(run('(def i 0) (while (< i 10) (def i (+ i 1))) i')).toBe('10');
    });

    it('should accumulate in a loop', () => {
      const { run } = session();
      expect(run('(def total 0) (def i 1) (while (<= i 4) (def total (+ total i)) (def i (+ i 1))) total')).toBe('10');
    });

    it('should recurse', () => {
      const { run } = session();
      expect(run('(defn fib (n) (if (< n 2) n (+ (fib (- n 1)) (fib (- n 2))))) (fib 15)')).toBe('610');
    });

    it('should pass functions as values', () => {
      const { run } = session();
      expect(run('(defn twice (f x) (f (f x))) (defn inc (n) (+ n 1)) (twice inc 5)')).toBe('7');
    });

    it('should evaluate def and defn to what they bind', () => {
      const { run } = session();
      expect(run('(def x 5)')).toBe('5');
      expect(run('(defn foo () 1)')).toBe('<fn foo>');
    });
  });

  describe('Numbers', () => {
    it('should coerce mixed arithmetic to float', () => {
      const { run } = session();
      expect(run('(+ 1 .1)')).toBe('1.1');
      expect(run('(/ 1 2.0)')).toBe('0.5');
      expect(run('(* 2 1.5)')).toBe('3.0');
    });

    it('should keep integer arithmetic integral', () => {
      const { run } = session();
      expect(run('(/ 7 2)')).toBe('3');
      expect(run('(- 3)')).toBe('-3');
    });

    it('should not consider 1 and 1.0 equal', () => {
      const { run } = session();
      expect(run('(= 1 1.0)')).toBe('false');
      expect(run('(= 1 1)')).toBe('true');
    });

    it('should fail integer division by zero', () => {
      const { interpreter } = session();
      expect(() => interpreter.evaluate('(/ 1 0)')).toThrow('Runtime error at line 1: Integer division by zero: 1 / 0');
    });
  });

  describe('Scoping', () => {
    it('should shadow globals inside let only', () => {
      const { run } = session();
      expect(run('(def x 1) (let (x 2) x)')).toBe('2');
      expect(run('x')).toBe('1');
    });

    it('should shadow outer let bindings', () => {
      const { run } = session();
      expect(run('(let (x 1) (+ (let (x 10) x) x))')).toBe('11');
    });

    it('should not leak parameters into globals', () => {
      const { interpreter, run } = session();
      run('(defn f (secret) secret) (f 1)');
      expect(() => interpreter.evaluate('secret')).toThrow('Unresolved reference: secret');
    });
  });

  describe('Conditionals', () => {
    it('should evaluate when and while to nil when the condition is false', () => {
      const { run, output } = session();
      expect(run('(when false (print "no"))')).toBe('nil');
      expect(run('(while false (print "no"))')).toBe('nil');
      expect(output).toEqual([]);
    });

    it('should pick the if branch by truthiness', () => {
      const { run } = session();
      expect(run('(if 0 "yes" "no")')).toBe('"no"');
      expect(run('(if "" "yes" "no")')).toBe('"no"');
      expect(run('(if "0" "yes" "no")')).toBe('"yes"');
    });

    it('should yield the deciding operand of and/or', () => {
      const { run } = session();
      expect(run('(or nil 0 "x")')).toBe('"x"');
      expect(run('(and 1 nil 2)')).toBe('nil');
      expect(run('(and 1 2)')).toBe('2');
      expect(run('(not nil)')).toBe('true');
    });

    it('should not evaluate operands after the deciding one', () => {
      const { run, output } = session();
      run('(or 1 (print "skipped")) (and false (print "skipped"))');
      expect(output).toEqual([]);
    });
  });

  describe('Output', () => {
    it('should print large and small floats as plain decimals', () => {
      const { run, output } = session();
      run('(print (* 1000000000000.0 1000000000000.0)) (print 0.0000001)');
      expect(output).toEqual(['1000000000000000000000000.0\n', '0.0000001\n']);
      expect(run('(* 1000000000000.0 1000000000000.0)')).toBe('1000000000000000000000000.0');
    });

    it('should print in evaluation order', () => {
      const { interpreter, output } = session();
      const result = interpreter.evaluate('(print 1) (print "a") (print 2.0)');
      expect(renderValue(result)).toBe('nil');
      expect(output.join('')).toBe('1\na\n2.0\n');
    });
  });

  describe('Errors', () => {
    it('should run nothing when a later form fails to compile', () => {
      const { interpreter, output } = session();
      expect(() => interpreter.evaluate('(print 1) (let (a 1 a 2) a)')).toThrow(CompileError);
      expect(output).toEqual([]);
    });

    it('should run nothing when a later form fails to parse', () => {
      const { interpreter, output } = session();
      expect(() => interpreter.evaluate('(print 1) (print 2')).toThrow(ParseError);
      expect(output).toEqual([]);
    });

    it('should keep globals defined before a runtime error', () => {
      const { interpreter, run } = session();
      expect(() => interpreter.evaluate('(def a 1) (missing)')).toThrow(RuntimeError);
      expect(run('a')).toBe('1');
    });

    it('should report arity errors with expected and given counts', () => {
      const { interpreter } = session();
      expect(() => interpreter.evaluate('(defn f (a b) a)\n(f 1)', 'prog.losp')).toThrow(
        'Runtime error at line 2: Function f expects 2 arguments but got 1'
      );
    });
  });

  describe('Compilation', () => {
    it('should compile without running', () => {
      const { interpreter, output } = session();
      const chunk = interpreter.compile('(def y 1) (print y)', 'prog.losp');
      expect(chunk.file).toBe('prog.losp');
      expect(output).toEqual([]);
      expect(interpreter.vm.getGlobal('y')).toBeUndefined();
    });
  });
});
