/**
 * Lexer tests
 */

import { describe, it, expect } from 'vitest';
import { LexError } from './errors.js';
import { Lexer, TokenType, tokenize, type Token } from './lexer.js';

function types(source: string): TokenType[] {
  return tokenize(source).map((t) => t.type);
}

function texts(source: string): string[] {
  return tokenize(source).map((t) => t.text);
}

describe('Lexer', () => {
  describe('Punctuation and symbols', () => {
    it('should tokenize a simple call', () => {
      expect(types('(+ 1 2)')).toEqual([
        TokenType.OpenParen,
        TokenType.Symbol,
        TokenType.Int,
        TokenType.Int,
        TokenType.CloseParen,
        TokenType.EOF,
      ]);
    });

    it('should end with exactly one EOF token', () => {
      const tokens = tokenize('');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe(TokenType.EOF);
    });

    it('should treat operators and punctuation-heavy names as symbols', () => {
      const tokens = tokenize('- + <= foo-bar? a.b');
      expect(tokens.slice(0, 5).every((t) => t.type === TokenType.Symbol)).toBe(true);
      expect(texts('- + <= foo-bar? a.b')).toEqual(['-', '+', '<=', 'foo-bar?', 'a.b', '']);
    });

    it('should split atoms at parens and quotes', () => {
      expect(texts('(a(b)c"d")')).toEqual(['(', 'a', '(', 'b', ')', 'c', '"d"', ')', '']);
    });
  });

  describe('Keywords', () => {
    it('should recognize every keyword', () => {
      const tokens = tokenize('def let if when do defn while nil true false and or');
      const keywords = tokens.flatMap((t) => (t.type === TokenType.Keyword ? [t.keyword] : []));
      expect(keywords).toEqual(['def', 'let', 'if', 'when', 'do', 'defn', 'while', 'nil', 'true', 'false', 'and', 'or']);
    });

    it('should not treat keyword prefixes as keywords', () => {
      const [token] = tokenize('define');
      expect(token.type).toBe(TokenType.Symbol);
    });
  });

  describe('Numbers', () => {
    it('should scan integers as bigint values', () => {
      const [token] = tokenize('-42');
      expect(token.type).toBe(TokenType.Int);
      if (token.type === TokenType.Int) {
        expect(token.value).toBe(-42n);
      }
    });

    it('should scan floats with a single dot anywhere', () => {
      const values = tokenize('1.5 .1 1. -0.5').flatMap((t) => (t.type === TokenType.Float ? [t.value] : []));
      expect(values).toEqual([1.5, 0.1, 1, -0.5]);
    });

    it('should keep the largest int64 literal', () => {
      const [token] = tokenize('9223372036854775807');
      expect(token.type === TokenType.Int && token.value).toBe(9223372036854775807n);
    });

    it('should reject integer literals outside int64', () => {
      expect(() => tokenize('9223372036854775808')).toThrow(LexError);
    });

    it('should reject numbers with more than one dot', () => {
      expect(() => tokenize('(+ 1.2.3 4)')).toThrow('Lex error at <input>:1:4: Malformed number: 1.2.3');
    });
  });

  describe('Strings', () => {
    it('should keep contents without processing escapes', () => {
      const [token] = tokenize('"a\\nb"');
      expect(token.type === TokenType.String && token.value).toBe('a\\nb');
    });

    it('should allow strings spanning lines', () => {
      const [token, next] = tokenize('"one\ntwo" x');
      expect(token.type === TokenType.String && token.value).toBe('one\ntwo');
      expect(next.location).toEqual({ file: '<input>', line: 2, column: 6 });
    });

    it('should report an unterminated string at its opening quote', () => {
      expect(() => tokenize('(print\n  "abc')).toThrow('Lex error at <input>:2:3: Unterminated string');
    });
  });

  describe('Whitespace and comments', () => {
    it('should skip comments to the end of the line', () => {
      expect(texts('1 ; a comment (\n2')).toEqual(['1', '2', '']);
    });

    it('should track line and column', () => {
      const tokens: Token[] = tokenize('(def x\n  10)', 'prog.losp');
      expect(tokens[3].location).toEqual({ file: 'prog.losp', line: 2, column: 3 });
    });
  });

  describe('Lazy sequence', () => {
    it('should restart from the beginning on every iteration', () => {
      const lexer = new Lexer('(a b)');
      expect([...lexer].map((t) => t.text)).toEqual([...lexer].map((t) => t.text));
    });

    it('should yield tokens before a later error', () => {
      const iterator = new Lexer('a 1..2')[Symbol.iterator]();
      const first = iterator.next();
      expect(first.done).toBe(false);
      expect(first.value?.text).toBe('a');
      expect(() => iterator.next()).toThrow(LexError);
    });
  });
});
