/**
 * Lexer - turns source text into a lazy sequence of tokens.
 *
 * Whitespace and `;` comments are skipped. Everything that is not a paren or
 * a string is scanned as an atom (a maximal run of non-delimiter characters)
 * and then classified as a number, a keyword or a symbol.
 */

import { LexError, type Location } from './errors.js';
import { isInt64 } from './value.js';

/**
 * Token types
 */
export enum TokenType {
  Int = 'int',
  Float = 'float',
  String = 'string',
  Symbol = 'symbol',
  Keyword = 'keyword',
  OpenParen = '(',
  CloseParen = ')',
  EOF = 'EOF',
}

export const KEYWORDS = [
  'def',
  'let',
  'if',
  'when',
  'do',
  'defn',
  'while',
  'nil',
  'true',
  'false',
  'and',
  'or',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);

export function isKeyword(text: string): text is Keyword {
  return keywordSet.has(text);
}

interface TokenBase {
  /** Source text of the token */
  text: string;
  location: Location;
}

export interface IntToken extends TokenBase {
  type: TokenType.Int;
  value: bigint;
}

export interface FloatToken extends TokenBase {
  type: TokenType.Float;
  value: number;
}

export interface StringToken extends TokenBase {
  type: TokenType.String;
  /** Contents without the surrounding quotes */
  value: string;
}

export interface SymbolToken extends TokenBase {
  type: TokenType.Symbol;
}

export interface KeywordToken extends TokenBase {
  type: TokenType.Keyword;
  keyword: Keyword;
}

export interface PunctuationToken extends TokenBase {
  type: TokenType.OpenParen | TokenType.CloseParen | TokenType.EOF;
}

export type Token = IntToken | FloatToken | StringToken | SymbolToken | KeywordToken | PunctuationToken;

export const UNTERMINATED_STRING = 'Unterminated string';

/** Optional sign, then digits and dots with at least one digit */
const NUMERIC_ATOM = /^-?[0-9.]*[0-9][0-9.]*$/;

/**
 * Scan state for one pass over the input
 */
class Scanner {
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(
    private readonly input: string,
    private readonly file: string
  ) {}

  next(): Token {
    this.skipWhitespaceAndComments();
    const location = this.currentLocation();

    if (this.isAtEnd()) {
      return { type: TokenType.EOF, text: '', location };
    }

    const c = this.peek();
    if (c === '(') {
      this.advance();
      return { type: TokenType.OpenParen, text: c, location };
    }
    if (c === ')') {
      this.advance();
      return { type: TokenType.CloseParen, text: c, location };
    }
    if (c === '"') {
      return this.scanString(location);
    }
    return this.scanAtom(location);
  }

  /**
   * No escape sequences: the string ends at the next double quote
   */
  private scanString(location: Location): StringToken {
    this.advance();
    let value = '';
    while (!this.isAtEnd() && this.peek() !== '"') {
      value += this.advance();
    }
    if (this.isAtEnd()) {
      throw new LexError(UNTERMINATED_STRING, location);
    }
    this.advance();
    return { type: TokenType.String, text: `"${value}"`, value, location };
  }

  private scanAtom(location: Location): Token {
    let text = '';
    while (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
      text += this.advance();
    }

    if (NUMERIC_ATOM.test(text)) {
      return this.classifyNumber(text, location);
    }
    if (isKeyword(text)) {
      return { type: TokenType.Keyword, text, keyword: text, location };
    }
    return { type: TokenType.Symbol, text, location };
  }

  private classifyNumber(text: string, location: Location): IntToken | FloatToken {
    const dots = text.split('.').length - 1;
    if (dots === 0) {
      const value = BigInt(text);
      if (!isInt64(value)) {
        throw new LexError(`Integer literal out of range: ${text}`, location);
      }
      return { type: TokenType.Int, text, value, location };
    }
    if (dots === 1) {
      return { type: TokenType.Float, text, value: Number(text), location };
    }
    throw new LexError(`Malformed number: ${text}`, location);
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();

      if (this.isWhitespace(c)) {
        this.advance();
      } else if (c === ';') {
        // Skip comment until end of line
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f';
  }

  private isDelimiter(c: string): boolean {
    return this.isWhitespace(c) || c === '(' || c === ')' || c === '"' || c === ';';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private currentLocation(): Location {
    return { file: this.file, line: this.line, column: this.column };
  }
}

/**
 * Lazy token sequence. Every iteration scans the source again from the
 * start and ends with exactly one EOF token.
 */
export class Lexer implements Iterable<Token> {
  constructor(
    private readonly source: string,
    private readonly file: string = '<input>'
  ) {}

  *[Symbol.iterator](): Generator<Token> {
    const scanner = new Scanner(this.source, this.file);
    while (true) {
      const token = scanner.next();
      if (process.env.DEBUG_TOKENS) {
        console.error(`[Lexer] ${token.type} '${token.text}' at ${token.location.line}:${token.location.column}`);
      }
      yield token;
      if (token.type === TokenType.EOF) {
        return;
      }
    }
  }
}

/**
 * Scan the whole source eagerly
 */
export function tokenize(source: string, file: string = '<input>'): Token[] {
  return [...new Lexer(source, file)];
}
