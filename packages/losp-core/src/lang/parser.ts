/**
 * Parser - builds one expression tree per top-level form.
 *
 * Purely structural: special forms are recognised by their head keyword and
 * checked for shape, nothing is resolved or type checked here.
 */

import { MAX_NESTING_DEPTH, type DefnExpr, type Expr, type LetBinding, type LetExpr, type Param } from './ast.js';
import { ParseError, type Location } from './errors.js';
import { Lexer, TokenType, type Token } from './lexer.js';
import { makeFloat, makeInt, makeString, theFalse, theNil, theTrue } from './value.js';

export class Parser {
  private readonly tokens: Iterator<Token>;
  private lookahead: Token | null = null;
  /** Open lists enclosing the current position */
  private depth: number = 0;

  constructor(tokens: Iterable<Token>) {
    this.tokens = tokens[Symbol.iterator]();
  }

  /**
   * Parse every remaining form
   */
  parse(): Expr[] {
    return [...this.forms()];
  }

  /**
   * Yield top-level forms one at a time until the end of input
   */
  *forms(): Generator<Expr> {
    while (this.peek().type !== TokenType.EOF) {
      yield this.parseForm();
    }
  }

  private parseForm(): Expr {
    const token = this.next();

    switch (token.type) {
      case TokenType.Int:
        return { kind: 'literal', value: makeInt(token.value), location: token.location };
      case TokenType.Float:
        return { kind: 'literal', value: makeFloat(token.value), location: token.location };
      case TokenType.String:
        return { kind: 'literal', value: makeString(token.value), location: token.location };
      case TokenType.Symbol:
        return { kind: 'symbol', name: token.text, location: token.location };
      case TokenType.Keyword:
        switch (token.keyword) {
          case 'nil':
            return { kind: 'literal', value: theNil, location: token.location };
          case 'true':
            return { kind: 'literal', value: theTrue, location: token.location };
          case 'false':
            return { kind: 'literal', value: theFalse, location: token.location };
          default:
            throw this.error(`Unexpected keyword '${token.keyword}' outside of head position`, token);
        }
      case TokenType.OpenParen:
        return this.parseNested(token.location);
      case TokenType.CloseParen:
        throw this.error(`Unexpected ')'`, token);
      case TokenType.EOF:
        throw this.error('Unexpected end of input', token);
    }
  }

  private parseNested(location: Location): Expr {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new ParseError(`Expression nested deeper than ${MAX_NESTING_DEPTH} levels`, location);
    }
    this.depth++;
    try {
      return this.parseList(location);
    } finally {
      this.depth--;
    }
  }

  /**
   * The opening paren has been consumed; the head decides the shape
   */
  private parseList(location: Location): Expr {
    const head = this.peek();

    if (head.type === TokenType.CloseParen) {
      throw this.error('Empty form ()', head);
    }

    if (head.type === TokenType.Keyword) {
      switch (head.keyword) {
        case 'def':
          this.next();
          return this.parseDef(location);
        case 'let':
          this.next();
          return this.parseLet(location);
        case 'if':
          this.next();
          return this.parseIf(location);
        case 'when': {
          this.next();
          const [condition, ...body] = this.parseConditionalBody('when', location);
          return { kind: 'when', condition, body, location };
        }
        case 'while': {
          this.next();
          const [condition, ...body] = this.parseConditionalBody('while', location);
          return { kind: 'while', condition, body, location };
        }
        case 'do':
          this.next();
          return { kind: 'do', body: this.parseBody(), location };
        case 'defn':
          this.next();
          return this.parseDefn(location);
        case 'and':
        case 'or': {
          this.next();
          const operands = this.parseBody();
          if (operands.length === 0) {
            throw new ParseError(`${head.keyword} requires at least one operand`, location);
          }
          return { kind: head.keyword, operands, location };
        }
        default:
          // nil, true and false in head position are ordinary (failing) calls
          break;
      }
    }

    const callee = this.parseForm();
    return { kind: 'call', callee, args: this.parseBody(), location };
  }

  private parseDef(location: Location): Expr {
    const name = this.expectSymbol('def name');
    const value = this.parseForm();
    this.expectClose('def');
    return { kind: 'def', name: name.text, value, location };
  }

  /**
   * Bindings are read pairwise: a parenthesized element is `(name init)`,
   * a bare symbol takes the next element as its initializer. So
   * `((a 1) b 1)`, `((a 1) (b 2))` and `(a 1)` are all accepted.
   */
  private parseLet(location: Location): LetExpr {
    const open = this.next();
    if (open.type !== TokenType.OpenParen) {
      throw this.error(`Expected '(' to open let bindings but found ${describeToken(open)}`, open);
    }

    const bindings: LetBinding[] = [];
    while (true) {
      const token = this.next();
      if (token.type === TokenType.CloseParen) {
        break;
      }

      if (token.type === TokenType.OpenParen) {
        const name = this.expectSymbol('let binding name');
        const init = this.parseForm();
        this.expectClose('let binding');
        bindings.push({ name: name.text, init, location: token.location });
      } else if (token.type === TokenType.Symbol) {
        if (this.peek().type === TokenType.CloseParen) {
          throw this.error(`Missing initializer for let binding '${token.text}'`, token);
        }
        const init = this.parseForm();
        bindings.push({ name: token.text, init, location: token.location });
      } else {
        throw this.error(`Expected let binding but found ${describeToken(token)}`, token);
      }
    }

    return { kind: 'let', bindings, body: this.parseBody(), location };
  }

  private parseIf(location: Location): Expr {
    const parts = this.parseBody();
    if (parts.length !== 3) {
      throw new ParseError(
        `if requires a condition, a consequent and an alternative, got ${parts.length} expression${parts.length === 1 ? '' : 's'}`,
        location
      );
    }
    const [condition, consequent, alternative] = parts;
    return { kind: 'if', condition, consequent, alternative, location };
  }

  private parseConditionalBody(form: string, location: Location): [Expr, ...Expr[]] {
    const [condition, ...body] = this.parseBody();
    if (condition === undefined) {
      throw new ParseError(`${form} requires a condition`, location);
    }
    return [condition, ...body];
  }

  private parseDefn(location: Location): DefnExpr {
    const name = this.expectSymbol('defn name');

    const open = this.next();
    if (open.type !== TokenType.OpenParen) {
      throw this.error(`Expected '(' to open the parameter list of ${name.text} but found ${describeToken(open)}`, open);
    }

    const params: Param[] = [];
    while (true) {
      const token = this.next();
      if (token.type === TokenType.CloseParen) {
        break;
      }
      if (token.type !== TokenType.Symbol) {
        throw this.error(`Expected parameter name but found ${describeToken(token)}`, token);
      }
      params.push({ name: token.text, location: token.location });
    }

    return { kind: 'defn', name: name.text, params, body: this.parseBody(), location };
  }

  /**
   * Forms up to and including the closing paren
   */
  private parseBody(): Expr[] {
    const forms: Expr[] = [];
    while (true) {
      const token = this.peek();
      if (token.type === TokenType.CloseParen) {
        this.next();
        return forms;
      }
      if (token.type === TokenType.EOF) {
        throw this.error(`Expected ')' but found end of input`, token);
      }
      forms.push(this.parseForm());
    }
  }

  private expectSymbol(what: string): Token {
    const token = this.next();
    if (token.type !== TokenType.Symbol) {
      throw this.error(`Expected symbol for ${what} but found ${describeToken(token)}`, token);
    }
    return token;
  }

  private expectClose(form: string): void {
    const token = this.next();
    if (token.type !== TokenType.CloseParen) {
      throw this.error(`Expected ')' to close ${form} but found ${describeToken(token)}`, token);
    }
  }

  private peek(): Token {
    if (!this.lookahead) {
      this.lookahead = this.pull();
    }
    return this.lookahead;
  }

  private next(): Token {
    const token = this.peek();
    // EOF stays as the lookahead once reached
    if (token.type !== TokenType.EOF) {
      this.lookahead = null;
    }
    return token;
  }

  private pull(): Token {
    const result = this.tokens.next();
    if (result.done) {
      throw new Error('Token stream ended without an EOF token');
    }
    return result.value;
  }

  private error(message: string, token: Token): ParseError {
    return new ParseError(message, token.location);
  }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.String:
      return token.text;
    default:
      return `'${token.text}'`;
  }
}

/**
 * Parse losp source code
 */
export function parse(source: string, file: string = '<input>'): Expr[] {
  return new Parser(new Lexer(source, file)).parse();
}

/**
 * Parse a single losp expression
 */
export function parseOne(source: string): Expr {
  const forms = parse(source);
  if (forms.length === 0) {
    throw new ParseError('No expression to parse', { file: '<input>', line: 1, column: 1 });
  }
  if (forms.length > 1) {
    throw new ParseError('Multiple expressions found, expected one', forms[1].location);
  }
  return forms[0];
}
