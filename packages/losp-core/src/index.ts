/**
 * losp core - lexer, parser, bytecode compiler and stack VM for the losp
 * language.
 */

export * from './lang/errors.js';
export * from './lang/value.js';
export * from './lang/chunk.js';
export type * from './lang/ast.js';
export { MAX_NESTING_DEPTH } from './lang/ast.js';
export { Lexer, TokenType, KEYWORDS, UNTERMINATED_STRING, isKeyword, tokenize } from './lang/lexer.js';
export type { Token, Keyword } from './lang/lexer.js';
export { Parser, parse, parseOne } from './lang/parser.js';
export { Compiler, compile } from './lang/compiler.js';
export type { CompilerOptions } from './lang/compiler.js';
export { VM, DEFAULT_MAX_FRAMES, DEFAULT_MAX_STACK } from './lang/vm.js';
export type { TraceStep, VMOptions } from './lang/vm.js';
export { Interpreter } from './interpreter.js';
export type { InterpreterOptions } from './interpreter.js';
