/**
 * Expression tree produced by the parser, one tree per top-level form.
 * The compiler only reads these nodes.
 */

import type { Location } from './errors.js';
import type { BoolValue, FloatValue, IntValue, NilValue, StringValue } from './value.js';

/** Deepest nesting of compound forms the parser and compiler accept */
export const MAX_NESTING_DEPTH = 1000;

export type LiteralValue = NilValue | BoolValue | IntValue | FloatValue | StringValue;

export interface LiteralExpr {
  kind: 'literal';
  value: LiteralValue;
  location: Location;
}

export interface SymbolExpr {
  kind: 'symbol';
  name: string;
  location: Location;
}

/** (def name value) */
export interface DefExpr {
  kind: 'def';
  name: string;
  value: Expr;
  location: Location;
}

export interface LetBinding {
  name: string;
  init: Expr;
  location: Location;
}

/** (let ((name init)...) body...) */
export interface LetExpr {
  kind: 'let';
  bindings: LetBinding[];
  body: Expr[];
  location: Location;
}

/** (if condition consequent alternative) */
export interface IfExpr {
  kind: 'if';
  condition: Expr;
  consequent: Expr;
  alternative: Expr;
  location: Location;
}

/** (when condition body...) */
export interface WhenExpr {
  kind: 'when';
  condition: Expr;
  body: Expr[];
  location: Location;
}

/** (do body...) */
export interface DoExpr {
  kind: 'do';
  body: Expr[];
  location: Location;
}

export interface Param {
  name: string;
  location: Location;
}

/** (defn name (params...) body...) */
export interface DefnExpr {
  kind: 'defn';
  name: string;
  params: Param[];
  body: Expr[];
  location: Location;
}

/** (while condition body...) */
export interface WhileExpr {
  kind: 'while';
  condition: Expr;
  body: Expr[];
  location: Location;
}

/** (and operands...) / (or operands...) */
export interface LogicalExpr {
  kind: 'and' | 'or';
  operands: Expr[];
  location: Location;
}

/** (callee args...) */
export interface CallExpr {
  kind: 'call';
  callee: Expr;
  args: Expr[];
  location: Location;
}

export type Expr =
  | LiteralExpr
  | SymbolExpr
  | DefExpr
  | LetExpr
  | IfExpr
  | WhenExpr
  | DoExpr
  | DefnExpr
  | WhileExpr
  | LogicalExpr
  | CallExpr;
