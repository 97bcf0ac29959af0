/**
 * Runtime value system.
 *
 * Values are a closed tagged union so that every operation below is an
 * exhaustive switch: adding a variant makes the compiler point at each place
 * that must learn about it.
 */

import type { Chunk } from './chunk.js';
import type { RuntimeErrorReason } from './errors.js';

export interface NilValue {
  readonly kind: 'nil';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** 64-bit signed integer, always kept within [INT64_MIN, INT64_MAX] */
export interface IntValue {
  readonly kind: 'int';
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface FunctionValue {
  readonly kind: 'function';
  readonly fn: LospFunction;
}

export type Value = NilValue | BoolValue | IntValue | FloatValue | StringValue | FunctionValue;

export type ValueKind = Value['kind'];

/**
 * A compiled function: its name, declared parameter count and body.
 * Functions capture nothing from the scope they were defined in.
 */
export class LospFunction {
  constructor(
    public readonly name: string,
    public readonly arity: number,
    public readonly chunk: Chunk
  ) {}
}

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;

export const theNil: NilValue = { kind: 'nil' };
export const theTrue: BoolValue = { kind: 'bool', value: true };
export const theFalse: BoolValue = { kind: 'bool', value: false };

export function makeBool(value: boolean): BoolValue {
  return value ? theTrue : theFalse;
}

export function makeInt(value: bigint | number): IntValue {
  return { kind: 'int', value: typeof value === 'bigint' ? value : BigInt(value) };
}

export function makeFloat(value: number): FloatValue {
  return { kind: 'float', value };
}

export function makeString(value: string): StringValue {
  return { kind: 'string', value };
}

export function makeFunction(fn: LospFunction): FunctionValue {
  return { kind: 'function', fn };
}

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/**
 * Failure of a value-level operation. The VM turns it into a RuntimeError
 * carrying the line of the instruction that failed.
 */
export class OperationError extends Error {
  constructor(
    public readonly reason: RuntimeErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'OperationError';
  }
}

/**
 * nil, false, 0, 0.0 and "" are falsy; everything else is truthy
 */
export function isTruthy(value: Value): boolean {
  switch (value.kind) {
    case 'nil':
      return false;
    case 'bool':
      return value.value;
    case 'int':
      return value.value !== 0n;
    case 'float':
      return value.value !== 0;
    case 'string':
      return value.value.length > 0;
    case 'function':
      return true;
  }
}

/**
 * Structural equality. Never coerces: (= 1 1.0) is false.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'nil':
      return b.kind === 'nil';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'function':
      return b.kind === 'function' && a.fn === b.fn;
  }
}

export type ArithmeticOperator = '+' | '-' | '*' | '/';

export type ComparisonOperator = '<' | '>' | '<=' | '>=';

function toFloat(value: Value): number | null {
  switch (value.kind) {
    case 'int':
      return Number(value.value);
    case 'float':
      return value.value;
    default:
      return null;
  }
}

function wideIntArithmetic(op: ArithmeticOperator, x: bigint, y: bigint): bigint {
  switch (op) {
    case '+':
      return x + y;
    case '-':
      return x - y;
    case '*':
      return x * y;
    case '/':
      if (y === 0n) {
        throw new OperationError('arithmetic', `Integer division by zero: ${x} / 0`);
      }
      // bigint division truncates toward zero
      return x / y;
  }
}

function intArithmetic(op: ArithmeticOperator, x: bigint, y: bigint): bigint {
  const result = wideIntArithmetic(op, x, y);
  if (!isInt64(result)) {
    throw new OperationError('arithmetic', `Integer overflow: ${x} ${op} ${y}`);
  }
  return result;
}

function floatArithmetic(op: ArithmeticOperator, x: number, y: number): number {
  switch (op) {
    case '+':
      return x + y;
    case '-':
      return x - y;
    case '*':
      return x * y;
    case '/':
      return x / y;
  }
}

/**
 * Int with Int stays Int; a Float on either side coerces both to Float.
 */
export function arithmetic(op: ArithmeticOperator, a: Value, b: Value): Value {
  if (a.kind === 'int' && b.kind === 'int') {
    return makeInt(intArithmetic(op, a.value, b.value));
  }
  const x = toFloat(a);
  const y = toFloat(b);
  if (x === null || y === null) {
    throw new OperationError('type', `Cannot apply ${op} to ${describeValue(a)} and ${describeValue(b)}`);
  }
  return makeFloat(floatArithmetic(op, x, y));
}

export function compare(op: ComparisonOperator, a: Value, b: Value): BoolValue {
  let order: number;
  if (a.kind === 'int' && b.kind === 'int') {
    order = a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  } else {
    const x = toFloat(a);
    const y = toFloat(b);
    if (x === null || y === null) {
      throw new OperationError('type', `Cannot compare ${describeValue(a)} with ${describeValue(b)} using ${op}`);
    }
    if (Number.isNaN(x) || Number.isNaN(y)) {
      return theFalse;
    }
    order = x < y ? -1 : x > y ? 1 : 0;
  }
  switch (op) {
    case '<':
      return makeBool(order < 0);
    case '>':
      return makeBool(order > 0);
    case '<=':
      return makeBool(order <= 0);
    case '>=':
      return makeBool(order >= 0);
  }
}

export function negate(value: Value): Value {
  switch (value.kind) {
    case 'int': {
      const result = -value.value;
      if (!isInt64(result)) {
        throw new OperationError('arithmetic', `Integer overflow: -(${value.value})`);
      }
      return makeInt(result);
    }
    case 'float':
      return makeFloat(-value.value);
    default:
      throw new OperationError('type', `Cannot negate ${describeValue(value)}`);
  }
}

function renderFloat(x: number): string {
  if (Number.isNaN(x)) return 'NaN';
  if (x === Infinity) return 'inf';
  if (x === -Infinity) return '-inf';
  if (Object.is(x, -0)) return '-0.0';
  const text = expandExponent(String(x));
  return text.includes('.') ? text : `${text}.0`;
}

/**
 * Rewrite exponent notation ("1e+24", "-1.5e-7") as a plain decimal with
 * the same digits
 */
function expandExponent(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Textual rendering used by `print`
 */
export function renderValue(value: Value): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
      return value.value.toString();
    case 'float':
      return renderFloat(value.value);
    case 'string':
      return value.value;
    case 'function':
      return `<fn ${value.fn.name}>`;
  }
}

/**
 * Rendering used by the REPL echo and by diagnostics: strings are quoted
 */
export function inspectValue(value: Value): string {
  if (value.kind === 'string') {
    return `"${value.value}"`;
  }
  return renderValue(value);
}

export function typeName(value: Value): ValueKind {
  return value.kind;
}

/**
 * "int 5", "string \"a\"", "nil"
 */
export function describeValue(value: Value): string {
  if (value.kind === 'nil') {
    return 'nil';
  }
  return `${typeName(value)} ${inspectValue(value)}`;
}
