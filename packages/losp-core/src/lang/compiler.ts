/**
 * Compiler - walks expression trees once and emits bytecode.
 *
 * Every expression compiles to code that leaves exactly one value on the
 * operand stack. The compiler tracks the stack height of the function being
 * compiled so that a `let` local's slot is the frame-relative stack position
 * its value actually occupies at run time. Names not found in any local
 * scope of the current function compile to global lookups, resolved only
 * when the code runs.
 */

import {
  MAX_NESTING_DEPTH,
  type CallExpr,
  type DefnExpr,
  type Expr,
  type LetExpr,
  type LogicalExpr,
  type WhileExpr,
} from './ast.js';
import { Chunk, MAX_U16, MAX_U8, OpCode } from './chunk.js';
import { CompileError, type Location } from './errors.js';
import { parse } from './parser.js';
import { LospFunction, makeFunction, makeString, theNil, type Value } from './value.js';

/**
 * Local variable binding
 */
interface Local {
  name: string;
  /** Frame-relative stack position */
  slot: number;
}

/**
 * Lexical scope: the locals one `let` (or a parameter list) introduces
 */
class Scope {
  readonly locals: Local[] = [];

  constructor(public readonly depth: number) {}

  lookup(name: string): Local | null {
    for (let i = this.locals.length - 1; i >= 0; i--) {
      if (this.locals[i].name === name) {
        return this.locals[i];
      }
    }
    return null;
  }
}

/**
 * Per-function compilation state. The top-level program is compiled as a
 * function without parameters.
 */
class FunctionState {
  private readonly scopes: Scope[] = [];

  /** Operand stack height relative to the frame base */
  stackDepth: number = 0;

  constructor(public readonly chunk: Chunk) {}

  beginScope(): void {
    this.scopes.push(new Scope(this.scopes.length + 1));
  }

  endScope(): void {
    const scope = this.scopes.pop();
    if (process.env.DEBUG_SCOPE && scope) {
      console.error(
        `[Compiler] ${this.chunk.name}: closing scope depth=${scope.depth} (${scope.locals.map((l) => l.name).join(', ')})`
      );
    }
  }

  /**
   * Declare a local for the value currently on top of the stack
   */
  declareLocal(name: string, location: Location): Local {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) {
      throw new CompileError(`No open scope for local ${name}`, location);
    }
    const slot = this.stackDepth - 1;
    if (slot > MAX_U16) {
      throw new CompileError(`Too many locals in ${this.chunk.name}`, location);
    }
    const local: Local = { name, slot };
    scope.locals.push(local);
    if (process.env.DEBUG_SCOPE) {
      console.error(`[Compiler] ${this.chunk.name}: ${name} -> slot ${slot} (scope depth=${scope.depth})`);
    }
    return local;
  }

  /**
   * Innermost binding wins
   */
  resolve(name: string): Local | null {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const local = this.scopes[i].lookup(name);
      if (local) {
        return local;
      }
    }
    return null;
  }

  emit(op: OpCode, line: number, stackEffect: number): void {
    this.chunk.writeOp(op, line);
    this.stackDepth += stackEffect;
  }

  emitU16(op: OpCode, operand: number, line: number, stackEffect: number): void {
    this.chunk.writeOp(op, line);
    this.chunk.writeU16(operand, line);
    this.stackDepth += stackEffect;
  }
}

/**
 * Operators compiled straight to instructions instead of calls
 */
interface Builtin {
  opcode: OpCode;
  shape: 'unary' | 'binary' | 'variadic';
  /** Instruction for the one-operand form of a variadic operator */
  unary?: OpCode;
}

const BUILTINS: ReadonlyMap<string, Builtin> = new Map<string, Builtin>([
  ['+', { opcode: OpCode.Add, shape: 'variadic' }],
  ['-', { opcode: OpCode.Subtract, shape: 'variadic', unary: OpCode.Negate }],
  ['*', { opcode: OpCode.Multiply, shape: 'variadic' }],
  ['/', { opcode: OpCode.Divide, shape: 'variadic' }],
  ['=', { opcode: OpCode.Equal, shape: 'binary' }],
  ['<', { opcode: OpCode.Less, shape: 'binary' }],
  ['>', { opcode: OpCode.Greater, shape: 'binary' }],
  ['<=', { opcode: OpCode.LessEqual, shape: 'binary' }],
  ['>=', { opcode: OpCode.GreaterEqual, shape: 'binary' }],
  ['not', { opcode: OpCode.Not, shape: 'unary' }],
  ['print', { opcode: OpCode.Print, shape: 'unary' }],
]);

export interface CompilerOptions {
  /** File name recorded in chunks */
  file?: string;
}

export class Compiler {
  private readonly file: string;
  /** Compound forms enclosing the one being compiled */
  private depth: number = 0;

  constructor(options: CompilerOptions = {}) {
    this.file = options.file ?? '<input>';
  }

  /**
   * Compile top-level forms into one chunk. The chunk evaluates the forms
   * in order and returns the value of the last one (nil when empty).
   */
  compileProgram(forms: Expr[], name: string = '<script>'): Chunk {
    const fn = new FunctionState(new Chunk(name, this.file));
    const line = forms.length > 0 ? forms[forms.length - 1].location.line : 1;
    this.compileSequence(forms, fn, line);
    fn.emit(OpCode.Return, line, -1);
    return fn.chunk;
  }

  private compileExpr(expr: Expr, fn: FunctionState): void {
    if (expr.kind === 'literal' || expr.kind === 'symbol') {
      this.compileForm(expr, fn);
      return;
    }
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new CompileError(`Expression nested deeper than ${MAX_NESTING_DEPTH} levels`, expr.location);
    }
    this.depth++;
    try {
      this.compileForm(expr, fn);
    } finally {
      this.depth--;
    }
  }

  private compileForm(expr: Expr, fn: FunctionState): void {
    const line = expr.location.line;

    switch (expr.kind) {
      case 'literal':
        this.emitConstant(expr.value, fn, expr.location);
        return;
      case 'symbol':
        this.compileVariable(expr.name, fn, expr.location);
        return;
      case 'def':
        this.compileExpr(expr.value, fn);
        fn.emitU16(OpCode.SetGlobal, this.makeConstant(makeString(expr.name), fn, expr.location), line, 0);
        return;
      case 'let':
        this.compileLet(expr, fn);
        return;
      case 'if': {
        this.compileExpr(expr.condition, fn);
        const elseJump = this.emitJump(OpCode.JumpIfFalse, fn, line);
        this.compileExpr(expr.consequent, fn);
        const endJump = this.emitJump(OpCode.Jump, fn, line);
        this.patchJump(elseJump, fn, expr.location);
        // Only one branch runs: the alternative starts from the same height
        fn.stackDepth -= 1;
        this.compileExpr(expr.alternative, fn);
        this.patchJump(endJump, fn, expr.location);
        return;
      }
      case 'when': {
        this.compileExpr(expr.condition, fn);
        const elseJump = this.emitJump(OpCode.JumpIfFalse, fn, line);
        this.compileSequence(expr.body, fn, line);
        const endJump = this.emitJump(OpCode.Jump, fn, line);
        this.patchJump(elseJump, fn, expr.location);
        fn.stackDepth -= 1;
        this.emitConstant(theNil, fn, expr.location);
        this.patchJump(endJump, fn, expr.location);
        return;
      }
      case 'do':
        this.compileSequence(expr.body, fn, line);
        return;
      case 'defn':
        this.compileDefn(expr, fn);
        return;
      case 'while':
        this.compileWhile(expr, fn);
        return;
      case 'and':
      case 'or':
        this.compileLogical(expr, fn);
        return;
      case 'call':
        this.compileCall(expr, fn);
        return;
    }
  }

  /**
   * Evaluate forms in order, keeping only the last value
   */
  private compileSequence(body: Expr[], fn: FunctionState, line: number): void {
    if (body.length === 0) {
      this.emitConstant(theNil, fn, { file: this.file, line, column: 0 });
      return;
    }
    body.forEach((expr, i) => {
      this.compileExpr(expr, fn);
      if (i < body.length - 1) {
        fn.emit(OpCode.Pop, expr.location.line, -1);
      }
    });
  }

  private compileVariable(name: string, fn: FunctionState, location: Location): void {
    const local = fn.resolve(name);
    if (local) {
      fn.emitU16(OpCode.GetLocal, local.slot, location.line, 1);
      return;
    }
    fn.emitU16(OpCode.GetGlobal, this.makeConstant(makeString(name), fn, location), location.line, 1);
  }

  /**
   * Initializers run left to right, each one seeing the bindings before it.
   * On exit TRUNCATE moves the body's value down onto the first local's slot.
   */
  private compileLet(expr: LetExpr, fn: FunctionState): void {
    const base = fn.stackDepth;
    const seen = new Set<string>();

    fn.beginScope();
    for (const binding of expr.bindings) {
      if (seen.has(binding.name)) {
        throw new CompileError(`Duplicate binding ${binding.name} in let`, binding.location);
      }
      seen.add(binding.name);
      this.compileExpr(binding.init, fn);
      fn.declareLocal(binding.name, binding.location);
    }
    this.compileSequence(expr.body, fn, expr.location.line);
    fn.endScope();

    if (expr.bindings.length > 0) {
      fn.emitU16(OpCode.Truncate, base, expr.location.line, base + 1 - fn.stackDepth);
    }
  }

  private compileWhile(expr: WhileExpr, fn: FunctionState): void {
    const line = expr.location.line;
    const loopStart = fn.chunk.size;

    this.compileExpr(expr.condition, fn);
    const exitJump = this.emitJump(OpCode.JumpIfFalse, fn, line);
    this.compileSequence(expr.body, fn, line);
    fn.emit(OpCode.Pop, line, -1);
    this.emitLoop(loopStart, fn, expr.location);
    this.patchJump(exitJump, fn, expr.location);

    this.emitConstant(theNil, fn, expr.location);
  }

  /**
   * Short-circuit: the value of the operand that decided the outcome
   */
  private compileLogical(expr: LogicalExpr, fn: FunctionState): void {
    const line = expr.location.line;
    const endJumps: number[] = [];

    expr.operands.forEach((operand, i) => {
      this.compileExpr(operand, fn);
      if (i === expr.operands.length - 1) {
        return;
      }
      fn.emit(OpCode.Dup, line, 1);
      if (expr.kind === 'and') {
        endJumps.push(this.emitJump(OpCode.JumpIfFalse, fn, line));
      } else {
        const nextOperand = this.emitJump(OpCode.JumpIfFalse, fn, line);
        endJumps.push(this.emitJump(OpCode.Jump, fn, line));
        this.patchJump(nextOperand, fn, expr.location);
      }
      fn.emit(OpCode.Pop, line, -1);
    });

    for (const jump of endJumps) {
      this.patchJump(jump, fn, expr.location);
    }
  }

  /**
   * The body gets a fresh function state: parameters occupy slots 0..N-1 and
   * nothing from the enclosing scopes is visible.
   */
  private compileDefn(expr: DefnExpr, fn: FunctionState): void {
    const inner = new FunctionState(new Chunk(expr.name, this.file));
    const seen = new Set<string>();

    inner.beginScope();
    for (const param of expr.params) {
      if (seen.has(param.name)) {
        throw new CompileError(`Duplicate parameter ${param.name} in ${expr.name}`, param.location);
      }
      seen.add(param.name);
      // Arguments are already on the stack when the body starts
      inner.stackDepth += 1;
      inner.declareLocal(param.name, param.location);
    }
    this.compileSequence(expr.body, inner, expr.location.line);
    inner.endScope();
    inner.emit(OpCode.Return, expr.location.line, -1);

    const value = makeFunction(new LospFunction(expr.name, expr.params.length, inner.chunk));
    this.emitConstant(value, fn, expr.location);
    fn.emitU16(OpCode.SetGlobal, this.makeConstant(makeString(expr.name), fn, expr.location), expr.location.line, 0);
  }

  private compileCall(expr: CallExpr, fn: FunctionState): void {
    const callee = expr.callee;
    if (callee.kind === 'symbol' && !fn.resolve(callee.name)) {
      const builtin = BUILTINS.get(callee.name);
      if (builtin) {
        this.compileBuiltin(callee.name, builtin, expr, fn);
        return;
      }
    }

    if (expr.args.length > MAX_U8) {
      throw new CompileError(`Too many arguments in call: ${expr.args.length} (at most ${MAX_U8})`, expr.location);
    }

    this.compileExpr(callee, fn);
    for (const arg of expr.args) {
      this.compileExpr(arg, fn);
    }
    fn.chunk.writeOp(OpCode.Call, expr.location.line);
    fn.chunk.write(expr.args.length, expr.location.line);
    fn.stackDepth -= expr.args.length;
  }

  private compileBuiltin(name: string, builtin: Builtin, expr: CallExpr, fn: FunctionState): void {
    const args = expr.args;
    const line = expr.location.line;

    switch (builtin.shape) {
      case 'unary':
        if (args.length !== 1) {
          throw new CompileError(`${name} expects 1 operand but got ${args.length}`, expr.location);
        }
        this.compileExpr(args[0], fn);
        fn.emit(builtin.opcode, line, 0);
        return;
      case 'binary':
        if (args.length !== 2) {
          throw new CompileError(`${name} expects 2 operands but got ${args.length}`, expr.location);
        }
        this.compileExpr(args[0], fn);
        this.compileExpr(args[1], fn);
        fn.emit(builtin.opcode, line, -1);
        return;
      case 'variadic': {
        if (args.length === 1 && builtin.unary !== undefined) {
          this.compileExpr(args[0], fn);
          fn.emit(builtin.unary, line, 0);
          return;
        }
        if (args.length < 2) {
          const minimum = builtin.unary !== undefined ? 1 : 2;
          throw new CompileError(
            `${name} expects at least ${minimum} operand${minimum === 1 ? '' : 's'} but got ${args.length}`,
            expr.location
          );
        }
        // Fold left: (- a b c) is (a - b) - c
        this.compileExpr(args[0], fn);
        for (const arg of args.slice(1)) {
          this.compileExpr(arg, fn);
          fn.emit(builtin.opcode, line, -1);
        }
        return;
      }
    }
  }

  // ============ Emission helpers ============

  private makeConstant(value: Value, fn: FunctionState, location: Location): number {
    const index = fn.chunk.addConstant(value);
    if (index > MAX_U16) {
      throw new CompileError(`Too many constants in ${fn.chunk.name}`, location);
    }
    return index;
  }

  private emitConstant(value: Value, fn: FunctionState, location: Location): void {
    fn.emitU16(OpCode.Constant, this.makeConstant(value, fn, location), location.line, 1);
  }

  /**
   * Emit a jump with a placeholder distance; returns the operand offset
   * for patchJump
   */
  private emitJump(op: OpCode.Jump | OpCode.JumpIfFalse, fn: FunctionState, line: number): number {
    fn.emitU16(op, MAX_U16, line, op === OpCode.JumpIfFalse ? -1 : 0);
    return fn.chunk.size - 2;
  }

  /**
   * Point a previously emitted jump at the current end of the chunk
   */
  private patchJump(operandOffset: number, fn: FunctionState, location: Location): void {
    const distance = fn.chunk.size - operandOffset - 2;
    if (distance > MAX_U16) {
      throw new CompileError('Too much code to jump over', location);
    }
    fn.chunk.patchU16(operandOffset, distance);
  }

  private emitLoop(loopStart: number, fn: FunctionState, location: Location): void {
    // Distance is measured from the end of the LOOP instruction
    const distance = fn.chunk.size + 3 - loopStart;
    if (distance > MAX_U16) {
      throw new CompileError('Loop body too large', location);
    }
    fn.emitU16(OpCode.Loop, distance, location.line, 0);
  }
}

/**
 * Parse and compile source text into a program chunk
 */
export function compile(source: string, file: string = '<input>'): Chunk {
  return new Compiler({ file }).compileProgram(parse(source, file));
}
