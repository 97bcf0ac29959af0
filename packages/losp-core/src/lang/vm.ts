/**
 * Virtual Machine - executes compiled chunks.
 *
 * The VM maintains:
 * - One operand stack shared by every frame; a frame's locals start at its
 *   base offset (the position of its first argument)
 * - A call-frame stack, one entry per active call
 * - The global table, which outlives single runs so that REPL entries see
 *   earlier definitions
 */

import { type Chunk, type DecodedInstruction, OpCode, decodeInstruction } from './chunk.js';
import { ArityError, RuntimeError, type RuntimeErrorReason } from './errors.js';
import {
  type ArithmeticOperator,
  type ComparisonOperator,
  type LospFunction,
  type Value,
  OperationError,
  arithmetic,
  compare,
  describeValue,
  isTruthy,
  makeBool,
  negate,
  renderValue,
  theNil,
  valuesEqual,
} from './value.js';

/**
 * What the trace tap sees before each instruction executes
 */
export interface TraceStep {
  chunk: Chunk;
  instruction: DecodedInstruction;
  /** Copy of the operand stack; changing it has no effect on the run */
  stack: readonly Value[];
  frameDepth: number;
}

export interface VMOptions {
  /** Maximum number of active call frames */
  maxFrames?: number;
  /** Maximum operand stack size */
  maxStack?: number;
  /** Receives everything `print` writes */
  output?: (text: string) => void;
  /** Called before every instruction */
  trace?: (step: TraceStep) => void;
}

export const DEFAULT_MAX_FRAMES = 1000;
export const DEFAULT_MAX_STACK = 10000;

/**
 * Call frame
 */
interface CallFrame {
  /** Null for the top-level program */
  fn: LospFunction | null;
  chunk: Chunk;
  /** Next instruction to execute in `chunk` */
  ip: number;
  /** Stack index of slot 0 */
  base: number;
}

export class VM {
  /** Global table; `def` inserts or overwrites, nothing deletes */
  readonly globals = new Map<string, Value>();

  private stack: Value[] = [];
  private frames: CallFrame[] = [];

  /** Offset of the instruction being executed, for error reporting */
  private instructionStart: number = 0;

  private readonly maxFrames: number;
  private readonly maxStack: number;
  private readonly output: (text: string) => void;
  private readonly trace: ((step: TraceStep) => void) | null;

  constructor(options: VMOptions = {}) {
    this.maxFrames = options.maxFrames ?? DEFAULT_MAX_FRAMES;
    this.maxStack = options.maxStack ?? DEFAULT_MAX_STACK;
    this.output = options.output ?? ((text) => process.stdout.write(text));
    this.trace = options.trace ?? null;
  }

  defineGlobal(name: string, value: Value): void {
    this.globals.set(name, value);
  }

  getGlobal(name: string): Value | undefined {
    return this.globals.get(name);
  }

  /**
   * Get current stack size
   */
  stackSize(): number {
    return this.stack.length;
  }

  /**
   * Run a program chunk to completion and return the value it produced.
   * Stacks start empty on every run; globals are kept.
   */
  run(chunk: Chunk): Value {
    this.initStack();
    this.frames.push({ fn: null, chunk, ip: 0, base: 0 });
    return this.execute();
  }

  private initStack(): void {
    this.stack = [];
    this.frames = [];
    this.instructionStart = 0;
  }

  /**
   * The dispatch loop
   */
  private execute(): Value {
    let frame = this.currentFrame();

    while (true) {
      this.instructionStart = frame.ip;

      if (this.trace) {
        this.trace({
          chunk: frame.chunk,
          instruction: decodeInstruction(frame.chunk, frame.ip),
          stack: this.stack.slice(),
          frameDepth: this.frames.length,
        });
      }

      const op = frame.chunk.code[frame.ip++];

      switch (op) {
        case OpCode.Constant:
          this.push(frame.chunk.constants[this.readU16(frame)]);
          break;

        case OpCode.Pop:
          this.pop();
          break;

        case OpCode.Dup:
          this.push(this.peek());
          break;

        case OpCode.GetLocal:
          this.push(this.stack[frame.base + this.readU16(frame)]);
          break;

        case OpCode.GetGlobal: {
          const name = this.readName(frame);
          const value = this.globals.get(name);
          if (value === undefined) {
            throw this.error('unresolved', `Unresolved reference: ${name}`);
          }
          this.push(value);
          break;
        }

        case OpCode.SetGlobal:
          // The value stays on the stack as the result of the definition
          this.globals.set(this.readName(frame), this.peek());
          break;

        case OpCode.Truncate: {
          const slot = this.readU16(frame);
          const result = this.pop();
          this.stack.length = frame.base + slot;
          this.push(result);
          break;
        }

        case OpCode.Jump: {
          const distance = this.readU16(frame);
          frame.ip += distance;
          break;
        }

        case OpCode.JumpIfFalse: {
          const distance = this.readU16(frame);
          if (!isTruthy(this.pop())) {
            frame.ip += distance;
          }
          break;
        }

        case OpCode.Loop: {
          const distance = this.readU16(frame);
          frame.ip -= distance;
          break;
        }

        case OpCode.Call: {
          const argc = frame.chunk.code[frame.ip++];
          frame = this.callValue(argc);
          break;
        }

        case OpCode.Return: {
          const result = this.pop();
          const finished = this.popFrame();
          if (this.frames.length === 0) {
            this.stack.length = 0;
            return result;
          }
          // Drop the callee and its locals, leave the result in its place
          this.stack.length = finished.base - 1;
          this.push(result);
          frame = this.currentFrame();
          break;
        }

        case OpCode.Add:
          this.arithmetic('+');
          break;
        case OpCode.Subtract:
          this.arithmetic('-');
          break;
        case OpCode.Multiply:
          this.arithmetic('*');
          break;
        case OpCode.Divide:
          this.arithmetic('/');
          break;

        case OpCode.Negate: {
          const value = this.pop();
          this.push(this.guard(() => negate(value)));
          break;
        }

        case OpCode.Not:
          this.push(makeBool(!isTruthy(this.pop())));
          break;

        case OpCode.Equal: {
          const b = this.pop();
          const a = this.pop();
          this.push(makeBool(valuesEqual(a, b)));
          break;
        }

        case OpCode.Less:
          this.comparison('<');
          break;
        case OpCode.Greater:
          this.comparison('>');
          break;
        case OpCode.LessEqual:
          this.comparison('<=');
          break;
        case OpCode.GreaterEqual:
          this.comparison('>=');
          break;

        case OpCode.Print:
          this.output(`${renderValue(this.pop())}\n`);
          this.push(theNil);
          break;

        default:
          throw new Error(`Unknown opcode ${op} at offset ${this.instructionStart} in ${frame.chunk.name}`);
      }
    }
  }

  /**
   * The callee sits below its arguments; the arguments become the new
   * frame's first locals in place.
   */
  private callValue(argc: number): CallFrame {
    const calleeIndex = this.stack.length - 1 - argc;
    const callee = this.stack[calleeIndex];

    if (callee.kind !== 'function') {
      throw this.error('type', `Cannot call ${describeValue(callee)}: not a function`);
    }

    const fn = callee.fn;
    if (argc !== fn.arity) {
      const { line, file } = this.currentPosition();
      throw new ArityError(fn.name, fn.arity, argc, line, file);
    }

    if (this.frames.length >= this.maxFrames) {
      throw this.error('exhaustion', `Call stack exhausted: more than ${this.maxFrames} frames while calling ${fn.name}`);
    }

    const frame: CallFrame = { fn, chunk: fn.chunk, ip: 0, base: calleeIndex + 1 };
    this.frames.push(frame);
    if (process.env.DEBUG_VM) {
      console.error(`[VM] call ${fn.name}/${argc} base=${frame.base} depth=${this.frames.length}`);
    }
    return frame;
  }

  private popFrame(): CallFrame {
    const frame = this.frames.pop();
    if (!frame) {
      throw new Error('Control stack underflow');
    }
    if (process.env.DEBUG_VM && frame.fn) {
      console.error(`[VM] return from ${frame.fn.name} depth=${this.frames.length}`);
    }
    return frame;
  }

  private arithmetic(op: ArithmeticOperator): void {
    const b = this.pop();
    const a = this.pop();
    this.push(this.guard(() => arithmetic(op, a, b)));
  }

  private comparison(op: ComparisonOperator): void {
    const b = this.pop();
    const a = this.pop();
    this.push(this.guard(() => compare(op, a, b)));
  }

  /**
   * Attach the current line to failures of value operations
   */
  private guard(operation: () => Value): Value {
    try {
      return operation();
    } catch (e) {
      if (e instanceof OperationError) {
        throw this.error(e.reason, e.message);
      }
      throw e;
    }
  }

  private currentFrame(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new Error('No active frame');
    }
    return frame;
  }

  private currentPosition(): { line: number; file: string } {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      return { line: 0, file: '<input>' };
    }
    return { line: frame.chunk.lineAt(this.instructionStart), file: frame.chunk.file };
  }

  private error(reason: RuntimeErrorReason, detail: string): RuntimeError {
    const { line, file } = this.currentPosition();
    return new RuntimeError(reason, detail, line, file);
  }

  private readU16(frame: CallFrame): number {
    const value = frame.chunk.readU16(frame.ip);
    frame.ip += 2;
    return value;
  }

  private readName(frame: CallFrame): string {
    const constant = frame.chunk.constants[this.readU16(frame)];
    if (constant.kind !== 'string') {
      throw new Error(`Global name constant is a ${constant.kind} in ${frame.chunk.name}`);
    }
    return constant.value;
  }

  private push(value: Value): void {
    if (this.stack.length >= this.maxStack) {
      throw this.error('exhaustion', `Operand stack exhausted: more than ${this.maxStack} values`);
    }
    this.stack.push(value);
  }

  private pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new Error('Stack underflow');
    }
    return value;
  }

  private peek(): Value {
    if (this.stack.length === 0) {
      throw new Error('Stack underflow');
    }
    return this.stack[this.stack.length - 1];
  }
}
