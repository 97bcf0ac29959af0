/**
 * Instruction set and compiled chunks.
 *
 * A chunk is a flat byte stream: each instruction is one opcode byte followed
 * by its operand bytes (u16 operands are big-endian, CALL takes a single u8).
 * Jump operands are unsigned distances measured from the end of the jump
 * instruction: JUMP and JUMP_IF_FALSE move forward, LOOP moves backward.
 */

import type { Value } from './value.js';

export enum OpCode {
  Constant,
  Pop,
  Dup,
  GetLocal,
  GetGlobal,
  SetGlobal,
  Truncate,
  Jump,
  JumpIfFalse,
  Loop,
  Call,
  Return,
  Add,
  Subtract,
  Multiply,
  Divide,
  Negate,
  Not,
  Equal,
  Less,
  Greater,
  LessEqual,
  GreaterEqual,
  Print,
}

/**
 * What an instruction's operand refers to
 */
export type OperandKind = 'none' | 'constant' | 'slot' | 'jump' | 'loop' | 'argc';

export interface OpCodeInfo {
  name: string;
  operand: OperandKind;
}

export const OPCODE_INFO: Record<OpCode, OpCodeInfo> = {
  [OpCode.Constant]: { name: 'CONSTANT', operand: 'constant' },
  [OpCode.Pop]: { name: 'POP', operand: 'none' },
  [OpCode.Dup]: { name: 'DUP', operand: 'none' },
  [OpCode.GetLocal]: { name: 'GET_LOCAL', operand: 'slot' },
  [OpCode.GetGlobal]: { name: 'GET_GLOBAL', operand: 'constant' },
  [OpCode.SetGlobal]: { name: 'SET_GLOBAL', operand: 'constant' },
  [OpCode.Truncate]: { name: 'TRUNCATE', operand: 'slot' },
  [OpCode.Jump]: { name: 'JUMP', operand: 'jump' },
  [OpCode.JumpIfFalse]: { name: 'JUMP_IF_FALSE', operand: 'jump' },
  [OpCode.Loop]: { name: 'LOOP', operand: 'loop' },
  [OpCode.Call]: { name: 'CALL', operand: 'argc' },
  [OpCode.Return]: { name: 'RETURN', operand: 'none' },
  [OpCode.Add]: { name: 'ADD', operand: 'none' },
  [OpCode.Subtract]: { name: 'SUBTRACT', operand: 'none' },
  [OpCode.Multiply]: { name: 'MULTIPLY', operand: 'none' },
  [OpCode.Divide]: { name: 'DIVIDE', operand: 'none' },
  [OpCode.Negate]: { name: 'NEGATE', operand: 'none' },
  [OpCode.Not]: { name: 'NOT', operand: 'none' },
  [OpCode.Equal]: { name: 'EQUAL', operand: 'none' },
  [OpCode.Less]: { name: 'LESS', operand: 'none' },
  [OpCode.Greater]: { name: 'GREATER', operand: 'none' },
  [OpCode.LessEqual]: { name: 'LESS_EQUAL', operand: 'none' },
  [OpCode.GreaterEqual]: { name: 'GREATER_EQUAL', operand: 'none' },
  [OpCode.Print]: { name: 'PRINT', operand: 'none' },
};

export const MAX_U8 = 0xff;
export const MAX_U16 = 0xffff;

export function isOpCode(byte: number): byte is OpCode {
  return typeof OpCode[byte] === 'string';
}

/**
 * Size in bytes of an instruction with the given operand kind
 */
export function instructionSize(operand: OperandKind): number {
  switch (operand) {
    case 'none':
      return 1;
    case 'argc':
      return 2;
    default:
      return 3;
  }
}

/**
 * Intern key for constants; functions are never shared between slots
 */
function internKey(value: Value): string | null {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'bool':
      return `b:${value.value}`;
    case 'int':
      return `i:${value.value}`;
    case 'float':
      return `f:${Object.is(value.value, -0) ? '-0' : value.value}`;
    case 'string':
      return `s:${value.value}`;
    case 'function':
      return null;
  }
}

export class Chunk {
  /** Opcode and operand bytes */
  readonly code: number[] = [];

  /** Source line of every byte in `code` */
  readonly lines: number[] = [];

  /** Constant pool */
  readonly constants: Value[] = [];

  private readonly interned = new Map<string, number>();

  constructor(
    public readonly name: string,
    public readonly file: string = '<input>'
  ) {}

  get size(): number {
    return this.code.length;
  }

  write(byte: number, line: number): void {
    this.code.push(byte & 0xff);
    this.lines.push(line);
  }

  writeOp(op: OpCode, line: number): void {
    this.write(op, line);
  }

  writeU16(value: number, line: number): void {
    this.write((value >> 8) & 0xff, line);
    this.write(value & 0xff, line);
  }

  readU16(offset: number): number {
    return (this.code[offset] << 8) | this.code[offset + 1];
  }

  /**
   * Overwrite a previously written u16 operand (jump backpatching)
   */
  patchU16(offset: number, value: number): void {
    this.code[offset] = (value >> 8) & 0xff;
    this.code[offset + 1] = value & 0xff;
  }

  /**
   * Add a constant to the pool, returning its index. Equal numbers, strings,
   * booleans and nil share one slot.
   */
  addConstant(value: Value): number {
    const key = internKey(value);
    if (key !== null) {
      const existing = this.interned.get(key);
      if (existing !== undefined) {
        return existing;
      }
    }
    const index = this.constants.length;
    this.constants.push(value);
    if (key !== null) {
      this.interned.set(key, index);
    }
    return index;
  }

  lineAt(offset: number): number {
    return offset < this.lines.length ? this.lines[offset] : 0;
  }
}

/**
 * One decoded instruction. This is the data source for disassembly and for
 * the VM's trace tap; how it is printed is up to the caller.
 */
export interface DecodedInstruction {
  offset: number;
  opcode: OpCode;
  name: string;
  operands: number[];
  size: number;
  line: number;
  /** Constant referenced by CONSTANT, GET_GLOBAL and SET_GLOBAL */
  constant?: Value;
  /** Absolute destination of JUMP, JUMP_IF_FALSE and LOOP */
  target?: number;
}

export function decodeInstruction(chunk: Chunk, offset: number): DecodedInstruction {
  const byte = offset < chunk.code.length ? chunk.code[offset] : -1;
  if (!isOpCode(byte)) {
    throw new Error(`Unknown opcode ${byte} at offset ${offset} in ${chunk.name}`);
  }
  const info = OPCODE_INFO[byte];
  const size = instructionSize(info.operand);
  const decoded: DecodedInstruction = {
    offset,
    opcode: byte,
    name: info.name,
    operands: [],
    size,
    line: chunk.lineAt(offset),
  };

  switch (info.operand) {
    case 'none':
      break;
    case 'argc':
      decoded.operands.push(chunk.code[offset + 1]);
      break;
    case 'constant': {
      const index = chunk.readU16(offset + 1);
      decoded.operands.push(index);
      decoded.constant = chunk.constants[index];
      break;
    }
    case 'slot':
      decoded.operands.push(chunk.readU16(offset + 1));
      break;
    case 'jump': {
      const distance = chunk.readU16(offset + 1);
      decoded.operands.push(distance);
      decoded.target = offset + size + distance;
      break;
    }
    case 'loop': {
      const distance = chunk.readU16(offset + 1);
      decoded.operands.push(distance);
      decoded.target = offset + size - distance;
      break;
    }
  }

  return decoded;
}

/**
 * Decode every instruction of a chunk in order
 */
export function* instructions(chunk: Chunk): Generator<DecodedInstruction> {
  let offset = 0;
  while (offset < chunk.code.length) {
    const instruction = decodeInstruction(chunk, offset);
    yield instruction;
    offset += instruction.size;
  }
}
