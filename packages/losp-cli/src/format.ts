/**
 * Disassembly and trace presentation.
 *
 * Instruction lines read `OOOO LLLL NAME operands`, followed by `=> value`
 * for instructions that reference a constant and `-> offset` for jumps. The
 * line column shows `|` while consecutive instructions share a source line.
 */

import {
  type Chunk,
  type DecodedInstruction,
  type TraceStep,
  type Value,
  OpCode,
  inspectValue,
  instructions,
} from 'losp-core';

export function formatInstruction(instruction: DecodedInstruction, previousLine: number | null): string {
  const offset = String(instruction.offset).padStart(4, '0');
  const line = instruction.line === previousLine ? '   |' : String(instruction.line).padStart(4, ' ');

  let text = `${offset} ${line} ${instruction.name}`;
  if (instruction.operands.length > 0) {
    text += ` ${instruction.operands.join(' ')}`;
  }
  if (instruction.constant) {
    text += ` => ${inspectValue(instruction.constant)}`;
  } else if (instruction.target !== undefined) {
    text += ` -> ${instruction.target}`;
  }
  return text;
}

export function formatStack(stack: readonly Value[]): string {
  return `[${stack.map(inspectValue).join(', ')}]`;
}

/**
 * `== name ==` followed by one line per instruction
 */
export function disassemble(chunk: Chunk): string[] {
  const lines = [`== ${chunk.name} ==`];
  let previousLine: number | null = null;
  for (const instruction of instructions(chunk)) {
    lines.push(formatInstruction(instruction, previousLine));
    previousLine = instruction.line;
  }
  return lines;
}

/**
 * Turns VM trace steps into lines. Nested frames are indented by two spaces
 * per level, and a function's chunk is disassembled when the constant
 * holding it is loaded.
 */
export class Tracer {
  private previousChunk: Chunk | null = null;
  private previousLine: number | null = null;

  constructor(private readonly writeLine: (line: string) => void) {}

  readonly step = (step: TraceStep): void => {
    const { instruction } = step;

    if (instruction.opcode === OpCode.Constant && instruction.constant?.kind === 'function') {
      for (const line of disassemble(instruction.constant.fn.chunk)) {
        this.writeLine(line);
      }
    }

    const previousLine = step.chunk === this.previousChunk ? this.previousLine : null;
    const indent = '  '.repeat(Math.max(0, step.frameDepth - 1));
    this.writeLine(`${indent}${formatInstruction(instruction, previousLine)}  ${formatStack(step.stack)}`);

    this.previousChunk = step.chunk;
    this.previousLine = instruction.line;
  };
}
