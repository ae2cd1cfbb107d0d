/**
 * Bytecode format
 *
 * One opcode byte, then zero or one LEB128 operand. Jump offsets are signed and
 * relative to the first byte after the jump instruction.
 *
 *   Nop                      --
 *   LoadConstant  idx        -- constants[idx]
 *   LoadGlobal               name -- value
 *   Call          argCount   receiver arg1 .. argN-1 selector -- result
 *   Return                   value -- (frame popped)
 *   LoadArgument  i          -- args[i]
 *   Pop                      value --
 *   DefineGlobal             name value -- value
 *   Jump          offset     --
 *   JumpIfFalse   offset     value --
 */

import { decodeUnsigned, decodeSigned } from './leb128.js';
import { BytecodeError } from './errors.js';

export enum Opcode {
  Nop = 0x00,
  LoadConstant = 0x01,
  LoadGlobal = 0x02,
  Call = 0x03,
  Return = 0x04,
  LoadArgument = 0x05,
  Pop = 0x06,
  DefineGlobal = 0x07,
  Jump = 0x08,
  JumpIfFalse = 0x09,
}

export type OperandKind = 'none' | 'unsigned' | 'signed';

interface OpcodeInfo {
  name: string;
  operand: OperandKind;
}

export const opcodeInfo: Record<Opcode, OpcodeInfo> = {
  [Opcode.Nop]: { name: 'Nop', operand: 'none' },
  [Opcode.LoadConstant]: { name: 'LoadConstant', operand: 'unsigned' },
  [Opcode.LoadGlobal]: { name: 'LoadGlobal', operand: 'none' },
  [Opcode.Call]: { name: 'Call', operand: 'unsigned' },
  [Opcode.Return]: { name: 'Return', operand: 'none' },
  [Opcode.LoadArgument]: { name: 'LoadArgument', operand: 'unsigned' },
  [Opcode.Pop]: { name: 'Pop', operand: 'none' },
  [Opcode.DefineGlobal]: { name: 'DefineGlobal', operand: 'none' },
  [Opcode.Jump]: { name: 'Jump', operand: 'signed' },
  [Opcode.JumpIfFalse]: { name: 'JumpIfFalse', operand: 'signed' },
};

export function isOpcode(byte: number): byte is Opcode {
  return Object.prototype.hasOwnProperty.call(opcodeInfo, byte);
}

export interface Instruction {
  offset: number;
  opcode: Opcode;
  /** 0 when the opcode takes no operand */
  operand: number;
  /** Offset of the following instruction */
  next: number;
}

/**
 * Decode the instruction at `offset`
 */
export function decodeInstruction(code: Uint8Array, offset: number): Instruction {
  if (offset < 0 || offset >= code.length) {
    throw new BytecodeError('Instruction pointer outside the code', offset);
  }
  const opcode = code[offset];
  if (!isOpcode(opcode)) {
    throw new BytecodeError(`Unknown opcode 0x${opcode.toString(16).padStart(2, '0')}`, offset);
  }
  switch (opcodeInfo[opcode].operand) {
    case 'none':
      return { offset, opcode, operand: 0, next: offset + 1 };
    case 'unsigned': {
      const { value, next } = decodeUnsigned(code, offset + 1);
      return { offset, opcode, operand: value, next };
    }
    case 'signed': {
      const { value, next } = decodeSigned(code, offset + 1);
      return { offset, opcode, operand: value, next };
    }
  }
}

/**
 * Every instruction in order
 */
export function decodeAll(code: Uint8Array): Instruction[] {
  const result: Instruction[] = [];
  let offset = 0;
  while (offset < code.length) {
    const insn = decodeInstruction(code, offset);
    result.push(insn);
    offset = insn.next;
  }
  return result;
}

export function jumpTarget(insn: Instruction): number {
  return insn.next + insn.operand;
}
