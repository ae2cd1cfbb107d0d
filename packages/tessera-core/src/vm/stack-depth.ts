/**
 * Static operand-stack depth analysis
 *
 * Walks every reachable instruction from offset 0, propagating the stack depth
 * along both edges of each branch. The largest depth seen is the operand
 * capacity a frame for this code needs. The walk also rejects code the VM
 * could not run safely: underflow, branches that meet at different depths,
 * control falling off the end, out-of-range operands.
 */

import { Opcode, type Instruction, decodeAll, jumpTarget, opcodeInfo } from './bytecode.js';
import { BytecodeError } from './errors.js';

interface StackEffect {
  /** Values the instruction needs on the stack */
  pops: number;
  /** Values it leaves behind */
  pushes: number;
}

export function stackEffect(insn: Instruction): StackEffect {
  switch (insn.opcode) {
    case Opcode.Nop:
    case Opcode.Jump:
      return { pops: 0, pushes: 0 };
    case Opcode.LoadConstant:
    case Opcode.LoadArgument:
      return { pops: 0, pushes: 1 };
    case Opcode.LoadGlobal:
      return { pops: 1, pushes: 1 };
    case Opcode.Call:
      return { pops: insn.operand + 1, pushes: 1 };
    case Opcode.Return:
    case Opcode.Pop:
    case Opcode.JumpIfFalse:
      return { pops: 1, pushes: 0 };
    case Opcode.DefineGlobal:
      return { pops: 2, pushes: 1 };
  }
}

export interface StackDepthInput {
  code: Uint8Array;
  constantCount: number;
  argCount: number;
}

export function computeMaxStack(input: StackDepthInput): number {
  const { code, constantCount, argCount } = input;
  if (code.length === 0) {
    throw new BytecodeError('Empty code');
  }

  const byOffset = new Map<number, Instruction>();
  for (const insn of decodeAll(code)) {
    byOffset.set(insn.offset, insn);
  }

  const depthAt = new Map<number, number>();
  const worklist: Array<[number, number]> = [[0, 0]];
  let maxDepth = 0;

  const flowTo = (target: number, depth: number, from: number): void => {
    const insn = byOffset.get(target);
    if (!insn) {
      if (target === code.length) {
        throw new BytecodeError('Control falls off the end of the code', from);
      }
      throw new BytecodeError(`Branch target ${target} is not an instruction boundary`, from);
    }
    const known = depthAt.get(target);
    if (known === undefined) {
      depthAt.set(target, depth);
      worklist.push([target, depth]);
    } else if (known !== depth) {
      throw new BytecodeError(`Stack depth mismatch at ${target}: ${known} vs ${depth}`, from);
    }
  };

  depthAt.set(0, 0);
  while (worklist.length > 0) {
    const entry = worklist.pop();
    if (!entry) break;
    const [offset, depth] = entry;
    const insn = byOffset.get(offset);
    if (!insn) {
      throw new BytecodeError('Missing instruction', offset);
    }

    switch (insn.opcode) {
      case Opcode.LoadConstant:
        if (insn.operand >= constantCount) {
          throw new BytecodeError(`Constant index ${insn.operand} out of range (pool size ${constantCount})`, offset);
        }
        break;
      case Opcode.LoadArgument:
        if (insn.operand >= argCount) {
          throw new BytecodeError(`Argument index ${insn.operand} out of range (${argCount} arguments)`, offset);
        }
        break;
      case Opcode.Call:
        if (insn.operand < 1) {
          throw new BytecodeError('Call needs at least the receiver', offset);
        }
        break;
      default:
        break;
    }

    const effect = stackEffect(insn);
    if (depth < effect.pops) {
      throw new BytecodeError(
        `Stack underflow: ${opcodeInfo[insn.opcode].name} needs ${effect.pops}, depth is ${depth}`,
        offset
      );
    }
    const after = depth - effect.pops + effect.pushes;
    maxDepth = Math.max(maxDepth, depth, after);

    switch (insn.opcode) {
      case Opcode.Return:
        break;
      case Opcode.Jump:
        flowTo(jumpTarget(insn), after, offset);
        break;
      case Opcode.JumpIfFalse:
        flowTo(jumpTarget(insn), after, offset);
        flowTo(insn.next, after, offset);
        break;
      default:
        flowTo(insn.next, after, offset);
        break;
    }
  }

  return maxDepth;
}
