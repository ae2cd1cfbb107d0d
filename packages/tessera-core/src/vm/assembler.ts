/**
 * Bytecode emitter back end
 *
 * Collects instructions and constants for one compiled unit and, on finish,
 * runs the stack-depth analysis so every CompiledMethod carries the operand
 * capacity its frames need.
 */

import { Opcode } from './bytecode.js';
import { encodeUnsigned, encodeSigned } from './leb128.js';
import { type Value, identical } from './value.js';
import { CompiledMethod, type SymbolObj } from './objects.js';
import { computeMaxStack } from './stack-depth.js';
import type { Location } from './diagnostics.js';

/**
 * Jump target handle. Bound to an offset by `bind`.
 */
export class Label {
  offset: number | null = null;
}

interface PendingJump {
  opcode: Opcode.Jump | Opcode.JumpIfFalse;
  label: Label;
  /** Index into `parts` of the instruction */
  part: number;
}

/**
 * Jumps are variable length, so they are kept symbolic until `finish`:
 * every other instruction is already bytes.
 */
type Part = { bytes: number[] } | { jump: PendingJump };

export class Assembler {
  private parts: Part[] = [];
  private constants: Value[] = [];

  constructor(
    public readonly name: string = '<toplevel>',
    public readonly argCount: number = 0,
    public readonly source?: Location
  ) {}

  private emit(opcode: Opcode, operand?: number): void {
    const bytes: number[] = [opcode];
    if (operand !== undefined) {
      bytes.push(...encodeUnsigned(operand));
    }
    this.parts.push({ bytes });
  }

  /**
   * Index of a value in the constant pool, adding it if absent
   */
  addConstant(value: Value): number {
    const existing = this.constants.findIndex(c => identical(c, value));
    if (existing >= 0) {
      return existing;
    }
    this.constants.push(value);
    return this.constants.length - 1;
  }

  emitConstant(value: Value): number {
    const index = this.addConstant(value);
    this.emit(Opcode.LoadConstant, index);
    return index;
  }

  /**
   * Push the name, then resolve it
   */
  emitLoadGlobal(name: SymbolObj): void {
    this.emitConstant(name);
    this.emit(Opcode.LoadGlobal);
  }

  emitLoadArgument(index: number): void {
    this.emit(Opcode.LoadArgument, index);
  }

  /**
   * `argCount` includes the receiver; the selector is pushed last
   */
  emitCall(argCount: number): void {
    this.emit(Opcode.Call, argCount);
  }

  /**
   * Push `selector` and call. Receiver and arguments must already be pushed.
   */
  emitSend(selector: SymbolObj, argCount: number): void {
    this.emitConstant(selector);
    this.emitCall(argCount);
  }

  emitReturn(): void {
    this.emit(Opcode.Return);
  }

  emitNop(): void {
    this.emit(Opcode.Nop);
  }

  emitPop(): void {
    this.emit(Opcode.Pop);
  }

  emitDefineGlobal(): void {
    this.emit(Opcode.DefineGlobal);
  }

  emitJump(label: Label): void {
    this.parts.push({ jump: { opcode: Opcode.Jump, label, part: this.parts.length } });
  }

  emitJumpIfFalse(label: Label): void {
    this.parts.push({ jump: { opcode: Opcode.JumpIfFalse, label, part: this.parts.length } });
  }

  newLabel(): Label {
    return new Label();
  }

  /**
   * Attach a label to the next instruction. Offsets are part indices until
   * `finish` resolves them to bytes.
   */
  bind(label: Label): void {
    label.offset = this.parts.length;
  }

  /**
   * Lay out the code, resolve jumps and compute the operand capacity.
   */
  finish(): CompiledMethod {
    const code = this.layout();
    const maxStack = computeMaxStack({
      code,
      constantCount: this.constants.length,
      argCount: this.argCount,
    });
    return new CompiledMethod(this.name, this.argCount, code, [...this.constants], maxStack, this.source);
  }

  private layout(): Uint8Array {
    // Jump sizes depend on distances, which depend on jump sizes: start every
    // jump at its smallest encoding and grow until nothing changes.
    const sizes = this.parts.map(part => ('bytes' in part ? part.bytes.length : 2));
    let offsets: number[] = [];
    for (;;) {
      offsets = [];
      let pos = 0;
      for (const size of sizes) {
        offsets.push(pos);
        pos += size;
      }
      offsets.push(pos);

      let changed = false;
      this.parts.forEach((part, i) => {
        if ('jump' in part) {
          const size = 1 + encodeSigned(this.jumpDistance(part.jump, offsets, sizes[i])).length;
          if (size > sizes[i]) {
            sizes[i] = size;
            changed = true;
          }
        }
      });
      if (!changed) break;
    }

    const bytes: number[] = [];
    this.parts.forEach((part, i) => {
      if ('bytes' in part) {
        bytes.push(...part.bytes);
        return;
      }
      const operand = encodeSigned(this.jumpDistance(part.jump, offsets, sizes[i]));
      // Distances only grow while sizes settle, so the final encoding fills
      // the slot exactly
      if (1 + operand.length !== sizes[i]) {
        throw new Error(`Jump layout did not converge in ${this.name}`);
      }
      bytes.push(part.jump.opcode, ...operand);
    });
    return Uint8Array.from(bytes);
  }

  private jumpDistance(jump: PendingJump, offsets: number[], size: number): number {
    if (jump.label.offset === null) {
      throw new Error(`Unbound label in ${this.name}`);
    }
    return offsets[jump.label.offset] - (offsets[jump.part] + size);
  }
}
