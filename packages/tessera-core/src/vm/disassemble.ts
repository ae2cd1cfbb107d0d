/**
 * Human-readable listing of a CompiledMethod, one instruction per line:
 *
 *   0000 LoadConstant 0    ; 3
 *   0002 Call 2
 *
 * Nested methods found in the constant pool are listed after their parent.
 */

import { decodeAll, jumpTarget, opcodeInfo, Opcode } from './bytecode.js';
import type { CompiledMethod } from './objects.js';
import { printValue } from './print.js';

export function disassemble(method: CompiledMethod): string {
  const lines: string[] = [];
  const pending: CompiledMethod[] = [method];
  const done = new Set<CompiledMethod>();

  while (pending.length > 0) {
    const current = pending.shift();
    if (!current || done.has(current)) continue;
    done.add(current);

    if (lines.length > 0) lines.push('');
    lines.push(`${current.name} (args: ${current.argCount}, max stack: ${current.maxStack}, constants: ${current.constants.length})`);

    for (const insn of decodeAll(current.code)) {
      const info = opcodeInfo[insn.opcode];
      let text = `${String(insn.offset).padStart(4, '0')} ${info.name}`;
      if (info.operand !== 'none') {
        text += ` ${insn.operand}`;
      }
      if (insn.opcode === Opcode.LoadConstant) {
        const constant = current.constants[insn.operand];
        if (constant !== undefined) {
          text = `${text.padEnd(22)}; ${printValue(constant)}`;
          const nested = typeof constant === 'number' ? null : constant.asCompiledMethod();
          if (nested) pending.push(nested);
        }
      } else if (insn.opcode === Opcode.Jump || insn.opcode === Opcode.JumpIfFalse) {
        text = `${text.padEnd(22)}; -> ${String(jumpTarget(insn)).padStart(4, '0')}`;
      }
      lines.push(text);
    }
  }

  return lines.join('\n');
}
