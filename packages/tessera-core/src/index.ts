/**
 * Tessera Core - tagged values, a stack bytecode VM and class-based dispatch
 *
 * This is the core library containing:
 * - Value encoding (immediates and heap objects)
 * - Environment, runtime class table and primitives
 * - Bytecode format, assembler, stack-depth analysis, disassembler
 * - The VM and message dispatch
 * - A small s-expression reader and compiler
 */

export * from './vm/value.js';
export * from './vm/objects.js';
export * from './vm/errors.js';
export * from './vm/diagnostics.js';
export { printValue } from './vm/print.js';
export { Environment } from './vm/environment.js';
export { encodeUnsigned, encodeSigned, decodeUnsigned, decodeSigned } from './vm/leb128.js';
export { Opcode, opcodeInfo, decodeInstruction, decodeAll, jumpTarget, type Instruction } from './vm/bytecode.js';
export { computeMaxStack, stackEffect } from './vm/stack-depth.js';
export { Assembler, Label } from './vm/assembler.js';
export { disassemble } from './vm/disassemble.js';
export { Runtime, type BuiltinClasses, type RuntimeOptions } from './vm/runtime.js';
export { classOf, lookupHandler, respondsTo, ancestry } from './vm/dispatch.js';
export { VM, DEFAULT_MAX_FRAMES, DEFAULT_MAX_STACK_SLOTS, type VMOptions, type VMFrame } from './vm/vm.js';

// Front end
export { parse, parseOne, Parser, ParseError, type Datum } from './lang/parser.js';
export { Compiler, CompileError } from './lang/compiler.js';
