/**
 * Virtual Machine
 *
 * Executes CompiledMethods. State:
 * - one value stack segment shared by all frames
 * - an explicit vector of frames; each frame owns a window of the segment:
 *
 *     argBase           stackBase                 limit
 *     | receiver args.. | operands ...            |
 *
 *   the operand region holds at most `method.maxStack` values
 *
 * A compiled call binds the callee's frame directly over the argument window
 * left by the caller (the selector slot becomes the callee's first operand
 * slot); nothing is copied. Return leaves the result where the receiver was.
 *
 * A VM is one thread of execution. Several VMs may run against the same
 * Runtime, one at a time.
 */

import { type Value, NIL, isTruthy } from './value.js';
import {
  type Callable,
  type CompiledMethod,
  type PrimitiveObj,
  type SymbolObj,
  asSymbol,
} from './objects.js';
import { Opcode, type Instruction, decodeInstruction, jumpTarget, opcodeInfo } from './bytecode.js';
import { classOf, lookupHandler } from './dispatch.js';
import { printValue } from './print.js';
import { type Diagnostic, type Diagnostics, type Location, consoleDiagnostics } from './diagnostics.js';
import { BytecodeError, StackOverflowError, VMError } from './errors.js';
import type { Runtime } from './runtime.js';

export interface VMFrame {
  method: CompiledMethod;
  /** Offset of the next instruction */
  ip: number;
  /** Segment index of argument 0 (the receiver) */
  argBase: number;
  argCount: number;
  /** First operand slot */
  stackBase: number;
  /** Next free operand slot */
  sp: number;
  /** One past the last operand slot */
  limit: number;
}

export interface VMOptions {
  diagnostics?: Diagnostics;
  /** Report every executed instruction; defaults to the DEBUG_VM env var */
  trace?: boolean;
  /** Deepest frame vector allowed */
  maxFrames?: number;
  /** Largest stack segment allowed, in values */
  maxStackSlots?: number;
}

export const DEFAULT_MAX_FRAMES = 1000;
export const DEFAULT_MAX_STACK_SLOTS = 100000;

export class VM {
  readonly diagnostics: Diagnostics;
  trace: boolean;
  readonly maxFrames: number;
  readonly maxStackSlots: number;

  /** Value stack segment */
  private stack: Value[] = [];

  /** Active frames, innermost last */
  private readonly frames: VMFrame[] = [];

  constructor(public readonly runtime: Runtime, options: VMOptions = {}) {
    this.diagnostics = options.diagnostics ?? consoleDiagnostics;
    this.trace = options.trace ?? Boolean(process.env.DEBUG_VM);
    this.maxFrames = options.maxFrames ?? DEFAULT_MAX_FRAMES;
    this.maxStackSlots = options.maxStackSlots ?? DEFAULT_MAX_STACK_SLOTS;
  }

  /**
   * Run a program to completion. Returns its result, or nil when the
   * execution had to be abandoned (the reason goes to the diagnostics sink).
   */
  executeBytecode(program: CompiledMethod): Value {
    if (program.argCount !== 0) {
      this.report({
        kind: 'arity-mismatch',
        message: `Program ${program.name} expects ${program.argCount} arguments; programs take none`,
        location: program.source,
      });
      return NIL;
    }
    const baseDepth = this.frames.length;
    try {
      this.pushFrame(program, this.stackTop(), 0);
      return this.run(baseDepth);
    } catch (e) {
      return this.abandon(e, baseDepth);
    }
  }

  /**
   * Send a message without going through bytecode. Primitives use this to
   * re-enter dispatch.
   */
  sendMessage(receiver: Value, selector: SymbolObj, args: readonly Value[] = []): Value {
    const handler = lookupHandler(this.runtime, classOf(this.runtime, receiver), selector);
    if (!handler) {
      return this.notUnderstood(receiver, selector);
    }
    return this.invoke(handler.callable, [receiver, ...args]);
  }

  /**
   * Call a handler directly; `args[0]` is the receiver.
   */
  invoke(callable: Callable, args: readonly Value[]): Value {
    const baseDepth = this.frames.length;
    try {
      const primitive = callable.asPrimitive();
      if (primitive) {
        return this.callPrimitive(primitive, args);
      }
      const method = callable.asCompiledMethod();
      if (!method) {
        return NIL;
      }
      if (!this.checkArity(method.name, method.argCount, args.length)) {
        return NIL;
      }
      const base = this.stackTop();
      args.forEach((arg, i) => {
        this.stack[base + i] = arg;
      });
      this.pushFrame(method, base, args.length);
      return this.run(baseDepth);
    } catch (e) {
      return this.abandon(e, baseDepth);
    }
  }

  /**
   * Report through the sink, attaching the current source location if known
   */
  report(diagnostic: Diagnostic): void {
    this.diagnostics.report({ ...diagnostic, location: diagnostic.location ?? this.currentLocation() });
  }

  /**
   * Report a recoverable primitive failure and yield nil
   */
  primitiveFailed(name: string, message: string): Value {
    this.report({ kind: 'primitive-failed', message: `${name}: ${message}` });
    return NIL;
  }

  currentLocation(): Location | undefined {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1].method.source : undefined;
  }

  frameDepth(): number {
    return this.frames.length;
  }

  /**
   * Snapshot of the active frames, outermost first
   */
  backtrace(): Array<{ method: string; ip: number }> {
    return this.frames.map(frame => ({ method: frame.method.name, ip: frame.ip }));
  }

  /**
   * Depth of the innermost frame's operand stack
   */
  operandDepth(): number {
    const frame = this.frames[this.frames.length - 1];
    return frame ? frame.sp - frame.stackBase : 0;
  }

  private stackTop(): number {
    const frame = this.frames[this.frames.length - 1];
    return frame ? frame.sp : 0;
  }

  private pushFrame(method: CompiledMethod, argBase: number, argCount: number): void {
    if (this.frames.length >= this.maxFrames) {
      throw new StackOverflowError(`Frame limit of ${this.maxFrames} reached calling ${method.name}`);
    }
    const stackBase = argBase + argCount;
    const limit = stackBase + method.maxStack;
    if (limit > this.maxStackSlots) {
      throw new StackOverflowError(`Stack segment limit of ${this.maxStackSlots} values reached calling ${method.name}`);
    }
    this.frames.push({ method, ip: 0, argBase, argCount, stackBase, sp: stackBase, limit });
  }

  private push(frame: VMFrame, value: Value): void {
    if (frame.sp >= frame.limit) {
      throw new StackOverflowError(
        `Operand stack overflow in ${frame.method.name} (capacity ${frame.method.maxStack})`
      );
    }
    this.stack[frame.sp++] = value;
  }

  private pop(frame: VMFrame): Value {
    if (frame.sp <= frame.stackBase) {
      throw new BytecodeError(`Operand stack underflow in ${frame.method.name}`, frame.ip);
    }
    return this.stack[--frame.sp];
  }

  /**
   * The fetch-decode-execute loop. Runs until the frame vector shrinks back to
   * `baseDepth` and returns the value the last frame returned.
   */
  private run(baseDepth: number): Value {
    for (;;) {
      const frame = this.frames[this.frames.length - 1];
      const insn = decodeInstruction(frame.method.code, frame.ip);
      frame.ip = insn.next;
      if (this.trace) {
        this.traceInstruction(frame, insn);
      }

      switch (insn.opcode) {
        case Opcode.Nop:
          break;

        case Opcode.LoadConstant: {
          if (insn.operand >= frame.method.constants.length) {
            throw new BytecodeError(`Constant index ${insn.operand} out of range`, insn.offset);
          }
          this.push(frame, frame.method.constants[insn.operand]);
          break;
        }

        case Opcode.LoadGlobal: {
          const nameValue = this.pop(frame);
          const name = asSymbol(nameValue);
          if (!name) {
            this.report({ kind: 'undefined-identifier', message: `Not an identifier: ${printValue(nameValue)}` });
            this.push(frame, NIL);
            break;
          }
          this.push(frame, this.runtime.globals.lookupOrNil(name, this.diagnostics, this.currentLocation()));
          break;
        }

        case Opcode.Call:
          this.call(frame, insn);
          break;

        case Opcode.Return: {
          const result = this.pop(frame);
          this.frames.pop();
          this.stack.length = frame.argBase;
          if (this.frames.length === baseDepth) {
            return result;
          }
          this.push(this.frames[this.frames.length - 1], result);
          break;
        }

        case Opcode.LoadArgument: {
          if (insn.operand >= frame.argCount) {
            throw new BytecodeError(`Argument index ${insn.operand} out of range`, insn.offset);
          }
          this.push(frame, this.stack[frame.argBase + insn.operand]);
          break;
        }

        case Opcode.Pop:
          this.pop(frame);
          break;

        case Opcode.DefineGlobal: {
          const value = this.pop(frame);
          const nameValue = this.pop(frame);
          const name = asSymbol(nameValue);
          if (!name) {
            throw new BytecodeError(`DefineGlobal needs a symbol, got ${printValue(nameValue)}`, insn.offset);
          }
          this.runtime.globals.define(name, value);
          this.push(frame, value);
          break;
        }

        case Opcode.Jump:
          frame.ip = jumpTarget(insn);
          break;

        case Opcode.JumpIfFalse:
          if (!isTruthy(this.pop(frame))) {
            frame.ip = jumpTarget(insn);
          }
          break;
      }
    }
  }

  /**
   * Window on the operand stack: receiver arg1 .. argN-1 selector
   */
  private call(frame: VMFrame, insn: Instruction): void {
    const argCount = insn.operand;
    const windowBase = frame.sp - (argCount + 1);
    if (argCount < 1 || windowBase < frame.stackBase) {
      throw new BytecodeError(`Call(${argCount}) does not fit the operand stack`, insn.offset);
    }
    const selectorValue = this.stack[frame.sp - 1];
    const receiver = this.stack[windowBase];
    frame.sp = windowBase;

    const selector = asSymbol(selectorValue);
    if (!selector) {
      this.stack.length = windowBase;
      this.report({ kind: 'message-not-understood', message: `Selector is not a symbol: ${printValue(selectorValue)}` });
      this.push(frame, NIL);
      return;
    }

    const handler = lookupHandler(this.runtime, classOf(this.runtime, receiver), selector);
    if (!handler) {
      this.stack.length = windowBase;
      this.push(frame, this.notUnderstood(receiver, selector));
      return;
    }

    const primitive = handler.callable.asPrimitive();
    if (primitive) {
      const args = this.stack.slice(windowBase, windowBase + argCount);
      this.stack.length = windowBase;
      this.push(frame, this.callPrimitive(primitive, args));
      return;
    }

    const method = handler.callable.asCompiledMethod();
    if (!method || !this.checkArity(method.name, method.argCount, argCount)) {
      this.stack.length = windowBase;
      this.push(frame, NIL);
      return;
    }
    this.pushFrame(method, windowBase, argCount);
  }

  private callPrimitive(primitive: PrimitiveObj, args: readonly Value[]): Value {
    if (!this.checkArity(primitive.name, primitive.arity, args.length)) {
      return NIL;
    }
    return primitive.fn(args, this);
  }

  private checkArity(name: string, expected: number | null, actual: number): boolean {
    if (expected === null || expected === actual) {
      return true;
    }
    this.report({
      kind: 'arity-mismatch',
      message: `${name} expects ${expected - 1} arguments besides the receiver, got ${actual - 1}`,
    });
    return false;
  }

  private notUnderstood(receiver: Value, selector: SymbolObj): Value {
    const klass = classOf(this.runtime, receiver);
    this.report({
      kind: 'message-not-understood',
      message: `${printValue(receiver)} (${klass.name}) does not understand ${selector.name}`,
    });
    return NIL;
  }

  /**
   * Unwind to `baseDepth` after a failure. Engine errors become a diagnostic
   * and a nil result; anything else is a host bug and keeps propagating once
   * the frames are gone.
   */
  private abandon(e: unknown, baseDepth: number): Value {
    const location = this.currentLocation();
    this.frames.length = baseDepth;
    this.stack.length = this.stackTop();
    if (!(e instanceof VMError)) {
      throw e;
    }
    this.report({
      kind: e instanceof BytecodeError ? 'malformed-bytecode' : 'resource-exhausted',
      message: `Execution abandoned: ${e.message}`,
      location,
    });
    return NIL;
  }

  private traceInstruction(frame: VMFrame, insn: Instruction): void {
    const info = opcodeInfo[insn.opcode];
    const operand = info.operand === 'none' ? '' : ` ${insn.operand}`;
    this.diagnostics.report({
      kind: 'trace',
      message: `${'  '.repeat(this.frames.length - 1)}${frame.method.name} ${String(insn.offset).padStart(4, '0')} ${info.name}${operand} depth=${frame.sp - frame.stackBase}`,
    });
  }
}
