/**
 * VM tests - bytecode execution, frames and abandonment
 */

import { describe, it, expect } from 'vitest';
import { VM } from './vm.js';
import { Runtime } from './runtime.js';
import { Assembler } from './assembler.js';
import { CompiledMethod, intern } from './objects.js';
import { collectDiagnostics } from './diagnostics.js';
import { NIL, MAX_INT, makeInt, asInt } from './value.js';
import { Opcode } from './bytecode.js';

function setup(options: { trace?: boolean; maxFrames?: number } = {}) {
  const runtime = new Runtime();
  const diagnostics = collectDiagnostics();
  const vm = new VM(runtime, { diagnostics, trace: options.trace ?? false, maxFrames: options.maxFrames });
  return { runtime, diagnostics, vm };
}

function sum(a: number, b: number): CompiledMethod {
  const asm = new Assembler();
  asm.emitConstant(makeInt(a));
  asm.emitConstant(makeInt(b));
  asm.emitSend(intern('+'), 2);
  asm.emitReturn();
  return asm.finish();
}

/**
 * Integer>>ident answers its receiver
 */
function installIdent(runtime: Runtime): CompiledMethod {
  const asm = new Assembler('Integer>>ident', 1);
  asm.emitLoadArgument(0);
  asm.emitReturn();
  const method = asm.finish();
  runtime.installHandler(runtime.builtins.integer, 'ident', method);
  return method;
}

describe('VM - Execution', () => {
  it('should add two integers', () => {
    const { vm, diagnostics } = setup();
    expect(asInt(vm.executeBytecode(sum(3, 4)))).toBe(7);
    expect(diagnostics.entries).toEqual([]);
    expect(vm.frameDepth()).toBe(0);
  });

  it('should run a compiled handler in its own frame', () => {
    const { vm, runtime } = setup();
    installIdent(runtime);
    const asm = new Assembler();
    asm.emitConstant(makeInt(5));
    asm.emitSend(intern('ident'), 1);
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(makeInt(5));
  });

  it('should load object constants as the same object', () => {
    const { vm } = setup();
    const asm = new Assembler();
    asm.emitConstant(intern('foo'));
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(intern('foo'));
  });

  it('should define and read globals', () => {
    const { vm, runtime } = setup();
    const asm = new Assembler();
    asm.emitConstant(intern('answer'));
    asm.emitConstant(makeInt(42));
    asm.emitDefineGlobal();
    asm.emitPop();
    asm.emitLoadGlobal(intern('answer'));
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(makeInt(42));
    expect(runtime.globals.lookup(intern('answer'))).toBe(makeInt(42));
  });

  it('should yield nil for an undefined global', () => {
    const { vm, diagnostics } = setup();
    const asm = new Assembler();
    asm.emitLoadGlobal(intern('nowhere'));
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(NIL);
    expect(diagnostics.entries.map(d => d.message)).toEqual(['Undefined identifier: nowhere']);
  });

  it('should refuse a program that expects arguments', () => {
    const { vm, diagnostics } = setup();
    const asm = new Assembler('needy', 1);
    asm.emitLoadArgument(0);
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(NIL);
    expect(diagnostics.kinds()).toEqual(['arity-mismatch']);
  });
});

describe('VM - Trace', () => {
  it('should leave one more value after a call returns', () => {
    const { vm, diagnostics } = setup({ trace: true });
    vm.executeBytecode(sum(3, 4));
    expect(diagnostics.entries.map(d => d.message)).toEqual([
      '<toplevel> 0000 LoadConstant 0 depth=0',
      '<toplevel> 0002 LoadConstant 1 depth=1',
      '<toplevel> 0004 LoadConstant 2 depth=2',
      '<toplevel> 0006 Call 2 depth=3',
      '<toplevel> 0008 Return depth=1',
    ]);
  });

  it('should indent nested frames', () => {
    const { vm, runtime, diagnostics } = setup({ trace: true });
    installIdent(runtime);
    const asm = new Assembler();
    asm.emitConstant(makeInt(5));
    asm.emitSend(intern('ident'), 1);
    asm.emitReturn();
    vm.executeBytecode(asm.finish());
    expect(diagnostics.entries.map(d => d.message)).toEqual([
      '<toplevel> 0000 LoadConstant 0 depth=0',
      '<toplevel> 0002 LoadConstant 1 depth=1',
      '<toplevel> 0004 Call 1 depth=2',
      '  Integer>>ident 0000 LoadArgument 0 depth=0',
      '  Integer>>ident 0002 Return depth=1',
      '<toplevel> 0006 Return depth=1',
    ]);
    expect(diagnostics.kinds().every(kind => kind === 'trace')).toBe(true);
  });
});

describe('VM - Recoverable failures', () => {
  it('should answer nil when no class understands the message', () => {
    const { vm, diagnostics } = setup();
    const asm = new Assembler();
    asm.emitConstant(makeInt(5));
    asm.emitSend(intern('frobnicate'), 1);
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(NIL);
    expect(diagnostics.entries).toEqual([
      { kind: 'message-not-understood', message: '5 (Integer) does not understand frobnicate', location: undefined },
    ]);
  });

  it('should answer nil when the selector is not a symbol', () => {
    const { vm, diagnostics } = setup();
    const asm = new Assembler();
    asm.emitConstant(makeInt(5));
    asm.emitConstant(makeInt(6));
    asm.emitCall(1);
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(NIL);
    expect(diagnostics.entries.map(d => d.message)).toEqual(['Selector is not a symbol: 6']);
  });

  it('should check the arity of compiled handlers', () => {
    const { vm, runtime, diagnostics } = setup();
    const asm = new Assembler('Integer>>pair', 2);
    asm.emitLoadArgument(1);
    asm.emitReturn();
    runtime.installHandler(runtime.builtins.integer, 'pair', asm.finish());

    expect(vm.sendMessage(makeInt(1), intern('pair'))).toBe(NIL);
    expect(diagnostics.entries.map(d => d.message)).toEqual([
      'Integer>>pair expects 1 arguments besides the receiver, got 0',
    ]);
    expect(vm.sendMessage(makeInt(1), intern('pair'), [makeInt(9)])).toBe(makeInt(9));
  });
});

describe('VM - Abandoned executions', () => {
  it('should abandon on an unknown opcode', () => {
    const { vm, diagnostics } = setup();
    const bad = new CompiledMethod('bad', 0, Uint8Array.of(0xff), [], 1);
    expect(vm.executeBytecode(bad)).toBe(NIL);
    expect(diagnostics.entries).toEqual([
      {
        kind: 'malformed-bytecode',
        message: 'Execution abandoned: Unknown opcode 0xff (at offset 0)',
        location: undefined,
      },
    ]);
  });

  it('should abandon when a frame is smaller than its code needs', () => {
    const { vm, diagnostics } = setup();
    const tight = new CompiledMethod(
      'tight',
      0,
      Uint8Array.of(Opcode.LoadConstant, 0, Opcode.LoadConstant, 0, Opcode.Return),
      [makeInt(1)],
      1
    );
    expect(vm.executeBytecode(tight)).toBe(NIL);
    expect(diagnostics.kinds()).toEqual(['resource-exhausted']);
    expect(diagnostics.entries[0].message).toBe('Execution abandoned: Operand stack overflow in tight (capacity 1)');

    // The VM is usable again afterwards
    expect(vm.frameDepth()).toBe(0);
    expect(vm.executeBytecode(sum(1, 2))).toBe(makeInt(3));
  });

  it('should abandon on integer overflow rather than wrap', () => {
    const { vm, diagnostics } = setup();
    const asm = new Assembler();
    asm.emitConstant(makeInt(MAX_INT));
    asm.emitConstant(makeInt(2));
    asm.emitSend(intern('*'), 2);
    asm.emitReturn();
    expect(vm.executeBytecode(asm.finish())).toBe(NIL);
    expect(diagnostics.entries.map(d => d.message)).toEqual([
      'Execution abandoned: integer 140737488355326 does not fit in an immediate (range -70368744177664..70368744177663)',
    ]);
  });

  it('should stop runaway recursion at the frame limit', () => {
    const { vm, runtime, diagnostics } = setup({ maxFrames: 10 });
    const asm = new Assembler('Integer>>spin', 1);
    asm.emitLoadArgument(0);
    asm.emitSend(intern('spin'), 1);
    asm.emitReturn();
    runtime.installHandler(runtime.builtins.integer, 'spin', asm.finish());

    expect(vm.sendMessage(makeInt(0), intern('spin'))).toBe(NIL);
    expect(diagnostics.entries.map(d => d.message)).toEqual([
      'Execution abandoned: Frame limit of 10 reached calling Integer>>spin',
    ]);
    expect(vm.frameDepth()).toBe(0);
  });
});

describe('VM - Host failures', () => {
  it('should unwind its frames before a host error propagates', () => {
    const { vm, runtime, diagnostics } = setup();
    runtime.installPrimitive(runtime.builtins.integer, 'explode', 1, () => {
      throw new TypeError('boom');
    });
    const asm = new Assembler('caller');
    asm.emitConstant(makeInt(1));
    asm.emitSend(intern('explode'), 1);
    asm.emitReturn();

    expect(() => vm.executeBytecode(asm.finish())).toThrow('boom');
    expect(vm.frameDepth()).toBe(0);
    expect(vm.backtrace()).toEqual([]);
    expect(diagnostics.entries).toEqual([]);

    // Nothing left over counts against the next run
    expect(vm.executeBytecode(sum(3, 4))).toBe(makeInt(7));
    expect(vm.operandDepth()).toBe(0);
  });

  it('should unwind frames entered through sendMessage', () => {
    const { vm, runtime } = setup();
    runtime.installPrimitive(runtime.builtins.integer, 'explode', 1, () => {
      throw new TypeError('boom');
    });
    const asm = new Assembler('Integer>>relay', 1);
    asm.emitLoadArgument(0);
    asm.emitSend(intern('explode'), 1);
    asm.emitReturn();
    runtime.installHandler(runtime.builtins.integer, 'relay', asm.finish());

    expect(() => vm.sendMessage(makeInt(1), intern('relay'))).toThrow('boom');
    expect(vm.frameDepth()).toBe(0);
  });
});
