/**
 * Compiler tests - source to bytecode to result
 */

import { describe, it, expect } from 'vitest';
import { parse, parseOne } from './parser.js';
import { Compiler, CompileError } from './compiler.js';
import { Runtime } from '../vm/runtime.js';
import { VM } from '../vm/vm.js';
import { collectDiagnostics } from '../vm/diagnostics.js';
import { Opcode } from '../vm/bytecode.js';
import { type Value, NIL, TRUE, makeInt, asInt } from '../vm/value.js';
import { asClass, asInstance, intern, listToArray } from '../vm/objects.js';

function setup() {
  const runtime = new Runtime();
  const diagnostics = collectDiagnostics();
  const vm = new VM(runtime, { diagnostics, trace: false });
  const compiler = new Compiler();
  const run = (source: string): Value => {
    let result: Value = NIL;
    for (const datum of parse(source)) {
      result = vm.executeBytecode(compiler.compileDatum(datum));
    }
    return result;
  };
  return { runtime, diagnostics, vm, compiler, run };
}

describe('Compiler - Constants', () => {
  it('should compile self-evaluating values', () => {
    const { run } = setup();
    expect(run('42')).toBe(makeInt(42));
    expect(run('#t')).toBe(TRUE);
  });

  it('should compile quote', () => {
    const { run } = setup();
    expect(run("'foo")).toBe(intern('foo'));
    expect(listToArray(run("'(1 2)"))).toEqual([makeInt(1), makeInt(2)]);
  });

  it('should emit LoadConstant then Return', () => {
    const method = new Compiler().compile(parseOne('7'));
    expect(Array.from(method.code)).toEqual([Opcode.LoadConstant, 0, Opcode.Return]);
    expect(method.constants).toEqual([makeInt(7)]);
    expect(method.argCount).toBe(0);
  });
});

describe('Compiler - Sends', () => {
  it('should compile a combination into a send', () => {
    const method = new Compiler().compile(parseOne('(+ 3 4)'));
    expect(Array.from(method.code)).toEqual([
      Opcode.LoadConstant, 0,
      Opcode.LoadConstant, 1,
      Opcode.LoadConstant, 2,
      Opcode.Call, 2,
      Opcode.Return,
    ]);
    expect(method.maxStack).toBe(3);
  });

  it('should evaluate nested sends', () => {
    const { run } = setup();
    expect(asInt(run('(+ (* 2 3) (- 10 4))'))).toBe(12);
  });

  it('should send a computed selector', () => {
    const { run } = setup();
    expect(asInt(run("(send 3 '+ 4)"))).toBe(7);
    expect(asInt(run("(begin (define op '*) (send 3 op 4))"))).toBe(12);
  });

  it('should answer nil for an unknown selector', () => {
    const { run, diagnostics } = setup();
    expect(run('(frobnicate 5)')).toBe(NIL);
    expect(diagnostics.kinds()).toEqual(['message-not-understood']);
  });
});

describe('Compiler - Control', () => {
  it('should take the branch its test selects', () => {
    const { run } = setup();
    expect(run('(if (< 1 2) 10 20)')).toBe(makeInt(10));
    expect(run('(if (> 1 2) 10 20)')).toBe(makeInt(20));
  });

  it('should treat only nil and false as false', () => {
    const { run } = setup();
    expect(run('(if 0 1 2)')).toBe(makeInt(1));
    expect(run("(if '() 1 2)")).toBe(makeInt(2));
    expect(run('(if nil 1 2)')).toBe(makeInt(2));
  });

  it('should answer nil from an if without else', () => {
    const { run } = setup();
    expect(run('(if #f 1)')).toBe(NIL);
  });

  it('should keep the last value of begin', () => {
    const { run } = setup();
    expect(run('(begin 1 2 3)')).toBe(makeInt(3));
    expect(run('(begin)')).toBe(NIL);
  });

  it('should define globals', () => {
    const { run, runtime } = setup();
    expect(run('(define x 5)')).toBe(makeInt(5));
    expect(run('(+ x 1)')).toBe(makeInt(6));
    expect(runtime.globals.lookup(intern('x'))).toBe(makeInt(5));
  });
});

describe('Compiler - Classes and Methods', () => {
  it('should define classes', () => {
    const { run, runtime } = setup();
    const shape = asClass(run('(defclass Shape)'));
    const square = asClass(run('(defclass Square Shape)'));
    expect(shape?.name).toBe('Shape');
    expect(square && runtime.baseOf(square)).toBe(shape);
    expect(asInstance(run('(new Square)'))?.klass).toBe(square);
  });

  it('should compile method parameters to argument loads', () => {
    const { run } = setup();
    run('(defclass Calc)');
    run('(defmethod Calc (add self a b) (+ a b))');
    expect(run('(add (new Calc) 2 3)')).toBe(makeInt(5));
  });

  it('should dispatch to the most specific override', () => {
    const { run } = setup();
    run(`
      (defclass A)
      (defclass B A)
      (defmethod A (+ self other) 1)
      (defmethod B (+ self other) 2)
    `);
    expect(run('(+ (new B) 0)')).toBe(makeInt(2));
    expect(run('(+ (new A) 0)')).toBe(makeInt(1));
  });

  it('should extend built-in classes', () => {
    const { run } = setup();
    run('(defmethod Integer (square self) (* self self))');
    expect(run('(square 9)')).toBe(makeInt(81));
  });

  it('should recurse through methods', () => {
    const { run } = setup();
    run(`
      (defmethod Integer (fact self)
        (if (<= self 1)
            1
            (* self (fact (- self 1)))))
    `);
    expect(run('(fact 10)')).toBe(makeInt(3628800));
  });

  it('should use slots on instances', () => {
    const { run } = setup();
    run(`
      (defclass Counter)
      (defmethod Counter (bump self)
        (set self 'count (+ (if (isNil (get self 'count)) 0 (get self 'count)) 1)))
      (define c (new Counter))
      (bump c)
      (bump c)
    `);
    expect(run("(get c 'count)")).toBe(makeInt(2));
  });

  it('should name compiled methods after class and selector', () => {
    const method = new Compiler().compile(parseOne('(defmethod Point (x self) 1)'));
    const nested = method.constants.find(c => typeof c !== 'number' && c.asCompiledMethod() !== null);
    const compiled = nested !== undefined && typeof nested !== 'number' ? nested.asCompiledMethod() : null;
    expect(compiled?.name).toBe('Point>>x');
    expect(compiled?.argCount).toBe(1);
  });
});

describe('Compiler - Errors', () => {
  it('should reject a combination without a selector', () => {
    expect(() => new Compiler().compileDatum(parse('(1 2)')[0])).toThrow(
      'A combination must start with a selector symbol at <unknown>:1:1'
    );
  });

  it('should reject malformed special forms', () => {
    const compiler = new Compiler();
    expect(() => compiler.compile(parseOne('(if 1)'))).toThrow(CompileError);
    expect(() => compiler.compile(parseOne('(define 1 2)'))).toThrow('define needs a symbol name');
    expect(() => compiler.compile(parseOne('(defmethod A (x) 1)'))).toThrow(
      'defmethod signature must name the selector and the receiver'
    );
    expect(() => compiler.compile(parseOne('(defmethod A (x self self) 1)'))).toThrow('Duplicate parameter self');
  });

  it('should reject dotted forms', () => {
    expect(() => new Compiler().compile(parseOne('(+ 1 . 2)'))).toThrow('Cannot compile a dotted list');
  });
});
