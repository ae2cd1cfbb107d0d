/**
 * Heap objects
 *
 * Every heap record starts with its tag; the runtime maps that tag to a class
 * (instances of user classes carry the class itself). Objects are never moved
 * and are compared by identity. Reclamation is left to the host collector.
 */

import { Tag, type Value, NIL, identical } from './value.js';
import type { VM } from './vm.js';
import type { Location } from './diagnostics.js';

export abstract class HeapObject {
  constructor(public readonly tag: Tag) {}

  /** Kind accessors - return the specific subclass or null */
  asPair(): PairObj | null { return null; }
  asSymbol(): SymbolObj | null { return null; }
  asString(): StringObj | null { return null; }
  asPrimitive(): PrimitiveObj | null { return null; }
  asCompiledMethod(): CompiledMethod | null { return null; }
  asClass(): ClassObj | null { return null; }
  asInstance(): InstanceObj | null { return null; }
}

/**
 * Pair (cons cell). Also used as an environment binding `(key . value)` and as
 * a scope `(bindings . parent)`.
 */
export class PairObj extends HeapObject {
  constructor(public head: Value, public tail: Value) {
    super(Tag.Pair);
  }

  asPair(): PairObj { return this; }
}

export class SymbolObj extends HeapObject {
  constructor(public readonly name: string) {
    super(Tag.Symbol);
  }

  asSymbol(): SymbolObj { return this; }
}

export class StringObj extends HeapObject {
  constructor(public readonly value: string) {
    super(Tag.String);
  }

  asString(): StringObj { return this; }
}

/**
 * Native handler. `args[0]` is the receiver.
 */
export type PrimitiveFunction = (args: readonly Value[], vm: VM) => Value;

export class PrimitiveObj extends HeapObject {
  /**
   * @param arity argument count including the receiver; null accepts any
   */
  constructor(
    public readonly name: string,
    public readonly arity: number | null,
    public readonly fn: PrimitiveFunction
  ) {
    super(Tag.Function);
  }

  asPrimitive(): PrimitiveObj { return this; }
}

/**
 * A unit of bytecode: opcode stream, constant pool and the operand capacity
 * its frames need. `argCount` counts the receiver.
 */
export class CompiledMethod extends HeapObject {
  constructor(
    public readonly name: string,
    public readonly argCount: number,
    public readonly code: Uint8Array,
    public readonly constants: readonly Value[],
    public readonly maxStack: number,
    public readonly source?: Location
  ) {
    super(Tag.Function);
  }

  asCompiledMethod(): CompiledMethod { return this; }
}

export type Callable = PrimitiveObj | CompiledMethod;

/** Index into a runtime's class table */
export type ClassId = number;

export interface MessageHandler {
  selector: SymbolObj;
  callable: Callable;
  owner: ClassObj;
}

export class ClassObj extends HeapObject {
  /** Per selector, newest installation first */
  readonly handlers: Map<SymbolObj, MessageHandler[]> = new Map();

  constructor(
    public readonly id: ClassId,
    public readonly name: string,
    public readonly base: ClassId | null,
    public readonly instanceTag: Tag
  ) {
    super(Tag.Class);
  }

  asClass(): ClassObj { return this; }

  /**
   * Prepend a handler; it shadows earlier ones for the same selector.
   */
  install(selector: SymbolObj, callable: Callable): MessageHandler {
    const handler: MessageHandler = { selector, callable, owner: this };
    const existing = this.handlers.get(selector);
    if (existing) {
      existing.unshift(handler);
    } else {
      this.handlers.set(selector, [handler]);
    }
    return handler;
  }

  /**
   * Handler defined at this level only (no base-chain walk)
   */
  ownHandler(selector: SymbolObj): MessageHandler | null {
    const list = this.handlers.get(selector);
    return list && list.length > 0 ? list[0] : null;
  }
}

export class InstanceObj extends HeapObject {
  readonly slots: Map<SymbolObj, Value> = new Map();

  constructor(public readonly klass: ClassObj) {
    super(Tag.Instance);
  }

  asInstance(): InstanceObj { return this; }
}

/**
 * Process-wide symbol table: one SymbolObj per spelling.
 */
const symbolTable = new Map<string, SymbolObj>();

export function intern(name: string): SymbolObj {
  let sym = symbolTable.get(name);
  if (!sym) {
    sym = new SymbolObj(name);
    symbolTable.set(name, sym);
  }
  return sym;
}

export function makePair(head: Value, tail: Value): PairObj {
  return new PairObj(head, tail);
}

export function makeString(value: string): StringObj {
  return new StringObj(value);
}

export function asPair(value: Value): PairObj | null {
  return typeof value === 'number' ? null : value.asPair();
}

export function asSymbol(value: Value): SymbolObj | null {
  return typeof value === 'number' ? null : value.asSymbol();
}

export function asString(value: Value): StringObj | null {
  return typeof value === 'number' ? null : value.asString();
}

export function asClass(value: Value): ClassObj | null {
  return typeof value === 'number' ? null : value.asClass();
}

export function asInstance(value: Value): InstanceObj | null {
  return typeof value === 'number' ? null : value.asInstance();
}

export function asCallable(value: Value): Callable | null {
  if (typeof value === 'number') {
    return null;
  }
  return value.asPrimitive() ?? value.asCompiledMethod();
}

/**
 * Build a proper list
 */
export function list(...values: Value[]): Value {
  let result: Value = NIL;
  for (let i = values.length - 1; i >= 0; i--) {
    result = makePair(values[i], result);
  }
  return result;
}

/**
 * Elements of a proper list, or null if the value is not one
 */
export function listToArray(value: Value): Value[] | null {
  const result: Value[] = [];
  let current = value;
  for (;;) {
    if (current === NIL) {
      return result;
    }
    const pair = asPair(current);
    if (!pair) {
      return null;
    }
    result.push(pair.head);
    current = pair.tail;
  }
}

/**
 * Structural equality, layered above identity: pairs compare element-wise,
 * strings by text, everything else by identity. Cyclic structures compare
 * equal when they unfold the same way.
 */
export function equal(x: Value, y: Value): boolean {
  const pending: Array<[Value, Value]> = [[x, y]];
  const compared = new Map<PairObj, Set<PairObj>>();

  for (let next = pending.pop(); next; next = pending.pop()) {
    const [a, b] = next;
    if (identical(a, b)) {
      continue;
    }
    const pa = asPair(a);
    const pb = asPair(b);
    if (pa && pb) {
      let partners = compared.get(pa);
      if (!partners) {
        partners = new Set();
        compared.set(pa, partners);
      }
      if (partners.has(pb)) {
        continue;
      }
      partners.add(pb);
      pending.push([pa.tail, pb.tail], [pa.head, pb.head]);
      continue;
    }
    const sa = asString(a);
    const sb = asString(b);
    if (!sa || !sb || sa.value !== sb.value) {
      return false;
    }
  }
  return true;
}
