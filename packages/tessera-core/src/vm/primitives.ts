/**
 * Primitive handlers installed on the built-in classes
 *
 * Each primitive receives the whole argument window, receiver first. Bad
 * argument types are recoverable: the primitive reports and answers nil.
 * Integer overflow is not: makeInt throws and the current execution is
 * abandoned.
 */

import {
  type Value,
  Tag,
  NIL,
  TRUE,
  asInt,
  asChar,
  makeInt,
  makeBoolean,
  identical,
} from './value.js';
import {
  InstanceObj,
  asPair,
  asSymbol,
  asString,
  asClass,
  asInstance,
  asCallable,
  equal,
  intern,
  makePair,
  makeString,
} from './objects.js';
import { classOf, respondsTo } from './dispatch.js';
import { printValue } from './print.js';
import type { VM } from './vm.js';
import type { Runtime } from './runtime.js';

/**
 * Integer argument `index` or null after reporting
 */
function intArg(vm: VM, selector: string, args: readonly Value[], index: number): number | null {
  const n = asInt(args[index]);
  if (n === null) {
    vm.primitiveFailed(selector, `expected an integer, got ${printValue(args[index])}`);
  }
  return n;
}

function arithmetic(selector: string, op: (a: number, b: number) => number) {
  return (args: readonly Value[], vm: VM): Value => {
    const a = intArg(vm, selector, args, 0);
    const b = a === null ? null : intArg(vm, selector, args, 1);
    if (a === null || b === null) {
      return NIL;
    }
    return makeInt(op(a, b));
  };
}

function comparison(selector: string, op: (a: number, b: number) => boolean) {
  return (args: readonly Value[], vm: VM): Value => {
    const a = intArg(vm, selector, args, 0);
    const b = a === null ? null : intArg(vm, selector, args, 1);
    if (a === null || b === null) {
      return NIL;
    }
    return makeBoolean(op(a, b));
  };
}

function division(selector: string, op: (a: number, b: number) => number) {
  return (args: readonly Value[], vm: VM): Value => {
    const a = intArg(vm, selector, args, 0);
    const b = a === null ? null : intArg(vm, selector, args, 1);
    if (a === null || b === null) {
      return NIL;
    }
    if (b === 0) {
      return vm.primitiveFailed(selector, 'division by zero');
    }
    return makeInt(op(a, b));
  };
}

export function installPrimitives(runtime: Runtime): void {
  const { object, undefinedObject, boolean, integer, character, symbol, string, pair, function: fn, class: klass } =
    runtime.builtins;

  // Object - root protocol
  runtime.installPrimitive(object, '==', 2, args => makeBoolean(identical(args[0], args[1])));
  runtime.installPrimitive(object, '=', 2, args => makeBoolean(equal(args[0], args[1])));
  runtime.installPrimitive(object, 'print', 1, args => makeString(printValue(args[0])));
  runtime.installPrimitive(object, 'class', 1, (args, vm) => classOf(vm.runtime, args[0]));
  runtime.installPrimitive(object, 'isNil', 1, args => makeBoolean(args[0] === NIL));
  runtime.installPrimitive(object, 'cons', 2, args => makePair(args[0], args[1]));
  runtime.installPrimitive(object, 'respondsTo', 2, (args, vm) => {
    const selector = asSymbol(args[1]);
    if (!selector) {
      return vm.primitiveFailed('respondsTo', `expected a symbol, got ${printValue(args[1])}`);
    }
    return makeBoolean(respondsTo(vm.runtime, args[0], selector));
  });
  runtime.installPrimitive(object, 'get', 2, (args, vm) => {
    const instance = asInstance(args[0]);
    const slot = asSymbol(args[1]);
    if (!instance || !slot) {
      return vm.primitiveFailed('get', 'expected an instance and a slot name');
    }
    return instance.slots.get(slot) ?? NIL;
  });
  runtime.installPrimitive(object, 'set', 3, (args, vm) => {
    const instance = asInstance(args[0]);
    const slot = asSymbol(args[1]);
    if (!instance || !slot) {
      return vm.primitiveFailed('set', 'expected an instance and a slot name');
    }
    instance.slots.set(slot, args[2]);
    return args[2];
  });

  // Integer
  runtime.installPrimitive(integer, '+', 2, arithmetic('+', (a, b) => a + b));
  runtime.installPrimitive(integer, '-', 2, arithmetic('-', (a, b) => a - b));
  runtime.installPrimitive(integer, '*', 2, arithmetic('*', (a, b) => a * b));
  runtime.installPrimitive(integer, '/', 2, division('/', (a, b) => Math.trunc(a / b)));
  runtime.installPrimitive(integer, 'mod', 2, division('mod', (a, b) => ((a % b) + b) % b));
  runtime.installPrimitive(integer, '<', 2, comparison('<', (a, b) => a < b));
  runtime.installPrimitive(integer, '>', 2, comparison('>', (a, b) => a > b));
  runtime.installPrimitive(integer, '<=', 2, comparison('<=', (a, b) => a <= b));
  runtime.installPrimitive(integer, '>=', 2, comparison('>=', (a, b) => a >= b));

  // UndefinedObject
  runtime.installPrimitive(undefinedObject, 'isNil', 1, () => makeBoolean(true));

  // Boolean
  runtime.installPrimitive(boolean, 'not', 1, args => makeBoolean(args[0] !== TRUE));

  // Character
  runtime.installPrimitive(character, 'code', 1, args => {
    const ch = asChar(args[0]);
    return ch === null ? NIL : makeInt(ch.codePointAt(0) ?? 0);
  });

  // Symbol
  runtime.installPrimitive(symbol, 'name', 1, args => {
    const sym = asSymbol(args[0]);
    return sym ? makeString(sym.name) : NIL;
  });

  // String
  runtime.installPrimitive(string, 'length', 1, args => {
    const str = asString(args[0]);
    return str ? makeInt([...str.value].length) : NIL;
  });
  runtime.installPrimitive(string, 'concat', 2, (args, vm) => {
    const a = asString(args[0]);
    const b = asString(args[1]);
    if (!a || !b) {
      return vm.primitiveFailed('concat', `expected a string, got ${printValue(args[1])}`);
    }
    return makeString(a.value + b.value);
  });
  runtime.installPrimitive(string, 'intern', 1, args => {
    const str = asString(args[0]);
    return str ? intern(str.value) : NIL;
  });

  // Pair
  runtime.installPrimitive(pair, 'head', 1, args => asPair(args[0])?.head ?? NIL);
  runtime.installPrimitive(pair, 'tail', 1, args => asPair(args[0])?.tail ?? NIL);
  runtime.installPrimitive(pair, 'setHead', 2, args => {
    const p = asPair(args[0]);
    if (p) p.head = args[1];
    return args[1];
  });
  runtime.installPrimitive(pair, 'setTail', 2, args => {
    const p = asPair(args[0]);
    if (p) p.tail = args[1];
    return args[1];
  });

  // Function - (call f receiver args...)
  runtime.installPrimitive(fn, 'call', null, (args, vm) => {
    const callable = asCallable(args[0]);
    if (!callable) {
      return vm.primitiveFailed('call', `not callable: ${printValue(args[0])}`);
    }
    if (args.length < 2) {
      return vm.primitiveFailed('call', 'a receiver is required');
    }
    return vm.invoke(callable, args.slice(1));
  });

  // Class
  runtime.installPrimitive(klass, 'new', 1, (args, vm) => {
    const target = asClass(args[0]);
    if (!target) {
      return NIL;
    }
    if (target.instanceTag !== Tag.Instance) {
      return vm.primitiveFailed('new', `cannot instantiate built-in class ${target.name}`);
    }
    return new InstanceObj(target);
  });
  // (subclass Base 'Name) defines Name globally
  runtime.installPrimitive(klass, 'subclass', 2, (args, vm) => {
    const base = asClass(args[0]);
    const name = asSymbol(args[1]);
    if (!base || !name) {
      return vm.primitiveFailed('subclass', `expected a class name, got ${printValue(args[1])}`);
    }
    return vm.runtime.defineClass(name.name, base);
  });
  // (install Class 'selector method)
  runtime.installPrimitive(klass, 'install', 3, (args, vm) => {
    const target = asClass(args[0]);
    const selector = asSymbol(args[1]);
    const callable = asCallable(args[2]);
    if (!target || !selector || !callable) {
      return vm.primitiveFailed('install', 'expected a class, a selector and a method');
    }
    target.install(selector, callable);
    return selector;
  });
  runtime.installPrimitive(klass, 'name', 1, args => {
    const target = asClass(args[0]);
    return target ? makeString(target.name) : NIL;
  });
  runtime.installPrimitive(klass, 'base', 1, (args, vm) => {
    const target = asClass(args[0]);
    return (target && vm.runtime.baseOf(target)) ?? NIL;
  });
}
