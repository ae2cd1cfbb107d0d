/**
 * Message lookup
 *
 * The receiver's class is searched first, then each base in turn; the first
 * class with a handler for the selector wins. Within one class the newest
 * installation wins.
 */

import { type Value, tagOf } from './value.js';
import type { ClassObj, MessageHandler, SymbolObj } from './objects.js';
import type { Runtime } from './runtime.js';

export function classOf(runtime: Runtime, value: Value): ClassObj {
  if (typeof value !== 'number') {
    const instance = value.asInstance();
    if (instance) {
      return instance.klass;
    }
  }
  return runtime.classForTag(tagOf(value));
}

export function lookupHandler(runtime: Runtime, klass: ClassObj, selector: SymbolObj): MessageHandler | null {
  let current: ClassObj | null = klass;
  while (current) {
    const handler = current.ownHandler(selector);
    if (handler) {
      return handler;
    }
    current = runtime.baseOf(current);
  }
  return null;
}

export function respondsTo(runtime: Runtime, receiver: Value, selector: SymbolObj): boolean {
  return lookupHandler(runtime, classOf(runtime, receiver), selector) !== null;
}

/**
 * Base chain starting at `klass` (inclusive)
 */
export function ancestry(runtime: Runtime, klass: ClassObj): ClassObj[] {
  const chain: ClassObj[] = [];
  let current: ClassObj | null = klass;
  while (current) {
    chain.push(current);
    current = runtime.baseOf(current);
  }
  return chain;
}
