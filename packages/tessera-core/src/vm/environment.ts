/**
 * Global/lexical environment
 *
 * Built from pairs only:
 *   scope   = (bindings . parent-scope)     parent of the outermost is nil
 *   binding = (symbol . value)
 *
 * `define` prepends, so several bindings for one symbol may sit in the same
 * scope and lookup sees the newest.
 */

import { type Value, NIL } from './value.js';
import { type PairObj, type SymbolObj, makePair, asPair } from './objects.js';
import type { Diagnostics, Location } from './diagnostics.js';

export class Environment {
  readonly scope: PairObj;

  constructor(parent: Environment | null = null, scope?: PairObj) {
    this.scope = scope ?? makePair(NIL, parent ? parent.scope : NIL);
  }

  /**
   * Wrap an existing scope pair (e.g. one stored in a value)
   */
  static fromScope(scope: PairObj): Environment {
    return new Environment(null, scope);
  }

  /**
   * New innermost scope whose parent is this one
   */
  extend(): Environment {
    return new Environment(this);
  }

  parent(): Environment | null {
    const parentScope = asPair(this.scope.tail);
    return parentScope ? Environment.fromScope(parentScope) : null;
  }

  define(name: SymbolObj, value: Value): void {
    this.scope.head = makePair(makePair(name, value), this.scope.head);
  }

  /**
   * Find the binding pair for a symbol, innermost scope first
   */
  lookupBinding(name: SymbolObj): PairObj | null {
    let scope: PairObj | null = this.scope;
    while (scope) {
      let bindings = asPair(scope.head);
      while (bindings) {
        const binding = asPair(bindings.head);
        if (binding && binding.head === name) {
          return binding;
        }
        bindings = asPair(bindings.tail);
      }
      scope = asPair(scope.tail);
    }
    return null;
  }

  lookup(name: SymbolObj): Value | undefined {
    const binding = this.lookupBinding(name);
    return binding ? binding.tail : undefined;
  }

  /**
   * Lookup that reports an undefined identifier and yields nil
   */
  lookupOrNil(name: SymbolObj, diagnostics: Diagnostics, location?: Location): Value {
    const binding = this.lookupBinding(name);
    if (binding) {
      return binding.tail;
    }
    diagnostics.report({
      kind: 'undefined-identifier',
      message: `Undefined identifier: ${name.name}`,
      location,
    });
    return NIL;
  }

  /**
   * Overwrite the newest binding. Returns false when the symbol is unbound.
   */
  assign(name: SymbolObj, value: Value): boolean {
    const binding = this.lookupBinding(name);
    if (!binding) {
      return false;
    }
    binding.tail = value;
    return true;
  }
}
