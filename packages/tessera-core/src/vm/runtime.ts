/**
 * Runtime - the class arena, the tag-to-class map and the global environment.
 *
 * Several VMs (threads) may share one runtime; they then share its globals and
 * class table. Class handler lists are expected to change only while setting
 * up, before any VM runs against the runtime.
 */

import { Tag, NIL, TRUE, FALSE } from './value.js';
import {
  ClassObj,
  PrimitiveObj,
  type ClassId,
  type Callable,
  type MessageHandler,
  type PrimitiveFunction,
  intern,
} from './objects.js';
import { Environment } from './environment.js';
import { installPrimitives } from './primitives.js';

/**
 * Classes every runtime starts with
 */
export interface BuiltinClasses {
  object: ClassObj;
  undefinedObject: ClassObj;
  boolean: ClassObj;
  integer: ClassObj;
  character: ClassObj;
  symbol: ClassObj;
  string: ClassObj;
  pair: ClassObj;
  function: ClassObj;
  class: ClassObj;
}

export interface RuntimeOptions {
  /** Share an existing global environment instead of creating one */
  globals?: Environment;
  /** Skip the standard primitive handlers (bare class hierarchy only) */
  bare?: boolean;
}

export class Runtime {
  /** Class arena, indexed by ClassId */
  private readonly classes: ClassObj[] = [];
  private readonly classByTag = new Map<Tag, ClassObj>();

  readonly globals: Environment;
  readonly builtins: BuiltinClasses;

  constructor(options: RuntimeOptions = {}) {
    this.globals = options.globals ?? new Environment();

    const object = this.defineClass('Object', null, Tag.Unknown);
    this.builtins = {
      object,
      undefinedObject: this.defineClass('UndefinedObject', object, Tag.Nil),
      boolean: this.defineClass('Boolean', object, Tag.Boolean),
      integer: this.defineClass('Integer', object, Tag.Integer),
      character: this.defineClass('Character', object, Tag.Char),
      symbol: this.defineClass('Symbol', object, Tag.Symbol),
      string: this.defineClass('String', object, Tag.String),
      pair: this.defineClass('Pair', object, Tag.Pair),
      function: this.defineClass('Function', object, Tag.Function),
      class: this.defineClass('Class', object, Tag.Class),
    };

    this.globals.define(intern('nil'), NIL);
    this.globals.define(intern('true'), TRUE);
    this.globals.define(intern('false'), FALSE);

    if (!options.bare) {
      installPrimitives(this);
    }
  }

  /**
   * Add a class to the arena and bind its name in the globals.
   *
   * @param instanceTag tag of the values that are instances of this class;
   *   user classes use Tag.Instance and are never looked up by tag
   */
  defineClass(name: string, base: ClassObj | null, instanceTag: Tag = Tag.Instance): ClassObj {
    const klass = new ClassObj(this.classes.length, name, base ? base.id : null, instanceTag);
    this.classes.push(klass);
    if (instanceTag !== Tag.Instance) {
      this.classByTag.set(instanceTag, klass);
    }
    this.globals.define(intern(name), klass);
    return klass;
  }

  classById(id: ClassId): ClassObj {
    const klass = this.classes[id];
    if (!klass) {
      throw new RangeError(`No class with id ${id}`);
    }
    return klass;
  }

  baseOf(klass: ClassObj): ClassObj | null {
    return klass.base === null ? null : this.classById(klass.base);
  }

  /**
   * Class whose instances use `tag`; unrecognised tags fall back to Object
   */
  classForTag(tag: Tag): ClassObj {
    return this.classByTag.get(tag) ?? this.builtins.object;
  }

  allClasses(): readonly ClassObj[] {
    return this.classes;
  }

  installHandler(klass: ClassObj, selector: string, callable: Callable): MessageHandler {
    return klass.install(intern(selector), callable);
  }

  installPrimitive(klass: ClassObj, selector: string, arity: number | null, fn: PrimitiveFunction): MessageHandler {
    return this.installHandler(klass, selector, new PrimitiveObj(selector, arity, fn));
  }
}
