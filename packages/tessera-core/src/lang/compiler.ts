/**
 * Compiler - s-expressions to CompiledMethods
 *
 * Every combination is a message send: `(sel recv arg ...)` sends `sel` to
 * `recv`; `(sel)` sends it to nil. Special forms:
 *
 *   (quote datum)
 *   (if test then [else])
 *   (begin expr ...)
 *   (define name expr)
 *   (send recv selector-expr arg ...)       selector computed at run time
 *   (defclass Name [Base])
 *   (defmethod Class (selector self arg ...) body ...)
 *
 * Inside a method body the parameter names compile to argument loads; every
 * other symbol is a global lookup.
 */

import { type Value, NIL } from '../vm/value.js';
import { type CompiledMethod, type PairObj, type SymbolObj, asPair, asSymbol, intern, listToArray } from '../vm/objects.js';
import { Assembler } from '../vm/assembler.js';
import type { Location } from '../vm/diagnostics.js';
import { type Datum, listLocations } from './parser.js';

export class CompileError extends Error {
  constructor(message: string, public readonly location?: Location) {
    super(location ? `${message} at ${location.file}:${location.line}:${location.column}` : message);
    this.name = 'CompileError';
  }
}

const sym = {
  quote: intern('quote'),
  if: intern('if'),
  begin: intern('begin'),
  define: intern('define'),
  send: intern('send'),
  defclass: intern('defclass'),
  defmethod: intern('defmethod'),
  subclass: intern('subclass'),
  install: intern('install'),
  Object: intern('Object'),
};

/** Method parameters by name, receiver at index 0 */
type Parameters = ReadonlyMap<SymbolObj, number>;

const noParameters: Parameters = new Map();

export class Compiler {
  /**
   * Compile one top-level expression into a program (a zero-argument method
   * returning the expression's value).
   */
  compile(expr: Value, location?: Location, name: string = '<toplevel>'): CompiledMethod {
    const asm = new Assembler(name, 0, location);
    this.compileExpr(expr, asm, noParameters, location);
    asm.emitReturn();
    return asm.finish();
  }

  compileDatum(datum: Datum): CompiledMethod {
    return this.compile(datum.value, datum.location);
  }

  private compileExpr(expr: Value, asm: Assembler, params: Parameters, outer?: Location): void {
    const symbol = asSymbol(expr);
    if (symbol) {
      const index = params.get(symbol);
      if (index !== undefined) {
        asm.emitLoadArgument(index);
      } else {
        asm.emitLoadGlobal(symbol);
      }
      return;
    }

    const pair = asPair(expr);
    if (!pair) {
      // Self-evaluating: integers, characters, booleans, nil, strings
      asm.emitConstant(expr);
      return;
    }

    const location = listLocations.get(pair) ?? outer;
    const form = this.elements(pair, location);
    const head = asSymbol(form[0]);
    if (!head) {
      throw new CompileError('A combination must start with a selector symbol', location);
    }

    switch (head) {
      case sym.quote:
        this.expectLength(form, 2, 2, '(quote datum)', location);
        asm.emitConstant(form[1]);
        return;
      case sym.if:
        this.compileIf(form, asm, params, location);
        return;
      case sym.begin:
        this.compileBody(form.slice(1), asm, params, location);
        return;
      case sym.define:
        this.compileDefine(form, asm, params, location);
        return;
      case sym.send:
        this.compileSend(form, asm, params, location);
        return;
      case sym.defclass:
        this.compileDefclass(form, asm, location);
        return;
      case sym.defmethod:
        this.compileDefmethod(form, asm, location);
        return;
      default:
        break;
    }

    const operands = form.slice(1);
    if (operands.length === 0) {
      asm.emitConstant(NIL);
    }
    for (const operand of operands) {
      this.compileExpr(operand, asm, params, location);
    }
    asm.emitSend(head, Math.max(1, operands.length));
  }

  private compileIf(form: Value[], asm: Assembler, params: Parameters, location?: Location): void {
    this.expectLength(form, 3, 4, '(if test then [else])', location);
    const elseLabel = asm.newLabel();
    const endLabel = asm.newLabel();

    this.compileExpr(form[1], asm, params, location);
    asm.emitJumpIfFalse(elseLabel);
    this.compileExpr(form[2], asm, params, location);
    asm.emitJump(endLabel);
    asm.bind(elseLabel);
    if (form.length === 4) {
      this.compileExpr(form[3], asm, params, location);
    } else {
      asm.emitConstant(NIL);
    }
    asm.bind(endLabel);
  }

  /**
   * Expressions in sequence; the value of the last one remains
   */
  private compileBody(body: Value[], asm: Assembler, params: Parameters, location?: Location): void {
    if (body.length === 0) {
      asm.emitConstant(NIL);
      return;
    }
    body.forEach((expr, i) => {
      this.compileExpr(expr, asm, params, location);
      if (i < body.length - 1) {
        asm.emitPop();
      }
    });
  }

  private compileDefine(form: Value[], asm: Assembler, params: Parameters, location?: Location): void {
    this.expectLength(form, 3, 3, '(define name expr)', location);
    const name = asSymbol(form[1]);
    if (!name) {
      throw new CompileError('define needs a symbol name', location);
    }
    asm.emitConstant(name);
    this.compileExpr(form[2], asm, params, location);
    asm.emitDefineGlobal();
  }

  /**
   * receiver, arguments, then the computed selector on top
   */
  private compileSend(form: Value[], asm: Assembler, params: Parameters, location?: Location): void {
    if (form.length < 3) {
      throw new CompileError('Expected (send receiver selector arg ...)', location);
    }
    const [, receiver, selector, ...args] = form;
    this.compileExpr(receiver, asm, params, location);
    for (const arg of args) {
      this.compileExpr(arg, asm, params, location);
    }
    this.compileExpr(selector, asm, params, location);
    asm.emitCall(args.length + 1);
  }

  private compileDefclass(form: Value[], asm: Assembler, location?: Location): void {
    this.expectLength(form, 2, 3, '(defclass Name [Base])', location);
    const name = asSymbol(form[1]);
    const base = form.length === 3 ? asSymbol(form[2]) : sym.Object;
    if (!name || !base) {
      throw new CompileError('defclass needs symbol names', location);
    }
    asm.emitLoadGlobal(base);
    asm.emitConstant(name);
    asm.emitSend(sym.subclass, 2);
  }

  private compileDefmethod(form: Value[], asm: Assembler, location?: Location): void {
    if (form.length < 3) {
      throw new CompileError('Expected (defmethod Class (selector self arg ...) body ...)', location);
    }
    const className = asSymbol(form[1]);
    if (!className) {
      throw new CompileError('defmethod needs a class name', location);
    }
    const signature = listToArray(form[2]);
    if (!signature || signature.length < 2) {
      throw new CompileError('defmethod signature must name the selector and the receiver', location);
    }
    const [selectorValue, ...paramValues] = signature;
    const selector = asSymbol(selectorValue);
    if (!selector) {
      throw new CompileError('defmethod selector must be a symbol', location);
    }

    const params = new Map<SymbolObj, number>();
    paramValues.forEach((value, i) => {
      const param = asSymbol(value);
      if (!param) {
        throw new CompileError('defmethod parameters must be symbols', location);
      }
      if (params.has(param)) {
        throw new CompileError(`Duplicate parameter ${param.name}`, location);
      }
      params.set(param, i);
    });

    const methodAsm = new Assembler(`${className.name}>>${selector.name}`, params.size, location);
    this.compileBody(form.slice(3), methodAsm, params, location);
    methodAsm.emitReturn();
    const method = methodAsm.finish();

    asm.emitLoadGlobal(className);
    asm.emitConstant(selector);
    asm.emitConstant(method);
    asm.emitSend(sym.install, 3);
  }

  private elements(pair: PairObj, location?: Location): Value[] {
    const items = listToArray(pair);
    if (!items) {
      throw new CompileError('Cannot compile a dotted list', location);
    }
    return items;
  }

  private expectLength(form: Value[], min: number, max: number, shape: string, location?: Location): void {
    if (form.length < min || form.length > max) {
      throw new CompileError(`Expected ${shape}`, location);
    }
  }
}

