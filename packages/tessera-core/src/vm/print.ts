/**
 * External representation of values. Total over every handle: anything the
 * tag decoder does not recognise prints through the fallback branch.
 */

import { Tag, type Value, tagOf, asInt, asChar, TRUE } from './value.js';
import type { HeapObject, PairObj } from './objects.js';

const charNames: Record<string, string> = {
  ' ': 'space',
  '\n': 'newline',
  '\t': 'tab',
  '\r': 'return',
};

function printString(s: string): string {
  let out = '"';
  for (const ch of s) {
    switch (ch) {
      case '"': out += '\\"'; break;
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n'; break;
      case '\t': out += '\\t'; break;
      case '\r': out += '\\r'; break;
      default: out += ch;
    }
  }
  return out + '"';
}

function printPair(pair: PairObj, active: Set<PairObj>): string {
  const parts: string[] = [];
  let current: Value = pair;
  const seen: PairObj[] = [];
  for (;;) {
    const cell: PairObj | null = typeof current === 'number' ? null : current.asPair();
    if (!cell) {
      break;
    }
    if (active.has(cell)) {
      parts.push('...');
      current = cell;
      break;
    }
    active.add(cell);
    seen.push(cell);
    parts.push(print(cell.head, active));
    current = cell.tail;
  }
  let text = parts.join(' ');
  const tailTag = tagOf(current);
  if (tailTag !== Tag.Nil && !(typeof current !== 'number' && current.asPair())) {
    text += ` . ${print(current, active)}`;
  }
  for (const cell of seen) {
    active.delete(cell);
  }
  return `(${text})`;
}

function printObject(obj: HeapObject, active: Set<PairObj>): string {
  const pair = obj.asPair();
  if (pair) {
    return printPair(pair, active);
  }
  const sym = obj.asSymbol();
  if (sym) {
    return sym.name;
  }
  const str = obj.asString();
  if (str) {
    return printString(str.value);
  }
  const prim = obj.asPrimitive();
  if (prim) {
    return `#<primitive ${prim.name}>`;
  }
  const method = obj.asCompiledMethod();
  if (method) {
    return `#<method ${method.name}>`;
  }
  const klass = obj.asClass();
  if (klass) {
    return `#<class ${klass.name}>`;
  }
  const instance = obj.asInstance();
  if (instance) {
    return `#<${instance.klass.name}>`;
  }
  return `#<object ${obj.tag}>`;
}

function print(value: Value, active: Set<PairObj>): string {
  switch (tagOf(value)) {
    case Tag.Nil:
      return 'nil';
    case Tag.Boolean:
      return value === TRUE ? '#t' : '#f';
    case Tag.Integer:
      return String(asInt(value));
    case Tag.Char: {
      const ch = asChar(value) ?? '';
      return `#\\${charNames[ch] ?? ch}`;
    }
    case Tag.Symbol:
    case Tag.String:
    case Tag.Pair:
    case Tag.Function:
    case Tag.Class:
    case Tag.Instance:
      if (typeof value !== 'number') {
        return printObject(value, active);
      }
      return `#<unknown ${String(value)}>`;
    default:
      return `#<unknown ${String(value)}>`;
  }
}

export function printValue(value: Value): string {
  return print(value, new Set());
}
