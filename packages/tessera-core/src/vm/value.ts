/**
 * Value representation
 *
 * A Value is a fixed-width handle: either a JS number carrying an immediate
 * scalar, or a reference to a heap object. Immediates are packed arithmetically
 * (no pointer bits are borrowed) so they never allocate:
 *
 *   handle = payload * 8 + directTag          directTag in the low 3 bits
 *
 * Direct tags:
 *   1  Integer   payload is a signed 47-bit integer
 *   2  Extended  payload = subPayload * 16 + extendedTag
 *
 * Extended tags (second level, 4 bits):
 *   0  Nil   1  True   2  False   3  Char (subPayload = code point)
 *
 * Direct tag 0 is the object tag; objects are never numbers, so it never
 * appears in a handle. Any other number is malformed and decodes to
 * Tag.Unknown.
 */

import type { HeapObject } from './objects.js';
import { IntegerOverflowError } from './errors.js';

export type Value = number | HeapObject;

/**
 * Full tag enumeration (direct, extended, and object-derived tags)
 */
export enum Tag {
  Nil = 'nil',
  Boolean = 'boolean',
  Integer = 'integer',
  Char = 'char',
  Symbol = 'symbol',
  String = 'string',
  Pair = 'pair',
  Function = 'function',
  Class = 'class',
  Instance = 'instance',
  Unknown = 'unknown',
}

export enum DirectTag {
  Object = 0,
  Integer = 1,
  Extended = 2,
}

export enum ExtendedTag {
  Nil = 0,
  True = 1,
  False = 2,
  Char = 3,
}

const DIRECT_TAG_SPAN = 8;
const EXTENDED_TAG_SPAN = 16;
const MAX_CODE_POINT = 0x10ffff;

/** Largest integer an immediate can hold: 2^46 - 1 */
export const MAX_INT = 2 ** 46 - 1;
/** Smallest integer an immediate can hold: -2^46 */
export const MIN_INT = -(2 ** 46);

function encodeExtended(extendedTag: ExtendedTag, payload: number): number {
  return (payload * EXTENDED_TAG_SPAN + extendedTag) * DIRECT_TAG_SPAN + DirectTag.Extended;
}

/**
 * Canonical singletons
 */
export const NIL: Value = encodeExtended(ExtendedTag.Nil, 0);
export const TRUE: Value = encodeExtended(ExtendedTag.True, 0);
export const FALSE: Value = encodeExtended(ExtendedTag.False, 0);

function floorMod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

/**
 * Low 3 bits of an immediate handle
 */
export function directTagOf(handle: number): number {
  return floorMod(handle, DIRECT_TAG_SPAN);
}

/**
 * Everything above the direct tag
 */
export function directPayloadOf(handle: number): number {
  return (handle - directTagOf(handle)) / DIRECT_TAG_SPAN;
}

export function isImmediate(value: Value): value is number {
  return typeof value === 'number';
}

export function isObject(value: Value): value is HeapObject {
  return typeof value !== 'number';
}

export function tagOf(value: Value): Tag {
  if (typeof value !== 'number') {
    return value.tag;
  }
  if (!Number.isSafeInteger(value)) {
    return Tag.Unknown;
  }
  const direct = directTagOf(value);
  if (direct === DirectTag.Integer) {
    return Tag.Integer;
  }
  if (direct !== DirectTag.Extended) {
    return Tag.Unknown;
  }
  const extended = directPayloadOf(value);
  switch (floorMod(extended, EXTENDED_TAG_SPAN)) {
    case ExtendedTag.Nil:
      return extended === ExtendedTag.Nil ? Tag.Nil : Tag.Unknown;
    case ExtendedTag.True:
    case ExtendedTag.False:
      return extended < EXTENDED_TAG_SPAN ? Tag.Boolean : Tag.Unknown;
    case ExtendedTag.Char: {
      const codePoint = (extended - ExtendedTag.Char) / EXTENDED_TAG_SPAN;
      return codePoint >= 0 && codePoint <= MAX_CODE_POINT ? Tag.Char : Tag.Unknown;
    }
    default:
      return Tag.Unknown;
  }
}

export function isIntegerInRange(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_INT && n <= MAX_INT;
}

/**
 * Encode an integer immediate. Out-of-range or non-integral input is rejected.
 */
export function makeInt(n: number): number {
  if (!isIntegerInRange(n)) {
    throw new IntegerOverflowError(`integer ${n} does not fit in an immediate (range ${MIN_INT}..${MAX_INT})`);
  }
  return n * DIRECT_TAG_SPAN + DirectTag.Integer;
}

export function isInt(value: Value): value is number {
  return tagOf(value) === Tag.Integer;
}

/**
 * Decode an integer immediate. Returns null for any other tag.
 */
export function asInt(value: Value): number | null {
  if (typeof value !== 'number' || tagOf(value) !== Tag.Integer) {
    return null;
  }
  return directPayloadOf(value);
}

export function makeChar(ch: string): Value {
  const codePoint = ch.codePointAt(0);
  if (codePoint === undefined) {
    throw new RangeError('makeChar requires a non-empty string');
  }
  return encodeExtended(ExtendedTag.Char, codePoint);
}

export function asChar(value: Value): string | null {
  if (typeof value !== 'number' || tagOf(value) !== Tag.Char) {
    return null;
  }
  return String.fromCodePoint(Math.floor(directPayloadOf(value) / EXTENDED_TAG_SPAN));
}

export function makeBoolean(b: boolean): Value {
  return b ? TRUE : FALSE;
}

/**
 * Object reference of a value, or null for immediates
 */
export function asObject(value: Value): HeapObject | null {
  return typeof value === 'number' ? null : value;
}

export function isNil(value: Value): boolean {
  return value === NIL;
}

/**
 * Conditional truth: nil and false are false, everything else is true.
 */
export function isTruthy(value: Value): boolean {
  return value !== NIL && value !== FALSE;
}

/**
 * Bit identity: same tag and either the same immediate bits or the same object.
 */
export function identical(x: Value, y: Value): boolean {
  if (tagOf(x) !== tagOf(y)) {
    return false;
  }
  // Immediates compare by handle bits, objects by reference
  return x === y;
}
