/**
 * Value encoding tests
 */

import { describe, it, expect } from 'vitest';
import {
  type Value,
  Tag,
  NIL,
  TRUE,
  FALSE,
  MAX_INT,
  MIN_INT,
  makeInt,
  asInt,
  makeChar,
  asChar,
  tagOf,
  isTruthy,
  identical,
  directTagOf,
} from './value.js';
import { IntegerOverflowError } from './errors.js';
import { intern, makeString, makePair, equal, list } from './objects.js';

describe('Value - Immediates', () => {
  it('should encode the canonical singletons', () => {
    expect(NIL).toBe(2);
    expect(TRUE).toBe(10);
    expect(FALSE).toBe(18);
    expect(tagOf(NIL)).toBe(Tag.Nil);
    expect(tagOf(TRUE)).toBe(Tag.Boolean);
    expect(tagOf(FALSE)).toBe(Tag.Boolean);
  });

  it('should pack integers above the direct tag', () => {
    expect(makeInt(5)).toBe(41);
    expect(makeInt(-1)).toBe(-7);
    expect(directTagOf(makeInt(-1))).toBe(1);
    expect(asInt(makeInt(-1))).toBe(-1);
    expect(asInt(makeInt(0))).toBe(0);
  });

  it('should round-trip the integer range bounds', () => {
    expect(asInt(makeInt(MAX_INT))).toBe(MAX_INT);
    expect(asInt(makeInt(MIN_INT))).toBe(MIN_INT);
  });

  it('should reject integers outside the range', () => {
    expect(() => makeInt(MAX_INT + 1)).toThrow(IntegerOverflowError);
    expect(() => makeInt(MIN_INT - 1)).toThrow(IntegerOverflowError);
    expect(() => makeInt(1.5)).toThrow(IntegerOverflowError);
  });

  it('should encode characters as extended immediates', () => {
    const a = makeChar('a');
    expect(a).toBe(12442);
    expect(tagOf(a)).toBe(Tag.Char);
    expect(asChar(a)).toBe('a');
    expect(asChar(makeChar('λ'))).toBe('λ');
  });

  it('should not decode one kind as another', () => {
    expect(asInt(TRUE)).toBeNull();
    expect(asChar(makeInt(97))).toBeNull();
    expect(asInt(makeString('1'))).toBeNull();
  });
});

describe('Value - Malformed handles', () => {
  it('should decode unknown direct tags as Unknown', () => {
    expect(tagOf(0)).toBe(Tag.Unknown);
    expect(tagOf(3)).toBe(Tag.Unknown);
    expect(tagOf(7)).toBe(Tag.Unknown);
  });

  it('should decode bad extended payloads as Unknown', () => {
    // nil with a payload, a boolean with a payload, an unused extended tag
    expect(tagOf(130)).toBe(Tag.Unknown);
    expect(tagOf(138)).toBe(Tag.Unknown);
    expect(tagOf(34)).toBe(Tag.Unknown);
    // char sub-payloads outside 0..0x10FFFF
    expect(tagOf((-1 * 16 + 3) * 8 + 2)).toBe(Tag.Unknown);
    expect(tagOf((0x110000 * 16 + 3) * 8 + 2)).toBe(Tag.Unknown);
    expect(asChar((-1 * 16 + 3) * 8 + 2)).toBeNull();
  });

  it('should decode non-integral numbers as Unknown', () => {
    expect(tagOf(1.5)).toBe(Tag.Unknown);
    expect(tagOf(Number.NaN)).toBe(Tag.Unknown);
  });
});

describe('Value - Truth and identity', () => {
  it('should treat only nil and false as false', () => {
    expect(isTruthy(NIL)).toBe(false);
    expect(isTruthy(FALSE)).toBe(false);
    expect(isTruthy(TRUE)).toBe(true);
    expect(isTruthy(makeInt(0))).toBe(true);
    expect(isTruthy(makeString(''))).toBe(true);
  });

  it('should compare immediates by bits and objects by reference', () => {
    expect(identical(makeInt(3), makeInt(3))).toBe(true);
    expect(identical(makeInt(3), makeInt(4))).toBe(false);
    expect(identical(intern('foo'), intern('foo'))).toBe(true);
    expect(identical(makeString('ab'), makeString('ab'))).toBe(false);
  });

  it('should intern one symbol per spelling', () => {
    expect(intern('foo')).toBe(intern('foo'));
    expect(identical(intern('foo'), intern('bar'))).toBe(false);
  });

  it('should never identify values of different tags', () => {
    expect(identical(NIL, FALSE)).toBe(false);
    expect(identical(makeInt(0), makeChar('\0'))).toBe(false);
  });

  it('should compare structurally with equal', () => {
    expect(equal(makeString('ab'), makeString('ab'))).toBe(true);
    expect(equal(list(makeInt(1), makeInt(2)), list(makeInt(1), makeInt(2)))).toBe(true);
    expect(equal(makePair(makeInt(1), makeInt(2)), makePair(makeInt(1), makeInt(3)))).toBe(false);
  });

  it('should compare cyclic lists without running away', () => {
    const a = makePair(makeInt(1), NIL);
    a.tail = a;
    const b = makePair(makeInt(1), NIL);
    b.tail = b;
    const c = makePair(makeInt(2), NIL);
    c.tail = c;
    expect(equal(a, b)).toBe(true);
    expect(equal(a, c)).toBe(false);
  });

  it('should compare long lists', () => {
    let x: Value = NIL;
    let y: Value = NIL;
    for (let i = 0; i < 100000; i++) {
      x = makePair(makeInt(i), x);
      y = makePair(makeInt(i), y);
    }
    expect(equal(x, y)).toBe(true);
  });
});
