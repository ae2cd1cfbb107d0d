/**
 * LEB128 operand encoding. Arithmetic rather than 32-bit shifts, so the whole
 * safe-integer range round-trips.
 */

import { BytecodeError } from './errors.js';

export interface Decoded {
  value: number;
  /** Offset of the first byte after the operand */
  next: number;
}

export function encodeUnsigned(value: number): number[] {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as unsigned LEB128`);
  }
  const result: number[] = [];
  let v = value;
  do {
    let byte = v % 128;
    v = Math.floor(v / 128);
    if (v !== 0) byte |= 0x80;
    result.push(byte);
  } while (v !== 0);
  return result;
}

export function encodeSigned(value: number): number[] {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode ${value} as signed LEB128`);
  }
  const result: number[] = [];
  let v = value;
  for (;;) {
    const byte = ((v % 128) + 128) % 128;
    v = Math.floor(v / 128);
    const signBitSet = (byte & 0x40) !== 0;
    if ((v === 0 && !signBitSet) || (v === -1 && signBitSet)) {
      result.push(byte);
      return result;
    }
    result.push(byte | 0x80);
  }
}

export function decodeUnsigned(bytes: Uint8Array, offset: number): Decoded {
  let value = 0;
  let scale = 1;
  let pos = offset;
  for (;;) {
    if (pos >= bytes.length) {
      throw new BytecodeError('Truncated LEB128 operand', offset);
    }
    const byte = bytes[pos++];
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) {
      break;
    }
    scale *= 128;
  }
  if (!Number.isSafeInteger(value)) {
    throw new BytecodeError('LEB128 operand exceeds the safe integer range', offset);
  }
  return { value, next: pos };
}

export function decodeSigned(bytes: Uint8Array, offset: number): Decoded {
  let value = 0;
  let scale = 1;
  let pos = offset;
  let byte: number;
  do {
    if (pos >= bytes.length) {
      throw new BytecodeError('Truncated LEB128 operand', offset);
    }
    byte = bytes[pos++];
    value += (byte & 0x7f) * scale;
    scale *= 128;
  } while ((byte & 0x80) !== 0);
  if ((byte & 0x40) !== 0) {
    value -= scale;
  }
  if (!Number.isSafeInteger(value)) {
    throw new BytecodeError('LEB128 operand exceeds the safe integer range', offset);
  }
  return { value, next: pos };
}
