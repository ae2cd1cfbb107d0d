/**
 * Reader - s-expression syntax to Values
 *
 * Decimal integers, #t #f, #\c characters, "strings", symbols, (proper and
 * . dotted) lists, 'quote, ; comments.
 *
 * Immediates cannot carry a location, so list locations are kept in a side
 * table the compiler consults for error messages.
 */

import { type Value, NIL, TRUE, FALSE, makeInt, makeChar, isIntegerInRange } from '../vm/value.js';
import { type PairObj, intern, makePair, makeString } from '../vm/objects.js';
import type { Location } from '../vm/diagnostics.js';

export class ParseError extends Error {
  constructor(message: string, public readonly location: Location) {
    super(`Parse error in ${location.file} at ${location.line}:${location.column}: ${message}`);
    this.name = 'ParseError';
  }
}

export interface Datum {
  value: Value;
  location: Location;
}

/**
 * Where each parsed list started
 */
export const listLocations = new WeakMap<PairObj, Location>();

type TokenKind = 'open' | 'close' | 'quote' | 'string' | 'atom' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  location: Location;
}

const charNames: Record<string, string> = {
  space: ' ',
  newline: '\n',
  tab: '\t',
  return: '\r',
};

const escapes: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

const INTEGER = /^[+-]?\d+$/;
const NUMERIC = /^[+-]?\.?\d/;

function isDelimiter(c: string): boolean {
  return /[\s()";']/.test(c);
}

export class Parser {
  private pos = 0;
  private line = 1;
  private column = 1;
  private lookahead: Token | null = null;

  constructor(
    private readonly input: string,
    private readonly file: string = '<unknown>'
  ) {}

  /**
   * Parse the input into a list of top-level datums
   */
  parse(): Datum[] {
    const datums: Datum[] = [];
    while (this.peek().kind !== 'eof') {
      const { location } = this.peek();
      datums.push({ value: this.readDatum(), location });
    }
    return datums;
  }

  private readDatum(): Value {
    const token = this.next();
    switch (token.kind) {
      case 'eof':
        throw new ParseError('Unexpected end of input', token.location);
      case 'close':
        throw new ParseError("Unexpected ')'", token.location);
      case 'string':
        return makeString(token.text);
      case 'quote': {
        const quoted = makePair(intern('quote'), makePair(this.readDatum(), NIL));
        listLocations.set(quoted, token.location);
        return quoted;
      }
      case 'open':
        return this.readList(token.location);
      case 'atom':
        if (token.text === '.') {
          throw new ParseError("Unexpected '.'", token.location);
        }
        return this.atom(token);
    }
  }

  private readList(start: Location): Value {
    const items: Value[] = [];
    let tail: Value = NIL;

    for (;;) {
      const token = this.peek();
      if (token.kind === 'eof') {
        throw new ParseError("Expected ')'", token.location);
      }
      if (token.kind === 'close') {
        this.next();
        break;
      }
      if (token.kind === 'atom' && token.text === '.' && items.length > 0) {
        // Improper list: (a . b)
        this.next();
        tail = this.readDatum();
        const close = this.next();
        if (close.kind !== 'close') {
          throw new ParseError("Expected ')' after the dotted tail", close.location);
        }
        break;
      }
      items.push(this.readDatum());
    }

    let result = tail;
    for (let i = items.length - 1; i >= 0; i--) {
      result = makePair(items[i], result);
    }
    if (items.length > 0 && typeof result !== 'number') {
      const head = result.asPair();
      if (head) listLocations.set(head, start);
    }
    return result;
  }

  private atom(token: Token): Value {
    const { text, location } = token;
    if (INTEGER.test(text)) {
      const n = Number.parseInt(text, 10);
      if (!isIntegerInRange(n)) {
        throw new ParseError(`Integer literal out of range: ${text}`, location);
      }
      return makeInt(n);
    }
    if (NUMERIC.test(text)) {
      throw new ParseError(`Only integers are supported: ${text}`, location);
    }
    if (text === '#t') return TRUE;
    if (text === '#f') return FALSE;
    if (text.startsWith('#\\')) {
      const name = text.slice(2);
      if ([...name].length === 1) {
        return makeChar(name);
      }
      const named = charNames[name.toLowerCase()];
      if (named === undefined) {
        throw new ParseError(`Unknown character name: ${name}`, location);
      }
      return makeChar(named);
    }
    if (text.startsWith('#')) {
      throw new ParseError(`Invalid hash expression: ${text}`, location);
    }
    return intern(text);
  }

  // ============ Scanner ============

  private peek(): Token {
    if (!this.lookahead) {
      this.lookahead = this.scan();
    }
    return this.lookahead;
  }

  private next(): Token {
    const token = this.peek();
    this.lookahead = null;
    return token;
  }

  private scan(): Token {
    this.skipWhitespaceAndComments();
    const location = this.location();
    if (this.pos >= this.input.length) {
      return { kind: 'eof', text: '', location };
    }

    const c = this.advance();
    switch (c) {
      case '(':
        return { kind: 'open', text: c, location };
      case ')':
        return { kind: 'close', text: c, location };
      case "'":
        return { kind: 'quote', text: c, location };
      case '"':
        return { kind: 'string', text: this.scanString(location), location };
      default:
        break;
    }

    let text = c;
    if (c === '#' && this.current() === '\\') {
      // The character after #\ is taken as is, even a delimiter
      text += this.advance();
      if (this.pos < this.input.length) text += this.advance();
    }
    while (this.pos < this.input.length && !isDelimiter(this.current())) {
      text += this.advance();
    }
    return { kind: 'atom', text, location };
  }

  private scanString(start: Location): string {
    let str = '';
    for (;;) {
      if (this.pos >= this.input.length) {
        throw new ParseError('Unterminated string', start);
      }
      const c = this.advance();
      if (c === '"') return str;
      if (c === '\\') {
        if (this.pos >= this.input.length) {
          throw new ParseError('Unterminated string', start);
        }
        const escaped = this.advance();
        str += escapes[escaped] ?? escaped;
      } else {
        str += c;
      }
    }
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.input.length) {
      const c = this.current();
      if (c === ';') {
        while (this.pos < this.input.length && this.current() !== '\n') this.advance();
      } else if (/\s/.test(c)) {
        this.advance();
      } else {
        return;
      }
    }
  }

  private current(): string {
    return this.input[this.pos];
  }

  /**
   * Consume one code point
   */
  private advance(): string {
    const c = String.fromCodePoint(this.input.codePointAt(this.pos) ?? 0);
    this.pos += c.length;
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private location(): Location {
    return { file: this.file, line: this.line, column: this.column };
  }
}

export function parse(source: string, file: string = '<unknown>'): Datum[] {
  return new Parser(source, file).parse();
}

/**
 * Parse exactly one expression
 */
export function parseOne(source: string): Value {
  const datums = parse(source);
  if (datums.length === 0) {
    throw new ParseError('No expression to parse', { file: '<unknown>', line: 1, column: 1 });
  }
  if (datums.length > 1) {
    throw new ParseError('Multiple expressions found, expected one', datums[1].location);
  }
  return datums[0].value;
}
