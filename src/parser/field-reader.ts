/**
 * Numeric field and array readers
 *
 * Values are separated by spaces, tabs or commas and may wrap onto
 * following lines; a single number never spans a line break. Every read
 * starts on a fresh line, so whatever follows the last requested value on
 * its line is ignored.
 *
 *   integer: [-]digits
 *   float:   [-]digits[.digits] | [-].digits
 */

import { ByteCursor } from '../io/byte-cursor.js';
import { NumericFormatError, StructureError } from '../errors/index.js';

export type TokenKind = 'int' | 'float';

export interface ScannedNumber {
  value: number;
  /** Index of the first character after the number. */
  next: number;
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

export function isDelimiter(c: string): boolean {
  return c === ' ' || c === '\t' || c === ',';
}

export function skipDelimiters(text: string, index: number): number {
  let i = index;
  while (i < text.length && isDelimiter(text[i])) i++;
  return i;
}

/**
 * Scan the longest number of the given kind starting at `index`.
 * Throws NumericFormatError when no digits are found there.
 */
export function scanNumber(text: string, index: number, kind: TokenKind): ScannedNumber {
  let i = index;
  if (text[i] === '-') i++;

  let digits = 0;
  while (i < text.length && isDigit(text[i])) {
    i++;
    digits++;
  }

  if (kind === 'float' && text[i] === '.') {
    i++;
    while (i < text.length && isDigit(text[i])) {
      i++;
      digits++;
    }
  }

  if (digits === 0) {
    const found = text.slice(index, index + 12);
    throw new NumericFormatError(
      `Expected ${kind === 'int' ? 'an integer' : 'a number'} but found "${found}"`,
      { kind, column: index + 1 }
    );
  }

  const token = text.slice(index, i);
  const value = kind === 'int' ? Number.parseInt(token, 10) : Number.parseFloat(token);
  return { value, next: i };
}

/**
 * Walks numeric tokens across as many lines as needed.
 */
class LineTokenizer {
  private text = '';
  private index = 0;

  constructor(private readonly cursor: ByteCursor, private readonly what: string) {}

  /** Load the next line with content positioned at its first token. */
  private fetch(): void {
    const line = this.cursor.nextLine();
    if (line === undefined) {
      throw new StructureError(`Unexpected end of input while reading ${this.what}`, {
        line: this.cursor.lineNumber,
        field: this.what,
      });
    }
    if (line === '') {
      throw new StructureError(`Blank line while reading ${this.what}`, {
        line: this.cursor.lineNumber,
        field: this.what,
      });
    }
    this.text = line;
    this.index = skipDelimiters(line, 0);
  }

  start(): void {
    this.fetch();
    if (this.index >= this.text.length) {
      throw new StructureError(`No values on line while reading ${this.what}`, {
        line: this.cursor.lineNumber,
        field: this.what,
      });
    }
  }

  read(kind: TokenKind): number {
    try {
      const { value, next } = scanNumber(this.text, this.index, kind);
      this.index = next;
      return value;
    } catch (err) {
      if (err instanceof NumericFormatError) {
        throw new NumericFormatError(`${err.message} in ${this.what}`, {
          ...err.context,
          line: this.cursor.lineNumber,
          field: this.what,
        });
      }
      throw err;
    }
  }

  /** Skip to the next token, pulling in further lines when this one is used up. */
  advance(): void {
    this.index = skipDelimiters(this.text, this.index);
    while (this.index >= this.text.length) {
      this.fetch();
    }
  }
}

/**
 * Read one value per entry of `kinds`, in order.
 */
export function readFields(cursor: ByteCursor, kinds: readonly TokenKind[], what = 'fields'): number[] {
  const values: number[] = [];
  if (kinds.length === 0) {
    return values;
  }

  const tokenizer = new LineTokenizer(cursor, what);
  tokenizer.start();
  kinds.forEach((kind, i) => {
    if (i > 0) tokenizer.advance();
    values.push(tokenizer.read(kind));
  });
  return values;
}

/**
 * Read exactly `count` floats. A count of zero reads nothing.
 */
export function readFloatArray(cursor: ByteCursor, count: number, what = 'array'): number[] {
  const values: number[] = [];
  if (count <= 0) {
    return values;
  }

  const tokenizer = new LineTokenizer(cursor, what);
  tokenizer.start();
  for (let i = 0; i < count; i++) {
    if (i > 0) tokenizer.advance();
    values.push(tokenizer.read('float'));
  }
  return values;
}
