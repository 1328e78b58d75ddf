/**
 * Sequential line reader over an immutable byte buffer.
 *
 * Lines end at LF; one trailing CR is stripped. Bytes are decoded as
 * latin1 so that every byte value maps to exactly one character and
 * survives a parse/serialize round trip.
 */

const LF = 0x0a;
const CR = 0x0d;

export class ByteCursor {
  private readonly bytes: Uint8Array;
  private offset = 0;
  private line = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static fromText(text: string): ByteCursor {
    return new ByteCursor(Buffer.from(text, 'latin1'));
  }

  /** 1-based number of the last line returned, 0 before the first read. */
  get lineNumber(): number {
    return this.line;
  }

  get atEnd(): boolean {
    return this.offset >= this.bytes.length;
  }

  /**
   * Return the next line, or undefined once the buffer is exhausted.
   * A blank line in the middle of the buffer comes back as ''.
   */
  nextLine(): string | undefined {
    if (this.atEnd) {
      return undefined;
    }

    const start = this.offset;
    let end = this.bytes.indexOf(LF, start);
    if (end === -1) {
      end = this.bytes.length;
      this.offset = end;
    } else {
      this.offset = end + 1;
    }

    if (end > start && this.bytes[end - 1] === CR) {
      end -= 1;
    }

    this.line += 1;
    return Buffer.from(this.bytes.buffer, this.bytes.byteOffset + start, end - start).toString('latin1');
  }

  rewind(): void {
    this.offset = 0;
    this.line = 0;
  }
}
