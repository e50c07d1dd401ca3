import type { TokenStream } from "./token-stream.js";

/** Bytes the UTF-16 code unit takes in UTF-8, pairs aside. */
function utf8Width(unit: number): number {
  if (unit < 0x80) return 1;
  if (unit < 0x800) return 2;
  return 3;
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/**
 * Scan position shared by every recursive step of the lexer. The source is
 * never copied: everything not yet consumed is `code.slice(offset)`.
 *
 * `offset` indexes the string; `byteOffset`, `lineStart` and the recorded
 * line breaks count UTF-8 bytes, so columns are byte columns.
 */
export class Cursor {
  readonly code: string;
  offset: number = 0;
  byteOffset: number = 0;
  line: number = 1;
  /** Byte offset of the first character of the current line */
  lineStart: number = 0;

  private readonly stream: TokenStream;

  constructor(stream: TokenStream) {
    this.stream = stream;
    this.code = stream.code;
  }

  get done(): boolean {
    return this.offset >= this.code.length;
  }

  get remaining(): number {
    return this.code.length - this.offset;
  }

  /** Empty string past the end of input. */
  peek(ahead: number = 0): string {
    return this.code.charAt(this.offset + ahead);
  }

  startsWith(text: string): boolean {
    return this.code.startsWith(text, this.offset);
  }

  /** The whole code point at the cursor, empty past the end of input. */
  peekCodePoint(): string {
    const cp = this.code.codePointAt(this.offset);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  column(): number {
    return this.byteOffset - this.lineStart;
  }

  /** Never stops between the halves of a surrogate pair. */
  advance(count: number = 1): void {
    const end = Math.min(this.code.length, this.offset + count);
    while (this.offset < end) {
      const unit = this.code.charCodeAt(this.offset);
      if (isHighSurrogate(unit) && isLowSurrogate(this.code.charCodeAt(this.offset + 1))) {
        this.byteOffset += 4;
        this.offset += 2;
      } else {
        this.byteOffset += utf8Width(unit);
        this.offset++;
      }
    }
  }

  /**
   * Step over the `\n` at the current offset, recording it as a line break.
   * Every newline the lexer consumes goes through here, inside literals too.
   */
  newline(): void {
    this.stream.addLineBreak(this.byteOffset);
    this.offset++;
    this.byteOffset++;
    this.lineStart = this.byteOffset;
    this.line++;
  }

  /** Advance one character, tracking it if it is a newline. */
  bump(): void {
    if (this.peek() === "\n") {
      this.newline();
    } else {
      this.advance();
    }
  }
}
