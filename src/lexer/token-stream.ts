import { AppendVec } from "../utils/append-vec.js";
import type { Token, TokenKind, TokenSpan } from "./tokens.js";

/**
 * The lexer's output: three append-only sequences kept index-aligned, so
 * `spans.get(i)` and `kinds.get(i)` always describe the same token.
 */
export class TokenStream implements Iterable<Token> {
  /** The entire source file */
  readonly code: string;
  /** UTF-8 byte offsets of every `\n` in `code`, in increasing order */
  readonly lineBreaks: AppendVec<number>;
  readonly spans: AppendVec<TokenSpan>;
  readonly kinds: AppendVec<TokenKind>;

  constructor(code: string, capacityHint: number = 1024) {
    this.code = code;
    this.lineBreaks = new AppendVec(Math.max(16, capacityHint / 8));
    this.spans = new AppendVec(capacityHint);
    this.kinds = new AppendVec(capacityHint);
  }

  get length(): number {
    return this.kinds.length;
  }

  add(kind: TokenKind, span: TokenSpan): void {
    this.kinds.push(kind);
    this.spans.push(span);
  }

  addLineBreak(offset: number): void {
    this.lineBreaks.push(offset);
  }

  token(index: number): Token | undefined {
    const kind = this.kinds.get(index);
    const span = this.spans.get(index);
    if (kind === undefined || span === undefined) return undefined;
    return { kind, span };
  }

  toArray(): Token[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<Token> {
    for (let i = 0; i < this.length; i++) {
      const token = this.token(i);
      if (token) yield token;
    }
  }
}
