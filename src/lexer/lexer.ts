import { TokenKind, makeTokenSpan } from "./tokens.js";
import { lookupKeyword, type KeywordMatch } from "./keywords.js";
import { GROUP_CLOSERS, matchOperator, type OperatorMatch } from "./operators.js";
import { Cursor } from "./cursor.js";
import { TokenStream } from "./token-stream.js";
import { LexErrorKind, lexError, unexpectedCharacter, type LexError } from "./errors.js";

export interface LexerOptions {
  /** See {@link lookupKeyword}. Defaults to `"exact"`. */
  keywordMatch?: KeywordMatch;
  /** Initial capacity of the token sequences. */
  capacityHint?: number;
}

/** What a single scan step did. */
export type StepResult =
  | { kind: "progress" }
  | { kind: "emitted"; count: number }
  | { kind: "error"; error: LexError };

export type LexResult =
  | { ok: true; tokens: TokenStream }
  | { ok: false; error: LexError };

const PROGRESS: StepResult = { kind: "progress" };

const STRING_PREFIXES = ['b"', 'c"', '"'];
const CHAR_PREFIXES = ["b'", "'"];

const CLOSER_KINDS: Record<string, TokenKind> = {
  ")": TokenKind.RParens,
  "]": TokenKind.RBracket,
  "}": TokenKind.RBrace,
};

const UNCLOSED: Record<string, LexErrorKind> = {
  "(": LexErrorKind.UnclosedParenthesis,
  "[": LexErrorKind.UnclosedBracket,
  "{": LexErrorKind.UnclosedBrace,
};

export class Lexer {
  private source: string;
  private filename: string;
  private keywordMatch: KeywordMatch;
  private capacityHint: number;

  constructor(source: string, filename: string = "<stdin>", options: LexerOptions = {}) {
    this.source = source;
    this.filename = filename;
    this.keywordMatch = options.keywordMatch ?? "exact";
    this.capacityHint = options.capacityHint ?? 1024;
  }

  /**
   * Lex the whole source. Nesting is handled by recursion, so input nested
   * deeper than the call stack allows throws a `RangeError` instead of
   * returning a result.
   */
  tokenize(): LexResult {
    const tokens = new TokenStream(this.source, this.capacityHint);
    const cursor = new Cursor(tokens);

    while (!cursor.done) {
      const step = this.scanStep(cursor, tokens);
      if (step.kind === "error") return { ok: false, error: step.error };
    }

    return { ok: true, tokens };
  }

  /**
   * Consume, in most cases, a single token.
   *
   * Groups (`(`, `[`, `{`) and interpolated strings recurse back into this
   * method for their contents, so one call may emit many tokens.
   */
  scanStep(cursor: Cursor, tokens: TokenStream): StepResult {
    this.skipWhitespace(cursor);
    if (cursor.done) return PROGRESS;

    if (cursor.startsWith("//")) {
      this.skipComment(cursor);
      return PROGRESS;
    }

    if (cursor.startsWith('$"')) {
      return this.readInterpolatedString(cursor, tokens);
    }

    const op = matchOperator(this.source, cursor.offset);
    if (op) return this.readOperator(cursor, tokens, op);

    const stringPrefix = STRING_PREFIXES.find((p) => cursor.startsWith(p));
    if (stringPrefix !== undefined) {
      return this.readQuoted(cursor, tokens, stringPrefix, '"', TokenKind.String, LexErrorKind.UnterminatedString);
    }

    const charPrefix = CHAR_PREFIXES.find((p) => cursor.startsWith(p));
    if (charPrefix !== undefined) {
      return this.readQuoted(cursor, tokens, charPrefix, "'", TokenKind.Char, LexErrorKind.UnterminatedChar);
    }

    const ch = cursor.peek();
    if (this.isAlpha(ch) || ch === "_") return this.readIdentOrKeyword(cursor, tokens);
    if (this.isDigit(ch)) return this.readNumber(cursor, tokens);

    return {
      kind: "error",
      error: unexpectedCharacter(this.filename, cursor.peekCodePoint(), cursor.offset, cursor.line, cursor.column()),
    };
  }

  private readOperator(cursor: Cursor, tokens: TokenStream, op: OperatorMatch): StepResult {
    const startPos = cursor.offset;
    const startLine = cursor.line;
    const startCol = cursor.column();
    const before = tokens.length;

    cursor.advance(op.length);
    tokens.add(op.kind, makeTokenSpan(this.source, startPos, cursor.offset, startLine, startCol));

    const opener = this.source.slice(startPos, cursor.offset);
    const closer = GROUP_CLOSERS.get(opener);
    if (closer === undefined) return { kind: "emitted", count: 1 };

    // Scan the group's contents until its closer is next
    for (;;) {
      this.skipTrivia(cursor);
      if (cursor.done) {
        return {
          kind: "error",
          error: lexError(UNCLOSED[opener], this.filename, startPos, startLine, startCol, op.length),
        };
      }
      if (cursor.peek() === closer) break;

      const step = this.scanStep(cursor, tokens);
      if (step.kind === "error") return step;
    }

    const closePos = cursor.offset;
    const closeCol = cursor.column();
    cursor.advance();
    tokens.add(CLOSER_KINDS[closer], makeTokenSpan(this.source, closePos, cursor.offset, cursor.line, closeCol));

    return { kind: "emitted", count: tokens.length - before };
  }

  private readInterpolatedString(cursor: Cursor, tokens: TokenStream): StepResult {
    const startPos = cursor.offset;
    const startLine = cursor.line;
    const startCol = cursor.column();
    const before = tokens.length;
    const unterminated: StepResult = {
      kind: "error",
      error: lexError(LexErrorKind.UnterminatedInterpolatedString, this.filename, startPos, startLine, startCol, 2),
    };

    cursor.advance(2); // skip $"

    let segStart = cursor.offset;
    let segLine = cursor.line;
    let segCol = cursor.column();
    let hasInterpolation = false;

    while (!cursor.done) {
      if (cursor.peek() === "\\") {
        this.skipEscape(cursor);
        continue;
      }

      if (cursor.peek() === '"') {
        if (hasInterpolation) {
          tokens.add(
            TokenKind.StringInterpEnd,
            makeTokenSpan(this.source, segStart, cursor.offset, segLine, segCol),
          );
          cursor.advance();
        } else {
          cursor.advance();
          tokens.add(TokenKind.String, makeTokenSpan(this.source, startPos, cursor.offset, startLine, startCol));
        }
        return { kind: "emitted", count: tokens.length - before };
      }

      if (cursor.peek() === "{") {
        tokens.add(
          hasInterpolation ? TokenKind.StringInterpMid : TokenKind.StringInterpBeg,
          makeTokenSpan(this.source, segStart, cursor.offset, segLine, segCol),
        );
        hasInterpolation = true;
        cursor.advance(); // skip {

        // Interpolated expression: ordinary tokens up to the matching }
        for (;;) {
          this.skipTrivia(cursor);
          if (cursor.done) return unterminated;
          if (cursor.peek() === "}") break;

          const step = this.scanStep(cursor, tokens);
          if (step.kind === "error") return step;
        }

        cursor.advance(); // skip }
        segStart = cursor.offset;
        segLine = cursor.line;
        segCol = cursor.column();
        continue;
      }

      cursor.bump();
    }

    return unterminated;
  }

  private readQuoted(
    cursor: Cursor,
    tokens: TokenStream,
    prefix: string,
    quote: string,
    kind: TokenKind,
    errorKind: LexErrorKind,
  ): StepResult {
    const startPos = cursor.offset;
    const startLine = cursor.line;
    const startCol = cursor.column();

    cursor.advance(prefix.length);

    while (!cursor.done) {
      const ch = cursor.peek();
      if (ch === "\\") {
        this.skipEscape(cursor);
      } else if (ch === quote) {
        cursor.advance();
        tokens.add(kind, makeTokenSpan(this.source, startPos, cursor.offset, startLine, startCol));
        return { kind: "emitted", count: 1 };
      } else {
        cursor.bump();
      }
    }

    return {
      kind: "error",
      error: lexError(errorKind, this.filename, startPos, startLine, startCol, prefix.length),
    };
  }

  private readIdentOrKeyword(cursor: Cursor, tokens: TokenStream): StepResult {
    const startPos = cursor.offset;
    const startCol = cursor.column();

    cursor.advance();
    while (!cursor.done && (this.isAlphaNum(cursor.peek()) || cursor.peek() === "_")) {
      cursor.advance();
    }

    const value = this.source.slice(startPos, cursor.offset);
    const kind = lookupKeyword(value, this.keywordMatch) ?? TokenKind.Ident;
    tokens.add(kind, makeTokenSpan(this.source, startPos, cursor.offset, cursor.line, startCol));
    return { kind: "emitted", count: 1 };
  }

  private readNumber(cursor: Cursor, tokens: TokenStream): StepResult {
    const startPos = cursor.offset;
    const startCol = cursor.column();

    if (cursor.startsWith("0x")) {
      cursor.advance(2);
      this.skipWhile(cursor, (ch) => this.isHexDigit(ch) || ch === "_");
    } else if (cursor.startsWith("0o")) {
      cursor.advance(2);
      this.skipWhile(cursor, (ch) => (ch >= "0" && ch <= "7") || ch === "_");
    } else if (cursor.startsWith("0b")) {
      cursor.advance(2);
      this.skipWhile(cursor, (ch) => ch === "0" || ch === "1" || ch === "_");
    } else {
      // whole part
      cursor.advance();
      this.skipWhile(cursor, (ch) => this.isDigit(ch) || ch === "_");

      // fractional part
      if (cursor.peek() === ".") {
        cursor.advance();
        this.skipWhile(cursor, (ch) => this.isDigit(ch) || ch === "_");
      }

      // exponent
      const ch = cursor.peek();
      if (ch === "e" || ch === "E") {
        cursor.advance();
        if (cursor.peek() === "+" || cursor.peek() === "-") cursor.advance();
        this.skipWhile(cursor, (c) => this.isDigit(c) || c === "_");
      }
    }

    tokens.add(TokenKind.Num, makeTokenSpan(this.source, startPos, cursor.offset, cursor.line, startCol));
    return { kind: "emitted", count: 1 };
  }

  /** Whitespace and line comments, as many as there are. */
  private skipTrivia(cursor: Cursor): void {
    for (;;) {
      this.skipWhitespace(cursor);
      if (!cursor.startsWith("//")) return;
      this.skipComment(cursor);
    }
  }

  private skipWhitespace(cursor: Cursor): void {
    while (!cursor.done && this.isWhitespace(cursor.peek())) {
      cursor.bump();
    }
  }

  private skipComment(cursor: Cursor): void {
    cursor.advance(2);
    while (!cursor.done && cursor.peek() !== "\n") {
      cursor.advance();
    }
  }

  // A backslash and whatever follows it, a newline included.
  private skipEscape(cursor: Cursor): void {
    cursor.advance();
    if (!cursor.done) cursor.bump();
  }

  private skipWhile(cursor: Cursor, pred: (ch: string) => boolean): void {
    while (!cursor.done && pred(cursor.peek())) {
      cursor.advance();
    }
  }

  private isWhitespace(ch: string): boolean {
    return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f";
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isHexDigit(ch: string): boolean {
    return this.isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
  }

  private isAlphaNum(ch: string): boolean {
    return this.isDigit(ch) || this.isAlpha(ch);
  }
}
