import { error, pointSpan, type Diagnostic } from "../errors/diagnostic.js";

export enum LexErrorKind {
  UnterminatedInterpolatedString = "UnterminatedInterpolatedString",
  UnterminatedString = "UnterminatedString",
  UnterminatedChar = "UnterminatedChar",
  UnclosedParenthesis = "UnclosedParenthesis",
  UnclosedBracket = "UnclosedBracket",
  UnclosedBrace = "UnclosedBrace",
  UnexpectedCharacter = "UnexpectedCharacter",
}

const MESSAGES: Record<LexErrorKind, string> = {
  [LexErrorKind.UnterminatedInterpolatedString]: "Unfinished interpolated string",
  [LexErrorKind.UnterminatedString]: "Unfinished string",
  [LexErrorKind.UnterminatedChar]: "Unfinished char",
  [LexErrorKind.UnclosedParenthesis]: "Unclosed parenthesis",
  [LexErrorKind.UnclosedBracket]: "Unclosed bracket",
  [LexErrorKind.UnclosedBrace]: "Unclosed brace",
  [LexErrorKind.UnexpectedCharacter]: "Cannot parse token",
};

const HELP: Partial<Record<LexErrorKind, string>> = {
  [LexErrorKind.UnterminatedInterpolatedString]: "Close the string with '\"'; a literal '{' is written '\\{'",
  [LexErrorKind.UnterminatedString]: "Close the string with '\"'",
  [LexErrorKind.UnterminatedChar]: "Close the character literal with \"'\"",
};

/**
 * A fatal lexical error, positioned like a token span: `offset` indexes the
 * source string, `line` is 1-based and `col` a 0-based byte column.
 */
export interface LexError {
  kind: LexErrorKind;
  message: string;
  fileName: string;
  offset: number;
  line: number;
  col: number;
  /** Length of the construct that failed to close (quote, `$"`, delimiter) */
  width: number;
}

export function lexError(
  kind: LexErrorKind,
  fileName: string,
  offset: number,
  line: number,
  col: number,
  width: number = 1,
  detail?: string,
): LexError {
  const message = detail ? `${MESSAGES[kind]}: ${detail}` : MESSAGES[kind];
  return { kind, message, fileName, offset, line, col, width };
}

export function unexpectedCharacter(fileName: string, ch: string, offset: number, line: number, col: number): LexError {
  return lexError(LexErrorKind.UnexpectedCharacter, fileName, offset, line, col, ch.length, `unexpected character '${ch}'`);
}

/** `<file>:<line>:<col>: <message>`, with the column 1-based as editors count it. */
export function formatLexError(err: LexError): string {
  return `${err.fileName}:${err.line}:${err.col + 1}: ${err.message}`;
}

export function lexErrorToDiagnostic(err: LexError): Diagnostic {
  return error(err.message, pointSpan(err.fileName, err.offset, err.line, err.col + 1, err.width), HELP[err.kind]);
}
