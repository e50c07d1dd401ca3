import * as fs from "fs";
import * as path from "path";
import { Lexer, type LexerOptions } from "./lexer/lexer.js";
import { formatLexError, lexErrorToDiagnostic, type LexError } from "./lexer/errors.js";
import type { TokenStream } from "./lexer/token-stream.js";
import { error, pointSpan, type Diagnostic } from "./errors/diagnostic.js";

export { TokenKind, type Token, type TokenSpan } from "./lexer/tokens.js";
export type { TokenStream } from "./lexer/token-stream.js";
export type { LexerOptions } from "./lexer/lexer.js";
export { LexErrorKind, type LexError } from "./lexer/errors.js";

export interface LexOutput {
  /** Absent when lexing failed; there is never a partial stream. */
  tokens?: TokenStream;
  source: string;
  /** Empty on success, otherwise the one error that stopped the pass. */
  errors: Diagnostic[];
  /** The raw lexical error behind `errors`, when there is one. */
  lexError?: LexError;
}

/**
 * Lex a source string.
 * Used by tests and when source is provided directly.
 */
export function lex(source: string, filename: string, options: LexerOptions = {}): LexOutput {
  const result = new Lexer(source, filename, options).tokenize();
  if (!result.ok) {
    return { source, errors: [lexErrorToDiagnostic(result.error)], lexError: result.error };
  }
  return { tokens: result.tokens, source, errors: [] };
}

export function lexFile(filePath: string, options: LexerOptions = {}): LexOutput {
  const abs = path.resolve(filePath);

  let source: string;
  try {
    source = fs.readFileSync(abs, "utf-8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return {
      source: "",
      errors: [error(`Cannot read file '${filePath}': ${reason}`, pointSpan(filePath, 0, 1, 1, 0))],
    };
  }

  return lex(source, filePath, options);
}

/** `<file>:<line>:<col>: <message>` for a failed pass, `null` otherwise. */
export function summarizeFailure(output: LexOutput): string | null {
  if (output.lexError) return formatLexError(output.lexError);
  const first = output.errors[0];
  if (!first) return null;
  return `${first.span.source}:${first.span.start.line}:${first.span.start.column}: ${first.message}`;
}
