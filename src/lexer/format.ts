import chalk from "chalk";
import { TokenKind } from "./tokens.js";
import { KEYWORD_KINDS } from "./keywords.js";
import type { TokenStream } from "./token-stream.js";

export interface FormatOptions {
  color?: boolean;
}

const LITERALS: ReadonlySet<TokenKind> = new Set([
  TokenKind.String,
  TokenKind.StringInterpBeg,
  TokenKind.StringInterpMid,
  TokenKind.StringInterpEnd,
  TokenKind.Char,
  TokenKind.Num,
]);

function colorKind(kind: TokenKind, text: string): string {
  if (kind === TokenKind.Ident) return text;
  if (LITERALS.has(kind)) return chalk.green(text);
  if (KEYWORD_KINDS.has(kind)) return chalk.magenta(text);
  return chalk.cyan(text);
}

/**
 * Debug listing of a token stream, one token per line:
 * `<line>:<col>   <kind>   <slice>`, each field padded to its widest value.
 * Newlines inside a slice are shown as `\n`.
 */
export function formatTokens(stream: TokenStream, options: FormatOptions = {}): string {
  let lineWidth = 0;
  let colWidth = 0;
  let kindWidth = 0;
  for (const { kind, span } of stream) {
    lineWidth = Math.max(lineWidth, String(span.line).length);
    colWidth = Math.max(colWidth, String(span.col).length);
    kindWidth = Math.max(kindWidth, kind.length);
  }

  const lines: string[] = [];
  for (const { kind, span } of stream) {
    const pos = `${String(span.line).padStart(lineWidth)}:${String(span.col).padEnd(colWidth)}`;
    const kindText = kind.padEnd(kindWidth);
    const slice = span.slice.replace(/\n/g, "\\n");
    lines.push(
      options.color
        ? `${chalk.blue(pos)}   ${colorKind(kind, kindText)}   ${slice}`
        : `${pos}   ${kindText}   ${slice}`,
    );
  }
  return lines.join("\n");
}
