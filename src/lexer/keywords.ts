import { TokenKind } from "./tokens.js";

export type KeywordMatch = "exact" | "prefix";

// Longest first; lookups walk the lengths in this order.
export const KEYWORDS_BY_LENGTH: ReadonlyArray<readonly [number, Map<string, TokenKind>]> = [
  [8, new Map([["continue", TokenKind.Continue]])],
  [6, new Map([
    ["packed", TokenKind.Packed],
    ["struct", TokenKind.Struct],
  ])],
  [5, new Map([
    ["union", TokenKind.Union],
    ["defer", TokenKind.Defer],
    ["while", TokenKind.While],
    ["break", TokenKind.Break],
  ])],
  [4, new Map([
    ["enum", TokenKind.Enum],
    ["then", TokenKind.Then],
    ["else", TokenKind.Else],
    ["loop", TokenKind.Loop],
  ])],
  [3, new Map([
    ["and", TokenKind.And],
    ["xor", TokenKind.Xor],
    ["not", TokenKind.Not],
    ["pub", TokenKind.Pub],
  ])],
  [2, new Map([
    ["or", TokenKind.Or],
    ["fn", TokenKind.Fn],
    ["if", TokenKind.If],
    ["do", TokenKind.Do],
  ])],
];

/**
 * Resolve an identifier to a keyword kind, or `undefined` for a plain `Ident`.
 *
 * With `"prefix"` the identifier only needs to start with a keyword
 * (`continued` is `Continue`), which is how older Feather front ends behaved.
 */
export function lookupKeyword(ident: string, match: KeywordMatch = "exact"): TokenKind | undefined {
  for (const [length, table] of KEYWORDS_BY_LENGTH) {
    if (ident.length < length) continue;
    if (match === "exact" && ident.length !== length) continue;

    const kind = table.get(ident.slice(0, length));
    if (kind !== undefined) return kind;
  }
  return undefined;
}

export const KEYWORD_KINDS: ReadonlySet<TokenKind> = new Set(
  KEYWORDS_BY_LENGTH.flatMap(([, table]) => [...table.values()]),
);
