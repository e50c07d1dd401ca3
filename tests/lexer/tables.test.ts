import { describe, it, expect } from "vitest";
import { KEYWORDS_BY_LENGTH, KEYWORD_KINDS, lookupKeyword } from "../../src/lexer/keywords.js";
import { OPERATORS_1, OPERATORS_2, matchOperator } from "../../src/lexer/operators.js";
import { TokenKind } from "../../src/lexer/tokens.js";

describe("keyword tables", () => {
  it("groups keywords by their length, longest first", () => {
    expect(KEYWORDS_BY_LENGTH.map(([length]) => length)).toEqual([8, 6, 5, 4, 3, 2]);
    for (const [length, table] of KEYWORDS_BY_LENGTH) {
      for (const word of table.keys()) {
        expect(word.length).toBe(length);
      }
    }
  });

  it("lists every keyword kind", () => {
    expect(KEYWORD_KINDS.size).toBe(19);
    expect(KEYWORD_KINDS.has(TokenKind.Continue)).toBe(true);
    expect(KEYWORD_KINDS.has(TokenKind.Ident)).toBe(false);
  });

  it("requires an exact match by default", () => {
    expect(lookupKeyword("while")).toBe(TokenKind.While);
    expect(lookupKeyword("whilst")).toBeUndefined();
    expect(lookupKeyword("do_it")).toBeUndefined();
  });

  it("takes the longest keyword prefix in prefix mode", () => {
    expect(lookupKeyword("do_it", "prefix")).toBe(TokenKind.Do);
    expect(lookupKeyword("notable", "prefix")).toBe(TokenKind.Not);
    expect(lookupKeyword("o", "prefix")).toBeUndefined();
  });
});

describe("operator tables", () => {
  it("keeps two- and one-character operators apart", () => {
    for (const op of OPERATORS_2.keys()) expect(op.length).toBe(2);
    for (const op of OPERATORS_1.keys()) expect(op.length).toBe(1);
  });

  it("matches the longest operator at an offset", () => {
    expect(matchOperator("a->b", 1)).toEqual({ kind: TokenKind.Arrow, length: 2 });
    expect(matchOperator("a-b", 1)).toEqual({ kind: TokenKind.Minus, length: 1 });
  });

  it("returns null when nothing matches", () => {
    expect(matchOperator("@", 0)).toBeNull();
    expect(matchOperator("+", 1)).toBeNull();
  });
});
