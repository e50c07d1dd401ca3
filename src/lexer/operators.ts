import { TokenKind } from "./tokens.js";

/** Consulted before {@link OPERATORS_1}, so `--` never splits into two `Minus`. */
export const OPERATORS_2: Map<string, TokenKind> = new Map([
  ["==", TokenKind.Equals],
  ["!=", TokenKind.NotEquals],
  ["<=", TokenKind.LessEqual],
  [">=", TokenKind.GreaterEqual],
  [">-", TokenKind.Feather],
  ["->", TokenKind.Arrow],
  ["<<", TokenKind.LShift],
  [">>", TokenKind.RShift],
  ["++", TokenKind.Incr],
  ["--", TokenKind.Decr],
  ["**", TokenKind.Pow],
]);

export const OPERATORS_1: Map<string, TokenKind> = new Map([
  ["%", TokenKind.Modulo],
  ["<", TokenKind.LessThan],
  [">", TokenKind.GreaterThan],
  ["&", TokenKind.Ampersand],
  ["|", TokenKind.Pipe],
  ["^", TokenKind.Caret],
  ["~", TokenKind.Tilde],
  ["+", TokenKind.Plus],
  ["-", TokenKind.Minus],
  ["*", TokenKind.Mul],
  ["/", TokenKind.Div],
  ["=", TokenKind.Equal],
  [";", TokenKind.Semi],
  [":", TokenKind.Colon],
  [",", TokenKind.Comma],
  [".", TokenKind.Dot],
  ["(", TokenKind.LParens],
  [")", TokenKind.RParens],
  ["[", TokenKind.LBracket],
  ["]", TokenKind.RBracket],
  ["{", TokenKind.LBrace],
  ["}", TokenKind.RBrace],
]);

export interface OperatorMatch {
  kind: TokenKind;
  length: number;
}

export function matchOperator(code: string, offset: number): OperatorMatch | null {
  const two = OPERATORS_2.get(code.slice(offset, offset + 2));
  if (two !== undefined) return { kind: two, length: 2 };

  const one = OPERATORS_1.get(code.slice(offset, offset + 1));
  if (one !== undefined) return { kind: one, length: 1 };

  return null;
}

/** Opening delimiters and the closer that ends their group. */
export const GROUP_CLOSERS: Map<string, string> = new Map([
  ["(", ")"],
  ["[", "]"],
  ["{", "}"],
]);
