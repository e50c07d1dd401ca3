export enum TokenKind {
  // Logical keywords
  And = "And",
  Or = "Or",
  Xor = "Xor",
  Not = "Not",

  // Comparison
  Equals = "Equals",
  NotEquals = "NotEquals",
  LessThan = "LessThan",
  GreaterThan = "GreaterThan",
  LessEqual = "LessEqual",
  GreaterEqual = "GreaterEqual",

  Feather = "Feather",
  Arrow = "Arrow",

  // Bitwise
  Ampersand = "Ampersand",
  Pipe = "Pipe",
  Caret = "Caret",
  Tilde = "Tilde",
  LShift = "LShift",
  RShift = "RShift",

  // Arithmetic
  Incr = "Incr",
  Decr = "Decr",
  Plus = "Plus",
  Minus = "Minus",
  Mul = "Mul",
  Div = "Div",
  Pow = "Pow",
  Modulo = "Modulo",

  // Keywords
  Pub = "Pub",
  Packed = "Packed",
  Struct = "Struct",
  Enum = "Enum",
  Union = "Union",
  Fn = "Fn",
  Defer = "Defer",
  If = "If",
  Then = "Then",
  Else = "Else",
  While = "While",
  Do = "Do",
  Loop = "Loop",
  Continue = "Continue",
  Break = "Break",

  // Punctuation
  Equal = "Equal",
  Semi = "Semi",
  Colon = "Colon",
  Comma = "Comma",
  Dot = "Dot",
  LParens = "LParens",
  RParens = "RParens",
  LBracket = "LBracket",
  RBracket = "RBracket",
  LBrace = "LBrace",
  RBrace = "RBrace",

  // Literals
  String = "String",
  StringInterpBeg = "StringInterpBeg",
  StringInterpMid = "StringInterpMid",
  StringInterpEnd = "StringInterpEnd",
  Char = "Char",
  Ident = "Ident",
  Num = "Num",
}

/**
 * Where a token sits in the source. `offset`/`length` index into the
 * stream's `code` string; `slice` is that same range of text.
 */
export interface TokenSpan {
  slice: string;
  offset: number;
  length: number;
  /** 1-based */
  line: number;
  /** 0-based, in UTF-8 bytes from the start of the line */
  col: number;
}

export interface Token {
  kind: TokenKind;
  span: TokenSpan;
}

export function makeTokenSpan(code: string, offset: number, end: number, line: number, col: number): TokenSpan {
  return { slice: code.slice(offset, end), offset, length: end - offset, line, col };
}
