/** `offset` indexes the source string; `line` and `column` are 1-based. */
export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

/** Every diagnostic the front end raises is fatal. */
export interface Diagnostic {
  message: string;
  span: Span;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { message, span, help };
}

/** A span covering `width` characters of a single line. */
export function pointSpan(source: string, offset: number, line: number, column: number, width: number = 1): Span {
  return {
    start: { offset, line, column },
    end: { offset: offset + width, line, column: column + width },
    source,
  };
}
