import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

/** Bounds of the line holding `offset`, line terminator excluded. */
function lineAround(source: string, offset: number): { start: number; end: number } {
  const start = offset === 0 ? 0 : source.lastIndexOf("\n", offset - 1) + 1;
  const newline = source.indexOf("\n", offset);
  let end = newline === -1 ? source.length : newline;
  if (end > start && source[end - 1] === "\r") end--;
  return { start, end };
}

/**
 * The offending line with a caret run under the construct that failed to
 * close. Tabs before it are kept so the carets line up under the source.
 */
export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const { start, end } = diag.span;
  const line = lineAround(source, start.offset);
  const indent = source.slice(line.start, start.offset).replace(/[^\t]/g, " ");
  const width = Math.max(1, Math.min(end.offset, line.end) - start.offset);
  const lineNum = String(start.line);
  const gutter = " ".repeat(lineNum.length);

  let output = `${chalk.red.bold("error")}: ${chalk.bold(diag.message)}\n`;
  output += `${gutter} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${gutter} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${source.slice(line.start, line.end)}\n`;
  output += `${gutter} ${chalk.blue("|")} ${indent}${chalk.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${gutter} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
