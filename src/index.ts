#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { lexFile, summarizeFailure, type LexOutput } from "./compiler.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { formatTokens } from "./lexer/format.js";
import type { KeywordMatch } from "./lexer/keywords.js";
import type { TokenStream } from "./lexer/token-stream.js";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".fe"));
  if (found.length === 0) {
    throw new Error("No .fe file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .fe files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function keywordMatchFrom(opts: Record<string, unknown>): KeywordMatch {
  if (opts.prefixKeywords) return "prefix";
  const fromEnv = process.env.FEATHER_KEYWORD_MATCH;
  if (fromEnv === undefined || fromEnv === "") return "exact";
  if (fromEnv === "exact" || fromEnv === "prefix") return fromEnv;
  throw new Error(`FEATHER_KEYWORD_MATCH must be "exact" or "prefix", got "${fromEnv}"`);
}

/** Lex `file`, printing the failure and exiting if there is one. */
async function lexOrExit(file: string | undefined, opts: Record<string, unknown>): Promise<TokenStream> {
  if (opts.color === false) chalk.level = 0;

  const resolved = await resolveDefaultFile(file);
  const output: LexOutput = lexFile(resolved, { keywordMatch: keywordMatchFrom(opts) });

  if (!output.tokens) {
    console.error(opts.brief ? summarizeFailure(output) : formatDiagnostics(output.source, output.errors));
    process.exit(1);
  }
  return output.tokens;
}

const program = new Command()
  .name("featherc")
  .description("Feather language front end: source text to positioned tokens")
  .version("0.1.0");

program
  .command("tokens [file]")
  .description("Print the token stream of a .fe file (defaults to the single .fe file in the current directory)")
  .option("--json", "Output tokens as JSON for machine consumption")
  .option("--prefix-keywords", "Treat identifiers that start with a keyword as that keyword")
  .option("--brief", "Report errors as a single file:line:col line")
  .option("--no-color", "Disable colored output")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      const tokens = await lexOrExit(file, opts);

      if (opts.json) {
        const rows = tokens.toArray().map(({ kind, span }) => ({
          kind,
          slice: span.slice,
          line: span.line,
          col: span.col,
        }));
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      console.log(formatTokens(tokens, { color: opts.color !== false && chalk.level > 0 }));
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("check [file]")
  .description("Lex a .fe file and report the first lexical error, if any")
  .option("--prefix-keywords", "Treat identifiers that start with a keyword as that keyword")
  .option("--brief", "Report errors as a single file:line:col line")
  .option("--no-color", "Disable colored output")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      const tokens = await lexOrExit(file, opts);
      console.log(`${chalk.green("ok")}: ${tokens.length} tokens, ${tokens.lineBreaks.length + 1} lines`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program.parse();
