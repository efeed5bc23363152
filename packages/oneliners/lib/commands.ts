/**
 * Command Handlers
 *
 * One handler per subcommand. Each takes the resolved store path and an
 * Output, prints what the user sees, and returns an exit code. Nothing here
 * calls process.exit.
 */

import type { Readable } from "stream";
import { storeSnippet } from "./store";
import { listSnippets, searchSnippets, parseSelection } from "./query";
import { readLine } from "./prompt";
import type { ClipboardSink, Output } from "./types";

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export interface GetContext {
  input: Readable;
  clipboard: ClipboardSink;
  strict?: boolean;
}

// ============================================================================
// Argument Parsing
// ============================================================================

export type Command =
  | { name: "store"; oneliner: string }
  | { name: "get"; search: string }
  | { name: "list" }
  | { name: "help" };

export type ParseResult =
  | { success: true; command: Command }
  | { success: false; error: string };

/**
 * Parse argv (without the runtime and script) into a command.
 * Everything after `--` is taken literally.
 */
export function parseCommand(args: string[]): ParseResult {
  const separator = args.indexOf("--");
  const head = separator === -1 ? args : args.slice(0, separator);
  const literal = separator === -1 ? [] : args.slice(separator + 1);

  if (head.length === 0 && literal.length === 0) {
    return { success: true, command: { name: "help" } };
  }
  if (head.includes("--help") || head.includes("-h")) {
    return { success: true, command: { name: "help" } };
  }

  const name: string | undefined = head[0];
  const positionals = [...head.slice(1), ...literal];

  switch (name) {
    case "store":
      if (positionals.length === 0) {
        return {
          success: false,
          error: "Missing oneliner. Usage: oneliners store <oneliner>",
        };
      }
      if (positionals.length > 1) {
        return {
          success: false,
          error: `Unexpected argument: ${positionals[1]}. Quote the oneliner to store it as one argument`,
        };
      }
      return { success: true, command: { name: "store", oneliner: positionals[0] } };

    case "get":
      if (positionals.length === 0) {
        return {
          success: false,
          error: "Missing search term. Usage: oneliners get <search>",
        };
      }
      if (positionals.length > 1) {
        return {
          success: false,
          error: `Unexpected argument: ${positionals[1]}. Quote the search term`,
        };
      }
      return { success: true, command: { name: "get", search: positionals[0] } };

    case "list":
      if (positionals.length > 0) {
        return {
          success: false,
          error: `Unexpected argument: ${positionals[0]}. Usage: oneliners list`,
        };
      }
      return { success: true, command: { name: "list" } };

    case undefined:
      return { success: false, error: "Missing command. Use --help for usage." };

    default:
      return {
        success: false,
        error: `Unknown command: ${name}. Use --help for usage.`,
      };
  }
}

// ============================================================================
// Handlers
// ============================================================================

function printNumbered(out: Output, lines: string[]): void {
  lines.forEach((line, i) => out.log(`${i + 1}: ${line}`));
}

export function runStore(
  snippet: string,
  filePath: string,
  out: Output = consoleOutput,
): number {
  const result = storeSnippet(snippet, filePath);

  switch (result.status) {
    case "multiline":
      out.log(
        "Error: That's not a oneliner! Multi-line snippets are not currently supported. You entered:",
      );
      out.log(result.snippet);
      break;
    case "duplicate":
      out.log("Snippet already present.");
      break;
    case "stored":
      out.log(`Snippet stored successfully! [${result.path}]`);
      break;
  }
  return 0;
}

export function runList(filePath: string, out: Output = consoleOutput): number {
  const entries = listSnippets(filePath);

  if (entries === null) {
    out.log("No oneliners stored yet.");
    return 0;
  }
  if (entries.length === 0) {
    out.log("No entries found.");
    return 0;
  }

  printNumbered(out, entries);
  return 0;
}

/**
 * Search, show matches, then let the user pick one for the clipboard.
 * An invalid pick is ignored without a message.
 */
export async function runGet(
  search: string,
  filePath: string,
  ctx: GetContext,
  out: Output = consoleOutput,
): Promise<number> {
  const matches = searchSnippets(filePath, search);

  if (matches === null) {
    out.log("No oneliners stored yet.");
    return 0;
  }
  if (matches.length === 0) {
    out.log("No matches found.");
    return 0;
  }

  printNumbered(out, matches);
  out.log(`Select a oneliner (1-${matches.length}):`);

  const answer = await readLine(ctx.input);
  const index = parseSelection(answer, matches.length);
  if (index === null) return 0;

  const result = await ctx.clipboard.copy(matches[index]);

  // Lenient by default: report the copy even if the utility failed
  if (!result.success && ctx.strict) {
    out.error(`Failed to copy to clipboard: ${result.error}`);
    return 1;
  }

  out.log("Snippet copied to clipboard!");
  return 0;
}
