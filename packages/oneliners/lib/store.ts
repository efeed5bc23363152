/**
 * lib/store.ts - Snippet store file access
 *
 * The store is a plain newline-delimited file, one snippet per line,
 * appended to in insertion order. Reads treat any failure as an empty
 * store; a failed append is thrown since there is nowhere else to write.
 *
 * No locking: two concurrent `store` invocations can interleave lines.
 *
 * Usage:
 *   import { storeSnippet, readSnippets } from "./store";
 *   const result = storeSnippet("git log --oneline", path);
 */

import { appendFileSync, readFileSync } from "fs";
import type { StoreResult } from "./types";

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Read every line of the store in file order.
 * Lines that are not valid UTF-8 are dropped.
 *
 * @returns Lines without terminators, or null if the file cannot be read
 */
export function readSnippets(filePath: string): string[] | null {
  let content: Buffer;
  try {
    content = readFileSync(filePath);
  } catch {
    return null;
  }

  const lines: string[] = [];
  let start = 0;

  // A trailing terminator ends the loop without an extra empty line
  while (start < content.length) {
    let end = content.indexOf(0x0a, start);
    if (end === -1) end = content.length;

    try {
      lines.push(decoder.decode(content.subarray(start, end)).replace(/\r$/, ""));
    } catch {
      // Skip lines that are not valid UTF-8
    }
    start = end + 1;
  }

  return lines;
}

export function isMultiline(snippet: string): boolean {
  // "\r\n" contains "\n", so one check covers both
  return snippet.includes("\n");
}

/**
 * Check whether the store already holds the snippet.
 * Both sides are trimmed before comparing.
 */
export function containsSnippet(filePath: string, snippet: string): boolean {
  const lines = readSnippets(filePath);
  if (!lines) return false;

  const candidate = snippet.trim();
  return lines.some((line) => line.trim() === candidate);
}

/**
 * Append a snippet unless it is multi-line or already stored.
 *
 * @throws Error when the store file cannot be opened for appending
 */
export function storeSnippet(snippet: string, filePath: string): StoreResult {
  if (isMultiline(snippet)) {
    return { status: "multiline", snippet };
  }

  if (containsSnippet(filePath, snippet)) {
    return { status: "duplicate" };
  }

  try {
    appendFileSync(filePath, snippet + "\n", "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to write oneliner to ${filePath}: ${message}`);
  }

  return { status: "stored", path: filePath };
}
