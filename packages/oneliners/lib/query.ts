/**
 * lib/query.ts - List and search over the store
 *
 * Both operations walk the file front to back and stop at their limit,
 * so `list` shows the oldest entries, not the most recent ones.
 * A null return means the store could not be read at all.
 */

import { readSnippets } from "./store";

export const LIST_LIMIT = 10;
export const SEARCH_LIMIT = 3;

/**
 * First `limit` non-blank entries in file order, trimmed.
 */
export function listSnippets(
  filePath: string,
  limit: number = LIST_LIMIT,
): string[] | null {
  const lines = readSnippets(filePath);
  if (!lines) return null;

  return lines
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, limit);
}

/**
 * First `limit` non-empty entries containing `search` (case-sensitive
 * substring), returned exactly as stored. Whitespace-only lines count.
 */
export function searchSnippets(
  filePath: string,
  search: string,
  limit: number = SEARCH_LIMIT,
): string[] | null {
  const lines = readSnippets(filePath);
  if (!lines) return null;

  const matches: string[] = [];
  for (const line of lines) {
    if (matches.length >= limit) break;
    if (line.length === 0) continue;
    if (line.includes(search)) {
      matches.push(line);
    }
  }
  return matches;
}

/**
 * Parse a 1-based selection typed by the user.
 *
 * @returns Zero-based index into the matches, or null if invalid or out of range
 */
export function parseSelection(
  input: string | null,
  count: number,
): number | null {
  if (input === null) return null;

  const trimmed = input.trim();
  if (!/^\+?\d+$/.test(trimmed)) return null;

  const choice = Number(trimmed);
  if (choice < 1 || choice > count) return null;
  return choice - 1;
}
