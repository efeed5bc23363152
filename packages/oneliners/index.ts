/**
 * oneliners - Library exports
 *
 * Save single-line snippets to ~/.oneliners, search and list them.
 * Pure functions, no process.exit, no stderr output.
 *
 * Usage:
 *   import { resolveStorePath, storeSnippet, searchSnippets } from "oneliners";
 *   const store = resolveStorePath();
 *   if (store.success) storeSnippet("docker ps -a", store.path);
 */

// Paths
export { resolveStorePath, resolveConfigPath, STORE_FILENAME } from "./lib/paths";

// Store
export {
  readSnippets,
  isMultiline,
  containsSnippet,
  storeSnippet,
} from "./lib/store";

// Queries
export {
  listSnippets,
  searchSnippets,
  parseSelection,
  LIST_LIMIT,
  SEARCH_LIMIT,
} from "./lib/query";

// Clipboard bridge
export {
  ProcessClipboard,
  isClipboardAvailable,
  whichProbe,
  type CommandProbe,
  type ProcessClipboardOptions,
} from "./lib/clipboard";

// Config
export { loadConfig, DEFAULT_CONFIG } from "./lib/config";

// Prompt
export { readLine } from "./lib/prompt";

// Types
export type {
  PathResult,
  StoreResult,
  ClipboardResult,
  ClipboardSink,
  ClipboardConfig,
  OnelinersConfig,
  Output,
} from "./lib/types";
