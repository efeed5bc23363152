/**
 * lib/paths.ts - Storage and config locations
 *
 * The store always lives at ~/.oneliners; there is no override.
 * Resolution failures come back as a PathResult so callers decide
 * whether to exit.
 */

import { join } from "path";
import { homedir } from "os";
import type { PathResult } from "./types";

export const STORE_FILENAME = ".oneliners";

function lookupHome(home?: () => string): PathResult {
  try {
    const dir = (home ?? homedir)();
    if (!dir) {
      return { success: false, error: "home directory is not set" };
    }
    return { success: true, path: dir };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}

/**
 * Resolve the snippet store path from the user's home directory.
 *
 * @param home - Home directory lookup, defaults to os.homedir()
 */
export function resolveStorePath(home?: () => string): PathResult {
  const result = lookupHome(home);
  if (!result.success) return result;
  return { success: true, path: join(result.path, STORE_FILENAME) };
}

/**
 * Path to the optional config file: ~/.config/oneliners/config.toml
 */
export function resolveConfigPath(home?: () => string): PathResult {
  const result = lookupHome(home);
  if (!result.success) return result;
  return {
    success: true,
    path: join(result.path, ".config", "oneliners", "config.toml"),
  };
}
