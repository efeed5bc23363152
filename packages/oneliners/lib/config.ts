/**
 * lib/config.ts - Optional settings from ~/.config/oneliners/config.toml
 *
 * Only the clipboard bridge is configurable; the store location is fixed.
 * A missing file means defaults. A file that exists must parse and carry
 * the right types, otherwise loading throws with the path in the message.
 *
 * Example:
 *   [clipboard]
 *   command = "xclip"
 *   args = ["-selection", "clipboard"]
 *   strict = false
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseToml } from "smol-toml";
import type { ClipboardConfig, OnelinersConfig } from "./types";

export const DEFAULT_CONFIG: OnelinersConfig = {
  clipboard: {
    command: "xclip",
    args: ["-selection", "clipboard"],
    strict: false,
  },
};

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function parseClipboard(
  raw: unknown,
  configPath: string,
): ClipboardConfig {
  const defaults = DEFAULT_CONFIG.clipboard;
  if (raw === undefined) return { ...defaults, args: [...defaults.args] };

  if (!isTable(raw)) {
    throw new Error(
      `Invalid config: [clipboard] must be a table in ${configPath}`,
    );
  }

  const command = raw.command;
  if (command !== undefined && (typeof command !== "string" || !command)) {
    throw new Error(
      `Invalid config: clipboard.command must be a non-empty string in ${configPath}`,
    );
  }

  const args = raw.args;
  if (args !== undefined && !isStringArray(args)) {
    throw new Error(
      `Invalid config: clipboard.args must be an array of strings in ${configPath}`,
    );
  }

  const strict = raw.strict;
  if (strict !== undefined && typeof strict !== "boolean") {
    throw new Error(
      `Invalid config: clipboard.strict must be true or false in ${configPath}`,
    );
  }

  return {
    command: typeof command === "string" ? command : defaults.command,
    // A custom command without args gets none; the xclip args only apply to xclip
    args: isStringArray(args)
      ? args
      : command === undefined
        ? [...defaults.args]
        : [],
    strict: typeof strict === "boolean" ? strict : defaults.strict,
  };
}

/**
 * Load config from disk, falling back to defaults when the file is absent.
 *
 * @param configPath - Path to config.toml, or null when no home directory is known
 */
export function loadConfig(configPath: string | null): OnelinersConfig {
  if (!configPath || !existsSync(configPath)) {
    return {
      clipboard: {
        ...DEFAULT_CONFIG.clipboard,
        args: [...DEFAULT_CONFIG.clipboard.args],
      },
    };
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${configPath}: ${message}`);
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${configPath}: ${message}`);
  }

  return {
    clipboard: parseClipboard(parsed.clipboard, configPath),
  };
}
