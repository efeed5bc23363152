#!/usr/bin/env tsx
/**
 * oneliners CLI
 *
 * Store, search and list single-line snippets kept in ~/.oneliners.
 *
 * Usage:
 *   oneliners store <oneliner>
 *   oneliners get <search>
 *   oneliners list
 *
 * Exit codes:
 *   0 - Success (including duplicates, empty store, no matches)
 *   1 - Fatal (clipboard utility missing, no home directory, write failure,
 *       bad config, clipboard failure in strict mode)
 *   2 - Usage error (unknown command, missing or extra arguments)
 */

import {
  parseCommand,
  runGet,
  runList,
  runStore,
} from "./lib/commands";
import {
  ProcessClipboard,
  isClipboardAvailable,
  loadConfig,
  resolveConfigPath,
  resolveStorePath,
} from "./index";

function printUsage(): void {
  console.error(`
oneliners - Store and retrieve oneliners

Usage: oneliners <command> [arguments]

Commands:
  store <oneliner>     Save a single-line snippet (skipped if already stored)
  get <search>         Show up to 3 snippets containing <search>, then copy one
  list                 Show the first 10 stored snippets
  -h, --help           Show this help

Storage:
  ~/.oneliners         One snippet per line, in the order they were stored

Config (optional):
  ~/.config/oneliners/config.toml
    [clipboard]
    command = "xclip"
    args = ["-selection", "clipboard"]
    strict = false     # true: report clipboard failures and exit 1

Examples:
  oneliners store "git log --oneline --graph --all"
  oneliners get "git log"
  oneliners list
  oneliners store -- "-n is a flag, not an option here"
`);
}

function fail(message: string, code: number = 1): never {
  console.error(message);
  process.exit(code);
}

async function main(): Promise<void> {
  const configPath = resolveConfigPath();
  const config = loadConfig(configPath.success ? configPath.path : null);

  // Checked before anything else, --help included
  if (!isClipboardAvailable(config.clipboard.command)) {
    console.log(`${config.clipboard.command} is not installed.`);
    process.exit(1);
  }

  const parsed = parseCommand(process.argv.slice(2));
  if (!parsed.success) {
    console.error(parsed.error);
    printUsage();
    process.exit(2);
  }

  const { command } = parsed;
  if (command.name === "help") {
    printUsage();
    process.exit(0);
  }

  const store = resolveStorePath();
  if (!store.success) {
    fail(`Unable to locate oneliners storage file: ${store.error}`);
  }

  let code: number;
  switch (command.name) {
    case "store":
      code = runStore(command.oneliner, store.path);
      break;
    case "list":
      code = runList(store.path);
      break;
    case "get":
      code = await runGet(command.search, store.path, {
        input: process.stdin,
        // Only strict mode needs the exit status of the clipboard utility
        clipboard: new ProcessClipboard({
          command: config.clipboard.command,
          args: config.clipboard.args,
          wait: config.clipboard.strict,
        }),
        strict: config.clipboard.strict,
      });
      break;
  }

  process.exit(code);
}

main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
