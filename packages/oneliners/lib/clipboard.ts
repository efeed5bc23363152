/**
 * lib/clipboard.ts - Clipboard bridge
 *
 * Places text on the system clipboard by piping it into an external
 * utility (xclip by default). With `wait` the sink reports how the utility
 * exited; without it, success is reported as soon as the text is written
 * and the utility is left running (lenient mode, see config.ts).
 *
 * Usage:
 *   import { ProcessClipboard, isClipboardAvailable } from "./clipboard";
 *   if (!isClipboardAvailable("xclip")) ...
 *   const result = await new ProcessClipboard({ ...config.clipboard, wait: true }).copy(text);
 */

import { spawn, spawnSync, type ChildProcess } from "child_process";
import type {
  ClipboardConfig,
  ClipboardResult,
  ClipboardSink,
} from "./types";

export type CommandProbe = (command: string) => boolean;

/**
 * Default probe: `which <command>` exits 0 when the command is on PATH.
 */
export function whichProbe(command: string): boolean {
  const result = spawnSync("which", [command], { stdio: "ignore" });
  return !result.error && result.status === 0;
}

export function isClipboardAvailable(
  command: string,
  probe: CommandProbe = whichProbe,
): boolean {
  return probe(command);
}

export interface ProcessClipboardOptions
  extends Pick<ClipboardConfig, "command" | "args"> {
  // false: report success once the text is written, without waiting for exit
  wait?: boolean;
}

export class ProcessClipboard implements ClipboardSink {
  constructor(private readonly options: ProcessClipboardOptions) {}

  copy(text: string): Promise<ClipboardResult> {
    const { command, args, wait = true } = this.options;

    return new Promise((resolve) => {
      let settled = false;
      const settle = (result: ClipboardResult): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      let spawned: ChildProcess;
      try {
        spawned = spawn(command, args, { stdio: ["pipe", "ignore", "ignore"] });
      } catch (err) {
        settle({ success: false, error: `Failed to run ${command}: ${String(err)}` });
        return;
      }
      const child = spawned;

      child.once("error", (err) => {
        settle({ success: false, error: `Failed to run ${command}: ${err.message}` });
      });

      child.once("close", (code) => {
        if (code === 0) {
          settle({ success: true });
        } else {
          settle({ success: false, error: `${command} exited with code ${code}` });
        }
      });

      const stdin = child.stdin;
      if (!stdin) {
        settle({ success: false, error: `No stdin pipe to ${command}` });
        return;
      }

      stdin.once("error", (err) => {
        settle({ success: false, error: `Failed to write to ${command}: ${err.message}` });
      });
      stdin.end(text, "utf-8", () => {
        if (!wait) {
          child.unref();
          settle({ success: true });
        }
      });
    });
  }
}
