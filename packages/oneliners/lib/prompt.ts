import { createInterface } from "readline";
import type { Readable } from "stream";

/**
 * Read a single line from an input stream.
 *
 * @returns The line without its terminator, or null on end of input
 */
export function readLine(input: Readable): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const rl = createInterface({ input, terminal: false });
    let answered = false;

    rl.once("line", (line) => {
      answered = true;
      rl.close();
      resolve(line);
    });

    rl.once("close", () => {
      if (!answered) resolve(null);
    });

    input.once("error", (err) => {
      rl.close();
      reject(err);
    });
  });
}
