import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  listSnippets,
  searchSnippets,
  parseSelection,
} from "../lib/query";
import { storeSnippet } from "../lib/store";

let dir: string;
let storePath: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "oneliners-query-"));
  storePath = join(dir, ".oneliners");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("listSnippets", () => {
  test("returns null for a missing store", () => {
    expect(listSnippets(storePath)).toBeNull();
  });

  test("returns the first 10 of 15 entries in file order", () => {
    const lines = Array.from({ length: 15 }, (_, i) => `cmd-${i + 1}`);
    writeFileSync(storePath, lines.join("\n") + "\n");

    expect(listSnippets(storePath)).toEqual(lines.slice(0, 10));
  });

  test("trims entries and skips blank lines", () => {
    writeFileSync(storePath, "\n  alpha  \n\n   \nbeta\n");
    expect(listSnippets(storePath)).toEqual(["alpha", "beta"]);
  });

  test("returns an empty list for a store with only blank lines", () => {
    writeFileSync(storePath, "\n\n");
    expect(listSnippets(storePath)).toEqual([]);
  });
});

describe("searchSnippets", () => {
  test("returns the first 3 matches in file order", () => {
    writeFileSync(storePath, "abc123\nxyz\nabc456\nabc789\nqqq\nabc000\n");
    expect(searchSnippets(storePath, "abc")).toEqual([
      "abc123",
      "abc456",
      "abc789",
    ]);
  });

  test("is case-sensitive", () => {
    writeFileSync(storePath, "Docker ps\ndocker images\n");
    expect(searchSnippets(storePath, "docker")).toEqual(["docker images"]);
  });

  test("returns matches as stored, untrimmed", () => {
    writeFileSync(storePath, "  npm run build\n");
    expect(searchSnippets(storePath, "npm")).toEqual(["  npm run build"]);
  });

  test("skips empty lines but keeps whitespace-only ones", () => {
    writeFileSync(storePath, "\n   \nls -a\n");
    expect(searchSnippets(storePath, " ")).toEqual(["   ", "ls -a"]);
  });

  test("finds a whitespace-only entry added by storeSnippet", () => {
    expect(storeSnippet("   ", storePath)).toEqual({
      status: "stored",
      path: storePath,
    });
    storeSnippet("ls -a", storePath);
    expect(searchSnippets(storePath, " ")).toEqual(["   ", "ls -a"]);
    expect(searchSnippets(storePath, "")).toEqual(["   ", "ls -a"]);
  });

  test("returns an empty list when nothing matches", () => {
    writeFileSync(storePath, "one\ntwo\n");
    expect(searchSnippets(storePath, "three")).toEqual([]);
  });

  test("returns null for a missing store", () => {
    expect(searchSnippets(storePath, "x")).toBeNull();
  });
});

describe("parseSelection", () => {
  test("maps a 1-based choice to an index", () => {
    expect(parseSelection("2", 2)).toBe(1);
    expect(parseSelection(" 1 ", 3)).toBe(0);
    expect(parseSelection("+3", 3)).toBe(2);
  });

  test("rejects out-of-range choices", () => {
    expect(parseSelection("0", 2)).toBeNull();
    expect(parseSelection("3", 2)).toBeNull();
  });

  test("rejects non-numeric input and end of input", () => {
    expect(parseSelection("two", 2)).toBeNull();
    expect(parseSelection("-1", 2)).toBeNull();
    expect(parseSelection("1.0", 2)).toBeNull();
    expect(parseSelection("", 2)).toBeNull();
    expect(parseSelection(null, 2)).toBeNull();
  });
});
