// Path resolution
export type PathResult =
  | { success: true; path: string }
  | { success: false; error: string };

// Store operation
export type StoreResult =
  | { status: "stored"; path: string }
  | { status: "duplicate" }
  | { status: "multiline"; snippet: string };

// Clipboard bridge
export type ClipboardResult = { success: true } | { success: false; error: string };

export interface ClipboardSink {
  copy(text: string): Promise<ClipboardResult>;
}

export interface ClipboardConfig {
  command: string; // Executable looked up on PATH
  args: string[];
  strict: boolean; // Surface copy failures instead of always reporting success
}

export interface OnelinersConfig {
  clipboard: ClipboardConfig;
}

// Where command handlers write user-facing lines
export interface Output {
  log(line: string): void;
  error(line: string): void;
}
