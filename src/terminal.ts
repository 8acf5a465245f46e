/**
 * terminal-kit adapters: display surface and key source.
 */

import termKit from "terminal-kit";
import type { Display } from "./presenter";

const term = termKit.terminal;

// =============================================================================
// Display
// =============================================================================

export class TerminalDisplay implements Display {
  clear(): void {
    term.clear();
  }

  put(row: number, column: number, glyph: string): void {
    term.moveTo(column, row, glyph);
  }
}

// =============================================================================
// Input
// =============================================================================

export type KeyHandler = (key: string) => void;

/**
 * Grabs raw keyboard input. Ctrl-C restores the terminal and exits.
 */
export function listenKeys(onKey: KeyHandler): void {
  term.hideCursor();
  term.grabInput(true);

  term.on("key", (name: string) => {
    if (name === "CTRL_C") {
      restoreTerminal();
      process.exit(0);
    }
    onKey(name);
  });
}

export function restoreTerminal(): void {
  term.grabInput(false);
  term.hideCursor(false);
  term.styleReset();
  term("\n");
}
