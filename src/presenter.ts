/**
 * Diff presenter: pushes only changed cells to a display.
 */

import type { FrameBuffer } from "./renderer";
import { DENSE } from "./scene";

/**
 * Character surface addressed with 1-based rows and columns.
 */
export interface Display {
  /** Clears the surface and homes the cursor. */
  clear(): void;
  put(row: number, column: number, glyph: string): void;
}

export interface PresentOptions {
  /** Show every ramp level instead of collapsing to dense/blank. */
  fullRamp?: boolean;
}

export function presentGlyph(glyph: string, fullRamp = false): string {
  if (fullRamp) return glyph;
  return glyph === DENSE ? DENSE : " ";
}

/**
 * Writes every dirty cell and clears its flag. Returns the number of writes.
 */
export function presentFrame(
  frame: FrameBuffer,
  display: Display,
  options: PresentOptions = {}
): number {
  let written = 0;

  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      const i = frame.index(x, y);
      if (!frame.dirty[i]) continue;

      display.put(y + 1, x + 1, presentGlyph(frame.glyphs[i] ?? "", options.fullRamp));
      frame.dirty[i] = 0;
      written++;
    }
  }

  return written;
}
