import { appendFileSync, writeFileSync } from "fs";

export function formatFrameTime(ms: number): string {
  return `${ms.toFixed(2)} ms`;
}

/**
 * Appends one "<ms> ms" line per rendered frame. The file is truncated on open.
 */
export class FrameLog {
  constructor(readonly path: string) {
    writeFileSync(path, "");
  }

  record(ms: number): void {
    appendFileSync(this.path, `${formatFrameTime(ms)}\n`);
  }
}
