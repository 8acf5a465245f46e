import type { Display } from "../presenter";

export type Put = [row: number, column: number, glyph: string];

/** In-memory display that records every call. */
export class RecordingDisplay implements Display {
  clears = 0;
  puts: Put[] = [];

  clear(): void {
    this.clears++;
    this.puts = [];
  }

  put(row: number, column: number, glyph: string): void {
    this.puts.push([row, column, glyph]);
  }

  take(): Put[] {
    const puts = this.puts;
    this.puts = [];
    return puts;
  }
}
