import { describe, test, expect } from "vitest";
import { presentFrame, presentGlyph } from "./presenter";
import { FrameBuffer } from "./renderer";
import { RecordingDisplay } from "./testing/display";

function sampleFrame(): FrameBuffer {
  const frame = new FrameBuffer(3, 2);
  frame.update(0, 0, "*");
  frame.update(1, 0, ".");
  frame.update(2, 1, "+");
  return frame;
}

describe("presentGlyph", () => {
  test("collapses every level but the densest to blank", () => {
    expect(presentGlyph("*")).toBe("*");
    expect(presentGlyph("+")).toBe(" ");
    expect(presentGlyph(".")).toBe(" ");
    expect(presentGlyph(" ")).toBe(" ");
  });

  test("full ramp passes glyphs through", () => {
    expect(presentGlyph("+", true)).toBe("+");
    expect(presentGlyph(":", true)).toBe(":");
  });
});

describe("presentFrame", () => {
  test("writes dirty cells at 1-based positions in row order", () => {
    const display = new RecordingDisplay();
    const frame = sampleFrame();

    expect(presentFrame(frame, display)).toBe(3);
    expect(display.take()).toEqual([
      [1, 1, "*"],
      [1, 2, " "],
      [2, 3, " "],
    ]);
  });

  test("shows ramp glyphs when asked", () => {
    const display = new RecordingDisplay();
    presentFrame(sampleFrame(), display, { fullRamp: true });
    expect(display.take()).toEqual([
      [1, 1, "*"],
      [1, 2, "."],
      [2, 3, "+"],
    ]);
  });

  test("consumes the dirty flags", () => {
    const display = new RecordingDisplay();
    const frame = sampleFrame();
    presentFrame(frame, display);
    display.take();

    expect(frame.dirtyCount()).toBe(0);
    expect(presentFrame(frame, display)).toBe(0);
    expect(display.take()).toEqual([]);
  });

  test("leaves clean cells untouched", () => {
    const display = new RecordingDisplay();
    const frame = sampleFrame();
    frame.clearDirty();
    frame.update(2, 0, "*");

    expect(presentFrame(frame, display)).toBe(1);
    expect(display.take()).toEqual([[1, 3, "*"]]);
  });
});
