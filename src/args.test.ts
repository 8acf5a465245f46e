import { describe, test, expect } from "vitest";
import { parseArgs } from "./args";

describe("parseArgs", () => {
  test("defaults come from config", () => {
    expect(parseArgs([])).toEqual({
      width: 200,
      height: 250,
      fullRamp: false,
      bands: 4,
      log: null,
    });
  });

  test("reads every option", () => {
    expect(parseArgs(["-w", "80", "--height", "24", "--ramp", "-b", "2", "--log", "frames.log"])).toEqual({
      width: 80,
      height: 24,
      fullRamp: true,
      bands: 2,
      log: "frames.log",
    });
  });

  test("help returns null", () => {
    expect(parseArgs(["--help"])).toBeNull();
  });

  test("rejects bad sizes", () => {
    expect(() => parseArgs(["-w", "0"])).toThrow('-w expects a positive integer, got "0"');
    expect(() => parseArgs(["--height"])).toThrow('--height expects a positive integer, got ""');
  });

  test("rejects a missing log path and unknown flags", () => {
    expect(() => parseArgs(["--log"])).toThrow("--log expects a file path");
    expect(() => parseArgs(["--fast"])).toThrow("Unknown option: --fast");
  });
});
