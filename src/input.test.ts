import { describe, test, expect } from "vitest";
import { Camera } from "./camera";
import { applyKey, KEY_MOVES } from "./input";

function startCamera(): Camera {
  return new Camera({ eye: [0, 1, -6] });
}

describe("applyKey", () => {
  test("w moves forward by exactly one step", () => {
    const camera = startCamera();
    expect(applyKey(camera, "w")).toBe(true);
    expect(camera.eye).toEqual([0, 1, -6 + 0.2]);
  });

  test("each key moves one axis", () => {
    const cases: [string, [number, number, number]][] = [
      ["s", [0, 1, -6 - 0.2]],
      ["a", [-0.2, 1, -6]],
      ["d", [0.2, 1, -6]],
      ["y", [0, 1 + 0.2, -6]],
      ["x", [0, 1 - 0.2, -6]],
    ];

    for (const [key, eye] of cases) {
      const camera = startCamera();
      applyKey(camera, key);
      expect(camera.eye).toEqual(eye);
    }
  });

  test("unmapped keys are ignored", () => {
    const camera = startCamera();
    for (const key of ["q", "W", "ENTER", "UP", "toString", "__proto__"]) {
      expect(applyKey(camera, key)).toBe(false);
    }
    expect(camera.eye).toEqual([0, 1, -6]);
  });

  test("step size can be overridden", () => {
    const camera = startCamera();
    applyKey(camera, "d", 1);
    expect(camera.eye).toEqual([1, 1, -6]);
  });

  test("binds exactly six keys", () => {
    expect(Object.keys(KEY_MOVES).sort()).toEqual(["a", "d", "s", "w", "x", "y"]);
  });
});
