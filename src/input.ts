/**
 * Keyboard commands that move the camera.
 */

import { Axis, type Camera } from "./camera";
import { config } from "./scene";

export interface Move {
  axis: Axis;
  sign: 1 | -1;
}

export const KEY_MOVES: Readonly<Record<string, Move>> = {
  w: { axis: Axis.Z, sign: 1 },  // forward
  s: { axis: Axis.Z, sign: -1 }, // back
  a: { axis: Axis.X, sign: -1 }, // left
  d: { axis: Axis.X, sign: 1 },  // right
  y: { axis: Axis.Y, sign: 1 },  // up
  x: { axis: Axis.Y, sign: -1 }, // down
};

/**
 * Applies the move bound to `key`, if any. Unknown keys are ignored.
 * Returns whether the camera moved.
 */
export function applyKey(camera: Camera, key: string, step: number = config.camera.step): boolean {
  const move = Object.hasOwn(KEY_MOVES, key) ? KEY_MOVES[key] : undefined;
  if (!move) return false;
  camera.move(move.axis, move.sign * step);
  return true;
}
