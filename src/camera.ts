/**
 * Camera state and vector math for ray generation.
 */

export type Vec3 = [number, number, number];

// =============================================================================
// Math Helpers
// =============================================================================

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}

/**
 * No zero guard: a zero-length input yields NaN components.
 */
export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  return [v[0] / len, v[1] / len, v[2] / len];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

// =============================================================================
// Camera
// =============================================================================

export const Axis = {
  X: 0,
  Y: 1,
  Z: 2,
} as const;

export type Axis = (typeof Axis)[keyof typeof Axis];

export interface CameraConfig {
  eye?: Vec3;
}

/**
 * Eye position of the viewer. Rays always look down +z; only the eye moves.
 */
export class Camera {
  eye: Vec3;

  constructor(cfg: CameraConfig = {}) {
    this.eye = cfg.eye ? [...cfg.eye] : [0, 1, -6];
  }

  move(axis: Axis, delta: number): void {
    const next: Vec3 = [...this.eye];
    next[axis] += delta;
    this.eye = next;
  }
}
