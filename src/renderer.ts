/**
 * Terminal ray caster for a mirrored sphere over a checkerboard floor.
 */

import { add, dot, normalize, scale, sub, type Camera, type Vec3 } from "./camera";
import { config } from "./scene";

// =============================================================================
// Rays and Geometry
// =============================================================================

export class Ray {
  readonly origin: Vec3;
  readonly direction: Vec3;

  constructor(origin: Vec3, direction: Vec3) {
    this.origin = origin;
    this.direction = normalize(direction);
  }
}

export interface Hit {
  t: number;
  point: Vec3;
  normal: Vec3;
}

export class Sphere {
  constructor(
    public readonly center: Vec3,
    public readonly radius: number
  ) {}

  /**
   * Nearest hit in front of the ray origin. Only the near root is considered,
   * so a ray starting inside the sphere misses.
   */
  intersect(ray: Ray): Hit | null {
    const oc = sub(ray.origin, this.center);
    const a = dot(ray.direction, ray.direction);
    const b = 2 * dot(oc, ray.direction);
    const c = dot(oc, oc) - this.radius * this.radius;
    const discriminant = b * b - 4 * a * c;

    if (discriminant < 0) return null;

    const t = (-b - Math.sqrt(discriminant)) / (2 * a);
    if (t <= 0) return null;

    const point = add(ray.origin, scale(ray.direction, t));
    const normal = normalize(sub(point, this.center));
    return { t, point, normal };
  }
}

export function makeSphere(cfg: typeof config.scene.sphere = config.scene.sphere): Sphere {
  return new Sphere([...cfg.center], cfg.radius);
}

// =============================================================================
// Shading
// =============================================================================

/** Unit-cell checkerboard on the xz plane. */
export function isCheckerboard(point: Vec3): boolean {
  const checkerX = Math.floor(point[0]);
  const checkerZ = Math.floor(point[2]);
  return (checkerX + checkerZ) % 2 === 0;
}

/**
 * Maps an intensity to a ramp glyph. The non-reflective path ignores the ramp
 * and tests the checkerboard at (intensity, 0, 0).
 */
export function getShade(
  intensity: number,
  reflective: boolean,
  shades: string = config.render.shades
): string {
  const t = Math.max(0, Math.min(1, intensity));
  const last = shades.length - 1;
  const index = Math.min(Math.trunc(t * last), last);
  if (reflective) return shades.charAt(index);
  return isCheckerboard([t, 0, 0]) ? shades.charAt(last) : " ";
}

function shadeFloor(point: Vec3): string {
  return getShade(1, isCheckerboard(point));
}

/**
 * Glyph seen along a primary ray. The floor is the plane y = 0.
 */
export function traceRay(ray: Ray, sphere: Sphere): string {
  const hit = sphere.intersect(ray);

  if (hit) {
    const d = ray.direction;
    const reflected = new Ray(hit.point, sub(d, scale(scale(hit.normal, 2), dot(d, hit.normal))));
    const floorDist = -hit.point[1] / reflected.direction[1];
    if (floorDist > 0) {
      return shadeFloor(add(hit.point, scale(reflected.direction, floorDist)));
    }
    return getShade(hit.t, true);
  }

  // Direct floor hit; no sign check, so an eye below the floor still sees it
  if (ray.direction[1] < 0) {
    const floorDist = -ray.origin[1] / ray.direction[1];
    return shadeFloor(add(ray.origin, scale(ray.direction, floorDist)));
  }

  return " ";
}

// =============================================================================
// Frame Buffer
// =============================================================================

/**
 * Last displayed glyph per cell plus a change flag, row-major.
 */
export class FrameBuffer {
  readonly glyphs: string[];
  readonly dirty: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    // Empty glyphs never match a rendered one, so the first frame is all dirty
    this.glyphs = new Array<string>(width * height).fill("");
    this.dirty = new Uint8Array(width * height);
  }

  index(x: number, y: number): number {
    return y * this.width + x;
  }

  glyphAt(x: number, y: number): string {
    return this.glyphs[this.index(x, y)] ?? "";
  }

  isDirty(x: number, y: number): boolean {
    return this.dirty[this.index(x, y)] === 1;
  }

  /** Stores the glyph and flags the cell if it changed. */
  update(x: number, y: number, glyph: string): boolean {
    const i = this.index(x, y);
    if (this.glyphs[i] === glyph) return false;
    this.glyphs[i] = glyph;
    this.dirty[i] = 1;
    return true;
  }

  clearDirty(): void {
    this.dirty.fill(0);
  }

  dirtyCount(): number {
    let count = 0;
    for (let i = 0; i < this.dirty.length; i++) {
      count += this.dirty[i]!;
    }
    return count;
  }
}

// =============================================================================
// Viewport
// =============================================================================

export interface Viewport {
  width: number;
  height: number;
}

/**
 * Largest sub-rectangle anchored at the top left that keeps the target aspect.
 */
export function computeViewport(
  width: number,
  height: number,
  aspect: number = config.render.aspect
): Viewport {
  let adjustedWidth = width;
  let adjustedHeight = Math.trunc(width / aspect);
  if (adjustedHeight > height) {
    adjustedHeight = height;
    adjustedWidth = Math.trunc(height * aspect);
  }
  return { width: adjustedWidth, height: adjustedHeight };
}

/**
 * View-plane direction through cell (x, y) at unit distance. The horizontal
 * spread uses the grid's own aspect ratio, not the viewport's.
 */
export function primaryDirection(
  x: number,
  y: number,
  viewport: Viewport,
  gridAspect: number
): Vec3 {
  const u = ((x - viewport.width / 2) / viewport.width) * gridAspect;
  const v = (viewport.height / 2 - y) / viewport.height;
  return [u, v, 1];
}

// =============================================================================
// Rendering
// =============================================================================

export interface Band {
  rowStart: number;
  rowEnd: number;
}

/**
 * Splits rows into contiguous, disjoint bands. Empty bands are dropped.
 */
export function partitionRows(rows: number, bands: number): Band[] {
  const count = Math.max(1, Math.min(Math.floor(bands), rows));
  const size = Math.ceil(rows / count);
  const result: Band[] = [];
  for (let rowStart = 0; rowStart < rows; rowStart += size) {
    result.push({ rowStart, rowEnd: Math.min(rowStart + size, rows) });
  }
  return result;
}

/**
 * Renders the viewport rows of one band. Returns the number of cells changed.
 */
export function renderBand(
  frame: FrameBuffer,
  camera: Camera,
  sphere: Sphere,
  viewport: Viewport,
  band: Band
): number {
  const gridAspect = frame.width / frame.height;
  let changed = 0;

  for (let y = band.rowStart; y < band.rowEnd; y++) {
    for (let x = 0; x < viewport.width; x++) {
      const ray = new Ray(camera.eye, primaryDirection(x, y, viewport, gridAspect));
      if (frame.update(x, y, traceRay(ray, sphere))) changed++;
    }
  }

  return changed;
}

export interface RenderOptions {
  sphere?: Sphere;
  bands?: number;
}

/**
 * Re-renders every viewport cell into the frame. Cells outside the viewport
 * keep their glyph and stay clean. Returns the dirty cell count.
 */
export function renderFrame(
  frame: FrameBuffer,
  camera: Camera,
  options: RenderOptions = {}
): number {
  const sphere = options.sphere ?? makeSphere();
  const viewport = computeViewport(frame.width, frame.height);

  frame.clearDirty();

  let changed = 0;
  for (const band of partitionRows(viewport.height, options.bands ?? config.render.bands)) {
    changed += renderBand(frame, camera, sphere, viewport, band);
  }
  return changed;
}
