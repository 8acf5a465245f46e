/**
 * Scene configuration - edit this to change the render.
 */

import type { Vec3 } from "./camera";

// =============================================================================
// Config
// =============================================================================

export const config = {
  camera: {
    eye: [0.0, 1.0, -6.0] as Vec3,
    step: 0.2,
  },
  render: {
    width: 200,
    height: 250,
    aspect: 16 / 9,
    // sparse to dense
    shades: " .:-=+*",
    // parallel partition of the viewport rows
    bands: 4,
  },
  scene: {
    sphere: {
      center: [0.0, 2.0, 3.0] as Vec3,
      radius: 1.0,
    },
    // floor is the plane y = 0
  },
  display: {
    fullRamp: false,
    prompt: "Press any key to start",
  },
};

/** Densest glyph of the ramp; the only one the binary display draws. */
export const DENSE = config.render.shades.charAt(config.render.shades.length - 1);
