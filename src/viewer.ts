/**
 * One viewer session: camera, frame buffer and display, advanced one key at a time.
 */

import { Camera } from "./camera";
import { applyKey } from "./input";
import { presentFrame, type Display } from "./presenter";
import { FrameBuffer, renderFrame } from "./renderer";
import { config } from "./scene";

export interface ViewerOptions {
  width?: number;
  height?: number;
  fullRamp?: boolean;
  bands?: number;
  /** Called with the render time of each frame in milliseconds. */
  onFrame?: (ms: number) => void;
}

export interface FrameResult {
  moved: boolean;
  changed: number;
  written: number;
}

export class Viewer {
  readonly camera: Camera;
  readonly frame: FrameBuffer;
  private readonly fullRamp: boolean;
  private readonly bands: number;
  private readonly onFrame?: (ms: number) => void;

  constructor(
    private readonly display: Display,
    options: ViewerOptions = {}
  ) {
    this.camera = new Camera({ eye: config.camera.eye });
    this.frame = new FrameBuffer(
      options.width ?? config.render.width,
      options.height ?? config.render.height
    );
    this.fullRamp = options.fullRamp ?? config.display.fullRamp;
    this.bands = options.bands ?? config.render.bands;
    this.onFrame = options.onFrame;
  }

  /** Clears the surface and shows the start prompt. */
  start(prompt: string = config.display.prompt): void {
    this.display.clear();
    for (let i = 0; i < prompt.length; i++) {
      this.display.put(1, i + 1, prompt.charAt(i));
    }
  }

  /**
   * Applies the key, re-renders and pushes the diff. Unknown keys still render.
   */
  handleKey(key: string): FrameResult {
    const moved = applyKey(this.camera, key);

    const startTime = performance.now();
    const changed = renderFrame(this.frame, this.camera, { bands: this.bands });
    this.onFrame?.(performance.now() - startTime);

    const written = presentFrame(this.frame, this.display, { fullRamp: this.fullRamp });
    return { moved, changed, written };
  }
}
