#!/usr/bin/env tsx
/**
 * Checkerball - mirrored sphere over a checkerboard, drawn in the terminal.
 *
 * Keys: w/s forward/back, a/d left/right, y/x up/down, Ctrl-C quits.
 */

import { parseArgs, USAGE } from "./args";
import { listenKeys, TerminalDisplay } from "./terminal";
import { FrameLog } from "./utils/frame-log";
import { Viewer } from "./viewer";

// =============================================================================
// Main
// =============================================================================

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.log(USAGE);
    return;
  }

  const log = args.log ? new FrameLog(args.log) : null;
  const viewer = new Viewer(new TerminalDisplay(), {
    width: args.width,
    height: args.height,
    fullRamp: args.fullRamp,
    bands: args.bands,
    onFrame: log ? (ms) => log.record(ms) : undefined,
  });

  viewer.start();
  listenKeys((key) => {
    viewer.handleKey(key);
  });
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
