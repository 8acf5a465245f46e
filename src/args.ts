/**
 * Command-line options.
 */

import { config } from "./scene";

export interface Args {
  width: number;
  height: number;
  fullRamp: boolean;
  bands: number;
  log: string | null;
}

export const USAGE = `Usage: checkerball [options]

Mirrored sphere over a checkerboard floor

Options:
  -w, --width <int>     Grid width in characters (default: ${config.render.width})
  -h, --height <int>    Grid height in characters (default: ${config.render.height})
  -r, --ramp            Draw every shading level instead of two
  -b, --bands <int>     Row bands per frame (default: ${config.render.bands})
  -l, --log <path>      Append per-frame render times to a file
  --help                Show this help`;

function parsePositive(flag: string, value: string | undefined): number {
  const n = parseInt(value ?? "", 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${value ?? ""}"`);
  }
  return n;
}

export function parseArgs(args: string[]): Args | null {
  const result: Args = {
    width: config.render.width,
    height: config.render.height,
    fullRamp: config.display.fullRamp,
    bands: config.render.bands,
    log: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-w":
      case "--width":
        result.width = parsePositive(arg, args[++i]);
        break;
      case "-h":
      case "--height":
        result.height = parsePositive(arg, args[++i]);
        break;
      case "-r":
      case "--ramp":
        result.fullRamp = true;
        break;
      case "-b":
      case "--bands":
        result.bands = parsePositive(arg, args[++i]);
        break;
      case "-l":
      case "--log": {
        const path = args[++i];
        if (!path) throw new Error(`${arg} expects a file path`);
        result.log = path;
        break;
      }
      case "--help":
        return null;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}
