/**
 * Command line flags for the tiling job.
 *
 *   --depth=N    target depth (default 6)
 *   --out=DIR    output directory for snapshots and SVGs (default images)
 *   --size=N     rendered SVG width and height in pixels (default 4096)
 *   --no-svg     skip rendering
 */

import { DEFAULT_DEPTH, DEFAULT_OUTPUT_DIR, DEFAULT_RENDER_SIZE } from "../config";
import { InvalidArgumentError } from "../errors";
import type { TilingJobOptions } from "./tilingJob";

function parseCount(flag: string, value: string, min: number): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`--${flag} expects a whole number, got "${value}"`);
  }
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new InvalidArgumentError(`--${flag} must be at least ${min}, got ${value}`);
  }
  return n;
}

export function parseTilingArgs(argv: readonly string[]): TilingJobOptions {
  const options: TilingJobOptions = {
    depth: DEFAULT_DEPTH,
    outputDir: DEFAULT_OUTPUT_DIR,
    renderSvg: true,
    renderSize: DEFAULT_RENDER_SIZE,
  };

  for (const arg of argv) {
    if (arg === "--no-svg") {
      options.renderSvg = false;
      continue;
    }

    const match = arg.match(/^--([a-z-]+)=(.*)$/);
    if (!match) {
      throw new InvalidArgumentError(`Unknown argument "${arg}"`);
    }
    const [, flag, value] = match;

    switch (flag) {
      case "depth":
        options.depth = parseCount(flag, value, 0);
        break;
      case "size":
        options.renderSize = parseCount(flag, value, 1);
        break;
      case "out":
        if (value === "") throw new InvalidArgumentError("--out expects a directory");
        options.outputDir = value;
        break;
      default:
        throw new InvalidArgumentError(`Unknown flag --${flag}`);
    }
  }

  return options;
}
