/**
 * Defaults for the tiling job and its outputs.
 */

export const DEFAULT_DEPTH = 6;
export const DEFAULT_OUTPUT_DIR = "images";

/** Width and height of rendered SVGs, in pixels. */
export const DEFAULT_RENDER_SIZE = 4096;

/** Fill colour per tile colour index 0..3. */
export const TILE_COLOURS = ["#ffffff", "#000000", "#cc6600", "#66cc00"] as const;

export const SNAPSHOT_PREFIX = "tiling-depth-";

/** Log a progress line every this many tiles while growing a layer. */
export const PROGRESS_INTERVAL = 1000;
