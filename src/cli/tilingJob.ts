/**
 * The tiling job: for every depth up to the target, reuse the saved snapshot
 * when there is a valid one, otherwise grow the graph, save the snapshot, and
 * render it.
 */

import { PROGRESS_INTERVAL } from "../config";
import { MalformedDataError } from "../errors";
import { TilingGraph } from "../hyperbolic/TilingGraph";
import { defaultSeedTriangle, type SeedTriangle } from "../hyperbolic/seeds";
import type { TilingSnapshot } from "../hyperbolic/types";
import { writeTilingSvg } from "../render/svgExport";
import { discardSnapshot, loadSnapshot, saveSnapshot } from "../storage/snapshots";

export type Logger = Pick<Console, "log" | "warn">;

export interface TilingJobOptions {
  depth: number;
  outputDir: string;
  renderSvg: boolean;
  renderSize: number;
  seed?: SeedTriangle;
}

export interface TilingJobResult {
  /** Depths taken from existing snapshot files. */
  loaded: number[];
  /** Depths built by growing the graph. */
  computed: number[];
  /** Snapshot and SVG files written. */
  files: string[];
}

/** A saved snapshot, or null when it is missing or had to be discarded. */
function readSnapshot(dir: string, depth: number, logger: Logger): TilingSnapshot | null {
  try {
    return loadSnapshot(dir, depth);
  } catch (e: unknown) {
    if (!(e instanceof MalformedDataError)) throw e;
    logger.warn(`Discarding snapshot for depth ${depth}: ${e.message}`);
    discardSnapshot(dir, depth);
    return null;
  }
}

export function runTilingJob(options: TilingJobOptions, logger: Logger = console): TilingJobResult {
  const result: TilingJobResult = { loaded: [], computed: [], files: [] };
  const seed = options.seed ?? defaultSeedTriangle();
  let graph: TilingGraph | null = null;

  for (let depth = 0; depth <= options.depth; depth++) {
    let snapshot = readSnapshot(options.outputDir, depth, logger);

    if (snapshot !== null) {
      logger.log(`Loaded depth ${depth} (${snapshot.tiles.length} tiles)`);
      result.loaded.push(depth);
    } else {
      if (graph === null) {
        graph = new TilingGraph(seed[0], seed[1], seed[2], {
          onProgress: ({ depth: layer, built, expected }) => {
            if (built % PROGRESS_INTERVAL === 0) {
              logger.log(`  depth ${layer}: created ${built} / ${expected} tiles...`);
            }
          },
        });
      }
      logger.log(`Populating depth ${depth}...`);
      graph.createTiles(depth);
      snapshot = graph.snapshot();
      result.files.push(saveSnapshot(options.outputDir, snapshot));
      logger.log(`Populated, found ${graph.tileCount} tiles`);
      result.computed.push(depth);
    }

    if (options.renderSvg) {
      const file = writeTilingSvg(options.outputDir, snapshot, { size: options.renderSize });
      result.files.push(file);
      logger.log(`Drew ${file}`);
    }
  }

  return result;
}
