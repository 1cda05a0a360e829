/**
 * Build the {3, 8} tiling up to a depth, saving a snapshot and an SVG per depth.
 *
 * Run with: npm run tiles -- --depth=4 --out=images
 */

import { parseTilingArgs } from "./args";
import { runTilingJob } from "./tilingJob";

try {
  const options = parseTilingArgs(process.argv.slice(2));
  const result = runTilingJob(options);
  console.log(
    `Done: ${result.computed.length} depth(s) computed, ${result.loaded.length} loaded, ${result.files.length} file(s) written`
  );
} catch (e: unknown) {
  const msg = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
  console.error(msg);
  process.exit(1);
}
