export * from "./errors";
export * from "./exact";
export * from "./hyperbolic";
export {
  discardSnapshot,
  loadSnapshot,
  MAX_SNAPSHOT_RADICAND,
  parseSnapshot,
  saveSnapshot,
  serializeSnapshot,
  snapshotFileName,
  snapshotToJson,
  type PointJson,
  type RationalJson,
  type SnapshotJson,
} from "./storage/snapshots";
export { tilePath } from "./render/tilePath";
export { TilingSvg } from "./render/TilingSvg";
export { renderTilingSvg, svgFileName, writeTilingSvg, type SvgRenderOptions } from "./render/svgExport";
export { runTilingJob, type Logger, type TilingJobOptions, type TilingJobResult } from "./cli/tilingJob";
export { parseTilingArgs } from "./cli/args";
