export * from "./geometry";
export * from "./types";
export { TilingGraph, expectedLayerTileCount, type TilingGraphOptions } from "./TilingGraph";
export { defaultSeedTriangle, type SeedTriangle } from "./seeds";
