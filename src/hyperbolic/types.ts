/**
 * Shared types for the tiling graph and its consumers (snapshot store,
 * renderer).
 */

import type { Point } from "./geometry";

/** Index into the graph's vertex arena, assigned at first registration. */
export type VertexId = number;
export type EdgeId = number;
export type TileId = number;

/** A point registered in a TilingGraph. */
export interface Vertex extends Point {
  readonly id: VertexId;
}

export interface TilingEdge {
  readonly id: EdgeId;
  /** Sorted ascending. */
  readonly vertices: readonly [VertexId, VertexId];
}

export interface TilingTile {
  readonly id: TileId;
  /**
   * Registration order: the base tile is (v1, v2, v3), a tile built across
   * edge (a, b) is (a, new, b).
   */
  readonly vertices: readonly [VertexId, VertexId, VertexId];
}

export interface LayerProgress {
  /** Depth of the layer being grown. */
  depth: number;
  /** Tiles built so far in this layer. */
  built: number;
  /** Tiles this layer adds, from the closed form. */
  expected: number;
}

export interface SnapshotTile {
  readonly vertices: readonly [Point, Point, Point];
  /** Colour index in 0..3. */
  readonly colour: number;
}

/**
 * Everything the persistence and rendering collaborators need: each tile's
 * coordinates and colour, in tile-id order.
 */
export interface TilingSnapshot {
  readonly depth: number;
  readonly tiles: readonly SnapshotTile[];
}
