/**
 * TilingGraph: incremental construction of a hyperbolic triangle tiling.
 *
 * Starting from a seed triangle, each depth level adds one ring of tiles by
 * walking around the current boundary and reflecting the inner vertex of
 * every rim edge across that edge. Reflected vertices are deduplicated
 * against every vertex seen so far with exact (x, y) equality.
 *
 * Storage is an arena per entity kind: vertices, edges and tiles get
 * monotonic integer ids, and colours and incident-tile lists are parallel
 * arrays indexed by id. Edges and tiles are looked up by the sorted tuple of
 * their vertex ids. Nothing is ever removed.
 *
 * Colouring: seed vertices get colours 1, 2, 3 and the base tile 0. A
 * reflected vertex inherits the colour of the vertex it mirrors; a new tile
 * gets colour(innerVertex) XOR colour(innerTile).
 */

import { GraphInvariantError, InvalidArgumentError } from "../errors";
import { RadicalInteger } from "../exact/RadicalInteger";
import { lineThroughPoints, pointKey, reflect, type Point } from "./geometry";
import type {
  EdgeId,
  LayerProgress,
  TileId,
  TilingEdge,
  TilingSnapshot,
  TilingTile,
  Vertex,
  VertexId,
} from "./types";

export interface TilingGraphOptions {
  /** Called after every tile built while growing a layer. */
  onProgress?: (progress: LayerProgress) => void;
}

function edgeKey(a: VertexId, b: VertexId): string {
  // Unordered, unique.
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

function tileKey(a: VertexId, b: VertexId, c: VertexId): string {
  return [a, b, c].sort((p, q) => p - q).join("|");
}

/**
 * Tiles added by growing layer `depth`: 3·√3·((2+√3)^d − (2−√3)^d),
 * evaluated exactly. Used for progress reporting only.
 */
export function expectedLayerTileCount(depth: number): number {
  const sqrt3 = RadicalInteger.sqrt(3);
  const growing = sqrt3.add(2).pow(depth);
  const shrinking = sqrt3.neg().add(2).pow(depth);
  return Number(sqrt3.scale(3).mul(growing.sub(shrinking)).asInteger());
}

export class TilingGraph {
  private readonly vertexTable: Vertex[] = [];
  private readonly vertexIndex = new Map<string, VertexId>();
  private readonly vertexColours: number[] = [];

  private readonly edgeTable: TilingEdge[] = [];
  private readonly edgeIndex = new Map<string, EdgeId>();
  private readonly edgeTiles: TileId[][] = [];

  private readonly tileTable: TilingTile[] = [];
  private readonly tileIndex = new Map<string, TileId>();
  private readonly tileColours: number[] = [];

  private currentBoundary: VertexId[] = [];
  private builtDepth = 0;

  constructor(
    v1: Point,
    v2: Point,
    v3: Point,
    private readonly options: TilingGraphOptions = {}
  ) {
    this.initialize(v1, v2, v3);
  }

  private initialize(v1: Point, v2: Point, v3: Point): void {
    const ids = [v1, v2, v3].map((p, index) => {
      const { id, created } = this.addVertex(p);
      if (!created) {
        throw new GraphInvariantError("Seed triangle has two equal vertices");
      }
      this.vertexColours[id] = index + 1;
      return id;
    });
    const [a, b, c] = ids;

    this.addEdge(a, b);
    this.addEdge(b, c);
    this.addEdge(a, c);
    const base = this.addTile(a, b, c);
    this.tileColours[base] = 0;

    this.currentBoundary = [a, b, c];
  }

  get depth(): number {
    return this.builtDepth;
  }

  get vertexCount(): number {
    return this.vertexTable.length;
  }

  get edgeCount(): number {
    return this.edgeTable.length;
  }

  get tileCount(): number {
    return this.tileTable.length;
  }

  /** The current outer rim, in walk order. */
  get boundary(): readonly VertexId[] {
    return this.currentBoundary;
  }

  vertex(id: VertexId): Vertex {
    const v = this.vertexTable[id];
    if (!v) throw new GraphInvariantError(`Vertex not found: ${id}`);
    return v;
  }

  vertices(): readonly Vertex[] {
    return this.vertexTable;
  }

  edges(): readonly TilingEdge[] {
    return this.edgeTable;
  }

  tiles(): readonly TilingTile[] {
    return this.tileTable;
  }

  vertexColour(id: VertexId): number {
    const colour = this.vertexColours[id];
    if (colour === undefined) throw new GraphInvariantError(`Vertex not found: ${id}`);
    return colour;
  }

  tileColour(id: TileId): number {
    const colour = this.tileColours[id];
    if (colour === undefined) throw new GraphInvariantError(`Tile not found: ${id}`);
    return colour;
  }

  incidentTiles(id: EdgeId): readonly TileId[] {
    const tiles = this.edgeTiles[id];
    if (!tiles) throw new GraphInvariantError(`Edge not found: ${id}`);
    return tiles;
  }

  /** The registered vertex equal to p on (x, y), if any. */
  findVertex(p: Point): Vertex | undefined {
    const id = this.vertexIndex.get(pointKey(p));
    return id === undefined ? undefined : this.vertexTable[id];
  }

  findEdge(a: VertexId, b: VertexId): TilingEdge | undefined {
    const id = this.edgeIndex.get(edgeKey(a, b));
    return id === undefined ? undefined : this.edgeTable[id];
  }

  findTile(a: VertexId, b: VertexId, c: VertexId): TilingTile | undefined {
    const id = this.tileIndex.get(tileKey(a, b, c));
    return id === undefined ? undefined : this.tileTable[id];
  }

  private addVertex(p: Point): { id: VertexId; created: boolean } {
    const key = pointKey(p);
    const existing = this.vertexIndex.get(key);
    if (existing !== undefined) return { id: existing, created: false };

    const id = this.vertexTable.length;
    this.vertexTable.push({ id, x: p.x, y: p.y, z: p.z });
    this.vertexIndex.set(key, id);
    return { id, created: true };
  }

  private addEdge(a: VertexId, b: VertexId): EdgeId {
    const key = edgeKey(a, b);
    const existing = this.edgeIndex.get(key);
    if (existing !== undefined) return existing;

    const id = this.edgeTable.length;
    this.edgeTable.push({ id, vertices: a < b ? [a, b] : [b, a] });
    this.edgeTiles.push([]);
    this.edgeIndex.set(key, id);
    return id;
  }

  private addTile(a: VertexId, b: VertexId, c: VertexId): TileId {
    const key = tileKey(a, b, c);
    const existing = this.tileIndex.get(key);
    if (existing !== undefined) return existing;

    const id = this.tileTable.length;
    this.tileTable.push({ id, vertices: [a, b, c] });
    this.tileIndex.set(key, id);

    for (const [p, q] of [[b, c], [c, a], [a, b]] as const) {
      const edge = this.edgeIndex.get(edgeKey(p, q));
      if (edge === undefined) {
        throw new GraphInvariantError(`Tile ${a},${b},${c} has no edge ${p}-${q}`);
      }
      const incident = this.edgeTiles[edge];
      if (incident.length >= 2) {
        throw new GraphInvariantError(`Edge ${p}-${q} already borders two tiles`);
      }
      incident.push(id);
    }
    return id;
  }

  /**
   * Build the tile on the far side of rim edge (v1, v2) and return its third
   * vertex, which may be an existing vertex.
   */
  buildNewTile(v1: VertexId, v2: VertexId): VertexId {
    const edge = this.edgeIndex.get(edgeKey(v1, v2));
    if (edge === undefined) {
      throw new GraphInvariantError(`Edge ${v1}-${v2} does not exist`);
    }
    const incident = this.edgeTiles[edge];
    if (incident.length !== 1) {
      throw new GraphInvariantError(
        `Edge ${v1}-${v2} must border exactly one tile to grow, found ${incident.length}`
      );
    }

    const innerTile = incident[0];
    const innerVertex = this.tileTable[innerTile].vertices.find((v) => v !== v1 && v !== v2);
    if (innerVertex === undefined) {
      throw new GraphInvariantError(`Tile ${innerTile} has no vertex opposite ${v1}-${v2}`);
    }

    const mirror = lineThroughPoints(this.vertex(v1), this.vertex(v2));
    const { id: newVertex, created } = this.addVertex(reflect(mirror, this.vertex(innerVertex)));

    const colour = this.vertexColours[innerVertex];
    if (created) {
      this.vertexColours[newVertex] = colour;
    } else if (this.vertexColours[newVertex] !== colour) {
      throw new GraphInvariantError(
        `Vertex ${newVertex} reached with colour ${colour}, already coloured ${this.vertexColours[newVertex]}`
      );
    }

    this.addEdge(v1, newVertex);
    this.addEdge(v2, newVertex);
    const tile = this.addTile(v1, newVertex, v2);
    this.tileColours[tile] = colour ^ this.tileColours[innerTile];

    return newVertex;
  }

  /**
   * Grow the tiling until `depth` layers surround the base tile.
   * Layers already built are kept; asking for a smaller depth does nothing.
   */
  createTiles(depth: number): void {
    if (!Number.isSafeInteger(depth) || depth < 0) {
      throw new InvalidArgumentError(`Depth must be a non-negative integer, got ${depth}`);
    }
    while (this.builtDepth < depth) {
      this.growLayer(this.builtDepth + 1);
      this.builtDepth++;
    }
  }

  private growLayer(depth: number): void {
    const previous = this.currentBoundary;
    const onPrevious = new Set(previous);
    const expected = expectedLayerTileCount(depth);
    let built = 0;

    const build = (v1: VertexId, v2: VertexId): VertexId => {
      const v = this.buildNewTile(v1, v2);
      built++;
      this.options.onProgress?.({ depth, built, expected });
      return v;
    };

    const next: VertexId[] = [build(previous[0], previous[previous.length - 1])];
    let index = 0;

    for (;;) {
      if (index >= previous.length) {
        throw new GraphInvariantError(`Boundary walk at depth ${depth} ran past the previous rim`);
      }
      const v = build(next[next.length - 1], previous[index]);

      if (onPrevious.has(v)) {
        index++;
      } else if (v === next[0]) {
        break;
      } else {
        next.push(v);
      }
    }

    this.currentBoundary = next;
  }

  /** Every tile's coordinates and colour, in tile-id order. */
  snapshot(): TilingSnapshot {
    return {
      depth: this.builtDepth,
      tiles: this.tileTable.map((tile) => ({
        vertices: [
          this.vertexTable[tile.vertices[0]],
          this.vertexTable[tile.vertices[1]],
          this.vertexTable[tile.vertices[2]],
        ],
        colour: this.tileColours[tile.id],
      })),
    };
  }
}
