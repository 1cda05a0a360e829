/**
 * Tests for snapshot persistence: JSON round trips, validation of malformed
 * files, and the per-depth file layout.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { MalformedDataError } from "../errors";
import { TilingGraph } from "../hyperbolic/TilingGraph";
import { defaultSeedTriangle } from "../hyperbolic/seeds";
import { pointsEqual } from "../hyperbolic/geometry";
import type { TilingSnapshot } from "../hyperbolic/types";
import {
  discardSnapshot,
  loadSnapshot,
  MAX_SNAPSHOT_RADICAND,
  parseSnapshot,
  saveSnapshot,
  serializeSnapshot,
  snapshotFileName,
  snapshotToJson,
} from "./snapshots";

function snapshotAt(depth: number): TilingSnapshot {
  const [a, b, c] = defaultSeedTriangle();
  const graph = new TilingGraph(a, b, c);
  graph.createTiles(depth);
  return graph.snapshot();
}

function parseError(text: string, source?: string): MalformedDataError {
  try {
    parseSnapshot(text, source);
  } catch (e: unknown) {
    if (e instanceof MalformedDataError) return e;
    throw e;
  }
  throw new Error("Expected parseSnapshot to fail");
}

describe("snapshot encoding", () => {
  it("names files by depth", () => {
    expect(snapshotFileName(3)).toBe("tiling-depth-3.json");
  });

  it("writes integers as decimal strings", () => {
    const json = snapshotToJson(snapshotAt(0));
    const [v1] = json.tiles[0].vertices;
    expect(v1.x).toEqual({ numerator: [], denominator: "1" });
    expect(v1.y).toEqual({ numerator: [["6", "1"]], denominator: "3" });
    expect(v1.z).toEqual({
      numerator: [
        ["3", "1"],
        ["6", "1"],
      ],
      denominator: "3",
    });
    expect(json.tiles[0].colour).toBe(0);
  });

  it("round-trips a snapshot through text", () => {
    const snapshot = snapshotAt(1);
    const text = serializeSnapshot(snapshot);
    const parsed = parseSnapshot(text);
    expect(parsed.depth).toBe(1);
    expect(parsed.tiles).toHaveLength(19);
    expect(serializeSnapshot(parsed)).toBe(text);
    expect(pointsEqual(parsed.tiles[5].vertices[1], snapshot.tiles[5].vertices[1])).toBe(true);
  });

  it("accepts an empty tile list", () => {
    expect(parseSnapshot('{"depth":0,"tiles":[]}')).toEqual({ depth: 0, tiles: [] });
  });
});

describe("snapshot validation", () => {
  const valid = serializeSnapshot(snapshotAt(0));

  it("rejects text that is not JSON", () => {
    expect(parseError("{").message).toMatch(/^Invalid JSON: /);
  });

  it("rejects the wrong top-level shape", () => {
    expect(parseError("[]").message).toBe("Snapshot must be { depth, tiles }");
    expect(parseError('{"depth":-1,"tiles":[]}').message).toBe("depth must be a non-negative integer");
  });

  it("rejects integers written as numbers", () => {
    const text = valid.replace('"denominator":"1"', '"denominator":1');
    expect(parseError(text).message).toBe("tiles[0].vertices[0].x.denominator must be an integer string");
  });

  it("rejects a radicand that is not square-free", () => {
    const text = valid.replace('["6","1"]', '["8","1"]');
    expect(parseError(text).message).toBe("tiles[0].vertices[0].y.numerator[0] radicand 8 is not square-free");
  });

  it("rejects oversized radicands without factoring them", () => {
    const text = valid.replace('["6","1"]', '["1000000000000000000000000000057","1"]');
    expect(parseError(text).message).toBe(
      `tiles[0].vertices[0].y.numerator[0] radicand 1000000000000000000000000000057 exceeds ${MAX_SNAPSHOT_RADICAND}`
    );
    expect(MAX_SNAPSHOT_RADICAND).toBe(4294967296n);
  });

  it("rejects a non-positive denominator", () => {
    const text = valid.replace('"denominator":"1"', '"denominator":"0"');
    expect(parseError(text).message).toBe("tiles[0].vertices[0].x.denominator must be positive");
  });

  it("rejects colours outside 0..3", () => {
    const text = valid.replace('"colour":0', '"colour":4');
    expect(parseError(text).message).toBe("tiles[0].colour must be an integer in 0..3");
  });

  it("rejects tiles without three vertices", () => {
    expect(parseError('{"depth":0,"tiles":[{"vertices":[],"colour":0}]}').message).toBe(
      "tiles[0] must have three vertices"
    );
  });

  it("names the source of the bad data", () => {
    const error = parseError('{"depth":-1,"tiles":[]}', "snap.json");
    expect(error.source).toBe("snap.json");
    expect(error.message).toBe("depth must be a non-negative integer (in snap.json)");
    expect(parseError("{", "snap.json").source).toBe("snap.json");
  });
});

describe("snapshot files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tiling-snapshots-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves and loads by depth", () => {
    const snapshot = snapshotAt(1);
    const file = saveSnapshot(dir, snapshot);
    expect(file).toBe(path.join(dir, "tiling-depth-1.json"));

    const loaded = loadSnapshot(dir, 1);
    expect(loaded).not.toBeNull();
    if (loaded === null) return;
    expect(serializeSnapshot(loaded)).toBe(serializeSnapshot(snapshot));
  });

  it("creates the output directory", () => {
    const nested = path.join(dir, "a", "b");
    saveSnapshot(nested, snapshotAt(0));
    expect(fs.existsSync(path.join(nested, "tiling-depth-0.json"))).toBe(true);
  });

  it("returns null for a missing snapshot", () => {
    expect(loadSnapshot(dir, 4)).toBeNull();
  });

  it("rejects a file holding another depth", () => {
    const file = path.join(dir, snapshotFileName(2));
    fs.writeFileSync(file, serializeSnapshot(snapshotAt(1)), "utf-8");
    expect(() => loadSnapshot(dir, 2)).toThrow(MalformedDataError);
    expect(() => loadSnapshot(dir, 2)).toThrow(`Expected depth 2, found 1 (in ${file})`);
  });

  it("discards a snapshot, missing or not", () => {
    saveSnapshot(dir, snapshotAt(0));
    discardSnapshot(dir, 0);
    expect(loadSnapshot(dir, 0)).toBeNull();
    expect(() => discardSnapshot(dir, 0)).not.toThrow();
  });
});
