/**
 * Snapshot Storage Module
 *
 * Saves, loads and discards per-depth tiling snapshots as JSON files, so a
 * later run can render a depth without rebuilding the graph.
 *
 * Big integers are written as decimal strings. A rational is
 * { numerator: [[radicand, coefficient], ...], denominator }.
 */

import * as fs from "fs";
import * as path from "path";
import { SNAPSHOT_PREFIX } from "../config";
import { MalformedDataError } from "../errors";
import { RadicalInteger } from "../exact/RadicalInteger";
import { RadicalRational } from "../exact/RadicalRational";
import { isSquareFree } from "../exact/radicals";
import type { Point } from "../hyperbolic/geometry";
import type { SnapshotTile, TilingSnapshot } from "../hyperbolic/types";

/**
 * Largest radicand accepted from a file. Square-freeness is checked by trial
 * division, so the bound keeps parsing fast; tilings only produce small
 * radicands.
 */
export const MAX_SNAPSHOT_RADICAND = 2n ** 32n;

export interface RationalJson {
  numerator: Array<[string, string]>;
  denominator: string;
}

export interface PointJson {
  x: RationalJson;
  y: RationalJson;
  z: RationalJson;
}

export interface SnapshotJson {
  depth: number;
  tiles: Array<{ vertices: [PointJson, PointJson, PointJson]; colour: number }>;
}

export function snapshotFileName(depth: number): string {
  return `${SNAPSHOT_PREFIX}${depth}.json`;
}

/////////////////////////////
// Encoding
/////////////////////////////

function rationalToJson(value: RadicalRational): RationalJson {
  return {
    numerator: value.numerator.terms().map(([radicand, coefficient]) => [
      radicand.toString(),
      coefficient.toString(),
    ]),
    denominator: value.denominator.toString(),
  };
}

function pointToJson(p: Point): PointJson {
  return { x: rationalToJson(p.x), y: rationalToJson(p.y), z: rationalToJson(p.z) };
}

export function snapshotToJson(snapshot: TilingSnapshot): SnapshotJson {
  return {
    depth: snapshot.depth,
    tiles: snapshot.tiles.map((tile) => ({
      vertices: [
        pointToJson(tile.vertices[0]),
        pointToJson(tile.vertices[1]),
        pointToJson(tile.vertices[2]),
      ],
      colour: tile.colour,
    })),
  };
}

export function serializeSnapshot(snapshot: TilingSnapshot): string {
  return JSON.stringify(snapshotToJson(snapshot));
}

/////////////////////////////
// Decoding + validation
/////////////////////////////

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBigInt(value: unknown, where: string): bigint {
  if (typeof value !== "string" || !/^-?\d+$/.test(value)) {
    throw new MalformedDataError(`${where} must be an integer string`);
  }
  return BigInt(value);
}

function parseRational(value: unknown, where: string): RadicalRational {
  if (!isRecord(value) || !Array.isArray(value.numerator)) {
    throw new MalformedDataError(`${where} must be { numerator, denominator }`);
  }

  const terms = value.numerator.map((term: unknown, i): [bigint, bigint] => {
    if (!Array.isArray(term) || term.length !== 2) {
      throw new MalformedDataError(`${where}.numerator[${i}] must be a [radicand, coefficient] pair`);
    }
    const radicand = parseBigInt(term[0], `${where}.numerator[${i}][0]`);
    if (radicand > MAX_SNAPSHOT_RADICAND) {
      throw new MalformedDataError(`${where}.numerator[${i}] radicand ${radicand} exceeds ${MAX_SNAPSHOT_RADICAND}`);
    }
    if (!isSquareFree(radicand)) {
      throw new MalformedDataError(`${where}.numerator[${i}] radicand ${radicand} is not square-free`);
    }
    return [radicand, parseBigInt(term[1], `${where}.numerator[${i}][1]`)];
  });

  const denominator = parseBigInt(value.denominator, `${where}.denominator`);
  if (denominator <= 0n) {
    throw new MalformedDataError(`${where}.denominator must be positive`);
  }

  return RadicalRational.of(RadicalInteger.fromTerms(terms), denominator);
}

function parsePoint(value: unknown, where: string): Point {
  if (!isRecord(value)) {
    throw new MalformedDataError(`${where} must be an object`);
  }
  return {
    x: parseRational(value.x, `${where}.x`),
    y: parseRational(value.y, `${where}.y`),
    z: parseRational(value.z, `${where}.z`),
  };
}

function parseTile(value: unknown, where: string): SnapshotTile {
  if (!isRecord(value) || !Array.isArray(value.vertices) || value.vertices.length !== 3) {
    throw new MalformedDataError(`${where} must have three vertices`);
  }
  const { colour } = value;
  if (typeof colour !== "number" || !Number.isInteger(colour) || colour < 0 || colour > 3) {
    throw new MalformedDataError(`${where}.colour must be an integer in 0..3`);
  }
  const [a, b, c] = value.vertices;
  return {
    vertices: [
      parsePoint(a, `${where}.vertices[0]`),
      parsePoint(b, `${where}.vertices[1]`),
      parsePoint(c, `${where}.vertices[2]`),
    ],
    colour,
  };
}

/**
 * Parse and validate snapshot JSON text.
 * Throws MalformedDataError on anything that is not a valid snapshot.
 */
export function parseSnapshot(text: string, source?: string): TilingSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new MalformedDataError(`Invalid JSON: ${msg}`, source);
  }

  try {
    if (!isRecord(data) || !Array.isArray(data.tiles)) {
      throw new MalformedDataError("Snapshot must be { depth, tiles }");
    }
    const { depth } = data;
    if (typeof depth !== "number" || !Number.isInteger(depth) || depth < 0) {
      throw new MalformedDataError("depth must be a non-negative integer");
    }
    return {
      depth,
      tiles: data.tiles.map((tile: unknown, i) => parseTile(tile, `tiles[${i}]`)),
    };
  } catch (e: unknown) {
    if (e instanceof MalformedDataError && source !== undefined && e.source === undefined) {
      throw new MalformedDataError(e.message, source);
    }
    throw e;
  }
}

/////////////////////////////
// Files
/////////////////////////////

export function saveSnapshot(dir: string, snapshot: TilingSnapshot): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, snapshotFileName(snapshot.depth));
  fs.writeFileSync(file, serializeSnapshot(snapshot), "utf-8");
  return file;
}

/**
 * Load the snapshot for `depth`, or null when no file exists.
 * Throws MalformedDataError when the file is unreadable as a snapshot of
 * that depth.
 */
export function loadSnapshot(dir: string, depth: number): TilingSnapshot | null {
  const file = path.join(dir, snapshotFileName(depth));
  if (!fs.existsSync(file)) return null;

  const snapshot = parseSnapshot(fs.readFileSync(file, "utf-8"), file);
  if (snapshot.depth !== depth) {
    throw new MalformedDataError(`Expected depth ${depth}, found ${snapshot.depth}`, file);
  }
  return snapshot;
}

export function discardSnapshot(dir: string, depth: number): void {
  fs.rmSync(path.join(dir, snapshotFileName(depth)), { force: true });
}
