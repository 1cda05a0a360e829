/* Hyperboloid-model geometry with exact coordinates.
 *
 * Notes:
 * - Points live on the upper sheet of (x² + y²)·√2 = z² − 1.
 * - A point is identified by (x, y); z is determined by them.
 * - A Line holds the dual coefficients of a geodesic: p lies on l iff
 *   lineProduct(l, p) = 0. Reflecting across l fixes exactly those points.
 * - diskPosition() and geodesicCircle() return doubles and exist for
 *   rendering only; nothing in graph construction calls them.
 */

import { DegenerateLineError } from "../errors";
import { RadicalInteger } from "../exact/RadicalInteger";
import { RadicalRational, type RationalLike } from "../exact/RadicalRational";

export interface Point {
  readonly x: RadicalRational;
  readonly y: RadicalRational;
  readonly z: RadicalRational;
}

export interface Line {
  readonly x: RadicalRational;
  readonly y: RadicalRational;
  readonly z: RadicalRational;
}

const SQRT2 = RadicalRational.from(RadicalInteger.sqrt(2));

// Scale of the Poincaré disk projection: 2^(1/4).
const DISK_SCALE = Math.pow(2, 0.25);

export function point(x: RationalLike, y: RationalLike, z: RationalLike): Point {
  return {
    x: RadicalRational.from(x),
    y: RadicalRational.from(y),
    z: RadicalRational.from(z),
  };
}

/**
 * Check the hyperboloid equation exactly, and that the point is on the upper
 * sheet. Too slow to run on every construction.
 */
export function isOnHyperboloid(p: Point): boolean {
  const lhs = p.x.pow(2).add(p.y.pow(2)).mul(SQRT2);
  const rhs = p.z.pow(2).sub(1);
  return lhs.equals(rhs) && p.z.approximateValue() > 0;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x.equals(b.x) && a.y.equals(b.y);
}

/** Hash key on (x, y); equal keys iff pointsEqual(). */
export function pointKey(p: Point): string {
  return `${p.x.key()};${p.y.key()}`;
}

export function lineNorm(l: Line): RadicalRational {
  return l.x.pow(2).add(l.y.pow(2)).mul(SQRT2).sub(l.z.pow(2));
}

export function lineProduct(l: Line, p: Point): RadicalRational {
  return l.z.mul(p.z).sub(l.x.mul(p.x).add(l.y.mul(p.y)).mul(SQRT2));
}

export function lineContains(l: Line, p: Point): boolean {
  return lineProduct(l, p).isZero();
}

/** The geodesic through both points (a hyperbolic cross product). */
export function lineThroughPoints(p1: Point, p2: Point): Line {
  return {
    x: p1.y.mul(p2.z).sub(p1.z.mul(p2.y)),
    y: p1.z.mul(p2.x).sub(p1.x.mul(p2.z)),
    z: p1.y.mul(p2.x).sub(p1.x.mul(p2.y)).mul(SQRT2),
  };
}

/**
 * Mirror image of p across l. Throws DegenerateLineError for a zero-norm line.
 * reflect(l, reflect(l, p)) equals p.
 */
export function reflect(l: Line, p: Point): Point {
  const norm = lineNorm(l);
  if (norm.isZero()) throw new DegenerateLineError();

  const twiceFactor = lineProduct(l, p).div(norm).mul(2);
  return {
    x: p.x.add(l.x.mul(twiceFactor)),
    y: p.y.add(l.y.mul(twiceFactor)),
    z: p.z.add(l.z.mul(twiceFactor)),
  };
}

/** cosh of the hyperbolic distance between two points. */
export function coshDistance(p1: Point, p2: Point): RadicalRational {
  return p1.z.mul(p2.z).sub(p1.x.mul(p2.x).add(p1.y.mul(p2.y)).mul(SQRT2));
}

/////////////////////////////
// Rendering-only conversions
/////////////////////////////

export interface DiskPoint {
  x: number;
  y: number;
}

export interface GeodesicCircle {
  cx: number;
  cy: number;
  r: number;
}

/** Position of p in the Poincaré disk. */
export function diskPosition(p: Point): DiskPoint {
  const denominator = 1 + p.z.approximateValue();
  return {
    x: (p.x.approximateValue() * DISK_SCALE) / denominator,
    y: (p.y.approximateValue() * DISK_SCALE) / denominator,
  };
}

/**
 * The circle carrying l in the Poincaré disk, or null when l passes
 * through the origin (a diameter).
 */
export function geodesicCircle(l: Line): GeodesicCircle | null {
  if (l.z.isZero()) return null;
  const z = l.z.approximateValue();
  return {
    cx: (l.x.approximateValue() * DISK_SCALE) / z,
    cy: (l.y.approximateValue() * DISK_SCALE) / z,
    r: Math.sqrt(lineNorm(l).div(l.z.pow(2)).approximateValue()),
  };
}
