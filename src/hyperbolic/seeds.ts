/**
 * Seed triangles for the tiling.
 *
 * The default seed is the equilateral triangle centred on the origin whose
 * sides have cosh length √2 + 1, i.e. the fundamental triangle of the
 * {3, 8} tiling. Its vertices sit at 120° from each other.
 */

import { RadicalInteger, sqrt } from "../exact/RadicalInteger";
import { RadicalRational } from "../exact/RadicalRational";
import { point, type Point } from "./geometry";

export type SeedTriangle = readonly [Point, Point, Point];

export function defaultSeedTriangle(): SeedTriangle {
  const height = RadicalRational.of(sqrt(2).add(1), sqrt(3)); // (√2 + 1) / √3
  const halfSqrt2 = RadicalRational.of(sqrt(2), 2);
  const lowY = RadicalRational.of(RadicalInteger.ONE, sqrt(6)).neg();

  return [
    point(0, RadicalRational.of(sqrt(2), sqrt(3)), height),
    point(halfSqrt2.neg(), lowY, height),
    point(halfSqrt2, lowY, height),
  ];
}
