/**
 * SVG path data for tiles drawn in the Poincaré disk.
 *
 * Each side of a tile is an arc of the circle carrying its geodesic, or a
 * straight segment when the geodesic is a diameter. Path coordinates are
 * disk coordinates, untransformed.
 */

import {
  diskPosition,
  geodesicCircle,
  lineThroughPoints,
  type Point,
} from "../hyperbolic/geometry";

function fmt(value: number): string {
  return value.toFixed(6);
}

export function tilePath(vertices: readonly [Point, Point, Point]): string {
  const [first] = vertices;
  const start = diskPosition(first);
  let d = `M ${fmt(start.x)} ${fmt(start.y)}`;

  for (let i = 0; i < 3; i++) {
    const from = vertices[i];
    const to = vertices[(i + 1) % 3];
    const a = diskPosition(from);
    const b = diskPosition(to);
    const circle = geodesicCircle(lineThroughPoints(from, to));

    if (circle === null) {
      d += ` L ${fmt(b.x)} ${fmt(b.y)}`;
    } else {
      // Geodesic circles are centred outside the disk, so a side running
      // counter-clockwise about the origin runs clockwise about its centre.
      const sweep = a.x * b.y > a.y * b.x ? 0 : 1;
      d += ` A ${fmt(circle.r)} ${fmt(circle.r)} 0 0 ${sweep} ${fmt(b.x)} ${fmt(b.y)}`;
    }
  }

  return `${d} Z`;
}
