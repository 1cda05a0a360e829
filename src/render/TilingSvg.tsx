/**
 * Tiling renderer.
 * Draws every tile of a snapshot as a Poincaré-disk path filled by its
 * colour index. The viewBox is the unit disk.
 */
import { useMemo } from "react";
import { TILE_COLOURS } from "../config";
import type { TilingSnapshot } from "../hyperbolic/types";
import { tilePath } from "./tilePath";

export function TilingSvg({
  snapshot,
  size,
  palette = TILE_COLOURS,
  showDisk = false,
}: {
  snapshot: TilingSnapshot;
  size: number;
  palette?: readonly string[];
  showDisk?: boolean;
}) {
  const paths = useMemo(
    () => snapshot.tiles.map((tile) => ({ d: tilePath(tile.vertices), colour: tile.colour })),
    [snapshot]
  );

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={size}
      height={size}
      viewBox="-1 -1 2 2"
    >
      {/* Boundary circle of the disk, drawn behind the tiles */}
      {showDisk && <circle cx={0} cy={0} r={1} fill="none" stroke="#cccccc" strokeWidth={0.002} />}

      {paths.map((path, index) => (
        <path key={index} d={path.d} fill={palette[path.colour % palette.length]} />
      ))}
    </svg>
  );
}
