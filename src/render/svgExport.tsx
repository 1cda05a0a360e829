/**
 * SVG Export Utility
 *
 * Renders tiling snapshots to standalone SVG documents and writes them to disk.
 */

import * as fs from "fs";
import * as path from "path";
import { renderToStaticMarkup } from "react-dom/server";
import { DEFAULT_RENDER_SIZE, SNAPSHOT_PREFIX, TILE_COLOURS } from "../config";
import type { TilingSnapshot } from "../hyperbolic/types";
import { TilingSvg } from "./TilingSvg";

export interface SvgRenderOptions {
  size?: number;
  palette?: readonly string[];
  showDisk?: boolean;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

export function svgFileName(depth: number): string {
  return `${SNAPSHOT_PREFIX}${depth}.svg`;
}

export function renderTilingSvg(snapshot: TilingSnapshot, options: SvgRenderOptions = {}): string {
  const markup = renderToStaticMarkup(
    <TilingSvg
      snapshot={snapshot}
      size={options.size ?? DEFAULT_RENDER_SIZE}
      palette={options.palette ?? TILE_COLOURS}
      showDisk={options.showDisk ?? false}
    />
  );
  return `${XML_DECLARATION}${markup}\n`;
}

export function writeTilingSvg(dir: string, snapshot: TilingSnapshot, options: SvgRenderOptions = {}): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, svgFileName(snapshot.depth));
  fs.writeFileSync(file, renderTilingSvg(snapshot, options), "utf-8");
  return file;
}
