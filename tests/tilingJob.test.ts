/**
 * Tests for the tiling job: building, reusing and recovering snapshots on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runTilingJob, type Logger, type TilingJobOptions } from "../src/cli/tilingJob";
import { loadSnapshot, snapshotFileName } from "../src/storage/snapshots";
import { svgFileName } from "../src/render/svgExport";

interface RecordingLogger extends Logger {
  lines: string[];
  warnings: string[];
}

function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    log: (message?: unknown) => {
      lines.push(String(message));
    },
    warn: (message?: unknown) => {
      warnings.push(String(message));
    },
  };
}

describe("runTilingJob", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tiling-job-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function options(depth: number, renderSvg = false): TilingJobOptions {
    return { depth, outputDir: dir, renderSvg, renderSize: 16 };
  }

  it("builds and saves every depth up to the target", () => {
    const logger = recordingLogger();
    const result = runTilingJob(options(1), logger);

    expect(result.computed).toEqual([0, 1]);
    expect(result.loaded).toEqual([]);
    expect(result.files).toEqual([
      path.join(dir, snapshotFileName(0)),
      path.join(dir, snapshotFileName(1)),
    ]);
    expect(logger.lines).toEqual([
      "Populating depth 0...",
      "Populated, found 1 tiles",
      "Populating depth 1...",
      "Populated, found 19 tiles",
    ]);
    expect(loadSnapshot(dir, 1)?.tiles).toHaveLength(19);
  });

  it("reuses saved depths and continues from there", () => {
    runTilingJob(options(1), recordingLogger());

    const logger = recordingLogger();
    const result = runTilingJob(options(2), logger);

    expect(result.loaded).toEqual([0, 1]);
    expect(result.computed).toEqual([2]);
    expect(logger.lines).toEqual([
      "Loaded depth 0 (1 tiles)",
      "Loaded depth 1 (19 tiles)",
      "Populating depth 2...",
      "Populated, found 91 tiles",
    ]);
  });

  it("discards and rebuilds a malformed snapshot", () => {
    const file = path.join(dir, snapshotFileName(0));
    fs.writeFileSync(file, "not json", "utf-8");

    const logger = recordingLogger();
    const result = runTilingJob(options(0), logger);

    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^Discarding snapshot for depth 0: Invalid JSON: /);
    expect(logger.warnings[0].endsWith(`(in ${file})`)).toBe(true);
    expect(result.computed).toEqual([0]);
    expect(loadSnapshot(dir, 0)?.tiles).toHaveLength(1);
  });

  it("discards a snapshot whose radicand is too large to check", () => {
    runTilingJob(options(0), recordingLogger());
    const file = path.join(dir, snapshotFileName(0));
    const text = fs.readFileSync(file, "utf-8").replace('["6","1"]', '["1000000000000000000000000000057","1"]');
    fs.writeFileSync(file, text, "utf-8");

    const logger = recordingLogger();
    const result = runTilingJob(options(0), logger);

    expect(logger.warnings).toEqual([
      `Discarding snapshot for depth 0: tiles[0].vertices[0].y.numerator[0] radicand 1000000000000000000000000000057 exceeds 4294967296 (in ${file})`,
    ]);
    expect(result.computed).toEqual([0]);
    expect(loadSnapshot(dir, 0)?.tiles).toHaveLength(1);
  });

  it("renders an SVG for every depth, loaded or built", () => {
    runTilingJob(options(0), recordingLogger());

    const logger = recordingLogger();
    const result = runTilingJob(options(1, true), logger);
    const svg0 = path.join(dir, svgFileName(0));
    const svg1 = path.join(dir, svgFileName(1));

    expect(result.files).toEqual([svg0, path.join(dir, snapshotFileName(1)), svg1]);
    expect(logger.lines).toContain(`Drew ${svg0}`);
    expect(logger.lines).toContain(`Drew ${svg1}`);
    expect(fs.readFileSync(svg1, "utf-8")).toContain('width="16" height="16"');
  });
});
