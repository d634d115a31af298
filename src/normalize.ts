import fs from "fs";
import { pathToFileURL } from "url";
import { buildAxisSets } from "./axis.js";
import { parseInfoJson } from "./info_parse.js";
import { resolveLedName } from "./label.js";
import { createMapperState, mapLedPosition } from "./led_map.js";
import type { GeneratedTables, GridPos, KeyboardInfo } from "./util.js";

export type NormalizeOptions = {
  matrixSizing?: boolean;
};

/**
 * Builds the grid size and the three per-LED tables for one keyboard. State
 * (fallback counter, row/column memos) lives only for this call.
 */
export function normalizeKeyboard(info: KeyboardInfo, opts: NormalizeOptions = {}): GeneratedTables {
  const matrixSizing = opts.matrixSizing ?? false;
  const axes = buildAxisSets(info.leds, matrixSizing);
  const state = createMapperState();
  const mapOpts = { matrixSizing, hasKeyMetadata: info.keys !== undefined };
  const ledNames: string[] = [];
  const ledPositions: GridPos[] = [];
  for (const led of info.leds) {
    ledPositions.push(mapLedPosition(led, axes, mapOpts, state));
    ledNames.push(resolveLedName(led, info.keys, state));
  }
  return {
    width: axes.xs.length,
    height: axes.ys.length,
    ledIndices: info.leds.map((_, i) => i),
    ledNames,
    ledPositions,
  };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const matrixSizing = process.argv.includes("--matrix_sizing");
  const tables = normalizeKeyboard(parseInfoJson(fs.readFileSync(input, "utf8")), { matrixSizing });
  process.stdout.write(JSON.stringify(tables, null, 2));
  console.error(`normalize: leds=${tables.ledIndices.length} size=${tables.width}x${tables.height}`);
}
