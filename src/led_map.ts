import { type AxisSets, rankOf, selectX, selectY } from "./axis.js";
import type { GridPos, LayoutEntry } from "./util.js";

/**
 * Per-file state threaded through mapping and naming. Create one per input
 * file with {@link createMapperState}; nothing is shared between files.
 */
export type MapperState = {
  unnamed: number;
  rowY: Map<number, number>;
  colX: Map<number, number>;
};

export function createMapperState(): MapperState {
  return { unnamed: 0, rowY: new Map(), colX: new Map() };
}

function setDefault<K, V>(memo: Map<K, V>, key: K, value: V): V {
  const existing = memo.get(key);
  if (existing !== undefined) return existing;
  memo.set(key, value);
  return value;
}

export type MapOptions = {
  matrixSizing: boolean;
  hasKeyMetadata: boolean;
};

/**
 * Grid position of one LED. In collapsing mode the first LED seen on a matrix
 * row fixes gridY for that row, and the first LED on a matrix column fixes gridX.
 */
export function mapLedPosition(led: LayoutEntry, axes: AxisSets, opts: MapOptions, state: MapperState): GridPos {
  const gridX = rankOf(axes.xs, selectX(led, opts.matrixSizing), "x");
  const gridY = rankOf(axes.ys, selectY(led, opts.matrixSizing), "y");
  if (!opts.matrixSizing || !opts.hasKeyMetadata || !led.hasMatrix) return [gridX, gridY];
  const [row, col] = led.matrix;
  return [setDefault(state.colX, col, gridX), setDefault(state.rowY, row, gridY)];
}
