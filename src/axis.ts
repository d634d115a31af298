import { AxisLookupError, type LayoutEntry } from "./util.js";

export type AxisSets = {
  xs: number[];
  ys: number[];
};

/** Matrix column/row stand in for x/y when matrix sizing is on and the LED has a matrix position. */
export function selectX(led: LayoutEntry, matrixSizing: boolean): number {
  return matrixSizing && led.hasMatrix ? led.matrix[1] : led.x;
}

export function selectY(led: LayoutEntry, matrixSizing: boolean): number {
  return matrixSizing && led.hasMatrix ? led.matrix[0] : led.y;
}

function distinctSorted(values: number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

export function buildAxisSets(leds: LayoutEntry[], matrixSizing: boolean): AxisSets {
  return {
    xs: distinctSorted(leds.map((led) => selectX(led, matrixSizing))),
    ys: distinctSorted(leds.map((led) => selectY(led, matrixSizing))),
  };
}

export function rankOf(axis: number[], value: number, name: "x" | "y"): number {
  const idx = axis.indexOf(value);
  if (idx < 0) throw new AxisLookupError(name, value);
  return idx;
}
