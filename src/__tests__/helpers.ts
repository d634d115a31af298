import { fileURLToPath } from "url";
import type { KeyMetadata, LayoutEntry } from "../util.js";

export const fixturePath = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

export function led(x: number, y: number, matrix?: [number, number]): LayoutEntry {
  return matrix ? { x, y, hasMatrix: true, matrix } : { x, y, hasMatrix: false };
}

export function key(row: number, col: number, label?: string): KeyMetadata {
  return label === undefined ? { matrix: [row, col] } : { matrix: [row, col], label };
}
