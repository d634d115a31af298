import fs from "fs";

export type MatrixCoord = readonly [row: number, col: number];

export type LayoutEntry =
  | { x: number; y: number; hasMatrix: true; matrix: MatrixCoord }
  | { x: number; y: number; hasMatrix: false };

export type KeyMetadata = {
  matrix?: MatrixCoord;
  label?: string;
};

export type KeyboardInfo = {
  manufacturer: string;
  keyboardName: string;
  vid: string;
  pid: string;
  leds: LayoutEntry[];
  keys?: KeyMetadata[];
};

export type GridPos = readonly [x: number, y: number];

export type GeneratedTables = {
  width: number;
  height: number;
  ledIndices: number[];
  ledNames: string[];
  ledPositions: GridPos[];
};

export class InfoFormatError extends Error {
  constructor(
    readonly path: string,
    detail: string,
  ) {
    super(`${path}: ${detail}`);
    this.name = "InfoFormatError";
  }
}

export class AxisLookupError extends Error {
  constructor(
    readonly axis: "x" | "y",
    readonly value: number,
  ) {
    super(`coordinate ${value} missing from ${axis} axis set`);
    this.name = "AxisLookupError";
  }
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
