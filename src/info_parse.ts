import JSON5 from "json5";
import { InfoFormatError, type KeyboardInfo, type KeyMetadata, type LayoutEntry, type MatrixCoord, isRecord } from "./util.js";

function field(obj: Record<string, unknown>, key: string, path: string): unknown {
  if (!(key in obj)) throw new InfoFormatError(path ? `${path}.${key}` : key, "missing");
  return obj[key];
}

function asRecord(v: unknown, path: string): Record<string, unknown> {
  if (!isRecord(v)) throw new InfoFormatError(path, "expected an object");
  return v;
}

function asString(v: unknown, path: string): string {
  if (typeof v !== "string") throw new InfoFormatError(path, "expected a string");
  return v;
}

function asFiniteNumber(v: unknown, path: string): number {
  if (typeof v !== "number" || !Number.isFinite(v)) throw new InfoFormatError(path, "expected a number");
  return v;
}

function asList(v: unknown, path: string): unknown[] {
  if (!Array.isArray(v)) throw new InfoFormatError(path, "expected an array");
  return v;
}

function readMatrix(v: unknown): MatrixCoord | undefined {
  if (!Array.isArray(v) || v.length !== 2) return undefined;
  const [row, col] = v;
  if (!Number.isInteger(row) || !Number.isInteger(col)) return undefined;
  return [Number(row), Number(col)];
}

function parseLed(raw: unknown, path: string): LayoutEntry {
  const led = asRecord(raw, path);
  const x = asFiniteNumber(field(led, "x", path), `${path}.x`);
  const y = asFiniteNumber(field(led, "y", path), `${path}.y`);
  if (!("matrix" in led)) return { x, y, hasMatrix: false };
  const matrix = readMatrix(led.matrix);
  if (!matrix) throw new InfoFormatError(`${path}.matrix`, "expected [row, col] integers");
  return { x, y, hasMatrix: true, matrix };
}

function parseKey(raw: unknown): KeyMetadata {
  if (!isRecord(raw)) return {};
  const key: KeyMetadata = {};
  const matrix = readMatrix(raw.matrix);
  if (matrix) key.matrix = matrix;
  if (typeof raw.label === "string") key.label = raw.label;
  return key;
}

// Only the first declared layout carries labels.
function parseKeys(layouts: unknown): KeyMetadata[] | undefined {
  const first = Object.values(asRecord(layouts, "layouts"))[0];
  if (first === undefined) return undefined;
  const layout = field(asRecord(first, "layouts[0]"), "layout", "layouts[0]");
  return asList(layout, "layouts[0].layout").map(parseKey);
}

export function parseKeyboardInfo(doc: unknown): KeyboardInfo {
  const root = asRecord(doc, "$");
  const usb = asRecord(field(root, "usb", ""), "usb");
  const rgbMatrix = asRecord(field(root, "rgb_matrix", ""), "rgb_matrix");
  const layout = asList(field(rgbMatrix, "layout", "rgb_matrix"), "rgb_matrix.layout");
  const info: KeyboardInfo = {
    manufacturer: asString(field(root, "manufacturer", ""), "manufacturer"),
    keyboardName: asString(field(root, "keyboard_name", ""), "keyboard_name"),
    vid: asString(field(usb, "vid", "usb"), "usb.vid"),
    pid: asString(field(usb, "pid", "usb"), "usb.pid"),
    leds: layout.map((led, i) => parseLed(led, `rgb_matrix.layout[${i}]`)),
  };
  if ("layouts" in root) {
    const keys = parseKeys(root.layouts);
    if (keys) info.keys = keys;
  }
  return info;
}

export function parseInfoJson(text: string): KeyboardInfo {
  return parseKeyboardInfo(JSON5.parse(text));
}
