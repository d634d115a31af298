import type { MapperState } from "./led_map.js";
import { unicodeName } from "./unicode_name.js";
import type { KeyMetadata, LayoutEntry, MatrixCoord } from "./util.js";

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

function sameMatrix(a: MatrixCoord, b: MatrixCoord): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function findKey(keys: KeyMetadata[], matrix: MatrixCoord): KeyMetadata | undefined {
  return keys.find((k) => k.matrix !== undefined && sameMatrix(k.matrix, matrix));
}

/** Escapes a value for a double-quoted string literal in the plugin script. */
export function escapeQuoted(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * A label with any character outside printable ASCII is replaced as a whole by
 * the Unicode names of its characters, so "Fn é" loses its ASCII text too.
 */
export function sanitizeLabel(label: string): string {
  const text = PRINTABLE_ASCII.test(label) ? label : unicodeName(label);
  return escapeQuoted(text);
}

export function nextFallbackName(state: MapperState): string {
  state.unnamed += 1;
  return `Light ${state.unnamed}`;
}

export function resolveLedName(led: LayoutEntry, keys: KeyMetadata[] | undefined, state: MapperState): string {
  if (keys && led.hasMatrix) {
    const label = findKey(keys, led.matrix)?.label;
    if (label) return sanitizeLabel(label);
  }
  return nextFallbackName(state);
}
