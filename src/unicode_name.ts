import names from "@unicode/unicode-15.1.0/Names/index.js";

const HANGUL_BASE = 0xac00;
const HANGUL_COUNT = 11172;
const JAMO_L = ["G", "GG", "N", "D", "DD", "R", "M", "B", "BB", "S", "SS", "", "J", "JJ", "C", "K", "T", "P", "H"];
const JAMO_V = [
  "A", "AE", "YA", "YAE", "EO", "E", "YEO", "YE", "O", "WA", "WAE",
  "OE", "YO", "U", "WEO", "WE", "WI", "YU", "EU", "YI", "I",
];
const JAMO_T = [
  "", "G", "GG", "GS", "N", "NJ", "NH", "D", "L", "LG", "LM", "LB", "LS", "LT",
  "LP", "LH", "M", "B", "BS", "S", "SS", "NG", "J", "C", "K", "T", "P", "H",
];

// Ideograph blocks whose names are derived from the code point.
const CJK_RANGES: Array<[number, number]> = [
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b739],
  [0x2b740, 0x2b81d],
  [0x2b820, 0x2cea1],
  [0x2ceb0, 0x2ebe0],
  [0x2ebf0, 0x2ee5d],
  [0x30000, 0x3134a],
  [0x31350, 0x323af],
];

const TANGUT_RANGES: Array<[number, number]> = [
  [0x17000, 0x187f7],
  [0x18d00, 0x18d08],
];

function inRanges(ranges: Array<[number, number]>, cp: number): boolean {
  return ranges.some(([lo, hi]) => cp >= lo && cp <= hi);
}

function hex(cp: number): string {
  return cp.toString(16).toUpperCase().padStart(4, "0");
}

function derivedName(cp: number): string | undefined {
  if (inRanges(CJK_RANGES, cp)) return `CJK UNIFIED IDEOGRAPH-${hex(cp)}`;
  if (inRanges(TANGUT_RANGES, cp)) return `TANGUT IDEOGRAPH-${hex(cp)}`;
  const s = cp - HANGUL_BASE;
  if (s >= 0 && s < HANGUL_COUNT) {
    const l = Math.floor(s / 588);
    const v = Math.floor((s % 588) / 28);
    const t = s % 28;
    return `HANGUL SYLLABLE ${JAMO_L[l]}${JAMO_V[v]}${JAMO_T[t]}`;
  }
  return undefined;
}

function tableName(cp: number): string | undefined {
  const name = names.get(cp);
  // "<control>" markers and block labels such as "Private Use" are not character names.
  if (!name || name.startsWith("<") || /[a-z]/.test(name)) return undefined;
  return name;
}

/** Unicode character name of a single code point, or `U+XXXX` when it has none. */
export function codePointName(cp: number): string {
  return derivedName(cp) ?? tableName(cp) ?? `U+${hex(cp)}`;
}

export function unicodeName(text: string): string {
  return Array.from(text, (ch) => codePointName(ch.codePointAt(0) ?? 0)).join(" ");
}
