import { describe, expect, it } from "vitest";
import { escapeQuoted, findKey, nextFallbackName, resolveLedName, sanitizeLabel } from "../label.js";
import { createMapperState } from "../led_map.js";
import { key, led } from "./helpers.js";

describe("findKey", () => {
  const keys = [key(0, 1, "A"), { label: "no matrix" }, key(1, 0, "B")];

  it("matches the exact row and column pair", () => {
    expect(findKey(keys, [1, 0])?.label).toBe("B");
  });

  it("does not match swapped coordinates", () => {
    expect(findKey(keys, [1, 1])).toBeUndefined();
    expect(findKey([key(0, 1, "A")], [1, 0])).toBeUndefined();
  });
});

describe("sanitizeLabel", () => {
  it("keeps plain ASCII labels", () => {
    expect(sanitizeLabel("Esc")).toBe("Esc");
  });

  it("escapes backslashes before quotes", () => {
    expect(sanitizeLabel("\\")).toBe("\\\\");
    expect(sanitizeLabel('"')).toBe('\\"');
    expect(sanitizeLabel('\\"')).toBe('\\\\\\"');
  });

  it("replaces a non-ASCII label with its character name", () => {
    expect(sanitizeLabel("€")).toBe("EURO SIGN");
  });

  it("uses code points for private-use and lone surrogate labels", () => {
    expect(sanitizeLabel("\uF8FF")).toBe("U+F8FF");
    expect(sanitizeLabel("\udc00")).toBe("U+DC00");
  });

  // Known quirk: one non-ASCII character renames the whole label, ASCII included.
  it("renames mixed labels as a whole", () => {
    expect(sanitizeLabel("Fn €")).toBe("LATIN CAPITAL LETTER F LATIN SMALL LETTER N SPACE EURO SIGN");
  });
});

describe("escapeQuoted", () => {
  it("leaves single quotes alone", () => {
    expect(escapeQuoted("it's")).toBe("it's");
  });
});

describe("resolveLedName", () => {
  const keys = [key(0, 0, "Esc"), key(0, 1, ""), key(0, 2)];

  it("uses the matching key label", () => {
    const state = createMapperState();
    expect(resolveLedName(led(0, 0, [0, 0]), keys, state)).toBe("Esc");
    expect(state.unnamed).toBe(0);
  });

  it("falls back for empty, missing and unmatched labels", () => {
    const state = createMapperState();
    const names = [
      resolveLedName(led(0, 0, [0, 1]), keys, state),
      resolveLedName(led(0, 0, [0, 2]), keys, state),
      resolveLedName(led(0, 0, [5, 5]), keys, state),
      resolveLedName(led(0, 0), keys, state),
      resolveLedName(led(0, 0, [0, 0]), undefined, state),
    ];
    expect(names).toEqual(["Light 1", "Light 2", "Light 3", "Light 4", "Light 5"]);
  });

  it("numbers fallbacks per state", () => {
    const a = createMapperState();
    const b = createMapperState();
    expect(nextFallbackName(a)).toBe("Light 1");
    expect(nextFallbackName(a)).toBe("Light 2");
    expect(nextFallbackName(b)).toBe("Light 1");
  });
});
