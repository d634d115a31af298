import { describe, expect, it } from "vitest";
import { parseInfoJson } from "../info_parse.js";
import { normalizeKeyboard } from "../normalize.js";
import {
  fillTemplate,
  formatIndices,
  formatNames,
  formatPositions,
  loadTemplate,
  pluginFileName,
  pluginOutputPath,
  renderPlugin,
} from "../render_plugin.js";
import { defaultRules } from "../rules.js";
import { readText } from "../util.js";
import { fixturePath } from "./helpers.js";

describe("pluginFileName", () => {
  it("keeps letters, digits and spaces, then snake-cases", () => {
    expect(pluginFileName("Acme Co. Board-65")).toBe("acme_co_board65.js");
  });

  it("keeps non-ASCII letters", () => {
    expect(pluginFileName("Käse Tastatur")).toBe("käse_tastatur.js");
  });
});

describe("table formatting", () => {
  it("formats each table as a comma list", () => {
    expect(formatIndices([0, 1, 2])).toBe("0, 1, 2");
    expect(formatNames(["Esc", '\\"'])).toBe('"Esc", "\\""');
    expect(formatPositions([[0, 0], [1, 2]])).toBe("[0, 0], [1, 2]");
  });
});

describe("fillTemplate", () => {
  it("substitutes in one pass and keeps unknown placeholders", () => {
    expect(fillTemplate("a $X$ $Y$ ${z}", { X: "$Y$" })).toBe("a $Y$ $Y$ ${z}");
  });
});

describe("renderPlugin", () => {
  const info = parseInfoJson(readText(fixturePath("board4.json")));
  const out = renderPlugin(loadTemplate(), info, normalizeKeyboard(info), defaultRules.plugin);
  const lines = out.split("\n");

  it("fills device identity and size", () => {
    expect(lines[0]).toBe('export function Name() { return "Acme Board-4 QMK Keyboard"; }');
    expect(lines[1]).toBe('export function Version() { return "1.1.6"; }');
    expect(lines[2]).toBe("export function VendorId() { return 0xFEED; }");
    expect(lines[3]).toBe("export function ProductId() { return 0x0004; }");
    expect(lines[4]).toBe('export function Publisher() { return "qmk-srgb-gen"; }');
    expect(lines[6]).toBe("export function Size() { return [3, 3]; }");
  });

  it("fills the three LED tables", () => {
    expect(out).toContain("const vKeys = [\n    0, 1, 2, 3, 4\n];");
    expect(out).toContain('const vKeyNames = [\n   "Esc", "\\"", "EURO SIGN", "Light 1", "Light 2"\n];');
    expect(out).toContain("const vKeyPositions = [\n    [0, 0], [1, 0], [0, 2], [1, 2], [2, 1]\n];");
  });

  it("leaves the template's own template literals alone", () => {
    expect(out).toContain("device.log(`SignalRGB Protocol Version: ${SignalRGBProtocolVersion}`);");
  });

  it("escapes quotes in the keyboard name", () => {
    const quoted = { ...info, keyboardName: 'Pad "Pro"' };
    const text = renderPlugin("$KNAME$", quoted, normalizeKeyboard(quoted), defaultRules.plugin);
    expect(text).toBe('Acme Pad \\"Pro\\"');
  });
});

describe("pluginOutputPath", () => {
  it("joins the output directory and file name", () => {
    const info = parseInfoJson(readText(fixturePath("board4.json")));
    expect(pluginOutputPath("out", info)).toBe("out/acme_board4.js");
  });
});
