import path from "path";
import { fileURLToPath } from "url";
import { escapeQuoted } from "./label.js";
import type { Rules } from "./rules.js";
import { type GeneratedTables, type KeyboardInfo, readText } from "./util.js";

export const defaultTemplatePath = fileURLToPath(new URL("../templates/qmk_plugin.js.tmpl", import.meta.url));

export function loadTemplate(file = defaultTemplatePath): string {
  return readText(file);
}

export function keyboardDisplayName(info: KeyboardInfo): string {
  return `${info.manufacturer} ${info.keyboardName}`;
}

/** "Acme Co. Board-65" -> "acme_co_board65.js" */
export function pluginFileName(displayName: string): string {
  const kept = Array.from(displayName)
    .filter((ch) => ch === " " || /[\p{L}\p{N}]/u.test(ch))
    .join("");
  return `${kept.toLowerCase().replace(/ /g, "_")}.js`;
}

export function formatIndices(indices: number[]): string {
  return indices.join(", ");
}

export function formatNames(names: string[]): string {
  return names.map((n) => `"${n}"`).join(", ");
}

export function formatPositions(positions: GeneratedTables["ledPositions"]): string {
  return positions.map(([x, y]) => `[${x}, ${y}]`).join(", ");
}

export function placeholderValues(
  info: KeyboardInfo,
  tables: GeneratedTables,
  plugin: Rules["plugin"],
): Record<string, string> {
  return {
    KNAME: escapeQuoted(keyboardDisplayName(info)),
    VID: info.vid,
    PID: info.pid,
    NX: String(tables.width),
    NY: String(tables.height),
    VK: formatIndices(tables.ledIndices),
    VKNAMES: formatNames(tables.ledNames),
    VKPOS: formatPositions(tables.ledPositions),
    VERSION: escapeQuoted(plugin.version),
    PUBLISHER: escapeQuoted(plugin.publisher),
    DOCUMENTATION: escapeQuoted(plugin.documentation),
  };
}

// Single pass: substituted text is never scanned for placeholders again.
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\$([A-Z]+)\$/g, (whole: string, key: string) => values[key] ?? whole);
}

export function renderPlugin(
  template: string,
  info: KeyboardInfo,
  tables: GeneratedTables,
  plugin: Rules["plugin"],
): string {
  return fillTemplate(template, placeholderValues(info, tables, plugin));
}

export function pluginOutputPath(outdir: string, info: KeyboardInfo): string {
  return path.join(outdir, pluginFileName(keyboardDisplayName(info)));
}
