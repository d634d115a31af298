import yaml from "js-yaml";
import { isRecord, readText } from "./util.js";

type GeneratorRules = {
  matrix_sizing?: boolean;
  outdir?: string;
};

type PluginRules = {
  version?: string;
  publisher?: string;
  documentation?: string;
};

export type Rules = {
  generator: Required<GeneratorRules>;
  plugin: Required<PluginRules>;
};

export const defaultRules: Rules = {
  generator: {
    matrix_sizing: false,
    outdir: ".",
  },
  plugin: {
    version: "1.1.6",
    publisher: "qmk-srgb-gen",
    documentation: "qmk/srgbmods-qmk-firmware",
  },
};

function asBool(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

function asText(v: unknown): string | undefined {
  if (typeof v === "string" && v.trim().length > 0) return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

function section(raw: unknown, key: string): Record<string, unknown> {
  if (!isRecord(raw)) return {};
  const v = raw[key];
  return isRecord(v) ? v : {};
}

export function mergeRules(raw: unknown): Rules {
  const gen = section(raw, "generator");
  const plugin = section(raw, "plugin");
  return {
    generator: {
      matrix_sizing: asBool(gen.matrix_sizing) ?? defaultRules.generator.matrix_sizing,
      outdir: asText(gen.outdir) ?? defaultRules.generator.outdir,
    },
    plugin: {
      version: asText(plugin.version) ?? defaultRules.plugin.version,
      publisher: asText(plugin.publisher) ?? defaultRules.plugin.publisher,
      documentation: asText(plugin.documentation) ?? defaultRules.plugin.documentation,
    },
  };
}

export function loadRules(path?: string): Rules {
  if (!path) return mergeRules(undefined);
  return mergeRules(yaml.load(readText(path)));
}
