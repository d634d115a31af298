#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { globSync } from "glob";
import minimist from "minimist";
import { parseInfoJson } from "./info_parse.js";
import { log, setVerbose } from "./logger.js";
import { normalizeKeyboard } from "./normalize.js";
import { loadTemplate, pluginOutputPath, renderPlugin } from "./render_plugin.js";
import { loadRules, type Rules } from "./rules.js";
import { errorMessage, readText, writeText } from "./util.js";

const USAGE =
  "Usage: qmk-srgb-gen <info.json globs...> [--outdir DIR] [--matrix_sizing] [--config rules.yaml] [--verbose]";

export type RunOptions = {
  inputs: string[];
  rules: Rules;
  template: string;
};

export type RunSummary = {
  written: string[];
  skipped: string[];
};

export function expandInputs(patterns: string[]): string[] {
  const files = new Set<string>();
  for (const pattern of patterns) {
    for (const file of globSync(pattern, { nodir: true })) files.add(file);
  }
  return Array.from(files).sort();
}

export function generateOne(file: string, rules: Rules, template: string): string {
  const info = parseInfoJson(readText(file));
  const tables = normalizeKeyboard(info, { matrixSizing: rules.generator.matrix_sizing });
  log("debug", `${file}: leds=${tables.ledIndices.length} size=${tables.width}x${tables.height}`);
  const out = pluginOutputPath(rules.generator.outdir, info);
  writeText(out, renderPlugin(template, info, tables, rules.plugin));
  return out;
}

export function run(opts: RunOptions): RunSummary {
  const summary: RunSummary = { written: [], skipped: [] };
  for (const file of expandInputs(opts.inputs)) {
    try {
      const out = generateOne(file, opts.rules, opts.template);
      summary.written.push(out);
      log("info", `Successfully created ${out}`);
    } catch (e) {
      summary.skipped.push(file);
      log("warn", `Skipping ${file} due to exception: ${errorMessage(e)}`);
    }
  }
  return summary;
}

export function main(argv: string[]): number {
  const args = minimist(argv, {
    string: ["outdir", "config"],
    boolean: ["matrix_sizing", "verbose", "help"],
    alias: { h: "help", o: "outdir", c: "config" },
  });
  if (args.help || args._.length === 0) {
    log(args.help ? "info" : "error", USAGE);
    return args.help ? 0 : 2;
  }
  setVerbose(args.verbose === true);

  const rules = loadRules(typeof args.config === "string" && args.config ? args.config : undefined);
  if (typeof args.outdir === "string" && args.outdir) rules.generator.outdir = args.outdir;
  if (args.matrix_sizing === true) rules.generator.matrix_sizing = true;
  fs.mkdirSync(rules.generator.outdir, { recursive: true });

  const summary = run({ inputs: args._.map(String), rules, template: loadTemplate() });
  if (summary.written.length === 0 && summary.skipped.length === 0) {
    log("warn", "No input files matched");
    return 1;
  }
  return summary.skipped.length > 0 ? 1 : 0;
}

// Resolve the npm bin symlink before comparing.
const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (e) {
    log("error", errorMessage(e));
    process.exitCode = 1;
  }
}
