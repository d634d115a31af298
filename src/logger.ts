export type LogLevel = "debug" | "info" | "warn" | "error";

let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

export function log(level: LogLevel, message: string): void {
  if (level === "debug" && !verbose) return;
  if (level === "info") {
    console.log(message);
  } else if (level === "debug") {
    console.error(`[debug] ${message}`);
  } else {
    console.error(message);
  }
}
