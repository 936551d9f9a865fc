import process from "node:process";
import { COLOR_CODES } from "../config/constants.js";
import { colorize } from "./logger.js";

export function blankLine(debugMode: boolean): void {
  if (debugMode) {
    process.stdout.write("\n");
  }
}

export function heading(label: string): string {
  const line = "─".repeat(10);
  return colorize(`${line} ${label} ${line}`, COLOR_CODES.toHuman);
}

/** Command results go to stdout so they can be piped; everything else is logging. */
export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, undefined, 2)}\n`);
}

export function printLines(label: string, lines: readonly string[]): void {
  process.stdout.write(`${heading(label)}\n`);
  if (lines.length === 0) {
    process.stdout.write("(none)\n");
    return;
  }
  for (const line of lines) {
    process.stdout.write(`- ${line}\n`);
  }
}
