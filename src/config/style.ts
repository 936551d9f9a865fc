import fs from "node:fs";
import { z } from "zod";
import type { LineSpacing, ShlokaOptions, StyleConfig } from "../types.js";
import { DEFAULT_SHLOKA, DEFAULT_STYLE } from "./constants.js";
import { ConfigError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";

const positive = z.number().positive();
const inches = z.number().nonnegative();

const HeadingSchema = z.object({ size: positive, bold: z.boolean() }).partial().strict();

/**
 * Shape of a `--style` file. Every key is optional and merged over the
 * defaults; `lineSpacing` is either a ratio or `{ "points": n }`.
 */
export const StyleFileSchema = z
  .object({
    fontFamily: z.string().trim().min(1),
    fontSize: positive,
    lineSpacing: z.union([positive, z.object({ points: positive }).strict()]),
    margins: z
      .object({ top: inches, bottom: inches, left: inches, right: inches })
      .partial()
      .strict(),
    heading1: HeadingSchema,
    heading2: HeadingSchema,
    shloka: z
      .object({
        lineBreaks: z.boolean(),
        addNumbering: z.boolean(),
        translationStyle: z.string(),
        centerAlign: z.boolean(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type StyleFile = z.infer<typeof StyleFileSchema>;

/** Command-line values; only the keys the user actually gave are set. */
export interface StyleOverrides {
  fontFamily?: string;
  fontSize?: number;
  lineSpacing?: LineSpacing;
  shloka?: Partial<ShlokaOptions>;
}

export function decodeStyleFile(value: unknown, source = "style file"): StyleFile {
  const parsed = StyleFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigError(`Invalid ${source}${where}: ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data;
}

export function loadStyleFile(filePath: string): StyleFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read style file ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Style file ${filePath} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }
  return decodeStyleFile(json, `style file ${filePath}`);
}

function lineSpacingFromFile(value: StyleFile["lineSpacing"]): LineSpacing | undefined {
  if (value === undefined) return undefined;
  return typeof value === "number"
    ? { kind: "ratio", value }
    : { kind: "points", value: value.points };
}

/**
 * Defaults, then the style file, then command-line overrides. The result is
 * frozen; `shloka` is only set when the file or the flags mention it.
 */
export function resolveStyle(file: StyleFile = {}, overrides: StyleOverrides = {}): StyleConfig {
  const wantsShloka = file.shloka !== undefined || overrides.shloka !== undefined;
  const shloka: ShlokaOptions | undefined = wantsShloka
    ? Object.freeze({ ...DEFAULT_SHLOKA, ...file.shloka, ...overrides.shloka })
    : undefined;

  return Object.freeze({
    fontFamily: overrides.fontFamily ?? file.fontFamily ?? DEFAULT_STYLE.fontFamily,
    fontSize: overrides.fontSize ?? file.fontSize ?? DEFAULT_STYLE.fontSize,
    lineSpacing: Object.freeze(
      overrides.lineSpacing ?? lineSpacingFromFile(file.lineSpacing) ?? DEFAULT_STYLE.lineSpacing
    ),
    margins: Object.freeze({ ...DEFAULT_STYLE.margins, ...file.margins }),
    heading1: Object.freeze({ ...DEFAULT_STYLE.heading1, ...file.heading1 }),
    heading2: Object.freeze({ ...DEFAULT_STYLE.heading2, ...file.heading2 }),
    shloka,
  });
}
