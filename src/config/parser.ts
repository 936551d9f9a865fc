import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import type { Command, LineSpacing, ParseResult, ShlokaOptions } from "../types.js";
import {
  DEFAULT_LANGUAGE_RULES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MODEL,
  DEFAULT_OLLAMA_URL,
  OUTPUT_PREFIX,
} from "./constants.js";
import { loadStyleFile, resolveStyle, type StyleFile, type StyleOverrides } from "./style.js";
import { ConfigError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";

export const USAGE = `Usage:
  manuscript-desk process <input.docx> [-o output.docx] [--persona text] [--summary text]
                  [--language-rules text] [--no-glossary] [--consistency]
                  [--style style.json] [--font-family name] [--font-size pt]
                  [--line-spacing ratio | --line-spacing-points pt]
                  [--shloka-line-breaks] [--shloka-center] [--shloka-numbering]
                  [--translation-style text]
  manuscript-desk analyze <input.docx>
  manuscript-desk languages <input.docx>
  manuscript-desk edit --snippet <text> --instruction <text>

Common options: --model name, --ollama-url url, --max-retries n, --debug`;

function parsePositiveInt(value: string, defaultValue: number): number {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function parsePositiveNumber(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`--${flag} expects a positive number, got "${value}"`);
  }
  return parsed;
}

export function defaultOutputPath(input: string): string {
  return path.join(path.dirname(input), `${OUTPUT_PREFIX}${path.basename(input)}`);
}

function parseArguments(args: string[], env: NodeJS.ProcessEnv) {
  try {
    return parseArgs({
      args,
      options: {
        model: { type: "string", default: env["OLLAMA_MODEL"] ?? DEFAULT_MODEL },
        "ollama-url": { type: "string", default: env["OLLAMA_URL"] ?? DEFAULT_OLLAMA_URL },
        "max-retries": { type: "string", default: env["MAX_RETRIES"] ?? String(DEFAULT_MAX_RETRIES) },
        debug: {
          type: "boolean",
          default: env["DEBUG"] === "1" || env["DEBUG"] === "true",
        },
        output: { type: "string", short: "o" },
        persona: { type: "string", default: "" },
        summary: { type: "string", default: "" },
        "language-rules": { type: "string", default: DEFAULT_LANGUAGE_RULES },
        "no-glossary": { type: "boolean", default: false },
        consistency: { type: "boolean", default: false },
        style: { type: "string" },
        "font-family": { type: "string" },
        "font-size": { type: "string" },
        "line-spacing": { type: "string" },
        "line-spacing-points": { type: "string" },
        "shloka-line-breaks": { type: "boolean" },
        "shloka-center": { type: "boolean" },
        "shloka-numbering": { type: "boolean" },
        "translation-style": { type: "string" },
        snippet: { type: "string" },
        instruction: { type: "string" },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }
}

type ParsedValues = ReturnType<typeof parseArguments>["values"];

function styleOverridesOf(values: ParsedValues): StyleOverrides {
  const overrides: StyleOverrides = {};
  const fontFamily = values["font-family"]?.trim();
  if (fontFamily) overrides.fontFamily = fontFamily;
  if (values["font-size"] !== undefined) {
    overrides.fontSize = parsePositiveNumber(values["font-size"], "font-size");
  }

  const ratio = values["line-spacing"];
  const points = values["line-spacing-points"];
  if (ratio !== undefined && points !== undefined) {
    throw new ConfigError("Use either --line-spacing or --line-spacing-points, not both");
  }
  let lineSpacing: LineSpacing | undefined;
  if (ratio !== undefined) {
    lineSpacing = { kind: "ratio", value: parsePositiveNumber(ratio, "line-spacing") };
  } else if (points !== undefined) {
    lineSpacing = { kind: "points", value: parsePositiveNumber(points, "line-spacing-points") };
  }
  if (lineSpacing) overrides.lineSpacing = lineSpacing;

  const shloka: Partial<ShlokaOptions> = {};
  if (values["shloka-line-breaks"] !== undefined) shloka.lineBreaks = values["shloka-line-breaks"];
  if (values["shloka-center"] !== undefined) shloka.centerAlign = values["shloka-center"];
  if (values["shloka-numbering"] !== undefined) shloka.addNumbering = values["shloka-numbering"];
  if (values["translation-style"] !== undefined) shloka.translationStyle = values["translation-style"];
  if (Object.keys(shloka).length > 0) overrides.shloka = shloka;

  return overrides;
}

function requireInput(command: string, positionals: string[]): string {
  const input = positionals[1];
  if (!input) {
    throw new ConfigError(`"${command}" needs an input .docx path`);
  }
  if (positionals.length > 2) {
    throw new ConfigError(`Unexpected arguments: ${positionals.slice(2).join(" ")}`);
  }
  return input;
}

function buildCommand(values: ParsedValues, positionals: string[]): Command {
  const name = positionals[0];
  switch (name) {
    case "process": {
      const input = requireInput(name, positionals);
      const styleFile: StyleFile = values.style ? loadStyleFile(values.style) : {};
      return {
        kind: "process",
        input,
        output: values.output ?? defaultOutputPath(input),
        brief: {
          authorPersona: values.persona?.trim() ?? "",
          bookSummary: values.summary?.trim() ?? "",
          languageRules: values["language-rules"]?.trim() ?? DEFAULT_LANGUAGE_RULES,
        },
        style: resolveStyle(styleFile, styleOverridesOf(values)),
        glossary: values["no-glossary"] !== true,
        consistency: values.consistency ?? false,
      };
    }
    case "analyze":
      return { kind: "analyze", input: requireInput(name, positionals) };
    case "languages":
      return { kind: "languages", input: requireInput(name, positionals) };
    case "edit": {
      const snippet = values.snippet;
      const instruction = values.instruction?.trim();
      if (!snippet?.trim() || !instruction) {
        throw new ConfigError('"edit" needs --snippet and --instruction');
      }
      return { kind: "edit", snippet, instruction };
    }
    case undefined:
      throw new ConfigError("Missing command");
    default:
      throw new ConfigError(`Unknown command "${name}"`);
  }
}

export function parseConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ParseResult {
  const { values, positionals } = parseArguments(args, env);

  return {
    config: {
      model: values.model ?? DEFAULT_MODEL,
      ollamaUrl: (values["ollama-url"] ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, ""),
      maxRetries: parsePositiveInt(values["max-retries"] ?? "", DEFAULT_MAX_RETRIES),
      debug: values.debug ?? false,
    },
    command: buildCommand(values, positionals),
  };
}
