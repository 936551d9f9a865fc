import type { ShlokaOptions, StyleConfig } from "../types.js";

export const DEFAULT_MODEL = "llama3.1:8b-instruct-q4_K_M";
export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_MAX_RETRIES = 1;
export const OUTPUT_PREFIX = "edited_";

export const DEFAULT_STYLE: StyleConfig = {
  fontFamily: "Times New Roman",
  fontSize: 12,
  lineSpacing: { kind: "ratio", value: 1.5 },
  margins: { top: 1, bottom: 1, left: 1, right: 1 },
  heading1: { size: 16, bold: true },
  heading2: { size: 14, bold: true },
};

export const DEFAULT_SHLOKA: ShlokaOptions = {
  lineBreaks: false,
  addNumbering: false,
  translationStyle: "",
  centerAlign: false,
};

export const DEFAULT_LANGUAGE_RULES = "Italicize all Sanskrit words.";

// Characters of manuscript sent to the language detector.
export const LANGUAGE_SAMPLE_LIMIT = 2000;

export const LOG_TEXT_LIMIT = 400;

export const DIAGNOSTIC_GLOSSARY_TERM = "Error";

export const GLOSSARY_HEADING = "Glossary";
export const GLOSSARY_COLUMNS = [
  "Term",
  "Transliteration",
  "Translation",
  "Context/Citation",
] as const;

export const CONSISTENCY_HEADING = "Consistency Report";

export const COLOR_CODES = {
  reset: "\u001B[0m",
  toLLM: "\u001B[34m", // blue - prompts sent to model
  fromLLM: "\u001B[32m", // green - model responses
  toHuman: "\u001B[36m", // cyan - stage status for operator
  warn: "\u001B[35m",
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";

export const SPINNER_FRAMES = [
  "⠋",
  "⠙",
  "⠹",
  "⠸",
  "⠼",
  "⠴",
  "⠦",
  "⠧",
  "⠇",
  "⠏",
];
