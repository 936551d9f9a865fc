export interface Config {
  model: string;
  ollamaUrl: string;
  maxRetries: number;
  debug: boolean;
}

export interface EditorialBrief {
  authorPersona: string;
  bookSummary: string;
  languageRules: string;
}

export type Command =
  | {
      kind: "process";
      input: string;
      output: string;
      brief: EditorialBrief;
      style: StyleConfig;
      glossary: boolean;
      consistency: boolean;
    }
  | { kind: "analyze"; input: string }
  | { kind: "edit"; snippet: string; instruction: string }
  | { kind: "languages"; input: string };

export interface ParseResult {
  config: Config;
  command: Command;
}

// --- Style ---

export type LineSpacing =
  | { kind: "ratio"; value: number }
  | { kind: "points"; value: number };

export interface Margins {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface HeadingStyle {
  size: number;
  bold: boolean;
}

export interface ShlokaOptions {
  lineBreaks: boolean;
  addNumbering: boolean;
  translationStyle: string;
  centerAlign: boolean;
}

export interface StyleConfig {
  fontFamily: string;
  fontSize: number;
  lineSpacing: LineSpacing;
  /** Inches. */
  margins: Margins;
  heading1: HeadingStyle;
  heading2: HeadingStyle;
  shloka?: ShlokaOptions | undefined;
}

// --- Analysis ---

export interface GlossaryEntry {
  term: string;
  transliteration: string;
  translation: string;
  context?: string | null | undefined;
}

export interface FinalizedManuscript {
  editedManuscript: string;
  glossary: GlossaryEntry[];
}

// --- Ollama wire ---

export interface OllamaMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface OllamaResponse {
  message: OllamaMessage;
  done: boolean;
  /** "stop" for a finished reply, "length" when num_predict or num_ctx cut it off. */
  done_reason?: string;
  eval_count?: number;
  prompt_eval_count?: number;
}
