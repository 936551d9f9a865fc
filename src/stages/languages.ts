import { z } from "zod";
import type { Logger } from "../ui/logger.js";
import type { CompletionService } from "../core/services.js";
import { ServiceError } from "../core/errors.js";
import { LANGUAGE_SAMPLE_LIMIT } from "../config/constants.js";

const LanguageListSchema = z.array(z.string().trim().min(1));

const LANGUAGE_JSON_SCHEMA = {
  type: "array",
  items: { type: "string" },
};

export interface LanguageDetectorDeps {
  completion: CompletionService;
  stageLog: Logger;
}

export function sampleText(text: string, limit = LANGUAGE_SAMPLE_LIMIT): string {
  return text.trim().slice(0, limit);
}

export function buildLanguagePrompt(sample: string): string {
  return `Identify every natural language used in the text below, including languages that appear only in quoted verses or single words.

OUTPUT: A JSON array of English language names, most used first, e.g. ["English", "Sanskrit"].

TEXT:
${sample}`;
}

/**
 * Classify the languages of a manuscript from a leading sample. Rejects with
 * ServiceError when the call fails or the reply is not a list of names.
 */
export async function detectLanguages(
  text: string,
  deps: LanguageDetectorDeps
): Promise<string[]> {
  const sample = sampleText(text);
  if (!sample) return [];

  deps.stageLog(`[languages] Classifying a ${sample.length}-character sample...`);
  const reply = await deps.completion.completeJson(
    buildLanguagePrompt(sample),
    LANGUAGE_JSON_SCHEMA,
    { spinnerMessage: "Detecting languages" }
  );

  const parsed = LanguageListSchema.safeParse(reply);
  if (!parsed.success) {
    throw new ServiceError("Language reply is not a list of language names");
  }

  const seen = new Set<string>();
  return parsed.data.filter((name) => {
    const key = name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
