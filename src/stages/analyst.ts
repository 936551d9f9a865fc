import { z } from "zod";
import type { GlossaryEntry } from "../types.js";
import type { Logger } from "../ui/logger.js";
import type { CompletionService } from "../core/services.js";
import type { PipelineContext, PipelineDeps, PipelineStep } from "../core/pipeline.js";
import { createStep } from "../core/pipeline.js";
import { ServiceError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";
import { DIAGNOSTIC_GLOSSARY_TERM } from "../config/constants.js";

export const GlossaryEntrySchema = z
  .object({
    term: z.string().trim().min(1),
    transliteration: z.string(),
    translation: z.string(),
    context: z.string().nullable(),
  })
  .strict();

export const GlossarySchema = z.array(GlossaryEntrySchema);

// Sent to Ollama as the reply format.
const GLOSSARY_JSON_SCHEMA = {
  type: "array",
  items: {
    type: "object",
    properties: {
      term: { type: "string" },
      transliteration: { type: "string" },
      translation: { type: "string" },
      context: { type: ["string", "null"] },
    },
    required: ["term", "transliteration", "translation", "context"],
    additionalProperties: false,
  },
};

export interface AnalystPassDeps {
  completion: CompletionService;
  stageLog: Logger;
  stageWarn: Logger;
}

export function buildAnalystPrompt(manuscript: string): string {
  return `You are a linguistic analyst. Build a glossary for the manuscript below.

Include every non-English word or phrase (Sanskrit, Hindi and others), philosophical concept and recurring proper noun from another language. Keep the order in which terms first appear.

For each term give:
- "term": the term as written in the manuscript
- "transliteration": its romanized form (IAST for Sanskrit), or "" when it is already romanized
- "translation": a short English meaning in this manuscript's context
- "context": the verse or citation it comes from, or null

OUTPUT: A JSON array of objects with exactly these four keys. Return [] when there is nothing to list.

MANUSCRIPT:
${manuscript}`;
}

/**
 * Decode the analyst reply. Missing, extra or mistyped keys reject with
 * ServiceError rather than passing through.
 */
export function decodeGlossary(reply: unknown): GlossaryEntry[] {
  const parsed = GlossarySchema.safeParse(reply);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ServiceError(`Glossary reply does not match the schema${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function diagnosticGlossary(error: unknown): GlossaryEntry[] {
  return [
    {
      term: DIAGNOSTIC_GLOSSARY_TERM,
      transliteration: "",
      translation: `Glossary generation failed: ${describeError(error)}`,
      context: null,
    },
  ];
}

/** Ask the model for a glossary. Rejects with ServiceError. */
export async function requestGlossary(
  manuscript: string,
  deps: AnalystPassDeps
): Promise<GlossaryEntry[]> {
  const reply = await deps.completion.completeJson(
    buildAnalystPrompt(manuscript),
    GLOSSARY_JSON_SCHEMA,
    { spinnerMessage: "Building glossary" }
  );
  return decodeGlossary(reply);
}

/**
 * Analyst pass. Never rejects: any failure becomes a single diagnostic entry
 * so the edited manuscript is still delivered.
 */
export async function runAnalystPass(
  manuscript: string,
  deps: AnalystPassDeps
): Promise<GlossaryEntry[]> {
  deps.stageLog("[analyst] Extracting glossary...");
  try {
    const glossary = await requestGlossary(manuscript, deps);
    deps.stageLog(`[analyst] ${glossary.length} glossary term(s)`);
    return glossary;
  } catch (error) {
    deps.stageWarn(`[analyst] Glossary degraded: ${describeError(error)}`);
    return diagnosticGlossary(error);
  }
}

// --- Pipeline Step ---

export const step: PipelineStep = createStep(
  "analyst",
  async (ctx: PipelineContext, deps: PipelineDeps): Promise<void> => {
    ctx.glossary = await runAnalystPass(ctx.editedManuscript ?? "", deps);
  },
  (ctx: PipelineContext): boolean => ctx.withGlossary && ctx.editedManuscript !== undefined
);
