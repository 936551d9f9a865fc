import type { EditorialBrief, ShlokaOptions } from "../types.js";
import type { Logger } from "../ui/logger.js";
import type { CompletionService } from "../core/services.js";
import type { PipelineContext, PipelineDeps, PipelineStep } from "../core/pipeline.js";
import { createStep } from "../core/pipeline.js";

export interface EditorPassDeps {
  completion: CompletionService;
  stageLog: Logger;
}

function describeShlokaRules(shloka: ShlokaOptions | undefined): string {
  const rules = [
    "- Wrap every verse (shloka) in [SHLOKA]...[/SHLOKA], one verse line per line.",
    "- Follow each verse with its meaning wrapped in [TRANSLATION]...[/TRANSLATION].",
  ];
  if (shloka?.addNumbering) {
    rules.push("- Number the verses in order, ending each verse's last line with its number, e.g. ॥1॥.");
  }
  const translationStyle = shloka?.translationStyle.trim();
  if (translationStyle) {
    rules.push(`- Write each translation in this style: ${translationStyle}`);
  }
  return rules.join("\n");
}

export function buildEditorPrompt(
  rawText: string,
  brief: EditorialBrief,
  shloka: ShlokaOptions | undefined
): string {
  return `You are an expert multilingual book editor and proofreader with mastery in English, Hindi and Sanskrit.
Edit and format a raw, voice-typed manuscript draft. Preserve the author's voice and intent.

CONTEXT:
- Author's persona: ${brief.authorPersona || "(not given)"}
- Book's core message: ${brief.bookSummary || "(not given)"}
- Language rules: ${brief.languageRules || "(none)"}

TASKS:
1. Correct spelling, grammar and syntax. Watch for voice-to-text homophones (their/there, right/write/rite).
2. Fix capitalization and punctuation. Split run-on sentences.
3. Put each paragraph on its own line.
4. Standardize inconsistent spellings of names and key terms to their first usage.

MARKUP (use exactly these tags, nothing else):
- Chapter titles: [H1]Title[/H1]
- Section titles: [H2]Title[/H2]
${describeShlokaRules(shloka)}

OUTPUT: The complete edited manuscript as plain text with the tags above. No markdown, no commentary.

MANUSCRIPT:
${rawText}`;
}

/**
 * Editor pass: raw text in, marked-up manuscript out. The reply is not
 * validated; the parser copes with whatever comes back.
 */
export async function runEditorPass(
  rawText: string,
  brief: EditorialBrief,
  shloka: ShlokaOptions | undefined,
  deps: EditorPassDeps
): Promise<string> {
  deps.stageLog("[editor] Proofreading and marking up manuscript...");
  const prompt = buildEditorPrompt(rawText, brief, shloka);
  return deps.completion.complete(prompt, { spinnerMessage: "Editing manuscript" });
}

// --- Pipeline Step ---

export const step: PipelineStep = createStep(
  "editor",
  async (ctx: PipelineContext, deps: PipelineDeps): Promise<void> => {
    ctx.editedManuscript = await runEditorPass(ctx.rawText, ctx.brief, ctx.shloka, deps);
    deps.stageLog(`[editor] Received ${ctx.editedManuscript.length} characters`);
  }
);
