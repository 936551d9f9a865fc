import type { Logger } from "../ui/logger.js";
import type { CompletionService } from "../core/services.js";

export interface InteractiveEditDeps {
  completion: CompletionService;
  stageLog: Logger;
}

export function buildInteractiveEditPrompt(snippet: string, instruction: string): string {
  return `You are an expert editor. Apply the command to the text exactly. Return ONLY the modified text, without quotes or commentary.

COMMAND: ${instruction}

TEXT:
${snippet}`;
}

/** One targeted edit of a snippet. Rejects with ServiceError. */
export async function runInteractiveEdit(
  snippet: string,
  instruction: string,
  deps: InteractiveEditDeps
): Promise<string> {
  deps.stageLog(`[edit] Applying "${instruction}"...`);
  const reply = await deps.completion.complete(
    buildInteractiveEditPrompt(snippet, instruction),
    { spinnerMessage: "Editing snippet" }
  );
  return reply.trim();
}
