import type { EditorialBrief, GlossaryEntry, ShlokaOptions } from "../types.js";
import type { Logger } from "../ui/logger.js";
import type { CompletionService } from "./services.js";

// --- Pipeline Context ---

export interface PipelineContext {
  // Input
  rawText: string;
  brief: EditorialBrief;
  shloka?: ShlokaOptions | undefined;
  withGlossary: boolean;

  // Accumulated state
  editedManuscript?: string;
  glossary?: GlossaryEntry[];
}

// --- Pipeline Step ---

export interface PipelineStep {
  name: string;
  shouldRun?: (ctx: PipelineContext) => boolean;
  run: (ctx: PipelineContext, deps: PipelineDeps) => Promise<void>;
}

// --- Pipeline Dependencies ---

export interface PipelineDeps {
  completion: CompletionService;
  stageLog: Logger;
  stageWarn: Logger;
}

// --- Pipeline Runner ---

/**
 * Run steps strictly in order; each one sees what the previous ones left in
 * the context. A step that throws aborts the rest.
 */
export async function runPipeline(
  steps: PipelineStep[],
  ctx: PipelineContext,
  deps: PipelineDeps
): Promise<PipelineContext> {
  for (const step of steps) {
    if (step.shouldRun && !step.shouldRun(ctx)) {
      deps.stageLog(`[pipeline] Skipping ${step.name} (condition not met)`);
      continue;
    }

    deps.stageLog(`[pipeline] Running ${step.name}...`);
    await step.run(ctx, deps);
  }
  return ctx;
}

// --- Step helper ---

export function createStep(
  name: string,
  run: PipelineStep["run"],
  shouldRun?: (ctx: PipelineContext) => boolean
): PipelineStep {
  const step: PipelineStep = {
    name,
    run,
  };
  if (shouldRun) {
    step.shouldRun = shouldRun;
  }
  return step;
}
