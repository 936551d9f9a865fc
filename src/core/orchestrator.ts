import type {
  EditorialBrief,
  FinalizedManuscript,
  ShlokaOptions,
  StyleConfig,
} from "../types.js";
import type { DocumentModel } from "../document/model.js";
import { runPipeline, type PipelineContext, type PipelineDeps, type PipelineStep } from "./pipeline.js";
import { step as editorStep } from "../stages/editor.js";
import { step as analystStep } from "../stages/analyst.js";
import { parseManuscript, plainTextOf } from "../manuscript/parser.js";
import { renderDocument } from "../document/renderer.js";
import { appendGlossary } from "../document/glossary.js";
import { appendConsistencyReport } from "../document/consistency.js";
import { buildConsistencyReport } from "../consistency/names.js";
import { ServiceError } from "./errors.js";

const finalizePipeline: PipelineStep[] = [editorStep, analystStep];

export interface FinalizeRequest {
  rawText: string;
  brief: EditorialBrief;
  shloka?: ShlokaOptions | undefined;
  withGlossary: boolean;
}

/**
 * Editor pass then, when requested, analyst pass. An editor failure rejects;
 * an analyst failure shows up as a diagnostic glossary entry instead.
 */
export async function finalizeManuscript(
  request: FinalizeRequest,
  deps: PipelineDeps
): Promise<FinalizedManuscript> {
  const ctx: PipelineContext = {
    rawText: request.rawText,
    brief: request.brief,
    shloka: request.shloka,
    withGlossary: request.withGlossary,
  };
  await runPipeline(finalizePipeline, ctx, deps);

  if (ctx.editedManuscript === undefined) {
    throw new ServiceError("Editor pass produced no manuscript");
  }
  return {
    editedManuscript: ctx.editedManuscript,
    glossary: ctx.glossary ?? [],
  };
}

export interface BuildDocumentOptions {
  consistencyReport: boolean;
}

export function buildFinalDocument(
  result: FinalizedManuscript,
  style: StyleConfig,
  options: BuildDocumentOptions = { consistencyReport: false }
): DocumentModel {
  const segments = parseManuscript(result.editedManuscript);
  const model = renderDocument(segments, style);
  appendGlossary(model, result.glossary);
  if (options.consistencyReport) {
    appendConsistencyReport(model, buildConsistencyReport(plainTextOf(segments)));
  }
  return model;
}
