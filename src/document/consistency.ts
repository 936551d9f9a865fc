import { CONSISTENCY_HEADING } from "../config/constants.js";
import type { DocumentModel } from "./model.js";

export function appendConsistencyReport(model: DocumentModel, findings: readonly string[]): void {
  if (findings.length === 0) return;

  model.blocks.push(
    { type: "page-break" },
    { type: "section-heading", level: 1, text: CONSISTENCY_HEADING }
  );
  for (const finding of findings) {
    model.blocks.push({ type: "paragraph", runs: [{ text: finding }], alignment: "left" });
  }
}
