import type { GlossaryEntry } from "../types.js";
import { GLOSSARY_COLUMNS, GLOSSARY_HEADING } from "../config/constants.js";
import type { DocumentModel } from "./model.js";

/**
 * Append the glossary section: page break, heading, then one table row per
 * entry in the order given. Does nothing for an empty list.
 */
export function appendGlossary(model: DocumentModel, entries: readonly GlossaryEntry[]): void {
  if (entries.length === 0) return;

  model.blocks.push(
    { type: "page-break" },
    { type: "section-heading", level: 1, text: GLOSSARY_HEADING },
    {
      type: "table",
      header: [...GLOSSARY_COLUMNS],
      rows: entries.map((entry) => [
        entry.term,
        entry.transliteration,
        entry.translation,
        entry.context ?? "",
      ]),
    }
  );
}
