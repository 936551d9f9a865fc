/**
 * Format-independent document model.
 *
 * The renderer owns every styling decision here; the writer only translates
 * blocks into the container format.
 */

export type Alignment = "default" | "left" | "center";

export interface Run {
  text: string;
  bold?: boolean;
  italic?: boolean;
  /** Points. Falls back to the document font size. */
  size?: number;
  /** Line break emitted before this run's text. */
  breakBefore?: boolean;
}

export interface ParagraphBlock {
  type: "paragraph";
  runs: Run[];
  alignment: Alignment;
}

export interface TableBlock {
  type: "table";
  header: string[];
  rows: string[][];
}

export interface PageBreakBlock {
  type: "page-break";
}

export interface SectionHeadingBlock {
  type: "section-heading";
  level: 1 | 2;
  text: string;
}

export type DocumentBlock = ParagraphBlock | TableBlock | PageBreakBlock | SectionHeadingBlock;

export interface DocumentModel {
  blocks: DocumentBlock[];
}

export function createDocumentModel(): DocumentModel {
  return { blocks: [] };
}

export function paragraphText(block: ParagraphBlock): string {
  return block.runs
    .map((run) => (run.breakBefore ? `\n${run.text}` : run.text))
    .join("");
}
