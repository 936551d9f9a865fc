import type { HeadingStyle, StyleConfig } from "../types.js";
import type { MarkedSegment } from "../manuscript/parser.js";
import {
  createDocumentModel,
  type DocumentBlock,
  type DocumentModel,
  type Run,
} from "./model.js";

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// One paragraph per segment; its inner lines become line breaks.
function renderPlain(text: string): DocumentBlock[] {
  const runs: Run[] = splitLines(text).map((line, index) =>
    index === 0 ? { text: line } : { text: line, breakBefore: true }
  );
  if (runs.length === 0) return [];
  return [{ type: "paragraph", runs, alignment: "default" }];
}

function renderHeading(text: string, heading: HeadingStyle): DocumentBlock[] {
  return [
    {
      type: "paragraph",
      runs: [{ text, bold: heading.bold, size: heading.size }],
      alignment: "default",
    },
  ];
}

function renderShloka(text: string, style: StyleConfig): DocumentBlock[] {
  const lineBreaks = style.shloka?.lineBreaks ?? false;
  const runs: Run[] = splitLines(text).map((line, index) => {
    if (index === 0) return { text: line, italic: true };
    return lineBreaks
      ? { text: line, italic: true, breakBefore: true }
      : { text: ` ${line}`, italic: true };
  });
  if (runs.length === 0) return [];

  return [
    {
      type: "paragraph",
      runs,
      alignment: style.shloka?.centerAlign ? "center" : "default",
    },
  ];
}

function renderTranslation(text: string): DocumentBlock[] {
  return [{ type: "paragraph", runs: [{ text }], alignment: "left" }];
}

function renderSegment(segment: MarkedSegment, style: StyleConfig): DocumentBlock[] {
  if (!segment.text.trim()) return [];

  switch (segment.kind) {
    case "plain":
      return renderPlain(segment.text);
    case "heading1":
      return renderHeading(segment.text, style.heading1);
    case "heading2":
      return renderHeading(segment.text, style.heading2);
    case "shloka":
      return renderShloka(segment.text, style);
    case "translation":
      return renderTranslation(segment.text);
  }
}

/**
 * Turn parsed segments into document blocks.
 *
 * Pure and total over anything the parser produces; blank segments yield no
 * block. Stray tags inside a segment are kept as literal text.
 */
export function renderDocument(segments: MarkedSegment[], style: StyleConfig): DocumentModel {
  const model = createDocumentModel();
  for (const segment of segments) {
    model.blocks.push(...renderSegment(segment, style));
  }
  return model;
}
