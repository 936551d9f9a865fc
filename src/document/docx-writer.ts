/**
 * DocumentModel to .docx.
 *
 * Document-wide settings (font, size, line spacing, margins) go into the
 * default style and the section once; blocks are translated one to one.
 */

import {
  AlignmentType,
  BorderStyle,
  Document,
  HeadingLevel,
  LineRuleType,
  Packer,
  PageBreak,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
  convertInchesToTwip,
} from "docx";

import type { LineSpacing, StyleConfig } from "../types.js";
import type { Alignment, DocumentBlock, DocumentModel, Run, TableBlock } from "./model.js";

const HEADER_SHADING = "D9D9D9";

/** docx sizes are in half-points. */
function halfPoints(points: number): number {
  return Math.round(points * 2);
}

function lineSpacingOf(spacing: LineSpacing) {
  if (spacing.kind === "points") {
    // Twentieths of a point.
    return { line: Math.round(spacing.value * 20), lineRule: LineRuleType.EXACT };
  }
  // 240 = single spacing.
  return { line: Math.round(spacing.value * 240), lineRule: LineRuleType.AUTO };
}

function alignmentOf(alignment: Alignment) {
  switch (alignment) {
    case "left":
      return AlignmentType.LEFT;
    case "center":
      return AlignmentType.CENTER;
    case "default":
      return undefined;
  }
}

/** One model run becomes several docx runs when its text holds line breaks. */
function textRunsOf(run: Run): TextRun[] {
  return run.text.split("\n").map((line, index) => {
    const withBreak = index > 0 || run.breakBefore === true;
    return new TextRun({
      text: line,
      bold: run.bold ?? false,
      italics: run.italic ?? false,
      ...(run.size !== undefined ? { size: halfPoints(run.size) } : {}),
      ...(withBreak ? { break: 1 } : {}),
    });
  });
}

function createTable(table: TableBlock, style: StyleConfig): Table {
  const cellRun = (text: string, isHeader: boolean): TableCell =>
    new TableCell({
      children: [
        new Paragraph({
          children: [
            new TextRun({ text, bold: isHeader, size: halfPoints(style.fontSize) }),
          ],
        }),
      ],
      ...(isHeader ? { shading: { fill: HEADER_SHADING } } : {}),
    });

  const rows = [
    new TableRow({
      tableHeader: true,
      children: table.header.map((text) => cellRun(text, true)),
    }),
    ...table.rows.map(
      (row) => new TableRow({ children: row.map((text) => cellRun(text, false)) })
    ),
  ];

  return new Table({
    rows,
    width: { size: 100, type: WidthType.PERCENTAGE },
    borders: {
      top: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
      bottom: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
      left: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
      right: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
      insideHorizontal: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
      insideVertical: { style: BorderStyle.SINGLE, size: 1, color: "000000" },
    },
  });
}

function createBlock(block: DocumentBlock, style: StyleConfig): Paragraph | Table {
  switch (block.type) {
    case "paragraph": {
      const alignment = alignmentOf(block.alignment);
      return new Paragraph({
        children: block.runs.flatMap(textRunsOf),
        ...(alignment !== undefined ? { alignment } : {}),
      });
    }
    case "section-heading": {
      const heading = block.level === 1 ? style.heading1 : style.heading2;
      return new Paragraph({
        heading: block.level === 1 ? HeadingLevel.HEADING_1 : HeadingLevel.HEADING_2,
        children: [
          new TextRun({ text: block.text, bold: heading.bold, size: halfPoints(heading.size) }),
        ],
      });
    }
    case "page-break":
      return new Paragraph({ children: [new PageBreak()] });
    case "table":
      return createTable(block, style);
  }
}

export async function writeDocument(model: DocumentModel, style: StyleConfig): Promise<Buffer> {
  const doc = new Document({
    styles: {
      default: {
        document: {
          run: { font: style.fontFamily, size: halfPoints(style.fontSize) },
          paragraph: { spacing: lineSpacingOf(style.lineSpacing) },
        },
      },
    },
    sections: [
      {
        properties: {
          page: {
            margin: {
              top: convertInchesToTwip(style.margins.top),
              bottom: convertInchesToTwip(style.margins.bottom),
              left: convertInchesToTwip(style.margins.left),
              right: convertInchesToTwip(style.margins.right),
            },
          },
        },
        children: model.blocks.map((block) => createBlock(block, style)),
      },
    ],
  });

  return Packer.toBuffer(doc);
}
