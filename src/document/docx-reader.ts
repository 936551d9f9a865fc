/**
 * Paragraph text out of a .docx package.
 *
 * Only top-level body paragraphs are read, in document order; table contents
 * are skipped. Tabs and manual line breaks inside a paragraph are kept as
 * "\t" and "\n".
 */

import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import { FormatError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";

type XmlNode = Record<string, unknown>;

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  trimValues: false,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function childrenOf(node: XmlNode, tag: string): unknown[] {
  const children = node[tag];
  return Array.isArray(children) ? children : [];
}

// Page and column breaks end the page, not the line.
function isLineBreak(node: XmlNode): boolean {
  const attributes = node[ATTRIBUTES_KEY];
  if (!isNode(attributes)) return true;
  const type = attributes["@_w:type"];
  return type === undefined || type === "textWrapping";
}

function textOf(nodes: unknown[]): string {
  let text = "";
  for (const node of nodes) {
    if (!isNode(node)) continue;
    const tag = tagOf(node);
    if (!tag) continue;

    switch (tag) {
      case "w:t":
        for (const child of childrenOf(node, tag)) {
          if (isNode(child) && child[TEXT_KEY] !== undefined) {
            text += String(child[TEXT_KEY]);
          }
        }
        break;
      case "w:tab":
        text += "\t";
        break;
      case "w:br":
        if (isLineBreak(node)) text += "\n";
        break;
      case "w:cr":
        text += "\n";
        break;
      case TEXT_KEY:
        break;
      // Text boxes are stored twice; mc:Choice already carried this copy.
      case "mc:Fallback":
        break;
      default:
        text += textOf(childrenOf(node, tag));
    }
  }
  return text;
}

function collectParagraphs(nodes: unknown[], paragraphs: string[]): void {
  for (const node of nodes) {
    if (!isNode(node)) continue;
    const tag = tagOf(node);
    if (!tag || tag === TEXT_KEY || tag === "w:tbl") continue;

    if (tag === "w:p") {
      paragraphs.push(textOf(childrenOf(node, tag)));
    } else {
      collectParagraphs(childrenOf(node, tag), paragraphs);
    }
  }
}

/**
 * Read the ordered paragraph texts of a .docx file. Rejects with FormatError
 * when the bytes are not a word-processing package.
 */
export async function readParagraphs(bytes: Uint8Array): Promise<string[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new FormatError(`Not a .docx package: ${describeError(error)}`, { cause: error });
  }

  const documentXml = await zip.file("word/document.xml")?.async("string");
  if (documentXml === undefined) {
    throw new FormatError("Not a .docx package: word/document.xml is missing");
  }

  let root: unknown;
  try {
    root = parser.parse(documentXml);
  } catch (error) {
    throw new FormatError(`Unreadable document.xml: ${describeError(error)}`, { cause: error });
  }
  if (!Array.isArray(root)) {
    throw new FormatError("Unreadable document.xml: no elements");
  }

  const paragraphs: string[] = [];
  collectParagraphs(root, paragraphs);
  return paragraphs;
}

/** Raw manuscript text: one line per paragraph. */
export async function readManuscriptText(bytes: Uint8Array): Promise<string> {
  const paragraphs = await readParagraphs(bytes);
  return paragraphs.join("\n");
}
