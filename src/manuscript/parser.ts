import { findNextPair, stripAuxiliaryMarkers, type SegmentKind } from "./markers.js";

export interface SourceRange {
  start: number;
  end: number;
}

export interface MarkedSegment {
  kind: SegmentKind;
  /** Trimmed inner text. Auxiliary markers are already removed from plain text. */
  text: string;
  /** Half-open offsets into the parsed string: the whole tag span, or the untrimmed gap. */
  range: SourceRange;
}

function pushPlain(segments: MarkedSegment[], source: string, start: number, end: number): void {
  if (end <= start) return;
  const text = stripAuxiliaryMarkers(source.slice(start, end)).trim();
  if (text) {
    segments.push({ kind: "plain", text, range: { start, end } });
  }
}

/**
 * Split marked-up manuscript text into ordered segments.
 *
 * Never throws: opening tags without a closing tag stay in the surrounding
 * plain text.
 */
export function parseManuscript(source: string): MarkedSegment[] {
  const segments: MarkedSegment[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const match = findNextPair(source, cursor);
    if (!match) break;

    pushPlain(segments, source, cursor, match.start);
    segments.push({
      kind: match.pair.kind,
      text: match.inner.trim(),
      range: { start: match.start, end: match.end },
    });
    cursor = match.end;
  }

  pushPlain(segments, source, cursor, source.length);
  return segments;
}

/**
 * Text of the manuscript with every marker removed, one segment per line.
 */
export function plainTextOf(segments: MarkedSegment[]): string {
  return segments.map((segment) => stripAuxiliaryMarkers(segment.text)).join("\n");
}
