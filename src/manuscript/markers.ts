/**
 * Inline marker vocabulary exchanged with the editor pass.
 *
 * Tags are bit-exact and case-sensitive. A pair spans from an opening tag to
 * the next occurrence of its own closing tag; pairs never nest and never close
 * each other.
 */

export type SegmentKind = "plain" | "heading1" | "heading2" | "shloka" | "translation";

export type TaggedKind = Exclude<SegmentKind, "plain">;

export interface TagPair {
  kind: TaggedKind;
  open: string;
  close: string;
}

export const TAG_PAIRS: readonly TagPair[] = [
  { kind: "heading1", open: "[H1]", close: "[/H1]" },
  { kind: "heading2", open: "[H2]", close: "[/H2]" },
  { kind: "shloka", open: "[SHLOKA]", close: "[/SHLOKA]" },
  { kind: "translation", open: "[TRANSLATION]", close: "[/TRANSLATION]" },
];

export interface TagMatch {
  pair: TagPair;
  /** Index of the opening tag. */
  start: number;
  /** Index just past the closing tag. */
  end: number;
  inner: string;
}

/**
 * Find the matched pair of one kind that starts earliest at or after `from`.
 *
 * The closing tag is the first one after the opening tag; if further openings
 * of the same kind sit between the two, the last of them is used so the
 * matched inner text never contains its own opening tag.
 */
function findPair(text: string, pair: TagPair, from: number): TagMatch | undefined {
  const firstOpen = text.indexOf(pair.open, from);
  if (firstOpen === -1) return undefined;

  const closeAt = text.indexOf(pair.close, firstOpen + pair.open.length);
  if (closeAt === -1) return undefined;

  let open = firstOpen;
  for (;;) {
    const next = text.indexOf(pair.open, open + pair.open.length);
    if (next === -1 || next > closeAt) break;
    open = next;
  }

  return {
    pair,
    start: open,
    end: closeAt + pair.close.length,
    inner: text.slice(open + pair.open.length, closeAt),
  };
}

/**
 * The next matched pair of any kind at or after `from`, or undefined when no
 * opening tag from there on has its closing tag.
 */
export function findNextPair(text: string, from: number): TagMatch | undefined {
  let best: TagMatch | undefined;
  for (const pair of TAG_PAIRS) {
    const match = findPair(text, pair, from);
    if (match && (!best || match.start < best.start)) {
      best = match;
    }
  }
  return best;
}

const CITE_MARKER = /\[CITE:[^\]]*\]/g;
const ITALIC_MARKER = /\[\/?ITALIC\]/g;

/**
 * Remove auxiliary markers that are never rendered when they turn up in
 * leftover plain text. Every other bracketed text is kept.
 */
export function stripAuxiliaryMarkers(text: string): string {
  return text.replaceAll(CITE_MARKER, "").replaceAll(ITALIC_MARKER, "");
}
