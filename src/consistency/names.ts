/**
 * Spelling-variant scan for proper nouns.
 *
 * Voice typing tends to spell the same name several ways ("Suresh",
 * "Suraesh"). This collects capitalised words, drops stop words, and groups
 * names within a small edit distance of a name seen earlier.
 */

import { removeStopwords } from "stopword";
import { levenshteinDistance } from "../utils/strings.js";

export interface NameVariantCluster {
  /** Spelling that appears first in the text. */
  preferred: string;
  variants: Array<{ name: string; count: number }>;
}

const MIN_NAME_LENGTH = 4;

interface NameStats {
  name: string;
  count: number;
  firstIndex: number;
}

function collectNames(text: string): NameStats[] {
  const stats = new Map<string, NameStats>();
  for (const match of text.matchAll(/[\p{L}\p{M}]+/gu)) {
    const word = match[0];
    if (word.length < MIN_NAME_LENGTH) continue;
    if (!/^\p{Lu}\p{Ll}/u.test(word)) continue;

    const existing = stats.get(word);
    if (existing) {
      existing.count++;
    } else {
      stats.set(word, { name: word, count: 1, firstIndex: match.index ?? 0 });
    }
  }

  const candidates = [...stats.values()];
  const kept = new Set(removeStopwords(candidates.map((s) => s.name.toLowerCase())));
  return candidates
    .filter((s) => kept.has(s.name.toLowerCase()))
    .sort((a, b) => a.firstIndex - b.firstIndex);
}

function maxDistanceFor(name: string): number {
  return name.length <= 6 ? 1 : 2;
}

function isVariant(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right || left[0] !== right[0]) return false;
  const limit = Math.min(maxDistanceFor(left), maxDistanceFor(right));
  return levenshteinDistance(left, right) <= limit;
}

export function findNameVariants(text: string): NameVariantCluster[] {
  const names = collectNames(text);
  const assigned = new Set<string>();
  const clusters: NameVariantCluster[] = [];

  for (const [index, head] of names.entries()) {
    if (assigned.has(head.name)) continue;

    const members = names
      .slice(index + 1)
      .filter((other) => !assigned.has(other.name) && isVariant(head.name, other.name));
    if (members.length === 0) continue;

    assigned.add(head.name);
    for (const member of members) assigned.add(member.name);

    clusters.push({
      preferred: head.name,
      variants: [head, ...members].map(({ name, count }) => ({ name, count })),
    });
  }

  return clusters;
}

export function describeCluster(cluster: NameVariantCluster): string {
  const spellings = cluster.variants
    .map((v) => `"${v.name}" (${v.count}x)`)
    .join(", ");
  return `Possible spelling variants: ${spellings}. Standardize to "${cluster.preferred}" (first usage).`;
}

export function buildConsistencyReport(text: string): string[] {
  return findNameVariants(text).map(describeCluster);
}
