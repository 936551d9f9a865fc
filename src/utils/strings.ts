import type { OllamaMessage } from "../types.js";

export function truncateMiddle(text: string | undefined | null, limit: number): string {
  if (!text || text.length <= limit) return text ?? "";

  const startLength = Math.floor(limit * 0.6);
  const endLength = limit - startLength - 5;

  const start = text.slice(0, startLength);
  const end = text.slice(-endLength);
  return `${start} ... ${end}`;
}

export function extractAssistantText(message: OllamaMessage | undefined | null): string {
  if (!message || typeof message.content !== "string") {
    return "";
  }
  return message.content;
}

/**
 * Drop a surrounding ```json fence that models like to add around JSON.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  const inner = fenced?.[1];
  return inner !== undefined ? inner.trim() : trimmed;
}

export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const matrix: number[][] = [];
  for (let index = 0; index <= b.length; index++) {
    matrix[index] = [index];
  }
  for (let index = 0; index <= a.length; index++) {
    matrix[0]![index] = index;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      matrix[i]![j] = Math.min(
        matrix[i - 1]![j - 1]! + cost,
        matrix[i]![j - 1]! + 1,
        matrix[i - 1]![j]! + 1
      );
    }
  }
  return matrix[b.length]![a.length]!;
}
