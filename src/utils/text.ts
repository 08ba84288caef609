/**
 * Small text helpers shared by the classifier, the topic builder and the
 * assembler, so every component tokenizes the same way.
 */

const TOKEN_PATTERN = /[a-z0-9]+/g;

export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Clip to at most `maxChars`, preferring a word boundary, marking the cut with "...".
 */
export function clipText(text: string, maxChars: number): string {
  const normalized = collapseWhitespace(text);
  if (normalized.length <= maxChars) return normalized;
  if (maxChars <= 3) return normalized.slice(0, maxChars);
  let cut = normalized.slice(0, maxChars - 3);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > maxChars / 2) cut = cut.slice(0, lastSpace);
  return `${cut.trimEnd()}...`;
}
