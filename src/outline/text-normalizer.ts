/** Bare page numbers and URL-like lines. */
export const DEFAULT_IGNORE_PATTERNS: readonly RegExp[] = [
  /^\d{1,3}$/,
  /^(https?:\/\/|www\.)/i
];

/**
 * Trims a line, drops trailing runs of whitespace, dashes and underscores
 * (leader lines, separators), collapses inner whitespace and removes the
 * space PDF producers often leave before punctuation.
 */
export function cleanLineText(text: string): string {
  return (text || '')
    .trim()
    .replace(/[\s\-_]+$/, '')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ')
    .replace(/(\w)\s+([.,;!?])/g, '$1$2');
}

/** True when nothing but whitespace and punctuation/symbols is left. */
export function isPunctuationOnly(text: string): boolean {
  return !/[\p{L}\p{N}]/u.test(text);
}

export function matchesIgnorePattern(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => {
    // Global/sticky patterns carry lastIndex between calls.
    pattern.lastIndex = 0;
    return pattern.test(text);
  });
}
