import type { Line, StyleProfile, TitleDetection } from '../types/outline.js';
import { roundFontSize } from '../core/layout/stats.js';
import { cleanLineText, isPunctuationOnly, matchesIgnorePattern } from './text-normalizer.js';

export interface TitleDetectionOptions {
  sizeRoundingStep: number;
  titleMinMargin: number;
  minTitleLength: number;
  ignorePatterns: readonly RegExp[];
}

type TitleCandidate = {
  line: Line;
  size: number;
  text: string;
};

const NO_TITLE: TitleDetection = { title: '', line: null };

function outranks(a: TitleCandidate, b: TitleCandidate): boolean {
  if (a.size !== b.size) return a.size > b.size;
  if (a.line.top !== b.line.top) return a.line.top < b.line.top;
  return a.line.order < b.line.order;
}

/**
 * Picks the title among the first page's lines: the largest text, nearest
 * the top on a tie. A miss is not an error; the title is then empty and no
 * line is held back from the outline.
 */
export function detectTitle(
  firstPageLines: readonly Line[],
  profile: StyleProfile,
  options: TitleDetectionOptions
): TitleDetection {
  let best: TitleCandidate | null = null;

  for (const line of firstPageLines) {
    const text = cleanLineText(line.text);
    if (text.length < Math.max(1, options.minTitleLength)) continue;
    if (isPunctuationOnly(text) || matchesIgnorePattern(text, options.ignorePatterns)) continue;

    const candidate: TitleCandidate = {
      line,
      size: roundFontSize(line.fontSize, options.sizeRoundingStep),
      text
    };
    if (!best || outranks(candidate, best)) best = candidate;
  }

  if (!best || best.size - profile.bodySize < options.titleMinMargin) {
    return NO_TITLE;
  }
  return { title: best.text, line: best.line };
}
