import type {
  HeadingDecision,
  HeadingLevel,
  HeadingRecord,
  Line,
  LineDecision,
  NotHeadingReason,
  PositionedHeading,
  StyleProfile,
  TitleDetection
} from '../types/outline.js';
import { roundFontSize } from '../core/layout/stats.js';
import { cleanLineText, isPunctuationOnly, matchesIgnorePattern } from './text-normalizer.js';

export interface HeadingClassifierOptions {
  sizeRoundingStep: number;
  sizeTolerance: number;
  emphasisMargin: number;
  ignorePatterns: readonly RegExp[];
  pageBase: 0 | 1;
  onDecision?: (entry: LineDecision) => void;
}

const notHeading = (reason: NotHeadingReason): HeadingDecision => ({ kind: 'not-heading', reason });

/**
 * Rules run in order and the first that applies decides. A line whose size
 * matches a level still needs to be bold or clearly larger than body text,
 * since decorative text and table cells share heading sizes often enough.
 */
export function classifyLine(
  line: Line,
  profile: StyleProfile,
  isTitle: boolean,
  options: HeadingClassifierOptions
): HeadingDecision {
  if (isTitle) return notHeading('title');

  const text = cleanLineText(line.text);
  if (text.length === 0 || isPunctuationOnly(text)) return notHeading('empty');
  if (matchesIgnorePattern(text, options.ignorePatterns)) return notHeading('noise');

  const size = roundFontSize(line.fontSize, options.sizeRoundingStep);
  const emphasized = line.bold || size - profile.bodySize >= options.emphasisMargin;

  let sizeMatched = false;
  for (const threshold of profile.levels) {
    if (Math.abs(size - threshold.size) > options.sizeTolerance) continue;
    if (emphasized) return { kind: 'heading', level: threshold.level };
    sizeMatched = true;
  }

  return notHeading(sizeMatched ? 'weak-emphasis' : 'no-level');
}

export function toHeadingRecord(line: Line, level: HeadingLevel, pageBase: 0 | 1): HeadingRecord {
  return {
    level,
    text: cleanLineText(line.text),
    page: line.pageIndex + pageBase
  };
}

/** The title line and any other line repeating the title text (running headers) are held back. */
function isTitleLine(line: Line, title: TitleDetection): boolean {
  if (line === title.line) return true;
  return title.title.length > 0 && cleanLineText(line.text) === title.title;
}

export function classifyLines(
  lines: readonly Line[],
  profile: StyleProfile,
  title: TitleDetection,
  options: HeadingClassifierOptions
): PositionedHeading[] {
  const headings: PositionedHeading[] = [];
  for (const line of lines) {
    const decision = classifyLine(line, profile, isTitleLine(line, title), options);
    options.onDecision?.({
      text: cleanLineText(line.text),
      size: roundFontSize(line.fontSize, options.sizeRoundingStep),
      bold: line.bold,
      page: line.pageIndex + options.pageBase,
      decision
    });
    if (decision.kind !== 'heading') continue;
    headings.push({
      record: toHeadingRecord(line, decision.level, options.pageBase),
      pageIndex: line.pageIndex,
      order: line.order
    });
  }
  return headings;
}

/** One trace line: `TEXT | SIZE | BOLD | PAGE -> OUTCOME`. */
export function formatLineDecision(entry: LineDecision): string {
  const outcome = entry.decision.kind === 'heading' ? entry.decision.level : entry.decision.reason;
  return `${entry.text} | ${entry.size} | ${entry.bold ? 'bold' : 'regular'} | ${entry.page} -> ${outcome}`;
}
