import type { Span } from '../types/pdf.js';
import type { ExtractionResult, Line } from '../types/outline.js';
import type { OutlineOptions } from '../types/config.js';
import { aggregateLines } from '../core/layout/line-aggregator.js';
import { buildStyleProfile } from '../core/layout/stats.js';
import { resolveOutlineOptions } from './options.js';
import { detectTitle } from './title-detector.js';
import { classifyLines } from './heading-classifier.js';
import { assembleOutline } from './outline-assembler.js';

export type EngineStage = 'profiling' | 'classifying';

/**
 * Runs the whole pipeline for one document. Everything it builds (lines,
 * style profile, title marker) lives only for this call.
 */
export function extractOutline(
  pages: readonly (readonly Span[])[],
  overrides: Partial<OutlineOptions> = {},
  onStage?: (stage: EngineStage) => void
): ExtractionResult {
  const options = resolveOutlineOptions(overrides);
  const linePages = pages.map((spans, pageIndex) => aggregateLines(spans, pageIndex, options));
  return extractOutlineFromLines(linePages, options, onStage);
}

const hasUsableSize = (line: Line): boolean => Number.isFinite(line.fontSize) && line.fontSize > 0;

/** Entry point for callers that group spans into lines themselves. */
export function extractOutlineFromLines(
  pages: readonly (readonly Line[])[],
  overrides: Partial<OutlineOptions> = {},
  onStage?: (stage: EngineStage) => void
): ExtractionResult {
  const options = resolveOutlineOptions(overrides);
  const usablePages = pages.map((page) => page.filter(hasUsableSize));
  const lines: Line[] = usablePages.flat();

  onStage?.('profiling');
  const profile = buildStyleProfile(lines, options);

  onStage?.('classifying');
  const detection = detectTitle(usablePages[0] ?? [], profile, options);
  const headings = classifyLines(lines, profile, detection, options);

  return {
    title: detection.title,
    outline: assembleOutline(headings)
  };
}
