import type { Span } from '../../types/pdf.js';
import type { Line } from '../../types/outline.js';
import type { BoldDetector } from '../../types/config.js';

export interface LineAggregationOptions {
  lineMergeTolerance: number;
  isBold: BoldDetector;
}

type LineAccumulator = {
  anchor: number;
  minHeight: number;
  spans: Span[];
};

const SIZE_EPSILON = 0.01;

export function isWellFormedSpan(span: Span): boolean {
  if (typeof span.text !== 'string' || span.text.trim().length === 0) return false;
  if (!Number.isFinite(span.fontSize) || span.fontSize <= 0) return false;
  const { x0, y0, x1, y1 } = span.bbox;
  return [x0, y0, x1, y1].every((n) => Number.isFinite(n));
}

const midY = (span: Span): number => (span.bbox.y0 + span.bbox.y1) / 2;

// Zero-height boxes still need a tolerance, so fall back to the font size.
const spanHeight = (span: Span): number => Math.max(0, span.bbox.y1 - span.bbox.y0) || span.fontSize;

/**
 * Groups one page's spans into visual lines, returned top to bottom with
 * `order` numbering them in reading order.
 */
export function aggregateLines(spans: readonly Span[], pageIndex: number, options: LineAggregationOptions): Line[] {
  const usable = spans.filter(isWellFormedSpan);
  if (usable.length === 0) return [];

  const sorted = [...usable].sort((a, b) => midY(a) - midY(b) || a.bbox.x0 - b.bbox.x0);
  const groups: LineAccumulator[] = [];

  for (const span of sorted) {
    const current = groups.length > 0 ? groups[groups.length - 1] : undefined;
    const height = spanHeight(span);
    if (current && Math.abs(midY(span) - current.anchor) <= options.lineMergeTolerance * Math.min(height, current.minHeight)) {
      current.spans.push(span);
      current.minHeight = Math.min(current.minHeight, height);
    } else {
      groups.push({ anchor: midY(span), minHeight: height, spans: [span] });
    }
  }

  const lines = groups.map((group) => buildLine(group.spans, pageIndex, options.isBold));
  // Array.prototype.sort is stable, so lines sharing a top keep their midpoint order.
  lines.sort((a, b) => a.top - b.top);
  return lines.map((line, order) => ({ ...line, order }));
}

function buildLine(spans: Span[], pageIndex: number, isBold: BoldDetector): Line {
  const ordered = [...spans].sort((a, b) => a.bbox.x0 - b.bbox.x0);
  const text = ordered.map((s) => s.text.trim()).join(' ');
  const fontSize = Math.max(...ordered.map((s) => s.fontSize));
  const dominant = ordered.filter((s) => s.fontSize >= fontSize - SIZE_EPSILON);

  return {
    spans: ordered,
    text,
    fontSize,
    bold: dominant.some((s) => isBold(s)),
    top: Math.min(...ordered.map((s) => s.bbox.y0)),
    left: Math.min(...ordered.map((s) => s.bbox.x0)),
    pageIndex,
    order: 0,
    charCount: text.replace(/\s+/g, '').length
  };
}
