import type { Span } from '../../src/types/pdf.js';
import type { Line } from '../../src/types/outline.js';

type SpanInit = {
  size?: number;
  x?: number;
  top?: number;
  bold?: boolean;
  page?: number;
  fontName?: string;
  width?: number;
};

/** A span laid out in top-down page coordinates. */
export function span(text: string, init: SpanInit = {}): Span {
  const size = init.size ?? 12;
  const x = init.x ?? 72;
  const top = init.top ?? 100;
  const bold = init.bold ?? false;
  return {
    text,
    fontSize: size,
    fontName: init.fontName ?? (bold ? 'Helvetica-Bold' : 'Helvetica'),
    fontWeight: bold ? 700 : 400,
    fontStyle: 'normal',
    bbox: { x0: x, y0: top, x1: x + (init.width ?? text.length * size * 0.5), y1: top + size },
    pageIndex: init.page ?? 0
  };
}

type LineInit = {
  size?: number;
  bold?: boolean;
  top?: number;
  page?: number;
  order?: number;
};

export function line(text: string, init: LineInit = {}): Line {
  return {
    spans: [],
    text,
    fontSize: init.size ?? 12,
    bold: init.bold ?? false,
    top: init.top ?? 100,
    left: 72,
    pageIndex: init.page ?? 0,
    order: init.order ?? 0,
    charCount: text.replace(/\s+/g, '').length
  };
}

export const BODY_TEXT = 'The body paragraph continues across the page';

/**
 * Two-page document: a 24pt bold "Overview" opening page one, 12pt body
 * text, and a 15pt bold "Revision History" on page two. `withSubsection`
 * adds an 18pt bold "Scope" above it.
 */
export function samplePages(withSubsection: boolean): Span[][] {
  const first: Span[] = [
    span('Overview', { size: 24, bold: true, top: 60 }),
    span(BODY_TEXT, { top: 120 }),
    span(BODY_TEXT, { top: 140 }),
    span(BODY_TEXT, { top: 160 })
  ];
  const second: Span[] = [
    ...(withSubsection ? [span('Scope', { size: 18, bold: true, top: 60, page: 1 })] : []),
    span(BODY_TEXT, { top: 100, page: 1 }),
    span('Revision History', { size: 15, bold: true, top: 200, page: 1 }),
    span(BODY_TEXT, { top: 240, page: 1 }),
    span(BODY_TEXT, { top: 260, page: 1 })
  ];
  return [first, second];
}
