import type { HeadingRecord, PositionedHeading } from '../types/outline.js';

/** Orders headings by page, then by their line's reading order on that page. */
export function assembleOutline(headings: readonly PositionedHeading[]): HeadingRecord[] {
  return [...headings]
    .sort((a, b) => a.pageIndex - b.pageIndex || a.order - b.order)
    .map(({ record }) => ({ level: record.level, text: record.text, page: record.page }));
}
