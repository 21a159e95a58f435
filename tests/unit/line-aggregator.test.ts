import { describe, it, expect } from 'vitest';
import { aggregateLines, isWellFormedSpan } from '../../src/core/layout/line-aggregator.js';
import { isBoldSpan } from '../../src/fonts/font-style.js';
import { span } from '../helpers/fixtures.js';

const options = { lineMergeTolerance: 0.5, isBold: isBoldSpan };

describe('aggregateLines', () => {
  it('joins spans on the same baseline left to right', () => {
    const lines = aggregateLines(
      [span('world', { x: 140, top: 100 }), span('Hello', { x: 72, top: 100 })],
      0,
      options
    );

    expect(lines).toHaveLength(1);
    expect(lines[0].text).toBe('Hello world');
    expect(lines[0].charCount).toBe(10);
    expect(lines[0].left).toBe(72);
    expect(lines[0].top).toBe(100);
  });

  it('returns separate lines top to bottom with reading order', () => {
    const lines = aggregateLines(
      [span('Second', { top: 130 }), span('First', { top: 100 }), span('Third', { top: 160 })],
      2,
      options
    );

    expect(lines.map((l) => l.text)).toEqual(['First', 'Second', 'Third']);
    expect(lines.map((l) => l.order)).toEqual([0, 1, 2]);
    expect(lines.every((l) => l.pageIndex === 2)).toBe(true);
  });

  it('uses the largest span for size and boldness', () => {
    const [headingLine] = aggregateLines(
      [span('Heading', { size: 14, bold: true, top: 100 }), span('note', { size: 12, x: 200, top: 101 })],
      0,
      options
    );
    expect(headingLine.fontSize).toBe(14);
    expect(headingLine.bold).toBe(true);

    const [plainLine] = aggregateLines(
      [span('Heading', { size: 14, top: 100 }), span('note', { size: 12, bold: true, x: 200, top: 101 })],
      0,
      options
    );
    expect(plainLine.bold).toBe(false);
  });

  it('merges spans up to the tolerance times the smaller height apart', () => {
    // 20pt span: midpoint 110. 12pt span: 0.5 * 12 = 6pt of tolerance.
    const atLimit = aggregateLines(
      [span('Large', { size: 20, top: 100 }), span('small', { size: 12, x: 200, top: 110 })],
      0,
      options
    );
    expect(atLimit.map((l) => l.text)).toEqual(['Large small']);

    const pastLimit = aggregateLines(
      [span('Large', { size: 20, top: 100 }), span('small', { size: 12, x: 200, top: 110.5 })],
      0,
      options
    );
    expect(pastLimit.map((l) => l.text)).toEqual(['Large', 'small']);
  });

  it('measures the tolerance against the smaller span', () => {
    // 8pt apart: inside half the 20pt height, outside half the 12pt height.
    const lines = aggregateLines(
      [span('Large', { size: 20, top: 100 }), span('small', { size: 12, x: 200, top: 112 })],
      0,
      options
    );
    expect(lines.map((l) => l.text)).toEqual(['Large', 'small']);
  });

  it('trims span text before joining', () => {
    const [joined] = aggregateLines([span(' Part ', { x: 72 }), span(' One ', { x: 120 })], 0, options);
    expect(joined.text).toBe('Part One');
  });

  it('uses the supplied bold detector', () => {
    const [result] = aggregateLines([span('Plain')], 0, { ...options, isBold: () => true });
    expect(result.bold).toBe(true);
  });

  it('drops blank and malformed spans', () => {
    const lines = aggregateLines(
      [span('   '), { ...span('Broken'), fontSize: Number.NaN }, span('Kept', { top: 200 })],
      0,
      options
    );
    expect(lines.map((l) => l.text)).toEqual(['Kept']);
    expect(aggregateLines([], 0, options)).toEqual([]);
  });
});

describe('isWellFormedSpan', () => {
  it('rejects non-finite coordinates and non-positive sizes', () => {
    expect(isWellFormedSpan(span('ok'))).toBe(true);
    expect(isWellFormedSpan({ ...span('x'), fontSize: 0 })).toBe(false);
    expect(isWellFormedSpan({ ...span('x'), bbox: { x0: 0, y0: Number.POSITIVE_INFINITY, x1: 1, y1: 1 } })).toBe(false);
  });
});
