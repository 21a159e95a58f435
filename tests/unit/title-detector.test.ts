import { describe, it, expect } from 'vitest';
import { detectTitle } from '../../src/outline/title-detector.js';
import { DEFAULT_OUTLINE_OPTIONS } from '../../src/outline/options.js';
import type { StyleProfile } from '../../src/types/outline.js';
import { line } from '../helpers/fixtures.js';

const profile: StyleProfile = { bodySize: 12, levels: [], sizeHistogram: new Map() };

describe('detectTitle', () => {
  it('picks the largest line on the first page', () => {
    const title = line('Annual Report', { size: 26, top: 300, order: 3 });
    const result = detectTitle(
      [line('Header', { size: 14, top: 40 }), title, line('Body text', { top: 400, order: 4 })],
      profile,
      DEFAULT_OUTLINE_OPTIONS
    );

    expect(result.title).toBe('Annual Report');
    expect(result.line).toBe(title);
  });

  it('breaks size ties by position on the page', () => {
    const upper = line('Upper', { size: 20, top: 100, order: 1 });
    const lower = line('Lower', { size: 20, top: 200, order: 2 });
    expect(detectTitle([lower, upper], profile, DEFAULT_OUTLINE_OPTIONS).title).toBe('Upper');

    const first = line('Left', { size: 20, top: 100, order: 0 });
    const second = line('Right', { size: 20, top: 100, order: 1 });
    expect(detectTitle([second, first], profile, DEFAULT_OUTLINE_OPTIONS).title).toBe('Left');
  });

  it('returns no title when nothing stands out from body text', () => {
    const result = detectTitle([line('Slightly larger', { size: 13 })], profile, DEFAULT_OUTLINE_OPTIONS);
    expect(result).toEqual({ title: '', line: null });
  });

  it('skips noise, punctuation and too-short candidates', () => {
    const lines = [
      line('1', { size: 40, top: 20 }),
      line('***', { size: 36, top: 30 }),
      line('AB', { size: 32, top: 40 }),
      line('Quarterly  Review ', { size: 28, top: 60 })
    ];

    expect(detectTitle(lines, profile, { ...DEFAULT_OUTLINE_OPTIONS, minTitleLength: 3 }).title).toBe(
      'Quarterly Review'
    );
  });

  it('returns no title for an empty first page', () => {
    expect(detectTitle([], profile, DEFAULT_OUTLINE_OPTIONS)).toEqual({ title: '', line: null });
  });
});
