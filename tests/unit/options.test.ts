import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OUTLINE_OPTIONS,
  OUTLINE_PRESETS,
  isOutlinePreset,
  resolveOutlineOptions
} from '../../src/outline/options.js';
import { isBoldSpan } from '../../src/fonts/font-style.js';

describe('resolveOutlineOptions', () => {
  it('fills in defaults', () => {
    const options = resolveOutlineOptions();
    expect(options.emphasisMargin).toBe(5);
    expect(options.titleMinMargin).toBe(2);
    expect(options.pageBase).toBe(1);
    expect(options.isBold).toBe(isBoldSpan);
  });

  it('applies overrides without touching the defaults', () => {
    const options = resolveOutlineOptions({ pageBase: 0, ...OUTLINE_PRESETS.strict });
    expect(options.pageBase).toBe(0);
    expect(options.emphasisMargin).toBe(Number.POSITIVE_INFINITY);
    expect(options.minTitleLength).toBe(3);
    expect(DEFAULT_OUTLINE_OPTIONS.pageBase).toBe(1);
  });
});

describe('isOutlinePreset', () => {
  it('accepts only the known preset names', () => {
    expect(isOutlinePreset('balanced')).toBe(true);
    expect(isOutlinePreset('lenient')).toBe(true);
    expect(isOutlinePreset('toString')).toBe(false);
    expect(isOutlinePreset('fast')).toBe(false);
  });
});
