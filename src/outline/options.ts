import type { OutlineOptions, OutlinePreset } from '../types/config.js';
import { isBoldSpan } from '../fonts/font-style.js';
import { DEFAULT_IGNORE_PATTERNS } from './text-normalizer.js';

export const DEFAULT_OUTLINE_OPTIONS: Readonly<OutlineOptions> = {
  lineMergeTolerance: 0.5,
  sizeRoundingStep: 1,
  sizeTolerance: 0.1,
  titleMinMargin: 2,
  emphasisMargin: 5,
  minTitleLength: 1,
  pageBase: 1,
  ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
  isBold: isBoldSpan
};

export const OUTLINE_PRESETS: Record<OutlinePreset, Partial<OutlineOptions>> = {
  balanced: {},

  /** Only bold lines become headings; the title must stand well clear of body text. */
  strict: {
    emphasisMargin: Number.POSITIVE_INFINITY,
    titleMinMargin: 4,
    minTitleLength: 3
  },

  /** Looser size matching for documents with noisy font sizes. */
  lenient: {
    emphasisMargin: 2,
    sizeTolerance: 0.5,
    titleMinMargin: 1
  }
};

export function resolveOutlineOptions(overrides: Partial<OutlineOptions> = {}): OutlineOptions {
  return { ...DEFAULT_OUTLINE_OPTIONS, ...overrides };
}

export function isOutlinePreset(value: string): value is OutlinePreset {
  return Object.hasOwn(OUTLINE_PRESETS, value);
}
