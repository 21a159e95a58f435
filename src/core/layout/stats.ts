import type { LevelThreshold, Line, StyleProfile } from '../../types/outline.js';
import { HEADING_LEVELS } from '../../types/outline.js';

export interface StyleProfileOptions {
  sizeRoundingStep: number;
}

export function roundFontSize(size: number, step: number): number {
  if (!(step > 0)) return size;
  // Re-rounding to 2 decimals keeps steps like 0.5 from drifting (10.5 vs 10.500000001).
  return Math.round(Math.round(size / step) * step * 100) / 100;
}

export const emptyStyleProfile = (): StyleProfile => ({
  bodySize: 0,
  levels: [],
  sizeHistogram: new Map()
});

/**
 * Document-wide font statistics. Headings are judged against the body size
 * found here, so every document gets its own profile.
 */
export class StyleProfiler {
  constructor(private readonly options: StyleProfileOptions) {}

  analyze(lines: readonly Line[]): StyleProfile {
    if (lines.length === 0) return emptyStyleProfile();

    const sizeHistogram = this.buildHistogram(lines);
    const bodySize = this.findBodySize(sizeHistogram);

    const larger = [...sizeHistogram.keys()].filter((size) => size > bodySize).sort((a, b) => b - a);
    const levels: LevelThreshold[] = larger.slice(0, HEADING_LEVELS.length).map((size, i) => ({
      level: HEADING_LEVELS[i],
      size
    }));

    return { bodySize, levels, sizeHistogram };
  }

  private buildHistogram(lines: readonly Line[]): Map<number, number> {
    const histogram = new Map<number, number>();
    for (const line of lines) {
      const size = roundFontSize(line.fontSize, this.options.sizeRoundingStep);
      histogram.set(size, (histogram.get(size) || 0) + line.charCount);
    }
    return histogram;
  }

  // Most characters wins; a tie goes to the smaller size.
  private findBodySize(histogram: Map<number, number>): number {
    let bodySize = 0;
    let maxCount = -1;
    for (const [size, count] of histogram) {
      if (count > maxCount || (count === maxCount && size < bodySize)) {
        maxCount = count;
        bodySize = size;
      }
    }
    return bodySize;
  }
}

export function buildStyleProfile(lines: readonly Line[], options: StyleProfileOptions): StyleProfile {
  return new StyleProfiler(options).analyze(lines);
}
