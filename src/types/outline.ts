import type { Span } from './pdf.js';

export type HeadingLevel = 'H1' | 'H2' | 'H3';

export const HEADING_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

export interface Line {
  readonly spans: readonly Span[];
  readonly text: string;
  readonly fontSize: number;
  readonly bold: boolean;
  readonly top: number;
  readonly left: number;
  readonly pageIndex: number;
  /** Position of the line within its page, in reading order. */
  readonly order: number;
  readonly charCount: number;
}

export interface LevelThreshold {
  level: HeadingLevel;
  size: number;
}

export interface StyleProfile {
  bodySize: number;
  /** At most three entries, ordered H1, H2, H3. */
  levels: LevelThreshold[];
  sizeHistogram: Map<number, number>;
}

export interface HeadingRecord {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface ExtractionResult {
  title: string;
  outline: HeadingRecord[];
}

export type NotHeadingReason = 'title' | 'empty' | 'noise' | 'no-level' | 'weak-emphasis';

export type HeadingDecision =
  | { kind: 'heading'; level: HeadingLevel }
  | { kind: 'not-heading'; reason: NotHeadingReason };

export interface TitleDetection {
  title: string;
  line: Line | null;
}

/** What the classifier decided for one line, with the values it decided on. */
export interface LineDecision {
  text: string;
  /** Rounded font size. */
  size: number;
  bold: boolean;
  page: number;
  decision: HeadingDecision;
}

/** A heading still carrying the position it was found at. */
export interface PositionedHeading {
  record: HeadingRecord;
  pageIndex: number;
  order: number;
}
