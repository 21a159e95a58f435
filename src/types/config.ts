import type { PdfjsSource, Span } from './pdf.js';
import type { LineDecision } from './outline.js';

export type BoldDetector = (span: Span) => boolean;

export interface OutlineOptions {
  /** Fraction of the smaller span height two vertical midpoints may differ by and still share a line. */
  lineMergeTolerance: number;
  /** Font sizes are rounded to a multiple of this step before they are compared. */
  sizeRoundingStep: number;
  /** Largest difference between a rounded line size and a level size that still counts as a match. */
  sizeTolerance: number;
  /** Points the title must exceed the body size by. */
  titleMinMargin: number;
  /** Points over body size that make a non-bold line a heading. */
  emphasisMargin: number;
  minTitleLength: number;
  pageBase: 0 | 1;
  ignorePatterns: RegExp[];
  isBold: BoldDetector;
  /** Called once per line with the classifier's decision; used for tracing thresholds. */
  onDecision?: (entry: LineDecision) => void;
}

export type OutlinePreset = 'balanced' | 'strict' | 'lenient';

export interface PDFOutlineConfig {
  outline?: Partial<OutlineOptions>;

  // Parser settings
  resolveFontNames?: boolean;
  pdfjsSource?: PdfjsSource;

  /** Use the title from the document info dictionary when none is detected. */
  useMetadataTitle?: boolean;
}

export interface ExtractionProgress {
  stage: 'parsing' | 'profiling' | 'classifying' | 'complete';
  progress: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: ExtractionProgress) => void;

export interface ChainablePDFOutline {
  setPageBase(base: 0 | 1): ChainablePDFOutline;
  setEmphasisMargin(points: number): ChainablePDFOutline;
  setTitleMinMargin(points: number): ChainablePDFOutline;
  setBoldDetector(detector: BoldDetector): ChainablePDFOutline;
  setPdfjsSource(source: PdfjsSource): ChainablePDFOutline;
  resolveFontNames(enabled?: boolean): ChainablePDFOutline;
  useMetadataTitle(enabled?: boolean): ChainablePDFOutline;
  applyPreset(preset: OutlinePreset): ChainablePDFOutline;
}
