export interface PDFDocument {
  pageCount: number;
  metadata: PDFMetadata;
  pages: PDFPage[];
}

export interface PDFMetadata {
  title?: string;
}

export interface PDFPage {
  pageIndex: number;
  width: number;
  height: number;
  spans: Span[];
}

/**
 * Top-down page coordinates: y grows towards the bottom of the page,
 * so `y0` is the top edge and `y1` the bottom edge.
 */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Smallest unit of text reported by the PDF library, together with the
 * font it was drawn in.
 */
export interface Span {
  readonly text: string;
  readonly fontSize: number;
  readonly fontName: string;
  readonly fontWeight: number;
  readonly fontStyle: 'normal' | 'italic' | 'oblique';
  readonly bbox: Readonly<BoundingBox>;
  readonly pageIndex: number;
}

export type PdfjsSource = 'bundled' | 'official';

export interface PDFParserOptions {
  /** Load each page's fonts so spans carry real font names (e.g. `Arial-BoldMT`). */
  resolveFontNames: boolean;
  pdfjsSource?: PdfjsSource;
}
