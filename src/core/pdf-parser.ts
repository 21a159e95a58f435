import type { PDFDocument, PDFParserOptions } from '../types/pdf.js';
import { UnPDFWrapper } from './unpdf-wrapper.js';

/**
 * Anything that can turn PDF bytes into pages of spans. The outline engine
 * never sees a PDF library directly; tests swap in their own feed.
 */
export interface PageFeed {
  parse(data: ArrayBuffer | Uint8Array): Promise<PDFDocument>;
}

export class PDFParser implements PageFeed {
  private options: PDFParserOptions;

  constructor(options: Partial<PDFParserOptions> = {}) {
    this.options = {
      resolveFontNames: true,
      pdfjsSource: 'bundled',
      ...options
    };
  }

  /**
   * Each call opens its own document handle, so one parser may serve
   * several documents at the same time.
   */
  async parse(data: ArrayBuffer | Uint8Array): Promise<PDFDocument> {
    const wrapper = new UnPDFWrapper(this.options.pdfjsSource);
    try {
      return await wrapper.parseDocument(data, this.options);
    } finally {
      await wrapper.dispose();
    }
  }
}
