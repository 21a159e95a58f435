import type {
  BoldDetector,
  ChainablePDFOutline,
  ExtractionProgress,
  OutlineOptions,
  OutlinePreset,
  PDFOutlineConfig,
  ProgressCallback
} from './types/config.js';
import type { ExtractionResult } from './types/outline.js';
import type { PdfjsSource } from './types/pdf.js';
import { PDFParser, type PageFeed } from './core/pdf-parser.js';
import { extractOutline } from './outline/engine.js';
import { OUTLINE_PRESETS } from './outline/options.js';
import { cleanLineText } from './outline/text-normalizer.js';

// Convenience configuration presets
export const ConfigPresets: Record<OutlinePreset, PDFOutlineConfig> = {
  /**
   * Default thresholds: bold or clearly larger lines at the document's
   * three largest sizes become headings
   */
  balanced: {
    outline: { ...OUTLINE_PRESETS.balanced }
  },

  /**
   * Bold-only headings and a more demanding title
   * For documents with large decorative text
   */
  strict: {
    outline: { ...OUTLINE_PRESETS.strict }
  },

  /**
   * Loose size matching
   * For scanned-then-OCRed or otherwise noisy font sizes
   */
  lenient: {
    outline: { ...OUTLINE_PRESETS.lenient }
  }
};

export class PDFOutline implements ChainablePDFOutline {
  private config: PDFOutlineConfig;
  private feed: PageFeed;
  private readonly customFeed: boolean;

  constructor(config: PDFOutlineConfig = {}, feed?: PageFeed) {
    this.config = {
      resolveFontNames: true,
      pdfjsSource: 'bundled',
      useMetadataTitle: false,
      ...config,
      outline: { ...config.outline }
    };
    this.customFeed = feed !== undefined;
    this.feed = feed ?? this.createParser();
  }

  private createParser(): PDFParser {
    return new PDFParser({
      resolveFontNames: this.config.resolveFontNames,
      pdfjsSource: this.config.pdfjsSource
    });
  }

  private updateParser(): void {
    if (!this.customFeed) {
      this.feed = this.createParser();
    }
  }

  private setOutlineOption<K extends keyof OutlineOptions>(key: K, value: OutlineOptions[K]): this {
    const next: Partial<OutlineOptions> = { ...this.config.outline };
    next[key] = value;
    this.config.outline = next;
    return this;
  }

  // Chainable configuration methods
  setPageBase(base: 0 | 1): this {
    return this.setOutlineOption('pageBase', base);
  }

  setEmphasisMargin(points: number): this {
    return this.setOutlineOption('emphasisMargin', points);
  }

  setTitleMinMargin(points: number): this {
    return this.setOutlineOption('titleMinMargin', points);
  }

  setBoldDetector(detector: BoldDetector): this {
    return this.setOutlineOption('isBold', detector);
  }

  setPdfjsSource(source: PdfjsSource): this {
    this.config.pdfjsSource = source;
    this.updateParser();
    return this;
  }

  resolveFontNames(enabled: boolean = true): this {
    this.config.resolveFontNames = enabled;
    this.updateParser();
    return this;
  }

  useMetadataTitle(enabled: boolean = true): this {
    this.config.useMetadataTitle = enabled;
    return this;
  }

  applyPreset(preset: OutlinePreset): this {
    this.config.outline = { ...this.config.outline, ...ConfigPresets[preset].outline };
    return this;
  }

  getConfig(): Readonly<PDFOutlineConfig> {
    return { ...this.config, outline: { ...this.config.outline } };
  }

  /**
   * Extracts the title and outline of one PDF. Throws
   * `UnreadableDocumentError` when the bytes cannot be opened; a missing
   * title or an empty outline is a normal result.
   */
  async extract(pdfData: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<ExtractionResult> {
    this.reportProgress(progressCallback, {
      stage: 'parsing',
      progress: 0,
      message: 'Parsing PDF document...'
    });

    const document = await this.feed.parse(pdfData);

    this.reportProgress(progressCallback, {
      stage: 'parsing',
      progress: 100,
      totalPages: document.pageCount,
      message: `Parsed ${document.pageCount} pages`
    });

    const result = extractOutline(
      document.pages.map((page) => page.spans),
      this.config.outline,
      (stage) => {
        this.reportProgress(progressCallback, {
          stage,
          progress: 0,
          totalPages: document.pageCount,
          message: stage === 'profiling' ? 'Measuring font sizes...' : 'Classifying headings...'
        });
      }
    );

    const metadataTitle = document.metadata.title ? cleanLineText(document.metadata.title) : '';
    const useFallback = result.title === '' && this.config.useMetadataTitle === true && metadataTitle !== '';
    const title = useFallback ? metadataTitle : result.title;
    // The title never doubles as a heading, whichever way it was found.
    const outline = useFallback ? result.outline.filter((heading) => heading.text !== metadataTitle) : result.outline;

    this.reportProgress(progressCallback, {
      stage: 'complete',
      progress: 100,
      totalPages: document.pageCount,
      message: `Found ${outline.length} headings`
    });

    return { title, outline };
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: ExtractionProgress): void {
    if (!callback) return;
    try {
      callback(progress);
    } catch (error) {
      console.warn('Progress callback threw:', error);
    }
  }
}

export { PDFParser } from './core/pdf-parser.js';
export type { PageFeed } from './core/pdf-parser.js';
export { UnPDFWrapper } from './core/unpdf-wrapper.js';
export { PDFJSTextExtractor } from './core/pdfjs-text-extractor.js';
export { OutlineExtractionError, UnreadableDocumentError, DocumentNotLoadedError } from './core/errors.js';
export { aggregateLines, isWellFormedSpan } from './core/layout/line-aggregator.js';
export { StyleProfiler, buildStyleProfile, roundFontSize } from './core/layout/stats.js';
export { detectTitle } from './outline/title-detector.js';
export { classifyLine, classifyLines, formatLineDecision } from './outline/heading-classifier.js';
export { assembleOutline } from './outline/outline-assembler.js';
export { extractOutline, extractOutlineFromLines } from './outline/engine.js';
export { DEFAULT_OUTLINE_OPTIONS, OUTLINE_PRESETS, resolveOutlineOptions } from './outline/options.js';
export { cleanLineText, DEFAULT_IGNORE_PATTERNS } from './outline/text-normalizer.js';
export { isBoldSpan, deriveFontWeightFromName, deriveFontWeightAndStyle } from './fonts/font-style.js';
export { serializeExtractionResult, toOutlineRecord, outputFileName } from './output/json-serializer.js';
export { processDirectory } from './batch/batch-processor.js';
export type { BatchOptions, BatchSummary, DocumentExtractor, DocumentOutcome } from './batch/batch-processor.js';
export type * from './types/index.js';
export { HEADING_LEVELS } from './types/outline.js';
