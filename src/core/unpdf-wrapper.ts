import type {
  PDFDocument,
  PDFMetadata,
  PDFPage,
  PDFParserOptions,
  PdfjsSource
} from '../types/pdf.js';
import { PDFJSTextExtractor, type PDFJSPage } from './pdfjs-text-extractor.js';
import { DocumentNotLoadedError, UnreadableDocumentError, describeError } from './errors.js';

type PDFJSDocument = {
  numPages: number;
  getPage: (pageNumber: number) => Promise<PDFJSPage>;
  getMetadata: () => Promise<{ info: unknown; metadata: unknown }>;
  destroy?: () => Promise<void>;
};

type UnpdfModule = {
  definePDFJSModule?: (pdfjs: () => Promise<unknown>) => Promise<void>;
  getDocumentProxy: (bytes: Uint8Array) => Promise<PDFJSDocument>;
};

function isUnpdfModule(value: unknown): value is UnpdfModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getDocumentProxy' in value &&
    typeof value.getDocumentProxy === 'function'
  );
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null || !(key in info)) return undefined;
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

// The official build is loaded through a runtime specifier so bundlers leave it alone.
const importModule = new Function('specifier', 'return import(specifier)') as (specifier: string) => Promise<unknown>;

let cachedUnpdf: Promise<UnpdfModule> | null = null;
let definedPdfjsSource: PdfjsSource | null = null;

export class UnPDFWrapper {
  private document: PDFJSDocument | null = null;
  private textExtractor: PDFJSTextExtractor;

  constructor(private readonly pdfjsSource: PdfjsSource = 'bundled') {
    this.textExtractor = new PDFJSTextExtractor();
  }

  private async getUnpdf(): Promise<UnpdfModule> {
    if (!cachedUnpdf) {
      cachedUnpdf = import('unpdf')
        .then((mod: unknown) => {
          if (!isUnpdfModule(mod)) {
            throw new Error('unpdf does not expose getDocumentProxy');
          }
          return mod;
        })
        .catch((error: unknown) => {
          cachedUnpdf = null;
          throw error;
        });
    }
    return await cachedUnpdf;
  }

  private async ensurePdfjs(unpdf: UnpdfModule): Promise<void> {
    if (definedPdfjsSource !== null) {
      if (definedPdfjsSource !== this.pdfjsSource) {
        console.warn(
          `UnPDFWrapper: pdf.js is already bound to the ${definedPdfjsSource} build; ignoring request for ${this.pdfjsSource}.`
        );
      }
      return;
    }

    if (this.pdfjsSource === 'official' && typeof unpdf.definePDFJSModule === 'function') {
      // The legacy build runs on Node 20 without extra polyfills.
      await unpdf.definePDFJSModule(() => importModule('pdfjs-dist/legacy/build/pdf.mjs'));
    }
    definedPdfjsSource = this.pdfjsSource;
  }

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    if (data.byteLength === 0) {
      throw new UnreadableDocumentError('input is empty');
    }

    const unpdf = await this.getUnpdf();
    await this.ensurePdfjs(unpdf);

    // pdf.js takes ownership of the buffer it is given.
    const bytes = data instanceof Uint8Array ? new Uint8Array(data) : new Uint8Array(data.slice(0));
    try {
      this.document = await unpdf.getDocumentProxy(bytes);
    } catch (error) {
      throw new UnreadableDocumentError(describeError(error), { cause: error });
    }
  }

  getPageCount(): number {
    if (!this.document) {
      throw new DocumentNotLoadedError();
    }
    return this.document.numPages;
  }

  async getMetadata(): Promise<PDFMetadata> {
    if (!this.document) {
      throw new DocumentNotLoadedError();
    }

    try {
      const { info } = await this.document.getMetadata();
      return { title: readInfoString(info, 'Title') };
    } catch (error) {
      console.warn('Failed to extract metadata:', error);
      return {};
    }
  }

  async parsePage(pageIndex: number, options: PDFParserOptions): Promise<PDFPage> {
    if (!this.document) {
      throw new DocumentNotLoadedError();
    }

    let pdfPage: PDFJSPage;
    try {
      pdfPage = await this.document.getPage(pageIndex + 1);
    } catch (error) {
      throw new UnreadableDocumentError(`page ${pageIndex + 1} could not be loaded (${describeError(error)})`, {
        cause: error
      });
    }

    const viewport = pdfPage.getViewport({ scale: 1.0 });
    const spans = await this.textExtractor.extractSpans(pdfPage, pageIndex, {
      resolveFontNames: options.resolveFontNames
    });

    return {
      pageIndex,
      width: viewport.width,
      height: viewport.height,
      spans
    };
  }

  async parseDocument(data: ArrayBuffer | Uint8Array, options: PDFParserOptions): Promise<PDFDocument> {
    await this.loadDocument(data);

    const pageCount = this.getPageCount();
    const metadata = await this.getMetadata();
    const pages: PDFPage[] = [];

    for (let i = 0; i < pageCount; i++) {
      pages.push(await this.parsePage(i, options));
    }

    return {
      pageCount,
      metadata,
      pages
    };
  }

  async dispose(): Promise<void> {
    const document = this.document;
    this.document = null;
    if (document && typeof document.destroy === 'function') {
      try {
        await document.destroy();
      } catch (error) {
        console.warn('Failed to release PDF document:', error);
      }
    }
  }
}
