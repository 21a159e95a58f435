import type { Span } from '../types/pdf.js';
import { deriveFontWeightAndStyle } from '../fonts/font-style.js';

export type PDFJSPage = {
  getViewport: (options: { scale: number }) => { width: number; height: number };
  getTextContent: () => Promise<PDFJSTextContent>;
  getOperatorList?: () => Promise<unknown>;
  commonObjs?: PDFJSObjects;
};

type PDFJSObjects = {
  has: (id: string) => boolean;
  get: (id: string) => unknown;
};

export type PDFJSTextContent = {
  items: PDFJSTextItem[];
  styles: Record<string, PDFJSFontStyle>;
};

// Marked-content entries share the items array and carry no `str`.
export type PDFJSTextItem = {
  str?: string;
  transform?: number[];
  fontName?: string;
  width?: number;
  height?: number;
};

type PDFJSFontStyle = {
  fontFamily: string;
};

type ResolvedFont = {
  name: string;
  bold: boolean;
  black: boolean;
  italic: boolean;
};

export interface TextExtractionOptions {
  resolveFontNames: boolean;
}

function isResolvedFontData(value: unknown): value is { name: string; bold?: unknown; black?: unknown; italic?: unknown } {
  return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string';
}

export class PDFJSTextExtractor {
  async extractSpans(
    page: PDFJSPage,
    pageIndex: number,
    options: TextExtractionOptions = { resolveFontNames: true }
  ): Promise<Span[]> {
    const viewport = page.getViewport({ scale: 1.0 });

    // Fonts only land in commonObjs once the page's operator list has been built.
    if (options.resolveFontNames && typeof page.getOperatorList === 'function') {
      try {
        await page.getOperatorList();
      } catch (error) {
        console.warn(`Failed to load fonts for page ${pageIndex + 1}; falling back to style names:`, error);
      }
    }

    let textContent: PDFJSTextContent;
    try {
      textContent = await page.getTextContent();
    } catch (error) {
      console.warn(`Failed to extract text from page ${pageIndex + 1}:`, error);
      return [];
    }

    const fonts = new Map<string, ResolvedFont | null>();
    const spans: Span[] = [];

    for (const item of textContent.items) {
      const span = this.parseTextItem(item, textContent.styles, viewport.height, pageIndex, (id) => {
        if (!fonts.has(id)) fonts.set(id, options.resolveFontNames ? this.resolveFont(page, id) : null);
        return fonts.get(id) ?? null;
      });
      if (span) spans.push(span);
    }

    return spans;
  }

  private parseTextItem(
    item: PDFJSTextItem,
    styles: Record<string, PDFJSFontStyle>,
    pageHeight: number,
    pageIndex: number,
    lookupFont: (id: string) => ResolvedFont | null
  ): Span | null {
    if (typeof item.str !== 'string' || item.str.trim().length === 0) {
      return null;
    }

    // [a, b, c, d, e, f]: e/f are the baseline origin in PDF space (origin bottom-left),
    // the length of (c, d) is the rendered font size.
    const [, , c = 0, d = 1, e = 0, f = 0] = item.transform || [1, 0, 0, 1, 0, 0];
    const itemHeight = typeof item.height === 'number' ? item.height : 0;
    const fontSize = Math.hypot(c, d) || itemHeight;

    const style = item.fontName ? styles[item.fontName] : undefined;
    const resolved = item.fontName ? lookupFont(item.fontName) : null;
    const fontName = resolved?.name || style?.fontFamily || item.fontName || '';
    const { fontWeight, fontStyle } = deriveFontWeightAndStyle({
      fontName: resolved?.name,
      fontFamily: style?.fontFamily,
      bold: resolved?.bold,
      black: resolved?.black,
      italic: resolved?.italic
    });

    const width = typeof item.width === 'number' ? item.width : item.str.length * fontSize * 0.6;
    const height = itemHeight > 0 ? itemHeight : fontSize;
    const baseline = pageHeight - f;

    return {
      text: item.str,
      fontSize,
      fontName,
      fontWeight,
      fontStyle,
      bbox: {
        x0: e,
        y0: baseline - height,
        x1: e + width,
        y1: baseline
      },
      pageIndex
    };
  }

  private resolveFont(page: PDFJSPage, id: string): ResolvedFont | null {
    const objs = page.commonObjs;
    if (!objs || !objs.has(id)) return null;
    try {
      const data = objs.get(id);
      if (!isResolvedFontData(data)) return null;
      return {
        name: data.name,
        bold: data.bold === true,
        black: data.black === true,
        italic: data.italic === true
      };
    } catch (error) {
      console.warn(`Font ${id} could not be resolved:`, error);
      return null;
    }
  }
}
