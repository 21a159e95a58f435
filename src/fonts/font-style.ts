import type { Span } from '../types/pdf.js';

export type FontStyle = 'normal' | 'italic' | 'oblique';

/** Weights at or above this are treated as bold (semibold included). */
export const BOLD_WEIGHT_THRESHOLD = 600;

function hasToken(s: string, token: string): boolean {
  if (!s) return false;
  return s.includes(token);
}

function hasWord(s: string, word: string): boolean {
  if (!s) return false;
  return new RegExp(`(^|[^a-z0-9])${word}([^a-z0-9]|$)`, 'i').test(s);
}

/**
 * Embedded subset fonts carry a six-letter tag, e.g. `BCDFEE+Calibri-Bold`.
 */
export function stripSubsetPrefix(name: string): string {
  return (name || '').replace(/^[A-Z]{6}\+/, '');
}

export function deriveFontWeightFromName(name: string): number {
  const s = stripSubsetPrefix(name).toLowerCase();

  const num = s.match(/(^|[^0-9])([1-9]00)([^0-9]|$)/);
  if (num) return Number(num[2]);

  if (hasToken(s, 'thin') || hasToken(s, 'hairline')) return 100;
  if (hasToken(s, 'extralight') || hasToken(s, 'ultralight') || hasToken(s, 'extra light') || hasToken(s, 'ultra light')) return 200;
  if (hasToken(s, 'light')) return 300;
  if (hasToken(s, 'semibold') || hasToken(s, 'demibold') || hasToken(s, 'demi bold') || hasWord(s, 'demi') || hasWord(s, 'sb')) return 600;
  if (hasToken(s, 'extrabold') || hasToken(s, 'ultrabold') || hasToken(s, 'extra bold') || hasToken(s, 'ultra bold')) return 800;
  if (hasToken(s, 'black') || hasToken(s, 'heavy')) return 900;
  if (hasToken(s, 'bold') || hasWord(s, 'bd')) return 700;
  if (hasToken(s, 'medium') || hasWord(s, 'md')) return 500;

  return 400;
}

export function deriveFontStyleFromName(name: string): FontStyle {
  const s = stripSubsetPrefix(name).toLowerCase();

  if (hasToken(s, 'italic') || hasWord(s, 'it') || hasWord(s, 'ital')) return 'italic';
  if (hasToken(s, 'oblique') || hasWord(s, 'obl')) return 'oblique';
  return 'normal';
}

/**
 * Combines what the font name, the family and the library's own flags say
 * about a font. `bold` is the pdf.js font flag; `black` marks heavy faces.
 */
export function deriveFontWeightAndStyle(args: {
  fontName?: string;
  fontFamily?: string;
  bold?: boolean;
  black?: boolean;
  italic?: boolean;
}): { fontWeight: number; fontStyle: FontStyle } {
  const nameWeight = Math.max(
    deriveFontWeightFromName(args.fontName || ''),
    deriveFontWeightFromName(args.fontFamily || '')
  );
  const flagWeight = args.black ? 900 : args.bold ? 700 : 0;

  const nameStyle = deriveFontStyleFromName(args.fontName || '');
  const derivedStyle: FontStyle = nameStyle !== 'normal' ? nameStyle : deriveFontStyleFromName(args.fontFamily || '');

  return {
    fontWeight: Math.max(nameWeight, flagWeight),
    fontStyle: args.italic ? 'italic' : derivedStyle
  };
}

/** Default bold capability: the span's weight, or its font name when the weight was never derived. */
export function isBoldSpan(span: Span): boolean {
  if (span.fontWeight >= BOLD_WEIGHT_THRESHOLD) return true;
  return deriveFontWeightFromName(span.fontName) >= BOLD_WEIGHT_THRESHOLD;
}
