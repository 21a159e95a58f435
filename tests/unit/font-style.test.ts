import { describe, it, expect } from 'vitest';
import {
  deriveFontStyleFromName,
  deriveFontWeightAndStyle,
  deriveFontWeightFromName,
  isBoldSpan,
  stripSubsetPrefix
} from '../../src/fonts/font-style.js';
import { span } from '../helpers/fixtures.js';

describe('font-style', () => {
  it('strips the subset tag from embedded font names', () => {
    expect(stripSubsetPrefix('BCDFEE+Calibri-Bold')).toBe('Calibri-Bold');
    expect(stripSubsetPrefix('Calibri')).toBe('Calibri');
  });

  it('derives weights from common naming conventions', () => {
    expect(deriveFontWeightFromName('BCDFEE+Calibri-Bold')).toBe(700);
    expect(deriveFontWeightFromName('Arial-BoldMT')).toBe(700);
    expect(deriveFontWeightFromName('Helvetica')).toBe(400);
    expect(deriveFontWeightFromName('Roboto-Light')).toBe(300);
    expect(deriveFontWeightFromName('OpenSans-SemiBold')).toBe(600);
    expect(deriveFontWeightFromName('Arial-Black')).toBe(900);
    expect(deriveFontWeightFromName('Inter-900')).toBe(900);
    expect(deriveFontWeightFromName('Roboto-Medium')).toBe(500);
  });

  it('derives italic and oblique styles', () => {
    expect(deriveFontStyleFromName('Times-Italic')).toBe('italic');
    expect(deriveFontStyleFromName('Helvetica-Oblique')).toBe('oblique');
    expect(deriveFontStyleFromName('Times-Roman')).toBe('normal');
  });

  it('lets library flags raise the weight of generic family names', () => {
    expect(deriveFontWeightAndStyle({ fontFamily: 'sans-serif', bold: true })).toEqual({
      fontWeight: 700,
      fontStyle: 'normal'
    });
    expect(deriveFontWeightAndStyle({ fontFamily: 'sans-serif', black: true, italic: true })).toEqual({
      fontWeight: 900,
      fontStyle: 'italic'
    });
    expect(deriveFontWeightAndStyle({})).toEqual({ fontWeight: 400, fontStyle: 'normal' });
  });

  describe('isBoldSpan', () => {
    it('accepts a heavy weight or a bold font name', () => {
      expect(isBoldSpan({ ...span('A'), fontWeight: 700, fontName: 'g_d0_f1' })).toBe(true);
      expect(isBoldSpan({ ...span('A'), fontWeight: 400, fontName: 'Arial-BoldMT' })).toBe(true);
      expect(isBoldSpan({ ...span('A'), fontWeight: 600, fontName: 'g_d0_f2' })).toBe(true);
    });

    it('rejects regular and medium faces', () => {
      expect(isBoldSpan({ ...span('A'), fontWeight: 400, fontName: 'Helvetica' })).toBe(false);
      expect(isBoldSpan({ ...span('A'), fontWeight: 500, fontName: 'Roboto-Medium' })).toBe(false);
    });
  });
});
