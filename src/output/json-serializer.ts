import type { ExtractionResult } from '../types/outline.js';

/**
 * The on-disk record: exactly `title` and `outline`, each outline entry
 * exactly `level`, `text` and `page`, in that key order.
 */
export function toOutlineRecord(result: ExtractionResult): ExtractionResult {
  return {
    title: result.title,
    outline: result.outline.map((heading) => ({
      level: heading.level,
      text: heading.text,
      page: heading.page
    }))
  };
}

export function serializeExtractionResult(result: ExtractionResult): string {
  return JSON.stringify(toOutlineRecord(result), null, 2);
}

export function outputFileName(inputFileName: string): string {
  const dot = inputFileName.lastIndexOf('.');
  const base = dot > 0 ? inputFileName.slice(0, dot) : inputFileName;
  return `${base}.json`;
}
