import type { Dirent } from 'fs';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ExtractionResult } from '../types/outline.js';
import { OutlineExtractionError, describeError } from '../core/errors.js';
import { outputFileName, serializeExtractionResult } from '../output/json-serializer.js';

export interface DocumentExtractor {
  extract(data: Uint8Array): Promise<ExtractionResult>;
}

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  /** Called once per document, so no parser or profile state is shared between documents. */
  createExtractor: () => DocumentExtractor;
  maxConcurrentDocuments?: number;
  quiet?: boolean;
}

export type DocumentOutcome =
  | { file: string; status: 'processed'; outputPath: string; title: string; headings: number }
  | { file: string; status: 'failed'; error: string; code?: string };

export interface BatchSummary {
  inputDir: string;
  outputDir: string;
  skipped: string[];
  outcomes: DocumentOutcome[];
  processed: number;
  failed: number;
}

function createLogger(quiet: boolean | undefined): (message: string) => void {
  return (message) => {
    if (!quiet) console.log(message);
  };
}

export function isPdfFileName(name: string): boolean {
  return name.toLowerCase().endsWith('.pdf');
}

export async function listPdfFiles(inputDir: string): Promise<{ pdfs: string[]; skipped: string[] }> {
  let entries: Dirent[];
  try {
    entries = await readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    throw new Error(`Cannot read input directory ${inputDir}: ${describeError(error)}`, { cause: error });
  }

  const names = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  return {
    pdfs: names.filter(isPdfFileName),
    skipped: names.filter((name) => !isPdfFileName(name))
  };
}

async function processDocument(file: string, options: BatchOptions): Promise<DocumentOutcome> {
  const log = createLogger(options.quiet);
  log(`📄 Processing file: ${file}`);

  try {
    const data = await readFile(join(options.inputDir, file));
    const result = await options.createExtractor().extract(new Uint8Array(data));

    const outputPath = join(options.outputDir, outputFileName(file));
    await writeFile(outputPath, serializeExtractionResult(result), 'utf-8');

    log(`   ✓ Processed: ${file} (${result.outline.length} headings)`);
    return {
      file,
      status: 'processed',
      outputPath,
      title: result.title,
      headings: result.outline.length
    };
  } catch (error) {
    const message = describeError(error);
    console.error(`   ✗ Error processing ${file}: ${message}`);
    return {
      file,
      status: 'failed',
      error: message,
      code: error instanceof OutlineExtractionError ? error.code : undefined
    };
  }
}

async function runWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrent: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const limit = Number.isFinite(maxConcurrent) ? Math.max(1, Math.floor(maxConcurrent)) : 1;
  let next = 0;

  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index]);
    }
  });

  await Promise.all(runners);
  return results;
}

/**
 * Writes one `<name>.json` per PDF in `inputDir`. A document that fails is
 * logged and counted; it never stops the others.
 */
export async function processDirectory(options: BatchOptions): Promise<BatchSummary> {
  const log = createLogger(options.quiet);

  const { pdfs, skipped } = await listPdfFiles(options.inputDir);
  await mkdir(options.outputDir, { recursive: true });

  log(`📁 Files in input dir (${options.inputDir}): ${pdfs.length} PDF, ${skipped.length} other`);
  for (const name of skipped) {
    log(`   skipping non-PDF file: ${name}`);
  }

  const outcomes = await runWithConcurrency(pdfs, options.maxConcurrentDocuments ?? 1, (file) =>
    processDocument(file, options)
  );

  const processed = outcomes.filter((o) => o.status === 'processed').length;
  return {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    skipped,
    outcomes,
    processed,
    failed: outcomes.length - processed
  };
}
