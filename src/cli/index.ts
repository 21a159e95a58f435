#!/usr/bin/env node
/**
 * pdf-outline CLI
 *
 * Reads every PDF in the input directory and writes one JSON outline per
 * document to the output directory.
 */

import 'dotenv/config';
import { ConfigPresets, PDFOutline, formatLineDecision } from '../index.js';
import { processDirectory } from '../batch/batch-processor.js';
import { resolveCliConfig, USAGE } from './cli-config.js';
import type { LineDecision } from '../types/outline.js';

function traceDecision(entry: LineDecision): void {
  console.log(`   ${formatLineDecision(entry)}`);
}

async function main(): Promise<void> {
  const config = resolveCliConfig(process.argv.slice(2), process.env);
  if (config.help) {
    console.log(USAGE);
    return;
  }

  const preset = ConfigPresets[config.preset];
  const summary = await processDirectory({
    inputDir: config.inputDir,
    outputDir: config.outputDir,
    maxConcurrentDocuments: config.maxConcurrentDocuments,
    quiet: config.quiet,
    createExtractor: () =>
      new PDFOutline({
        ...preset,
        outline: {
          ...preset.outline,
          pageBase: config.pageBase,
          onDecision: config.verbose ? traceDecision : undefined
        },
        pdfjsSource: config.pdfjsSource,
        useMetadataTitle: config.useMetadataTitle
      })
  });

  if (!config.quiet) {
    console.log('='.repeat(60));
    console.log(`✓ ${summary.processed} processed, ✗ ${summary.failed} failed -> ${summary.outputDir}`);
  }
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
