import type { OutlinePreset } from '../types/config.js';
import type { PdfjsSource } from '../types/pdf.js';
import { isOutlinePreset } from '../outline/options.js';

export interface CliConfig {
  inputDir: string;
  outputDir: string;
  maxConcurrentDocuments: number;
  pageBase: 0 | 1;
  preset: OutlinePreset;
  pdfjsSource: PdfjsSource;
  useMetadataTitle: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

type CliArgs = {
  [K in keyof CliConfig]?: string | boolean;
};

export const USAGE = `Usage: pdf-outline [options]

Writes <name>.json with the title and H1-H3 outline of every PDF in the input directory.

Options:
  --input <dir>          Directory to read PDFs from (env INPUT_DIR, default "input")
  --output <dir>         Directory to write JSON to (env OUTPUT_DIR, default "output")
  --concurrency <n>      Documents processed at once (env MAX_CONCURRENT_DOCUMENTS, default 1)
  --page-base <0|1>      Number of the first page (env PAGE_BASE, default 1)
  --preset <name>        balanced | strict | lenient (env OUTLINE_PRESET, default balanced)
  --pdfjs <source>       bundled | official (env PDFJS_SOURCE, default bundled)
  --metadata-title       Fall back to the document's metadata title
  --quiet                Only log failures
  --verbose              Log the decision for every line (env VERBOSE)
  --help                 Show this message`;

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {};

  const value = (i: number): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`Missing value for ${argv[i]}`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--input') out.inputDir = value(i++);
    else if (a === '--output') out.outputDir = value(i++);
    else if (a === '--concurrency') out.maxConcurrentDocuments = value(i++);
    else if (a === '--page-base') out.pageBase = value(i++);
    else if (a === '--preset') out.preset = value(i++);
    else if (a === '--pdfjs') out.pdfjsSource = value(i++);
    else if (a === '--metadata-title') out.useMetadataTitle = true;
    else if (a === '--quiet') out.quiet = true;
    else if (a === '--verbose') out.verbose = true;
    else if (a === '--help' || a === '-h') out.help = true;
    else throw new Error(`Unknown option: ${a}`);
  }

  return out;
}

function pickString(arg: string | boolean | undefined, envValue: string | undefined, fallback: string): string {
  if (typeof arg === 'string' && arg.length > 0) return arg;
  if (arg !== undefined && typeof arg !== 'string') return fallback;
  if (envValue !== undefined && envValue.trim().length > 0) return envValue.trim();
  return fallback;
}

function pickFlag(arg: string | boolean | undefined, envValue: string | undefined): boolean {
  if (arg === true) return true;
  return envValue === '1' || envValue?.toLowerCase() === 'true';
}

export function resolveCliConfig(argv: string[], env: NodeJS.ProcessEnv): CliConfig {
  const args = parseArgs(argv);

  const concurrencyRaw = pickString(args.maxConcurrentDocuments, env.MAX_CONCURRENT_DOCUMENTS, '1');
  const maxConcurrentDocuments = Number(concurrencyRaw);
  if (!Number.isInteger(maxConcurrentDocuments) || maxConcurrentDocuments < 1) {
    throw new Error(`Invalid concurrency: ${concurrencyRaw} (expected a positive integer)`);
  }

  const pageBaseRaw = pickString(args.pageBase, env.PAGE_BASE, '1');
  if (pageBaseRaw !== '0' && pageBaseRaw !== '1') {
    throw new Error(`Invalid page base: ${pageBaseRaw} (expected 0 or 1)`);
  }

  const preset = pickString(args.preset, env.OUTLINE_PRESET, 'balanced');
  if (!isOutlinePreset(preset)) {
    throw new Error(`Unknown preset: ${preset} (expected balanced, strict or lenient)`);
  }

  const pdfjsSource = pickString(args.pdfjsSource, env.PDFJS_SOURCE, 'bundled');
  if (pdfjsSource !== 'bundled' && pdfjsSource !== 'official') {
    throw new Error(`Unknown pdf.js source: ${pdfjsSource} (expected bundled or official)`);
  }

  return {
    inputDir: pickString(args.inputDir, env.INPUT_DIR, 'input'),
    outputDir: pickString(args.outputDir, env.OUTPUT_DIR, 'output'),
    maxConcurrentDocuments,
    pageBase: pageBaseRaw === '0' ? 0 : 1,
    preset,
    pdfjsSource,
    useMetadataTitle: pickFlag(args.useMetadataTitle, env.USE_METADATA_TITLE),
    quiet: pickFlag(args.quiet, env.QUIET),
    verbose: pickFlag(args.verbose, env.VERBOSE),
    help: args.help === true
  };
}
