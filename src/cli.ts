#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 *   electoral-roll-ocr <input.pdf> <output.xlsx> [options]
 *   electoral-roll-ocr check
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from './config';
import { logger } from './utils/logger';
import { PDFConverter } from './ocr/pdf-converter';
import { SharpPreprocessor, checkImageToolchain } from './ocr/preprocessor';
import { TesseractEngine, checkTesseract } from './ocr/tesseract-engine';
import { MultiStrategyRecognizer, resolveStrategies } from './ocr/recognizer';
import { ElectoralRollProcessor } from './ocr/processor';
import { OCRLogger } from './ocr/ocr-logger';
import { RecordExtractor } from './extraction/record-extractor';
import { FileDebugSink, NoopDebugSink } from './debug/debug-sink';
import { ExcelWriter } from './export/excel-writer';
import { ConfigurationError, RasterizationError, errorMessage } from './types/errors';
import type { Rasterizer } from './ocr/pdf-converter';
import type { ImagePreprocessor } from './ocr/preprocessor';
import type { RecognitionEngine } from './ocr/tesseract-engine';
import type { SpreadsheetWriter } from './export/excel-writer';
import type { RecognitionStrategy } from './types/ocr';

export const USAGE = `
Electoral roll OCR - scanned electoral roll PDF to voter spreadsheet

Usage:
  electoral-roll-ocr <input.pdf> <output.xlsx> [options]
  electoral-roll-ocr check                      Verify the image and OCR toolchain

Options:
  --dpi <n>             Rasterization DPI (default: ${config.ocr.dpi}; 400-600 for poor scans)
  --workers <n>         Pages processed concurrently (default: ${config.ocr.workers})
  --lang <code>         Tesseract language (default: ${config.ocr.lang})
  --debug-dir <dir>     Debug output directory (default: ${config.debug.dir})
  --no-debug            Do not write debug output
  -h, --help            Show this help

Examples:
  electoral-roll-ocr roll.pdf voters.xlsx
  electoral-roll-ocr roll.pdf voters.xlsx --dpi 400 --workers 4
`;

const VALUE_OPTIONS = new Set(['dpi', 'workers', 'lang', 'debug-dir']);
const FLAGS = new Set(['no-debug', 'help']);

export interface CliDependencies {
  rasterizer: Rasterizer;
  preprocessor: ImagePreprocessor;
  createEngine: (lang: string, workers: number) => RecognitionEngine;
  spreadsheetWriter: SpreadsheetWriter;
  checkImageToolchain: () => Promise<void>;
  checkEngine: (lang: string) => Promise<void>;
}

function defaultDependencies(): CliDependencies {
  return {
    rasterizer: new PDFConverter(),
    preprocessor: new SharpPreprocessor({ minWidth: config.ocr.minWidth }),
    createEngine: (lang, workers) => new TesseractEngine({ lang, maxWorkers: workers }),
    spreadsheetWriter: new ExcelWriter(),
    checkImageToolchain,
    checkEngine: checkTesseract,
  };
}

interface ParsedArgs {
  positional: string[];
  options: Map<string, string>;
  flags: Set<string>;
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h') {
      parsed.flags.add('help');
      continue;
    }
    if (!arg.startsWith('--')) {
      parsed.positional.push(arg);
      continue;
    }

    const name = arg.slice(2);
    if (FLAGS.has(name)) {
      parsed.flags.add(name);
    } else if (VALUE_OPTIONS.has(name)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigurationError(`Option --${name} needs a value`);
      }
      parsed.options.set(name, value);
      i++;
    } else {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

function positiveIntOption(parsed: ParsedArgs, name: string, fallback: number): number {
  const raw = parsed.options.get(name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

async function runCheck(deps: CliDependencies, lang: string): Promise<number> {
  const checks: Array<{ label: string; run: () => Promise<void> }> = [
    { label: 'Image processing (sharp)', run: deps.checkImageToolchain },
    { label: `OCR engine (tesseract.js, ${lang})`, run: () => deps.checkEngine(lang) },
  ];

  let failed = 0;
  console.log('\n🔧 Checking dependencies');
  for (const check of checks) {
    try {
      await check.run();
      console.log(`   ✓ ${check.label}`);
    } catch (error) {
      failed++;
      console.log(`   ✗ ${check.label}: ${errorMessage(error)}`);
    }
  }
  console.log(failed === 0 ? '\nAll dependencies available\n' : `\n${failed} check(s) failed\n`);

  return failed === 0 ? 0 : 1;
}

/**
 * Runs one command and resolves to the process exit code:
 * 0 on success (including a run that found no records), 1 on usage errors
 * and on a document that cannot be rasterized.
 */
export async function runCli(args: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    console.log(USAGE);
    return 1;
  }

  if (parsed.flags.has('help')) {
    console.log(USAGE);
    return 0;
  }

  const lang = parsed.options.get('lang') ?? config.ocr.lang;

  if (parsed.positional[0] === 'check' && parsed.positional.length === 1) {
    return runCheck(deps, lang);
  }

  if (parsed.positional.length !== 2) {
    console.error('❌ Expected an input PDF and an output spreadsheet path');
    console.log(USAGE);
    return 1;
  }

  const [inputPath, outputPath] = parsed.positional;
  let dpi: number;
  let workers: number;
  let strategies: RecognitionStrategy[];
  try {
    if (path.extname(inputPath).toLowerCase() !== '.pdf') {
      throw new ConfigurationError(`Input must be a .pdf file: ${inputPath}`);
    }
    if (path.extname(outputPath).toLowerCase() !== '.xlsx') {
      throw new ConfigurationError(`Output must be a .xlsx file: ${outputPath}`);
    }
    dpi = positiveIntOption(parsed, 'dpi', config.ocr.dpi);
    workers = positiveIntOption(parsed, 'workers', config.ocr.workers);
    strategies = resolveStrategies(config.ocr.strategies);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  try {
    await fs.access(inputPath);
  } catch {
    console.error(`❌ Input file not found: ${inputPath}`);
    return 1;
  }

  const debugEnabled = config.debug.enabled && !parsed.flags.has('no-debug');
  const debugDir = debugEnabled ? parsed.options.get('debug-dir') ?? config.debug.dir : null;

  const engine = deps.createEngine(lang, workers);
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\n⏹️  Interrupt received, finishing pages in progress...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const startTime = Date.now();
  try {
    const processor = new ElectoralRollProcessor({
      rasterizer: deps.rasterizer,
      preprocessor: deps.preprocessor,
      recognizer: new MultiStrategyRecognizer(engine, strategies),
      extractor: new RecordExtractor(),
      debugSink: debugDir ? new FileDebugSink(debugDir) : new NoopDebugSink(),
      spreadsheetWriter: deps.spreadsheetWriter,
    });

    OCRLogger.runStarted({
      source: inputPath,
      output: outputPath,
      dpi,
      workers,
      strategies: strategies.map(strategy => strategy.id),
      debugDir,
    });

    const result = await processor.process({ inputPath, outputPath, dpi, workers, signal: controller.signal });

    OCRLogger.runComplete({
      totalPages: result.summary.totalPages,
      pagesProcessed: result.summary.pagesProcessed,
      totalRecords: result.summary.totalRecords,
      zeroYieldPages: result.summary.zeroYieldPages,
      duration: (Date.now() - startTime) / 1000,
      output: result.spreadsheetWritten ? outputPath : null,
      debugDir,
      aborted: result.summary.aborted,
    });

    if (result.records.length === 0) {
      OCRLogger.zeroRecordsWarning(debugDir);
    }
    return 0;
  } catch (error) {
    if (!(error instanceof RasterizationError)) {
      logger.error({ inputPath, error: errorMessage(error) }, 'Extraction run failed');
    }
    OCRLogger.runFailed(inputPath, errorMessage(error));
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await engine.terminate().catch((error: unknown) => {
      logger.warn({ error: errorMessage(error) }, 'Failed to stop recognition engine');
    });
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      console.error('❌ Unexpected failure:', errorMessage(error));
      process.exit(1);
    }
  );
}
