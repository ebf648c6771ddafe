import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { processInParallel } from '../utils/parallel';
import { OCRLogger } from './ocr-logger';
import { TextNormalizer } from './normalizer';
import { errorMessage } from '../types/errors';
import { METADATA_PAGES, applyRollMetadata, extractRollMetadata } from '../extraction/roll-metadata';
import type { Rasterizer } from './pdf-converter';
import type { ImagePreprocessor } from './preprocessor';
import type { MultiStrategyRecognizer } from './recognizer';
import type { RecordExtractor } from '../extraction/record-extractor';
import type { DebugSink } from '../debug/debug-sink';
import type { SpreadsheetWriter } from '../export/excel-writer';
import type { ExtractionSummary, PageSummary } from '../types/summary';
import type {
  PageExtraction,
  PageResult,
  RasterPage,
  RecognitionAttempt,
  RollMetadata,
  VoterRecord,
} from '../types/ocr';

export interface ProcessorDependencies {
  rasterizer: Rasterizer;
  preprocessor: ImagePreprocessor;
  recognizer: MultiStrategyRecognizer;
  extractor: RecordExtractor;
  debugSink: DebugSink;
  spreadsheetWriter: SpreadsheetWriter;
  normalizer?: TextNormalizer;
}

export interface ProcessOptions {
  inputPath: string;
  outputPath: string;
  dpi: number;
  /** Concurrent pages; each page runs its strategies one after another */
  workers: number;
  /** Aborting stops new pages from starting; finished pages are still flushed */
  signal?: AbortSignal;
}

export interface ProcessResult {
  records: VoterRecord[];
  pages: PageResult[];
  rollMetadata: RollMetadata;
  summary: ExtractionSummary;
  spreadsheetWritten: boolean;
}

const EMPTY_EXTRACTION: PageExtraction = { records: [], segments: [], duplicatesRemoved: 0 };
const SAMPLE_RECORDS = 3;

/**
 * Orchestrates rasterization → preprocessing → recognition → normalization →
 * extraction for every page, then merges the page results into the
 * spreadsheet and the debug bundle.
 */
export class ElectoralRollProcessor {
  private readonly normalizer: TextNormalizer;

  constructor(private readonly deps: ProcessorDependencies) {
    this.normalizer = deps.normalizer ?? new TextNormalizer();
  }

  /**
   * Throws RasterizationError when the document cannot be rasterized; any
   * later failure is confined to its page.
   */
  async process(options: ProcessOptions): Promise<ProcessResult> {
    const startedAt = new Date();
    const runId = uuidv4();

    logger.info({ runId, inputPath: options.inputPath, dpi: options.dpi, workers: options.workers }, 'Extraction run started');

    const rasterPages = await this.deps.rasterizer.rasterize(options.inputPath, options.dpi);
    OCRLogger.pdfRasterized(rasterPages.length, options.dpi);

    const { results, skipped } = await processInParallel(
      rasterPages,
      async raster => {
        const page = await this.processPage(raster);
        await this.deps.debugSink.writePage(page);
        if (page.error) {
          OCRLogger.pageFailed(page.pageIndex, rasterPages.length, page.error);
        } else {
          OCRLogger.pageProcessed(page.pageIndex, rasterPages.length, page.extraction.records.length, page.selectedStrategy);
        }
        return page;
      },
      'page-extraction',
      { maxConcurrency: options.workers, signal: options.signal }
    );

    const pages = results
      .filter((page): page is PageResult => page !== undefined)
      .sort((a, b) => a.pageIndex - b.pageIndex);

    const rollMetadata = extractRollMetadata(
      pages.filter(page => page.pageIndex <= METADATA_PAGES).map(page => page.normalizedText)
    );
    const records = pages.flatMap(page =>
      page.extraction.records.map(record => applyRollMetadata(record, rollMetadata))
    );

    const summary: ExtractionSummary = {
      runId,
      source: options.inputPath,
      dpi: options.dpi,
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      totalPages: rasterPages.length,
      pagesProcessed: pages.length,
      totalRecords: records.length,
      strategies: this.deps.recognizer.strategies.map(strategy => strategy.id),
      zeroYieldPages: pages.filter(page => page.zeroYield).map(page => page.pageIndex),
      aborted: options.signal?.aborted === true || skipped > 0,
      rollMetadata,
      sampleRecords: records.slice(0, SAMPLE_RECORDS).map(sampleRecord),
      pages: pages.map(summarizePage),
    };

    await this.deps.debugSink.writeCombinedText(pages, rollMetadata);
    await this.deps.debugSink.writeSummary(summary);

    let spreadsheetWritten = false;
    if (records.length > 0) {
      await this.deps.spreadsheetWriter.write(options.outputPath, records, {
        source: options.inputPath,
        totalPages: rasterPages.length,
        rollMetadata,
        generatedAt: new Date(),
      });
      spreadsheetWritten = true;
    } else {
      logger.warn({ runId, pagesProcessed: pages.length }, 'No voter records extracted, spreadsheet not written');
    }

    logger.info({
      runId,
      totalPages: summary.totalPages,
      pagesProcessed: summary.pagesProcessed,
      totalRecords: summary.totalRecords,
      zeroYieldPages: summary.zeroYieldPages,
      aborted: summary.aborted,
      duration: Date.now() - startedAt.getTime(),
    }, 'Extraction run complete');

    return { records, pages, rollMetadata, summary, spreadsheetWritten };
  }

  /**
   * Never throws. An unexpected failure keeps whatever the page produced so
   * far and marks it zero-yield.
   */
  async processPage(raster: RasterPage): Promise<PageResult> {
    const { pageIndex } = raster;
    let processedImage = raster.image;
    let attempts: RecognitionAttempt[] = [];
    let selectedStrategy: string | null = null;
    let selectedText = '';
    let normalizedText = '';
    let correctionsApplied = 0;

    try {
      processedImage = await this.deps.preprocessor.preprocess(raster.image, pageIndex);

      const outcome = await this.deps.recognizer.recognize(processedImage, raster.image, pageIndex);
      attempts = outcome.attempts;
      selectedStrategy = outcome.best ? outcome.best.strategyId : null;
      selectedText = outcome.bestText;

      const normalized = this.normalizer.normalizeWithStats(selectedText);
      normalizedText = normalized.text;
      correctionsApplied = normalized.corrections;

      const extraction = this.deps.extractor.extract(normalizedText, pageIndex);

      return Object.freeze({
        pageIndex,
        originalImage: raster.image,
        processedImage,
        attempts,
        selectedStrategy,
        selectedText,
        normalizedText,
        correctionsApplied,
        extraction,
        zeroYield: extraction.records.length === 0,
      });
    } catch (error) {
      logger.error({ pageIndex, error: errorMessage(error) }, 'Page processing failed');
      return Object.freeze({
        pageIndex,
        originalImage: raster.image,
        processedImage,
        attempts,
        selectedStrategy,
        selectedText,
        normalizedText,
        correctionsApplied,
        extraction: EMPTY_EXTRACTION,
        zeroYield: true,
        error: errorMessage(error),
      });
    }
  }
}

function sampleRecord(record: VoterRecord): Record<string, string> {
  const sample: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) sample[key] = String(value);
  }
  return sample;
}

export function summarizePage(page: PageResult): PageSummary {
  const matchers: Record<string, number> = {};
  for (const segment of page.extraction.segments) {
    if (segment.matcher) {
      matchers[segment.matcher] = (matchers[segment.matcher] ?? 0) + 1;
    }
  }

  const summary: PageSummary = {
    pageIndex: page.pageIndex,
    recordsFound: page.extraction.records.length,
    strategiesAttempted: page.attempts.map(attempt => attempt.strategyId),
    selectedStrategy: page.selectedStrategy,
    correctionsApplied: page.correctionsApplied,
    segments: page.extraction.segments.length,
    unmatchedSegments: page.extraction.segments.filter(segment => !segment.matcher).length,
    duplicatesRemoved: page.extraction.duplicatesRemoved,
    matchers,
    zeroYield: page.zeroYield,
  };
  if (page.error) {
    summary.error = page.error;
  }
  return summary;
}
