/**
 * Electoral roll OCR
 *
 * Scanned electoral roll PDF → page images → multi-strategy OCR → voter
 * records → spreadsheet, with a debug bundle per run.
 */

export { ElectoralRollProcessor, summarizePage } from './ocr/processor';
export type { ProcessorDependencies, ProcessOptions, ProcessResult } from './ocr/processor';
export { PDFConverter } from './ocr/pdf-converter';
export type { Rasterizer } from './ocr/pdf-converter';
export { SharpPreprocessor, DEFAULT_MIN_WIDTH } from './ocr/preprocessor';
export type { ImagePreprocessor, PreprocessorOptions } from './ocr/preprocessor';
export { TesseractEngine } from './ocr/tesseract-engine';
export type { RecognitionEngine, TesseractEngineOptions } from './ocr/tesseract-engine';
export {
  MultiStrategyRecognizer,
  DEFAULT_STRATEGIES,
  resolveStrategies,
  scoreText,
  selectBest,
} from './ocr/recognizer';
export type { RecognitionOutcome } from './ocr/recognizer';
export { TextNormalizer, normalize, DEFAULT_CORRECTIONS } from './ocr/normalizer';
export type { CorrectionTable, NormalizationResult } from './ocr/normalizer';
export { OCRLogger } from './ocr/ocr-logger';
export { RecordExtractor, DEFAULT_MATCHERS, segmentText } from './extraction/record-extractor';
export { structuralProbe } from './extraction/structural-probe';
export { extractRollMetadata, applyRollMetadata, regionForDistrict } from './extraction/roll-metadata';
export type { RecordMatcher } from './extraction/matchers/record-matcher';
export { FileDebugSink, NoopDebugSink } from './debug/debug-sink';
export type { DebugSink } from './debug/debug-sink';
export { ExcelWriter, VOTER_COLUMNS } from './export/excel-writer';
export type { SpreadsheetWriter, SpreadsheetContext } from './export/excel-writer';
export { runCli } from './cli';
export * from './types/errors';
export * from './types/ocr';
export * from './types/summary';
