import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileDebugSink, NoopDebugSink, combinePageTexts, pagePrefix } from '../debug-sink';
import type { ExtractionSummary } from '../../types/summary';
import type { PageResult } from '../../types/ocr';

function pageResult(pageIndex: number, normalizedText: string): PageResult {
  return {
    pageIndex,
    originalImage: Buffer.from(`original-${pageIndex}`),
    processedImage: Buffer.from(`processed-${pageIndex}`),
    attempts: [
      { strategyId: 'processed-block', text: 'raw block text', score: { probeMatches: 0, textLength: 14 } },
      { strategyId: 'original-block', text: '', score: { probeMatches: 0, textLength: 0 } },
    ],
    selectedStrategy: 'processed-block',
    selectedText: 'raw block text',
    normalizedText,
    correctionsApplied: 0,
    extraction: { records: [], segments: [], duplicatesRemoved: 0 },
    zeroYield: true,
  };
}

const summary: ExtractionSummary = {
  runId: 'run-1',
  source: 'roll.pdf',
  dpi: 300,
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:01:00.000Z',
  totalPages: 1,
  pagesProcessed: 1,
  totalRecords: 0,
  strategies: ['processed-block', 'original-block'],
  zeroYieldPages: [1],
  aborted: false,
  rollMetadata: {},
  sampleRecords: [],
  pages: [],
};

describe('FileDebugSink', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'roll-debug-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('writes images, every raw attempt and the selected text for a page', async () => {
    await new FileDebugSink(rootDir).writePage(pageResult(2, 'normalized'));

    const files = (await fs.readdir(rootDir)).sort();
    expect(files).toEqual([
      'page_002_original.png',
      'page_002_processed.png',
      'page_002_raw_original-block.txt',
      'page_002_raw_processed-block.txt',
      'page_002_selected.txt',
    ]);
    await expect(fs.readFile(path.join(rootDir, 'page_002_original.png'), 'utf8')).resolves.toBe('original-2');
    await expect(fs.readFile(path.join(rootDir, 'page_002_selected.txt'), 'utf8')).resolves.toBe('raw block text');
  });

  it('creates the directory when it does not exist yet', async () => {
    const nested = path.join(rootDir, 'run', 'debug');
    await new FileDebugSink(nested).writeCombinedText([pageResult(1, 'first')], {});

    await expect(fs.readFile(path.join(nested, 'all_pages_combined_text.txt'), 'utf8')).resolves.toBe(
      `Roll metadata:\n{}\n${'='.repeat(80)}\n\n--- Page 1 ---\nfirst`
    );
  });

  it('writes the summary as JSON', async () => {
    await new FileDebugSink(rootDir).writeSummary(summary);

    const written = JSON.parse(await fs.readFile(path.join(rootDir, 'extraction_summary.json'), 'utf8'));
    expect(written).toEqual(summary);
  });

  it('skips a summary that fails validation', async () => {
    await new FileDebugSink(rootDir).writeSummary({ ...summary, dpi: 0 });

    await expect(fs.readdir(rootDir)).resolves.toEqual([]);
  });

  it('keeps writing other artifacts when one write fails', async () => {
    await fs.mkdir(path.join(rootDir, 'page_001_original.png'));

    await expect(new FileDebugSink(rootDir).writePage(pageResult(1, 'text'))).resolves.toBeUndefined();
    await expect(fs.readFile(path.join(rootDir, 'page_001_processed.png'), 'utf8')).resolves.toBe('processed-1');
  });

  it('does not throw when the directory cannot be created', async () => {
    const blocker = path.join(rootDir, 'not-a-dir');
    await fs.writeFile(blocker, 'file');

    await expect(new FileDebugSink(blocker).writePage(pageResult(1, 'text'))).resolves.toBeUndefined();
  });
});

describe('debug helpers', () => {
  it('pads page prefixes to three digits', () => {
    expect(pagePrefix(7)).toBe('page_007');
    expect(pagePrefix(1234)).toBe('page_1234');
  });

  it('joins page texts with page markers under the roll metadata', () => {
    const text = combinePageTexts([pageResult(1, 'A'), pageResult(2, 'B')], { partNo: '27' });

    expect(text).toBe(
      `Roll metadata:\n{\n  "partNo": "27"\n}\n${'='.repeat(80)}\n\n--- Page 1 ---\nA\n\n--- Page 2 ---\nB`
    );
  });

  it('NoopDebugSink accepts every call', async () => {
    const sink = new NoopDebugSink();
    await expect(sink.writePage()).resolves.toBeUndefined();
    await expect(sink.writeSummary()).resolves.toBeUndefined();
  });
});
