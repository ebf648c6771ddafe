/**
 * Debug Artifact Writer
 *
 * Persists page images, every raw recognition text, the combined normalized
 * text and the extraction summary so a run can be inspected afterwards.
 * Each artifact is written independently; a failed write is logged and the
 * rest carry on. No method throws.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { errorMessage } from '../types/errors';
import { ExtractionSummarySchema } from '../types/summary';
import type { ExtractionSummary } from '../types/summary';
import type { PageResult, RollMetadata } from '../types/ocr';

export const COMBINED_TEXT_FILE = 'all_pages_combined_text.txt';
export const SUMMARY_FILE = 'extraction_summary.json';

export interface DebugSink {
  writePage(page: PageResult): Promise<void>;
  writeCombinedText(pages: readonly PageResult[], rollMetadata: RollMetadata): Promise<void>;
  writeSummary(summary: ExtractionSummary): Promise<void>;
}

/**
 * page_001, page_002, ...
 */
export function pagePrefix(pageIndex: number): string {
  return `page_${String(pageIndex).padStart(3, '0')}`;
}

/**
 * Roll metadata as JSON, a rule, then each page's normalized text under a page marker
 */
export function combinePageTexts(pages: readonly PageResult[], rollMetadata: RollMetadata): string {
  const header = `Roll metadata:\n${JSON.stringify(rollMetadata, null, 2)}\n${'='.repeat(80)}\n\n`;
  return header + pages
    .map(page => `--- Page ${page.pageIndex} ---\n${page.normalizedText}`)
    .join('\n\n');
}

export class FileDebugSink implements DebugSink {
  private ready: Promise<boolean> | null = null;

  constructor(readonly rootDir: string) {}

  async writePage(page: PageResult): Promise<void> {
    const prefix = pagePrefix(page.pageIndex);

    await this.write(`${prefix}_original.png`, page.originalImage);
    await this.write(`${prefix}_processed.png`, page.processedImage);
    for (const attempt of page.attempts) {
      await this.write(`${prefix}_raw_${attempt.strategyId}.txt`, attempt.text);
    }
    await this.write(`${prefix}_selected.txt`, page.selectedText);
  }

  async writeCombinedText(pages: readonly PageResult[], rollMetadata: RollMetadata): Promise<void> {
    await this.write(COMBINED_TEXT_FILE, combinePageTexts(pages, rollMetadata));
  }

  async writeSummary(summary: ExtractionSummary): Promise<void> {
    const parsed = ExtractionSummarySchema.safeParse(summary);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.map(issue => issue.message) }, 'Extraction summary failed validation');
      return;
    }
    await this.write(SUMMARY_FILE, JSON.stringify(parsed.data, null, 2));
  }

  private ensureDir(): Promise<boolean> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.rootDir, { recursive: true }).then(
        () => true,
        (error: unknown) => {
          logger.error({ dir: this.rootDir, error: errorMessage(error) }, 'Could not create debug directory');
          this.ready = null;
          return false;
        }
      );
    }
    return this.ready;
  }

  private async write(fileName: string, content: Buffer | string): Promise<void> {
    if (!(await this.ensureDir())) {
      return;
    }

    const filePath = path.join(this.rootDir, fileName);
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      logger.error({ file: filePath, error: errorMessage(error) }, 'Failed to write debug artifact');
    }
  }
}

export class NoopDebugSink implements DebugSink {
  async writePage(): Promise<void> {}

  async writeCombinedText(): Promise<void> {}

  async writeSummary(): Promise<void> {}
}
