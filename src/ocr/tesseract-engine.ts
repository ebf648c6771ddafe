/**
 * Recognition engine backed by tesseract.js
 *
 * Workers are memory-intensive, so the engine keeps a small pool capped at
 * `maxWorkers`. Each call borrows one worker, sets the page segmentation
 * mode for the requested layout, recognizes, and hands the worker back.
 * Call terminate() when the run is over.
 */

import { createWorker, PSM } from 'tesseract.js';
import type { Worker } from 'tesseract.js';
import { logger } from '../utils/logger';
import { RecognitionError, errorMessage } from '../types/errors';
import type { PageLayout } from '../types/ocr';

/**
 * Black-box image → text function
 */
export interface RecognitionEngine {
  recognize(image: Buffer, layout: PageLayout): Promise<string>;
  terminate(): Promise<void>;
}

const LAYOUT_SEGMENTATION: Record<PageLayout, PSM> = {
  block: PSM.SINGLE_BLOCK,
  column: PSM.SINGLE_COLUMN,
  sparse: PSM.SPARSE_TEXT,
};

export interface TesseractEngineOptions {
  lang: string;
  maxWorkers: number;
}

export class TesseractEngine implements RecognitionEngine {
  private readonly workers: Worker[] = [];
  private readonly idle: Worker[] = [];
  private readonly waiting: Array<(worker: Worker) => void> = [];
  private pending = 0;

  constructor(private readonly options: TesseractEngineOptions) {}

  async recognize(image: Buffer, layout: PageLayout): Promise<string> {
    const worker = await this.acquire();
    try {
      await worker.setParameters({
        tessedit_pageseg_mode: LAYOUT_SEGMENTATION[layout],
        preserve_interword_spaces: '1',
      });
      const { data } = await worker.recognize(image);
      return data.text ?? '';
    } catch (error) {
      throw new RecognitionError(`Tesseract failed (${layout}): ${errorMessage(error)}`, { cause: error });
    } finally {
      this.release(worker);
    }
  }

  async terminate(): Promise<void> {
    const workers = this.workers.splice(0);
    this.idle.length = 0;
    await Promise.all(workers.map(worker => worker.terminate()));
    logger.debug({ terminated: workers.length }, 'Tesseract workers terminated');
  }

  private async acquire(): Promise<Worker> {
    const idleWorker = this.idle.pop();
    if (idleWorker) {
      return idleWorker;
    }

    if (this.workers.length + this.pending < this.options.maxWorkers) {
      this.pending++;
      try {
        const worker = await createWorker(this.options.lang);
        this.workers.push(worker);
        logger.debug({ lang: this.options.lang, poolSize: this.workers.length }, 'Tesseract worker started');
        return worker;
      } finally {
        this.pending--;
      }
    }

    return new Promise<Worker>(resolve => {
      this.waiting.push(resolve);
    });
  }

  private release(worker: Worker): void {
    const next = this.waiting.shift();
    if (next) {
      next(worker);
    } else {
      this.idle.push(worker);
    }
  }
}

/**
 * Starts and stops one worker to confirm the engine and its language data are usable
 */
export async function checkTesseract(lang: string): Promise<void> {
  const worker = await createWorker(lang);
  await worker.terminate();
}
