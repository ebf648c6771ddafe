/**
 * Multi-Strategy Recognizer
 *
 * Runs the recognition engine once per strategy, sequentially, and keeps the
 * attempt whose text looks most like voter records. An engine failure is
 * recorded as an empty attempt; it never fails the page.
 */

import { logger } from '../utils/logger';
import { structuralProbe } from '../extraction/structural-probe';
import { ConfigurationError, errorMessage } from '../types/errors';
import type { RecognitionEngine } from './tesseract-engine';
import type { AttemptScore, RecognitionAttempt, RecognitionStrategy } from '../types/ocr';

export const DEFAULT_STRATEGIES: readonly RecognitionStrategy[] = [
  { id: 'processed-block', variant: 'processed', layout: 'block' },
  { id: 'processed-sparse', variant: 'processed', layout: 'sparse' },
  { id: 'original-block', variant: 'original', layout: 'block' },
  { id: 'processed-column', variant: 'processed', layout: 'column' },
];

const MIN_STRATEGIES = 2;

export interface RecognitionOutcome {
  /** Text of the selected attempt, '' when every attempt came back empty */
  bestText: string;
  best: RecognitionAttempt | null;
  /** In strategy order */
  attempts: RecognitionAttempt[];
}

export function scoreText(text: string): AttemptScore {
  return {
    probeMatches: structuralProbe(text),
    textLength: text.trim().length,
  };
}

/**
 * Negative when `a` should be preferred over `b`
 */
export function compareAttempts(a: RecognitionAttempt, b: RecognitionAttempt): number {
  if (a.score.probeMatches !== b.score.probeMatches) {
    return b.score.probeMatches - a.score.probeMatches;
  }
  return b.score.textLength - a.score.textLength;
}

/**
 * Highest probe count, then longest text; remaining ties go to the earlier strategy.
 * Returns null when no attempt produced any text.
 */
export function selectBest(attempts: readonly RecognitionAttempt[]): RecognitionAttempt | null {
  let best: RecognitionAttempt | null = null;
  for (const attempt of attempts) {
    if (attempt.score.textLength === 0) continue;
    if (!best || compareAttempts(attempt, best) < 0) {
      best = attempt;
    }
  }
  return best;
}

/**
 * Picks the configured strategies by id, keeping the default order.
 * An empty id list means every default strategy.
 */
export function resolveStrategies(ids: readonly string[]): RecognitionStrategy[] {
  if (ids.length === 0) {
    return [...DEFAULT_STRATEGIES];
  }

  const known = new Set(DEFAULT_STRATEGIES.map(strategy => strategy.id));
  const unknown = ids.filter(id => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown recognition strategies: ${unknown.join(', ')} (known: ${[...known].join(', ')})`
    );
  }

  return DEFAULT_STRATEGIES.filter(strategy => ids.includes(strategy.id));
}

export class MultiStrategyRecognizer {
  readonly strategies: readonly RecognitionStrategy[];

  constructor(
    private readonly engine: RecognitionEngine,
    strategies: readonly RecognitionStrategy[] = DEFAULT_STRATEGIES
  ) {
    if (strategies.length < MIN_STRATEGIES) {
      throw new ConfigurationError(`At least ${MIN_STRATEGIES} recognition strategies are required, got ${strategies.length}`);
    }
    this.strategies = strategies;
  }

  async recognize(processedImage: Buffer, originalImage: Buffer, pageIndex: number): Promise<RecognitionOutcome> {
    const attempts: RecognitionAttempt[] = [];

    for (const strategy of this.strategies) {
      const image = strategy.variant === 'processed' ? processedImage : originalImage;
      const startTime = Date.now();

      try {
        const text = await this.engine.recognize(image, strategy.layout);
        const attempt: RecognitionAttempt = { strategyId: strategy.id, text, score: scoreText(text) };
        attempts.push(attempt);

        logger.debug({
          pageIndex,
          strategy: strategy.id,
          probeMatches: attempt.score.probeMatches,
          textLength: attempt.score.textLength,
          duration: Date.now() - startTime,
        }, 'Recognition attempt complete');
      } catch (error) {
        logger.warn({ pageIndex, strategy: strategy.id, error: errorMessage(error) }, 'Recognition attempt failed');
        attempts.push({
          strategyId: strategy.id,
          text: '',
          score: { probeMatches: 0, textLength: 0 },
          error: errorMessage(error),
        });
      }
    }

    const best = selectBest(attempts);
    if (!best) {
      logger.warn({ pageIndex, strategies: attempts.length }, 'Every recognition attempt came back empty');
    }

    return { bestText: best ? best.text : '', best, attempts };
  }
}
