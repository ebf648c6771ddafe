/**
 * Record Extraction Module
 * Turns one page of normalized text into voter records
 */

import { logger } from '../utils/logger';
import { recordKey } from './fields';
import { StrictLayoutMatcher } from './matchers/strict-layout-matcher';
import { KeywordMatcher } from './matchers/keyword-matcher';
import { HeuristicBlockMatcher } from './matchers/heuristic-block-matcher';
import type { RecordMatcher } from './matchers/record-matcher';
import type { PageExtraction, SegmentOutcome, VoterRecord } from '../types/ocr';

/** Most precise first */
export const DEFAULT_MATCHERS: readonly RecordMatcher[] = [
  new StrictLayoutMatcher(),
  new KeywordMatcher(),
  new HeuristicBlockMatcher(),
];

/**
 * Split text into contiguous segments separated by blank lines
 */
export function segmentText(text: string): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}

export class RecordExtractor {
  constructor(private readonly matchers: readonly RecordMatcher[] = DEFAULT_MATCHERS) {}

  /**
   * Each segment goes to the first matcher that yields at least one record.
   * Records are deduplicated within the page on (name, serial number).
   */
  extract(normalizedText: string, pageIndex: number): PageExtraction {
    const records: VoterRecord[] = [];
    const segments: SegmentOutcome[] = [];
    const seen = new Set<string>();
    let duplicatesRemoved = 0;

    segmentText(normalizedText).forEach((segment, index) => {
      let outcome: SegmentOutcome = { index, matcher: null, recordCount: 0 };

      for (const matcher of this.matchers) {
        const matched = matcher.tryMatch(segment, pageIndex);
        if (!matched || matched.length === 0) continue;

        let kept = 0;
        for (const record of matched) {
          const key = recordKey(record);
          if (seen.has(key)) {
            duplicatesRemoved++;
            continue;
          }
          seen.add(key);
          records.push(record);
          kept++;
        }
        outcome = { index, matcher: matcher.name, recordCount: kept };
        break;
      }

      if (!outcome.matcher) {
        logger.debug({
          pageIndex,
          segmentIndex: index,
          preview: segment.substring(0, 80),
        }, 'Segment matched no record pattern');
      }
      segments.push(outcome);
    });

    const unmatched = segments.filter(s => !s.matcher).length;
    logger.debug({
      pageIndex,
      records: records.length,
      segments: segments.length,
      unmatched,
      duplicatesRemoved,
    }, 'Page extracted');

    return { records, segments, duplicatesRemoved };
  }
}
