import type { MatcherName, VoterRecord } from '../../types/ocr';

/**
 * One structural strategy for turning a text segment into voter records.
 * Returns null when the segment does not fit this matcher's layout.
 */
export interface RecordMatcher {
  readonly name: MatcherName;
  tryMatch(segment: string, pageIndex?: number): VoterRecord[] | null;
}
