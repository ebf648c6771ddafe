import { EPIC_SOURCE, SERIAL_LABEL_SOURCE, finalizeRecord } from '../fields';
import type { RecordDraft } from '../fields';
import type { VoterRecord } from '../../types/ocr';
import type { RecordMatcher } from './record-matcher';

const BOUNDARY = new RegExp(String.raw`^\s*(?:\d{1,5}\s+)?(?:${EPIC_SOURCE})\b`);
const EPIC_TOKEN = new RegExp(String.raw`\b(${EPIC_SOURCE})\b`);
const LEADING_SERIAL = /^\s*(\d{1,5})\b(?!\s*(?:years?|yrs|\/))/i;
const SERIAL_LABELLED = new RegExp(String.raw`\b${SERIAL_LABEL_SOURCE}\s*:?\s*(\d{1,5})\b`, 'i');
const AGE_LABELLED = /\bAge\s*:?\s*(\d{1,3})\b/i;
const AGE_YEARS = /\b(\d{2,3})\s*(?:years?|yrs)\b/i;
const GENDER_WORD = /\b(Male|Female)\b/i;
const GENDER_LETTER = /(?:^|\s)([MF])(?=\s|$)/;
const RELATION = /\b([swdc]\/o)\s*:?\s*([A-Za-z][A-Za-z .]*?)(?=\s*(?:[,;|]|\d|\b(?:Age|House|Male|Female|Gender)\b|\n|$))/i;
const TRAILING_NAME = /([A-Z][A-Za-z.]*(?:\s+[A-Z][A-Za-z.]*){0,4})\s*$/;
const CAPITALISED_RUN = /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,4}|[A-Z]{2,}(?:\s+[A-Z]{2,}){1,4})\b/g;
const NOT_A_NAME = /\b(?:Male|Female|Age|Name|House|Gender|Sex|EPIC|Photo|Serial|S[l1I]|No|Father|Husband|Mother|Other|Years?|Part|Section|Available)\b/i;

/** Fewer classified fields than this and the group is discarded */
const MIN_CLASSIFIED_FIELDS = 2;

/**
 * Last resort: splits a segment into line groups at record-boundary markers
 * (a line opening with an EPIC id, optionally after a serial number) and keeps
 * whatever field tokens it can classify without labels.
 */
export class HeuristicBlockMatcher implements RecordMatcher {
  readonly name = 'heuristic-block' as const;

  tryMatch(segment: string, pageIndex?: number): VoterRecord[] | null {
    const records: VoterRecord[] = [];

    for (const group of splitAtBoundaries(segment)) {
      const draft = classifyTokens(group);
      const classified = [draft.epic, draft.serialNo, draft.name, draft.relationName, draft.age, draft.gender]
        .filter(value => value !== undefined).length;
      if (classified < MIN_CLASSIFIED_FIELDS) continue;

      const record = finalizeRecord(draft, pageIndex);
      if (record) records.push(record);
    }

    return records.length > 0 ? records : null;
  }
}

export function splitAtBoundaries(segment: string): string[] {
  const groups: string[][] = [];
  let current: string[] = [];

  for (const line of segment.split('\n')) {
    if (BOUNDARY.test(line) && current.length > 0) {
      groups.push(current);
      current = [];
    }
    current.push(line);
  }
  if (current.length > 0) {
    groups.push(current);
  }

  return groups.map(lines => lines.join('\n').trim()).filter(group => group.length > 0);
}

function classifyTokens(group: string): RecordDraft {
  const draft: RecordDraft = {};

  draft.epic = EPIC_TOKEN.exec(group)?.[1];
  draft.serialNo = (SERIAL_LABELLED.exec(group) ?? LEADING_SERIAL.exec(group))?.[1];
  draft.age = (AGE_LABELLED.exec(group) ?? AGE_YEARS.exec(group))?.[1];

  const gender = GENDER_WORD.exec(group) ?? GENDER_LETTER.exec(group);
  draft.gender = gender?.[1];

  const relation = RELATION.exec(group);
  if (relation) {
    draft.relationType = relation[1];
    draft.relationName = relation[2];
    const before = group.slice(0, relation.index).split('\n').pop() ?? '';
    draft.name = TRAILING_NAME.exec(before)?.[1];
  }

  // Without a relation marker a bare capitalised run is only trusted next to an id
  if (!draft.name && (draft.epic || draft.serialNo)) {
    for (const match of group.matchAll(CAPITALISED_RUN)) {
      if (!NOT_A_NAME.test(match[1])) {
        draft.name = match[1];
        break;
      }
    }
  }

  return draft;
}
