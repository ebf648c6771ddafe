import {
  EPIC_SOURCE,
  FIELD_STOP_SOURCE,
  HOUSE_LABEL_SOURCE,
  NAME_VALUE_SOURCE,
  SERIAL_LABEL_SOURCE,
  finalizeRecord,
} from '../fields';
import type { RecordDraft } from '../fields';
import type { VoterRecord } from '../../types/ocr';
import type { RecordMatcher } from './record-matcher';

const VALUE_END = String.raw`(?=\s*(?:[,;|]|${FIELD_STOP_SOURCE}|\d|\n|$))`;

const NAME_LABEL = /\b(?:(Father|Husband|Mother|Other)(?:'s|s)?\s+)?Name\b/gi;
const NAME_FIELD = new RegExp(
  String.raw`\b(?:(Father|Husband|Mother|Other)(?:'s|s)?\s+)?Name\b\s*:?\s*(${NAME_VALUE_SOURCE}?)${VALUE_END}`,
  'gi'
);
const RELATION_FIELD = new RegExp(
  String.raw`\b(Father|Husband|Mother|Other)(?:'s|s)?(?:\s+Name)?\s*:\s*(${NAME_VALUE_SOURCE}?)${VALUE_END}`,
  'i'
);
const RELATION_ABBREVIATED = new RegExp(String.raw`\b([swdc]\/o)\s*:?\s*(${NAME_VALUE_SOURCE}?)${VALUE_END}`, 'i');
const HOUSE_FIELD = new RegExp(String.raw`\b${HOUSE_LABEL_SOURCE}\s*:?\s*([A-Za-z0-9][A-Za-z0-9\/-]*)`, 'i');
const AGE_FIELD = /\bAge\s*:?\s*(\d{1,3})\b/i;
const GENDER_FIELD = /\b(?:Gender|Sex)\s*:?\s*(Male|Female|Third\s*Gender|M|F|T)\b/i;
const GENDER_WORD = /\b(Male|Female)\b/i;
const SERIAL_FIELD = new RegExp(String.raw`\b${SERIAL_LABEL_SOURCE}\s*:?\s*(\d{1,5})\b`, 'i');
const LEADING_SERIAL = /^\s*(\d{1,5})\b(?!\s*(?:years?|yrs))/i;
const EPIC_FIELD = new RegExp(String.raw`\b(${EPIC_SOURCE})\b`);
const LEAD_ITEM = String.raw`(?:${SERIAL_LABEL_SOURCE}\s*:?\s*\d{1,5}|\d{1,5}|(?:EPIC(?:\s*No\.?)?\s*:?\s*)?(?:${EPIC_SOURCE}))`;
const RECORD_LEAD = new RegExp(String.raw`^${LEAD_ITEM}(?:[\s,;|]*${LEAD_ITEM})?[\s,;|]*$`);

/**
 * Locates values by proximity to their labels, in any order and with or
 * without delimiters. A segment is split into one chunk per voter name label.
 */
export class KeywordMatcher implements RecordMatcher {
  readonly name = 'keyword' as const;

  tryMatch(segment: string, pageIndex?: number): VoterRecord[] | null {
    const records: VoterRecord[] = [];

    for (const chunk of splitAtNameLabels(segment)) {
      const record = finalizeRecord(readChunk(chunk), pageIndex);
      if (record) records.push(record);
    }

    return records.length > 0 ? records : null;
  }
}

/**
 * Each voter "Name" label (not "Father's Name" etc.) opens a chunk. When the
 * label is only preceded by a serial number and/or EPIC id, labelled or not,
 * on its own line or the line above, the chunk starts there instead so those
 * fields stay with it.
 */
export function splitAtNameLabels(segment: string): string[] {
  const starts: number[] = [];

  for (const match of segment.matchAll(NAME_LABEL)) {
    if (match[1]) continue;

    const labelIndex = match.index ?? 0;
    const lineStart = segment.lastIndexOf('\n', labelIndex - 1) + 1;
    const lead = segment.slice(lineStart, labelIndex).trim();
    let start = labelIndex;

    if (lead && RECORD_LEAD.test(lead)) {
      start = lineStart;
    } else if (!lead && lineStart > 0) {
      const previousStart = segment.lastIndexOf('\n', lineStart - 2) + 1;
      const previousLine = segment.slice(previousStart, lineStart - 1).trim();
      if (previousLine && RECORD_LEAD.test(previousLine)) {
        start = previousStart;
      }
    }

    const last = starts[starts.length - 1];
    if (last === undefined || start > last) {
      starts.push(start);
    }
  }

  return starts.map((start, i) => segment.slice(start, starts[i + 1] ?? segment.length).trim());
}

function readChunk(chunk: string): RecordDraft {
  const draft: RecordDraft = {};

  for (const match of chunk.matchAll(NAME_FIELD)) {
    if (!match[1]) {
      draft.name = match[2];
      break;
    }
  }

  const relation = RELATION_FIELD.exec(chunk) ?? RELATION_ABBREVIATED.exec(chunk);
  if (relation) {
    draft.relationType = relation[1];
    draft.relationName = relation[2];
  }

  const house = HOUSE_FIELD.exec(chunk)?.[1];
  if (house && /\d/.test(house)) {
    draft.houseNo = house;
  }

  draft.age = AGE_FIELD.exec(chunk)?.[1];
  draft.gender = (GENDER_FIELD.exec(chunk) ?? GENDER_WORD.exec(chunk))?.[1];
  draft.serialNo = (SERIAL_FIELD.exec(chunk) ?? LEADING_SERIAL.exec(chunk))?.[1];
  draft.epic = EPIC_FIELD.exec(chunk)?.[1];

  return draft;
}
