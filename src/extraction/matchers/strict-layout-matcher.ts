import { EPIC_SOURCE, HOUSE_LABEL_SOURCE, SERIAL_LABEL_SOURCE, finalizeRecord } from '../fields';
import type { VoterRecord } from '../../types/ocr';
import type { RecordMatcher } from './record-matcher';

const SEP = String.raw`\s*,\s*`;
const COLON = String.raw`\s*:\s*`;

/**
 * One record per line, comma delimited, fixed field order:
 *
 *   Name: <name>, [Father's Name: <name>,] [House No: <no>,] Age: <n>, [Gender: <g>,] Sl No: <n>[, EPIC: <id>]
 */
const STRICT_LINE = new RegExp(
  '^' +
    `Name${COLON}(?<name>[^,:]+?)${SEP}` +
    `(?:(?<relationType>Father|Husband|Mother|Other)(?:'s|s)?\\s+Name${COLON}(?<relationName>[^,:]+?)${SEP})?` +
    `(?:${HOUSE_LABEL_SOURCE}${COLON}(?<houseNo>[^,:]+?)${SEP})?` +
    `Age${COLON}(?<age>\\d{1,3})${SEP}` +
    `(?:(?:Gender|Sex)${COLON}(?<gender>Male|Female|Third\\s*Gender|[MFT])${SEP})?` +
    `${SERIAL_LABEL_SOURCE}${COLON}(?<serialNo>\\d{1,5})` +
    `(?:${SEP}EPIC(?:\\s*No\\.?)?${COLON}(?<epic>${EPIC_SOURCE}))?` +
    String.raw`\s*[.,;]?$`,
  'i'
);

export class StrictLayoutMatcher implements RecordMatcher {
  readonly name = 'strict-layout' as const;

  tryMatch(segment: string, pageIndex?: number): VoterRecord[] | null {
    const records: VoterRecord[] = [];

    for (const line of segment.split('\n')) {
      const groups = STRICT_LINE.exec(line.trim())?.groups;
      if (!groups) continue;

      const record = finalizeRecord({
        name: groups.name,
        relationType: groups.relationType,
        relationName: groups.relationName,
        houseNo: groups.houseNo,
        age: groups.age,
        gender: groups.gender,
        serialNo: groups.serialNo,
        epic: groups.epic,
      }, pageIndex);

      if (record) records.push(record);
    }

    return records.length > 0 ? records : null;
  }
}
