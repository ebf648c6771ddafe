/**
 * Field vocabulary shared by the matchers
 *
 * Label patterns are regex sources so each matcher can anchor them the way
 * its layout needs. Values are validated here, once, when a draft becomes a
 * VoterRecord.
 */

import type { VoterField, VoterRecord } from '../types/ocr';

/** EPIC identifiers: WB/24/161/375141, SVG2562940, MHD1759844 */
export const EPIC_SOURCE = String.raw`[A-Z]{2,4}\/\d+\/\d+\/\d+|[A-Z]{2,4}\d{6,10}`;

export const SERIAL_LABEL_SOURCE = String.raw`(?:S[l1I]\.?\s*No\.?|Serial\s*(?:No\.?|Number)|S\.\s*No\.?)`;
export const RELATION_LABEL_SOURCE = String.raw`(Father|Husband|Mother|Other)(?:'s|s)?`;
export const HOUSE_LABEL_SOURCE = String.raw`House\s*(?:No\.?|Number)?`;

/** Words that end a free-text value such as a name */
export const FIELD_STOP_SOURCE = String.raw`(?:Father|Husband|Mother|Other|Name|Age|House|Gender|Sex|S[l1I]\.?\s*No|Serial|EPIC|Photo|Male|Female)\b`;

export const NAME_VALUE_SOURCE = String.raw`[A-Za-z][A-Za-z .']*`;

const NAME_SHAPE = /^[A-Za-z][A-Za-z .']*$/;
const MAX_NAME_LENGTH = 50;
const MAX_HOUSE_LENGTH = 30;
const MIN_VOTER_AGE = 18;
const MAX_VOTER_AGE = 120;

export interface RecordDraft {
  serialNo?: string;
  epic?: string;
  name?: string;
  relationType?: string;
  relationName?: string;
  houseNo?: string;
  age?: string;
  gender?: string;
}

export function cleanName(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const name = raw.replace(/[\s.,;:'-]+$/, '').replace(/\s+/g, ' ').trim();
  if (!name || name.length > MAX_NAME_LENGTH || !NAME_SHAPE.test(name)) {
    return undefined;
  }
  return name;
}

export function cleanAge(raw: string | undefined): string | undefined {
  if (!raw || !/^\d{1,3}$/.test(raw.trim())) return undefined;
  const age = parseInt(raw, 10);
  return age >= MIN_VOTER_AGE && age <= MAX_VOTER_AGE ? String(age) : undefined;
}

export function cleanSerial(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const serial = raw.trim();
  return /^\d{1,5}$/.test(serial) ? String(parseInt(serial, 10)) : undefined;
}

export function cleanHouse(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const house = raw.replace(/[\s,;:]+$/, '').trim();
  return house && house.length <= MAX_HOUSE_LENGTH ? house : undefined;
}

/**
 * Male → M, Female → F, Third Gender → T
 */
export function canonicalGender(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (value === 'f' || value === 'female') return 'F';
  if (value === 'm' || value === 'male') return 'M';
  if (value === 't' || value.startsWith('third')) return 'T';
  return undefined;
}

const RELATION_ABBREVIATIONS: Record<string, string> = {
  's/o': 'Father',
  'd/o': 'Father',
  'w/o': 'Husband',
  'c/o': 'Other',
};

export function canonicalRelation(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (RELATION_ABBREVIATIONS[value]) return RELATION_ABBREVIATIONS[value];
  const word = value.replace(/(?:'s|s)$/, '');
  const known = ['father', 'husband', 'mother', 'other'].find(relation => relation === word);
  return known ? known.charAt(0).toUpperCase() + known.slice(1) : undefined;
}

export function ageGroup(age: string): string {
  const years = parseInt(age, 10);
  if (years <= 29) return '18-29';
  if (years <= 45) return '30-45';
  return '45+';
}

/**
 * Validates a draft and turns it into a record. Returns null when neither
 * a name nor a serial number survives validation.
 */
export function finalizeRecord(draft: RecordDraft, pageIndex?: number): VoterRecord | null {
  const name = cleanName(draft.name);
  const serialNo = cleanSerial(draft.serialNo);
  if (!name && !serialNo) {
    return null;
  }

  const age = cleanAge(draft.age);
  const relationName = cleanName(draft.relationName);
  const fields: { [K in VoterField]?: string } = {};
  const set = (key: VoterField, value: string | undefined) => {
    if (value) fields[key] = value;
  };

  set('serialNo', serialNo);
  set('epic', draft.epic?.trim().toUpperCase());
  set('name', name);
  set('relationType', relationName ? canonicalRelation(draft.relationType) : undefined);
  set('relationName', relationName);
  set('houseNo', cleanHouse(draft.houseNo));
  set('age', age);
  set('gender', canonicalGender(draft.gender));
  set('ageGroup', age ? ageGroup(age) : undefined);

  const record: VoterRecord = pageIndex === undefined ? { ...fields } : { ...fields, pageIndex };
  return Object.freeze(record);
}

/**
 * Identity used for within-page deduplication
 */
export function recordKey(record: VoterRecord): string {
  return `${(record.name ?? '').toLowerCase()}|${record.serialNo ?? ''}`;
}
