/**
 * Roll header metadata
 *
 * The first pages of a roll carry the constituency, part number and the
 * location (district, subdivision, tehsil, block, pin code). These are read
 * once and stamped onto every record.
 */

import { z } from 'zod';
import regionData from './data/regions.json';
import type { RollMetadata, VoterField, VoterRecord } from '../types/ocr';

/** Header pages are at the front of the roll */
export const METADATA_PAGES = 3;

const ASSEMBLY = /Assembly\s+Constituency[^\d\n]*(\d{1,3})\s*[-\u2013\u2014]\s*([A-Za-z][A-Za-z ()]*?)\s*(?=\bPart\b|\bGENERAL\b|\n|$)/i;
const PARLIAMENTARY = /(?:Parliamentary\s+Constituency|Lok\s+Sabha)[^\d\n]*(\d{1,3})\s*[-\u2013\u2014]\s*([A-Za-z][A-Za-z ()]*?)\s*(?=\bPart\b|\bAssembly\b|\n|$)/i;
const PART = /\bPart\s*(?:No\.?|Number)?\s*:?\s*(\d{1,4})\b/i;
const DISTRICT = /\bDistrict\s*:?\s*([A-Za-z][A-Za-z ]*?)\s*(?=\d|\bPin\b|,|\n|$)/i;
const SUBDIVISION = /\bSub-?division\s*:?\s*([A-Za-z][A-Za-z ]*?)\s*(?=\bDistrict\b|\bPin\b|\d|,|\n|$)/i;
const TEHSIL = /\bTehsil\s*:?\s*([A-Za-z][A-Za-z ]*?)\s*(?=\bBlock\b|\bDistrict\b|\bPin\b|\d|,|\n|$)/i;
const BLOCK = /\bBlock\s*:?\s*([A-Za-z][A-Za-z ]*?)\s*(?=\bTehsil\b|\bDistrict\b|\bPin\b|\d|,|\n|$)/i;
const PIN_CODE = /\bPin\s*(?:code)?\s*:?\s*(\d{6})\b/i;

/** State name → lower-cased district names it contains */
const REGIONS = z.record(z.string(), z.array(z.string().min(1))).parse(regionData);

const ROLL_METADATA_KEYS = [
  'constituencyNo',
  'constituencyName',
  'parliamentaryNo',
  'parliamentaryName',
  'partNo',
  'district',
  'subdivision',
  'tehsil',
  'block',
  'pinCode',
] as const satisfies ReadonlyArray<keyof RollMetadata>;

export function extractPageMetadata(text: string): RollMetadata {
  const metadata: RollMetadata = {};

  const assembly = ASSEMBLY.exec(text);
  if (assembly) {
    metadata.constituencyNo = assembly[1];
    metadata.constituencyName = assembly[2].trim();
  }

  const parliamentary = PARLIAMENTARY.exec(text);
  if (parliamentary) {
    metadata.parliamentaryNo = parliamentary[1];
    metadata.parliamentaryName = parliamentary[2].trim();
  }

  const part = PART.exec(text);
  if (part) {
    metadata.partNo = part[1];
  }

  const locations: Array<[RegExp, 'district' | 'subdivision' | 'tehsil' | 'block' | 'pinCode']> = [
    [DISTRICT, 'district'],
    [SUBDIVISION, 'subdivision'],
    [TEHSIL, 'tehsil'],
    [BLOCK, 'block'],
    [PIN_CODE, 'pinCode'],
  ];
  for (const [pattern, key] of locations) {
    const value = pattern.exec(text)?.[1].trim();
    if (value) {
      metadata[key] = value;
    }
  }

  return metadata;
}

/**
 * State for a known district, otherwise the district itself
 */
export function regionForDistrict(district: string | undefined): string | undefined {
  if (!district) return undefined;
  const lower = district.toLowerCase();
  const state = Object.entries(REGIONS).find(([, districts]) => districts.some(known => lower.includes(known)));
  return state ? state[0] : district;
}

/**
 * Merges the header fields of the leading pages; the first page to supply a field wins
 */
export function extractRollMetadata(pageTexts: readonly string[]): RollMetadata {
  const merged: RollMetadata = {};
  for (const text of pageTexts.slice(0, METADATA_PAGES)) {
    const found = extractPageMetadata(text);
    for (const key of ROLL_METADATA_KEYS) {
      if (merged[key] === undefined && found[key] !== undefined) {
        merged[key] = found[key];
      }
    }
  }

  const region = regionForDistrict(merged.district);
  if (region) {
    merged.region = region;
  }
  return merged;
}

/**
 * Record columns filled from the roll header
 */
export function metadataFields(metadata: RollMetadata): Partial<Record<VoterField, string>> {
  const candidates: Array<[VoterField, string | undefined]> = [
    ['parliamentaryNo', metadata.parliamentaryNo],
    ['parliamentaryName', metadata.parliamentaryName],
    ['constituencyNo', metadata.constituencyNo],
    ['constituencyName', metadata.constituencyName],
    ['partNo', metadata.partNo],
    ['tehsilBlock', metadata.tehsil ?? metadata.block ?? metadata.subdivision],
    ['region', metadata.region],
    ['division', metadata.subdivision],
    ['district', metadata.district],
  ];

  const fields: Partial<Record<VoterField, string>> = {};
  for (const [key, value] of candidates) {
    if (value) fields[key] = value;
  }
  return fields;
}

export function applyRollMetadata(record: VoterRecord, metadata: RollMetadata): VoterRecord {
  return Object.freeze({ ...metadataFields(metadata), ...record });
}
