import { EPIC_SOURCE, SERIAL_LABEL_SOURCE } from './fields';

const IDENTITY_PATTERN = new RegExp(String.raw`\bName\s*:|\b(?:${EPIC_SOURCE})\b`, 'i');
const DETAIL_PATTERN = new RegExp(
  String.raw`\bAge\s*:?\s*\d{1,3}\b|\b\d{2,3}\s*(?:years?|yrs)\b|\b${SERIAL_LABEL_SOURCE}\s*:?\s*\d{1,5}\b|^\s*\d{1,5}\s`,
  'i'
);

/**
 * Counts lines that look like the start of a voter record: a name label or
 * EPIC id together with an age or serial number. Used only to rank
 * recognition attempts, never to produce records.
 */
export function structuralProbe(text: string): number {
  let matches = 0;
  for (const line of text.split('\n')) {
    if (IDENTITY_PATTERN.test(line) && DETAIL_PATTERN.test(line)) {
      matches++;
    }
  }
  return matches;
}
