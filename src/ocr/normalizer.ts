/**
 * Text Normalization Module
 *
 * Cleans recognized text before extraction:
 *   1. strips non-printable artifacts and applies NFKC
 *   2. collapses whitespace and canonicalizes colon spacing
 *   3. fixes misread label words (Narne → Name, Aqe → Age)
 *   4. maps letter/digit confusions (O → 0, l → 1, ...) only where digits are
 *      expected: right after a numeric label, or inside a token that starts and
 *      ends with a digit
 *
 * normalize() is total and idempotent.
 */

import { z } from 'zod';
import correctionData from './data/ocr-corrections.json';
import { ConfigurationError } from '../types/errors';

export const CorrectionTableSchema = z.object({
  labels: z.record(z.string().min(1), z.string().min(1)),
  digitConfusions: z.record(z.string().length(1), z.string().regex(/^\d$/)),
});

export type CorrectionTable = z.infer<typeof CorrectionTableSchema>;

export const DEFAULT_CORRECTIONS: CorrectionTable = CorrectionTableSchema.parse(correctionData);

export interface NormalizationResult {
  text: string;
  /** Label fixes plus digit-context token fixes */
  corrections: number;
}

// C0/C1 controls except \t and \n, soft hyphen, zero-width marks, line separators, BOM, U+FFFD
const ARTIFACTS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u00AD\u200B-\u200F\u2028\u2029\u2060\uFEFF\uFFFD]/g;

const NUMERIC_LABEL = String.raw`(?:[Aa]ge|AGE|S[lI1]\.?\s?[Nn]o\.?|SL\.?\s?NO\.?|Serial\s+[Nn]o\.?|SERIAL\s+NO\.?|S\.\s?[Nn]o\.?|Part\s+[Nn]o\.?|PART\s+NO\.?)`;

function escapeForClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&');
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class TextNormalizer {
  private readonly labelRules: Array<{ pattern: RegExp; replacement: string }>;
  private readonly confusions: Map<string, string>;
  private readonly labelledToken: RegExp;
  private readonly interiorToken: RegExp;

  constructor(table: CorrectionTable = DEFAULT_CORRECTIONS) {
    const wrong = new Set(Object.keys(table.labels).map(key => key.toLowerCase()));
    const cyclic = Object.values(table.labels).filter(value => wrong.has(value.toLowerCase()));
    if (cyclic.length > 0) {
      throw new ConfigurationError(`Label corrections must not produce a word they also correct: ${cyclic.join(', ')}`);
    }

    this.labelRules = Object.entries(table.labels).map(([from, to]) => ({
      pattern: new RegExp(`\\b${escapeRegex(from)}\\b`, 'gi'),
      replacement: to,
    }));

    this.confusions = new Map(Object.entries(table.digitConfusions));
    const confusable = escapeForClass([...this.confusions.keys()].join(''));

    this.labelledToken = new RegExp(
      String.raw`\b(${NUMERIC_LABEL})(\s*:?\s*)([0-9${confusable}]{1,5})(?=[\s,.;]|$)`,
      'g'
    );
    this.interiorToken = new RegExp(String.raw`(?<![\w|])(\d[0-9${confusable}]*\d)(?![\w|])`, 'g');
  }

  normalize(text: string): string {
    return this.normalizeWithStats(text).text;
  }

  normalizeWithStats(text: string): NormalizationResult {
    let corrections = 0;

    let result = text.replace(/\r\n?/g, '\n').replace(ARTIFACTS, '').normalize('NFKC');
    result = collapseWhitespace(result);

    for (const rule of this.labelRules) {
      result = result.replace(rule.pattern, () => {
        corrections++;
        return rule.replacement;
      });
    }

    result = result.replace(this.labelledToken, (match: string, label: string, gap: string, token: string) => {
      if (!/\d/.test(token) || /^\d+$/.test(token)) return match;
      corrections++;
      return label + gap + this.toDigits(token);
    });

    result = result.replace(this.interiorToken, (token: string) => {
      if (/^\d+$/.test(token)) return token;
      corrections++;
      return this.toDigits(token);
    });

    return { text: result, corrections };
  }

  private toDigits(token: string): string {
    return [...token].map(ch => this.confusions.get(ch) ?? ch).join('');
  }
}

function collapseWhitespace(text: string): string {
  return text
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ *: */g, ': ')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

const defaultNormalizer = new TextNormalizer();

export function normalize(text: string): string {
  return defaultNormalizer.normalize(text);
}
