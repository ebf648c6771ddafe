/**
 * TypeScript types for the recognition-to-record pipeline
 * These types describe pages as they move through rasterization, preprocessing,
 * recognition, normalization and extraction
 */

/**
 * Page layout assumption handed to the recognition engine
 * (block of text, single column, or sparse lines)
 */
export type PageLayout = 'block' | 'column' | 'sparse';

/**
 * Which raster image a strategy feeds to the engine
 */
export type ImageVariant = 'processed' | 'original';

/**
 * A single page image produced by the rasterizer
 */
export interface RasterPage {
  /** Page number (1-indexed, stable ordering) */
  pageIndex: number;
  /** PNG encoded page image */
  image: Buffer;
  width: number;
  height: number;
}

/**
 * One distinct configuration of image variant + engine layout
 */
export interface RecognitionStrategy {
  /** Stable identifier used in debug file names and the summary (e.g. "processed-block") */
  id: string;
  variant: ImageVariant;
  layout: PageLayout;
}

/**
 * Internal selection score. Not a recognition confidence.
 */
export interface AttemptScore {
  /** Lines matching the minimal record shape */
  probeMatches: number;
  /** Length of the trimmed text */
  textLength: number;
}

/**
 * One (page, strategy) pairing
 */
export interface RecognitionAttempt {
  strategyId: string;
  text: string;
  score: AttemptScore;
  /** Engine failure message when the strategy errored */
  error?: string;
}

/**
 * Fields a voter record may carry, in spreadsheet column order
 */
export const VOTER_FIELDS = [
  'parliamentaryNo',
  'parliamentaryName',
  'constituencyNo',
  'constituencyName',
  'partNo',
  'tehsilBlock',
  'region',
  'division',
  'district',
  'serialNo',
  'epic',
  'name',
  'relationType',
  'relationName',
  'houseNo',
  'age',
  'gender',
  'ageGroup',
] as const;

export type VoterField = (typeof VOTER_FIELDS)[number];

/**
 * Final structured output unit. Fields that were not recovered are absent.
 * At least one of `name` or `serialNo` is always present.
 */
export type VoterRecord = Readonly<Partial<Record<VoterField, string>>> & {
  /** Source page, kept for debugging only */
  readonly pageIndex?: number;
};

/**
 * Header information printed at the top of a roll
 */
export interface RollMetadata {
  constituencyNo?: string;
  constituencyName?: string;
  parliamentaryNo?: string;
  parliamentaryName?: string;
  partNo?: string;
  district?: string;
  subdivision?: string;
  tehsil?: string;
  block?: string;
  pinCode?: string;
  /** State derived from the district */
  region?: string;
}

/**
 * Which matcher produced records for a text segment
 */
export type MatcherName = 'strict-layout' | 'keyword' | 'heuristic-block';

export interface SegmentOutcome {
  /** 0-based position of the segment within the page text */
  index: number;
  matcher: MatcherName | null;
  recordCount: number;
}

/**
 * Result of extracting one page's normalized text
 */
export interface PageExtraction {
  records: VoterRecord[];
  segments: SegmentOutcome[];
  /** Records dropped because an identical (name, serial number) pair was already seen */
  duplicatesRemoved: number;
}

/**
 * A page after it has gone through every pipeline stage
 */
export interface PageResult {
  pageIndex: number;
  originalImage: Buffer;
  processedImage: Buffer;
  attempts: RecognitionAttempt[];
  /** Strategy whose text was kept, null when every strategy came back empty */
  selectedStrategy: string | null;
  selectedText: string;
  normalizedText: string;
  correctionsApplied: number;
  extraction: PageExtraction;
  zeroYield: boolean;
  /** Unexpected failure that stopped this page early */
  error?: string;
}
