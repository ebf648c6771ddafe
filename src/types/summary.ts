/**
 * Extraction summary schema
 *
 * The summary is the machine-readable part of the debug bundle. It is built
 * once every page worker has finished and validated before it is persisted.
 */

import { z } from 'zod';

export const PageSummarySchema = z.object({
  pageIndex: z.number().int().positive(),
  recordsFound: z.number().int().min(0),
  strategiesAttempted: z.array(z.string()),
  selectedStrategy: z.string().nullable(),
  correctionsApplied: z.number().int().min(0),
  segments: z.number().int().min(0),
  unmatchedSegments: z.number().int().min(0),
  duplicatesRemoved: z.number().int().min(0),
  matchers: z.record(z.string(), z.number().int().min(0)),
  zeroYield: z.boolean(),
  error: z.string().optional(),
});

export type PageSummary = z.infer<typeof PageSummarySchema>;

export const RollMetadataSchema = z.object({
  constituencyNo: z.string().optional(),
  constituencyName: z.string().optional(),
  parliamentaryNo: z.string().optional(),
  parliamentaryName: z.string().optional(),
  partNo: z.string().optional(),
  district: z.string().optional(),
  subdivision: z.string().optional(),
  tehsil: z.string().optional(),
  block: z.string().optional(),
  pinCode: z.string().optional(),
  region: z.string().optional(),
});

export const ExtractionSummarySchema = z.object({
  runId: z.string(),
  source: z.string(),
  dpi: z.number().int().positive(),
  startedAt: z.string(),
  finishedAt: z.string(),
  totalPages: z.number().int().min(0),
  pagesProcessed: z.number().int().min(0),
  totalRecords: z.number().int().min(0),
  strategies: z.array(z.string()),
  zeroYieldPages: z.array(z.number().int().positive()),
  aborted: z.boolean(),
  rollMetadata: RollMetadataSchema,
  /** First few records, every value as a string */
  sampleRecords: z.array(z.record(z.string(), z.string())),
  pages: z.array(PageSummarySchema),
});

export type ExtractionSummary = z.infer<typeof ExtractionSummarySchema>;
