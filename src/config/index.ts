import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const positiveInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().positive()).default(fallback);

const envSchema = z.object({
  // Rasterization
  OCR_DPI: positiveInt('300'),

  // Page workers (also caps concurrent recognition engine invocations)
  OCR_WORKERS: positiveInt('2'),
  OCR_LANG: z.string().min(1).default('eng'),

  // Preprocessing
  OCR_MIN_WIDTH: positiveInt('1500'),

  // Strategy subset, comma separated. Empty means all strategies.
  OCR_STRATEGIES: z.string().optional(),

  // Debug bundle
  OCR_DEBUG: z.string().transform(val => val !== 'false').default('true'),
  OCR_DEBUG_DIR: z.string().min(1).default('ocr_debug_output'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

const env = envSchema.parse(process.env);

const strategyIds = (env.OCR_STRATEGIES ?? '')
  .split(',')
  .map(id => id.trim())
  .filter(id => id.length > 0);

export const config = {
  ocr: {
    dpi: env.OCR_DPI,
    workers: env.OCR_WORKERS,
    lang: env.OCR_LANG,
    minWidth: env.OCR_MIN_WIDTH,
    strategies: strategyIds,
  },
  debug: {
    enabled: env.OCR_DEBUG,
    dir: env.OCR_DEBUG_DIR,
  },
  logging: {
    level: env.LOG_LEVEL,
  },
  isTest: env.NODE_ENV === 'test',
};
