import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'electoral-roll-ocr',
  level: config.isTest ? 'silent' : config.logging.level,
  timestamp: pino.stdTimeFunctions.isoTime,
});
