/**
 * Image Preprocessing Module
 *
 * Deterministic sharp pipeline that prepares page images for recognition:
 * grayscale, contrast normalization, sharpening, then upscaling of narrow
 * pages to a minimum width.
 */

import sharp from 'sharp';
import { logger } from '../utils/logger';
import { errorMessage } from '../types/errors';

export const DEFAULT_MIN_WIDTH = 1500;

export interface ImagePreprocessor {
  preprocess(originalImage: Buffer, pageIndex: number): Promise<Buffer>;
}

export interface PreprocessorOptions {
  /** Pages narrower than this are upscaled to it, aspect ratio preserved */
  minWidth?: number;
}

export class SharpPreprocessor implements ImagePreprocessor {
  private readonly minWidth: number;

  constructor(options: PreprocessorOptions = {}) {
    this.minWidth = options.minWidth ?? DEFAULT_MIN_WIDTH;
  }

  /**
   * Never throws: a malformed image is returned unchanged.
   */
  async preprocess(originalImage: Buffer, pageIndex: number): Promise<Buffer> {
    try {
      // sharp applies resize before sharpen within one pipeline, so upscaling is a second pass
      const enhanced = await sharp(originalImage)
        .grayscale()
        .normalise()
        .sharpen()
        .png()
        .toBuffer({ resolveWithObject: true });

      if (enhanced.info.width >= this.minWidth) {
        return enhanced.data;
      }

      const upscaled = await sharp(enhanced.data)
        .resize({ width: this.minWidth, kernel: sharp.kernel.lanczos3 })
        .png()
        .toBuffer();

      logger.debug({
        pageIndex,
        originalWidth: enhanced.info.width,
        upscaledWidth: this.minWidth,
      }, 'Page upscaled');

      return upscaled;
    } catch (error) {
      logger.warn({ pageIndex, error: errorMessage(error) }, 'Preprocessing failed, using original image');
      return originalImage;
    }
  }
}

/**
 * Confirms the native image library loads and can encode a PNG
 */
export async function checkImageToolchain(): Promise<void> {
  await sharp({
    create: { width: 1, height: 1, channels: 3, background: { r: 255, g: 255, b: 255 } },
  }).png().toBuffer();
}
