import fs from 'fs/promises';
import { pdfToPng } from 'pdf-to-png-converter';
import { logger } from '../utils/logger';
import { RasterizationError, errorMessage } from '../types/errors';
import type { RasterPage } from '../types/ocr';

/** PDF user space is 72 units per inch */
const PDF_POINTS_PER_INCH = 72;

/**
 * Converts one PDF into an ordered sequence of page images
 */
export interface Rasterizer {
  rasterize(pdfPath: string, dpi: number): Promise<RasterPage[]>;
}

/**
 * Rasterizer backed by pdf-to-png-converter (pdf.js rendering onto a native canvas).
 * Any failure to read or render the document is a RasterizationError.
 */
export class PDFConverter implements Rasterizer {
  async rasterize(pdfPath: string, dpi: number): Promise<RasterPage[]> {
    try {
      await fs.access(pdfPath);
    } catch (error) {
      throw new RasterizationError(`Cannot read PDF ${pdfPath}: ${errorMessage(error)}`, { cause: error });
    }

    const viewportScale = dpi / PDF_POINTS_PER_INCH;
    logger.info({ pdfPath, dpi, viewportScale }, 'Rasterizing PDF');

    const rendered = await pdfToPng(pdfPath, {
      viewportScale,
      disableFontFace: true,
      useSystemFonts: true,
    }).catch((error: unknown): never => {
      logger.error({ pdfPath, error: errorMessage(error) }, 'PDF rasterization failed');
      throw new RasterizationError(`Failed to rasterize ${pdfPath}: ${errorMessage(error)}`, { cause: error });
    });

    const pages: RasterPage[] = [];
    for (const page of rendered) {
      if (!page.content) {
        throw new RasterizationError(`Page ${page.pageNumber} of ${pdfPath} rendered no image data`);
      }
      pages.push({
        pageIndex: page.pageNumber,
        image: page.content,
        width: page.width,
        height: page.height,
      });
    }

    if (pages.length === 0) {
      throw new RasterizationError(`${pdfPath} contains no renderable pages`);
    }

    pages.sort((a, b) => a.pageIndex - b.pageIndex);

    logger.info({
      pdfPath,
      totalPages: pages.length,
      totalSizeKB: Math.round(pages.reduce((sum, p) => sum + p.image.length, 0) / 1024),
    }, 'PDF rasterized');

    return pages;
  }
}
