/**
 * Structured OCR Logger
 * Formatted terminal output for an extraction run
 */

const SEPARATOR = '='.repeat(80);
const SUBSEPARATOR = '-'.repeat(80);

export interface RunStartInfo {
  source: string;
  output: string;
  dpi: number;
  workers: number;
  strategies: readonly string[];
  debugDir: string | null;
}

export interface RunCompleteInfo {
  totalPages: number;
  pagesProcessed: number;
  totalRecords: number;
  zeroYieldPages: readonly number[];
  duration: number;
  output: string | null;
  debugDir: string | null;
  aborted: boolean;
}

export class OCRLogger {
  /**
   * Log run start
   */
  static runStarted(info: RunStartInfo): void {
    console.log('\n' + SEPARATOR);
    console.log('🗳️  Electoral Roll Extraction Started');
    console.log(SEPARATOR);
    console.log('\n📋 Run Details');
    console.log(`   Input: ${info.source}`);
    console.log(`   Output: ${info.output}`);
    console.log(`   DPI: ${info.dpi}`);
    console.log(`   Workers: ${info.workers}`);
    console.log(`   Strategies: ${info.strategies.join(', ')}`);
    console.log(`   Debug Output: ${info.debugDir ?? 'disabled'}`);
    console.log('\n' + SEPARATOR + '\n');
  }

  static pdfRasterized(totalPages: number, dpi: number): void {
    console.log(SUBSEPARATOR);
    console.log('📸 PDF Conversion');
    console.log(SUBSEPARATOR);
    console.log(`   ✓ ${totalPages} page(s) rasterized at ${dpi} DPI`);
    console.log(`   Status: Recognizing pages...`);
    console.log(SUBSEPARATOR + '\n');
  }

  /**
   * Log page progress
   */
  static pageProcessed(
    pageIndex: number,
    totalPages: number,
    recordCount: number,
    strategy: string | null
  ): void {
    const progress = `[${pageIndex}/${totalPages}]`;
    if (recordCount === 0) {
      console.log(`   ${progress} Page ${pageIndex} → ⚠️  no records (strategy: ${strategy ?? 'none'})`);
      return;
    }
    console.log(`   ${progress} Page ${pageIndex} → ${recordCount} record(s) (strategy: ${strategy})`);
  }

  static pageFailed(pageIndex: number, totalPages: number, error: string): void {
    console.log(`   [${pageIndex}/${totalPages}] Page ${pageIndex} → ❌ ${error}`);
  }

  /**
   * Log run completion
   */
  static runComplete(info: RunCompleteInfo): void {
    console.log('\n' + SEPARATOR);
    console.log(info.aborted ? '⏹️  Extraction Aborted' : '✅ Extraction Complete');
    console.log(SEPARATOR);
    console.log('\n📊 Summary');
    console.log(`   Pages Processed: ${info.pagesProcessed}/${info.totalPages}`);
    console.log(`   Voters Extracted: ${info.totalRecords.toLocaleString()}`);
    if (info.zeroYieldPages.length > 0) {
      console.log(`   Pages Without Records: ${info.zeroYieldPages.join(', ')}`);
    }
    console.log(`   Processing Time: ${info.duration.toFixed(1)}s`);
    console.log('\n📁 Files');
    console.log(`   Spreadsheet: ${info.output ?? 'not written'}`);
    console.log(`   Debug Output: ${info.debugDir ?? 'disabled'}`);
    console.log('\n' + SEPARATOR + '\n');
  }

  /**
   * Zero records is a warning, printed with what to check next
   */
  static zeroRecordsWarning(debugDir: string | null): void {
    console.log('\n' + SEPARATOR);
    console.log('⚠️  NO VOTER RECORDS EXTRACTED');
    console.log(SEPARATOR);
    console.log('\n🔍 Troubleshooting');
    if (debugDir) {
      console.log(`   1. Open the page images in ${debugDir} and check that the scan is legible`);
      console.log(`   2. Read the raw recognition text files (page_XXX_raw_*.txt)`);
      console.log(`   3. Compare the combined text with the expected record layout`);
    } else {
      console.log('   1. Re-run without --no-debug to keep page images and recognized text');
    }
    console.log('   • Try a higher DPI (--dpi 400 to 600) for faint or small print');
    console.log('   • Check that the tesseract language data matches the roll (--lang)');
    console.log('\n' + SEPARATOR + '\n');
  }

  static runFailed(source: string, error: string): void {
    console.log('\n' + SEPARATOR);
    console.log('❌ Extraction Failed');
    console.log(SEPARATOR);
    console.log(`   Input: ${source}`);
    console.log(`   Error: ${error}`);
    console.log('\n' + SEPARATOR + '\n');
  }
}
