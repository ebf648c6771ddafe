import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parseArgs, runCli } from '../cli';
import { RasterizationError } from '../types/errors';
import {
  FailingRasterizer,
  FakeEngine,
  InMemoryRasterizer,
  PassthroughPreprocessor,
} from './fakes';

describe('runCli', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'roll-cli-'));
    inputPath = path.join(dir, 'roll.pdf');
    outputPath = path.join(dir, 'voters.xlsx');
    await fs.writeFile(inputPath, 'placeholder');
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const fileExists = (filePath: string) => fs.access(filePath).then(() => true, () => false);

  it('exits 1 without a spreadsheet when rasterization fails', async () => {
    const engine = new FakeEngine(() => '');

    const code = await runCli([inputPath, outputPath, '--no-debug'], {
      rasterizer: new FailingRasterizer(new RasterizationError('corrupt PDF')),
      createEngine: () => engine,
    });

    expect(code).toBe(1);
    await expect(fileExists(outputPath)).resolves.toBe(false);
    expect(engine.terminated).toBe(true);
  });

  it('writes the spreadsheet and debug bundle on success', async () => {
    const debugDir = path.join(dir, 'debug');

    const code = await runCli([inputPath, outputPath, '--debug-dir', debugDir, '--workers', '1'], {
      rasterizer: new InMemoryRasterizer(1),
      preprocessor: new PassthroughPreprocessor(),
      createEngine: () => new FakeEngine(() => 'Name: A, Age: 30, Sl No: 1'),
    });

    expect(code).toBe(0);
    await expect(fileExists(outputPath)).resolves.toBe(true);
    const summary = JSON.parse(await fs.readFile(path.join(debugDir, 'extraction_summary.json'), 'utf8'));
    expect(summary.totalRecords).toBe(1);
    expect(summary.dpi).toBe(300);
  });

  it('exits 0 with a warning when no records are found', async () => {
    const code = await runCli([inputPath, outputPath, '--no-debug'], {
      rasterizer: new InMemoryRasterizer(2),
      preprocessor: new PassthroughPreprocessor(),
      createEngine: () => new FakeEngine(() => ''),
    });

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('⚠️  NO VOTER RECORDS EXTRACTED');
    await expect(fileExists(outputPath)).resolves.toBe(false);
  });

  it.each([
    [[]],
    [['only-one.pdf']],
    [['roll.txt', 'voters.xlsx']],
    [['roll.pdf', 'voters.csv']],
    [['roll.pdf', 'voters.xlsx', '--dpi', 'high']],
    [['roll.pdf', 'voters.xlsx', '--workers', '0']],
    [['roll.pdf', 'voters.xlsx', '--colour']],
    [['roll.pdf', 'voters.xlsx', '--lang']],
  ])('exits 1 on usage error %j', async args => {
    await expect(runCli(args)).resolves.toBe(1);
  });

  it('exits 1 when the input does not exist', async () => {
    await expect(runCli([path.join(dir, 'missing.pdf'), outputPath])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(`❌ Input file not found: ${path.join(dir, 'missing.pdf')}`);
  });

  it('prints usage for --help', async () => {
    await expect(runCli(['--help'])).resolves.toBe(0);
  });

  it('removes its interrupt handler when done', async () => {
    const before = process.listenerCount('SIGINT');

    await runCli([inputPath, outputPath, '--no-debug'], {
      rasterizer: new InMemoryRasterizer(1),
      preprocessor: new PassthroughPreprocessor(),
      createEngine: () => new FakeEngine(() => ''),
    });

    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  describe('check', () => {
    it('exits 0 when every dependency is usable', async () => {
      const code = await runCli(['check'], {
        checkImageToolchain: async () => undefined,
        checkEngine: async () => undefined,
      });

      expect(code).toBe(0);
    });

    it('exits 1 when a dependency check fails', async () => {
      const code = await runCli(['check'], {
        checkImageToolchain: async () => undefined,
        checkEngine: async () => {
          throw new Error('missing language data');
        },
      });

      expect(code).toBe(1);
      expect(logSpy).toHaveBeenCalledWith('   ✗ OCR engine (tesseract.js, eng): missing language data');
    });
  });
});

describe('parseArgs', () => {
  it('separates positional arguments, options and flags', () => {
    const parsed = parseArgs(['in.pdf', '--dpi', '400', 'out.xlsx', '--no-debug']);

    expect(parsed.positional).toEqual(['in.pdf', 'out.xlsx']);
    expect(parsed.options.get('dpi')).toBe('400');
    expect(parsed.flags.has('no-debug')).toBe(true);
  });
});
