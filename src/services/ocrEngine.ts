/**
 * Recognition Engine
 *
 * Contract for the OCR runtime plus the default implementation, which runs
 * the `tesseract` CLI with TSV output on a grayscale PNG crop.
 *
 * Two failure kinds:
 * - EngineUnavailableError: the executable cannot be found (fatal)
 * - OcrEngineError: anything else going wrong inside one call
 */

import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { TIMEOUTS } from '../config/timeouts.js';
import { EngineUnavailableError, OcrEngineError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { OcrToken } from '../types/shared.js';

const execFileAsync = promisify(execFile);

export interface RecognitionEngine {
  readonly name: string;
  /**
   * Recognize text in a single-channel image.
   * @returns Tokens in reading order, confidence on a 0-100 scale
   */
  recognize(image: Buffer): Promise<OcrToken[]>;
}

export interface TesseractOptions {
  /** Executable name or path (default: `tesseract`) */
  binary?: string;
  /** Language code(s), e.g. `eng` or `eng+jpn` */
  language?: string;
  /** Page segmentation mode; 7 treats the crop as one text line */
  pageSegMode?: number;
  timeoutMs?: number;
}

/**
 * Parse `tesseract ... tsv` output into tokens, one per row with a numeric
 * confidence. Layout rows (page/block/paragraph/line) come back with empty
 * text and `conf` -1; they are kept, so they count toward the mean
 * confidence without contributing text.
 *
 * @example
 * parseTesseractTsv('level\t...\tconf\ttext\n4\t1\t1\t1\t1\t0\t0\t0\t40\t12\t-1\t\n5\t1\t1\t1\t1\t1\t0\t0\t40\t12\t91.5\tHello')
 * // [{ text: '', confidence: -1 }, { text: 'Hello', confidence: 91.5 }]
 */
export function parseTesseractTsv(tsv: string): OcrToken[] {
  const lines = tsv.split(/\r?\n/).filter((line) => line.length > 0);
  if (lines.length === 0) return [];

  const header = lines[0].split('\t');
  const confIndex = header.indexOf('conf');
  const textIndex = header.indexOf('text');
  if (confIndex < 0 || textIndex < 0) {
    throw new OcrEngineError(`Unexpected tesseract TSV header: ${lines[0]}`);
  }

  const tokens: OcrToken[] = [];
  for (const line of lines.slice(1)) {
    const columns = line.split('\t');

    const confidence = parseFloat(columns[confIndex] ?? '');
    if (!Number.isFinite(confidence)) continue;

    tokens.push({ text: columns[textIndex] ?? '', confidence });
  }
  return tokens;
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

export class TesseractEngine implements RecognitionEngine {
  readonly name = 'tesseract';
  private readonly binary: string;
  private readonly language: string;
  private readonly pageSegMode: number;
  private readonly timeoutMs: number;

  constructor(options: TesseractOptions = {}, private readonly log: Logger = defaultLogger) {
    this.binary = options.binary ?? 'tesseract';
    this.language = options.language ?? 'eng';
    this.pageSegMode = options.pageSegMode ?? 7;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.OCR_RECOGNITION;
  }

  async recognize(image: Buffer): Promise<OcrToken[]> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wm_ocr_'));
    const imagePath = path.join(dir, 'roi.png');

    try {
      await fs.writeFile(imagePath, image);
      const { stdout } = await execFileAsync(
        this.binary,
        [imagePath, 'stdout', '-l', this.language, '--psm', String(this.pageSegMode), 'tsv'],
        { timeout: this.timeoutMs, maxBuffer: 10 * 1024 * 1024 }
      );
      const tokens = parseTesseractTsv(stdout);
      this.log.debug(`tesseract returned ${tokens.length} rows`, { scope: 'TesseractEngine' });
      return tokens;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new EngineUnavailableError();
      }
      if (error instanceof OcrEngineError) {
        throw error;
      }
      throw new OcrEngineError(errorMessage(error));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
