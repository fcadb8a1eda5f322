/**
 * Video Importer
 *
 * Turns a local file or a remote URL into a Video value: checks the file,
 * downloads remote media, probes duration and resolution.
 */

import axios from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Readable } from 'stream';
import { TIMEOUTS } from '../config/timeouts.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { createVideo, type Video } from '../types/shared.js';
import type { Prober, ProbeResult } from './ffmpeg.js';

export interface DownloadOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Fetch `url` into the file `dest`
 */
export type Downloader = (url: string, dest: string, options?: DownloadOptions) => Promise<void>;

const MAX_DOWNLOAD_BYTES = 2 * 1024 * 1024 * 1024;
const LOG_INTERVAL = 50 * 1024 * 1024;

/**
 * Stream a remote file to disk with axios
 */
export const downloadFile: Downloader = async (url, dest, options = {}) => {
  const { signal } = options;
  const log = options.logger ?? defaultLogger;
  const response = await axios
    .get<Readable>(url, {
      responseType: 'stream',
      timeout: TIMEOUTS.DOWNLOAD,
      maxContentLength: MAX_DOWNLOAD_BYTES,
      maxBodyLength: MAX_DOWNLOAD_BYTES,
      signal,
    })
    .catch((err: unknown) => {
      throw new AppError('Cannot download video from URL.', errorMessage(err));
    });

  const totalBytes = parseInt(String(response.headers['content-length'] ?? '0'), 10);

  await new Promise<void>((resolve, reject) => {
    const file = fs.createWriteStream(dest);
    let downloadedBytes = 0;
    let lastLoggedBytes = 0;

    const fail = (message: string): void => {
      file.destroy();
      fs.rm(dest, { force: true }, (rmError) => {
        if (rmError) log.warn('Failed to remove partial download', { dest, error: rmError.message });
      });
      reject(new AppError('Cannot download video from URL.', message));
    };

    response.data.on('data', (chunk: Buffer) => {
      downloadedBytes += chunk.length;
      if (downloadedBytes - lastLoggedBytes >= LOG_INTERVAL) {
        const percent = totalBytes > 0 ? ` (${((downloadedBytes / totalBytes) * 100).toFixed(1)}%)` : '';
        log.debug(`Downloaded ${(downloadedBytes / 1024 / 1024).toFixed(1)}MB${percent}`);
        lastLoggedBytes = downloadedBytes;
      }
    });
    response.data.on('error', (err: Error) => fail(`Download stream error: ${err.message}`));
    file.on('error', (err) => fail(`Failed to write file: ${err.message}`));
    file.on('finish', () => {
      log.debug(`Downloaded ${downloadedBytes} bytes`, { dest });
      resolve();
    });

    response.data.pipe(file);
  });
};

/**
 * Lowercase extension without the leading dot
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).replace(/^\./, '').toLowerCase();
}

export interface VideoImporterOptions {
  supportedFormats: readonly string[];
  prober: Prober;
  downloader?: Downloader;
  logger?: Logger;
}

export class VideoImporter {
  private readonly supportedFormats: readonly string[];
  private readonly prober: Prober;
  private readonly downloader: Downloader;
  private readonly log: Logger;

  constructor(options: VideoImporterOptions) {
    this.supportedFormats = options.supportedFormats;
    this.prober = options.prober;
    this.downloader = options.downloader ?? downloadFile;
    this.log = (options.logger ?? defaultLogger).child({ scope: 'VideoImporter' });
  }

  async probeVideoMetadata(filePath: string): Promise<ProbeResult> {
    try {
      return await this.prober.probe(filePath);
    } catch (error) {
      if (error instanceof AppError) throw error;
      this.log.error(errorMessage(error), { filePath });
      throw new AppError('Cannot read video metadata.', errorMessage(error));
    }
  }

  async importFromFile(filePath: string): Promise<Video> {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new AppError('File not found.', filePath);
    }

    const ext = fileExtension(filePath);
    if (!this.supportedFormats.includes(ext)) {
      throw new AppError('Unsupported file format.', ext);
    }

    const { width, height, duration } = await this.probeVideoMetadata(filePath);
    const video = createVideo({
      sourceType: 'file',
      sourcePath: path.resolve(filePath),
      duration,
      resolution: { width, height },
    });
    this.log.info(`Imported ${path.basename(filePath)}: ${width}x${height}, ${duration.toFixed(1)}s`);
    return video;
  }

  /**
   * Download into `downloadDir` (default: a fresh temp directory) and import.
   * The local name follows the URL path when its extension is supported,
   * otherwise `video.mp4`.
   */
  async importFromUrl(url: string, downloadDir?: string, signal?: AbortSignal): Promise<Video> {
    let parsed: URL;
    let urlName: string;
    try {
      parsed = new URL(url);
      urlName = path.basename(decodeURIComponent(parsed.pathname));
    } catch (error) {
      throw new AppError('Invalid video URL.', errorMessage(error));
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new AppError('Invalid video URL.', `Unsupported protocol ${parsed.protocol}`);
    }

    const dir = downloadDir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'wm_download_'));
    fs.mkdirSync(dir, { recursive: true });

    const fileName = this.supportedFormats.includes(fileExtension(urlName)) ? urlName : 'video.mp4';
    const dest = path.join(dir, fileName);

    this.log.info(`Downloading ${url.substring(0, 100)}`);
    try {
      await this.downloader(url, dest, { signal, logger: this.log });
    } catch (error) {
      this.log.error(`Download failed: ${errorMessage(error)}`);
      if (error instanceof AppError) throw error;
      throw new AppError('Cannot download video from URL.', errorMessage(error));
    }

    if (!fs.existsSync(dest)) {
      throw new AppError('Downloaded file not found or ambiguous.', `Expected ${dest}`);
    }

    const { width, height, duration } = await this.probeVideoMetadata(dest);
    return createVideo({
      sourceType: 'url',
      sourcePath: path.resolve(dest),
      originalUrl: url,
      duration,
      resolution: { width, height },
    });
  }
}
