/**
 * Frame Source
 *
 * Random-access single-frame decoding of a media file. A reader is a scoped
 * handle: open it, read frames at offsets, close it on every exit path.
 */

import ffmpeg from 'fluent-ffmpeg';
import { TIMEOUTS } from '../config/timeouts.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { Frame } from '../types/shared.js';
import { FfprobeProber, type Prober } from './ffmpeg.js';

export interface FrameReader {
  readonly width: number;
  readonly height: number;
  /**
   * Decode the frame at `offset` seconds from the start of the file.
   * Resolves null when no frame can be read (end of stream, decode error).
   */
  read(offset: number): Promise<Frame | null>;
  close(): void;
}

export interface FrameSource {
  /**
   * Open a reader; rejects with an AppError naming the path on failure
   */
  open(path: string): Promise<FrameReader>;
}

class FfmpegFrameReader implements FrameReader {
  private closed = false;

  constructor(
    private readonly path: string,
    readonly width: number,
    readonly height: number,
    private readonly log: Logger
  ) {}

  read(offset: number): Promise<Frame | null> {
    if (this.closed) {
      return Promise.reject(new Error(`Frame reader for ${this.path} is closed`));
    }

    const frameSize = this.width * this.height * 3;

    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let received = 0;
      let settled = false;

      const finish = (frame: Frame | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve(frame);
      };

      const command = ffmpeg(this.path)
        .seekInput(offset)
        .frames(1)
        .outputOptions(['-an', '-f', 'rawvideo', '-pix_fmt', 'rgb24'])
        .on('error', (err: Error) => {
          this.log.debug(`Frame read failed at ${offset}s`, { path: this.path, error: err.message });
          finish(null);
        });

      const timeoutId = setTimeout(() => {
        this.log.warn(`Frame read timed out at ${offset}s`, { path: this.path });
        try {
          command.kill('SIGKILL');
        } catch (killError) {
          this.log.error('Failed to kill FFmpeg process', { error: errorMessage(killError) });
        }
        finish(null);
      }, TIMEOUTS.FRAME_READ);

      command
        .pipe()
        .on('data', (chunk: Buffer) => {
          chunks.push(chunk);
          received += chunk.length;
        })
        .on('end', () => {
          if (received < frameSize) {
            finish(null);
            return;
          }
          finish({
            width: this.width,
            height: this.height,
            channels: 3,
            data: Buffer.concat(chunks, received).subarray(0, frameSize),
          });
        });
    });
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Frame source backed by ffprobe (dimensions) and ffmpeg (rgb24 decode)
 */
export class FfmpegFrameSource implements FrameSource {
  constructor(
    private readonly prober: Prober = new FfprobeProber(),
    private readonly log: Logger = defaultLogger
  ) {}

  async open(path: string): Promise<FrameReader> {
    try {
      const { width, height } = await this.prober.probe(path);
      return new FfmpegFrameReader(path, width, height, this.log);
    } catch (error) {
      this.log.error('Cannot open clip file for frame extraction', { path, error: errorMessage(error) });
      throw new AppError('Cannot open clip file for frame extraction.', path);
    }
  }
}
