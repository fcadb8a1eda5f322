/**
 * Frame Sampler
 *
 * Samples a clip at a fixed rate. The clip's media segment is trimmed from
 * the source video on first use (stream copy) and cached on the clip.
 * Without a caller-supplied workDir, segments go to one temp directory per
 * sampler; they stay readable until `dispose()` removes it.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { InvalidArgumentError, throwIfAborted } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { formatRange } from '../utils/timecode.js';
import { FrameBatch, UNASSIGNED_ID, type Clip, type Video } from '../types/shared.js';
import type { Trimmer } from './ffmpeg.js';
import type { FrameSource } from './frameSource.js';

export interface ExtractOptions {
  /** Directory for trimmed segments, owned by the caller (default: the sampler's temp directory) */
  workDir?: string;
  signal?: AbortSignal;
}

/**
 * File name of a clip's trimmed segment
 */
export function segmentFileName(clip: Clip): string {
  if (clip.isAssigned) {
    return `clip_${clip.clipId}.mp4`;
  }
  const startMs = Math.round(clip.startTime * 1000);
  const endMs = Math.round(clip.endTime * 1000);
  return `clip_temp_${startMs}-${endMs}.mp4`;
}

export class FrameSampler {
  private tempDir: Promise<string> | null = null;

  constructor(
    private readonly trimmer: Trimmer,
    private readonly source: FrameSource,
    private readonly log: Logger = defaultLogger
  ) {}

  private ownWorkDir(): Promise<string> {
    if (!this.tempDir) {
      this.tempDir = fs.mkdtemp(path.join(os.tmpdir(), 'wm_clips_'));
    }
    return this.tempDir;
  }

  /**
   * Remove the sampler's temp directory and every segment trimmed into it
   */
  async dispose(): Promise<void> {
    if (!this.tempDir) return;
    const dir = await this.tempDir;
    this.tempDir = null;
    await fs.rm(dir, { recursive: true, force: true });
    this.log.debug('Removed segment directory', { scope: 'FrameSampler', dir });
  }

  /**
   * Path of the clip's segment, trimming it first if needed
   */
  async materialize(clip: Clip, video: Video, options: ExtractOptions = {}): Promise<string> {
    if (clip.segmentPath !== null) {
      return clip.segmentPath;
    }

    const workDir = options.workDir ?? (await this.ownWorkDir());
    await fs.mkdir(workDir, { recursive: true });
    const outputPath = path.join(workDir, segmentFileName(clip));

    this.log.debug(`Trimming ${formatRange(clip.startTime, clip.endTime)}`, {
      scope: 'FrameSampler',
      clipId: clip.clipId,
      outputPath,
    });
    await this.trimmer.trim(video.sourcePath, clip.startTime, clip.endTime, outputPath, options.signal);
    clip.recordSegment(outputPath);
    return outputPath;
  }

  /**
   * Sample frames at `1 / fps` intervals over the clip.
   * A failed read ends sampling; the batch may be short or empty.
   *
   * @returns Batch with absolute timestamps `clip.startTime + step / fps`
   */
  async extract(clip: Clip, video: Video, fps: number, options: ExtractOptions = {}): Promise<FrameBatch> {
    if (!(fps > 0)) {
      throw new InvalidArgumentError('sampling_rate_fps must be greater than 0');
    }

    const segmentPath = await this.materialize(clip, video, options);
    const reader = await this.source.open(segmentPath);
    const batch = new FrameBatch(clip.isAssigned ? clip.clipId : UNASSIGNED_ID);
    const duration = clip.duration;

    try {
      for (let step = 0; step / fps < duration; step++) {
        throwIfAborted(options.signal);
        const offset = step / fps;
        const frame = await reader.read(offset);
        if (!frame) {
          this.log.debug(`No frame at ${offset}s, ending sampling`, { scope: 'FrameSampler', clipId: clip.clipId });
          break;
        }
        batch.addFrame(frame, clip.startTime + offset);
      }
    } finally {
      reader.close();
    }

    this.log.info(`Sampled ${batch.length} frames at ${fps} fps`, {
      scope: 'FrameSampler',
      clipId: clip.clipId,
    });
    return batch;
  }
}
