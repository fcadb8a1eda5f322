/**
 * FFmpeg Process Contracts
 *
 * Narrow interfaces over the external media tools so the clip timeline,
 * frame sampler and video importer can be driven by fakes in tests:
 * - SceneDetector: `select='gt(scene,T)',showinfo` report (stderr text)
 * - Trimmer: stream-copy a time range into a new file
 * - Prober: width/height/duration of a media file
 *
 * Every process runs under a timeout from config/timeouts and can be
 * cancelled through an AbortSignal; both end in an AppError.
 */

import ffmpeg, { type FfmpegCommand } from 'fluent-ffmpeg';
import { TIMEOUTS, getTimeoutMinutes } from '../config/timeouts.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface SceneDetector {
  /**
   * Run scene-change detection and return the raw textual report
   */
  detect(sourcePath: string, threshold: number, signal?: AbortSignal): Promise<string>;
}

export interface Trimmer {
  trim(
    sourcePath: string,
    startTime: number,
    endTime: number,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<void>;
}

export interface ProbeResult {
  width: number;
  height: number;
  /** Seconds */
  duration: number;
}

export interface Prober {
  probe(sourcePath: string): Promise<ProbeResult>;
}

const PTS_TIME_PATTERN = /pts_time:(\d+\.?\d*)/g;

/**
 * Extract every `pts_time:<seconds>` value from a showinfo report, ascending.
 * All other report content is ignored.
 *
 * @example
 * parsePtsTimes('[Parsed_showinfo_1] n:0 pts:60 pts_time:2.5 pos:1234')
 * // [2.5]
 */
export function parsePtsTimes(report: string): number[] {
  return Array.from(report.matchAll(PTS_TIME_PATTERN), (match) => parseFloat(match[1]))
    .filter((value) => Number.isFinite(value))
    .sort((a, b) => a - b);
}

interface RunOptions {
  label: string;
  timeoutMs: number;
  userMessage: string;
  signal?: AbortSignal;
  log: Logger;
}

/**
 * Run a prepared fluent-ffmpeg command to completion.
 * Collects stderr for diagnostics; a non-zero exit, a timeout or an abort
 * rejects with an AppError carrying `userMessage`.
 */
function runCommand(command: FfmpegCommand, options: RunOptions): Promise<string> {
  const { label, timeoutMs, userMessage, signal, log } = options;

  return new Promise((resolve, reject) => {
    const stderrLines: string[] = [];
    let settled = false;

    const finish = (error: AppError | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve(stderrLines.join('\n'));
      }
    };

    const kill = (reason: string): void => {
      try {
        command.kill('SIGKILL');
      } catch (killError) {
        log.error(`[${label}] Failed to kill FFmpeg process`, { error: errorMessage(killError) });
      }
      finish(new AppError(userMessage, reason));
    };

    const timeoutId = setTimeout(() => {
      log.error(`[${label}] Process timed out after ${getTimeoutMinutes(timeoutMs)} minutes`);
      kill(`${label} timed out after ${timeoutMs}ms`);
    }, timeoutMs);

    const onAbort = (): void => {
      log.warn(`[${label}] Aborted`);
      kill(`${label} aborted`);
    };

    if (signal?.aborted) {
      finish(new AppError(userMessage, `${label} aborted before start`));
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    command
      .on('stderr', (line: string) => {
        stderrLines.push(line);
      })
      .on('end', () => finish(null))
      .on('error', (err: Error) => {
        const detail = stderrLines.length > 0 ? stderrLines.join('\n') : err.message;
        log.error(`[${label}] FFmpeg failed`, { error: err.message });
        finish(new AppError(userMessage, detail));
      })
      .run();
  });
}

/**
 * Scene detection through ffmpeg's select + showinfo filters
 */
export class FfmpegSceneDetector implements SceneDetector {
  constructor(private readonly log: Logger = defaultLogger) {}

  detect(sourcePath: string, threshold: number, signal?: AbortSignal): Promise<string> {
    const command = ffmpeg(sourcePath)
      .outputOptions(['-filter_complex', `select='gt(scene,${threshold})',showinfo`, '-f', 'null'])
      .output('-');

    return runCommand(command, {
      label: 'SceneDetection',
      timeoutMs: TIMEOUTS.SCENE_DETECTION,
      userMessage: 'Scene detection failed.',
      signal,
      log: this.log,
    });
  }
}

/**
 * Stream-copy trimming (`-ss start -to end -i src -c copy`)
 */
export class FfmpegTrimmer implements Trimmer {
  constructor(private readonly log: Logger = defaultLogger) {}

  async trim(
    sourcePath: string,
    startTime: number,
    endTime: number,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    const command = ffmpeg(sourcePath)
      .inputOptions(['-ss', String(startTime), '-to', String(endTime)])
      .outputOptions(['-c', 'copy', '-y'])
      .output(outputPath);

    await runCommand(command, {
      label: 'Trim',
      timeoutMs: TIMEOUTS.TRIM,
      userMessage: 'Failed to trim clip.',
      signal,
      log: this.log,
    });
  }
}

/**
 * Metadata probe through ffprobe (first video stream + container duration)
 */
export class FfprobeProber implements Prober {
  constructor(private readonly log: Logger = defaultLogger) {}

  probe(sourcePath: string): Promise<ProbeResult> {
    const timeoutMs = TIMEOUTS.METADATA_EXTRACTION;

    return new Promise((resolve, reject) => {
      let settled = false;
      const timeoutId = setTimeout(() => {
        settled = true;
        this.log.error('[Probe] ffprobe timed out', { sourcePath, timeoutMs });
        reject(new AppError('Cannot read video metadata.', `ffprobe timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      ffmpeg.ffprobe(sourcePath, (err, metadata) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);

        if (err) {
          this.log.error('[Probe] ffprobe failed', { sourcePath, error: errorMessage(err) });
          reject(new AppError('Cannot read video metadata.', errorMessage(err)));
          return;
        }

        const videoStream = metadata.streams.find((s) => s.codec_type === 'video');
        const duration = metadata.format.duration;

        if (!videoStream || !videoStream.width || !videoStream.height || duration === undefined) {
          const detail = `Unexpected ffprobe output for ${sourcePath}`;
          this.log.error(`[Probe] ${detail}`);
          reject(new AppError('Cannot read video metadata.', detail));
          return;
        }

        resolve({ width: videoStream.width, height: videoStream.height, duration });
      });
    });
  }
}
