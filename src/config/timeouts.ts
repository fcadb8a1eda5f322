/**
 * Timeout Configuration
 *
 * Centralized timeout settings for external processes (ffmpeg, ffprobe,
 * tesseract) and downloads. All values are in milliseconds.
 */

export const TIMEOUTS = {
  /**
   * Scene detection (30 minutes)
   *
   * Decodes the whole video through the `select`+`showinfo` filter graph.
   * Runs at several times real-time on a typical host.
   */
  SCENE_DETECTION: 30 * 60 * 1000,

  /**
   * Clip trimming (5 minutes)
   *
   * Stream copy only (`-c copy`), bounded by disk throughput.
   */
  TRIM: 5 * 60 * 1000,

  /**
   * Single-frame decode (30 seconds)
   *
   * One seek plus one decoded frame piped as rgb24.
   */
  FRAME_READ: 30 * 1000,

  /**
   * ffprobe metadata extraction (60 seconds)
   */
  METADATA_EXTRACTION: 60 * 1000,

  /**
   * One tesseract call on a single ROI crop (60 seconds)
   */
  OCR_RECOGNITION: 60 * 1000,

  /**
   * Remote video download (10 minutes)
   */
  DOWNLOAD: 10 * 60 * 1000,
} as const;

export type TimeoutName = keyof typeof TIMEOUTS;

/**
 * Convert a millisecond timeout to whole minutes for log output
 */
export function getTimeoutMinutes(timeoutMs: number): number {
  return Math.round(timeoutMs / 60000);
}
