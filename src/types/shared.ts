/**
 * Shared Type Definitions
 *
 * Domain model for the watermark pipeline: videos, clips, sampled frames,
 * regions of interest and detections.
 */

import { InvalidArgumentError } from '../utils/errors.js';

/**
 * Identity of a clip/video/detection that has not been persisted yet.
 * The persistence layer assigns the real identity.
 */
export const UNASSIGNED_ID = -1;

// ========================================
// Video
// ========================================

export type VideoSourceType = 'file' | 'url';

export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export interface Video {
  readonly videoId: number;
  readonly sourceType: VideoSourceType;
  /** Absolute path of the local media file */
  readonly sourcePath: string;
  /** Set only when sourceType is 'url' */
  readonly originalUrl: string | null;
  /** Duration in seconds */
  readonly duration: number;
  readonly resolution: Resolution;
  /** ISO 8601 UTC */
  readonly importTimestamp: string;
}

export interface VideoInit {
  videoId?: number;
  sourceType: VideoSourceType;
  sourcePath: string;
  originalUrl?: string | null;
  duration: number;
  resolution: Resolution;
  importTimestamp?: string;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Build an immutable Video value
 */
export function createVideo(init: VideoInit): Video {
  const originalUrl = init.originalUrl ?? null;

  if (init.sourcePath.trim().length === 0) {
    throw new InvalidArgumentError('sourcePath must be a non-empty string');
  }
  if (!Number.isFinite(init.duration) || init.duration < 0) {
    throw new InvalidArgumentError('duration must be a non-negative number');
  }
  if (!isPositiveInteger(init.resolution.width) || !isPositiveInteger(init.resolution.height)) {
    throw new InvalidArgumentError('resolution width and height must be positive integers');
  }
  if ((init.sourceType === 'url') !== (originalUrl !== null)) {
    throw new InvalidArgumentError('originalUrl must be set exactly when sourceType is "url"');
  }

  return Object.freeze({
    videoId: init.videoId ?? UNASSIGNED_ID,
    sourceType: init.sourceType,
    sourcePath: init.sourcePath,
    originalUrl,
    duration: init.duration,
    resolution: Object.freeze({ width: init.resolution.width, height: init.resolution.height }),
    importTimestamp: init.importTimestamp ?? new Date().toISOString(),
  });
}

/**
 * Copy of a Video carrying its persisted identity
 */
export function withVideoId(video: Video, videoId: number): Video {
  return createVideo({ ...video, videoId });
}

// ========================================
// Region of Interest
// ========================================

export interface Roi {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Validate ROI geometry: integer fields, x/y >= 0, width/height > 0
 */
export function validateRoi(roi: Roi): void {
  const { x, y, width, height } = roi;
  if (![x, y, width, height].every(Number.isInteger)) {
    throw new InvalidArgumentError('ROI coordinates and dimensions must be integers.');
  }
  if (x < 0 || y < 0) {
    throw new InvalidArgumentError('ROI x and y must be non-negative integers.');
  }
  if (width <= 0 || height <= 0) {
    throw new InvalidArgumentError('ROI width and height must be positive integers.');
  }
}

export function createRoi(x: number, y: number, width: number, height: number): Roi {
  const roi = { x, y, width, height };
  validateRoi(roi);
  return roi;
}

export function copyRoi(roi: Roi): Roi {
  return { x: roi.x, y: roi.y, width: roi.width, height: roi.height };
}

export function describeRoi(roi: Roi): string {
  return `(${roi.x},${roi.y} ${roi.width}x${roi.height})`;
}

// ========================================
// Clip
// ========================================

export interface ClipInit {
  clipId?: number;
  videoId: number;
  startTime: number;
  endTime: number;
  segmentPath?: string | null;
}

/**
 * Contiguous time range [startTime, endTime) of one video.
 *
 * Only the clip timeline creates or replaces clips. The materialized segment
 * path is filled in lazily by the frame sampler and never changes afterwards.
 */
export class Clip {
  readonly videoId: number;
  readonly startTime: number;
  readonly endTime: number;
  private _clipId: number;
  private _segmentPath: string | null;

  constructor(init: ClipInit) {
    if (!Number.isFinite(init.startTime) || init.startTime < 0) {
      throw new InvalidArgumentError('startTime must be a non-negative number');
    }
    if (!Number.isFinite(init.endTime) || init.endTime <= init.startTime) {
      throw new InvalidArgumentError('endTime must be greater than startTime');
    }
    this.videoId = init.videoId;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this._clipId = init.clipId ?? UNASSIGNED_ID;
    this._segmentPath = init.segmentPath ?? null;
  }

  get clipId(): number {
    return this._clipId;
  }

  get segmentPath(): string | null {
    return this._segmentPath;
  }

  get duration(): number {
    return this.endTime - this.startTime;
  }

  get isAssigned(): boolean {
    return this._clipId !== UNASSIGNED_ID;
  }

  /**
   * Record the identity handed out by the persistence layer
   */
  assignId(clipId: number): void {
    if (this.isAssigned) {
      throw new InvalidArgumentError(`Clip already has identity ${this._clipId}`);
    }
    if (!isPositiveInteger(clipId)) {
      throw new InvalidArgumentError('clipId must be a positive integer');
    }
    this._clipId = clipId;
  }

  /**
   * Record the materialized segment file. Set once per clip; recording the
   * same path again is a no-op.
   */
  recordSegment(path: string): void {
    if (this._segmentPath === path) return;
    if (this._segmentPath !== null) {
      throw new InvalidArgumentError(
        `Clip segment already recorded at ${this._segmentPath}`
      );
    }
    this._segmentPath = path;
  }
}

// ========================================
// Frames
// ========================================

/**
 * Decoded frame as raw interleaved pixels (ffmpeg rgb24 → 3 channels)
 */
export interface Frame {
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
  data: Buffer;
}

/**
 * Time-ordered frames sampled from one clip
 */
export class FrameBatch {
  readonly clipId: number;
  private readonly _frames: Frame[] = [];
  private readonly _timestamps: number[] = [];

  constructor(clipId: number) {
    this.clipId = clipId;
  }

  get frames(): readonly Frame[] {
    return this._frames;
  }

  get timestamps(): readonly number[] {
    return this._timestamps;
  }

  get length(): number {
    return this._frames.length;
  }

  addFrame(frame: Frame, timestamp: number): void {
    const last = this._timestamps[this._timestamps.length - 1];
    if (last !== undefined && timestamp <= last) {
      throw new InvalidArgumentError(
        `Frame timestamps must be strictly increasing (${timestamp} after ${last})`
      );
    }
    this._frames.push(frame);
    this._timestamps.push(timestamp);
  }

  /**
   * (frame, timestamp) pairs in submission order
   */
  entries(): Array<{ frame: Frame; timestamp: number }> {
    return this._frames.map((frame, index) => ({ frame, timestamp: this._timestamps[index] }));
  }
}

// ========================================
// OCR
// ========================================

/**
 * One token from the recognition engine, confidence on the engine's 0-100 scale
 */
export interface OcrToken {
  text: string;
  confidence: number;
}

/**
 * Accepted watermark recognition
 */
export interface Detection {
  readonly videoId: number;
  readonly clipId: number;
  readonly timestamp: number;
  readonly text: string;
  /** Normalized confidence (0-1) */
  readonly confidence: number;
  readonly roi: Readonly<Roi>;
}

export function createDetection(init: {
  videoId: number;
  clipId: number;
  timestamp: number;
  text: string;
  confidence: number;
  roi: Roi;
}): Detection {
  if (init.text.length === 0) {
    throw new InvalidArgumentError('Detection text must be non-empty');
  }
  if (!(init.confidence >= 0 && init.confidence <= 1)) {
    throw new InvalidArgumentError('Detection confidence must be between 0.0 and 1.0');
  }
  if (!(init.timestamp >= 0)) {
    throw new InvalidArgumentError('Detection timestamp must be non-negative');
  }

  return Object.freeze({
    videoId: init.videoId,
    clipId: init.clipId,
    timestamp: init.timestamp,
    text: init.text,
    confidence: init.confidence,
    roi: Object.freeze(copyRoi(init.roi)),
  });
}

export type SkipReason =
  | 'out_of_bounds'
  | 'empty_crop'
  | 'no_tokens'
  | 'empty_text'
  | 'below_threshold';

/**
 * Result of recognizing one ROI of one frame
 */
export type RoiOutcome =
  | { status: 'accepted'; detection: Detection }
  | { status: 'skipped'; roi: Roi; timestamp: number; reason: SkipReason }
  | { status: 'failed'; roi: Roi; timestamp: number; error: Error };

// ========================================
// Persistence
// ========================================

/**
 * Stored clip row
 */
export interface ClipRecord {
  clipId: number;
  videoId: number;
  startTime: number;
  endTime: number;
  segmentPath: string | null;
}

/**
 * Stored detection row
 */
export interface DetectionRecord {
  watermarkId: number;
  videoId: number;
  clipId: number;
  timestamp: number;
  extractedText: string;
  confidence: number;
  roiX: number;
  roiY: number;
  roiWidth: number;
  roiHeight: number;
}

export interface DetectionFilter {
  videoId?: number;
  /** Case-insensitive substring match on the extracted text */
  textFilter?: string;
  minConfidence?: number;
  clipId?: number;
}
