/**
 * Clip Timeline
 *
 * Splits a video into scene-bounded clips and edits the resulting clip set.
 *
 * Edits never mutate a clip in place: `mergeClips` and `splitClip` return a
 * new clip array in which the selected clips are replaced by new, unassigned
 * ones. Callers holding the previous array keep a consistent snapshot.
 */

import { InvalidArgumentError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { formatRange } from '../utils/timecode.js';
import { Clip, type Video } from '../types/shared.js';
import { parsePtsTimes, type SceneDetector } from './ffmpeg.js';

export interface MergeOptions {
  /**
   * Reject selections with gaps or overlaps instead of taking their envelope
   */
  requireContiguous?: boolean;
}

export interface MergeResult {
  clips: Clip[];
  merged: Clip;
}

export interface SplitResult {
  clips: Clip[];
  parts: [Clip, Clip];
}

/**
 * Build clips from scene boundaries: `[0, b1), [b1, b2), ..., [bn, duration)`.
 * Boundaries outside `(0, duration)` and duplicates are dropped, since they
 * would produce empty clips.
 */
export function clipsFromBoundaries(videoId: number, boundaries: number[], duration: number): Clip[] {
  const cuts = Array.from(new Set(boundaries))
    .filter((t) => t > 0 && t < duration)
    .sort((a, b) => a - b);

  const clips: Clip[] = [];
  let prev = 0;
  for (const t of cuts) {
    clips.push(new Clip({ videoId, startTime: prev, endTime: t }));
    prev = t;
  }
  clips.push(new Clip({ videoId, startTime: prev, endTime: duration }));
  return clips;
}

/**
 * Detect scene boundaries and partition `[0, video.duration]` into clips
 *
 * @param sceneThreshold - ffmpeg scene score, strictly inside (0, 1)
 */
export async function detectClips(
  video: Video,
  sceneThreshold: number,
  detector: SceneDetector,
  signal?: AbortSignal
): Promise<Clip[]> {
  if (!(sceneThreshold > 0 && sceneThreshold < 1)) {
    throw new InvalidArgumentError('scene_threshold must be between 0.0 and 1.0');
  }
  if (!(video.duration > 0)) {
    throw new InvalidArgumentError('Video duration must be greater than 0 for clip detection');
  }

  const report = await detector.detect(video.sourcePath, sceneThreshold, signal);
  return clipsFromBoundaries(video.videoId, parsePtsTimes(report), video.duration);
}

/**
 * Throw unless the clips, ordered by start time, follow each other without
 * gaps or overlaps
 */
export function assertContiguous(clips: readonly Clip[]): void {
  const ordered = [...clips].sort((a, b) => a.startTime - b.startTime);
  for (let i = 1; i < ordered.length; i++) {
    const prev = ordered[i - 1];
    const next = ordered[i];
    if (prev.endTime !== next.startTime) {
      throw new InvalidArgumentError(
        `Clips are not contiguous: ${formatRange(prev.startTime, prev.endTime)} then ${formatRange(next.startTime, next.endTime)}`
      );
    }
  }
}

function indexById(clips: readonly Clip[]): Map<number, Clip> {
  const byId = new Map<number, Clip>();
  for (const clip of clips) {
    if (clip.isAssigned) byId.set(clip.clipId, clip);
  }
  return byId;
}

/**
 * Replace the selected clips with one clip spanning their envelope
 * (`min(start)` to `max(end)`). The merged clip is appended, unassigned.
 *
 * @param ids - Non-empty, strictly ascending clip identifiers of one video
 */
export function mergeClips(
  clips: readonly Clip[],
  ids: readonly number[],
  options: MergeOptions = {}
): MergeResult {
  if (ids.length === 0 || ids.some((id, i) => i > 0 && id <= ids[i - 1])) {
    throw new InvalidArgumentError('clip_ids_to_merge must be a sorted, non-empty list');
  }

  const byId = indexById(clips);
  const selected: Clip[] = [];
  for (const id of ids) {
    const clip = byId.get(id);
    if (!clip) {
      throw new InvalidArgumentError(`Some clip IDs not found: ${id}`);
    }
    selected.push(clip);
  }

  const videoId = selected[0].videoId;
  if (selected.some((clip) => clip.videoId !== videoId)) {
    throw new InvalidArgumentError('Clips must have the same video_id');
  }
  if (options.requireContiguous) {
    assertContiguous(selected);
  }

  const merged = new Clip({
    videoId,
    startTime: Math.min(...selected.map((clip) => clip.startTime)),
    endTime: Math.max(...selected.map((clip) => clip.endTime)),
  });

  const removed = new Set(selected);
  return {
    clips: [...clips.filter((clip) => !removed.has(clip)), merged],
    merged,
  };
}

/**
 * Replace one clip with two clips meeting at `splitTime`
 *
 * @param splitTime - Strictly between the clip's start and end
 */
export function splitClip(clips: readonly Clip[], id: number, splitTime: number): SplitResult {
  const target = indexById(clips).get(id);
  if (!target) {
    throw new InvalidArgumentError(`Clip ID ${id} not found`);
  }
  if (!(target.startTime < splitTime && splitTime < target.endTime)) {
    throw new InvalidArgumentError('split_time must be within the bounds of the clip');
  }

  const first = new Clip({ videoId: target.videoId, startTime: target.startTime, endTime: splitTime });
  const second = new Clip({ videoId: target.videoId, startTime: splitTime, endTime: target.endTime });

  return {
    clips: [...clips.filter((clip) => clip !== target), first, second],
    parts: [first, second],
  };
}

/**
 * Working clip set of one video.
 *
 * Single writer: each edit swaps in a freshly computed array, so a
 * `list()` taken earlier is never affected by later edits.
 */
export class ClipTimeline {
  private clips: Clip[] = [];

  constructor(
    private readonly detector: SceneDetector,
    private readonly log: Logger = defaultLogger
  ) {}

  async detect(video: Video, sceneThreshold: number, signal?: AbortSignal): Promise<Clip[]> {
    this.log.info(`Detecting scenes (threshold ${sceneThreshold})`, {
      scope: 'ClipTimeline',
      videoId: video.videoId,
    });
    this.clips = await detectClips(video, sceneThreshold, this.detector, signal);
    this.log.info(`Detected ${this.clips.length} clips`, { scope: 'ClipTimeline', videoId: video.videoId });
    return this.list();
  }

  merge(ids: readonly number[], options?: MergeOptions): Clip {
    const result = mergeClips(this.clips, ids, options);
    this.clips = result.clips;
    this.log.info(`Merged clips [${ids.join(', ')}] into ${formatRange(result.merged.startTime, result.merged.endTime)}`, {
      scope: 'ClipTimeline',
    });
    return result.merged;
  }

  split(id: number, splitTime: number): [Clip, Clip] {
    const result = splitClip(this.clips, id, splitTime);
    this.clips = result.clips;
    this.log.info(`Split clip ${id} at ${splitTime}s`, { scope: 'ClipTimeline', clipId: id });
    return result.parts;
  }

  /**
   * Clips in time order
   */
  list(): Clip[] {
    return [...this.clips].sort((a, b) => a.startTime - b.startTime);
  }

  /**
   * Clips still waiting for a persisted identity
   */
  unassigned(): Clip[] {
    return this.list().filter((clip) => !clip.isAssigned);
  }

  get size(): number {
    return this.clips.length;
  }
}
