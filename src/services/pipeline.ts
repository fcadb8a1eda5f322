/**
 * Watermark Pipeline
 * Import → Scene Detection → Clip Edits → Frame Sampling → OCR → Persistence
 *
 * Runs one video end to end, strictly in sequence:
 * 1. Import the video (local file or URL) and persist it
 * 2. Detect scene-bounded clips and persist them (ids assigned)
 * 3. Apply optional merge/split edits
 * 4. For each clip in time order: sample frames, recognize ROIs
 * 5. Persist accepted detections linked to the persisted video
 */

import { createDetection, type Detection, type ClipRecord, type DetectionRecord, type Video } from '../types/shared.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { formatRange } from '../utils/timecode.js';
import { ClipTimeline } from './clipTimeline.js';
import { logCriticalError } from './errorTracking.js';
import type { SceneDetector } from './ffmpeg.js';
import type { FrameSampler } from './frameSampler.js';
import type { OcrAggregator } from './ocrAggregator.js';
import type { RoiStore } from './roiStore.js';
import type { VideoImporter } from './videoImporter.js';
import type { WatermarkRepository } from './watermarkRepository.js';

export type ClipEdit =
  | { type: 'merge'; clipIds: number[]; requireContiguous?: boolean }
  | { type: 'split'; clipId: number; splitTime: number };

export interface PipelineDependencies {
  importer: VideoImporter;
  detector: SceneDetector;
  sampler: FrameSampler;
  aggregator: OcrAggregator;
  repository: WatermarkRepository;
  roiStore: RoiStore;
  logger?: Logger;
}

export interface PipelineOptions {
  /** Local file path or http(s) URL */
  source: string;
  sceneThreshold: number;
  frameSamplingRateFps: number;
  ocrConfidenceThreshold: number;
  workDir?: string;
  edits?: ClipEdit[];
  signal?: AbortSignal;
}

export interface PipelineStats {
  clipCount: number;
  frameCount: number;
  roiEvaluations: number;
  skippedRois: number;
  detectionCount: number;
  processingTimeMs: number;
}

export interface PipelineResult {
  video: Video;
  clips: ClipRecord[];
  detections: DetectionRecord[];
  stats: PipelineStats;
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Time-tracking wrapper for pipeline steps
 */
async function timeStep<T>(log: Logger, stepName: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  log.info(`[${stepName}] Starting...`);

  try {
    const result = await fn();
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    log.info(`[${stepName}] Completed in ${duration}s`);
    return result;
  } catch (error) {
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    log.error(`[${stepName}] Failed after ${duration}s`);
    throw error;
  }
}

/**
 * Apply clip edits to the timeline and sync the repository
 */
async function applyEdits(
  timeline: ClipTimeline,
  edits: readonly ClipEdit[],
  repository: WatermarkRepository,
  log: Logger
): Promise<void> {
  for (const edit of edits) {
    const before = new Set(timeline.list());

    if (edit.type === 'merge') {
      const merged = timeline.merge(edit.clipIds, { requireContiguous: edit.requireContiguous });
      log.info(`Merge [${edit.clipIds.join(', ')}] → ${formatRange(merged.startTime, merged.endTime)}`);
    } else {
      const [left, right] = timeline.split(edit.clipId, edit.splitTime);
      log.info(
        `Split ${edit.clipId} → ${formatRange(left.startTime, left.endTime)}, ${formatRange(right.startTime, right.endTime)}`
      );
    }

    const after = new Set(timeline.list());
    const removedIds = [...before].filter((clip) => !after.has(clip)).map((clip) => clip.clipId);
    await repository.deleteClips(removedIds);
    await repository.saveClips(timeline.unassigned());
  }
}

export async function runWatermarkPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions
): Promise<PipelineResult> {
  const log = (deps.logger ?? defaultLogger).child({ scope: 'Pipeline' });
  const startTime = Date.now();
  const { repository } = deps;
  const { signal } = options;
  let videoId: number | undefined;

  try {
    // Step 1: Import + persist video
    const video = await timeStep(log, 'Import Video', async () => {
      const imported = isRemoteSource(options.source)
        ? await deps.importer.importFromUrl(options.source, options.workDir, signal)
        : await deps.importer.importFromFile(options.source);
      return repository.saveVideo(imported);
    });
    videoId = video.videoId;

    // Step 2: Scene detection → clips
    const timeline = new ClipTimeline(deps.detector, log);
    await timeStep(log, 'Scene Detection', async () => {
      await timeline.detect(video, options.sceneThreshold, signal);
      await repository.saveClips(timeline.list());
    });

    // Step 3: Optional edits
    if (options.edits && options.edits.length > 0) {
      const edits = options.edits;
      await timeStep(log, 'Clip Edits', () => applyEdits(timeline, edits, repository, log));
    }

    // Step 4: Sampling + OCR per clip
    const rois = deps.roiStore.list();
    const detections: Detection[] = [];
    let frameCount = 0;
    let roiEvaluations = 0;
    let skippedRois = 0;

    await timeStep(log, 'Frame Sampling + OCR', async () => {
      const clips = timeline.list();
      for (const [index, clip] of clips.entries()) {
        log.info(`Clip ${index + 1}/${clips.length}: ${formatRange(clip.startTime, clip.endTime)}`, {
          clipId: clip.clipId,
        });

        const batch = await deps.sampler.extract(clip, video, options.frameSamplingRateFps, {
          workDir: options.workDir,
          signal,
        });
        await repository.saveClips([clip]);
        frameCount += batch.length;

        const outcomes = await deps.aggregator.recognizeBatchOutcomes(
          batch,
          rois,
          options.ocrConfidenceThreshold,
          { signal }
        );
        roiEvaluations += outcomes.length;

        for (const outcome of outcomes) {
          if (outcome.status === 'failed') throw outcome.error;
          if (outcome.status === 'skipped') {
            skippedRois++;
            continue;
          }
          // The aggregator reports the clip id as video id; relink to the video
          detections.push(createDetection({ ...outcome.detection, videoId: video.videoId }));
        }
      }
    });

    // Step 5: Persist detections
    const saved = await timeStep(log, 'Save Detections', () => repository.saveDetections(detections));
    const clipRecords = await repository.listClips(video.videoId);

    const stats: PipelineStats = {
      clipCount: clipRecords.length,
      frameCount,
      roiEvaluations,
      skippedRois,
      detectionCount: saved.length,
      processingTimeMs: Date.now() - startTime,
    };
    log.info('Pipeline complete', { videoId: video.videoId, ...stats });

    return { video, clips: clipRecords, detections: saved, stats };
  } catch (error) {
    logCriticalError(error, { videoId, sourcePath: options.source, operation: 'runWatermarkPipeline' }, log);
    throw error;
  }
}
