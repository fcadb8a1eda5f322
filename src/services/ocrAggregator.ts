/**
 * OCR Aggregator
 *
 * Runs the recognition engine over every ROI of every frame and turns the
 * engine's per-token confidences into accept/reject decisions.
 *
 * Per ROI the result is a tagged outcome:
 * - accepted: a Detection (non-empty text, mean confidence >= threshold)
 * - skipped: ROI outside the frame, empty crop, no usable text, low confidence
 * - failed: the engine call raised a per-call error
 *
 * Recognition units run on a bounded pool (p-limit); results are returned
 * in frame order, then ROI order, regardless of completion order. After a
 * failed outcome no further units start. An unavailable engine rejects the
 * whole call.
 */

import pLimit from 'p-limit';
import {
  EngineUnavailableError,
  InvalidArgumentError,
  OcrEngineError,
  errorMessage,
  throwIfAborted,
} from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  createDetection,
  describeRoi,
  type Detection,
  type Frame,
  type FrameBatch,
  type OcrToken,
  type Roi,
  type RoiOutcome,
} from '../types/shared.js';
import { extractRegion, regionStatus } from './imageRegion.js';
import type { RecognitionEngine } from './ocrEngine.js';

export interface AggregatedText {
  text: string;
  /** Mean of all normalized token confidences, 0 when there are none */
  confidence: number;
}

/**
 * Combine engine tokens into candidate text and overall confidence.
 * Tokens with positive confidence and non-blank text are concatenated
 * without separator; every numeric confidence counts toward the mean,
 * including the engine's -1 layout rows.
 *
 * @example
 * aggregateTokens([{ text: 'Hello', confidence: 85 }, { text: 'World', confidence: 90 }])
 * // { text: 'HelloWorld', confidence: 0.875 }
 */
export function aggregateTokens(tokens: readonly OcrToken[]): AggregatedText {
  const confidences: number[] = [];
  const parts: string[] = [];

  for (const token of tokens) {
    if (!Number.isFinite(token.confidence)) continue;
    const normalized = token.confidence / 100;
    confidences.push(normalized);
    if (normalized > 0 && token.text.trim().length > 0) {
      parts.push(token.text);
    }
  }

  const confidence =
    confidences.length > 0 ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length : 0;
  return { text: parts.join('').trim(), confidence };
}

/**
 * Crop an ROI out of a frame into engine input
 */
export type RegionCropper = (frame: Frame, roi: Roi) => Promise<Buffer>;

export interface OcrAggregatorOptions {
  /** Parallel recognition calls (default 1) */
  concurrency?: number;
  cropRegion?: RegionCropper;
  logger?: Logger;
}

export interface RecognizeOptions {
  signal?: AbortSignal;
}

interface RecognitionUnit {
  frame: Frame;
  timestamp: number;
  videoId: number;
  clipId: number;
  roi: Roi;
}

function validateThreshold(threshold: number): void {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new InvalidArgumentError('confidence_threshold must be between 0.0 and 1.0');
  }
}

function acceptedDetections(outcomes: readonly RoiOutcome[]): Detection[] {
  const detections: Detection[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    if (outcome.status === 'accepted') {
      detections.push(outcome.detection);
    }
  }
  return detections;
}

export class OcrAggregator {
  private readonly concurrency: number;
  private readonly cropRegion: RegionCropper;
  private readonly log: Logger;

  constructor(
    private readonly engine: RecognitionEngine,
    options: OcrAggregatorOptions = {}
  ) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidArgumentError('concurrency must be a positive integer');
    }
    this.concurrency = concurrency;
    this.cropRegion = options.cropRegion ?? extractRegion;
    this.log = (options.logger ?? defaultLogger).child({ scope: 'OcrAggregator' });
  }

  private async recognizeUnit(unit: RecognitionUnit, threshold: number): Promise<RoiOutcome> {
    const { frame, timestamp, roi } = unit;

    const status = regionStatus(frame, roi);
    if (status === 'out_of_bounds') {
      this.log.warn(`ROI ${describeRoi(roi)} is out of frame bounds and will be skipped.`, { timestamp });
      return { status: 'skipped', roi, timestamp, reason: 'out_of_bounds' };
    }
    if (status === 'empty_crop') {
      this.log.warn(`ROI ${describeRoi(roi)} resulted in empty crop and will be skipped.`, { timestamp });
      return { status: 'skipped', roi, timestamp, reason: 'empty_crop' };
    }

    let tokens: OcrToken[];
    try {
      const image = await this.cropRegion(frame, roi);
      tokens = await this.engine.recognize(image);
    } catch (error) {
      if (error instanceof EngineUnavailableError) {
        throw error;
      }
      this.log.error(`OCR engine error: ${errorMessage(error)}`, { timestamp, roi: describeRoi(roi) });
      const failure = error instanceof OcrEngineError ? error : new OcrEngineError(errorMessage(error));
      return { status: 'failed', roi, timestamp, error: failure };
    }

    if (tokens.length === 0) {
      return { status: 'skipped', roi, timestamp, reason: 'no_tokens' };
    }

    const { text, confidence } = aggregateTokens(tokens);
    if (text.length === 0) {
      return { status: 'skipped', roi, timestamp, reason: 'empty_text' };
    }
    if (confidence < threshold) {
      this.log.debug(`Rejected "${text}" (${confidence.toFixed(3)} < ${threshold})`, { timestamp });
      return { status: 'skipped', roi, timestamp, reason: 'below_threshold' };
    }

    return {
      status: 'accepted',
      detection: createDetection({
        videoId: unit.videoId,
        clipId: unit.clipId,
        timestamp,
        text,
        confidence,
        roi,
      }),
    };
  }

  /**
   * Run units on the pool and return their outcomes in submission order.
   * Units that had not started when a unit failed are left out.
   */
  private async run(
    units: readonly RecognitionUnit[],
    threshold: number,
    options: RecognizeOptions
  ): Promise<RoiOutcome[]> {
    const limit = pLimit(this.concurrency);
    let fatal: EngineUnavailableError | null = null;
    let halted = false;

    const results = await Promise.all(
      units.map((unit) =>
        limit(async (): Promise<RoiOutcome | null> => {
          if (fatal) throw fatal;
          if (halted) return null;
          throwIfAborted(options.signal);
          try {
            const outcome = await this.recognizeUnit(unit, threshold);
            if (outcome.status === 'failed') halted = true;
            return outcome;
          } catch (error) {
            if (error instanceof EngineUnavailableError && !fatal) {
              fatal = error;
              this.log.error(error.message);
            }
            throw error;
          }
        })
      )
    );
    return results.filter((outcome): outcome is RoiOutcome => outcome !== null);
  }

  /**
   * Tagged outcome for each ROI of one frame, in ROI order. ROIs not yet
   * started when a recognition fails are left out.
   */
  async recognizeFrameOutcomes(
    frame: Frame,
    timestamp: number,
    videoId: number,
    clipId: number,
    rois: readonly Roi[],
    threshold: number,
    options: RecognizeOptions = {}
  ): Promise<RoiOutcome[]> {
    validateThreshold(threshold);
    const units = rois.map((roi) => ({ frame, timestamp, videoId, clipId, roi }));
    return this.run(units, threshold, options);
  }

  /**
   * Accepted detections of one frame. The first per-call engine failure is
   * rethrown; ROIs after it are not recognized.
   */
  async recognizeFrame(
    frame: Frame,
    timestamp: number,
    videoId: number,
    clipId: number,
    rois: readonly Roi[],
    threshold: number,
    options: RecognizeOptions = {}
  ): Promise<Detection[]> {
    const outcomes = await this.recognizeFrameOutcomes(
      frame,
      timestamp,
      videoId,
      clipId,
      rois,
      threshold,
      options
    );
    return acceptedDetections(outcomes);
  }

  /**
   * Tagged outcomes for a whole batch, frame order then ROI order.
   * The batch's clip id is used as both video id and clip id.
   */
  async recognizeBatchOutcomes(
    batch: FrameBatch,
    rois: readonly Roi[],
    threshold: number,
    options: RecognizeOptions = {}
  ): Promise<RoiOutcome[]> {
    validateThreshold(threshold);
    const units = batch.entries().flatMap(({ frame, timestamp }) =>
      rois.map((roi) => ({ frame, timestamp, videoId: batch.clipId, clipId: batch.clipId, roi }))
    );
    const outcomes = await this.run(units, threshold, options);

    const accepted = outcomes.filter((outcome) => outcome.status === 'accepted').length;
    this.log.info(`Recognized ${batch.length} frames: ${accepted} detections`, { clipId: batch.clipId });
    return outcomes;
  }

  /**
   * Accepted detections for a whole batch, in frame order
   */
  async recognizeBatch(
    batch: FrameBatch,
    rois: readonly Roi[],
    threshold: number,
    options: RecognizeOptions = {}
  ): Promise<Detection[]> {
    const outcomes = await this.recognizeBatchOutcomes(batch, rois, threshold, options);
    return acceptedDetections(outcomes);
  }
}
