/**
 * Unit tests for ocrAggregator.ts
 *
 * The recognition engine and the cropper are stubbed; cropped "images" are
 * the ROI's x coordinate as text so the engine can tell ROIs apart.
 */

import { describe, it, expect, jest } from '@jest/globals';
import { OcrAggregator, aggregateTokens, type RegionCropper } from '../../services/ocrAggregator.js';
import { parseTesseractTsv, type RecognitionEngine } from '../../services/ocrEngine.js';
import { FrameBatch, type OcrToken, type Roi } from '../../types/shared.js';
import { AbortError, EngineUnavailableError, InvalidArgumentError, OcrEngineError } from '../../utils/errors.js';
import { capturingLogger, makeFrame, silentLogger } from '../helpers/fakes.js';

const ROI_A: Roi = { x: 10, y: 10, width: 200, height: 50 };
const ROI_B: Roi = { x: 10, y: 300, width: 200, height: 50 };

const cropByX: RegionCropper = async (_frame, roi) => Buffer.from(String(roi.x));

function engineReturning(tokens: OcrToken[]) {
  const recognize = jest.fn<RecognitionEngine['recognize']>().mockResolvedValue(tokens);
  return { name: 'stub', recognize };
}

describe('aggregateTokens', () => {
  it('should concatenate confident tokens and average every confidence', () => {
    const result = aggregateTokens([
      { text: 'Hello', confidence: 85 },
      { text: 'World', confidence: 90 },
    ]);

    expect(result.text).toBe('HelloWorld');
    expect(result.confidence).toBeCloseTo(0.875, 10);
  });

  it('should drop blank and zero-confidence text but count them in the mean', () => {
    const result = aggregateTokens([
      { text: 'a', confidence: 30 },
      { text: '   ', confidence: 19 },
      { text: 'b', confidence: 0 },
      { text: 'c', confidence: Number.NaN },
    ]);

    expect(result.text).toBe('a');
    expect(result.confidence).toBeCloseTo(0.49 / 3, 10);
  });

  it('should let layout rows pull the mean down', () => {
    const tokens = parseTesseractTsv(
      [
        'level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext',
        '1\t1\t0\t0\t0\t0\t0\t0\t200\t50\t-1\t',
        '2\t1\t1\t0\t0\t0\t4\t6\t180\t30\t-1\t',
        '3\t1\t1\t1\t0\t0\t4\t6\t180\t30\t-1\t',
        '4\t1\t1\t1\t1\t0\t4\t6\t180\t30\t-1\t',
        '5\t1\t1\t1\t1\t1\t4\t6\t180\t30\t90\tLOGO',
      ].join('\n')
    );

    const result = aggregateTokens(tokens);

    expect(result.text).toBe('LOGO');
    expect(result.confidence).toBeCloseTo((0.9 - 0.04) / 5, 10);
  });

  it('should reject a lone word surrounded by layout rows at 0.75', async () => {
    const layout = { text: '', confidence: -1 };
    const engine = engineReturning([layout, layout, layout, layout, { text: 'LOGO', confidence: 90 }]);
    const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

    const outcomes = await aggregator.recognizeFrameOutcomes(makeFrame(640, 480), 0, 1, 1, [ROI_A], 0.75);

    expect(outcomes).toEqual([{ status: 'skipped', roi: ROI_A, timestamp: 0, reason: 'below_threshold' }]);
  });

  it('should report zero confidence without tokens', () => {
    expect(aggregateTokens([])).toEqual({ text: '', confidence: 0 });
  });
});

describe('OcrAggregator', () => {
  const frame = makeFrame(640, 480);

  describe('recognizeFrame', () => {
    it('should accept text at or above the threshold', async () => {
      const engine = engineReturning([
        { text: 'Hello', confidence: 85 },
        { text: 'World', confidence: 90 },
      ]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      const detections = await aggregator.recognizeFrame(frame, 3.5, 1, 2, [ROI_A], 0.5);

      expect(detections).toHaveLength(1);
      expect(detections[0]).toMatchObject({
        videoId: 1,
        clipId: 2,
        timestamp: 3.5,
        text: 'HelloWorld',
        roi: ROI_A,
      });
      expect(detections[0].confidence).toBeCloseTo(0.875, 10);
    });

    it('should reject text below the threshold', async () => {
      const engine = engineReturning([
        { text: 'Hello', confidence: 85 },
        { text: 'World', confidence: 90 },
      ]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      const outcomes = await aggregator.recognizeFrameOutcomes(frame, 3.5, 1, 2, [ROI_A], 0.9);

      expect(outcomes).toEqual([{ status: 'skipped', roi: ROI_A, timestamp: 3.5, reason: 'below_threshold' }]);
    });

    it('should skip ROIs that produce no tokens or only blank text', async () => {
      const engine = {
        name: 'stub',
        recognize: jest
          .fn<RecognitionEngine['recognize']>()
          .mockResolvedValueOnce([])
          .mockResolvedValueOnce([{ text: ' ', confidence: 95 }]),
      };
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      const outcomes = await aggregator.recognizeFrameOutcomes(frame, 0, 1, 1, [ROI_A, ROI_B], 0.5);

      expect(outcomes.map((outcome) => outcome.status === 'skipped' && outcome.reason)).toEqual([
        'no_tokens',
        'empty_text',
      ]);
    });

    it('should skip out-of-bounds ROIs with a warning and never call the engine', async () => {
      const engine = engineReturning([{ text: 'X', confidence: 99 }]);
      const { logger, lines } = capturingLogger('warn');
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger });
      const outside: Roi = { x: 600, y: 0, width: 100, height: 10 };

      const outcomes = await aggregator.recognizeFrameOutcomes(frame, 1.5, 1, 1, [outside], 0.5);

      expect(outcomes).toEqual([{ status: 'skipped', roi: outside, timestamp: 1.5, reason: 'out_of_bounds' }]);
      expect(engine.recognize).not.toHaveBeenCalled();
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain(
        '[WARN] [OcrAggregator] ROI (600,0 100x10) is out of frame bounds and will be skipped. {"timestamp":1.5}'
      );
    });

    it('should skip empty crops', async () => {
      const engine = engineReturning([{ text: 'X', confidence: 99 }]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const blank = { width: 10, height: 10, channels: 3 as const, data: Buffer.alloc(0) };
      const roi: Roi = { x: 0, y: 0, width: 5, height: 5 };

      const outcomes = await aggregator.recognizeFrameOutcomes(blank, 0, 1, 1, [roi], 0.5);

      expect(outcomes).toEqual([{ status: 'skipped', roi, timestamp: 0, reason: 'empty_crop' }]);
      expect(engine.recognize).not.toHaveBeenCalled();
    });

    it.each([-0.1, 1.1, Number.NaN])('should reject threshold %p before recognition', async (threshold) => {
      const engine = engineReturning([]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      await expect(aggregator.recognizeFrame(frame, 0, 1, 1, [ROI_A], threshold)).rejects.toThrow(
        InvalidArgumentError
      );
      expect(engine.recognize).not.toHaveBeenCalled();
    });

    it('should turn a per-call engine error into a failed outcome and stop there', async () => {
      const engine = {
        name: 'stub',
        recognize: jest
          .fn<RecognitionEngine['recognize']>()
          .mockRejectedValueOnce(new Error('read error'))
          .mockResolvedValue([{ text: 'OK', confidence: 80 }]),
      };
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      const outcomes = await aggregator.recognizeFrameOutcomes(frame, 2, 1, 1, [ROI_A, ROI_B], 0.5);

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0].status).toBe('failed');
      if (outcomes[0].status === 'failed') {
        expect(outcomes[0].error).toBeInstanceOf(OcrEngineError);
        expect(outcomes[0].error).toMatchObject({
          userMessage: 'Error during OCR processing.',
          internalMessage: 'read error',
        });
      }
      expect(engine.recognize).toHaveBeenCalledTimes(1);
    });

    it('should keep outcomes produced before a failure', async () => {
      const engine = {
        name: 'stub',
        recognize: jest
          .fn<RecognitionEngine['recognize']>()
          .mockResolvedValueOnce([{ text: 'OK', confidence: 80 }])
          .mockRejectedValueOnce(new Error('read error'))
          .mockResolvedValue([{ text: 'OK', confidence: 80 }]),
      };
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const rois = [ROI_A, ROI_B, { x: 0, y: 0, width: 5, height: 5 }];

      const outcomes = await aggregator.recognizeFrameOutcomes(frame, 2, 1, 1, rois, 0.5);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['accepted', 'failed']);
      expect(engine.recognize).toHaveBeenCalledTimes(2);
    });

    it('should log a per-call engine error once', async () => {
      const engine = {
        name: 'stub',
        recognize: jest.fn<RecognitionEngine['recognize']>().mockRejectedValue(new OcrEngineError('exit code 1')),
      };
      const { logger, lines } = capturingLogger('error');
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger });

      await expect(aggregator.recognizeFrame(frame, 2, 1, 1, [ROI_A], 0.5)).rejects.toThrow(OcrEngineError);

      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('[ERROR] [OcrAggregator] OCR engine error: Error during OCR processing.');
    });

    it('should stop at the first unavailable-engine error', async () => {
      const engine = {
        name: 'stub',
        recognize: jest.fn<RecognitionEngine['recognize']>().mockRejectedValue(new EngineUnavailableError()),
      };
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const rois = [ROI_A, ROI_B, { x: 0, y: 0, width: 5, height: 5 }];

      await expect(aggregator.recognizeFrame(frame, 0, 1, 1, rois, 0.5)).rejects.toThrow(EngineUnavailableError);
      expect(engine.recognize).toHaveBeenCalledTimes(1);
    });

    it('should not start recognition once aborted', async () => {
      const engine = engineReturning([{ text: 'X', confidence: 99 }]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const controller = new AbortController();
      controller.abort();

      await expect(
        aggregator.recognizeFrame(frame, 0, 1, 1, [ROI_A], 0.5, { signal: controller.signal })
      ).rejects.toThrow(AbortError);
      expect(engine.recognize).not.toHaveBeenCalled();
    });
  });

  describe('recognizeBatch', () => {
    it('should return detections in frame then ROI order under concurrency', async () => {
      // The first ROI of each frame finishes last
      const engine = {
        name: 'stub',
        recognize: jest.fn<RecognitionEngine['recognize']>(async (image) => {
          const text = image.toString();
          await new Promise((resolve) => setTimeout(resolve, text === '0' ? 20 : 1));
          return [{ text, confidence: 90 }];
        }),
      };
      const aggregator = new OcrAggregator(engine, { concurrency: 3, cropRegion: cropByX, logger: silentLogger() });
      const rois: Roi[] = [
        { x: 0, y: 0, width: 10, height: 10 },
        { x: 20, y: 0, width: 10, height: 10 },
      ];
      const batch = new FrameBatch(4);
      batch.addFrame(frame, 10);
      batch.addFrame(frame, 11);

      const detections = await aggregator.recognizeBatch(batch, rois, 0.5);

      expect(detections.map((d) => [d.timestamp, d.text])).toEqual([
        [10, '0'],
        [10, '20'],
        [11, '0'],
        [11, '20'],
      ]);
      expect(detections.every((d) => d.videoId === 4 && d.clipId === 4)).toBe(true);
      expect(engine.recognize).toHaveBeenCalledTimes(4);
    });

    it('should not call the engine again after a failed recognition', async () => {
      const engine = {
        name: 'stub',
        recognize: jest
          .fn<RecognitionEngine['recognize']>()
          .mockRejectedValueOnce(new Error('tesseract crashed'))
          .mockResolvedValue([{ text: 'WM', confidence: 90 }]),
      };
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const batch = new FrameBatch(2);
      for (let t = 0; t < 5; t++) {
        batch.addFrame(frame, t);
      }

      await expect(aggregator.recognizeBatch(batch, [ROI_A], 0.5)).rejects.toThrow(OcrEngineError);
      expect(engine.recognize).toHaveBeenCalledTimes(1);
    });

    it.each([-0.1, 1.1, Number.NaN])('should reject threshold %p before recognition', async (threshold) => {
      const engine = engineReturning([{ text: 'X', confidence: 99 }]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });
      const batch = new FrameBatch(1);
      batch.addFrame(frame, 0);

      await expect(aggregator.recognizeBatch(batch, [ROI_A], threshold)).rejects.toThrow(InvalidArgumentError);
      expect(engine.recognize).not.toHaveBeenCalled();
    });

    it('should return nothing for an empty batch', async () => {
      const engine = engineReturning([{ text: 'X', confidence: 99 }]);
      const aggregator = new OcrAggregator(engine, { cropRegion: cropByX, logger: silentLogger() });

      await expect(aggregator.recognizeBatch(new FrameBatch(1), [ROI_A], 0.5)).resolves.toEqual([]);
      expect(engine.recognize).not.toHaveBeenCalled();
    });
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => new OcrAggregator(engineReturning([]), { concurrency: 0 })).toThrow(InvalidArgumentError);
  });
});
