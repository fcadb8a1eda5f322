#!/usr/bin/env node
/**
 * watermark-locator command-line entry point
 */

import os from 'os';
import path from 'path';
import { loadAppConfig } from './config/appConfig.js';
import { exportDetections } from './services/detectionExporter.js';
import { FfmpegSceneDetector, FfmpegTrimmer, FfprobeProber } from './services/ffmpeg.js';
import { FfmpegFrameSource } from './services/frameSource.js';
import { FrameSampler } from './services/frameSampler.js';
import { OcrAggregator } from './services/ocrAggregator.js';
import { TesseractEngine } from './services/ocrEngine.js';
import { runWatermarkPipeline } from './services/pipeline.js';
import { RoiStore } from './services/roiStore.js';
import { VideoImporter } from './services/videoImporter.js';
import { createWatermarkRepository } from './services/watermarkRepository.js';
import { parseCliArgs, USAGE } from './utils/cliArgs.js';
import { AppError, EngineUnavailableError, InvalidArgumentError } from './utils/errors.js';
import { Logger, consoleSink, createDailyFileSink, teeSink } from './utils/logger.js';
import { formatTimecode } from './utils/timecode.js';

async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadAppConfig();
  const log = new Logger({
    level: config.logLevel,
    sink: teeSink(consoleSink, createDailyFileSink({ dir: config.logDir })),
  });
  const workDir = args.workDir ?? config.workDir ?? path.join(os.tmpdir(), 'watermark-locator');

  const prober = new FfprobeProber(log);
  const result = await runWatermarkPipeline(
    {
      importer: new VideoImporter({ supportedFormats: config.supportedFileFormats, prober, logger: log }),
      detector: new FfmpegSceneDetector(log),
      sampler: new FrameSampler(new FfmpegTrimmer(log), new FfmpegFrameSource(prober, log), log),
      aggregator: new OcrAggregator(new TesseractEngine({}, log), {
        concurrency: config.ocrConcurrency,
        logger: log,
      }),
      repository: createWatermarkRepository(config, log),
      roiStore: new RoiStore(config.defaultRois),
      logger: log,
    },
    {
      source: args.source,
      sceneThreshold: config.sceneThreshold,
      frameSamplingRateFps: config.frameSamplingRateFps,
      ocrConfidenceThreshold: config.ocrConfidenceThreshold,
      workDir,
      edits: args.edits,
    }
  );

  for (const clip of result.clips) {
    console.log(`clip ${clip.clipId}: ${formatTimecode(clip.startTime)} - ${formatTimecode(clip.endTime)}`);
  }
  for (const detection of result.detections) {
    console.log(
      `${formatTimecode(detection.timestamp)}  clip ${detection.clipId}  ` +
        `"${detection.extractedText}" (${(detection.confidence * 100).toFixed(1)}%)`
    );
  }
  console.log(
    `${result.stats.detectionCount} detections in ${result.stats.clipCount} clips ` +
      `(${result.stats.frameCount} frames, ${(result.stats.processingTimeMs / 1000).toFixed(1)}s)`
  );

  if (args.exportPath) {
    await exportDetections(result.detections, args.exportPath, log);
    console.log(`Exported to ${args.exportPath}`);
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof AppError) {
      console.error(`Error: ${error.userMessage}`);
    } else if (error instanceof InvalidArgumentError) {
      console.error(`Error: ${error.message}\n\n${USAGE}`);
    } else if (error instanceof EngineUnavailableError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  });
