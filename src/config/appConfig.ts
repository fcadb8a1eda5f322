/**
 * Application Configuration
 *
 * Persistent settings live in a JSON file (default `./config.json`); runtime
 * settings come from the environment (`.env` is loaded through dotenv).
 * A missing config file is created with the defaults below.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { InvalidArgumentError } from '../utils/errors.js';
import { parseLogLevel, type LogLevel } from '../utils/logger.js';
import { createRoi, copyRoi, type Roi } from '../types/shared.js';

dotenv.config();

export interface WatermarkConfig {
  /** Minimum mean OCR confidence for a detection (0-1) */
  ocrConfidenceThreshold: number;
  /** Frames sampled per second of clip */
  frameSamplingRateFps: number;
  /** ROIs registered in the ROI store at start-up */
  defaultRois: Roi[];
  /** Lowercase extensions without leading dot */
  supportedFileFormats: string[];
}

export interface RuntimeConfig {
  /** ffmpeg scene-change threshold, strictly inside (0, 1) */
  sceneThreshold: number;
  /** Parallel recognition calls */
  ocrConcurrency: number;
  logLevel: LogLevel;
  /** Directory of the daily rotated `app.log` */
  logDir: string;
  /** Directory for trimmed clips and downloads (default: OS temp) */
  workDir: string | null;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
}

export interface AppConfig extends WatermarkConfig, RuntimeConfig {
  configPath: string;
}

/**
 * Default persistent configuration
 */
export const DEFAULT_WATERMARK_CONFIG: WatermarkConfig = {
  ocrConfidenceThreshold: 0.75,
  frameSamplingRateFps: 1.0,
  defaultRois: [
    { x: 10, y: 10, width: 200, height: 50 },
    { x: 10, y: 300, width: 200, height: 50 },
  ],
  supportedFileFormats: ['mp4', 'avi', 'mov', 'mkv'],
};

export const DEFAULT_SCENE_THRESHOLD = 0.4;

export const DEFAULT_CONFIG_PATH = 'config.json';

export const DEFAULT_LOG_DIR = 'logs';

// ========================================
// Validation
// ========================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfidenceThreshold(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidArgumentError('"ocrConfidenceThreshold" must be a number.');
  }
  if (value < 0 || value > 1) {
    throw new InvalidArgumentError('"ocrConfidenceThreshold" must be between 0.0 and 1.0.');
  }
  return value;
}

export function validateSamplingRate(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidArgumentError('"frameSamplingRateFps" must be a number.');
  }
  if (value <= 0) {
    throw new InvalidArgumentError('"frameSamplingRateFps" must be greater than 0.');
  }
  return value;
}

export function validateFileFormats(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError('"supportedFileFormats" must be a list of strings.');
  }
  return value.map((fmt, index) => {
    if (typeof fmt !== 'string') {
      throw new InvalidArgumentError(`File format at index ${index} must be a string.`);
    }
    if (fmt.trim() === '') {
      throw new InvalidArgumentError('File formats must be non-empty strings.');
    }
    if (fmt.toLowerCase() !== fmt) {
      throw new InvalidArgumentError(`File format "${fmt}" must be lowercase.`);
    }
    if (fmt.startsWith('.')) {
      throw new InvalidArgumentError(`File format "${fmt}" should not have a leading dot.`);
    }
    return fmt;
  });
}

/**
 * Parse one ROI dictionary `{ x, y, width, height }`
 */
export function roiFromRecord(value: unknown, index: number): Roi {
  if (!isRecord(value)) {
    throw new InvalidArgumentError(
      `Each item in "defaultRois" must be an object (invalid at index ${index}).`
    );
  }
  const fields = ['x', 'y', 'width', 'height'] as const;
  const numbers: number[] = [];
  for (const key of fields) {
    const field = value[key];
    if (field === undefined) {
      throw new InvalidArgumentError(`ROI dictionary missing required key "${key}".`);
    }
    if (typeof field !== 'number' || !Number.isInteger(field)) {
      throw new InvalidArgumentError(`ROI field "${key}" must be an integer.`);
    }
    numbers.push(field);
  }
  const [x, y, width, height] = numbers;
  return createRoi(x, y, width, height);
}

/**
 * Validate a parsed config document field by field
 */
export function parseWatermarkConfig(data: unknown): WatermarkConfig {
  if (!isRecord(data)) {
    throw new InvalidArgumentError('Configuration must be a JSON object.');
  }

  const required = [
    'ocrConfidenceThreshold',
    'frameSamplingRateFps',
    'defaultRois',
    'supportedFileFormats',
  ] as const;
  for (const key of required) {
    if (!(key in data)) {
      throw new InvalidArgumentError(`Missing required key "${key}".`);
    }
  }

  const rois = data.defaultRois;
  if (!Array.isArray(rois)) {
    throw new InvalidArgumentError('"defaultRois" must be a list of ROI objects.');
  }

  return {
    ocrConfidenceThreshold: validateConfidenceThreshold(data.ocrConfidenceThreshold),
    frameSamplingRateFps: validateSamplingRate(data.frameSamplingRateFps),
    defaultRois: rois.map((roi, index) => roiFromRecord(roi, index)),
    supportedFileFormats: validateFileFormats(data.supportedFileFormats),
  };
}

// ========================================
// File I/O
// ========================================

export function saveWatermarkConfig(config: WatermarkConfig, configPath: string): void {
  const document = {
    ocrConfidenceThreshold: config.ocrConfidenceThreshold,
    frameSamplingRateFps: config.frameSamplingRateFps,
    defaultRois: config.defaultRois.map(copyRoi),
    supportedFileFormats: [...config.supportedFileFormats],
  };
  fs.mkdirSync(path.dirname(path.resolve(configPath)), { recursive: true });
  fs.writeFileSync(configPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
}

/**
 * Read the config file, creating it with defaults when it does not exist
 */
export function loadWatermarkConfig(configPath: string): WatermarkConfig {
  if (!fs.existsSync(configPath)) {
    const defaults: WatermarkConfig = {
      ...DEFAULT_WATERMARK_CONFIG,
      defaultRois: DEFAULT_WATERMARK_CONFIG.defaultRois.map(copyRoi),
      supportedFileFormats: [...DEFAULT_WATERMARK_CONFIG.supportedFileFormats],
    };
    saveWatermarkConfig(defaults, configPath);
    return defaults;
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InvalidArgumentError(
      `Configuration file "${configPath}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseWatermarkConfig(data);
}

// ========================================
// Environment
// ========================================

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Environment variable ${key} must be a number (got "${value}").`);
  }
  return parsed;
}

function stringFromEnv(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value : null;
}

/**
 * Load the full application configuration
 *
 * @param env - Environment to read (defaults to process.env)
 *
 * @example
 * ```typescript
 * const config = loadAppConfig();
 * // { ocrConfidenceThreshold: 0.75, frameSamplingRateFps: 1, sceneThreshold: 0.4, ... }
 * ```
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = stringFromEnv(env, 'WATERMARK_CONFIG_PATH') ?? DEFAULT_CONFIG_PATH;
  const fileConfig = loadWatermarkConfig(configPath);

  const thresholdOverride = numberFromEnv(env, 'OCR_CONFIDENCE_THRESHOLD');
  const fpsOverride = numberFromEnv(env, 'FRAME_SAMPLING_RATE_FPS');
  const sceneThreshold = numberFromEnv(env, 'SCENE_THRESHOLD') ?? DEFAULT_SCENE_THRESHOLD;
  const ocrConcurrency = numberFromEnv(env, 'OCR_CONCURRENCY') ?? 1;

  if (!(sceneThreshold > 0 && sceneThreshold < 1)) {
    throw new InvalidArgumentError('SCENE_THRESHOLD must be between 0.0 and 1.0 (exclusive).');
  }
  if (!Number.isInteger(ocrConcurrency) || ocrConcurrency < 1) {
    throw new InvalidArgumentError('OCR_CONCURRENCY must be a positive integer.');
  }

  return {
    ...fileConfig,
    ocrConfidenceThreshold:
      thresholdOverride === undefined
        ? fileConfig.ocrConfidenceThreshold
        : validateConfidenceThreshold(thresholdOverride),
    frameSamplingRateFps:
      fpsOverride === undefined ? fileConfig.frameSamplingRateFps : validateSamplingRate(fpsOverride),
    sceneThreshold,
    ocrConcurrency,
    logLevel: parseLogLevel(stringFromEnv(env, 'LOG_LEVEL') ?? undefined),
    logDir: stringFromEnv(env, 'LOG_DIR') ?? DEFAULT_LOG_DIR,
    workDir: stringFromEnv(env, 'WATERMARK_WORK_DIR'),
    supabaseUrl: stringFromEnv(env, 'SUPABASE_URL'),
    supabaseServiceRoleKey: stringFromEnv(env, 'SUPABASE_SERVICE_ROLE_KEY'),
    configPath,
  };
}
