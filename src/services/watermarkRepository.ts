/**
 * Watermark Repository
 *
 * Persistence for videos, clips and detections (Dual mode):
 * - Supabase (tables from supabase/migrations/0001_watermarks.sql)
 * - In-memory (development and tests)
 *
 * The repository hands out identities. Clips are created unassigned and
 * receive their id through `saveClips`; that id is authoritative from then on.
 */

import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import { AppError, InvalidArgumentError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  withVideoId,
  createVideo,
  type Clip,
  type ClipRecord,
  type Detection,
  type DetectionFilter,
  type DetectionRecord,
  type Video,
} from '../types/shared.js';

export interface WatermarkRepository {
  /** Insert a video and return it with its assigned id */
  saveVideo(video: Video): Promise<Video>;
  getVideo(videoId: number): Promise<Video | null>;
  /**
   * Insert unassigned clips (assigning their ids in place) and update the
   * segment path of already assigned ones
   */
  saveClips(clips: readonly Clip[]): Promise<void>;
  deleteClips(clipIds: readonly number[]): Promise<void>;
  /** Clips of a video ordered by start time */
  listClips(videoId: number): Promise<ClipRecord[]>;
  saveDetections(detections: readonly Detection[]): Promise<DetectionRecord[]>;
  /** Detections matching every given filter, ordered by timestamp */
  queryDetections(filter?: DetectionFilter): Promise<DetectionRecord[]>;
}

function validateFilter(filter: DetectionFilter): void {
  if (filter.minConfidence !== undefined && !Number.isFinite(filter.minConfidence)) {
    throw new InvalidArgumentError('min_confidence must be a number');
  }
  if (filter.clipId !== undefined && !Number.isInteger(filter.clipId)) {
    throw new InvalidArgumentError('clip_id must be an integer');
  }
  if (filter.videoId !== undefined && !Number.isInteger(filter.videoId)) {
    throw new InvalidArgumentError('video_id must be an integer');
  }
}

function detectionToRecord(detection: Detection, watermarkId: number): DetectionRecord {
  return {
    watermarkId,
    videoId: detection.videoId,
    clipId: detection.clipId,
    timestamp: detection.timestamp,
    extractedText: detection.text,
    confidence: detection.confidence,
    roiX: detection.roi.x,
    roiY: detection.roi.y,
    roiWidth: detection.roi.width,
    roiHeight: detection.roi.height,
  };
}

function compareRecords(a: DetectionRecord, b: DetectionRecord): number {
  return a.timestamp - b.timestamp || a.watermarkId - b.watermarkId;
}

// ========================================
// In-memory
// ========================================

export class InMemoryWatermarkRepository implements WatermarkRepository {
  private readonly videos = new Map<number, Video>();
  private readonly clips = new Map<number, ClipRecord>();
  private readonly detections = new Map<number, DetectionRecord>();
  private nextVideoId = 1;
  private nextClipId = 1;
  private nextWatermarkId = 1;

  constructor(private readonly log: Logger = defaultLogger) {}

  async saveVideo(video: Video): Promise<Video> {
    const saved = withVideoId(video, this.nextVideoId++);
    this.videos.set(saved.videoId, saved);
    this.log.debug(`[InMemory] Video ${saved.videoId} saved`);
    return saved;
  }

  async getVideo(videoId: number): Promise<Video | null> {
    return this.videos.get(videoId) ?? null;
  }

  async saveClips(clips: readonly Clip[]): Promise<void> {
    for (const clip of clips) {
      if (!this.videos.has(clip.videoId)) {
        throw new AppError('Database operation failed.', `saveClips: unknown video_id ${clip.videoId}`);
      }
      if (!clip.isAssigned) {
        clip.assignId(this.nextClipId++);
      } else if (!this.clips.has(clip.clipId)) {
        throw new AppError('Database operation failed.', `saveClips: unknown clip_id ${clip.clipId}`);
      }
      this.clips.set(clip.clipId, {
        clipId: clip.clipId,
        videoId: clip.videoId,
        startTime: clip.startTime,
        endTime: clip.endTime,
        segmentPath: clip.segmentPath,
      });
    }
    this.log.debug(`[InMemory] ${clips.length} clips saved`);
  }

  async deleteClips(clipIds: readonly number[]): Promise<void> {
    const removed = new Set(clipIds);
    removed.forEach((clipId) => this.clips.delete(clipId));
    for (const [watermarkId, record] of this.detections) {
      if (removed.has(record.clipId)) this.detections.delete(watermarkId);
    }
  }

  async listClips(videoId: number): Promise<ClipRecord[]> {
    return Array.from(this.clips.values())
      .filter((clip) => clip.videoId === videoId)
      .sort((a, b) => a.startTime - b.startTime)
      .map((clip) => ({ ...clip }));
  }

  async saveDetections(detections: readonly Detection[]): Promise<DetectionRecord[]> {
    for (const detection of detections) {
      if (!this.videos.has(detection.videoId) || !this.clips.has(detection.clipId)) {
        throw new AppError(
          'Database operation failed.',
          `saveDetections: unknown video_id ${detection.videoId} or clip_id ${detection.clipId}`
        );
      }
    }
    const records = detections.map((detection) => detectionToRecord(detection, this.nextWatermarkId++));
    records.forEach((record) => this.detections.set(record.watermarkId, record));
    this.log.debug(`[InMemory] ${records.length} detections saved`);
    return records.map((record) => ({ ...record }));
  }

  async queryDetections(filter: DetectionFilter = {}): Promise<DetectionRecord[]> {
    validateFilter(filter);
    const needle = filter.textFilter?.toLowerCase();

    return Array.from(this.detections.values())
      .filter((record) => filter.videoId === undefined || record.videoId === filter.videoId)
      .filter((record) => needle === undefined || record.extractedText.toLowerCase().includes(needle))
      .filter((record) => filter.minConfidence === undefined || record.confidence >= filter.minConfidence)
      .filter((record) => filter.clipId === undefined || record.clipId === filter.clipId)
      .sort(compareRecords)
      .map((record) => ({ ...record }));
  }
}

// ========================================
// Supabase
// ========================================

interface VideoRow {
  video_id: number;
  source_type: 'file' | 'url';
  source_path: string;
  original_url: string | null;
  duration: number;
  resolution_w: number;
  resolution_h: number;
  import_timestamp: string;
}

interface ClipRow {
  clip_id: number;
  video_id: number;
  start_time: number;
  end_time: number;
  file_path: string | null;
}

interface WatermarkRow {
  watermark_id: number;
  video_id: number;
  clip_id: number;
  timestamp: number;
  extracted_text: string;
  confidence: number;
  roi_x: number;
  roi_y: number;
  roi_width: number;
  roi_height: number;
}

function mapVideoRow(row: VideoRow): Video {
  return createVideo({
    videoId: row.video_id,
    sourceType: row.source_type,
    sourcePath: row.source_path,
    originalUrl: row.original_url,
    duration: row.duration,
    resolution: { width: row.resolution_w, height: row.resolution_h },
    importTimestamp: row.import_timestamp,
  });
}

function mapClipRow(row: ClipRow): ClipRecord {
  return {
    clipId: row.clip_id,
    videoId: row.video_id,
    startTime: row.start_time,
    endTime: row.end_time,
    segmentPath: row.file_path,
  };
}

function mapWatermarkRow(row: WatermarkRow): DetectionRecord {
  return {
    watermarkId: row.watermark_id,
    videoId: row.video_id,
    clipId: row.clip_id,
    timestamp: row.timestamp,
    extractedText: row.extracted_text,
    confidence: row.confidence,
    roiX: row.roi_x,
    roiY: row.roi_y,
    roiWidth: row.roi_width,
    roiHeight: row.roi_height,
  };
}

/**
 * Escape LIKE wildcards so the filter matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class SupabaseWatermarkRepository implements WatermarkRepository {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Enhanced error handler with detailed diagnostics
   */
  private handleSupabaseError(operation: string, error: PostgrestError): never {
    this.log.error(`Supabase ${operation} failed`, {
      code: error.code,
      message: error.message,
      details: error.details,
      hint: error.hint,
    });

    if (error.code === 'PGRST205') {
      throw new AppError(
        'Database operation failed.',
        `Schema cache error during ${operation}: run supabase/migrations/0001_watermarks.sql and reload the schema`
      );
    }
    if (error.code === '42501') {
      throw new AppError(
        'Database operation failed.',
        `Row-level security policy violation during ${operation}: use the service_role key`
      );
    }
    throw new AppError('Database operation failed.', `${operation}: ${error.message}`);
  }

  async saveVideo(video: Video): Promise<Video> {
    const { data, error } = await this.supabase
      .from('videos')
      .insert({
        source_type: video.sourceType,
        source_path: video.sourcePath,
        original_url: video.originalUrl,
        duration: video.duration,
        resolution_w: video.resolution.width,
        resolution_h: video.resolution.height,
        import_timestamp: video.importTimestamp,
      })
      .select()
      .single();

    if (error) this.handleSupabaseError('saveVideo', error);
    return mapVideoRow(data);
  }

  async getVideo(videoId: number): Promise<Video | null> {
    const { data, error } = await this.supabase.from('videos').select().eq('video_id', videoId).maybeSingle();
    if (error) this.handleSupabaseError('getVideo', error);
    return data ? mapVideoRow(data) : null;
  }

  async saveClips(clips: readonly Clip[]): Promise<void> {
    const fresh = clips.filter((clip) => !clip.isAssigned);
    const existing = clips.filter((clip) => clip.isAssigned);

    if (fresh.length > 0) {
      const { data, error } = await this.supabase
        .from('clips')
        .insert(
          fresh.map((clip) => ({
            video_id: clip.videoId,
            start_time: clip.startTime,
            end_time: clip.endTime,
            file_path: clip.segmentPath,
          }))
        )
        .select('clip_id');

      if (error) this.handleSupabaseError('saveClips', error);
      const rows: Array<{ clip_id: number }> = data ?? [];
      if (rows.length !== fresh.length) {
        throw new AppError(
          'Database operation failed.',
          `saveClips: inserted ${fresh.length} clips, got ${rows.length} ids back`
        );
      }
      fresh.forEach((clip, index) => clip.assignId(rows[index].clip_id));
    }

    for (const clip of existing) {
      const { error } = await this.supabase
        .from('clips')
        .update({ file_path: clip.segmentPath })
        .eq('clip_id', clip.clipId);
      if (error) this.handleSupabaseError('saveClips', error);
    }
  }

  async deleteClips(clipIds: readonly number[]): Promise<void> {
    if (clipIds.length === 0) return;
    const { error } = await this.supabase.from('clips').delete().in('clip_id', [...clipIds]);
    if (error) this.handleSupabaseError('deleteClips', error);
  }

  async listClips(videoId: number): Promise<ClipRecord[]> {
    const { data, error } = await this.supabase
      .from('clips')
      .select()
      .eq('video_id', videoId)
      .order('start_time', { ascending: true });

    if (error) this.handleSupabaseError('listClips', error);
    const rows: ClipRow[] = data ?? [];
    return rows.map(mapClipRow);
  }

  async saveDetections(detections: readonly Detection[]): Promise<DetectionRecord[]> {
    if (detections.length === 0) return [];

    const { data, error } = await this.supabase
      .from('watermarks')
      .insert(
        detections.map((detection) => ({
          video_id: detection.videoId,
          clip_id: detection.clipId,
          timestamp: detection.timestamp,
          extracted_text: detection.text,
          confidence: detection.confidence,
          roi_x: detection.roi.x,
          roi_y: detection.roi.y,
          roi_width: detection.roi.width,
          roi_height: detection.roi.height,
        }))
      )
      .select();

    if (error) this.handleSupabaseError('saveDetections', error);
    const rows: WatermarkRow[] = data ?? [];
    return rows.map(mapWatermarkRow);
  }

  async queryDetections(filter: DetectionFilter = {}): Promise<DetectionRecord[]> {
    validateFilter(filter);

    let query = this.supabase.from('watermarks').select();
    if (filter.videoId !== undefined) query = query.eq('video_id', filter.videoId);
    if (filter.textFilter !== undefined) {
      query = query.ilike('extracted_text', `%${escapeLikePattern(filter.textFilter)}%`);
    }
    if (filter.minConfidence !== undefined) query = query.gte('confidence', filter.minConfidence);
    if (filter.clipId !== undefined) query = query.eq('clip_id', filter.clipId);

    const { data, error } = await query
      .order('timestamp', { ascending: true })
      .order('watermark_id', { ascending: true });

    if (error) this.handleSupabaseError('queryDetections', error);
    const rows: WatermarkRow[] = data ?? [];
    return rows.map(mapWatermarkRow);
  }
}

/**
 * Supabase repository when credentials are configured, in-memory otherwise
 */
export function createWatermarkRepository(
  config: { supabaseUrl: string | null; supabaseServiceRoleKey: string | null },
  log: Logger = defaultLogger
): WatermarkRepository {
  if (config.supabaseUrl && config.supabaseServiceRoleKey) {
    log.info('[WatermarkRepository] Supabase mode enabled');
    return new SupabaseWatermarkRepository(createClient(config.supabaseUrl, config.supabaseServiceRoleKey), log);
  }
  log.info('[WatermarkRepository] In-memory mode enabled');
  return new InMemoryWatermarkRepository(log);
}
