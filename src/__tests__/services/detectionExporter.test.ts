import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import ExcelJS from 'exceljs';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { exportDetections, exportFormatFor } from '../../services/detectionExporter.js';
import type { DetectionRecord } from '../../types/shared.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { silentLogger } from '../helpers/fakes.js';

const RECORD: DetectionRecord = {
  watermarkId: 1,
  videoId: 1,
  clipId: 2,
  timestamp: 3.5,
  extractedText: 'HelloWorld',
  confidence: 0.875,
  roiX: 10,
  roiY: 10,
  roiWidth: 200,
  roiHeight: 50,
};

describe('exportFormatFor', () => {
  it('should follow the extension case-insensitively', () => {
    expect(exportFormatFor('out/detections.CSV')).toBe('csv');
    expect(exportFormatFor('detections.xlsx')).toBe('xlsx');
  });

  it('should reject other extensions', () => {
    expect(() => exportFormatFor('detections.txt')).toThrow(
      new InvalidArgumentError('Unsupported export format ".txt" (use .csv or .xlsx)')
    );
  });
});

describe('exportDetections', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wm-export-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write a CSV with a header row', async () => {
    const outputPath = path.join(dir, 'nested', 'detections.csv');

    await expect(exportDetections([RECORD], outputPath, silentLogger())).resolves.toBe('csv');

    const lines = fs
      .readFileSync(outputPath, 'utf-8')
      .split(/\r?\n/)
      .filter((line) => line.length > 0);
    expect(lines).toEqual([
      'watermark_id,video_id,clip_id,timestamp,extracted_text,confidence,roi_x,roi_y,roi_width,roi_height',
      '1,1,2,3.5,HelloWorld,0.875,10,10,200,50',
    ]);
  });

  it('should write a workbook with a timecode column', async () => {
    const outputPath = path.join(dir, 'detections.xlsx');

    await expect(exportDetections([RECORD], outputPath, silentLogger())).resolves.toBe('xlsx');

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(outputPath);
    const worksheet = workbook.getWorksheet('Watermarks');
    expect(worksheet).toBeDefined();
    if (!worksheet) return;

    expect(worksheet.getRow(1).getCell(1).value).toBe('watermark_id');
    expect(worksheet.getRow(1).getCell(11).value).toBe('timecode');
    expect(worksheet.getRow(2).getCell(5).value).toBe('HelloWorld');
    expect(worksheet.getRow(2).getCell(6).value).toBe(0.875);
    expect(worksheet.getRow(2).getCell(11).value).toBe('00:00:03.500');
    expect(worksheet.rowCount).toBe(2);
  });

  it('should not create a file for an unsupported extension', async () => {
    const outputPath = path.join(dir, 'detections.json');

    await expect(exportDetections([RECORD], outputPath, silentLogger())).rejects.toThrow(InvalidArgumentError);
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});
