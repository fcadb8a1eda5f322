/**
 * Detection Exporter
 *
 * Writes stored detections to CSV or Excel (.xlsx) with a fixed column set.
 */

import ExcelJS from 'exceljs';
import { promises as fs } from 'fs';
import path from 'path';
import { InvalidArgumentError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { formatTimecode } from '../utils/timecode.js';
import type { DetectionRecord } from '../types/shared.js';

/**
 * Export columns, in order
 */
export const EXPORT_COLUMNS = [
  { header: 'watermark_id', key: 'watermarkId', width: 14 },
  { header: 'video_id', key: 'videoId', width: 10 },
  { header: 'clip_id', key: 'clipId', width: 10 },
  { header: 'timestamp', key: 'timestamp', width: 12 },
  { header: 'extracted_text', key: 'extractedText', width: 40 },
  { header: 'confidence', key: 'confidence', width: 12 },
  { header: 'roi_x', key: 'roiX', width: 8 },
  { header: 'roi_y', key: 'roiY', width: 8 },
  { header: 'roi_width', key: 'roiWidth', width: 10 },
  { header: 'roi_height', key: 'roiHeight', width: 10 },
] as const;

export type ExportFormat = 'csv' | 'xlsx';

export function exportFormatFor(outputPath: string): ExportFormat {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.xlsx') return 'xlsx';
  throw new InvalidArgumentError(`Unsupported export format "${ext}" (use .csv or .xlsx)`);
}

function buildWorkbook(records: readonly DetectionRecord[], styled: boolean): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const worksheet = workbook.addWorksheet('Watermarks', {
    views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
  });
  worksheet.columns = EXPORT_COLUMNS.map((column) => ({ ...column }));

  for (const record of records) {
    worksheet.addRow({ ...record });
  }

  if (styled) {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 12 };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FF4A90E2' },
    };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.getColumn('confidence').numFmt = '0.000';
    worksheet.getColumn('extractedText').alignment = { wrapText: true, vertical: 'top' };

    // Human-readable timecode next to the raw seconds
    const timecodes = worksheet.getColumn(EXPORT_COLUMNS.length + 1);
    timecodes.width = 14;
    worksheet.getRow(1).getCell(EXPORT_COLUMNS.length + 1).value = 'timecode';
    records.forEach((record, index) => {
      worksheet.getRow(index + 2).getCell(EXPORT_COLUMNS.length + 1).value = formatTimecode(record.timestamp);
    });
  }

  return workbook;
}

/**
 * Write detections to `outputPath`; the format follows the file extension
 */
export async function exportDetections(
  records: readonly DetectionRecord[],
  outputPath: string,
  log: Logger = defaultLogger
): Promise<ExportFormat> {
  const format = exportFormatFor(outputPath);
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });

  if (format === 'csv') {
    await buildWorkbook(records, false).csv.writeFile(outputPath);
  } else {
    await buildWorkbook(records, true).xlsx.writeFile(outputPath);
  }

  log.info(`Exported ${records.length} detections to ${outputPath}`, { scope: 'DetectionExporter', format });
  return format;
}
