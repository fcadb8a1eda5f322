/**
 * ROI cropping for recognition input
 */

import sharp from 'sharp';
import type { Frame, Roi } from '../types/shared.js';

export type RegionStatus = 'ok' | 'out_of_bounds' | 'empty_crop';

/**
 * Whether `roi` can be cropped from `frame`
 */
export function regionStatus(frame: Frame, roi: Roi): RegionStatus {
  if (
    roi.x < 0 ||
    roi.y < 0 ||
    roi.x + roi.width > frame.width ||
    roi.y + roi.height > frame.height
  ) {
    return 'out_of_bounds';
  }
  if (roi.width * roi.height === 0 || frame.data.length === 0) {
    return 'empty_crop';
  }
  return 'ok';
}

/**
 * Crop `roi` out of a raw frame and encode it as a single-channel PNG
 */
export async function extractRegion(frame: Frame, roi: Roi): Promise<Buffer> {
  return sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: frame.channels },
  })
    .extract({ left: roi.x, top: roi.y, width: roi.width, height: roi.height })
    .grayscale()
    .png()
    .toBuffer();
}
