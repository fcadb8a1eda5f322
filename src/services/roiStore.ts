/**
 * ROI Store
 *
 * Ordered list of rectangular search regions used for recognition.
 * Listing order is the order ROIs are evaluated in for each frame.
 */

import { copyRoi, validateRoi, type Roi } from '../types/shared.js';

export class RoiStore {
  private readonly rois: Roi[] = [];

  constructor(initial: readonly Roi[] = []) {
    initial.forEach((roi) => this.add(roi));
  }

  /**
   * Append a region; rejects negative origins and non-positive sizes
   */
  add(roi: Roi): void {
    validateRoi(roi);
    this.rois.push(copyRoi(roi));
  }

  /**
   * Remove the region at `index` and return it
   */
  remove(index: number): Roi {
    if (!Number.isInteger(index) || index < 0 || index >= this.rois.length) {
      throw new RangeError(`ROI index ${index} out of range (0-${this.rois.length - 1})`);
    }
    const [removed] = this.rois.splice(index, 1);
    return removed;
  }

  /**
   * Independent copy of the current regions
   */
  list(): Roi[] {
    return this.rois.map(copyRoi);
  }

  get size(): number {
    return this.rois.length;
  }
}
