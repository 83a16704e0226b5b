import { pointsToPixels } from './settings.js';
import type { PageGeometry } from './types.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human readable byte size: "0 B", "512 B", "1.5 KB", "2.3 MB"
 */
export function formatFileSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return '0 B';
  }

  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return unit === 0 ? `${Math.floor(size)} ${UNITS[unit]}` : `${size.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Rough peak memory for converting one page: the backend pixmap, the
 * unpacked RGBA copy, and headroom for the encoder's working buffers.
 * Independent of page count since pages are processed one at a time.
 */
export function estimatePageMemory(geometry: PageGeometry, dpi: number): number {
  const pixels = pointsToPixels(geometry.widthPts, dpi) * pointsToPixels(geometry.heightPts, dpi);
  return Math.round(pixels * 4 * 2.5);
}
