/**
 * Conversion settings: defaults, validation, and the image-encoding variant
 */

import { ConversionError } from './errors.js';
import type { ConversionSettings, ImageEncoding, ImageFormat } from './types.js';

// The front-ends offer 72, 150 and 300; any integer in range is accepted
export const MIN_DPI = 36;
export const MAX_DPI = 600;

export const DEFAULT_SETTINGS: ConversionSettings = Object.freeze({
  dpi: 150,
  imageFormat: 'JPEG',
  jpegQuality: 85,
  verbose: false,
  skipFailedPages: false,
});

export type SettingsInput = Partial<ConversionSettings>;

export function isImageFormat(value: string): value is ImageFormat {
  return value === 'JPEG' || value === 'PNG';
}

/**
 * Parse a format name case-insensitively ("jpeg", "png", "jpg")
 */
export function parseImageFormat(value: string): ImageFormat {
  const upper = value.trim().toUpperCase();
  const normalized = upper === 'JPG' ? 'JPEG' : upper;
  if (!isImageFormat(normalized)) {
    throw new ConversionError('UsageError', `Image format must be JPEG or PNG (got "${value}")`);
  }
  return normalized;
}

/**
 * Build a validated, frozen settings value from partial input
 * Throws UsageError on out-of-range values
 */
export function createSettings(input: SettingsInput = {}): ConversionSettings {
  const settings: ConversionSettings = {
    dpi: input.dpi ?? DEFAULT_SETTINGS.dpi,
    imageFormat: input.imageFormat ?? DEFAULT_SETTINGS.imageFormat,
    jpegQuality: input.jpegQuality ?? DEFAULT_SETTINGS.jpegQuality,
    verbose: input.verbose ?? DEFAULT_SETTINGS.verbose,
    skipFailedPages: input.skipFailedPages ?? DEFAULT_SETTINGS.skipFailedPages,
  };

  if (!Number.isInteger(settings.dpi) || settings.dpi < MIN_DPI || settings.dpi > MAX_DPI) {
    throw new ConversionError(
      'UsageError',
      `DPI must be an integer between ${MIN_DPI} and ${MAX_DPI} (got ${settings.dpi})`
    );
  }
  if (!isImageFormat(settings.imageFormat)) {
    throw new ConversionError('UsageError', `Image format must be JPEG or PNG (got "${settings.imageFormat}")`);
  }
  // Quality is only meaningful for JPEG but must still be sane when carried along
  if (!Number.isInteger(settings.jpegQuality) || settings.jpegQuality < 1 || settings.jpegQuality > 100) {
    throw new ConversionError('UsageError', `JPEG quality must be between 1 and 100 (got ${settings.jpegQuality})`);
  }

  return Object.freeze(settings);
}

export function imageEncodingOf(settings: ConversionSettings): ImageEncoding {
  return settings.imageFormat === 'JPEG'
    ? { format: 'JPEG', quality: settings.jpegQuality }
    : { format: 'PNG' };
}

/**
 * Pixel extent of a length in points at the given DPI
 */
export function pointsToPixels(points: number, dpi: number): number {
  return Math.round((points * dpi) / 72);
}
