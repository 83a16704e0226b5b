import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  createSettings,
  imageEncodingOf,
  parseImageFormat,
  pointsToPixels,
} from '../src/flatten/settings.js';
import { ConversionError } from '../src/flatten/errors.js';

describe('createSettings', () => {
  it('fills in defaults', () => {
    expect(createSettings()).toEqual({
      dpi: 150,
      imageFormat: 'JPEG',
      jpegQuality: 85,
      verbose: false,
      skipFailedPages: false,
    });
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createSettings({ dpi: 300 }))).toBe(true);
    expect(Object.isFrozen(DEFAULT_SETTINGS)).toBe(true);
  });

  it('accepts the range bounds', () => {
    expect(createSettings({ dpi: 36 }).dpi).toBe(36);
    expect(createSettings({ dpi: 600 }).dpi).toBe(600);
  });

  it.each([35, 601, 150.5, Number.NaN])('rejects dpi %s', (dpi) => {
    expect(() => createSettings({ dpi })).toThrow(ConversionError);
    expect(() => createSettings({ dpi })).toThrow(/DPI must be an integer between 36 and 600/);
  });

  it.each([0, 101, 85.5])('rejects JPEG quality %s', (jpegQuality) => {
    try {
      createSettings({ jpegQuality });
      expect.fail('expected a UsageError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConversionError);
      expect(error).toMatchObject({ kind: 'UsageError' });
    }
  });
});

describe('parseImageFormat', () => {
  it('is case-insensitive and accepts jpg', () => {
    expect(parseImageFormat('jpeg')).toBe('JPEG');
    expect(parseImageFormat(' Png ')).toBe('PNG');
    expect(parseImageFormat('jpg')).toBe('JPEG');
  });

  it('rejects other formats', () => {
    expect(() => parseImageFormat('gif')).toThrow('Image format must be JPEG or PNG (got "gif")');
  });
});

describe('imageEncodingOf', () => {
  it('carries quality only for JPEG', () => {
    expect(imageEncodingOf(createSettings({ jpegQuality: 60 }))).toEqual({ format: 'JPEG', quality: 60 });
    expect(imageEncodingOf(createSettings({ imageFormat: 'PNG', jpegQuality: 60 }))).toEqual({ format: 'PNG' });
  });
});

describe('pointsToPixels', () => {
  it('maps US Letter at 150 DPI to 1275 x 1650', () => {
    expect(pointsToPixels(612, 150)).toBe(1275);
    expect(pointsToPixels(792, 150)).toBe(1650);
  });

  it('is the identity at 72 DPI', () => {
    expect(pointsToPixels(595, 72)).toBe(595);
  });

  it('rounds to the nearest pixel', () => {
    // 595 * 150 / 72 = 1239.58
    expect(pointsToPixels(595, 150)).toBe(1240);
  });
});
