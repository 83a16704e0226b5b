/**
 * Raster to JPEG/PNG encoding with sharp
 */

import sharp from 'sharp';
import { ConversionError, errorMessage } from './errors.js';
import type { EncodedImage, ImageEncoder, ImageEncoding, RasterPage } from './types.js';

/** Paper colour behind transparent areas when alpha has to go */
const JPEG_BACKGROUND = { r: 255, g: 255, b: 255 };

export class SharpImageEncoder implements ImageEncoder {
  async encode(raster: RasterPage, encoding: ImageEncoding): Promise<EncodedImage> {
    const { width, height, channels, pageIndex } = raster;

    const rawChannels = channels === 3 || channels === 4 ? channels : undefined;
    if (rawChannels === undefined) {
      throw new ConversionError('EncodeError', `Unsupported pixel layout: ${channels} channels`, { pageIndex });
    }
    if (raster.data.length !== width * height * channels) {
      throw new ConversionError(
        'EncodeError',
        `Pixel buffer holds ${raster.data.length} bytes, expected ${width * height * channels}`,
        { pageIndex }
      );
    }

    try {
      const image = sharp(raster.data, { raw: { width, height, channels: rawChannels } });
      let data: Buffer;

      if (encoding.format === 'JPEG') {
        data = await image
          .flatten({ background: JPEG_BACKGROUND })
          .jpeg({ quality: encoding.quality, chromaSubsampling: encoding.quality >= 90 ? '4:4:4' : '4:2:0' })
          .toBuffer();
      } else {
        // Opaque pages gain nothing from an alpha channel
        const pipeline = raster.colorMode === 'rgb' && channels === 4 ? image.removeAlpha() : image;
        data = await pipeline.png({ compressionLevel: 9 }).toBuffer();
      }

      return { data, width, height, format: encoding.format };
    } catch (error) {
      throw new ConversionError(
        'EncodeError',
        `Failed to encode page ${pageIndex + 1} as ${encoding.format}: ${errorMessage(error)}`,
        { pageIndex, cause: error }
      );
    }
  }
}
