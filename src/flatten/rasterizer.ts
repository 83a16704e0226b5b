/**
 * Page rasterization with MuPDF (WASM build from npm)
 *
 * Renders exactly one page at a time. The transform maps the page bounds
 * (rotation already applied by MuPDF) onto a pixel grid of
 * round(pts * dpi / 72) in each direction, so raster size depends only on the
 * page size and the DPI.
 */

import * as mupdf from 'mupdf';
import { ConversionError, errorMessage, invalidInput } from './errors.js';
import { pointsToPixels } from './settings.js';
import type { ColorMode, PageGeometry, PageRasterizer, RasterPage, SourceDocument } from './types.js';

const RGBA_CHANNELS = 4;

type Transform = [number, number, number, number, number, number];

/**
 * MuPDF reports bounds as float32 (595.28 comes back as 595.280029...);
 * page sizes are written to 1e-4 pt, well inside float32 error
 */
export function toPoints(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Source document opened through MuPDF
 * Page bounds are read once at open time; pages are loaded again per render
 */
export class MuPdfSourceDocument implements SourceDocument {
  private closed = false;

  constructor(
    private readonly document: mupdf.Document,
    readonly pages: readonly PageGeometry[]
  ) {}

  get pageCount(): number {
    return this.pages.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  loadPage(pageIndex: number): mupdf.Page {
    if (this.closed) {
      throw new ConversionError('UsageError', 'Source document is already closed');
    }
    return this.document.loadPage(pageIndex);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.document.destroy();
  }
}

/**
 * Copy MuPDF samples into a tightly packed, straight-alpha RGBA buffer of
 * exactly width x height. MuPDF stores premultiplied alpha.
 */
function unpackSamples(
  samples: Uint8ClampedArray,
  stride: number,
  sourceWidth: number,
  sourceHeight: number,
  width: number,
  height: number
): { data: Uint8Array; colorMode: ColorMode } {
  const data = new Uint8Array(width * height * RGBA_CHANNELS);
  const rows = Math.min(height, sourceHeight);
  const columns = Math.min(width, sourceWidth);
  let translucent = columns < width || rows < height;

  for (let y = 0; y < rows; y++) {
    let src = y * stride;
    let dst = y * width * RGBA_CHANNELS;
    for (let x = 0; x < columns; x++, src += RGBA_CHANNELS, dst += RGBA_CHANNELS) {
      const alpha = samples[src + 3];
      if (alpha === 255) {
        data[dst] = samples[src];
        data[dst + 1] = samples[src + 1];
        data[dst + 2] = samples[src + 2];
      } else {
        translucent = true;
        if (alpha > 0) {
          data[dst] = Math.min(255, Math.round((samples[src] * 255) / alpha));
          data[dst + 1] = Math.min(255, Math.round((samples[src + 1] * 255) / alpha));
          data[dst + 2] = Math.min(255, Math.round((samples[src + 2] * 255) / alpha));
        }
      }
      data[dst + 3] = alpha;
    }
  }

  return { data, colorMode: translucent ? 'rgba' : 'rgb' };
}

export class MuPdfRasterizer implements PageRasterizer {
  /**
   * Open a PDF from memory
   * Throws InvalidInput (Encrypted / Corrupt) when MuPDF cannot use it
   */
  async open(data: Uint8Array): Promise<MuPdfSourceDocument> {
    let document: mupdf.Document;
    try {
      document = mupdf.Document.openDocument(data, 'application/pdf');
    } catch (error) {
      throw invalidInput('Corrupt', `PDF could not be opened: ${errorMessage(error)}`, error);
    }

    try {
      if (document.needsPassword()) {
        throw invalidInput('Encrypted', 'PDF is password protected');
      }

      const pageCount = document.countPages();
      if (pageCount < 1) {
        throw invalidInput('Corrupt', 'PDF has no pages');
      }

      const pages: PageGeometry[] = [];
      for (let i = 0; i < pageCount; i++) {
        const page = document.loadPage(i);
        try {
          const [x0, y0, x1, y1] = page.getBounds();
          pages.push({ widthPts: toPoints(x1 - x0), heightPts: toPoints(y1 - y0) });
        } finally {
          page.destroy();
        }
      }

      return new MuPdfSourceDocument(document, pages);
    } catch (error) {
      document.destroy();
      if (error instanceof ConversionError) throw error;
      throw invalidInput('Corrupt', `PDF structure is damaged: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Render one page to RGBA pixels at the given DPI
   */
  async rasterize(document: SourceDocument, pageIndex: number, dpi: number): Promise<RasterPage> {
    if (!(document instanceof MuPdfSourceDocument)) {
      throw new ConversionError('UsageError', 'Document was not opened by this rasterizer');
    }
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= document.pageCount) {
      throw new ConversionError('UsageError', `Page index ${pageIndex} is out of range (0-${document.pageCount - 1})`);
    }

    const geometry = document.pages[pageIndex];
    const width = pointsToPixels(geometry.widthPts, dpi);
    const height = pointsToPixels(geometry.heightPts, dpi);
    if (width < 1 || height < 1) {
      throw new ConversionError('RenderError', `Page ${pageIndex + 1} has an empty area at ${dpi} DPI`, { pageIndex });
    }

    let page: mupdf.Page | undefined;
    let pixmap: mupdf.Pixmap | undefined;
    try {
      page = document.loadPage(pageIndex);
      const [x0, y0, x1, y1] = page.getBounds();
      const sx = width / (x1 - x0);
      const sy = height / (y1 - y0);
      const transform: Transform = [sx, 0, 0, sy, -x0 * sx, -y0 * sy];

      // Alpha on: areas the page never paints stay transparent
      pixmap = page.toPixmap(transform, mupdf.ColorSpace.DeviceRGB, true, false);
      if (pixmap.getNumberOfComponents() !== RGBA_CHANNELS) {
        throw new Error(`unexpected pixmap layout with ${pixmap.getNumberOfComponents()} components`);
      }

      const { data, colorMode } = unpackSamples(
        pixmap.getPixels(),
        pixmap.getStride(),
        pixmap.getWidth(),
        pixmap.getHeight(),
        width,
        height
      );

      return { pageIndex, width, height, channels: RGBA_CHANNELS, colorMode, data };
    } catch (error) {
      if (error instanceof ConversionError) throw error;
      throw new ConversionError('RenderError', `Failed to render page ${pageIndex + 1}: ${errorMessage(error)}`, {
        pageIndex,
        cause: error,
      });
    } finally {
      pixmap?.destroy();
      page?.destroy();
    }
  }
}
