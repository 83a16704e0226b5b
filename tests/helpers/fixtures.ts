import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { PDFDict, PDFDocument, PDFHexString, PDFName, PDFStream, degrees, rgb } from 'pdf-lib';
import { MuPdfRasterizer } from '../../src/flatten/rasterizer.js';
import { ConversionError } from '../../src/flatten/errors.js';
import type { RasterPage, SourceDocument } from '../../src/flatten/types.js';

export const LETTER: [number, number] = [612, 792];
export const A4: [number, number] = [595, 842];
export const A4_EXACT: [number, number] = [595.28, 841.89];

export interface PageSpec {
  size: [number, number];
  rotate?: number;
  /** Leave the page unpainted so it renders transparent */
  blank?: boolean;
}

/**
 * Build a PDF in memory. Non-blank pages get an opaque background that
 * overhangs the page on every side, plus a marker so pages differ.
 */
export async function makePdf(pages: Array<PageSpec | [number, number]>): Promise<Uint8Array> {
  const document = await PDFDocument.create();
  for (const [index, entry] of pages.entries()) {
    const layout: PageSpec = Array.isArray(entry) ? { size: entry } : entry;
    const [width, height] = layout.size;
    const page = document.addPage([width, height]);
    if (!layout.blank) {
      page.drawRectangle({ x: -10, y: -10, width: width + 20, height: height + 20, color: rgb(1, 1, 1) });
      page.drawRectangle({ x: 36, y: 36, width: 72 + index * 10, height: 72, color: rgb(0.1, 0.3, 0.8) });
    }
    if (layout.rotate !== undefined) {
      page.setRotation(degrees(layout.rotate));
    }
  }
  return document.save();
}

/**
 * A PDF whose trailer references a standard security handler dictionary
 */
export async function makeEncryptedPdf(): Promise<Uint8Array> {
  const document = await PDFDocument.create();
  document.addPage(LETTER);
  const encrypt = document.context.register(
    document.context.obj({
      Filter: 'Standard',
      V: 1,
      R: 2,
      O: PDFHexString.of('00'.repeat(32)),
      U: PDFHexString.of('00'.repeat(32)),
      P: -4,
    })
  );
  document.context.trailerInfo.Encrypt = encrypt;
  return document.save({ useObjectStreams: false });
}

/**
 * Starts with the PDF signature, then nothing a parser can use
 */
export function makeCorruptPdf(): Uint8Array {
  return Buffer.from(`%PDF-1.4\n${'garbage '.repeat(40)}`, 'latin1');
}

export async function makeTempDir(prefix = 'flatten-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * MuPDF rasterizer that fails with RenderError on the given pages
 */
export class FailingPageRasterizer extends MuPdfRasterizer {
  constructor(private readonly failingPages: ReadonlySet<number>) {
    super();
  }

  override async rasterize(document: SourceDocument, pageIndex: number, dpi: number): Promise<RasterPage> {
    if (this.failingPages.has(pageIndex)) {
      throw new ConversionError('RenderError', `Simulated render failure on page ${pageIndex + 1}`, { pageIndex });
    }
    return super.rasterize(document, pageIndex, dpi);
  }
}

/**
 * Solid RGBA raster, optionally with one transparent pixel in the corner
 */
export function solidRaster(width: number, height: number, options: { transparentCorner?: boolean } = {}): RasterPage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 200;
    data[i + 1] = 40;
    data[i + 2] = 40;
    data[i + 3] = 255;
  }
  if (options.transparentCorner) {
    data[3] = 0;
  }
  return {
    pageIndex: 0,
    width,
    height,
    channels: 4,
    colorMode: options.transparentCorner ? 'rgba' : 'rgb',
    data,
  };
}

/**
 * The image XObject drawn on each page of a flattened document
 * Throws when a page's image reference does not resolve
 */
export function embeddedImages(document: PDFDocument): PDFStream[] {
  return document.getPages().map((page, index) => {
    const xObjects = page.node.Resources()?.lookup(PDFName.of('XObject'), PDFDict);
    const image = xObjects?.lookup(PDFName.of('Im0'), PDFStream);
    if (!image) throw new Error(`page ${index + 1} has no image`);
    return image;
  });
}

export function imageFilter(image: PDFStream): string | undefined {
  return image.dict.get(PDFName.of('Filter'))?.toString();
}

/**
 * RGBA of one pixel, straight alpha
 */
export function pixelAt(raster: RasterPage, x: number, y: number): [number, number, number, number] {
  const offset = (y * raster.width + x) * raster.channels;
  return [raster.data[offset], raster.data[offset + 1], raster.data[offset + 2], raster.data[offset + 3]];
}
