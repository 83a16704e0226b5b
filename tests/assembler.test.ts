import { type FileHandle, open, readFile, readdir, rm, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { PDFDict, PDFDocument, PDFName, PDFStream } from 'pdf-lib';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PdfAssembler } from '../src/flatten/assembler.js';
import type { EncodedImage } from '../src/flatten/types.js';
import { makeTempDir, removeDir } from './helpers/fixtures.js';

async function jpegImage(width: number, height: number): Promise<EncodedImage> {
  const data = await sharp({ create: { width, height, channels: 3, background: { r: 30, g: 90, b: 200 } } })
    .jpeg({ quality: 80 })
    .toBuffer();
  return { data, width, height, format: 'JPEG' };
}

async function pngImage(width: number, height: number, alpha: number): Promise<EncodedImage> {
  const data = await sharp({ create: { width, height, channels: 4, background: { r: 0, g: 0, b: 0, alpha } } })
    .png()
    .toBuffer();
  return { data, width, height, format: 'PNG' };
}

function pageImage(document: PDFDocument, pageIndex: number): PDFStream {
  const resources = document.getPage(pageIndex).node.Resources();
  const xObjects = resources?.lookup(PDFName.of('XObject'), PDFDict);
  const image = xObjects?.lookup(PDFName.of('Im0'), PDFStream);
  if (!image) throw new Error(`page ${pageIndex} has no image`);
  return image;
}

describe('PdfAssembler', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('writes one page per image at the requested physical size', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(128, 165), 612, 792);
    await output.placePage(await jpegImage(165, 128), 792, 612);
    await output.placePage(await jpegImage(100, 141), 595.28, 841.89);

    const assembled = await output.finalize();
    const bytes = await readFile(assembled.path);
    const document = await PDFDocument.load(bytes, { updateMetadata: false });

    expect(assembled.pageCount).toBe(3);
    expect(assembled.size).toBe(bytes.length);
    expect((await stat(assembled.path)).size).toBe(assembled.size);
    expect(document.getPageCount()).toBe(3);
    expect(document.getPages().map((page) => page.getSize())).toEqual([
      { width: 612, height: 792 },
      { width: 792, height: 612 },
      { width: 595.28, height: 841.89 },
    ]);
    expect(document.getProducer()).toBe('pdf-flattener');
  });

  it('embeds JPEG pages as DCT images', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(10, 10), 72, 72);
    const document = await PDFDocument.load(await readFile((await output.finalize()).path));

    const image = pageImage(document, 0);
    expect(image.dict.get(PDFName.of('Filter'))).toBe(PDFName.of('DCTDecode'));
    expect(image.dict.has(PDFName.of('SMask'))).toBe(false);
  });

  it('starts the first object on its own line so every page image resolves', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(8, 8), 72, 72);
    await output.placePage(await jpegImage(8, 8), 72, 72);
    const bytes = await readFile((await output.finalize()).path);

    expect(bytes.subarray(14, 16).toString('latin1')).toBe('\n\n');
    expect(bytes.subarray(16, 24).toString('latin1')).toMatch(/^\d+ 0 obj/);
    const document = await PDFDocument.load(bytes);
    expect(pageImage(document, 0).dict.get(PDFName.of('Width'))?.toString()).toBe('8');
    expect(pageImage(document, 1).dict.get(PDFName.of('Width'))?.toString()).toBe('8');
  });

  it('gives translucent PNG pages a soft mask', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await pngImage(10, 10, 0.5), 72, 72);
    await output.placePage(await pngImage(10, 10, 1), 72, 72);
    const document = await PDFDocument.load(await readFile((await output.finalize()).path));

    expect(pageImage(document, 0).dict.has(PDFName.of('SMask'))).toBe(true);
    expect(pageImage(document, 1).dict.has(PDFName.of('SMask'))).toBe(false);
  });

  it('refuses to finalize without pages', async () => {
    const output = await PdfAssembler.create(dir);

    await expect(output.finalize()).rejects.toMatchObject({ kind: 'UsageError' });
    await output.discard();
  });

  it('refuses non-positive page sizes', async () => {
    const output = await PdfAssembler.create(dir);

    await expect(output.placePage(await jpegImage(4, 4), 0, 72)).rejects.toMatchObject({ kind: 'UsageError' });
    await output.discard();
  });

  it('rejects any use after finalize', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(4, 4), 72, 72);
    await output.finalize();

    await expect(output.finalize()).rejects.toMatchObject({ kind: 'UsageError' });
    await expect(output.placePage(await jpegImage(4, 4), 72, 72)).rejects.toMatchObject({ kind: 'UsageError' });
  });

  it('removes the scratch file on discard and tolerates repeats', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(4, 4), 72, 72);

    await output.discard();
    await output.discard();

    expect(await readdir(dir)).toEqual([]);
    await expect(output.placePage(await jpegImage(4, 4), 72, 72)).rejects.toMatchObject({ kind: 'UsageError' });
  });

  it('removes the scratch file when finalize cannot write', async () => {
    const output = await PdfAssembler.create(dir);
    await output.placePage(await jpegImage(4, 4), 72, 72);

    const other = await open(path.join(dir, 'handle.tmp'), 'w');
    const handlePrototype: FileHandle = Object.getPrototypeOf(other);
    await other.close();
    await rm(path.join(dir, 'handle.tmp'));
    vi.spyOn(handlePrototype, 'write').mockRejectedValue(new Error('ENOSPC: no space left on device'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await expect(output.finalize()).rejects.toMatchObject({
      kind: 'IOError',
      message: `Failed to write output ${output.path}: ENOSPC: no space left on device`,
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('reports undecodable image data as EncodeError', async () => {
    const output = await PdfAssembler.create(dir);

    await expect(
      output.placePage({ data: Buffer.from('not a jpeg'), width: 1, height: 1, format: 'JPEG' }, 72, 72)
    ).rejects.toMatchObject({ kind: 'EncodeError' });
    await output.discard();
  });
});
