/**
 * Output PDF assembly on pdf-lib's object model
 *
 * Unlike PDFDocument.save(), which serializes the whole document at the end,
 * each page's objects (image XObject, soft mask, content stream, page dict)
 * are written to the scratch file as soon as the page is placed and then
 * dropped from the context. Only the page refs and xref offsets stay in
 * memory, so a document of thousands of pages costs one page at a time.
 *
 * File layout: header, page objects in placement order, then the page tree,
 * catalog, info dict, xref table and trailer on finalize.
 */

import { open, unlink, type FileHandle } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import {
  PDFContext,
  PDFCrossRefSection,
  PDFHeader,
  PDFString,
  PDFTrailer,
  PDFTrailerDict,
  JpegEmbedder,
  PngEmbedder,
  concatTransformationMatrix,
  drawObject,
  popGraphicsState,
  pushGraphicsState,
  type PDFObject,
  type PDFRef,
} from 'pdf-lib';
import { ConversionError, errorMessage } from './errors.js';
import type { EncodedImage } from './types.js';

const IMAGE_NAME = 'Im0';
const PRODUCER = 'pdf-flattener';

type OutputState = 'open' | 'finalized' | 'discarded';

/**
 * Finalized output file (still in the scratch location)
 */
export interface AssembledOutput {
  path: string;
  size: number;
  pageCount: number;
}

interface ObjectOffset {
  objectNumber: number;
  ref: PDFRef;
  offset: number;
}

function latin1(text: string): Uint8Array {
  return Buffer.from(text, 'latin1');
}

/**
 * Serialize "N G obj ... endobj" the same way pdf-lib's PDFWriter does
 */
function serializeIndirectObject(ref: PDFRef, object: PDFObject): Uint8Array {
  const head = latin1(`${ref.objectNumber} ${ref.generationNumber} obj\n`);
  const tail = latin1('\nendobj\n\n');
  const bytes = new Uint8Array(head.length + object.sizeInBytes() + tail.length);
  bytes.set(head, 0);
  let offset = head.length;
  offset += object.copyBytesInto(bytes, offset);
  bytes.set(tail, offset);
  return bytes;
}

function serialize(part: { sizeInBytes(): number; copyBytesInto(buffer: Uint8Array, offset: number): number }): Uint8Array {
  const bytes = new Uint8Array(part.sizeInBytes());
  part.copyBytesInto(bytes, 0);
  return bytes;
}

export class PdfAssembler {
  private state: OutputState = 'open';
  private busy = false;
  private bytesWritten = 0;
  private readonly offsets: ObjectOffset[] = [];
  private readonly pageRefs: PDFRef[] = [];
  private readonly pagesRef: PDFRef;

  private constructor(
    private readonly context: PDFContext,
    private readonly file: FileHandle,
    readonly path: string
  ) {
    // Page dicts point at the page tree before it exists; it is written last
    this.pagesRef = context.nextRef();
  }

  /**
   * Start a new output document in the given scratch directory
   */
  static async create(scratchDir: string): Promise<PdfAssembler> {
    const filePath = path.join(scratchDir, `flattened-${randomUUID()}.pdf`);
    let file: FileHandle;
    try {
      file = await open(filePath, 'wx');
    } catch (error) {
      throw new ConversionError('IOError', `Cannot create output in ${scratchDir}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const assembler = new PdfAssembler(PDFContext.create(), file, filePath);
    try {
      // The header ends in a binary comment line; objects start on a fresh line
      await assembler.write(serialize(PDFHeader.forVersion(1, 7)));
      await assembler.write(latin1('\n\n'));
    } catch (error) {
      await assembler.discard();
      throw error;
    }
    return assembler;
  }

  get pageCount(): number {
    return this.pageRefs.length;
  }

  get size(): number {
    return this.bytesWritten;
  }

  /**
   * Append a page of exactly widthPts x heightPts filled by the image
   */
  async placePage(image: EncodedImage, widthPts: number, heightPts: number): Promise<void> {
    this.assertWritable('placePage');
    if (!(widthPts > 0) || !(heightPts > 0)) {
      throw new ConversionError('UsageError', `Page size must be positive (got ${widthPts}x${heightPts})`);
    }

    this.busy = true;
    try {
      const embedder =
        image.format === 'JPEG' ? await JpegEmbedder.for(image.data) : await PngEmbedder.for(image.data);
      const imageRef = await embedder.embedIntoContext(this.context);

      const content = this.context.contentStream([
        pushGraphicsState(),
        concatTransformationMatrix(widthPts, 0, 0, heightPts, 0, 0),
        drawObject(IMAGE_NAME),
        popGraphicsState(),
      ]);
      const contentRef = this.context.register(content);

      const pageRef = this.context.register(
        this.context.obj({
          Type: 'Page',
          Parent: this.pagesRef,
          MediaBox: [0, 0, widthPts, heightPts],
          Resources: { XObject: { [IMAGE_NAME]: imageRef } },
          Contents: contentRef,
        })
      );

      await this.flushPendingObjects();
      this.pageRefs.push(pageRef);
    } catch (error) {
      if (error instanceof ConversionError) throw error;
      throw new ConversionError('EncodeError', `Failed to embed ${image.format} page image: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      this.busy = false;
    }
  }

  /**
   * Write the page tree, catalog and xref, close the file
   * Runs once; the file is removed if anything fails on the way
   */
  async finalize(): Promise<AssembledOutput> {
    this.assertWritable('finalize');
    if (this.pageRefs.length === 0) {
      throw new ConversionError('UsageError', 'Cannot finalize an output document without pages');
    }

    this.busy = true;
    try {
      const { context } = this;
      context.assign(
        this.pagesRef,
        context.obj({ Type: 'Pages', Kids: this.pageRefs, Count: this.pageRefs.length })
      );
      const catalogRef = context.register(context.obj({ Type: 'Catalog', Pages: this.pagesRef }));
      const infoRef = context.register(
        context.obj({ Producer: PDFString.of(PRODUCER), CreationDate: PDFString.fromDate(new Date()) })
      );
      await this.flushPendingObjects();

      const xrefOffset = this.bytesWritten;
      const xref = PDFCrossRefSection.create();
      const sorted = [...this.offsets].sort((a, b) => a.objectNumber - b.objectNumber);
      for (const entry of sorted) {
        xref.addEntry(entry.ref, entry.offset);
      }
      await this.write(serialize(xref));
      await this.write(latin1('\n'));

      const trailerDict = context.obj({ Size: context.largestObjectNumber + 1, Root: catalogRef, Info: infoRef });
      await this.write(serialize(PDFTrailerDict.of(trailerDict)));
      await this.write(latin1('\n'));
      await this.write(serialize(PDFTrailer.forLastCrossRefSectionOffset(xrefOffset)));

      await this.file.close();
      this.state = 'finalized';
      return { path: this.path, size: this.bytesWritten, pageCount: this.pageRefs.length };
    } catch (error) {
      await this.discard();
      if (error instanceof ConversionError) throw error;
      throw new ConversionError('IOError', `Failed to finalize output: ${errorMessage(error)}`, { cause: error });
    } finally {
      this.busy = false;
    }
  }

  /**
   * Drop the output: close and delete the scratch file
   * Safe to call more than once and after finalize (removes the file then too)
   */
  async discard(): Promise<void> {
    const wasOpen = this.state === 'open';
    this.state = 'discarded';
    if (wasOpen) {
      try {
        await this.file.close();
      } catch (error) {
        console.warn(`Failed to close output ${this.path}: ${errorMessage(error)}`);
      }
    }
    try {
      await unlink(this.path);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        console.warn(`Failed to remove output ${this.path}: ${errorMessage(error)}`);
      }
    }
  }

  private assertWritable(operation: string): void {
    if (this.state !== 'open') {
      throw new ConversionError('UsageError', `Cannot ${operation}: output document is already ${this.state}`);
    }
    if (this.busy) {
      throw new ConversionError('UsageError', `Cannot ${operation}: another operation is in progress`);
    }
  }

  private async write(bytes: Uint8Array): Promise<void> {
    try {
      await this.file.write(bytes);
    } catch (error) {
      throw new ConversionError('IOError', `Failed to write output ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.bytesWritten += bytes.length;
  }

  /**
   * Write every object registered since the last flush, then forget it
   */
  private async flushPendingObjects(): Promise<void> {
    for (const [ref, object] of this.context.enumerateIndirectObjects()) {
      this.offsets.push({ objectNumber: ref.objectNumber, ref, offset: this.bytesWritten });
      await this.write(serializeIndirectObject(ref, object));
      this.context.delete(ref);
    }
  }
}
