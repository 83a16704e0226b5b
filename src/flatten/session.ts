/**
 * One conversion job, end to end
 *
 * created -> validating -> converting -> finalizing -> succeeded | failed
 *
 * Pages are processed strictly in order, one at a time: rasterize, encode,
 * place, then the raster and encoded bytes go out of scope before the next
 * page starts. A session either publishes one complete PDF or nothing.
 */

import { copyFile, rename, readFile, unlink } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import { PdfAssembler, type AssembledOutput } from './assembler.js';
import { SharpImageEncoder } from './encoder.js';
import { ConversionError, describeError, errorMessage, toConversionError } from './errors.js';
import { MuPdfRasterizer } from './rasterizer.js';
import { imageEncodingOf } from './settings.js';
import { estimatePageMemory, formatFileSize } from './sizes.js';
import { validatePdf } from './validator.js';
import type {
  ConversionResult,
  ConversionSettings,
  ImageEncoder,
  PageRasterizer,
  ProgressCallback,
  SessionState,
  SkippedPage,
  SourceDocument,
  SourceInput,
} from './types.js';

export interface ConversionSessionOptions {
  source: SourceInput;
  settings: ConversionSettings;
  /** Writable directory owned by this session for its lifetime */
  scratchDir: string;
  /** Where to publish the output; omitted means the result carries the bytes */
  destination?: string;
  onProgress?: ProgressCallback;
  /** Checked between pages */
  signal?: AbortSignal;
  rasterizer?: PageRasterizer;
  encoder?: ImageEncoder;
}

function describeSource(source: SourceInput): string {
  if ('path' in source) return source.path;
  return source.filename ?? `<${source.data.length} bytes>`;
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Move the finalized scratch file onto its destination
 * The destination only ever appears complete: across devices the file is
 * copied next to the destination under a temporary name, then renamed.
 */
export async function publish(scratchPath: string, destination: string): Promise<void> {
  try {
    await rename(scratchPath, destination);
    return;
  } catch (error) {
    if (!isCrossDeviceError(error)) throw error;
  }

  const staging = path.join(path.dirname(destination), `.${path.basename(destination)}.${randomUUID()}.partial`);
  try {
    await copyFile(scratchPath, staging);
    await rename(staging, destination);
  } catch (error) {
    await unlink(staging).catch((cleanupError: unknown) => {
      console.warn(`Failed to remove staging file ${staging}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }
  // Destination is complete at this point; a leftover scratch file is not a failure
  await unlink(scratchPath).catch((cleanupError: unknown) => {
    console.warn(`Failed to remove scratch file ${scratchPath}: ${errorMessage(cleanupError)}`);
  });
}

export class ConversionSession {
  private currentState: SessionState = 'created';
  private readonly id = randomUUID();
  private readonly rasterizer: PageRasterizer;
  private readonly encoder: ImageEncoder;

  constructor(private readonly options: ConversionSessionOptions) {
    this.rasterizer = options.rasterizer ?? new MuPdfRasterizer();
    this.encoder = options.encoder ?? new SharpImageEncoder();
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Run the job. Resolves with a success or failure result; throws only
   * UsageError when the session has already been run.
   */
  async run(): Promise<ConversionResult> {
    if (this.currentState !== 'created') {
      throw new ConversionError('UsageError', `Session ${this.id} has already run (state: ${this.currentState})`);
    }

    const { source, settings } = this.options;
    const startedAt = Date.now();
    let pagesProcessed = 0;
    let document: SourceDocument | undefined;
    let output: PdfAssembler | undefined;

    this.log('flatten_start', {
      source: describeSource(source),
      dpi: settings.dpi,
      format: settings.imageFormat,
      quality: settings.imageFormat === 'JPEG' ? settings.jpegQuality : undefined,
    });

    try {
      this.currentState = 'validating';
      const validation = await validatePdf(source, { rasterizer: this.rasterizer });
      if (!validation.valid) {
        throw validation.error;
      }

      this.currentState = 'converting';
      this.throwIfCancelled();
      document = await this.rasterizer.open(validation.data);
      output = await PdfAssembler.create(this.options.scratchDir);

      const encoding = imageEncodingOf(settings);
      const total = document.pageCount;
      const skippedPages: SkippedPage[] = [];

      for (let pageIndex = 0; pageIndex < total; pageIndex++) {
        this.throwIfCancelled();
        const geometry = document.pages[pageIndex];

        try {
          const raster = await this.rasterizer.rasterize(document, pageIndex, settings.dpi);
          const image = await this.encoder.encode(raster, encoding);
          await output.placePage(image, geometry.widthPts, geometry.heightPts);
          pagesProcessed++;

          if (settings.verbose) {
            this.log('flatten_page', {
              page: pageIndex + 1,
              totalPages: total,
              widthPts: geometry.widthPts,
              heightPts: geometry.heightPts,
              rasterWidth: raster.width,
              rasterHeight: raster.height,
              colorMode: raster.colorMode,
              imageBytes: image.data.length,
              estimatedPeakBytes: estimatePageMemory(geometry, settings.dpi),
            });
          }
        } catch (error) {
          const failure = toConversionError(error, 'RenderError', pageIndex);
          const pageError =
            failure.pageIndex === undefined
              ? new ConversionError(failure.kind, failure.message, { reason: failure.reason, pageIndex, cause: failure })
              : failure;
          if (!settings.skipFailedPages || !(pageError.kind === 'RenderError' || pageError.kind === 'EncodeError')) {
            throw pageError;
          }
          skippedPages.push({ pageIndex, error: describeError(pageError) });
          console.warn(`Skipping page ${pageIndex + 1}/${total}: ${pageError.message}`);
        }

        await this.reportProgress(pageIndex + 1, total);
      }

      if (pagesProcessed === 0) {
        throw new ConversionError('RenderError', `All ${total} pages failed to convert`);
      }

      this.throwIfCancelled();
      this.currentState = 'finalizing';
      const assembled = await output.finalize();
      const published = await this.publishOutput(assembled);
      output = undefined;

      const elapsedMs = Date.now() - startedAt;
      this.currentState = 'succeeded';
      this.log('flatten_complete', {
        pageCount: total,
        pagesProcessed,
        skippedPages: skippedPages.map((page) => page.pageIndex),
        outputSize: assembled.size,
        outputSizeHuman: formatFileSize(assembled.size),
        outputPath: published.outputPath,
        elapsedMs,
      });

      return {
        success: true,
        ...published,
        pageCount: total,
        pagesProcessed,
        skippedPages,
        outputSize: assembled.size,
        elapsedMs,
      };
    } catch (error) {
      const failure = toConversionError(error, 'IOError');
      this.currentState = 'failed';
      if (output) {
        await output.discard();
      }
      const elapsedMs = Date.now() - startedAt;

      console.error(JSON.stringify({
        event: 'flatten_failed',
        session: this.id,
        source: describeSource(source),
        error: describeError(failure),
        pagesProcessed,
        elapsedMs,
        timestamp: new Date().toISOString(),
      }));

      return { success: false, error: describeError(failure), pagesProcessed, elapsedMs };
    } finally {
      document?.close();
    }
  }

  private async publishOutput(assembled: AssembledOutput): Promise<{ outputPath?: string; pdfBytes?: Buffer }> {
    const { destination } = this.options;
    try {
      if (destination !== undefined) {
        await publish(assembled.path, destination);
        return { outputPath: destination };
      }
      const pdfBytes = await readFile(assembled.path);
      await unlink(assembled.path);
      return { pdfBytes };
    } catch (error) {
      throw new ConversionError('IOError', `Failed to publish output: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async reportProgress(currentPage: number, totalPages: number): Promise<void> {
    const { onProgress } = this.options;
    if (!onProgress) return;
    try {
      await onProgress(currentPage, totalPages);
    } catch (error) {
      throw new ConversionError('UsageError', `Progress callback failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private throwIfCancelled(): void {
    const { signal } = this.options;
    if (signal?.aborted) {
      const reason = signal.reason instanceof Error ? signal.reason.message : 'Conversion cancelled';
      throw new ConversionError('Cancelled', reason);
    }
  }

  private log(event: string, fields: Record<string, unknown>): void {
    console.log(JSON.stringify({ event, session: this.id, ...fields, timestamp: new Date().toISOString() }));
  }
}

/**
 * Convenience wrapper: one fresh session per call
 */
export async function convertPdf(options: ConversionSessionOptions): Promise<ConversionResult> {
  return new ConversionSession(options).run();
}
