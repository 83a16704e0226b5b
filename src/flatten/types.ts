/**
 * Flattening pipeline types
 *
 * Shared by the validator, rasterizer, encoder, assembler and session.
 * Results use the discriminated-union pattern: narrow on `success` / `valid`.
 */

import type { ConversionErrorDetail, ConversionError } from './errors.js';

export type ImageFormat = 'JPEG' | 'PNG';

/**
 * Immutable conversion settings (see settings.ts for validation and defaults)
 */
export interface ConversionSettings {
  /** Rasterization resolution, 36-600 */
  readonly dpi: number;
  readonly imageFormat: ImageFormat;
  /** 1-100, ignored for PNG */
  readonly jpegQuality: number;
  readonly verbose: boolean;
  /** Record failed pages and keep going instead of failing the job */
  readonly skipFailedPages: boolean;
}

/**
 * Image encoding chosen for a job, derived once from settings
 */
export type ImageEncoding =
  | { readonly format: 'JPEG'; readonly quality: number }
  | { readonly format: 'PNG' };

/**
 * Physical page size in points (1/72 inch), in display orientation
 */
export interface PageGeometry {
  widthPts: number;
  heightPts: number;
}

/**
 * Input document: a file on disk or bytes already in memory
 */
export type SourceInput =
  | { path: string }
  | {
      data: Uint8Array;
      /** Original filename, used for the extension check when present */
      filename?: string;
      /** Declared MIME type, advisory */
      contentType?: string;
    };

/**
 * Opened input document. Closed exactly once by its owner.
 */
export interface SourceDocument {
  readonly pageCount: number;
  readonly pages: readonly PageGeometry[];
  close(): void;
}

export type ColorMode = 'rgb' | 'rgba';

/**
 * One rendered page, 8-bit RGBA interleaved
 */
export interface RasterPage {
  pageIndex: number;
  width: number;
  height: number;
  channels: number;
  /** 'rgb' when every pixel is opaque */
  colorMode: ColorMode;
  data: Uint8Array;
}

export interface EncodedImage {
  data: Uint8Array;
  width: number;
  height: number;
  format: ImageFormat;
}

export interface PageRasterizer {
  open(data: Uint8Array): Promise<SourceDocument>;
  rasterize(document: SourceDocument, pageIndex: number, dpi: number): Promise<RasterPage>;
}

export interface ImageEncoder {
  encode(raster: RasterPage, encoding: ImageEncoding): Promise<EncodedImage>;
}

/**
 * Successful validation: the document can be converted
 */
export interface ValidationSuccess {
  valid: true;
  pageCount: number;
  pages: PageGeometry[];
  /** Bytes that were validated, reused by the session */
  data: Uint8Array;
  /** Content-type mismatch or similar non-fatal findings */
  warnings: string[];
}

export interface ValidationFailure {
  valid: false;
  error: ConversionError;
}

export type ValidationOutcome = ValidationSuccess | ValidationFailure;

/**
 * Page left out of the output in skip-failed-pages mode
 */
export interface SkippedPage {
  pageIndex: number;
  error: ConversionErrorDetail;
}

export interface ConversionSuccessResult {
  success: true;
  /** Published output file, when a destination was given */
  outputPath?: string;
  /** Output bytes, when no destination was given */
  pdfBytes?: Buffer;
  /** Pages in the source document */
  pageCount: number;
  /** Pages placed in the output */
  pagesProcessed: number;
  skippedPages: SkippedPage[];
  /** Output size in bytes */
  outputSize: number;
  elapsedMs: number;
}

export interface ConversionFailureResult {
  success: false;
  error: ConversionErrorDetail;
  pagesProcessed: number;
  elapsedMs: number;
}

export type ConversionResult = ConversionSuccessResult | ConversionFailureResult;

export type SessionState =
  | 'created'
  | 'validating'
  | 'converting'
  | 'finalizing'
  | 'succeeded'
  | 'failed';

/**
 * Invoked after each page with a 1-based page number
 */
export type ProgressCallback = (currentPage: number, totalPages: number) => void | Promise<void>;
