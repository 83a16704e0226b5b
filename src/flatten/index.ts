/**
 * Library entry point
 */

export { PdfAssembler, type AssembledOutput } from './assembler.js';
export {
  convertBatch,
  dedupeInputs,
  outputFileName,
  uniqueOutputPath,
  type BatchFileResult,
  type BatchOptions,
  type BatchSummary,
} from './batch.js';
export { SharpImageEncoder } from './encoder.js';
export {
  ConversionError,
  describeError,
  errorMessage,
  invalidInput,
  toConversionError,
  type ConversionErrorDetail,
  type ConversionErrorKind,
  type ConversionErrorOptions,
  type InvalidInputReason,
} from './errors.js';
export { MuPdfRasterizer, MuPdfSourceDocument } from './rasterizer.js';
export { ConversionSession, convertPdf, type ConversionSessionOptions } from './session.js';
export {
  DEFAULT_SETTINGS,
  MAX_DPI,
  MIN_DPI,
  createSettings,
  imageEncodingOf,
  isImageFormat,
  parseImageFormat,
  pointsToPixels,
  type SettingsInput,
} from './settings.js';
export { estimatePageMemory, formatFileSize } from './sizes.js';
export { MIN_PDF_BYTES, hasPdfSignature, validatePdf, type ValidateOptions } from './validator.js';
export type * from './types.js';
