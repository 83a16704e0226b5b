/**
 * Job type definitions for the flatten queue
 *
 * These types define the contract between:
 * - callers that enqueue jobs
 * - the worker that processes them
 * - status lookups that report job state
 */

import type { ConversionErrorDetail } from '../flatten/errors.js';

/**
 * Per-job overrides of the worker's default settings
 * Plain JSON: the format name is parsed case-insensitively
 */
export interface FlattenJobSettings {
  dpi?: number;
  imageFormat?: string;
  jpegQuality?: number;
  skipFailedPages?: boolean;
  verbose?: boolean;
}

/**
 * Job input data (what gets queued)
 * Passed when calling flattenQueue.add()
 */
export interface FlattenJobData {
  /** Path of the PDF to flatten, readable by the worker */
  inputPath: string;
  /** Where to publish the result (default: DATA_DIR/outputs/<jobId>_<name>) */
  outputPath?: string;
  settings?: FlattenJobSettings;
  /** Name the file was uploaded under; used for the extension check and output naming */
  originalName?: string;
}

/**
 * Job result (returned on completion)
 * Available via job.returnvalue after the job completes
 */
export interface FlattenJobResult {
  outputPath: string;
  outputSize: number;
  pageCount: number;
  pagesProcessed: number;
  /** Zero-based indices of pages left out in skip mode */
  skippedPages: number[];
  elapsedMs: number;
  /** ISO timestamp of completion */
  completedAt: string;
}

/**
 * Failure details attached to the error thrown from the processor
 */
export interface FlattenJobFailure extends ConversionErrorDetail {
  jobId: string;
  inputPath: string;
}

/**
 * Mapped status for callers
 * Maps BullMQ internal states to user-friendly status values
 */
export type JobStatus = 'queued' | 'processing' | 'complete' | 'failed';
