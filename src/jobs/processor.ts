/**
 * Flatten job processor
 *
 * Runs one ConversionSession per job in a scratch directory of its own and
 * publishes the output under DATA_DIR/outputs unless the job names a path.
 * No queue or Redis wiring here; the worker hands in the job.
 */

import { UnrecoverableError, type Job } from 'bullmq';
import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import * as path from 'node:path';
import sanitizeFilename from 'sanitize-filename';
import { outputFileName } from '../flatten/batch.js';
import { ConversionError, errorMessage, toConversionError, type ConversionErrorKind } from '../flatten/errors.js';
import { ConversionSession } from '../flatten/session.js';
import { createSettings, parseImageFormat } from '../flatten/settings.js';
import type { ConversionSettings, ImageEncoder, PageRasterizer, SourceInput } from '../flatten/types.js';
import { progressPercent } from './status.js';
import type { FlattenJobData, FlattenJobFailure, FlattenJobResult, FlattenJobSettings } from './types.js';

/** Failures that another attempt cannot fix */
const UNRECOVERABLE_KINDS: ReadonlySet<ConversionErrorKind> = new Set(['InvalidInput', 'UsageError']);

export type FlattenJob = Pick<Job<FlattenJobData, FlattenJobResult>, 'id' | 'data' | 'updateProgress'>;

export interface ProcessorConfig {
  dataDir: string;
  scratchRoot: string;
  defaults: ConversionSettings;
  rasterizer?: PageRasterizer;
  encoder?: ImageEncoder;
}

/**
 * Merge per-job overrides onto the worker defaults
 */
export function resolveJobSettings(defaults: ConversionSettings, overrides: FlattenJobSettings = {}): ConversionSettings {
  return createSettings({
    ...defaults,
    ...overrides,
    imageFormat: overrides.imageFormat === undefined ? defaults.imageFormat : parseImageFormat(overrides.imageFormat),
  });
}

/**
 * DATA_DIR/outputs/<jobId>_<stem>_image_<dpi>dpi.pdf
 */
export function defaultOutputPath(dataDir: string, jobId: string, data: FlattenJobData, dpi: number): string {
  const name = outputFileName(data.originalName ?? data.inputPath, dpi);
  return path.join(dataDir, 'outputs', `${sanitizeFilename(jobId)}_${name}`);
}

/**
 * Uploaded files sit under a temporary name, so the declared name stands in
 * for the extension check
 */
async function jobSource(data: FlattenJobData): Promise<SourceInput> {
  if (data.originalName === undefined) {
    return { path: data.inputPath };
  }
  try {
    return { data: await readFile(data.inputPath), filename: data.originalName };
  } catch (error) {
    throw new ConversionError('IOError', `Cannot read ${data.inputPath}: ${errorMessage(error)}`, { cause: error });
  }
}

function failJob(jobId: string, data: FlattenJobData, error: ConversionError): never {
  const failure: FlattenJobFailure = {
    jobId,
    inputPath: data.inputPath,
    kind: error.kind,
    reason: error.reason,
    message: error.message,
    pageIndex: error.pageIndex,
  };
  console.error(JSON.stringify({ event: 'flatten_job_failed', ...failure, timestamp: new Date().toISOString() }));

  // "<kind>[:<reason>]: <message>"
  const message = `${error.label}: ${error.message}`;
  if (UNRECOVERABLE_KINDS.has(error.kind)) {
    throw new UnrecoverableError(message);
  }
  throw new Error(message);
}

export async function processFlattenJob(job: FlattenJob, config: ProcessorConfig): Promise<FlattenJobResult> {
  const jobId = job.id ?? 'unknown';
  const { data } = job;

  let settings: ConversionSettings;
  try {
    settings = resolveJobSettings(config.defaults, data.settings);
  } catch (error) {
    failJob(jobId, data, toConversionError(error, 'UsageError'));
  }

  const destination = data.outputPath ?? defaultOutputPath(config.dataDir, jobId, data, settings.dpi);

  await mkdir(path.dirname(destination), { recursive: true });
  await mkdir(config.scratchRoot, { recursive: true });
  const scratchDir = await mkdtemp(path.join(config.scratchRoot, 'job-'));

  try {
    let source: SourceInput;
    try {
      source = await jobSource(data);
    } catch (error) {
      failJob(jobId, data, toConversionError(error, 'IOError'));
    }

    const session = new ConversionSession({
      source,
      settings,
      scratchDir,
      destination,
      rasterizer: config.rasterizer,
      encoder: config.encoder,
      onProgress: async (current, total) => {
        await job.updateProgress(progressPercent(current, total));
      },
    });

    const result = await session.run();
    if (!result.success) {
      failJob(jobId, data, new ConversionError(result.error.kind, result.error.message, {
        reason: result.error.reason,
        pageIndex: result.error.pageIndex,
      }));
    }

    return {
      outputPath: destination,
      outputSize: result.outputSize,
      pageCount: result.pageCount,
      pagesProcessed: result.pagesProcessed,
      skippedPages: result.skippedPages.map((page) => page.pageIndex),
      elapsedMs: result.elapsedMs,
      completedAt: new Date().toISOString(),
    };
  } finally {
    await rm(scratchDir, { recursive: true, force: true }).catch((error: unknown) => {
      console.warn(`Failed to remove scratch directory ${scratchDir}: ${errorMessage(error)}`);
    });
  }
}
