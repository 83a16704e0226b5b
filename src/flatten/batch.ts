/**
 * Batch driver: one ConversionSession per input file
 *
 * Files are converted one after another; a failing file is recorded and the
 * batch moves on. Each job gets its own scratch directory under the
 * caller-provided scratch root, removed when the job ends.
 */

import { access, mkdir, mkdtemp, rm } from 'node:fs/promises';
import * as path from 'node:path';
import sanitizeFilename from 'sanitize-filename';
import { ConversionError, describeError, errorMessage, toConversionError } from './errors.js';
import { ConversionSession } from './session.js';
import { formatFileSize } from './sizes.js';
import type { ConversionResult, ConversionSettings, ImageEncoder, PageRasterizer, ProgressCallback } from './types.js';

/** Give up looking for a free name after this many numbered attempts */
const MAX_NAME_ATTEMPTS = 1000;
const MAX_STEM_LENGTH = 200;

export interface BatchOptions {
  settings: ConversionSettings;
  /** Directory in which per-job scratch directories are created */
  scratchRoot: string;
  /** Output directory; defaults to each input's own directory */
  outputDir?: string;
  /** Called before each file with a 1-based index */
  onFileStart?: (inputPath: string, index: number, total: number) => void;
  /** Per-page progress of the current file */
  onPageProgress?: (inputPath: string, ...progress: Parameters<ProgressCallback>) => void;
  signal?: AbortSignal;
  rasterizer?: PageRasterizer;
  encoder?: ImageEncoder;
}

export interface BatchFileResult {
  inputPath: string;
  outputPath?: string;
  result: ConversionResult;
}

export interface BatchSummary {
  results: BatchFileResult[];
  succeeded: number;
  failed: number;
  total: number;
}

/**
 * "<stem>_image_<dpi>dpi.pdf", with the stem made safe for any filesystem
 */
export function outputFileName(inputPath: string, dpi: number): string {
  const stem = path.basename(inputPath, path.extname(inputPath));
  const safeStem = sanitizeFilename(stem).replace(/^[ .]+|[ .]+$/g, '').substring(0, MAX_STEM_LENGTH) || 'converted_pdf';
  return `${safeStem}_image_${dpi}dpi.pdf`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free path among name.pdf, name_1.pdf, ... name_1000.pdf
 * Throws IOError when all of them are taken
 */
export async function uniqueOutputPath(directory: string, fileName: string): Promise<string> {
  const extension = path.extname(fileName);
  const base = path.basename(fileName, extension);

  let candidate = path.join(directory, fileName);
  for (let counter = 1; await exists(candidate); counter++) {
    if (counter > MAX_NAME_ATTEMPTS) {
      throw new ConversionError(
        'IOError',
        `No free output name for ${fileName} in ${directory} after ${MAX_NAME_ATTEMPTS} attempts`
      );
    }
    candidate = path.join(directory, `${base}_${counter}${extension}`);
  }
  return candidate;
}

/**
 * Drop duplicate inputs while keeping the first occurrence's position
 */
export function dedupeInputs(inputs: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const input of inputs) {
    const key = path.resolve(input);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(input);
  }
  return unique;
}

export async function convertBatch(inputs: readonly string[], options: BatchOptions): Promise<BatchSummary> {
  const { settings } = options;
  const files = dedupeInputs(inputs);
  const results: BatchFileResult[] = [];

  if (options.outputDir !== undefined) {
    await mkdir(options.outputDir, { recursive: true });
  }
  await mkdir(options.scratchRoot, { recursive: true });

  console.log(`Starting batch conversion of ${files.length} files...`);

  for (const [index, inputPath] of files.entries()) {
    options.onFileStart?.(inputPath, index + 1, files.length);

    const outputDir = options.outputDir ?? path.dirname(inputPath);
    let destination: string;
    try {
      destination = await uniqueOutputPath(outputDir, outputFileName(inputPath, settings.dpi));
    } catch (error) {
      const failure = toConversionError(error, 'IOError');
      console.error(`[${index + 1}/${files.length}] Failed to convert ${inputPath}: ${failure.message}`);
      results.push({
        inputPath,
        result: { success: false, error: describeError(failure), pagesProcessed: 0, elapsedMs: 0 },
      });
      continue;
    }
    const scratchDir = await mkdtemp(path.join(options.scratchRoot, 'job-'));

    try {
      const session = new ConversionSession({
        source: { path: inputPath },
        settings,
        scratchDir,
        destination,
        signal: options.signal,
        rasterizer: options.rasterizer,
        encoder: options.encoder,
        onProgress: options.onPageProgress
          ? (current, total) => options.onPageProgress?.(inputPath, current, total)
          : undefined,
      });
      const result = await session.run();

      if (result.success) {
        console.log(
          `[${index + 1}/${files.length}] ${path.basename(inputPath)} -> ${destination} ` +
            `(${result.pagesProcessed} pages, ${formatFileSize(result.outputSize)})`
        );
        results.push({ inputPath, outputPath: destination, result });
      } else {
        console.error(`[${index + 1}/${files.length}] Failed to convert ${inputPath}: ${result.error.message}`);
        results.push({ inputPath, result });
      }
    } finally {
      await rm(scratchDir, { recursive: true, force: true }).catch((error: unknown) => {
        console.warn(`Failed to remove scratch directory ${scratchDir}: ${errorMessage(error)}`);
      });
    }
  }

  const succeeded = results.filter((entry) => entry.result.success).length;
  const summary: BatchSummary = {
    results,
    succeeded,
    failed: results.length - succeeded,
    total: results.length,
  };

  console.log(JSON.stringify({
    event: 'batch_complete',
    succeeded: summary.succeeded,
    failed: summary.failed,
    total: summary.total,
    timestamp: new Date().toISOString(),
  }));

  return summary;
}
