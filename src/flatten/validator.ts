/**
 * Input validation before any conversion work
 *
 * Checks run in order and stop at the first failure:
 * 1. readable and at least MIN_PDF_BYTES long      -> TooSmall
 * 2. ".pdf" extension when a filename is known      -> WrongExtension
 * 3. declared content type (advisory, warning only)
 * 4. "%PDF-" signature                             -> BadHeader
 * 5. structure check (pdf-lib) and backend open    -> Corrupt / Encrypted
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { ConversionError, errorMessage, invalidInput } from './errors.js';
import { MuPdfRasterizer } from './rasterizer.js';
import type { PageRasterizer, SourceInput, ValidationOutcome } from './types.js';

/** Smallest plausible PDF; anything shorter is treated as empty */
export const MIN_PDF_BYTES = 100;

const PDF_SIGNATURE = '%PDF-';
const PDF_MIME_TYPES = new Set(['application/pdf', 'application/x-pdf']);

export interface ValidateOptions {
  /** Backend used for the open check (defaults to MuPDF) */
  rasterizer?: PageRasterizer;
}

async function readSource(source: SourceInput): Promise<Uint8Array> {
  if ('data' in source) {
    return source.data;
  }
  try {
    return await readFile(source.path);
  } catch (error) {
    throw new ConversionError('IOError', `Cannot read ${source.path}: ${errorMessage(error)}`, { cause: error });
  }
}

function sourceFilename(source: SourceInput): string | undefined {
  return 'path' in source ? source.path : source.filename;
}

export function hasPdfSignature(data: Uint8Array): boolean {
  if (data.length < PDF_SIGNATURE.length) return false;
  return Buffer.from(data.subarray(0, PDF_SIGNATURE.length)).toString('latin1') === PDF_SIGNATURE;
}

/**
 * Structure and encryption check with pdf-lib
 * Encryption is reported whether or not a user password is needed, so
 * permission-restricted documents are rejected too.
 */
async function checkStructure(data: Uint8Array): Promise<void> {
  let pageCount: number;
  let encrypted: boolean;
  try {
    const document = await PDFDocument.load(data, { ignoreEncryption: true, updateMetadata: false });
    encrypted = document.isEncrypted;
    pageCount = encrypted ? -1 : document.getPageCount();
  } catch (error) {
    throw invalidInput('Corrupt', `PDF structure is damaged: ${errorMessage(error)}`, error);
  }

  if (encrypted) {
    throw invalidInput('Encrypted', 'PDF is encrypted or permission protected');
  }
  if (pageCount < 1) {
    throw invalidInput('Corrupt', 'PDF has no pages');
  }
}

/**
 * Validate a candidate input. Never throws: failures come back tagged.
 */
export async function validatePdf(source: SourceInput, options: ValidateOptions = {}): Promise<ValidationOutcome> {
  const warnings: string[] = [];

  try {
    const data = await readSource(source);

    if (data.length < MIN_PDF_BYTES) {
      throw invalidInput('TooSmall', `File is too small to be a PDF (${data.length} bytes, minimum ${MIN_PDF_BYTES})`);
    }

    const filename = sourceFilename(source);
    if (filename !== undefined && path.extname(filename).toLowerCase() !== '.pdf') {
      throw invalidInput('WrongExtension', `Expected a .pdf file, got "${path.basename(filename)}"`);
    }

    if ('contentType' in source && source.contentType !== undefined) {
      const declared = source.contentType.split(';')[0].trim().toLowerCase();
      if (!PDF_MIME_TYPES.has(declared)) {
        const warning = `Declared content type "${source.contentType}" is not a PDF type`;
        warnings.push(warning);
        console.warn(warning);
      }
    }

    if (!hasPdfSignature(data)) {
      throw invalidInput('BadHeader', 'File does not start with the %PDF- signature');
    }

    await checkStructure(data);

    const rasterizer = options.rasterizer ?? new MuPdfRasterizer();
    const document = await rasterizer.open(data);
    try {
      return {
        valid: true,
        pageCount: document.pageCount,
        pages: document.pages.map((page) => ({ ...page })),
        data,
        warnings,
      };
    } finally {
      document.close();
    }
  } catch (error) {
    if (error instanceof ConversionError) {
      return { valid: false, error };
    }
    return { valid: false, error: invalidInput('Corrupt', errorMessage(error), error) };
  }
}
