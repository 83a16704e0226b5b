/**
 * Conversion error taxonomy
 *
 * Every failure surfaced by the pipeline is a ConversionError carrying a kind
 * (and, for invalid input, a reason) so callers can render a specific message.
 */

/**
 * Top-level error kinds
 */
export type ConversionErrorKind =
  | 'InvalidInput'
  | 'RenderError'
  | 'EncodeError'
  | 'UsageError'
  | 'IOError'
  | 'Cancelled';

/**
 * Sub-kinds of InvalidInput
 */
export type InvalidInputReason =
  | 'TooSmall'
  | 'WrongExtension'
  | 'BadHeader'
  | 'Corrupt'
  | 'Encrypted';

export interface ConversionErrorOptions {
  reason?: InvalidInputReason;
  /** Zero-based page index for per-page failures */
  pageIndex?: number;
  cause?: unknown;
}

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly reason?: InvalidInputReason;
  readonly pageIndex?: number;

  constructor(kind: ConversionErrorKind, message: string, options: ConversionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConversionError';
    this.kind = kind;
    this.reason = options.reason;
    this.pageIndex = options.pageIndex;
  }

  /**
   * Short label such as "InvalidInput:Encrypted" or "RenderError"
   */
  get label(): string {
    return this.reason ? `${this.kind}:${this.reason}` : this.kind;
  }
}

export function invalidInput(reason: InvalidInputReason, message: string, cause?: unknown): ConversionError {
  return new ConversionError('InvalidInput', message, { reason, cause });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into a ConversionError of the given fallback kind
 */
export function toConversionError(
  error: unknown,
  fallbackKind: ConversionErrorKind,
  pageIndex?: number
): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }
  return new ConversionError(fallbackKind, errorMessage(error), { pageIndex, cause: error });
}

/**
 * Serializable view of a ConversionError, used in results and job payloads
 */
export interface ConversionErrorDetail {
  kind: ConversionErrorKind;
  reason?: InvalidInputReason;
  message: string;
  pageIndex?: number;
}

export function describeError(error: ConversionError): ConversionErrorDetail {
  const detail: ConversionErrorDetail = { kind: error.kind, message: error.message };
  if (error.reason !== undefined) detail.reason = error.reason;
  if (error.pageIndex !== undefined) detail.pageIndex = error.pageIndex;
  return detail;
}
