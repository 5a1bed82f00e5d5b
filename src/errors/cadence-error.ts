/**
 * Cadence Error Module
 *
 * Coded errors shared by every layer of the pipeline. The three failure
 * classes callers care about are configuration errors, decode errors and
 * generic (wrapped) errors; each is a CadenceError with a distinct code.
 *
 * @module errors/cadence-error
 */

export const ERROR_CODES = {
  CONFIG_TEMPLATE_UNKNOWN: 'CADENCE_CONFIG_TEMPLATE_UNKNOWN',
  CONFIG_INVALID: 'CADENCE_CONFIG_INVALID',
  DECODE_FAILED: 'CADENCE_DECODE_FAILED',
  GENERATION_FAILED: 'CADENCE_GENERATION_FAILED',
  GENERATION_BUSY: 'CADENCE_GENERATION_BUSY',
  FILTER_COMPLETED: 'CADENCE_FILTER_COMPLETED',
  PIPELINE_DISPOSED: 'CADENCE_PIPELINE_DISPOSED',
  INVALID_ARGUMENT: 'CADENCE_INVALID_ARGUMENT',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Codes that mean the pipeline was configured wrong, not that a call failed. */
const CONFIGURATION_CODES: ReadonlySet<ErrorCode> = new Set([
  ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN,
  ERROR_CODES.CONFIG_INVALID,
]);

export interface CadenceErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CadenceError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  override readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: CadenceErrorOptions = {}) {
    super(message);
    this.name = 'CadenceError';
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }

  /** True for errors raised while resolving config or templates. */
  get isConfigurationError(): boolean {
    return CONFIGURATION_CODES.has(this.code);
  }
}

export function createCadenceError(
  code: ErrorCode,
  message: string,
  options: CadenceErrorOptions = {}
): CadenceError {
  return new CadenceError(code, message, options);
}

export function isCadenceError(error: unknown, code?: ErrorCode): error is CadenceError {
  if (!(error instanceof CadenceError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Extract a readable message from anything thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============================================================================
// Taxonomy helpers
// ============================================================================

export function configurationError(message: string, details?: Record<string, unknown>): CadenceError {
  return createCadenceError(ERROR_CODES.CONFIG_INVALID, message, { details });
}

export function decodeError(cause: unknown, details?: Record<string, unknown>): CadenceError {
  return createCadenceError(
    ERROR_CODES.DECODE_FAILED,
    `Decode failed: ${describeError(cause)}`,
    { cause, details }
  );
}

export function genericError(context: string, cause: unknown): CadenceError {
  return createCadenceError(
    ERROR_CODES.GENERATION_FAILED,
    `${context}: ${describeError(cause)}`,
    { cause }
  );
}
