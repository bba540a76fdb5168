/**
 * Structured Error System for smtfuzz
 *
 * Provides machine-readable errors with codes and suggestions.
 */

/**
 * Error codes for fuzzing operations
 */
export type FuzzErrorCode =
  | 'CONFIGURATION_ERROR'   // Invalid campaign parameters
  | 'GENERATION_ERROR'      // Term generation failed (reserved)
  | 'ADAPTER_ERROR'         // Solver adapter rejected a call
  | 'ENGINE_ERROR'          // Solver backend failed to start or crashed
  | 'TIMEOUT';              // Satisfiability check exceeded its limit

/**
 * Structured error with code, message and suggestions
 */
export interface FuzzError {
  code: FuzzErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping FuzzError for throw/catch patterns
 */
export class FuzzException extends Error {
  public readonly error: FuzzError;

  constructor(error: FuzzError) {
    super(error.message);
    this.name = 'FuzzException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FuzzException);
    }
  }

  get code(): FuzzErrorCode {
    return this.error.code;
  }

  toJSON(): FuzzError {
    return this.error;
  }
}

/**
 * Create a configuration error. `issues` lists every rejected parameter.
 */
export function createConfigurationError(
  message: string,
  issues: string[] = []
): FuzzException {
  return new FuzzException({
    code: 'CONFIGURATION_ERROR',
    message: issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
    suggestion: 'Check the campaign parameters (counts must be positive, depths non-negative)',
    details: issues.length > 0 ? { issues } : undefined,
  });
}

export function createGenerationError(
  message: string,
  details?: Record<string, unknown>
): FuzzException {
  return new FuzzException({
    code: 'GENERATION_ERROR',
    message: `Generation failed: ${message}`,
    details,
  });
}

/**
 * Create an adapter error
 */
export function createAdapterError(
  adapter: string,
  message: string,
  details?: Record<string, unknown>
): FuzzException {
  return new FuzzException({
    code: 'ADAPTER_ERROR',
    message: `${adapter}: ${message}`,
    details: { adapter, ...details },
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): FuzzException {
  return new FuzzException({
    code: 'ENGINE_ERROR',
    message: `Solver engine error: ${message}`,
    details,
  });
}

/**
 * Create a timeout error
 */
export function createTimeoutError(
  limitMs: number,
  operation: string = 'Operation'
): FuzzException {
  return new FuzzException({
    code: 'TIMEOUT',
    message: `${operation} timed out after ${limitMs}ms`,
    suggestion: 'Lower the generation depth or increase the timeout',
    details: { limitMs },
  });
}

/**
 * Serialize a FuzzError for JSON output
 */
export function serializeFuzzError(error: FuzzError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Render any thrown value as a one-line reason.
 */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
