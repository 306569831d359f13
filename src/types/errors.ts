/**
 * Structured Error System for the CSP engine
 *
 * Provides machine-readable errors with codes, suggestions and details.
 * "No solution" and "step budget exhausted" are results, not errors.
 */

/**
 * Error codes for problem construction and solving
 */
export type CspErrorCode =
  | 'MALFORMED_PROBLEM'     // Constraint or domain inconsistent with the problem
  | 'NOT_A_TREE'            // Tree solver applied to a non-acyclic constraint graph
  | 'INVALID_CONFIG'        // Solver configured with an unusable parameter
  | 'UNKNOWN_SOLVER'        // Solver name not registered
  | 'PROBLEM_FILE_ERROR'    // Problem file failed validation
  | 'ENGINE_ERROR';         // Internal invariant broken

/**
 * Structured error with code, message and suggestions
 */
export interface CspError {
  code: CspErrorCode;
  message: string;
  suggestion?: string;
  context?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping CspError for throw/catch patterns
 */
export class CspException extends Error {
  public readonly error: CspError;

  constructor(error: CspError) {
    super(error.message);
    this.name = 'CspException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CspException);
    }
  }

  get code(): CspErrorCode {
    return this.error.code;
  }

  toJSON(): CspError {
    return this.error;
  }
}

/**
 * Create a malformed problem error
 */
export function createMalformedProblemError(
  message: string,
  details?: Record<string, unknown>
): CspException {
  return new CspException({
    code: 'MALFORMED_PROBLEM',
    message,
    suggestion: 'Declare every variable when creating the CSP and keep domain values distinct',
    details,
  });
}

/**
 * Create a structural error for the tree solver
 */
export function createNotATreeError(
  message: string,
  details?: Record<string, unknown>
): CspException {
  return new CspException({
    code: 'NOT_A_TREE',
    message,
    suggestion: 'Use a backtracking or min-conflicts solver for cyclic or non-binary problems',
    details,
  });
}

export function createInvalidConfigError(
  message: string,
  details?: Record<string, unknown>
): CspException {
  return new CspException({
    code: 'INVALID_CONFIG',
    message,
    details,
  });
}

/**
 * Create an unknown solver error
 */
export function createUnknownSolverError(
  name: string,
  known: string[]
): CspException {
  return new CspException({
    code: 'UNKNOWN_SOLVER',
    message: `Solver '${name}' is not registered`,
    suggestion: `Valid solvers are: ${known.join(', ')}`,
    details: { name, known },
  });
}

/**
 * Create a problem file error
 */
export function createProblemFileError(
  message: string,
  context?: string,
  details?: Record<string, unknown>
): CspException {
  return new CspException({
    code: 'PROBLEM_FILE_ERROR',
    message,
    suggestion: 'Check the problem file against the documented format',
    context,
    details,
  });
}

export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): CspException {
  return new CspException({
    code: 'ENGINE_ERROR',
    message: `Solver engine error: ${message}`,
    details,
  });
}

/**
 * Serialize a CspError for JSON output
 */
export function serializeCspError(error: CspError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
