/**
 * Typed error model.
 *
 * Errors are returned as typed values rather than thrown exceptions, so
 * route handlers can turn them into responses without guessing at shapes.
 */

/** Typed suggested fix a client or operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "ARTIFACT.PENDING"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/**
 * Error carrying a TypedError through `throw` / `next(err)`.
 * The Express error handler unwraps it.
 */
export class TypedErrorException extends Error {
  readonly typedError: TypedError;

  constructor(typedError: TypedError) {
    super(typedError.message);
    this.name = 'TypedErrorException';
    this.typedError = typedError;
  }
}

export function isTypedErrorException(err: unknown): err is TypedErrorException {
  return err instanceof TypedErrorException;
}

// --- Factory functions ---

export function unsafePathError(field: 'projectName' | 'filename', value: string, reason: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.UNSAFE_PATH',
    message: `Invalid ${field === 'projectName' ? 'project name' : 'file name'}: ${reason}`,
    retryable: false,
    details: { field, value, reason },
  });
}

/** The request itself could not be parsed, e.g. a malformed percent-encoding. */
export function badRequestError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.BAD_REQUEST',
    message,
    retryable: false,
    details,
  });
}

export function projectNotFoundError(projectName: string): TypedError {
  return createTypedError({
    code: 'PROJECT.NOT_FOUND',
    message: `Project not found: ${projectName}`,
    retryable: false,
    details: { projectName },
  });
}

/**
 * The artifact is produced by the external pipeline and has not been
 * written yet. Retryable: it appears once generation finishes.
 */
export function artifactPendingError(projectName: string, logicalName: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.PENDING',
    message: 'The report has not been generated yet. Run the report generation steps for this project, then reload.',
    retryable: true,
    details: { projectName, artifact: logicalName },
    suggestedFixes: [
      {
        type: 'RUN_REPORT_GENERATION',
        params: { projectName },
        description: 'Generate the report for this project (pipeline steps 4-6)',
      },
    ],
  });
}

export function artifactNotFoundError(projectName: string, logicalName: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.NOT_FOUND',
    message: `File not found: ${logicalName}`,
    retryable: false,
    details: { projectName, artifact: logicalName },
  });
}

export function configError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message,
    retryable: false,
    details,
  });
}

export function internalError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
    details,
  });
}

/** Map an error code to its HTTP status. */
export function httpStatusFor(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'ARTIFACT.PENDING') return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
