/**
 * Typed error model for kernel operations.
 *
 * Errors are returned as values rather than thrown, so every failed action
 * carries a machine-readable code, a category and a retriable flag that an
 * agent can act on. Exceptions are reserved for boundaries that must throw.
 */

/** Error categories. Retriability is decided per code within a category. */
export enum ErrorCategory {
  Validation = 'validation',
  Permission = 'permission',
  Resource = 'resource',
  Execution = 'execution',
  System = 'system',
}

/** Stable error codes reported in ActionResult.error_code. */
export type ErrorCode =
  // validation
  | 'missing_argument'
  | 'invalid_argument'
  | 'invalid_type'
  | 'not_executable'
  | 'not_present'
  | 'not_unique'
  | 'no_op_edit'
  // permission
  | 'not_authorized'
  | 'not_owner'
  | 'kernel_protected'
  | 'reserved_namespace'
  // resource
  | 'insufficient_funds'
  | 'quota_exceeded'
  | 'not_found'
  | 'already_exists'
  | 'already_listed'
  | 'deleted'
  | 'limit_reached'
  // execution
  | 'timeout'
  | 'runtime_error'
  | 'method_not_found'
  | 'sandbox_unavailable'
  // system
  | 'internal_error'
  | 'settlement_failed';

/** The error structure carried by failed results and API responses. */
export interface KernelError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  /** Whether the same intent may succeed later without changes. */
  retriable: boolean;
  details?: Record<string, unknown>;
}

/** Outcome of a kernel operation. */
export type Result<T> = { ok: true; value: T } | { ok: false; error: KernelError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: KernelError): Result<T> {
  return { ok: false, error };
}

/** Create a kernel error with defaults. */
export function createKernelError(params: {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  retriable?: boolean;
  details?: Record<string, unknown>;
}): KernelError {
  const error: KernelError = {
    code: params.code,
    category: params.category,
    message: params.message,
    retriable: params.retriable ?? false,
  };
  if (params.details) error.details = params.details;
  return error;
}

// --- Factory functions ---

export function validationError(
  code: 'missing_argument' | 'invalid_argument' | 'invalid_type' | 'not_executable' | 'not_present' | 'not_unique' | 'no_op_edit',
  message: string,
  details?: Record<string, unknown>,
): KernelError {
  return createKernelError({ code, category: ErrorCategory.Validation, message, details });
}

export function permissionError(
  message: string,
  code: 'not_authorized' | 'not_owner' | 'kernel_protected' | 'reserved_namespace' = 'not_authorized',
  details?: Record<string, unknown>,
): KernelError {
  return createKernelError({ code, category: ErrorCategory.Permission, message, details });
}

export function notFoundError(resourceType: string, resourceId: string): KernelError {
  return createKernelError({
    code: 'not_found',
    category: ErrorCategory.Resource,
    message: `${resourceType} not found: ${resourceId}`,
    details: { resourceType, resourceId },
  });
}

export function deletedError(artifactId: string): KernelError {
  return createKernelError({
    code: 'deleted',
    category: ErrorCategory.Resource,
    message: `Artifact ${artifactId} has been deleted`,
    details: { artifactId },
  });
}

export function alreadyExistsError(resourceType: string, resourceId: string): KernelError {
  return createKernelError({
    code: 'already_exists',
    category: ErrorCategory.Resource,
    message: `${resourceType} already exists: ${resourceId}`,
    details: { resourceType, resourceId },
  });
}

export function insufficientFundsError(principalId: string, required: number, available: number): KernelError {
  return createKernelError({
    code: 'insufficient_funds',
    category: ErrorCategory.Resource,
    message: `Insufficient scrip: ${principalId} has ${available}, needs ${required}`,
    retriable: true,
    details: { principalId, required, available },
  });
}

export function quotaExceededError(
  principalId: string,
  resource: string,
  requested: number,
  available: number,
): KernelError {
  return createKernelError({
    code: 'quota_exceeded',
    category: ErrorCategory.Resource,
    message: `Quota exceeded for ${resource}: ${principalId} requested ${requested}, ${available} available`,
    retriable: true,
    details: { principalId, resource, requested, available },
  });
}

export function resourceError(
  code: 'already_listed' | 'limit_reached',
  message: string,
  details?: Record<string, unknown>,
): KernelError {
  return createKernelError({ code, category: ErrorCategory.Resource, message, details });
}

export function timeoutError(operation: string, timeoutMs: number): KernelError {
  return createKernelError({
    code: 'timeout',
    category: ErrorCategory.Execution,
    message: `${operation} timed out after ${timeoutMs}ms`,
    retriable: true,
    details: { timeoutMs },
  });
}

export function executionError(
  message: string,
  code: 'runtime_error' | 'method_not_found' | 'sandbox_unavailable' = 'runtime_error',
  details?: Record<string, unknown>,
): KernelError {
  return createKernelError({ code, category: ErrorCategory.Execution, message, details });
}

export function systemError(
  message: string,
  code: 'internal_error' | 'settlement_failed' = 'internal_error',
  details?: Record<string, unknown>,
): KernelError {
  return createKernelError({ code, category: ErrorCategory.System, message, retriable: true, details });
}

/** Thrown at boundaries that cannot return a Result (HTTP handlers, startup). */
export class KernelException extends Error {
  constructor(public readonly kernelError: KernelError) {
    super(kernelError.message);
    this.name = 'KernelException';
  }
}

/** Narrow an unknown thrown value to a message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: KernelError;
}

/** Construct an API error response. */
export function apiError(error: KernelError): ApiErrorResponse {
  return { error };
}
