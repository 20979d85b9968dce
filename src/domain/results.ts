/**
 * Action results.
 *
 * Every intent yields exactly one ActionResult. On the wire the result is
 * snake_case and optional fields are omitted rather than sent as null.
 */

import { JsonValue } from './artifact';
import { ErrorCategory, ErrorCode, KernelError } from './errors';

export interface ActionResult {
  success: boolean;
  message: string;
  data?: Record<string, JsonValue>;
  resourcesConsumed?: Record<string, number>;
  chargedTo?: string;
  errorCode?: ErrorCode;
  errorCategory?: ErrorCategory;
  retriable?: boolean;
  errorDetails?: Record<string, unknown>;
}

export interface WireActionResult {
  success: boolean;
  message: string;
  data?: Record<string, JsonValue>;
  resources_consumed?: Record<string, number>;
  charged_to?: string;
  error_code?: ErrorCode;
  error_category?: ErrorCategory;
  retriable?: boolean;
  error_details?: Record<string, unknown>;
}

export function successResult(
  message: string,
  extras: { data?: Record<string, JsonValue>; resourcesConsumed?: Record<string, number>; chargedTo?: string } = {},
): ActionResult {
  const result: ActionResult = { success: true, message };
  if (extras.data !== undefined) result.data = extras.data;
  if (extras.resourcesConsumed !== undefined && Object.keys(extras.resourcesConsumed).length > 0) {
    result.resourcesConsumed = extras.resourcesConsumed;
  }
  if (extras.chargedTo !== undefined) result.chargedTo = extras.chargedTo;
  return result;
}

export function failureResult(error: KernelError): ActionResult {
  const result: ActionResult = {
    success: false,
    message: error.message,
    errorCode: error.code,
    errorCategory: error.category,
    retriable: error.retriable,
  };
  if (error.details !== undefined) result.errorDetails = error.details;
  return result;
}

/** Recover the KernelError carried by a failed result. */
export function resultError(result: ActionResult): KernelError | undefined {
  if (result.success || !result.errorCode || !result.errorCategory) return undefined;
  const error: KernelError = {
    code: result.errorCode,
    category: result.errorCategory,
    message: result.message,
    retriable: result.retriable ?? false,
  };
  if (result.errorDetails) error.details = result.errorDetails;
  return error;
}

export function toWireResult(result: ActionResult): WireActionResult {
  const wire: WireActionResult = { success: result.success, message: result.message };
  if (result.data !== undefined) wire.data = result.data;
  if (result.resourcesConsumed !== undefined) wire.resources_consumed = result.resourcesConsumed;
  if (result.chargedTo !== undefined) wire.charged_to = result.chargedTo;
  if (result.errorCode !== undefined) wire.error_code = result.errorCode;
  if (result.errorCategory !== undefined) wire.error_category = result.errorCategory;
  if (result.retriable !== undefined) wire.retriable = result.retriable;
  if (result.errorDetails !== undefined) wire.error_details = result.errorDetails;
  return wire;
}
