/**
 * Code sandbox boundary.
 *
 * User artifacts carry code the kernel never runs itself: a pluggable
 * CodeSandbox executes it and may only reach shared state through the
 * kernel facades handed over in the request. Calls are bounded by a timeout.
 */

import type { Artifact, JsonValue } from '../domain/artifact';
import { Result, err, errorMessage, executionError, ok, timeoutError } from '../domain/errors';
import type { KernelActions } from '../kernel/kernel-actions';
import type { KernelState } from '../kernel/kernel-state';

/** Facades available to code running on behalf of an invoker. */
export interface InvocationKernel {
  state: KernelState;
  actions: KernelActions;
}

export interface SandboxRequest {
  /** Artifact whose code runs. */
  artifact: Artifact;
  method: string;
  args: JsonValue[];
  /** Verified principal on whose behalf the code runs. */
  callerId: string;
  /** Absent for contract checks, which must not act. */
  kernel?: InvocationKernel;
  timeoutMs: number;
}

export type SandboxResponse =
  | { success: true; result: JsonValue }
  | { success: false; error: string; code?: 'runtime_error' | 'method_not_found' | 'sandbox_unavailable' };

export interface CodeSandbox {
  execute(request: SandboxRequest): Promise<SandboxResponse>;
}

/** Default sandbox: refuses to run anything. */
export class UnconfiguredSandbox implements CodeSandbox {
  async execute(request: SandboxRequest): Promise<SandboxResponse> {
    return {
      success: false,
      error: `No code sandbox is configured; cannot run ${request.artifact.id}.${request.method}`,
      code: 'sandbox_unavailable',
    };
  }
}

/** Error thrown when a bounded call exceeds its budget. */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Race `fn` against a timer. The timer is always cleared. */
export async function executeWithTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

/** Run a sandbox request and map every failure mode to a kernel error. */
export async function runSandboxed(sandbox: CodeSandbox, request: SandboxRequest): Promise<Result<JsonValue>> {
  let response: SandboxResponse;
  try {
    response = await executeWithTimeout(() => sandbox.execute(request), request.timeoutMs);
  } catch (error) {
    if (error instanceof TimeoutError) {
      return err(timeoutError(`${request.artifact.id}.${request.method}`, error.timeoutMs));
    }
    return err(executionError(`Sandbox error: ${errorMessage(error)}`));
  }
  if (response.success) return ok(response.result);
  return err(
    executionError(response.error, response.code ?? 'runtime_error', {
      artifactId: request.artifact.id,
      method: request.method,
    }),
  );
}
