/**
 * Invoke handler.
 *
 * Runs one invocation of an executable artifact: resolve the target and its
 * contract, resolve who pays (`charge_to`), authorize delegated charges,
 * hold the price on the payer, execute (genesis service handler or
 * sandbox), then settle. Nothing is charged unless execution succeeds.
 *
 * Code runs with facades scoped to the invoker and, when it is a principal,
 * the invoked artifact itself. The facades are revoked when the call
 * returns.
 */

import { Artifact, JsonValue, META_CHARGE_TO, artifactController } from '../domain/artifact';
import { PermissionAction } from '../domain/contracts';
import { parseChargeTo, resolvePayer } from '../domain/delegation';
import {
  KernelError,
  Result,
  deletedError,
  err,
  errorMessage,
  executionError,
  insufficientFundsError,
  notFoundError,
  ok,
  permissionError,
  resourceError,
  systemError,
  timeoutError,
  validationError,
} from '../domain/errors';
import { KernelActions } from '../kernel/kernel-actions';
import { KernelState } from '../kernel/kernel-state';
import { Authority } from '../kernel/authority';
import { Logger } from '../logger';
import { ArtifactOperations } from './artifact-ops';
import { KernelContext } from './context';
import { spendableScrip } from './holds';
import { InvocationKernel, TimeoutError, executeWithTimeout, runSandboxed } from './sandbox';
import { KernelService, ServiceMethod } from './service-registry';

/** Nested invocations deeper than this are refused. */
export const MAX_INVOCATION_DEPTH = 5;

export interface InvokeOutcome {
  value: JsonValue;
  /** Scrip charged for the call. */
  price: number;
  payerId: string;
  recipientId: string;
  durationMs: number;
}

export interface ArtifactInvoker {
  invoke(
    callerId: string,
    artifactId: string,
    method: string,
    args: JsonValue[],
    depth: number,
  ): Promise<Result<InvokeOutcome>>;
}

interface Target {
  artifact: Artifact;
  service?: KernelService;
  serviceMethod?: ServiceMethod;
  price: number;
  recipientId: string;
  payerId: string;
}

export class InvokeHandler implements ArtifactInvoker {
  private log: Logger;

  constructor(
    private ctx: KernelContext,
    private ops: ArtifactOperations,
  ) {
    this.log = ctx.logger.child({ component: 'invoke-handler' });
  }

  /** Facades for code acting for `callerIds`. Revoke them when the call ends. */
  facades(callerIds: string[], depth: number): InvocationKernel & { authority: Authority } {
    const authority = Authority.of(callerIds);
    return {
      authority,
      state: new KernelState(this.ctx, this.ops, authority),
      actions: new KernelActions(this.ctx, this.ops, this, authority, depth),
    };
  }

  async invoke(
    callerId: string,
    artifactId: string,
    method: string,
    args: JsonValue[],
    depth: number,
  ): Promise<Result<InvokeOutcome>> {
    const started = Date.now();
    const result = await this.attempt(callerId, artifactId, method, args, depth, started);
    const durationMs = Date.now() - started;

    if (result.ok) {
      await this.ctx.publisher.publish('invoke_success', {
        invoker_id: callerId,
        artifact_id: artifactId,
        method,
        duration_ms: durationMs,
        price: result.value.price,
        payer_id: result.value.payerId,
      });
    } else {
      await this.ctx.publisher.publish('invoke_failure', {
        invoker_id: callerId,
        artifact_id: artifactId,
        method,
        duration_ms: durationMs,
        error_code: result.error.code,
        error_message: result.error.message,
      });
    }
    return result;
  }

  private async attempt(
    callerId: string,
    artifactId: string,
    method: string,
    args: JsonValue[],
    depth: number,
    started: number,
  ): Promise<Result<InvokeOutcome>> {
    if (depth > MAX_INVOCATION_DEPTH) {
      return err(
        resourceError('limit_reached', `Invocation depth limit ${MAX_INVOCATION_DEPTH} reached`, {
          maxDepth: MAX_INVOCATION_DEPTH,
        }),
      );
    }

    const resolved = await this.resolve(callerId, artifactId, method);
    if (!resolved.ok) return resolved;
    const target = resolved.value;
    const { price, payerId, recipientId } = target;
    const charged = price > 0 && payerId !== recipientId;

    if (charged && payerId !== callerId) {
      const authorization = await this.ctx.delegation.authorizeCharge(callerId, payerId, price);
      if (!authorization.authorized) {
        return err(permissionError(authorization.reason, 'not_authorized', { payerId, chargerId: callerId }));
      }
    }
    if (charged && !this.ctx.config.allowNegativeScrip) {
      const spendable = await spendableScrip(this.ctx.ledger, this.ctx.holds, payerId);
      if (spendable < price) return err(insufficientFundsError(payerId, price, spendable));
    }

    const release = this.ctx.holds.place(payerId, charged ? price : 0);
    const actingFor = [callerId];
    if (target.service) actingFor.push(target.service.id);
    else if (target.artifact.hasStanding) actingFor.push(target.artifact.id);
    const kernel = this.facades(actingFor, depth + 1);

    let executed: Result<JsonValue>;
    try {
      executed = await this.execute(target, method, args, callerId, kernel);
    } finally {
      kernel.authority.revoke();
      release();
    }
    if (!executed.ok) return executed;

    if (charged) {
      const settled = await this.ctx.ledger.transferScrip(payerId, recipientId, price);
      if (!settled.ok) {
        this.log.error('Invocation settlement failed', {
          artifactId,
          method,
          payerId,
          recipientId,
          price,
          error: settled.error.message,
        });
        return err(
          systemError(`Settlement of ${artifactId}.${method} failed: ${settled.error.message}`, 'settlement_failed', {
            payerId,
            recipientId,
            price,
          }),
        );
      }
      if (payerId !== callerId) await this.ctx.delegation.recordCharge(payerId, callerId, price);
    }

    return ok({ value: executed.value, price: charged ? price : 0, payerId, recipientId, durationMs: Date.now() - started });
  }

  private async resolve(callerId: string, artifactId: string, method: string): Promise<Result<Target>> {
    const artifact = await this.ctx.store.artifacts.get(artifactId);
    if (!artifact) return err(notFoundError('Artifact', artifactId));
    if (artifact.deleted) return err(deletedError(artifactId));
    if (!artifact.executable) {
      return err(validationError('not_executable', `Artifact ${artifactId} is not executable`, { artifactId }));
    }

    const permission = await this.ctx.permissions.check(callerId, PermissionAction.Invoke, artifact, method);
    if (!permission.allowed) {
      return err(permissionError(permission.reason, 'not_authorized', { artifactId, action: PermissionAction.Invoke }));
    }

    const chargeTo = parseChargeTo(artifact.metadata[META_CHARGE_TO]);
    if (!chargeTo) {
      return err(
        validationError('invalid_argument', `Artifact ${artifactId} has an invalid charge_to`, {
          chargeTo: artifact.metadata[META_CHARGE_TO] ?? null,
        }),
      );
    }
    const payerId = resolvePayer(chargeTo, callerId, artifact);

    const service = this.ctx.registry.get(artifactId);
    if (service) {
      const serviceMethod = this.ctx.registry.method(service, method);
      if (!serviceMethod) {
        return err(
          executionError(`Service ${artifactId} has no method '${method}'`, 'method_not_found', {
            artifactId,
            methods: Object.keys(service.methods),
          }),
        );
      }
      return this.withPayer({ artifact, service, serviceMethod, price: serviceMethod.cost, recipientId: service.id, payerId });
    }

    const recipientId = permission.scripRecipient ?? artifactController(artifact) ?? artifact.createdBy;
    return this.withPayer({ artifact, price: artifact.price, recipientId, payerId });
  }

  private async withPayer(target: Target): Promise<Result<Target>> {
    if (target.price > 0 && !(await this.ctx.ledger.hasPrincipal(target.payerId))) {
      return err(notFoundError('Principal', target.payerId));
    }
    if (target.price > 0 && !(await this.ctx.ledger.hasPrincipal(target.recipientId))) {
      return err(notFoundError('Principal', target.recipientId));
    }
    return ok(target);
  }

  private async execute(
    target: Target,
    method: string,
    args: JsonValue[],
    callerId: string,
    kernel: InvocationKernel,
  ): Promise<Result<JsonValue>> {
    const timeoutMs = this.ctx.config.invocationTimeoutMs;
    const { service, serviceMethod } = target;
    if (!service || !serviceMethod) {
      return runSandboxed(this.ctx.sandbox, { artifact: target.artifact, method, args, callerId, kernel, timeoutMs });
    }

    try {
      return await executeWithTimeout(
        () =>
          serviceMethod.handler(args, {
            invokerId: callerId,
            serviceId: service.id,
            state: kernel.state,
            actions: kernel.actions,
          }),
        timeoutMs,
      );
    } catch (error) {
      return err(serviceFailure(service.id, method, error));
    }
  }
}

function serviceFailure(serviceId: string, method: string, error: unknown): KernelError {
  if (error instanceof TimeoutError) return timeoutError(`${serviceId}.${method}`, error.timeoutMs);
  return executionError(`${serviceId}.${method} failed: ${errorMessage(error)}`, 'runtime_error', { serviceId, method });
}
