/**
 * Action Executor: the kernel's dispatch pipeline.
 *
 * Every intent runs through one serial queue: resolve targets, evaluate the
 * access contract, check affordability, apply the effect, settle payment,
 * then append the `action` event and the `<action>_success|_failure`
 * semantic event. Each intent yields exactly one ActionResult.
 */

import { JsonValue, artifactSize, toArtifactView, toJsonValue } from '../domain/artifact';
import { errorMessage, insufficientFundsError, notFoundError, systemError } from '../domain/errors';
import { KernelEventType } from '../domain/events';
import { ActionIntent, intentToWire } from '../domain/intents';
import { RESOURCE_DISK } from '../domain/principal';
import { ActionResult, failureResult, successResult, toWireResult } from '../domain/results';
import { KernelActions } from '../kernel/kernel-actions';
import { KernelState } from '../kernel/kernel-state';
import { Logger } from '../logger';
import { AgentConfigurator } from './agent-config';
import { ArtifactOperations } from './artifact-ops';
import { KernelContext } from './context';
import { spendableScrip } from './holds';
import { InvokeHandler } from './invoke-handler';
import { SerialQueue } from './serial-queue';

export class ActionExecutor {
  readonly ops: ArtifactOperations;
  readonly invoker: InvokeHandler;
  /** Facades with root authority, for kernel wiring. */
  readonly state: KernelState;
  readonly actions: KernelActions;
  private agents: AgentConfigurator;
  private queue = new SerialQueue();
  private log: Logger;

  constructor(private ctx: KernelContext) {
    this.ops = new ArtifactOperations(ctx);
    this.invoker = new InvokeHandler(ctx, this.ops);
    this.state = new KernelState(ctx, this.ops);
    this.actions = new KernelActions(ctx, this.ops, this.invoker);
    this.agents = new AgentConfigurator(ctx, this.ops);
    this.log = ctx.logger.child({ component: 'executor' });
  }

  /** Execute one intent under the dispatch lock. */
  execute(intent: ActionIntent): Promise<ActionResult> {
    return this.queue.run(() => this.run(intent));
  }

  /** Run `task` under the dispatch lock. */
  withLock<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(task);
  }

  /** Intents queued or running. */
  get pending(): number {
    return this.queue.size;
  }

  private async run(intent: ActionIntent): Promise<ActionResult> {
    let result: ActionResult;
    try {
      result = await this.perform(intent);
    } catch (error) {
      this.log.error('Intent failed unexpectedly', {
        actionType: intent.actionType,
        principalId: intent.principalId,
        error: errorMessage(error),
      });
      result = failureResult(systemError(`Internal error: ${errorMessage(error)}`));
    }

    await this.ctx.publisher.publish('action', {
      principal_id: intent.principalId,
      intent: intentToWire(intent),
      result: toJsonValue(toWireResult(result)),
      scrip_after: await this.ctx.ledger.getScrip(intent.principalId),
    });
    const outcome: KernelEventType = result.success
      ? `${intent.actionType}_success`
      : `${intent.actionType}_failure`;
    await this.ctx.publisher.publish(outcome, {
      principal_id: intent.principalId,
      artifact_id: 'artifactId' in intent ? intent.artifactId : undefined,
      message: result.message,
      error_code: result.errorCode,
    });
    this.log.debug('Intent executed', {
      actionType: intent.actionType,
      principalId: intent.principalId,
      success: result.success,
    });
    return result;
  }

  private async perform(intent: ActionIntent): Promise<ActionResult> {
    const callerId = intent.principalId;
    if (!(await this.ctx.ledger.hasPrincipal(callerId))) {
      return failureResult(notFoundError('Principal', callerId));
    }
    const actions = this.actions.scoped([callerId]);

    switch (intent.actionType) {
      case 'noop':
        return successResult('No action taken');

      case 'read_artifact':
        return this.read(callerId, intent.artifactId);

      case 'write_artifact': {
        const written = await this.ops.write(callerId, intent);
        if (!written.ok) return failureResult(written.error);
        const { artifact, created, diskDelta } = written.value;
        return successResult(`${created ? 'Created' : 'Updated'} artifact ${artifact.id}`, {
          data: { artifact_id: artifact.id, created, size_bytes: artifactSize(artifact), disk_delta: diskDelta },
          resourcesConsumed: diskDelta > 0 ? { [RESOURCE_DISK]: diskDelta } : {},
        });
      }

      case 'edit_artifact': {
        const edited = await this.ops.edit(callerId, intent.artifactId, intent.oldString, intent.newString);
        if (!edited.ok) return failureResult(edited.error);
        const { diskDelta } = edited.value;
        return successResult(`Edited artifact ${intent.artifactId}`, {
          data: { artifact_id: intent.artifactId, disk_delta: diskDelta },
          resourcesConsumed: diskDelta > 0 ? { [RESOURCE_DISK]: diskDelta } : {},
        });
      }

      case 'delete_artifact': {
        const removed = await this.ops.remove(callerId, intent.artifactId);
        if (!removed.ok) return failureResult(removed.error);
        return successResult(`Deleted artifact ${intent.artifactId}`, { data: { artifact_id: intent.artifactId } });
      }

      case 'invoke_artifact': {
        const invoked = await this.invoker.invoke(callerId, intent.artifactId, intent.method, intent.args, 0);
        if (!invoked.ok) return failureResult(invoked.error);
        const { value, price, payerId, durationMs } = invoked.value;
        return successResult(`Invoked ${intent.artifactId}.${intent.method}`, {
          data: { result: value, method: intent.method, duration_ms: durationMs },
          resourcesConsumed: price > 0 ? { scrip: price } : {},
          chargedTo: price > 0 ? payerId : undefined,
        });
      }

      case 'transfer': {
        const transferred = await actions.transferScrip(callerId, intent.recipientId, intent.amount);
        if (!transferred.ok) return failureResult(transferred.error);
        const data: Record<string, JsonValue> = {
          recipient_id: intent.recipientId,
          amount: intent.amount,
          balance: transferred.value.fromBalance,
        };
        if (intent.memo !== undefined) data.memo = intent.memo;
        return successResult(`Transferred ${intent.amount} scrip to ${intent.recipientId}`, {
          data,
          resourcesConsumed: { scrip: intent.amount },
        });
      }

      case 'mint': {
        const submitted = await actions.submitForMint(callerId, intent.artifactId, intent.bid);
        if (!submitted.ok) return failureResult(submitted.error);
        return successResult(`Submitted ${intent.artifactId} to the mint auction`, {
          data: { submission_id: submitted.value.submissionId, artifact_id: intent.artifactId, bid: intent.bid },
        });
      }

      case 'cancel_mint': {
        const cancelled = await actions.cancelMintSubmission(callerId, intent.submissionId);
        if (!cancelled.ok) return failureResult(cancelled.error);
        return successResult(`Cancelled mint submission ${intent.submissionId}`, {
          data: { submission_id: intent.submissionId, refunded: cancelled.value.bid },
        });
      }

      case 'subscribe_artifact': {
        const subscribed = await this.agents.subscribe(callerId, intent.artifactId);
        if (!subscribed.ok) return failureResult(subscribed.error);
        const { subscriptions, changed } = subscribed.value;
        return successResult(changed ? `Subscribed to ${intent.artifactId}` : `Already subscribed to ${intent.artifactId}`, {
          data: { subscribed_artifacts: subscriptions },
        });
      }

      case 'unsubscribe_artifact': {
        const unsubscribed = await this.agents.unsubscribe(callerId, intent.artifactId);
        if (!unsubscribed.ok) return failureResult(unsubscribed.error);
        return successResult(`Unsubscribed from ${intent.artifactId}`, {
          data: { subscribed_artifacts: unsubscribed.value.subscriptions },
        });
      }

      case 'configure_context': {
        const configured = await this.agents.configureContext(callerId, intent.sections, intent.priorities);
        if (!configured.ok) return failureResult(configured.error);
        return successResult('Context configuration updated', { data: configured.value });
      }

      case 'submit_to_task': {
        const tasks = this.ctx.protocols.tasks;
        if (!tasks) return failureResult(systemError('Task-based minting is not running'));
        const submitted = await tasks.submit(callerId, intent.artifactId, intent.taskId);
        if (!submitted.ok) return failureResult(submitted.error);
        const passed = submitted.value.passed === true;
        return successResult(passed ? `Task ${intent.taskId} solved` : `Task ${intent.taskId} not solved`, {
          data: submitted.value,
        });
      }

      case 'update_metadata': {
        const updated = await this.ops.updateMetadata(callerId, intent.artifactId, intent.key, intent.value);
        if (!updated.ok) return failureResult(updated.error);
        return successResult(`Updated ${intent.key} on ${intent.artifactId}`, {
          data: { artifact_id: intent.artifactId, metadata: updated.value.metadata },
        });
      }

      case 'query_kernel': {
        const answered = await this.state.query(intent.queryType, intent.params);
        if (!answered.ok) return failureResult(answered.error);
        return successResult(`Query ${intent.queryType}`, {
          data: { query_type: intent.queryType, result: answered.value },
        });
      }
    }
  }

  /** Contract-checked read; a read price is paid to the contract's recipient. */
  private async read(callerId: string, artifactId: string): Promise<ActionResult> {
    const read = await this.ops.read(callerId, artifactId);
    if (!read.ok) return failureResult(read.error);
    const { artifact, recipient } = read.value;
    const price = recipient === callerId ? 0 : artifact.readPrice;

    if (price > 0) {
      if (!(await this.ctx.ledger.hasPrincipal(recipient))) {
        return failureResult(notFoundError('Principal', recipient));
      }
      if (!this.ctx.config.allowNegativeScrip) {
        const spendable = await spendableScrip(this.ctx.ledger, this.ctx.holds, callerId);
        if (spendable < price) return failureResult(insufficientFundsError(callerId, price, spendable));
      }
      const paid = await this.ctx.ledger.transferScrip(callerId, recipient, price);
      if (!paid.ok) return failureResult(paid.error);
    }

    return successResult(`Read artifact ${artifactId}`, {
      data: { artifact: toArtifactView(artifact) },
      resourcesConsumed: price > 0 ? { scrip: price } : {},
      chargedTo: price > 0 ? callerId : undefined,
    });
  }
}
