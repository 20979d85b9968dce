/**
 * KernelActions: the acting kernel facade.
 *
 * Every method takes the acting `callerId` and re-verifies it against the
 * facade's authority before doing anything: a facade handed to a service or
 * to sandboxed code acts only for the invoker (and the invoked artifact or
 * service, when it is a principal), and stops working once the invocation
 * that created it returns. Every call is logged as a `kernel_*` event.
 */

import { Artifact, JsonValue, META_AUTHORIZED_WRITER, metadataString } from '../domain/artifact';
import { DelegationEntry } from '../domain/delegation';
import {
  Result,
  deletedError,
  err,
  insufficientFundsError,
  notFoundError,
  ok,
  permissionError,
  systemError,
  validationError,
} from '../domain/errors';
import { KernelEventType } from '../domain/events';
import { MintSubmission } from '../domain/mint';
import { PrincipalSnapshot, RESOURCE_LLM_BUDGET, resourceKind, snapshotPrincipal } from '../domain/principal';
import { TransferReceipt } from '../ledger/ledger';
import { ArtifactOperations, WriteOutcome, WriteRequest } from '../engine/artifact-ops';
import { KernelContext } from '../engine/context';
import { spendableScrip } from '../engine/holds';
import type { ArtifactInvoker, InvokeOutcome } from '../engine/invoke-handler';
import { Authority } from './authority';

export interface ConsumeReceipt {
  resource: string;
  /** Remaining headroom (allocatable) or balance (depletable). */
  remaining: number;
}

export class KernelActions {
  constructor(
    private ctx: KernelContext,
    private ops: ArtifactOperations,
    private invoker: ArtifactInvoker,
    private authority: Authority = Authority.root(),
    readonly depth = 0,
  ) {}

  /** A facade that acts only for `callerIds`. */
  scoped(callerIds: Iterable<string>): KernelActions {
    return new KernelActions(this.ctx, this.ops, this.invoker, Authority.of(callerIds), this.depth);
  }

  /** Stop acting. Later calls fail with a permission error. */
  revoke(): void {
    this.authority.revoke();
  }

  // --- Scrip and resources ---

  async transferScrip(callerId: string, recipientId: string, amount: number): Promise<Result<TransferReceipt>> {
    return this.record('kernel_transfer_scrip', callerId, { to: recipientId, amount }, async () => {
      if (!Number.isInteger(amount) || amount <= 0) {
        return err(validationError('invalid_argument', `amount must be a positive integer, got ${amount}`));
      }
      if (!this.ctx.config.allowNegativeScrip) {
        const spendable = await spendableScrip(this.ctx.ledger, this.ctx.holds, callerId);
        if (spendable < amount) return err(insufficientFundsError(callerId, amount, spendable));
      }
      return this.ctx.ledger.transferScrip(callerId, recipientId, amount);
    });
  }

  /** Move a depletable balance; allocatable resources move as quota headroom. */
  async transferResource(
    callerId: string,
    recipientId: string,
    resource: string,
    amount: number,
  ): Promise<Result<void>> {
    if (resourceKind(resource) === 'allocatable') {
      return this.transferQuota(callerId, recipientId, resource, amount);
    }
    return this.record('kernel_transfer_resource', callerId, { to: recipientId, resource, amount }, () =>
      this.ctx.ledger.transferResource(callerId, recipientId, resource, amount),
    );
  }

  async transferLlmBudget(callerId: string, recipientId: string, amount: number): Promise<Result<void>> {
    return this.transferResource(callerId, recipientId, RESOURCE_LLM_BUDGET, amount);
  }

  async transferQuota(callerId: string, recipientId: string, resource: string, amount: number): Promise<Result<void>> {
    return this.record('kernel_transfer_quota', callerId, { to: recipientId, resource, amount }, () =>
      this.ctx.ledger.transferQuota(callerId, recipientId, resource, amount),
    );
  }

  async consumeQuota(callerId: string, resource: string, amount: number): Promise<Result<ConsumeReceipt>> {
    return this.record('kernel_consume_quota', callerId, { resource, amount }, async () => {
      if (resourceKind(resource) === 'depletable') {
        const spent = await this.ctx.ledger.spendResource(callerId, resource, amount);
        return spent.ok ? ok({ resource, remaining: spent.value }) : spent;
      }
      const consumed = await this.ctx.ledger.consumeQuota(callerId, resource, amount);
      return consumed.ok ? ok({ resource, remaining: consumed.value.limit - consumed.value.used }) : consumed;
    });
  }

  // --- Artifacts ---

  async writeArtifact(callerId: string, request: WriteRequest): Promise<Result<WriteOutcome>> {
    return this.record('kernel_write_artifact', callerId, { artifact_id: request.artifactId }, () =>
      this.ops.write(callerId, request),
    );
  }

  async updateArtifactMetadata(
    callerId: string,
    artifactId: string,
    key: string,
    value: JsonValue,
  ): Promise<Result<Artifact>> {
    return this.record('kernel_update_metadata', callerId, { artifact_id: artifactId, key, value }, () =>
      this.ops.updateMetadata(callerId, artifactId, key, value),
    );
  }

  /** Hand control (`authorized_writer`) to another principal. Needs write permission. */
  async transferOwnership(callerId: string, artifactId: string, newOwnerId: string): Promise<Result<Artifact>> {
    return this.record('kernel_transfer_ownership', callerId, { artifact_id: artifactId, new_owner: newOwnerId }, async () => {
      if (!(await this.ctx.ledger.hasPrincipal(newOwnerId))) {
        return err(notFoundError('Principal', newOwnerId));
      }
      return this.ops.updateMetadata(callerId, artifactId, META_AUTHORIZED_WRITER, newOwnerId);
    });
  }

  async invokeArtifact(
    callerId: string,
    artifactId: string,
    method: string,
    args: JsonValue[] = [],
  ): Promise<Result<InvokeOutcome>> {
    const denied = this.verify(callerId);
    if (denied) return denied;
    return this.invoker.invoke(callerId, artifactId, method, args, this.depth);
  }

  // --- Mint ---

  async submitForMint(callerId: string, artifactId: string, bid: number): Promise<Result<MintSubmission>> {
    return this.record('kernel_submit_for_mint', callerId, { artifact_id: artifactId, bid }, async () => {
      const mint = this.ctx.protocols.mint;
      if (!mint) return err(systemError('The mint auction is not running'));
      const artifact = await this.ctx.store.artifacts.get(artifactId);
      if (!artifact) return err(notFoundError('Artifact', artifactId));
      if (artifact.deleted) return err(deletedError(artifactId));
      if (metadataString(artifact.metadata, META_AUTHORIZED_WRITER) !== callerId) {
        return err(permissionError(`Only the controller of ${artifactId} may submit it for minting`, 'not_owner'));
      }
      return mint.submit(this, callerId, artifactId, bid);
    });
  }

  async cancelMintSubmission(callerId: string, submissionId: string): Promise<Result<MintSubmission>> {
    return this.record('kernel_cancel_mint', callerId, { submission_id: submissionId }, async () => {
      const mint = this.ctx.protocols.mint;
      if (!mint) return err(systemError('The mint auction is not running'));
      return mint.cancel(callerId, submissionId);
    });
  }

  // --- Delegation ---

  /** The caller is the payer. */
  async grantChargeDelegation(callerId: string, entry: DelegationEntry): Promise<Result<DelegationEntry[]>> {
    return this.record('kernel_grant_delegation', callerId, { charger_id: entry.chargerId }, () =>
      this.ctx.delegation.grant(callerId, entry),
    );
  }

  async revokeChargeDelegation(callerId: string, chargerId: string): Promise<Result<void>> {
    return this.record('kernel_revoke_delegation', callerId, { charger_id: chargerId }, async () => {
      const removed = await this.ctx.delegation.revoke(callerId, chargerId);
      return removed ? ok(undefined) : err(notFoundError('Delegation', `${callerId} -> ${chargerId}`));
    });
  }

  // --- Principals ---

  /** Create a principal with no scrip and no quotas. */
  async createPrincipal(callerId: string, principalId: string): Promise<Result<PrincipalSnapshot>> {
    return this.record('kernel_create_principal', callerId, { principal_id: principalId }, async () => {
      const created = await this.ctx.ledger.createPrincipal({ id: principalId, scrip: 0 });
      return created.ok ? ok(snapshotPrincipal(created.value)) : created;
    });
  }

  private verify(callerId: string): Result<never> | null {
    if (this.authority.permits(callerId)) return null;
    const message = this.authority.isRevoked
      ? 'Kernel access for this invocation has ended'
      : `This facade does not act for ${callerId}`;
    return err(permissionError(message, 'not_authorized', { callerId }));
  }

  private async record<T>(
    eventType: KernelEventType,
    callerId: string,
    fields: Record<string, JsonValue>,
    operation: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    const result = this.verify(callerId) ?? (await operation());
    await this.ctx.publisher.publish(eventType, {
      caller_id: callerId,
      ...fields,
      success: result.ok,
      error_code: result.ok ? undefined : result.error.code,
    });
    return result;
  }
}
