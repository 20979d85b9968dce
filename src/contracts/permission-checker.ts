/**
 * Permission checker.
 *
 * Resolves an artifact's access contract and evaluates it. Custom contracts
 * are executable `contract` artifacts run through the sandbox with method
 * `check_permission`; any failure or malformed answer denies.
 */

import {
  ARTIFACT_TYPE_CONTRACT,
  Artifact,
  JsonValue,
  isJsonObject,
  isJsonValue,
  toArtifactSummary,
} from '../domain/artifact';
import { Clock, isoAt, systemClock } from '../domain/clock';
import {
  AccessContract,
  PermissionAction,
  PermissionContext,
  PermissionResult,
  allow,
  deny,
  isKernelContractId,
} from '../domain/contracts';
import { ArtifactStore } from '../storage/store';
import { CodeSandbox, runSandboxed } from '../engine/sandbox';
import { Logger, logger as rootLogger } from '../logger';
import { KERNEL_CONTRACTS } from './kernel-contracts';

export interface PermissionCheckerOptions {
  /** Budget for one custom contract evaluation. */
  contractTimeoutMs: number;
}

export class PermissionChecker {
  private log: Logger;

  constructor(
    private artifacts: ArtifactStore,
    private sandbox: CodeSandbox,
    private options: PermissionCheckerOptions,
    private clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'permission-checker' });
  }

  /** Whether a contract id names a kernel contract or a live contract artifact. */
  async contractExists(contractId: string): Promise<boolean> {
    if (isKernelContractId(contractId)) return true;
    return (await this.loadContractArtifact(contractId)) !== null;
  }

  async check(
    callerId: string,
    action: PermissionAction,
    target: Artifact,
    method?: string,
  ): Promise<PermissionResult> {
    const context: PermissionContext = { now: isoAt(this.clock) };
    if (method !== undefined) context.method = method;

    const contractId = target.accessContractId;
    if (isKernelContractId(contractId)) {
      return KERNEL_CONTRACTS[contractId].check(callerId, action, target, context);
    }

    const contractArtifact = await this.loadContractArtifact(contractId);
    if (!contractArtifact) {
      return deny(`contract ${contractId} not found`);
    }
    return this.customContract(contractArtifact).check(callerId, action, target, context);
  }

  private async loadContractArtifact(contractId: string): Promise<Artifact | null> {
    const artifact = await this.artifacts.get(contractId);
    if (!artifact || artifact.deleted || !artifact.executable || artifact.type !== ARTIFACT_TYPE_CONTRACT) {
      return null;
    }
    return artifact;
  }

  private customContract(contractArtifact: Artifact): AccessContract {
    return {
      id: contractArtifact.id,
      description: contractArtifact.content,
      check: async (callerId, action, target, context) => {
        const targetSummary: unknown = JSON.parse(JSON.stringify(toArtifactSummary(target)));
        const args: JsonValue[] = [callerId, action, isJsonValue(targetSummary) ? targetSummary : null, context.method ?? null];
        const outcome = await runSandboxed(this.sandbox, {
          artifact: contractArtifact,
          method: 'check_permission',
          args,
          callerId,
          timeoutMs: this.options.contractTimeoutMs,
        });
        if (!outcome.ok) {
          this.log.warn('Custom contract failed; denying', {
            contractId: contractArtifact.id,
            targetId: target.id,
            error: outcome.error.message,
          });
          return deny(`contract ${contractArtifact.id} failed: ${outcome.error.message}`);
        }
        return interpretDecision(contractArtifact.id, outcome.value);
      },
    };
  }
}

function interpretDecision(contractId: string, value: JsonValue): PermissionResult {
  if (!isJsonObject(value) || typeof value.allowed !== 'boolean') {
    return deny(`contract ${contractId} returned a malformed decision`);
  }
  const reason = typeof value.reason === 'string' ? value.reason : `contract ${contractId}`;
  if (!value.allowed) return deny(reason);
  const recipient = typeof value.scrip_recipient === 'string' ? value.scrip_recipient : undefined;
  return allow(reason, recipient);
}
