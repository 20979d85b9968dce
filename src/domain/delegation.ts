/**
 * Charge delegation domain model.
 *
 * A payer may allow a charger to spend from the payer's account, bounded per
 * call, per rolling window and by expiry. Grants are stored in a
 * kernel-protected artifact per payer.
 */

import { Artifact, META_AUTHORIZED_PRINCIPAL, META_AUTHORIZED_WRITER, metadataString } from './artifact';

export const DELEGATION_PREFIX = 'charge_delegation:';

export function delegationArtifactId(payerId: string): string {
  return `${DELEGATION_PREFIX}${payerId}`;
}

export function isDelegationArtifactId(artifactId: string): boolean {
  return artifactId.startsWith(DELEGATION_PREFIX);
}

export interface DelegationEntry {
  chargerId: string;
  maxPerCall?: number;
  maxPerWindow?: number;
  windowSeconds: number;
  /** ISO timestamp. */
  expiresAt?: string;
}

export const DEFAULT_DELEGATION_WINDOW_SECONDS = 3600;

/**
 * Who pays for an invocation, from the target's `charge_to` metadata.
 * `target` and `contract` both charge the artifact's owner.
 */
export type ChargeTo =
  | { kind: 'caller' }
  | { kind: 'target' }
  | { kind: 'contract' }
  | { kind: 'pool'; payerId: string };

export function parseChargeTo(value: unknown): ChargeTo | null {
  if (value === undefined || value === null || value === 'caller') return { kind: 'caller' };
  if (value === 'target') return { kind: 'target' };
  if (value === 'contract') return { kind: 'contract' };
  if (typeof value === 'string' && value.startsWith('pool:')) {
    const payerId = value.slice('pool:'.length);
    return payerId.length > 0 ? { kind: 'pool', payerId } : null;
  }
  return null;
}

/** The principal an invocation charges. */
export function resolvePayer(chargeTo: ChargeTo, callerId: string, artifact: Artifact): string {
  switch (chargeTo.kind) {
    case 'caller':
      return callerId;
    case 'pool':
      return chargeTo.payerId;
    case 'target':
    case 'contract':
      return (
        metadataString(artifact.metadata, META_AUTHORIZED_PRINCIPAL) ||
        metadataString(artifact.metadata, META_AUTHORIZED_WRITER) ||
        artifact.createdBy
      );
  }
}
