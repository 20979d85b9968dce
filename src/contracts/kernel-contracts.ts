/**
 * Built-in access contracts.
 *
 * Contracts read control from metadata: `authorized_writer` for the
 * controller, `authorized_principal` for the owner of private and
 * self-owned artifacts. `createdBy` is never consulted for permission.
 */

import {
  Artifact,
  META_AUTHORIZED_PRINCIPAL,
  artifactController,
  metadataString,
} from '../domain/artifact';
import {
  AccessContract,
  KernelContractId,
  PermissionAction,
  PermissionResult,
  allow,
  deny,
} from '../domain/contracts';

/** Payee for priced reads and invokes: the controller, else the creator. */
function recipientOf(target: Artifact): string {
  return artifactController(target) ?? target.createdBy;
}

function writerOnly(name: string, callerId: string, action: PermissionAction, target: Artifact): PermissionResult {
  if (action === PermissionAction.Read || action === PermissionAction.Invoke) {
    return allow(`${name}: open access`, recipientOf(target));
  }
  const writer = artifactController(target);
  if (writer === null) return deny(`${name}: no authorized_writer set`);
  if (callerId === writer) return allow(`${name}: authorized_writer`);
  return deny(`${name}: only authorized_writer can ${action}`);
}

export const freewareContract: AccessContract = {
  id: KernelContractId.Freeware,
  description: 'Anyone may read or invoke; only the authorized writer may modify',
  check: (callerId, action, target) => writerOnly('freeware', callerId, action, target),
};

export const transferableFreewareContract: AccessContract = {
  id: KernelContractId.TransferableFreeware,
  description: 'Freeware whose control moves with authorized_writer, for trading through escrow',
  check: (callerId, action, target) => writerOnly('transferable_freeware', callerId, action, target),
};

export const selfOwnedContract: AccessContract = {
  id: KernelContractId.SelfOwned,
  description: 'Only the artifact itself or its authorized principal may access it',
  check: (callerId, _action, target) => {
    if (callerId === target.id) return allow('self_owned: self access');
    const principal = metadataString(target.metadata, META_AUTHORIZED_PRINCIPAL);
    if (principal !== undefined && callerId === principal) {
      return allow('self_owned: authorized_principal', principal);
    }
    return deny('self_owned: access denied');
  },
};

export const privateContract: AccessContract = {
  id: KernelContractId.Private,
  description: 'Only the authorized principal may access',
  check: (callerId, _action, target) => {
    const principal = metadataString(target.metadata, META_AUTHORIZED_PRINCIPAL);
    if (principal !== undefined && callerId === principal) {
      return allow('private: authorized_principal', principal);
    }
    return deny('private: access denied');
  },
};

export const publicContract: AccessContract = {
  id: KernelContractId.Public,
  description: 'Anyone may perform any action',
  check: (_callerId, _action, target) => allow('public: open access', recipientOf(target)),
};

export const KERNEL_CONTRACTS: Record<KernelContractId, AccessContract> = {
  [KernelContractId.Freeware]: freewareContract,
  [KernelContractId.TransferableFreeware]: transferableFreewareContract,
  [KernelContractId.SelfOwned]: selfOwnedContract,
  [KernelContractId.Private]: privateContract,
  [KernelContractId.Public]: publicContract,
};

/** Contracts whose owner is `authorized_principal`, filled with the creator on creation. */
export function usesAuthorizedPrincipal(contractId: string): boolean {
  return contractId === KernelContractId.SelfOwned || contractId === KernelContractId.Private;
}
