/**
 * Access contract domain model.
 *
 * Every artifact names an access contract that decides who may read, write,
 * edit, invoke or delete it. Kernel contracts are built in; custom contracts
 * are executable artifacts of type `contract`.
 */

import { Artifact } from './artifact';

export enum PermissionAction {
  Read = 'read',
  Write = 'write',
  Edit = 'edit',
  Invoke = 'invoke',
  Delete = 'delete',
}

/** Built-in contract ids. */
export enum KernelContractId {
  Freeware = 'kernel_contract_freeware',
  TransferableFreeware = 'kernel_contract_transferable_freeware',
  SelfOwned = 'kernel_contract_self_owned',
  Private = 'kernel_contract_private',
  Public = 'kernel_contract_public',
}

export const KERNEL_CONTRACT_IDS: readonly string[] = Object.values(KernelContractId);

export function isKernelContractId(id: string): id is KernelContractId {
  return KERNEL_CONTRACT_IDS.includes(id);
}

/** Outcome of a contract check. */
export interface PermissionResult {
  allowed: boolean;
  reason: string;
  /** Who receives the scrip for a priced read or invoke. */
  scripRecipient?: string;
}

/** Extra facts a contract may consider. */
export interface PermissionContext {
  method?: string;
  /** Evaluation time (ISO). */
  now: string;
}

/** A contract decides one (caller, action, target) question. */
export interface AccessContract {
  id: string;
  description: string;
  check(
    callerId: string,
    action: PermissionAction,
    target: Artifact,
    context: PermissionContext,
  ): PermissionResult | Promise<PermissionResult>;
}

export function allow(reason: string, scripRecipient?: string): PermissionResult {
  const result: PermissionResult = { allowed: true, reason };
  if (scripRecipient) result.scripRecipient = scripRecipient;
  return result;
}

export function deny(reason: string): PermissionResult {
  return { allowed: false, reason };
}
