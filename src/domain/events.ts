/**
 * Kernel event log domain model.
 *
 * Events are appended in order and written one JSON object per line. Field
 * names are snake_case and stable: downstream dashboards parse them.
 */

import { JsonValue } from './artifact';

/** Event types the kernel emits besides the semantic `<action>_success|_failure` ones. */
export const KERNEL_EVENT_TYPES = [
  'action',
  'tick',
  'invoke_success',
  'invoke_failure',
  'mint_auction_resolved',
  'mint_task_completed',
  'escrow_listed',
  'escrow_purchased',
  'escrow_cancelled',
  'kernel_transfer_scrip',
  'kernel_transfer_resource',
  'kernel_transfer_quota',
  'kernel_consume_quota',
  'kernel_write_artifact',
  'kernel_update_metadata',
  'kernel_transfer_ownership',
  'kernel_submit_for_mint',
  'kernel_cancel_mint',
  'kernel_grant_delegation',
  'kernel_revoke_delegation',
  'kernel_create_principal',
] as const;

export type KernelEventType = (typeof KERNEL_EVENT_TYPES)[number] | `${string}_success` | `${string}_failure`;

export function isKernelEventType(value: string): value is KernelEventType {
  return (
    value.endsWith('_success') || value.endsWith('_failure') || KERNEL_EVENT_TYPES.some((type) => type === value)
  );
}

/** Required fields of every event plus per-type fields. */
export interface KernelEvent {
  event_number: number;
  event_type: KernelEventType;
  timestamp: string;
  [field: string]: JsonValue | undefined;
}

export interface EventQueryOptions {
  types?: string[];
  limit?: number;
  offset?: number;
  /** Only events with event_number greater than this. */
  after?: number;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Filter by event type. Empty or absent delivers everything. */
  eventTypes?: string[];
  callback: (event: KernelEvent) => void;
}
