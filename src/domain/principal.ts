/**
 * Principal domain model.
 *
 * A principal is any identity that can hold scrip and resource quotas:
 * agents, genesis services and artifacts written with standing.
 */

/** Well-known resource names. */
export const RESOURCE_DISK = 'disk';
export const RESOURCE_LLM_BUDGET = 'llm_budget';

/**
 * Allocatable resources are bounded by a limit and track usage against it.
 * Depletable resources are a balance that only goes down when spent.
 */
export type ResourceKind = 'allocatable' | 'depletable';

export function resourceKind(resource: string): ResourceKind {
  return resource === RESOURCE_LLM_BUDGET ? 'depletable' : 'allocatable';
}

/** Per-resource quota. Invariant: 0 <= used <= limit. */
export interface QuotaEntry {
  limit: number;
  used: number;
}

export interface Principal {
  id: string;
  scrip: number;
  quotas: Record<string, QuotaEntry>;
  /** Depletable balances (llm_budget). */
  resources: Record<string, number>;
  hasStanding: boolean;
  createdAt: string;
}

/** Snapshot carried by tick events. */
export interface PrincipalSnapshot {
  scrip: number;
  resources: Record<string, number>;
  quotas: Record<string, QuotaEntry>;
}

export function snapshotPrincipal(principal: Principal): PrincipalSnapshot {
  const quotas: Record<string, QuotaEntry> = {};
  for (const [name, entry] of Object.entries(principal.quotas)) {
    quotas[name] = { limit: entry.limit, used: entry.used };
  }
  return { scrip: principal.scrip, resources: { ...principal.resources }, quotas };
}

/** Remaining headroom on an allocatable resource. */
export function availableCapacity(principal: Principal, resource: string): number {
  const entry = principal.quotas[resource];
  if (!entry) return 0;
  return Math.max(0, entry.limit - entry.used);
}
