/**
 * Storage layer interfaces.
 *
 * The kernel owns all shared state through these stores. Implementations
 * return copies: mutating a returned object never changes stored state.
 */

import { Artifact } from '../domain/artifact';
import { EventQueryOptions, KernelEvent } from '../domain/events';
import { Principal } from '../domain/principal';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Discovery filters for artifacts. */
export interface ArtifactListOptions extends ListOptions {
  /** Deleted artifacts are hidden unless this is set. */
  includeDeleted?: boolean;
  /** Match `metadata.authorized_writer`. */
  controllerId?: string;
  createdBy?: string;
  type?: string;
}

export interface ArtifactStore {
  get(id: string): Promise<Artifact | null>;
  /** Create or replace. */
  put(artifact: Artifact): Promise<Artifact>;
  list(options?: ArtifactListOptions): Promise<Artifact[]>;
  count(options?: ArtifactListOptions): Promise<number>;
}

export interface PrincipalStore {
  get(id: string): Promise<Principal | null>;
  /** Returns null when the id is taken. */
  create(principal: Principal): Promise<Principal | null>;
  /** Replace several existing principals in one atomic step. All ids must exist. */
  putMany(principals: Principal[]): Promise<void>;
  /** All principals, ordered by id. */
  list(): Promise<Principal[]>;
}

export interface EventStore {
  append(event: KernelEvent): Promise<KernelEvent>;
  list(options?: EventQueryOptions): Promise<KernelEvent[]>;
  count(options?: EventQueryOptions): Promise<number>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  artifacts: ArtifactStore;
  principals: PrincipalStore;
  events: EventStore;
}
