/**
 * In-memory storage implementation.
 *
 * The reference backend for simulations and tests. Every value crossing the
 * boundary is deep-copied so callers never alias stored state.
 */

import { Artifact, artifactController } from '../domain/artifact';
import { EventQueryOptions, KernelEvent } from '../domain/events';
import { Principal } from '../domain/principal';
import {
  ArtifactListOptions,
  ArtifactStore,
  EventStore,
  ListOptions,
  PrincipalStore,
  Store,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Structured clone of a stored value. */
export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function matchesArtifact(artifact: Artifact, options?: ArtifactListOptions): boolean {
  if (!options?.includeDeleted && artifact.deleted) return false;
  if (options?.type !== undefined && artifact.type !== options.type) return false;
  if (options?.createdBy !== undefined && artifact.createdBy !== options.createdBy) return false;
  if (options?.controllerId !== undefined && artifactController(artifact) !== options.controllerId) return false;
  return true;
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, Artifact>();

  async get(id: string): Promise<Artifact | null> {
    const artifact = this.data.get(id);
    return artifact ? deepCopy(artifact) : null;
  }

  async put(artifact: Artifact): Promise<Artifact> {
    this.data.set(artifact.id, deepCopy(artifact));
    return deepCopy(artifact);
  }

  async list(options?: ArtifactListOptions): Promise<Artifact[]> {
    const items = [...this.data.values()]
      .filter((a) => matchesArtifact(a, options))
      .sort((a, b) => a.id.localeCompare(b.id));
    return applyListOptions(items, options).map(deepCopy);
  }

  async count(options?: ArtifactListOptions): Promise<number> {
    let total = 0;
    for (const artifact of this.data.values()) {
      if (matchesArtifact(artifact, options)) total++;
    }
    return total;
  }
}

class MemoryPrincipalStore implements PrincipalStore {
  private data = new Map<string, Principal>();

  async get(id: string): Promise<Principal | null> {
    const principal = this.data.get(id);
    return principal ? deepCopy(principal) : null;
  }

  async create(principal: Principal): Promise<Principal | null> {
    if (this.data.has(principal.id)) return null;
    this.data.set(principal.id, deepCopy(principal));
    return deepCopy(principal);
  }

  async putMany(principals: Principal[]): Promise<void> {
    const missing = principals.filter((p) => !this.data.has(p.id)).map((p) => p.id);
    if (missing.length > 0) {
      throw new Error(`Unknown principals: ${missing.join(', ')}`);
    }
    // Copy everything first so a failure cannot leave a partial write.
    const copies = principals.map(deepCopy);
    for (const copy of copies) {
      this.data.set(copy.id, copy);
    }
  }

  async list(): Promise<Principal[]> {
    return [...this.data.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)).map(deepCopy);
  }
}

function matchesEvent(event: KernelEvent, options?: EventQueryOptions): boolean {
  if (options?.types?.length && !options.types.includes(event.event_type)) return false;
  if (options?.after !== undefined && event.event_number <= options.after) return false;
  return true;
}

class MemoryEventStore implements EventStore {
  private data: KernelEvent[] = [];

  async append(event: KernelEvent): Promise<KernelEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async list(options?: EventQueryOptions): Promise<KernelEvent[]> {
    const items = this.data.filter((e) => matchesEvent(e, options));
    return applyListOptions(items, options).map(deepCopy);
  }

  async count(options?: EventQueryOptions): Promise<number> {
    return this.data.filter((e) => matchesEvent(e, options)).length;
  }
}

/** Create a new in-memory store. */
export function createMemoryStore(): Store {
  return {
    artifacts: new MemoryArtifactStore(),
    principals: new MemoryPrincipalStore(),
    events: new MemoryEventStore(),
  };
}
