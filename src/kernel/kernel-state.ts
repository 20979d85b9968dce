/**
 * KernelState: the read-only kernel facade.
 *
 * Genesis services and sandboxed code see shared state only through this
 * interface. Reads of artifact content are contract-checked for the caller,
 * and the caller must be one the facade's authority names.
 */

import {
  ArtifactMetadata,
  ArtifactSummary,
  JsonValue,
  toArtifactSummary,
  toJsonValue,
} from '../domain/artifact';
import { Result, err, ok, notFoundError, permissionError, validationError } from '../domain/errors';
import { EscrowListing } from '../domain/escrow';
import { AuctionStatus, MintResult, MintSubmissionView, MintTaskView } from '../domain/mint';
import { QuotaEntry, RESOURCE_LLM_BUDGET } from '../domain/principal';
import { spendableScrip } from '../engine/holds';
import { ArtifactOperations } from '../engine/artifact-ops';
import { KernelContext } from '../engine/context';
import { Authority } from './authority';

export type QueryKind =
  | 'balances'
  | 'principal'
  | 'artifacts'
  | 'artifact'
  | 'mint_status'
  | 'mint_history'
  | 'escrow_listings'
  | 'mint_tasks'
  | 'delegations'
  | 'events';

export const QUERY_KINDS: readonly QueryKind[] = [
  'balances',
  'principal',
  'artifacts',
  'artifact',
  'mint_status',
  'mint_history',
  'escrow_listings',
  'mint_tasks',
  'delegations',
  'events',
];

function isQueryKind(value: string): value is QueryKind {
  return (QUERY_KINDS as readonly string[]).includes(value);
}

const DEFAULT_QUERY_LIMIT = 50;

export class KernelState {
  constructor(
    private ctx: KernelContext,
    private ops: ArtifactOperations,
    private authority: Authority = Authority.root(),
  ) {}

  async getBalance(principalId: string): Promise<number> {
    return this.ctx.ledger.getScrip(principalId);
  }

  /** Balance minus scrip held for invocations in flight. */
  async getSpendableBalance(principalId: string): Promise<number> {
    return spendableScrip(this.ctx.ledger, this.ctx.holds, principalId);
  }

  async getResource(principalId: string, resource: string): Promise<number> {
    return this.ctx.ledger.getResource(principalId, resource);
  }

  async getLlmBudget(principalId: string): Promise<number> {
    return this.ctx.ledger.getResource(principalId, RESOURCE_LLM_BUDGET);
  }

  async getQuota(principalId: string, resource: string): Promise<QuotaEntry> {
    return this.ctx.ledger.getQuota(principalId, resource);
  }

  async getAvailableCapacity(principalId: string, resource: string): Promise<number> {
    return this.ctx.ledger.getAvailableCapacity(principalId, resource);
  }

  async listArtifactsByOwner(ownerId: string, limit = DEFAULT_QUERY_LIMIT): Promise<ArtifactSummary[]> {
    const artifacts = await this.ctx.store.artifacts.list({ controllerId: ownerId, limit });
    return artifacts.map(toArtifactSummary);
  }

  /** Metadata is public; content is not. */
  async getArtifactMetadata(artifactId: string): Promise<ArtifactMetadata | null> {
    const artifact = await this.ctx.store.artifacts.get(artifactId);
    return artifact && !artifact.deleted ? artifact.metadata : null;
  }

  /**
   * Contract-checked read of an artifact's content. Priced artifacts are
   * refused unless the caller is the one the price would be paid to; paid
   * reads go through the `read_artifact` action.
   */
  async readArtifact(callerId: string, artifactId: string): Promise<Result<{ content: string; code?: string }>> {
    if (!this.authority.permits(callerId)) {
      return err(permissionError(`Facade does not act for ${callerId}`, 'not_authorized', { callerId }));
    }
    const read = await this.ops.read(callerId, artifactId);
    if (!read.ok) return read;
    const { artifact, recipient } = read.value;
    if (artifact.readPrice > 0 && recipient !== callerId) {
      return err(
        permissionError(`Artifact ${artifactId} has a read price; use read_artifact`, 'not_authorized', {
          artifactId,
          readPrice: artifact.readPrice,
        }),
      );
    }
    const value: { content: string; code?: string } = { content: artifact.content };
    if (artifact.code !== undefined) value.code = artifact.code;
    return ok(value);
  }

  getMintSubmissions(): MintSubmissionView[] {
    return this.ctx.protocols.mint?.submissions() ?? [];
  }

  getMintHistory(limit?: number): MintResult[] {
    return this.ctx.protocols.mint?.history(limit) ?? [];
  }

  getAuctionStatus(): AuctionStatus | null {
    return this.ctx.protocols.mint?.status() ?? null;
  }

  getEscrowListings(activeOnly = true): EscrowListing[] {
    return this.ctx.protocols.escrow?.listings(activeOnly) ?? [];
  }

  getMintTasks(includeCompleted = false): MintTaskView[] {
    return this.ctx.protocols.tasks?.tasks(includeCompleted) ?? [];
  }

  /** Generic read-only query used by the `query_kernel` action. */
  async query(kind: string, params: Record<string, JsonValue> = {}): Promise<Result<JsonValue>> {
    if (!isQueryKind(kind)) {
      return err(validationError('invalid_argument', `Unknown query type: ${kind}`, { validTypes: [...QUERY_KINDS] }));
    }
    const limit = typeof params.limit === 'number' && params.limit > 0 ? Math.floor(params.limit) : DEFAULT_QUERY_LIMIT;
    const stringParam = (key: string): string | undefined => {
      const value = params[key];
      return typeof value === 'string' && value.length > 0 ? value : undefined;
    };

    switch (kind) {
      case 'balances': {
        const principals = await this.ctx.ledger.listPrincipals();
        const balances: Record<string, JsonValue> = {};
        for (const principal of principals) balances[principal.id] = principal.scrip;
        return ok(balances);
      }
      case 'principal': {
        const id = stringParam('principal_id');
        if (!id) return err(validationError('missing_argument', "Query 'principal' requires principal_id"));
        const principal = await this.ctx.ledger.getPrincipal(id);
        if (!principal) return err(notFoundError('Principal', id));
        return ok({
          id: principal.id,
          scrip: principal.scrip,
          held: this.ctx.holds.heldBy(principal.id),
          quotas: toJsonValue(principal.quotas),
          resources: principal.resources,
          has_standing: principal.hasStanding,
        });
      }
      case 'artifacts': {
        const artifacts = await this.ctx.store.artifacts.list({
          controllerId: stringParam('owner_id'),
          type: stringParam('type'),
          createdBy: stringParam('created_by'),
          limit,
        });
        return ok(toJsonValue(artifacts.map(toArtifactSummary)));
      }
      case 'artifact': {
        const id = stringParam('artifact_id');
        if (!id) return err(validationError('missing_argument', "Query 'artifact' requires artifact_id"));
        const artifact = await this.ctx.store.artifacts.get(id);
        if (!artifact || artifact.deleted) return err(notFoundError('Artifact', id));
        return ok(toJsonValue(toArtifactSummary(artifact)));
      }
      case 'mint_status':
        return ok(toJsonValue({ status: this.getAuctionStatus(), submissions: this.getMintSubmissions() }));
      case 'mint_history':
        return ok(toJsonValue(this.getMintHistory(limit)));
      case 'escrow_listings':
        return ok(toJsonValue(this.getEscrowListings(params.include_closed !== true)));
      case 'mint_tasks':
        return ok(toJsonValue(this.getMintTasks(params.include_completed === true)));
      case 'delegations': {
        const payerId = stringParam('payer_id');
        if (!payerId) return err(validationError('missing_argument', "Query 'delegations' requires payer_id"));
        return ok(toJsonValue(await this.ctx.delegation.list(payerId)));
      }
      case 'events': {
        const types = Array.isArray(params.types)
          ? params.types.filter((t): t is string => typeof t === 'string')
          : undefined;
        const page = await this.ctx.publisher.query({ types, limit, offset: 0, after: numberParam(params.after) });
        return ok(toJsonValue(page.items));
      }
    }
  }
}

function numberParam(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
