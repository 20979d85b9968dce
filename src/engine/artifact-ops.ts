/**
 * Artifact operations.
 *
 * The write, edit, delete, read and metadata paths shared by the action
 * executor and the KernelActions facade. Each operation checks in the same
 * order (existence, deletion, kernel protection, contract) and touches no
 * state until every check has passed.
 */

import {
  Artifact,
  ArtifactInterface,
  ArtifactMetadata,
  JsonValue,
  META_AUTHORIZED_PRINCIPAL,
  META_AUTHORIZED_WRITER,
  META_PREVIOUS_WRITER,
  artifactController,
  artifactSize,
} from '../domain/artifact';
import { isoAt } from '../domain/clock';
import { PermissionAction } from '../domain/contracts';
import { isDelegationArtifactId } from '../domain/delegation';
import {
  KernelError,
  Result,
  alreadyExistsError,
  deletedError,
  err,
  notFoundError,
  ok,
  permissionError,
  validationError,
} from '../domain/errors';
import { RESOURCE_DISK } from '../domain/principal';
import { usesAuthorizedPrincipal } from '../contracts/kernel-contracts';
import { KernelContext } from './context';

/** Fields of a write. Absent optional fields keep their current value on update. */
export interface WriteRequest {
  artifactId: string;
  artifactType: string;
  content: string;
  code?: string;
  executable: boolean;
  price: number;
  readPrice: number;
  accessContractId?: string;
  metadata?: ArtifactMetadata;
  hasStanding: boolean;
  interface?: ArtifactInterface;
}

export interface WriteOutcome {
  artifact: Artifact;
  created: boolean;
  /** Bytes charged (positive) or released (negative) against the caller's disk quota. */
  diskDelta: number;
}

export interface ReadOutcome {
  artifact: Artifact;
  /** Who is paid the read price. */
  recipient: string;
}

export class ArtifactOperations {
  constructor(private ctx: KernelContext) {}

  async write(callerId: string, request: WriteRequest): Promise<Result<WriteOutcome>> {
    const { artifactId } = request;
    if (this.ctx.registry.has(artifactId)) {
      return err(permissionError(`Artifact ${artifactId} is a kernel service`, 'kernel_protected', { artifactId }));
    }
    if (isDelegationArtifactId(artifactId)) {
      return err(
        permissionError(`Artifact ids starting with '${artifactId.split(':')[0]}:' are reserved`, 'reserved_namespace', {
          artifactId,
        }),
      );
    }
    const invalidMetadata = checkControlMetadata(request.metadata);
    if (invalidMetadata) return err(invalidMetadata);
    if (request.metadata?.[META_AUTHORIZED_WRITER] === null) {
      return err(validationError('invalid_argument', 'authorized_writer cannot be removed', { key: META_AUTHORIZED_WRITER }));
    }

    const existing = await this.ctx.store.artifacts.get(artifactId);
    return existing ? this.update(callerId, existing, request) : this.create(callerId, request);
  }

  private async create(callerId: string, request: WriteRequest): Promise<Result<WriteOutcome>> {
    const contractId = request.accessContractId;
    if (!contractId) {
      return err(
        validationError('missing_argument', 'Creating an artifact requires access_contract_id', {
          field: 'access_contract_id',
        }),
      );
    }
    if (!(await this.ctx.permissions.contractExists(contractId))) {
      return err(validationError('invalid_argument', `Unknown access contract: ${contractId}`, { contractId }));
    }
    if (request.hasStanding && (await this.ctx.ledger.hasPrincipal(request.artifactId))) {
      return err(alreadyExistsError('Principal', request.artifactId));
    }

    const metadata = mergeMetadata({}, request.metadata);
    if (metadata[META_AUTHORIZED_WRITER] === undefined) metadata[META_AUTHORIZED_WRITER] = callerId;
    if (usesAuthorizedPrincipal(contractId) && metadata[META_AUTHORIZED_PRINCIPAL] === undefined) {
      metadata[META_AUTHORIZED_PRINCIPAL] = callerId;
    }

    const now = isoAt(this.ctx.clock);
    const artifact: Artifact = {
      id: request.artifactId,
      type: request.artifactType,
      content: request.content,
      executable: request.executable,
      createdBy: callerId,
      accessContractId: contractId,
      metadata,
      price: request.price,
      readPrice: request.readPrice,
      hasStanding: request.hasStanding,
      kernelProtected: false,
      deleted: false,
      createdAt: now,
      updatedAt: now,
    };
    if (request.code !== undefined) artifact.code = request.code;
    if (request.interface) artifact.interface = request.interface;

    const diskDelta = artifactSize(artifact);
    const charged = await this.applyDiskDelta(callerId, diskDelta);
    if (!charged.ok) return charged;

    const stored = await this.ctx.store.artifacts.put(artifact);
    if (artifact.hasStanding) {
      const principal = await this.ctx.ledger.createPrincipal({ id: artifact.id, scrip: 0 });
      if (!principal.ok) return principal;
    }
    return ok({ artifact: stored, created: true, diskDelta });
  }

  private async update(callerId: string, existing: Artifact, request: WriteRequest): Promise<Result<WriteOutcome>> {
    const guard = await this.guardMutation(callerId, existing, PermissionAction.Write);
    if (guard) return err(guard);

    const contractId = request.accessContractId ?? existing.accessContractId;
    if (contractId !== existing.accessContractId) {
      if (callerId !== existing.createdBy) {
        return err(
          permissionError(`Only the creator of ${existing.id} may change its access contract`, 'not_owner', {
            artifactId: existing.id,
          }),
        );
      }
      if (!(await this.ctx.permissions.contractExists(contractId))) {
        return err(validationError('invalid_argument', `Unknown access contract: ${contractId}`, { contractId }));
      }
    }

    const gainsStanding = request.hasStanding && !existing.hasStanding;
    if (gainsStanding && (await this.ctx.ledger.hasPrincipal(existing.id))) {
      return err(alreadyExistsError('Principal', existing.id));
    }

    const metadata = mergeMetadata(existing.metadata, request.metadata);
    stampPreviousWriter(existing, metadata);

    const updated: Artifact = {
      ...existing,
      type: request.artifactType,
      content: request.content,
      executable: request.executable,
      accessContractId: contractId,
      metadata,
      price: request.price,
      readPrice: request.readPrice,
      hasStanding: existing.hasStanding || request.hasStanding,
      updatedAt: isoAt(this.ctx.clock),
    };
    if (request.code !== undefined) updated.code = request.code;
    if (request.interface) updated.interface = request.interface;

    const diskDelta = artifactSize(updated) - artifactSize(existing);
    const charged = await this.applyDiskDelta(callerId, diskDelta);
    if (!charged.ok) return charged;

    const stored = await this.ctx.store.artifacts.put(updated);
    if (gainsStanding) {
      const principal = await this.ctx.ledger.createPrincipal({ id: existing.id, scrip: 0 });
      if (!principal.ok) return principal;
    }
    return ok({ artifact: stored, created: false, diskDelta });
  }

  /** Exact, unique-match string replacement in the artifact's content. */
  async edit(callerId: string, artifactId: string, oldString: string, newString: string): Promise<Result<WriteOutcome>> {
    const found = await this.require(artifactId);
    if (!found.ok) return found;
    const existing = found.value;
    const guard = await this.guardMutation(callerId, existing, PermissionAction.Edit);
    if (guard) return err(guard);

    if (oldString === newString) {
      return err(validationError('no_op_edit', 'old_string and new_string are identical', { artifactId }));
    }
    if (oldString.length === 0) {
      return err(validationError('invalid_argument', 'old_string must not be empty', { artifactId }));
    }
    const occurrences = existing.content.split(oldString).length - 1;
    if (occurrences === 0) {
      return err(validationError('not_present', `old_string not found in ${artifactId}`, { artifactId }));
    }
    if (occurrences > 1) {
      return err(
        validationError('not_unique', `old_string occurs ${occurrences} times in ${artifactId}`, {
          artifactId,
          occurrences,
        }),
      );
    }

    const content = existing.content.replace(oldString, () => newString);
    return this.replaceContent(callerId, existing, content);
  }

  /** Store new content for an artifact whose permission checks already passed. */
  async replaceContent(callerId: string, existing: Artifact, content: string): Promise<Result<WriteOutcome>> {
    const updated: Artifact = { ...existing, content, updatedAt: isoAt(this.ctx.clock) };
    const diskDelta = artifactSize(updated) - artifactSize(existing);
    const charged = await this.applyDiskDelta(callerId, diskDelta);
    if (!charged.ok) return charged;
    const stored = await this.ctx.store.artifacts.put(updated);
    return ok({ artifact: stored, created: false, diskDelta });
  }

  /** Soft delete. Content and disk usage are retained. */
  async remove(callerId: string, artifactId: string): Promise<Result<Artifact>> {
    const found = await this.require(artifactId);
    if (!found.ok) return found;
    const existing = found.value;
    const guard = await this.guardMutation(callerId, existing, PermissionAction.Delete);
    if (guard) return err(guard);

    const now = isoAt(this.ctx.clock);
    return ok(
      await this.ctx.store.artifacts.put({
        ...existing,
        deleted: true,
        deletedAt: now,
        deletedBy: callerId,
        updatedAt: now,
      }),
    );
  }

  /** Contract-checked read. Payment of the read price is left to the caller. */
  async read(callerId: string, artifactId: string): Promise<Result<ReadOutcome>> {
    const found = await this.require(artifactId);
    if (!found.ok) return found;
    const artifact = found.value;
    if (artifact.deleted) return err(deletedError(artifactId));
    const permission = await this.ctx.permissions.check(callerId, PermissionAction.Read, artifact);
    if (!permission.allowed) {
      return err(permissionError(permission.reason, 'not_authorized', { artifactId, action: PermissionAction.Read }));
    }
    const recipient = permission.scripRecipient ?? artifactController(artifact) ?? artifact.createdBy;
    return ok({ artifact, recipient });
  }

  /** Set one metadata key; null removes it. */
  async updateMetadata(callerId: string, artifactId: string, key: string, value: JsonValue): Promise<Result<Artifact>> {
    if (!key) return err(validationError('missing_argument', 'Metadata key is required', { field: 'key' }));
    if (key === META_PREVIOUS_WRITER) {
      return err(permissionError(`Metadata key '${key}' is maintained by the kernel`, 'kernel_protected', { key }));
    }
    const invalid = checkControlMetadata({ [key]: value });
    if (invalid) return err(invalid);
    if (key === META_AUTHORIZED_WRITER && value === null) {
      return err(validationError('invalid_argument', 'authorized_writer cannot be removed', { key }));
    }

    const found = await this.require(artifactId);
    if (!found.ok) return found;
    const existing = found.value;
    const guard = await this.guardMutation(callerId, existing, PermissionAction.Write);
    if (guard) return err(guard);

    const metadata: ArtifactMetadata = { ...existing.metadata };
    if (value === null) delete metadata[key];
    else metadata[key] = value;
    stampPreviousWriter(existing, metadata);

    return ok(
      await this.ctx.store.artifacts.put({ ...existing, metadata, updatedAt: isoAt(this.ctx.clock) }),
    );
  }

  private async require(artifactId: string): Promise<Result<Artifact>> {
    const artifact = await this.ctx.store.artifacts.get(artifactId);
    return artifact ? ok(artifact) : err(notFoundError('Artifact', artifactId));
  }

  private async guardMutation(callerId: string, target: Artifact, action: PermissionAction): Promise<KernelError | null> {
    if (target.deleted) return deletedError(target.id);
    if (target.kernelProtected) {
      return permissionError(`Artifact ${target.id} is kernel protected`, 'kernel_protected', { artifactId: target.id });
    }
    const permission = await this.ctx.permissions.check(callerId, action, target);
    if (!permission.allowed) {
      return permissionError(permission.reason, 'not_authorized', { artifactId: target.id, action });
    }
    return null;
  }

  /** Charge growth to the caller's disk quota; release shrinkage up to what the caller uses. */
  private async applyDiskDelta(callerId: string, delta: number): Promise<Result<void>> {
    if (delta > 0) {
      const consumed = await this.ctx.ledger.consumeQuota(callerId, RESOURCE_DISK, delta);
      return consumed.ok ? ok(undefined) : consumed;
    }
    if (delta < 0) {
      const { used } = await this.ctx.ledger.getQuota(callerId, RESOURCE_DISK);
      const release = Math.min(-delta, used);
      if (release > 0) {
        const released = await this.ctx.ledger.releaseQuota(callerId, RESOURCE_DISK, release);
        if (!released.ok) return released;
      }
    }
    return ok(undefined);
  }
}

/**
 * Apply a metadata patch: null removes a key. `previous_writer` is
 * kernel-maintained, so a supplied value is ignored.
 */
function mergeMetadata(base: ArtifactMetadata, patch: ArtifactMetadata | undefined): ArtifactMetadata {
  const merged: ArtifactMetadata = { ...base };
  for (const [key, value] of Object.entries(patch ?? {})) {
    if (key === META_PREVIOUS_WRITER) continue;
    if (value === null) delete merged[key];
    else merged[key] = value;
  }
  return merged;
}

/** Record the outgoing controller whenever `authorized_writer` changes. */
function stampPreviousWriter(existing: Artifact, metadata: ArtifactMetadata): void {
  const before = artifactController(existing);
  const after = metadata[META_AUTHORIZED_WRITER];
  if (before !== null && typeof after === 'string' && after !== before) {
    metadata[META_PREVIOUS_WRITER] = before;
  }
}

function checkControlMetadata(metadata: ArtifactMetadata | undefined): KernelError | null {
  if (!metadata) return null;
  for (const key of [META_AUTHORIZED_WRITER, META_AUTHORIZED_PRINCIPAL]) {
    const value = metadata[key];
    if (value !== undefined && value !== null && (typeof value !== 'string' || value.length === 0)) {
      return validationError('invalid_type', `Metadata '${key}' must be a non-empty string`, { key });
    }
  }
  return null;
}
