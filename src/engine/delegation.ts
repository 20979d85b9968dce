/**
 * Charge delegation manager.
 *
 * Grants live in a kernel-protected private artifact per payer
 * (`charge_delegation:<payer>`). Charge history for rolling windows is kept
 * in memory only; windows restart with the process.
 */

import {
  ARTIFACT_TYPE_DELEGATION,
  Artifact,
  META_AUTHORIZED_PRINCIPAL,
  META_AUTHORIZED_WRITER,
  isRecord,
} from '../domain/artifact';
import { Clock, isoAt, systemClock } from '../domain/clock';
import { KernelContractId } from '../domain/contracts';
import {
  DEFAULT_DELEGATION_WINDOW_SECONDS,
  DelegationEntry,
  delegationArtifactId,
} from '../domain/delegation';
import { Result, err, ok, validationError } from '../domain/errors';
import { ArtifactStore } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

export interface ChargeAuthorization {
  authorized: boolean;
  reason: string;
}

interface ChargeRecord {
  at: number;
  amount: number;
}

function parseEntry(raw: unknown): DelegationEntry | null {
  if (!isRecord(raw) || typeof raw.chargerId !== 'string') return null;
  const entry: DelegationEntry = {
    chargerId: raw.chargerId,
    windowSeconds: typeof raw.windowSeconds === 'number' ? raw.windowSeconds : DEFAULT_DELEGATION_WINDOW_SECONDS,
  };
  if (typeof raw.maxPerCall === 'number') entry.maxPerCall = raw.maxPerCall;
  if (typeof raw.maxPerWindow === 'number') entry.maxPerWindow = raw.maxPerWindow;
  if (typeof raw.expiresAt === 'string') entry.expiresAt = raw.expiresAt;
  return entry;
}

function parseEntries(content: string): DelegationEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  const entries: DelegationEntry[] = [];
  for (const raw of parsed) {
    const entry = parseEntry(raw);
    if (entry) entries.push(entry);
  }
  return entries;
}

export class DelegationManager {
  private history = new Map<string, ChargeRecord[]>();
  private log: Logger;

  constructor(
    private artifacts: ArtifactStore,
    private options: { maxHistory: number },
    private clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'delegation' });
  }

  async list(payerId: string): Promise<DelegationEntry[]> {
    const artifact = await this.artifacts.get(delegationArtifactId(payerId));
    return artifact ? parseEntries(artifact.content) : [];
  }

  /** Add or replace the grant for `entry.chargerId`. Only the payer may call this. */
  async grant(payerId: string, entry: DelegationEntry): Promise<Result<DelegationEntry[]>> {
    if (!entry.chargerId) return err(validationError('missing_argument', 'Delegation requires a charger id'));
    if (entry.chargerId === payerId) {
      return err(validationError('invalid_argument', 'A principal cannot delegate to itself'));
    }
    for (const [field, value] of [
      ['maxPerCall', entry.maxPerCall],
      ['maxPerWindow', entry.maxPerWindow],
    ] as const) {
      if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
        return err(validationError('invalid_argument', `${field} must be non-negative`));
      }
    }
    if (!Number.isInteger(entry.windowSeconds) || entry.windowSeconds <= 0) {
      return err(validationError('invalid_argument', 'windowSeconds must be a positive integer'));
    }
    if (entry.expiresAt !== undefined && Number.isNaN(Date.parse(entry.expiresAt))) {
      return err(validationError('invalid_argument', `Invalid expiresAt: ${entry.expiresAt}`));
    }

    const entries = (await this.list(payerId)).filter((e) => e.chargerId !== entry.chargerId);
    entries.push(entry);
    await this.save(payerId, entries);
    this.log.info('Delegation granted', { payerId, chargerId: entry.chargerId });
    return ok(entries);
  }

  /** Returns false when there was no grant to remove. */
  async revoke(payerId: string, chargerId: string): Promise<boolean> {
    const entries = await this.list(payerId);
    const remaining = entries.filter((e) => e.chargerId !== chargerId);
    if (remaining.length === entries.length) return false;
    await this.save(payerId, remaining);
    this.history.delete(this.key(payerId, chargerId));
    this.log.info('Delegation revoked', { payerId, chargerId });
    return true;
  }

  /** Expiry, per-call cap, then rolling-window cap. */
  async authorizeCharge(chargerId: string, payerId: string, amount: number): Promise<ChargeAuthorization> {
    const entry = (await this.list(payerId)).find((e) => e.chargerId === chargerId);
    if (!entry) {
      return { authorized: false, reason: `No delegation from '${payerId}' to '${chargerId}'` };
    }
    const now = this.clock.now();
    if (entry.expiresAt !== undefined && now >= Date.parse(entry.expiresAt)) {
      return { authorized: false, reason: `Delegation expired at ${entry.expiresAt}` };
    }
    if (entry.maxPerCall !== undefined && amount > entry.maxPerCall) {
      return { authorized: false, reason: `Amount ${amount} exceeds per-call cap ${entry.maxPerCall}` };
    }
    if (entry.maxPerWindow !== undefined) {
      const used = this.windowUsage(payerId, chargerId, entry.windowSeconds, now);
      if (used + amount > entry.maxPerWindow) {
        return {
          authorized: false,
          reason: `Amount ${amount} would exceed window cap ${entry.maxPerWindow} (used: ${used})`,
        };
      }
    }
    return { authorized: true, reason: 'ok' };
  }

  /** Record a settled charge for window accounting. */
  async recordCharge(payerId: string, chargerId: string, amount: number): Promise<void> {
    const key = this.key(payerId, chargerId);
    const records = this.history.get(key) ?? [];
    const now = this.clock.now();
    records.push({ at: now, amount });

    const entry = (await this.list(payerId)).find((e) => e.chargerId === chargerId);
    const windowMs = (entry?.windowSeconds ?? DEFAULT_DELEGATION_WINDOW_SECONDS) * 1000;
    const pruned = records.filter((r) => r.at > now - windowMs).slice(-this.options.maxHistory);
    this.history.set(key, pruned);
  }

  windowUsage(payerId: string, chargerId: string, windowSeconds: number, now: number = this.clock.now()): number {
    const cutoff = now - windowSeconds * 1000;
    return (this.history.get(this.key(payerId, chargerId)) ?? [])
      .filter((r) => r.at > cutoff)
      .reduce((sum, r) => sum + r.amount, 0);
  }

  private key(payerId: string, chargerId: string): string {
    return `${payerId}\u0000${chargerId}`;
  }

  private async save(payerId: string, entries: DelegationEntry[]): Promise<void> {
    const id = delegationArtifactId(payerId);
    const existing = await this.artifacts.get(id);
    const now = isoAt(this.clock);
    const artifact: Artifact = {
      id,
      type: ARTIFACT_TYPE_DELEGATION,
      content: JSON.stringify(entries),
      executable: false,
      createdBy: payerId,
      accessContractId: KernelContractId.Private,
      metadata: { [META_AUTHORIZED_PRINCIPAL]: payerId, [META_AUTHORIZED_WRITER]: payerId },
      price: 0,
      readPrice: 0,
      hasStanding: false,
      kernelProtected: true,
      deleted: false,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.artifacts.put(artifact);
  }
}
