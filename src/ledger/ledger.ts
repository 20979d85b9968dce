/**
 * Ledger: scrip balances and resource quotas.
 *
 * Every mutation validates first and then commits all touched principals in
 * a single `putMany`, so a failed call leaves no partial state behind.
 * Callers serialize access through the executor's dispatch queue.
 */

import {
  KernelError,
  Result,
  alreadyExistsError,
  err,
  insufficientFundsError,
  notFoundError,
  ok,
  quotaExceededError,
  validationError,
} from '../domain/errors';
import { Clock, isoAt, systemClock } from '../domain/clock';
import { Principal, QuotaEntry, availableCapacity } from '../domain/principal';
import { PrincipalStore } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

export interface LedgerOptions {
  allowNegativeScrip: boolean;
}

export interface NewPrincipal {
  id: string;
  scrip?: number;
  /** Allocatable quota limits. */
  quotas?: Record<string, number>;
  /** Depletable balances. */
  resources?: Record<string, number>;
  hasStanding?: boolean;
}

export interface TransferReceipt {
  from: string;
  to: string;
  amount: number;
  fromBalance: number;
  toBalance: number;
}

function positiveInteger(amount: number, field = 'amount'): KernelError | null {
  if (!Number.isInteger(amount) || amount <= 0) {
    return validationError('invalid_argument', `${field} must be a positive integer, got ${amount}`, { [field]: amount });
  }
  return null;
}

function positiveNumber(amount: number, field = 'amount'): KernelError | null {
  if (!Number.isFinite(amount) || amount <= 0) {
    return validationError('invalid_argument', `${field} must be a positive number, got ${amount}`, { [field]: amount });
  }
  return null;
}

export class Ledger {
  private log: Logger;

  constructor(
    private principals: PrincipalStore,
    private options: LedgerOptions = { allowNegativeScrip: false },
    private clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'ledger' });
  }

  // --- Principals ---

  async createPrincipal(spec: NewPrincipal): Promise<Result<Principal>> {
    if (!spec.id) return err(validationError('missing_argument', 'Principal id is required'));
    const scrip = spec.scrip ?? 0;
    if (!Number.isInteger(scrip) || scrip < 0) {
      return err(validationError('invalid_argument', 'Starting scrip must be a non-negative integer'));
    }
    const quotas: Record<string, QuotaEntry> = {};
    for (const [resource, limit] of Object.entries(spec.quotas ?? {})) {
      quotas[resource] = { limit, used: 0 };
    }
    const principal: Principal = {
      id: spec.id,
      scrip,
      quotas,
      resources: { ...spec.resources },
      hasStanding: spec.hasStanding ?? true,
      createdAt: isoAt(this.clock),
    };
    const created = await this.principals.create(principal);
    if (!created) return err(alreadyExistsError('Principal', spec.id));
    this.log.debug('Principal created', { principalId: spec.id, scrip });
    return ok(created);
  }

  async getPrincipal(id: string): Promise<Principal | null> {
    return this.principals.get(id);
  }

  async hasPrincipal(id: string): Promise<boolean> {
    return (await this.principals.get(id)) !== null;
  }

  async listPrincipals(): Promise<Principal[]> {
    return this.principals.list();
  }

  private async require(id: string): Promise<Result<Principal>> {
    const principal = await this.principals.get(id);
    return principal ? ok(principal) : err(notFoundError('Principal', id));
  }

  // --- Scrip ---

  /** Balance, or 0 for unknown principals. */
  async getScrip(id: string): Promise<number> {
    return (await this.principals.get(id))?.scrip ?? 0;
  }

  async canAfford(id: string, amount: number): Promise<boolean> {
    if (amount <= 0) return true;
    if (this.options.allowNegativeScrip) return this.hasPrincipal(id);
    return (await this.getScrip(id)) >= amount;
  }

  async creditScrip(id: string, amount: number): Promise<Result<number>> {
    if (amount === 0) return ok(await this.getScrip(id));
    const invalid = positiveInteger(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    principal.scrip += amount;
    await this.principals.putMany([principal]);
    return ok(principal.scrip);
  }

  /** Returns false without side effects when the balance is insufficient. */
  async deductScrip(id: string, amount: number): Promise<boolean> {
    const result = await this.debit(id, amount);
    return result.ok;
  }

  /** Like deductScrip, but reports why. */
  async debit(id: string, amount: number): Promise<Result<number>> {
    const invalid = positiveInteger(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    if (!this.options.allowNegativeScrip && principal.scrip < amount) {
      return err(insufficientFundsError(id, amount, principal.scrip));
    }
    principal.scrip -= amount;
    await this.principals.putMany([principal]);
    return ok(principal.scrip);
  }

  async transferScrip(from: string, to: string, amount: number): Promise<Result<TransferReceipt>> {
    const invalid = positiveInteger(amount);
    if (invalid) return err(invalid);
    if (from === to) {
      return err(validationError('invalid_argument', 'Cannot transfer scrip to the same principal', { from, to }));
    }
    const source = await this.require(from);
    if (!source.ok) return source;
    const target = await this.require(to);
    if (!target.ok) return target;
    const payer = source.value;
    const payee = target.value;
    if (!this.options.allowNegativeScrip && payer.scrip < amount) {
      return err(insufficientFundsError(from, amount, payer.scrip));
    }
    payer.scrip -= amount;
    payee.scrip += amount;
    await this.principals.putMany([payer, payee]);
    this.log.debug('Scrip transferred', { from, to, amount });
    return ok({ from, to, amount, fromBalance: payer.scrip, toBalance: payee.scrip });
  }

  async totalScrip(): Promise<number> {
    const all = await this.principals.list();
    return all.reduce((sum, p) => sum + p.scrip, 0);
  }

  /**
   * Split `amount` evenly across all principals not in `exclude`. The integer
   * remainder goes to the first eligible principal in id order. When `fromId`
   * is given the amount is debited from it in the same commit; otherwise the
   * amount is newly credited.
   */
  async distributeUbi(
    amount: number,
    exclude: string[],
    fromId?: string,
  ): Promise<Result<Record<string, number>>> {
    if (amount === 0) return ok({});
    const invalid = positiveInteger(amount);
    if (invalid) return err(invalid);

    const all = await this.principals.list();
    const excluded = new Set(exclude);
    if (fromId) excluded.add(fromId);
    const eligible = all.filter((p) => !excluded.has(p.id));
    if (eligible.length === 0) return ok({});

    const touched: Principal[] = [];
    if (fromId) {
      const source = all.find((p) => p.id === fromId);
      if (!source) return err(notFoundError('Principal', fromId));
      if (!this.options.allowNegativeScrip && source.scrip < amount) {
        return err(insufficientFundsError(fromId, amount, source.scrip));
      }
      source.scrip -= amount;
      touched.push(source);
    }

    const share = Math.floor(amount / eligible.length);
    const remainder = amount - share * eligible.length;
    const shares: Record<string, number> = {};
    eligible.forEach((principal, index) => {
      const portion = share + (index === 0 ? remainder : 0);
      if (portion > 0) {
        principal.scrip += portion;
        shares[principal.id] = portion;
        touched.push(principal);
      }
    });
    await this.principals.putMany(touched);
    this.log.debug('UBI distributed', { amount, recipients: Object.keys(shares).length });
    return ok(shares);
  }

  // --- Allocatable quotas ---

  /** Quota entry, or a zero entry when none is set. */
  async getQuota(id: string, resource: string): Promise<QuotaEntry> {
    const entry = (await this.principals.get(id))?.quotas[resource];
    return entry ? { limit: entry.limit, used: entry.used } : { limit: 0, used: 0 };
  }

  async getAvailableCapacity(id: string, resource: string): Promise<number> {
    const principal = await this.principals.get(id);
    return principal ? availableCapacity(principal, resource) : 0;
  }

  /** Rejected when the new limit is below current usage. */
  async setQuota(id: string, resource: string, limit: number): Promise<Result<QuotaEntry>> {
    if (!Number.isFinite(limit) || limit < 0) {
      return err(validationError('invalid_argument', `Quota limit must be non-negative, got ${limit}`));
    }
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    const entry = principal.quotas[resource] ?? { limit: 0, used: 0 };
    if (limit < entry.used) {
      return err(
        validationError('invalid_argument', `Quota limit ${limit} is below current usage ${entry.used}`, {
          resource,
          limit,
          used: entry.used,
        }),
      );
    }
    principal.quotas[resource] = { limit, used: entry.used };
    await this.principals.putMany([principal]);
    return ok({ ...principal.quotas[resource] });
  }

  async consumeQuota(id: string, resource: string, amount: number): Promise<Result<QuotaEntry>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    const entry = principal.quotas[resource] ?? { limit: 0, used: 0 };
    const available = entry.limit - entry.used;
    if (amount > available) {
      return err(quotaExceededError(id, resource, amount, Math.max(0, available)));
    }
    principal.quotas[resource] = { limit: entry.limit, used: entry.used + amount };
    await this.principals.putMany([principal]);
    return ok({ ...principal.quotas[resource] });
  }

  /** Release usage. Clamped at zero. */
  async releaseQuota(id: string, resource: string, amount: number): Promise<Result<QuotaEntry>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    const entry = principal.quotas[resource] ?? { limit: 0, used: 0 };
    principal.quotas[resource] = { limit: entry.limit, used: Math.max(0, entry.used - amount) };
    await this.principals.putMany([principal]);
    return ok({ ...principal.quotas[resource] });
  }

  /** Move unused limit headroom. Usage never moves. */
  async transferQuota(from: string, to: string, resource: string, amount: number): Promise<Result<void>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    if (from === to) {
      return err(validationError('invalid_argument', 'Cannot transfer quota to the same principal', { from, to }));
    }
    const source = await this.require(from);
    if (!source.ok) return source;
    const target = await this.require(to);
    if (!target.ok) return target;
    const giver = source.value;
    const receiver = target.value;
    const giverEntry = giver.quotas[resource] ?? { limit: 0, used: 0 };
    const headroom = giverEntry.limit - giverEntry.used;
    if (amount > headroom) {
      return err(quotaExceededError(from, resource, amount, Math.max(0, headroom)));
    }
    const receiverEntry = receiver.quotas[resource] ?? { limit: 0, used: 0 };
    giver.quotas[resource] = { limit: giverEntry.limit - amount, used: giverEntry.used };
    receiver.quotas[resource] = { limit: receiverEntry.limit + amount, used: receiverEntry.used };
    await this.principals.putMany([giver, receiver]);
    this.log.debug('Quota transferred', { from, to, resource, amount });
    return ok(undefined);
  }

  // --- Depletable resources ---

  async getResource(id: string, resource: string): Promise<number> {
    return (await this.principals.get(id))?.resources[resource] ?? 0;
  }

  async creditResource(id: string, resource: string, amount: number): Promise<Result<number>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    principal.resources[resource] = (principal.resources[resource] ?? 0) + amount;
    await this.principals.putMany([principal]);
    return ok(principal.resources[resource]);
  }

  async spendResource(id: string, resource: string, amount: number): Promise<Result<number>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    const found = await this.require(id);
    if (!found.ok) return found;
    const principal = found.value;
    const balance = principal.resources[resource] ?? 0;
    if (balance < amount) return err(quotaExceededError(id, resource, amount, balance));
    principal.resources[resource] = balance - amount;
    await this.principals.putMany([principal]);
    return ok(principal.resources[resource]);
  }

  async transferResource(from: string, to: string, resource: string, amount: number): Promise<Result<void>> {
    const invalid = positiveNumber(amount);
    if (invalid) return err(invalid);
    if (from === to) {
      return err(validationError('invalid_argument', 'Cannot transfer a resource to the same principal', { from, to }));
    }
    const source = await this.require(from);
    if (!source.ok) return source;
    const target = await this.require(to);
    if (!target.ok) return target;
    const giver = source.value;
    const receiver = target.value;
    const balance = giver.resources[resource] ?? 0;
    if (balance < amount) return err(quotaExceededError(from, resource, amount, balance));
    giver.resources[resource] = balance - amount;
    receiver.resources[resource] = (receiver.resources[resource] ?? 0) + amount;
    await this.principals.putMany([giver, receiver]);
    return ok(undefined);
  }
}
