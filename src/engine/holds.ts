/**
 * Scrip holds.
 *
 * While an invocation runs, the price it will be charged is held on the
 * payer's balance. Facade debits see only the unheld balance, so the code
 * being paid for cannot spend the money that settles it.
 */

import type { Ledger } from '../ledger/ledger';

export class ScripHolds {
  private held = new Map<string, number>();

  /** Place a hold and return the function that releases it. */
  place(principalId: string, amount: number): () => void {
    if (amount <= 0) return () => undefined;
    this.held.set(principalId, this.heldBy(principalId) + amount);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const remaining = this.heldBy(principalId) - amount;
      if (remaining > 0) this.held.set(principalId, remaining);
      else this.held.delete(principalId);
    };
  }

  heldBy(principalId: string): number {
    return this.held.get(principalId) ?? 0;
  }
}

/** Balance minus held scrip. */
export async function spendableScrip(ledger: Ledger, holds: ScripHolds, principalId: string): Promise<number> {
  return (await ledger.getScrip(principalId)) - holds.heldBy(principalId);
}
