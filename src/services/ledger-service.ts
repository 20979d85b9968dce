/**
 * genesis_ledger: balances, transfers and charge delegations as an
 * invocable service. Every mutation goes through the invocation's
 * KernelActions facade, so it acts for the invoker only.
 */

import { JsonValue } from '../domain/artifact';
import { DEFAULT_DELEGATION_WINDOW_SECONDS, DelegationEntry } from '../domain/delegation';
import { err, ok, validationError } from '../domain/errors';
import { RESOURCE_DISK } from '../domain/principal';
import { KernelService, argPositiveInteger, argPositiveNumber, argString } from '../engine/service-registry';

export const LEDGER_SERVICE_ID = 'genesis_ledger';

type LedgerMethod =
  | 'balance'
  | 'all_balances'
  | 'transfer'
  | 'transfer_quota'
  | 'transfer_llm_budget'
  | 'grant_delegation'
  | 'revoke_delegation';

function optionalPositive(args: JsonValue[], index: number): number | undefined | null {
  const value = args[index];
  if (value === undefined || value === null) return undefined;
  return argPositiveNumber(args, index) ?? null;
}

export function createLedgerService(): KernelService<LedgerMethod> {
  return {
    id: LEDGER_SERVICE_ID,
    description: 'Scrip balances, transfers and charge delegations',
    methods: {
      balance: {
        description: 'Balance and quotas of a principal (default: yourself): [principal_id?]',
        cost: 0,
        args: { principal_id: 'string?' },
        handler: async (args, ctx) =>
          ctx.state.query('principal', { principal_id: argString(args, 0) ?? ctx.invokerId }),
      },

      all_balances: {
        description: 'Scrip balance of every principal',
        cost: 0,
        handler: async (_args, ctx) => ctx.state.query('balances'),
      },

      transfer: {
        description: 'Send scrip: [to, amount]',
        cost: 0,
        args: { to: 'string', amount: 'integer' },
        handler: async (args, ctx) => {
          const to = argString(args, 0);
          const amount = argPositiveInteger(args, 1);
          if (!to || amount === undefined) {
            return err(validationError('invalid_argument', 'transfer takes [to, amount] with a positive integer amount'));
          }
          const sent = await ctx.actions.transferScrip(ctx.invokerId, to, amount);
          if (!sent.ok) return sent;
          return ok({ from: ctx.invokerId, to, amount, balance: sent.value.fromBalance });
        },
      },

      transfer_quota: {
        description: 'Give away unused quota headroom: [to, resource, amount]',
        cost: 0,
        args: { to: 'string', resource: 'string', amount: 'number' },
        handler: async (args, ctx) => {
          const to = argString(args, 0);
          const resource = argString(args, 1) ?? RESOURCE_DISK;
          const amount = argPositiveNumber(args, 2);
          if (!to || amount === undefined) {
            return err(validationError('invalid_argument', 'transfer_quota takes [to, resource, amount]'));
          }
          const moved = await ctx.actions.transferQuota(ctx.invokerId, to, resource, amount);
          if (!moved.ok) return moved;
          return ok({
            to,
            resource,
            amount,
            available: await ctx.state.getAvailableCapacity(ctx.invokerId, resource),
          });
        },
      },

      transfer_llm_budget: {
        description: 'Send LLM budget: [to, amount]',
        cost: 0,
        args: { to: 'string', amount: 'number' },
        handler: async (args, ctx) => {
          const to = argString(args, 0);
          const amount = argPositiveNumber(args, 1);
          if (!to || amount === undefined) {
            return err(validationError('invalid_argument', 'transfer_llm_budget takes [to, amount]'));
          }
          const moved = await ctx.actions.transferLlmBudget(ctx.invokerId, to, amount);
          if (!moved.ok) return moved;
          return ok({ to, amount, remaining: await ctx.state.getLlmBudget(ctx.invokerId) });
        },
      },

      grant_delegation: {
        description:
          'Let a charger bill invocations to you: [charger_id, max_per_call?, max_per_window?, window_seconds?, expires_at?]',
        cost: 0,
        args: {
          charger_id: 'string',
          max_per_call: 'number?',
          max_per_window: 'number?',
          window_seconds: 'number?',
          expires_at: 'string?',
        },
        handler: async (args, ctx) => {
          const chargerId = argString(args, 0);
          const maxPerCall = optionalPositive(args, 1);
          const maxPerWindow = optionalPositive(args, 2);
          const windowSeconds = optionalPositive(args, 3);
          const expiresAt = argString(args, 4);
          if (!chargerId || maxPerCall === null || maxPerWindow === null || windowSeconds === null) {
            return err(
              validationError(
                'invalid_argument',
                'grant_delegation takes [charger_id, max_per_call?, max_per_window?, window_seconds?, expires_at?]',
              ),
            );
          }
          const entry: DelegationEntry = {
            chargerId,
            windowSeconds: windowSeconds ?? DEFAULT_DELEGATION_WINDOW_SECONDS,
          };
          if (maxPerCall !== undefined) entry.maxPerCall = maxPerCall;
          if (maxPerWindow !== undefined) entry.maxPerWindow = maxPerWindow;
          if (expiresAt !== undefined) entry.expiresAt = expiresAt;
          const granted = await ctx.actions.grantChargeDelegation(ctx.invokerId, entry);
          if (!granted.ok) return granted;
          return ok({ payer_id: ctx.invokerId, chargers: granted.value.map((e) => e.chargerId) });
        },
      },

      revoke_delegation: {
        description: 'Withdraw a charge delegation: [charger_id]',
        cost: 0,
        args: { charger_id: 'string' },
        handler: async (args, ctx) => {
          const chargerId = argString(args, 0);
          if (!chargerId) return err(validationError('invalid_argument', 'revoke_delegation takes [charger_id]'));
          const revoked = await ctx.actions.revokeChargeDelegation(ctx.invokerId, chargerId);
          return revoked.ok ? ok({ payer_id: ctx.invokerId, charger_id: chargerId }) : revoked;
        },
      },
    },
  };
}
