/**
 * Escrow: a seller hands control to genesis_escrow, lists the artifact, and
 * a buyer's payment and the change of control happen together or not at all.
 */

import { Artifact, JsonValue } from '../../src/domain/artifact';
import { Result, err, systemError } from '../../src/domain/errors';
import { ListingStatus } from '../../src/domain/escrow';
import { Authority } from '../../src/kernel/authority';
import { KernelActions } from '../../src/kernel/kernel-actions';
import { Kernel } from '../../src/runtime';
import { ESCROW_SERVICE_ID } from '../../src/services/escrow';
import { T0, act, balances, createTestKernel, writeIntent } from '../helpers';

const CREATED_AT = new Date(T0).toISOString();

/** Facade whose metadata updates always fail. */
class FailingHandover extends KernelActions {
  async updateArtifactMetadata(_callerId: string, artifactId: string): Promise<Result<Artifact>> {
    return err(systemError(`metadata store unavailable for ${artifactId}`));
  }
}

describe('EscrowService', () => {
  let kernel: Kernel;

  function escrow(principalId: string, method: string, args: JsonValue[] = []) {
    return act(kernel, principalId, { action_type: 'invoke_artifact', artifact_id: ESCROW_SERVICE_ID, method, args });
  }

  async function handToEscrow(artifactId: string): Promise<void> {
    await act(kernel, 'alice', {
      action_type: 'update_metadata',
      artifact_id: artifactId,
      key: 'authorized_writer',
      value: ESCROW_SERVICE_ID,
    });
  }

  beforeEach(async () => {
    ({ kernel } = await createTestKernel());
    await act(kernel, 'alice', writeIntent('widget', { access_contract_id: 'kernel_contract_transferable_freeware' }));
  });

  it('sells an artifact: scrip to the seller, control to the buyer', async () => {
    await handToEscrow('widget');
    const listed = await escrow('alice', 'deposit', ['widget', 40]);
    expect(listed.data?.result).toEqual({
      artifactId: 'widget',
      sellerId: 'alice',
      price: 40,
      status: 'active',
      createdAt: CREATED_AT,
    });

    const bought = await escrow('bob', 'purchase', ['widget']);
    expect(bought.data?.result).toEqual({
      artifactId: 'widget',
      sellerId: 'alice',
      price: 40,
      status: 'completed',
      createdAt: CREATED_AT,
      closedAt: CREATED_AT,
      purchasedBy: 'bob',
    });

    expect(await balances(kernel)).toMatchObject({ alice: 140, bob: 60, genesis_escrow: 0 });
    const widget = await kernel.context.store.artifacts.get('widget');
    expect(widget?.metadata).toEqual({ authorized_writer: 'bob', previous_writer: ESCROW_SERVICE_ID });
    expect(kernel.escrow.listings(true)).toEqual([]);
    expect(kernel.escrow.listings(false)[0].status).toBe(ListingStatus.Completed);
  });

  it('refuses to list an artifact escrow does not control', async () => {
    const result = await escrow('alice', 'deposit', ['widget', 40]);
    expect(result.errorCode).toBe('invalid_argument');
    expect(result.message).toBe('Transfer control of widget to genesis_escrow before listing it');
  });

  it('lets only the previous controller list it', async () => {
    await handToEscrow('widget');
    const result = await escrow('bob', 'deposit', ['widget', 40]);
    expect(result.errorCode).toBe('not_owner');
  });

  it('refuses a second active listing', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 40]);
    const again = await escrow('alice', 'deposit', ['widget', 50]);
    expect(again.errorCode).toBe('already_listed');
  });

  it('leaves everything unchanged when the buyer cannot pay', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 150]);
    const result = await escrow('bob', 'purchase', ['widget']);

    expect(result.errorCode).toBe('insufficient_funds');
    expect(await balances(kernel)).toMatchObject({ alice: 100, bob: 100, genesis_escrow: 0 });
    expect((await kernel.context.store.artifacts.get('widget'))?.metadata.authorized_writer).toBe(ESCROW_SERVICE_ID);
    expect(kernel.escrow.check('widget')?.status).toBe(ListingStatus.Active);
  });

  it('reserves a restricted listing for its buyer', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 40, 'carol']);

    expect((await escrow('bob', 'purchase', ['widget'])).errorCode).toBe('not_authorized');
    expect((await escrow('alice', 'purchase', ['widget'])).errorCode).toBe('not_authorized');
    expect((await escrow('carol', 'purchase', ['widget'])).success).toBe(true);
  });

  it('refuses a listing restricted to its seller', async () => {
    await handToEscrow('widget');
    const result = await escrow('alice', 'deposit', ['widget', 40, 'alice']);
    expect(result.errorCode).toBe('invalid_argument');
  });

  it('returns control to the seller on cancel', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 40]);

    expect((await escrow('bob', 'cancel', ['widget'])).errorCode).toBe('not_owner');
    const cancelled = await escrow('alice', 'cancel', ['widget']);
    expect(cancelled.data?.result).toMatchObject({ status: 'cancelled' });
    expect((await kernel.context.store.artifacts.get('widget'))?.metadata.authorized_writer).toBe('alice');

    const purchase = await escrow('bob', 'purchase', ['widget']);
    expect(purchase.errorCode).toBe('not_found');
  });

  it('keeps closed listings in the full history', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 40]);
    await escrow('alice', 'cancel', ['widget']);

    expect(kernel.escrow.listings(true)).toEqual([]);
    expect(kernel.escrow.listings(false).map((l) => l.status)).toEqual([ListingStatus.Cancelled]);

    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 45]);
    expect(kernel.escrow.listings(false).map((l) => [l.status, l.price])).toEqual([
      [ListingStatus.Cancelled, 40],
      [ListingStatus.Active, 45],
    ]);
  });

  it('refunds the buyer when control cannot be handed over', async () => {
    await handToEscrow('widget');
    await escrow('alice', 'deposit', ['widget', 40]);

    const failing = new FailingHandover(
      kernel.context,
      kernel.executor.ops,
      kernel.executor.invoker,
      Authority.root(),
    );
    const result = await kernel.escrow.purchase(
      { invokerId: 'bob', serviceId: ESCROW_SERVICE_ID, state: kernel.executor.state, actions: failing },
      'widget',
    );

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe('settlement_failed');
    expect(!result.ok && result.error.details).toEqual({ artifactId: 'widget', refunded: true });
    expect(await balances(kernel)).toMatchObject({ alice: 100, bob: 100, genesis_escrow: 0 });
    expect(kernel.escrow.check('widget')?.status).toBe(ListingStatus.Active);
  });
});
