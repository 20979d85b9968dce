/**
 * Kernel facades handed to running code: they act only for the invoker (and
 * the invoked artifact when it has standing), stop working when the call
 * returns, and bound how deeply invocations nest.
 */

import { MAX_INVOCATION_DEPTH } from '../../src/engine/invoke-handler';
import { InvocationKernel } from '../../src/engine/sandbox';
import { Kernel } from '../../src/runtime';
import { ScriptedSandbox, act, balances, createTestKernel, writeIntent } from '../helpers';

function requireKernel(kernel: InvocationKernel | undefined): InvocationKernel {
  if (!kernel) throw new Error('invoked without kernel facades');
  return kernel;
}

describe('Kernel facades', () => {
  let kernel: Kernel;
  let sandbox: ScriptedSandbox;
  let leaked: InvocationKernel | undefined;

  beforeEach(async () => {
    ({ kernel, sandbox } = await createTestKernel());
    leaked = undefined;
    sandbox.define('tipjar-v1', {
      tip: async (_args, request) => {
        const sent = await requireKernel(request.kernel).actions.transferScrip(request.callerId, 'alice', 7);
        return sent.ok;
      },
      steal: async (_args, request) => {
        const taken = await requireKernel(request.kernel).actions.transferScrip('carol', request.callerId, 5);
        return taken.ok ? 'taken' : taken.error.code;
      },
      keep: (_args, request) => {
        leaked = request.kernel;
        return null;
      },
    });
    sandbox.define('vault-v1', {
      payout: async (_args, request) => {
        const paid = await requireKernel(request.kernel).actions.transferScrip('vault', request.callerId, 5);
        return paid.ok ? paid.value.fromBalance : paid.error.code;
      },
    });
    sandbox.define('loop-v1', {
      recurse: async (_args, request) => {
        const inner = await requireKernel(request.kernel).actions.invokeArtifact(request.callerId, 'loop', 'recurse');
        return inner.ok ? inner.value.value : inner.error.code;
      },
    });
    await act(kernel, 'alice', writeIntent('tipjar', { executable: true, code: 'tipjar-v1' }));
  });

  it('acts for the invoker', async () => {
    const result = await act(kernel, 'bob', { action_type: 'invoke_artifact', artifact_id: 'tipjar', method: 'tip' });
    expect(result.data?.result).toBe(true);
    expect(await balances(kernel)).toMatchObject({ alice: 107, bob: 93 });
  });

  it('refuses to act for anyone else', async () => {
    const result = await act(kernel, 'bob', { action_type: 'invoke_artifact', artifact_id: 'tipjar', method: 'steal' });
    expect(result.data?.result).toBe('not_authorized');
    expect(await kernel.context.ledger.getScrip('carol')).toBe(100);

    const refused = await kernel.context.publisher.query({ types: ['kernel_transfer_scrip'] });
    expect(refused.items[0]).toMatchObject({ caller_id: 'carol', success: false, error_code: 'not_authorized' });
  });

  it('stops working once the invocation returns', async () => {
    await act(kernel, 'bob', { action_type: 'invoke_artifact', artifact_id: 'tipjar', method: 'keep' });
    const facade = requireKernel(leaked);

    const late = await facade.actions.transferScrip('bob', 'alice', 1);
    expect(!late.ok && late.error.message).toBe('Kernel access for this invocation has ended');
    const read = await facade.state.readArtifact('bob', 'tipjar');
    expect(!read.ok && read.error.code).toBe('not_authorized');
    expect(await kernel.context.ledger.getScrip('bob')).toBe(100);
  });

  it('acts for an invoked artifact that has standing', async () => {
    await act(kernel, 'alice', writeIntent('vault', { executable: true, code: 'vault-v1', has_standing: true }));
    await act(kernel, 'alice', { action_type: 'transfer', recipient_id: 'vault', amount: 20 });

    const result = await act(kernel, 'bob', { action_type: 'invoke_artifact', artifact_id: 'vault', method: 'payout' });
    expect(result.data?.result).toBe(15);
    expect(await balances(kernel)).toMatchObject({ alice: 80, bob: 105, vault: 15 });
  });

  it('limits nesting depth', async () => {
    await act(kernel, 'alice', writeIntent('loop', { executable: true, code: 'loop-v1' }));
    const result = await act(kernel, 'bob', { action_type: 'invoke_artifact', artifact_id: 'loop', method: 'recurse' });

    expect(result.success).toBe(true);
    expect(result.data?.result).toBe('limit_reached');
    expect(sandbox.calls).toHaveLength(MAX_INVOCATION_DEPTH + 1);
  });

  it('scopes the executor facade to the given callers', async () => {
    const scoped = kernel.executor.actions.scoped(['alice']);
    const refused = await scoped.transferScrip('bob', 'alice', 5);
    expect(!refused.ok && refused.error.message).toBe('This facade does not act for bob');
    expect((await scoped.transferScrip('alice', 'bob', 5)).ok).toBe(true);
  });
});
