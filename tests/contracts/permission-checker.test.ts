/**
 * Kernel contracts and custom contracts evaluated through the sandbox.
 */

import { Artifact, JsonObject, JsonValue, isJsonObject } from '../../src/domain/artifact';
import { ManualClock } from '../../src/domain/clock';
import { KernelContractId, PermissionAction } from '../../src/domain/contracts';
import { PermissionChecker } from '../../src/contracts/permission-checker';
import { createLogger, setLogHandler } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import { ScriptedSandbox } from '../helpers';

function artifact(id: string, contractId: string, metadata: Record<string, JsonValue> = {}): Artifact {
  return {
    id,
    type: 'generic',
    content: '',
    executable: false,
    createdBy: 'alice',
    accessContractId: contractId,
    metadata,
    price: 0,
    readPrice: 0,
    hasStanding: false,
    kernelProtected: false,
    deleted: false,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('PermissionChecker', () => {
  let store: Store;
  let sandbox: ScriptedSandbox;
  let checker: PermissionChecker;

  beforeEach(() => {
    setLogHandler(() => undefined);
    store = createMemoryStore();
    sandbox = new ScriptedSandbox();
    checker = new PermissionChecker(store.artifacts, sandbox, { contractTimeoutMs: 50 }, new ManualClock(0), createLogger());
  });

  describe('freeware', () => {
    const doc = artifact('doc', KernelContractId.Freeware, { authorized_writer: 'bob' });

    it('lets anyone read and pays the controller', async () => {
      const result = await checker.check('carol', PermissionAction.Read, doc);
      expect(result).toEqual({ allowed: true, reason: 'freeware: open access', scripRecipient: 'bob' });
    });

    it('lets only the authorized writer modify', async () => {
      expect((await checker.check('bob', PermissionAction.Edit, doc)).allowed).toBe(true);
      expect((await checker.check('alice', PermissionAction.Write, doc)).allowed).toBe(false);
      expect((await checker.check('alice', PermissionAction.Delete, doc)).reason).toBe(
        'freeware: only authorized_writer can delete',
      );
    });

    it('never consults createdBy', async () => {
      const untagged = artifact('loose', KernelContractId.Freeware);
      const result = await checker.check('alice', PermissionAction.Write, untagged);
      expect(result).toEqual({ allowed: false, reason: 'freeware: no authorized_writer set' });
    });
  });

  it('self_owned allows the artifact itself and its principal', async () => {
    const agent = artifact('agent_1', KernelContractId.SelfOwned, { authorized_principal: 'alice' });
    expect((await checker.check('agent_1', PermissionAction.Write, agent)).allowed).toBe(true);
    expect((await checker.check('alice', PermissionAction.Read, agent)).allowed).toBe(true);
    expect((await checker.check('bob', PermissionAction.Read, agent)).allowed).toBe(false);
  });

  it('private allows only the authorized principal', async () => {
    const secret = artifact('secret', KernelContractId.Private, { authorized_principal: 'bob' });
    expect((await checker.check('bob', PermissionAction.Read, secret)).allowed).toBe(true);
    expect((await checker.check('alice', PermissionAction.Read, secret)).allowed).toBe(false);
  });

  it('public allows everything', async () => {
    const open = artifact('open', KernelContractId.Public, { authorized_writer: 'bob' });
    expect((await checker.check('carol', PermissionAction.Delete, open)).allowed).toBe(true);
  });

  describe('custom contracts', () => {
    beforeEach(async () => {
      await store.artifacts.put({
        ...artifact('members_only', 'contract'),
        type: 'contract',
        executable: true,
        code: 'members-v1',
      });
      sandbox.define('members-v1', {
        check_permission: ([caller, action, target, method]): JsonObject => {
          const targetId = isJsonObject(target) ? target.id : null;
          if (caller === 'bob') return { allowed: true, reason: `member ${action} ${targetId}`, scrip_recipient: 'carol' };
          if (method === 'open') return { allowed: true };
          return { allowed: false, reason: 'members only' };
        },
      });
    });

    it('recognizes the contract artifact', async () => {
      expect(await checker.contractExists('members_only')).toBe(true);
      expect(await checker.contractExists('kernel_contract_public')).toBe(true);
      expect(await checker.contractExists('nope')).toBe(false);
    });

    it('passes caller, action, target summary and method', async () => {
      const target = artifact('club', 'members_only');
      const result = await checker.check('bob', PermissionAction.Invoke, target, 'run');
      expect(result).toEqual({ allowed: true, reason: 'member invoke club', scripRecipient: 'carol' });
      expect(sandbox.calls[0].method).toBe('check_permission');
      expect(sandbox.calls[0].args[3]).toBe('run');
    });

    it('uses a default reason and honors the method argument', async () => {
      const target = artifact('club', 'members_only');
      expect(await checker.check('alice', PermissionAction.Invoke, target, 'open')).toEqual({
        allowed: true,
        reason: 'contract members_only',
      });
      expect(await checker.check('alice', PermissionAction.Read, target)).toEqual({
        allowed: false,
        reason: 'members only',
      });
    });

    it('denies on a malformed decision', async () => {
      sandbox.define('members-v1', { check_permission: () => 'yes' });
      const result = await checker.check('bob', PermissionAction.Read, artifact('club', 'members_only'));
      expect(result).toEqual({ allowed: false, reason: 'contract members_only returned a malformed decision' });
    });

    it('denies when the contract throws', async () => {
      sandbox.define('members-v1', {
        check_permission: () => {
          throw new Error('bad code');
        },
      });
      const result = await checker.check('bob', PermissionAction.Read, artifact('club', 'members_only'));
      expect(result).toEqual({ allowed: false, reason: 'contract members_only failed: bad code' });
    });

    it('denies when the contract times out', async () => {
      sandbox.define('members-v1', { check_permission: () => new Promise<JsonValue>(() => undefined) });
      const result = await checker.check('bob', PermissionAction.Read, artifact('club', 'members_only'));
      expect(result.allowed).toBe(false);
      expect(result.reason).toBe('contract members_only failed: members_only.check_permission timed out after 50ms');
    });

    it('denies when the contract artifact is missing or deleted', async () => {
      const orphan = artifact('orphan', 'ghost_contract');
      expect(await checker.check('bob', PermissionAction.Read, orphan)).toEqual({
        allowed: false,
        reason: 'contract ghost_contract not found',
      });

      const stored = await store.artifacts.get('members_only');
      if (!stored) throw new Error('missing');
      await store.artifacts.put({ ...stored, deleted: true });
      expect((await checker.check('bob', PermissionAction.Read, artifact('club', 'members_only'))).allowed).toBe(false);
    });
  });
});
