/**
 * Wire intent parsing and the logged form of intents.
 */

import { intentToWire, parseIntent } from '../../src/domain/intents';

describe('parseIntent', () => {
  it('takes the principal from the transport over the body', () => {
    const parsed = parseIntent({ action_type: 'noop', principal_id: 'mallory' }, 'alice');
    expect(parsed).toEqual({ ok: true, value: { actionType: 'noop', principalId: 'alice' } });
  });

  it('falls back to principal_id in the body', () => {
    const parsed = parseIntent({ action_type: 'noop', principal_id: 'bob' });
    expect(parsed.ok && parsed.value.principalId).toBe('bob');
  });

  it('accepts upper-case action types', () => {
    const parsed = parseIntent({ action_type: 'READ_ARTIFACT', artifact_id: 'doc' }, 'alice');
    expect(parsed).toEqual({ ok: true, value: { actionType: 'read_artifact', principalId: 'alice', artifactId: 'doc' } });
  });

  it('rejects non-objects, missing and unknown action types', () => {
    const notObject = parseIntent('noop', 'alice');
    const missing = parseIntent({}, 'alice');
    const unknown = parseIntent({ action_type: 'teleport' }, 'alice');
    expect(!notObject.ok && notObject.error.code).toBe('invalid_type');
    expect(!missing.ok && missing.error.code).toBe('missing_argument');
    expect(!unknown.ok && unknown.error.code).toBe('invalid_argument');
  });

  it('rejects an intent with no principal', () => {
    const parsed = parseIntent({ action_type: 'noop' });
    expect(!parsed.ok && parsed.error.details).toEqual({ field: 'principal_id' });
  });

  it('fills write defaults', () => {
    const parsed = parseIntent({ action_type: 'write_artifact', artifact_id: 'doc' }, 'alice');
    expect(parsed).toEqual({
      ok: true,
      value: {
        actionType: 'write_artifact',
        principalId: 'alice',
        artifactId: 'doc',
        artifactType: 'generic',
        content: '',
        executable: false,
        price: 0,
        readPrice: 0,
        hasStanding: false,
      },
    });
  });

  it('requires code for executable writes', () => {
    const parsed = parseIntent({ action_type: 'write_artifact', artifact_id: 'tool', executable: true }, 'alice');
    expect(!parsed.ok && parsed.error.details).toEqual({ field: 'code' });
  });

  it('rejects a negative price and a non-object metadata', () => {
    const price = parseIntent({ action_type: 'write_artifact', artifact_id: 'a', price: -1 }, 'alice');
    const metadata = parseIntent({ action_type: 'write_artifact', artifact_id: 'a', metadata: [1] }, 'alice');
    expect(!price.ok && price.error.code).toBe('invalid_argument');
    expect(!metadata.ok && metadata.error.code).toBe('invalid_type');
  });

  it('parses an interface declaration', () => {
    const parsed = parseIntent(
      {
        action_type: 'write_artifact',
        artifact_id: 'tool',
        executable: true,
        code: 'tool-v1',
        interface: { description: 'adds', methods: [{ name: 'run', cost: 2, extra: true }] },
      },
      'alice',
    );
    expect(parsed.ok && parsed.value.actionType === 'write_artifact' && parsed.value.interface).toEqual({
      description: 'adds',
      methods: [{ name: 'run', cost: 2 }],
    });
  });

  it('allows an empty new_string on edits but not a missing one', () => {
    const empty = parseIntent({ action_type: 'edit_artifact', artifact_id: 'a', old_string: 'x', new_string: '' }, 'alice');
    const missing = parseIntent({ action_type: 'edit_artifact', artifact_id: 'a', old_string: 'x' }, 'alice');
    expect(empty.ok).toBe(true);
    expect(!missing.ok && missing.error.details).toEqual({ field: 'new_string' });
  });

  it('defaults invoke args to an empty list and rejects non-arrays', () => {
    const bare = parseIntent({ action_type: 'invoke_artifact', artifact_id: 't', method: 'run' }, 'alice');
    const bad = parseIntent({ action_type: 'invoke_artifact', artifact_id: 't', method: 'run', args: 'x' }, 'alice');
    expect(bare.ok && bare.value.actionType === 'invoke_artifact' && bare.value.args).toEqual([]);
    expect(!bad.ok && bad.error.code).toBe('invalid_type');
  });

  it('requires a positive integer transfer amount', () => {
    const zero = parseIntent({ action_type: 'transfer', recipient_id: 'bob', amount: 0 }, 'alice');
    const fraction = parseIntent({ action_type: 'transfer', recipient_id: 'bob', amount: 1.5 }, 'alice');
    expect(!zero.ok && zero.error.code).toBe('invalid_argument');
    expect(!fraction.ok && fraction.error.code).toBe('invalid_argument');
  });

  it('parses context sections and priorities', () => {
    const parsed = parseIntent(
      {
        action_type: 'configure_context',
        sections: { working_memory: false },
        priorities: { recent_events: 3 },
      },
      'alice',
    );
    expect(parsed).toEqual({
      ok: true,
      value: {
        actionType: 'configure_context',
        principalId: 'alice',
        sections: { working_memory: false },
        priorities: { recent_events: 3 },
      },
    });
    const bad = parseIntent({ action_type: 'configure_context', sections: { working_memory: 'yes' } }, 'alice');
    expect(bad.ok).toBe(false);
  });

  it('treats a missing metadata value as removal', () => {
    const parsed = parseIntent({ action_type: 'update_metadata', artifact_id: 'a', key: 'tag' }, 'alice');
    expect(parsed.ok && parsed.value.actionType === 'update_metadata' && parsed.value.value).toBeNull();
  });

  it('defaults query params to an empty object', () => {
    const parsed = parseIntent({ action_type: 'query_kernel', query_type: 'balances' }, 'alice');
    expect(parsed.ok && parsed.value.actionType === 'query_kernel' && parsed.value.params).toEqual({});
  });
});

describe('intentToWire', () => {
  it('truncates long content for the log', () => {
    const parsed = parseIntent({ action_type: 'write_artifact', artifact_id: 'big', content: 'x'.repeat(250) }, 'alice');
    if (!parsed.ok) throw new Error(parsed.error.message);
    const wire = intentToWire(parsed.value);
    expect(wire.content).toBe(`${'x'.repeat(200)}...`);
    expect(wire).not.toHaveProperty('read_price');
  });

  it('carries the transfer memo', () => {
    const parsed = parseIntent({ action_type: 'transfer', recipient_id: 'bob', amount: 4, memo: 'rent' }, 'alice');
    if (!parsed.ok) throw new Error(parsed.error.message);
    expect(intentToWire(parsed.value)).toEqual({
      action_type: 'transfer',
      principal_id: 'alice',
      recipient_id: 'bob',
      amount: 4,
      memo: 'rent',
    });
  });
});
