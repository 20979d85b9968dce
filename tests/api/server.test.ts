import express from 'express';
import { createApp } from '../../src/server';
import { createTestKernel } from '../helpers';

interface Reply {
  status: number;
  body: unknown;
}

// Simple test helper for HTTP requests without external dependencies
async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {},
): Promise<Reply> {
  const server = app.listen(0);
  try {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    const { port } = address;
    const init: RequestInit = { method, headers: { 'Content-Type': 'application/json', ...headers } };
    if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);
    const res = await fetch(`http://127.0.0.1:${port}${path}`, init);
    return { status: res.status, body: await res.json() };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

describe('HTTP API', () => {
  let app: express.Application;

  beforeEach(async () => {
    const { kernel } = await createTestKernel();
    app = createApp(kernel);
  });

  test('health check reports the auction phase', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', pendingIntents: 0, auctionPhase: 'waiting' });
  });

  test('POST /api/v1/intents executes for the principal in the header', async () => {
    const res = await request(
      app,
      'POST',
      '/api/v1/intents',
      { action_type: 'transfer', recipient_id: 'bob', amount: 10 },
      { 'x-principal-id': 'alice' },
    );
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      message: 'Transferred 10 scrip to bob',
      data: { recipient_id: 'bob', amount: 10, balance: 90 },
      resources_consumed: { scrip: 10 },
    });
  });

  test('a failed action is still a 200 carrying the error', async () => {
    const res = await request(app, 'POST', '/api/v1/intents', {
      action_type: 'transfer',
      principal_id: 'alice',
      recipient_id: 'bob',
      amount: 1000,
    });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      success: false,
      error_code: 'insufficient_funds',
      error_category: 'resource',
      retriable: true,
    });
  });

  test('a malformed intent is a 400', async () => {
    const res = await request(app, 'POST', '/api/v1/intents', { principal_id: 'alice' });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'missing_argument', category: 'validation' } });
  });

  test('a body that is not JSON is a 400', async () => {
    const res = await request(app, 'POST', '/api/v1/intents', '{not json');
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'invalid_type', message: 'Request body is not valid JSON' } });
  });

  test('GET /api/v1/principals lists balances and their total', async () => {
    const res = await request(app, 'GET', '/api/v1/principals');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ totalScrip: 300 });
  });

  test('GET /api/v1/principals/:id returns one principal or 404', async () => {
    const found = await request(app, 'GET', '/api/v1/principals/alice');
    expect(found.body).toMatchObject({
      id: 'alice',
      scrip: 100,
      held: 0,
      spendable: 100,
      quotas: { disk: { limit: 10_000, used: 0 } },
    });

    const missing = await request(app, 'GET', '/api/v1/principals/ghost');
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ error: { code: 'not_found', message: 'Principal not found: ghost' } });
  });

  test('GET /api/v1/artifacts filters without exposing content', async () => {
    const res = await request(app, 'GET', '/api/v1/artifacts?type=agent');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ total: 3, limit: 100, offset: 0, hasMore: false });

    const service = await request(app, 'GET', '/api/v1/artifacts/genesis_ledger');
    expect(service.body).toMatchObject({
      artifact: { id: 'genesis_ledger', type: 'genesis_service', controller: 'genesis_ledger', executable: true },
      metadata: { authorized_writer: 'genesis_ledger' },
    });
    expect(service.body).not.toHaveProperty('artifact.content');

    const missing = await request(app, 'GET', '/api/v1/artifacts/nothing');
    expect(missing.status).toBe(404);
  });

  test('GET /api/v1/events pages through the log by type', async () => {
    await request(
      app,
      'POST',
      '/api/v1/intents',
      { action_type: 'transfer', recipient_id: 'bob', amount: 5 },
      { 'x-principal-id': 'alice' },
    );
    const res = await request(app, 'GET', '/api/v1/events?types=transfer_success');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      items: [{ event_type: 'transfer_success', principal_id: 'alice', message: 'Transferred 5 scrip to bob' }],
      total: 1,
    });
  });

  test('market views start empty', async () => {
    const mint = await request(app, 'GET', '/api/v1/mint');
    expect(mint.body).toMatchObject({ status: { phase: 'waiting', round: 0 }, submissions: [], history: [] });
    expect((await request(app, 'GET', '/api/v1/mint/tasks')).body).toEqual({ tasks: [] });
    expect((await request(app, 'GET', '/api/v1/escrow/listings')).body).toEqual({ listings: [] });
  });
});
