/**
 * Express server configuration.
 *
 * Assembles the HTTP surface over a kernel: health, intents, and read-only
 * views of principals, artifacts, events, the mint and escrow.
 */

import express from 'express';
import { Kernel } from './runtime';
import { errorHandler, principalIdentityMiddleware } from './api/middleware';
import { createIntentRoutes } from './api/intents';
import { createPrincipalRoutes } from './api/principals';
import { createArtifactRoutes } from './api/artifacts';
import { createEventRoutes } from './api/events';
import { createMarketRoutes } from './api/market';

const VERSION = '0.1.0';

/** Create and configure the Express application. */
export function createApp(kernel: Kernel): express.Application {
  const startTime = Date.now();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      pendingIntents: kernel.executor.pending,
      auctionPhase: kernel.auction.status().phase,
    });
  });

  app.use('/api', principalIdentityMiddleware());

  const v1 = express.Router();
  v1.use('/', createIntentRoutes(kernel));
  v1.use('/', createPrincipalRoutes(kernel));
  v1.use('/', createArtifactRoutes(kernel));
  v1.use('/', createEventRoutes(kernel.context.publisher));
  v1.use('/', createMarketRoutes(kernel));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
