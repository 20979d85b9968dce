/**
 * Mint and escrow API routes.
 *
 * GET /mint: Auction status, pending submissions and recent results
 * GET /mint/tasks: Open mint tasks (`?include_completed=true` for all)
 * GET /escrow/listings: Active listings (`?include_closed=true` for all)
 */

import { Router } from 'express';
import { Kernel } from '../runtime';
import { PrincipalRequest, queryInt } from './middleware';

export function createMarketRoutes(kernel: Kernel): Router {
  const router = Router();

  router.get('/mint', (req: PrincipalRequest, res) => {
    res.json({
      status: kernel.auction.status(),
      submissions: kernel.auction.submissions(),
      history: kernel.auction.history(queryInt(req.query.history, 10, 100)),
    });
  });

  router.get('/mint/tasks', (req: PrincipalRequest, res) => {
    res.json({ tasks: kernel.tasks.tasks(req.query.include_completed === 'true') });
  });

  router.get('/escrow/listings', (req: PrincipalRequest, res) => {
    res.json({ listings: kernel.escrow.listings(req.query.include_closed !== 'true') });
  });

  return router;
}
