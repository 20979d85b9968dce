/**
 * Principal API routes.
 *
 * GET /principals: Every principal with its scrip balance
 * GET /principals/:principalId: Balance, holds, quotas and resources
 */

import { Router } from 'express';
import { apiError, errorMessage, notFoundError, systemError } from '../domain/errors';
import { snapshotPrincipal } from '../domain/principal';
import { Kernel } from '../runtime';
import { PrincipalRequest, sendError } from './middleware';

export function createPrincipalRoutes(kernel: Kernel): Router {
  const router = Router();
  const { ledger, holds } = kernel.context;

  router.get('/principals', async (_req: PrincipalRequest, res) => {
    try {
      const principals = await ledger.listPrincipals();
      res.json({
        principals: principals.map((p) => ({ id: p.id, scrip: p.scrip, hasStanding: p.hasStanding })),
        totalScrip: principals.reduce((sum, p) => sum + p.scrip, 0),
      });
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to list principals: ${errorMessage(err)}`)));
    }
  });

  router.get('/principals/:principalId', async (req: PrincipalRequest, res) => {
    try {
      const principal = await ledger.getPrincipal(req.params.principalId);
      if (!principal) {
        sendError(res, notFoundError('Principal', req.params.principalId));
        return;
      }
      const held = holds.heldBy(principal.id);
      res.json({
        id: principal.id,
        ...snapshotPrincipal(principal),
        held,
        spendable: principal.scrip - held,
        hasStanding: principal.hasStanding,
        createdAt: principal.createdAt,
      });
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to fetch principal: ${errorMessage(err)}`)));
    }
  });

  return router;
}
