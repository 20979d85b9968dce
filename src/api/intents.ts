/**
 * Intent API routes.
 *
 * POST /intents: Submit one action intent and get its ActionResult
 */

import { Router } from 'express';
import { apiError, errorMessage, systemError } from '../domain/errors';
import { parseIntent } from '../domain/intents';
import { toWireResult } from '../domain/results';
import { Kernel } from '../runtime';
import { PrincipalRequest, sendError } from './middleware';

export function createIntentRoutes(kernel: Kernel): Router {
  const router = Router();

  /**
   * POST /intents
   * The principal comes from the x-principal-id header, else the body's
   * principal_id. A failed action is still a 200: the ActionResult says why.
   */
  router.post('/intents', async (req: PrincipalRequest, res) => {
    try {
      const parsed = parseIntent(req.body, req.principalId);
      if (!parsed.ok) {
        sendError(res, parsed.error);
        return;
      }
      const result = await kernel.execute(parsed.value);
      res.json(toWireResult(result));
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to execute intent: ${errorMessage(err)}`)));
    }
  });

  return router;
}
