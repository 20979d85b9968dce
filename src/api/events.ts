/**
 * Event log API routes.
 *
 * GET /events: Page through the kernel event log
 */

import { Router } from 'express';
import { apiError, errorMessage, systemError } from '../domain/errors';
import { EventPublisher } from '../data-plane/publisher';
import { PrincipalRequest, queryInt } from './middleware';

export function createEventRoutes(publisher: EventPublisher): Router {
  const router = Router();

  /**
   * GET /events?types=a,b&after=&limit=&offset=
   * `types` filters by event type; `after` returns events numbered above it.
   */
  router.get('/events', async (req: PrincipalRequest, res) => {
    try {
      const types =
        typeof req.query.types === 'string'
          ? req.query.types
              .split(',')
              .map((t) => t.trim())
              .filter((t) => t.length > 0)
          : undefined;
      const limit = queryInt(req.query.limit, 100, 1000) || 100;
      const offset = queryInt(req.query.offset, 0);
      const after = typeof req.query.after === 'string' ? queryInt(req.query.after, 0) : undefined;

      res.json(await publisher.query({ types, limit, offset, after }));
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to fetch events: ${errorMessage(err)}`)));
    }
  });

  return router;
}
