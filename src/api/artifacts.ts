/**
 * Artifact discovery API routes.
 *
 * GET /artifacts: Discovery listing (no content)
 * GET /artifacts/:artifactId: One artifact's summary and metadata
 *
 * Content is only served through `read_artifact` intents, where access
 * contracts and read prices apply.
 */

import { Router } from 'express';
import { toArtifactSummary } from '../domain/artifact';
import { apiError, errorMessage, notFoundError, systemError } from '../domain/errors';
import { ArtifactListOptions, toListResult } from '../storage/store';
import { Kernel } from '../runtime';
import { PrincipalRequest, queryInt, sendError } from './middleware';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createArtifactRoutes(kernel: Kernel): Router {
  const router = Router();
  const artifacts = kernel.context.store.artifacts;

  /**
   * GET /artifacts?owner=&type=&created_by=&include_deleted=&limit=&offset=
   */
  router.get('/artifacts', async (req: PrincipalRequest, res) => {
    try {
      const filter: ArtifactListOptions = {
        controllerId: queryString(req.query.owner),
        type: queryString(req.query.type),
        createdBy: queryString(req.query.created_by),
        includeDeleted: req.query.include_deleted === 'true',
      };
      const limit = queryInt(req.query.limit, 100, 1000) || 100;
      const offset = queryInt(req.query.offset, 0);
      const [items, total] = await Promise.all([artifacts.list({ ...filter, limit, offset }), artifacts.count(filter)]);
      res.json(toListResult(items.map(toArtifactSummary), total, { limit, offset }));
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to list artifacts: ${errorMessage(err)}`)));
    }
  });

  /**
   * GET /artifacts/:artifactId
   */
  router.get('/artifacts/:artifactId', async (req: PrincipalRequest, res) => {
    try {
      const artifact = await artifacts.get(req.params.artifactId);
      if (!artifact || artifact.deleted) {
        sendError(res, notFoundError('Artifact', req.params.artifactId));
        return;
      }
      res.json({ artifact: toArtifactSummary(artifact), metadata: artifact.metadata });
    } catch (err) {
      res.status(500).json(apiError(systemError(`Failed to fetch artifact: ${errorMessage(err)}`)));
    }
  });

  return router;
}
