/**
 * Graph API routes.
 *
 * GET /graph: describe the compiled workflow graph
 */

import { Router } from 'express';
import { CompiledGraph } from '../graph/types';

export function createGraphRoutes<S>(graph: CompiledGraph<S>): Router {
  const router = Router();
  const description = graph.describe();

  router.get('/graph', (_req, res) => {
    res.json(description);
  });

  return router;
}
