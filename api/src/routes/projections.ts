import express from 'express';
import type { Driver } from 'neo4j-driver';

import { ProjectionService } from '../services/projectionService.js';

export function createProjectionsRouter(driver: Driver | null): express.Router {
  const router = express.Router();
  const projectionService = new ProjectionService(driver);

  router.get('/sets', async (_req, res) => {
    const sets = await projectionService.listProjectionSets();
    res.json(sets);
  });

  router.get('/sets/:id', async (req, res) => {
    const projectionSet = await projectionService.getProjectionSet(req.params.id);
    if (!projectionSet) {
      res.status(404).json({ message: 'Projection set not found' });
      return;
    }
    res.json(projectionSet);
  });

  return router;
}
