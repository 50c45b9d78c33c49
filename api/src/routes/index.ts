import type { Driver } from 'neo4j-driver';
import type express from 'express';

import type { Tolerances } from '../models/types.js';
import { createComparisonsRouter } from './comparisons.js';
import { createProjectionsRouter } from './projections.js';
import { createRunsRouter } from './runs.js';

export function registerRoutes(app: express.Express, driver: Driver | null, tolerances: Tolerances): void {
  app.get('/api/v1/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1/projections', createProjectionsRouter(driver));
  app.use('/api/v1/runs', createRunsRouter(driver, tolerances));
  app.use('/api/v1/comparisons', createComparisonsRouter(tolerances));
}
