import 'express-async-errors';
import cors from 'cors';
import express from 'express';
import type { Driver } from 'neo4j-driver';

import type { AppConfig } from './config.js';
import { ConservationError, IntegrityError, ProjectionSetNotFoundError, RunNotFoundError } from './models/errors.js';
import { registerRoutes } from './routes/index.js';
import { logger } from './utils/logger.js';

export function createApp(config: AppConfig, driver: Driver | null): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '25mb' }));

  registerRoutes(app, driver, config.tolerances);

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof RunNotFoundError || err instanceof ProjectionSetNotFoundError) {
      res.status(404).json({ message: err.message });
      return;
    }
    if (err instanceof IntegrityError) {
      res.status(422).json({ code: err.code, message: err.message, context: err.context });
      return;
    }
    if (err instanceof ConservationError) {
      res.status(422).json({ code: err.code, message: err.message, discrepancies: err.discrepancies });
      return;
    }
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
}
