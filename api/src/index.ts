import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createNeo4jDriver } from './neo4j.js';
import { logger } from './utils/logger.js';

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;
  const driver = await createNeo4jDriver(config.neo4j);
  if (driver) {
    await driver.verifyConnectivity();
  }

  const app = createApp(config, driver);
  app.listen(config.port, () => {
    logger.info(`API listening on port ${config.port}`);
  });
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Failed to bootstrap API');
  process.exit(1);
});
