import neo4j, { type Driver } from 'neo4j-driver';

import type { Neo4jConfig } from './config.js';
import { logger } from './utils/logger.js';

export async function createNeo4jDriver(config: Neo4jConfig | null): Promise<Driver | null> {
  if (!config) {
    logger.warn('Neo4j credentials missing; serving seed projection sets only.');
    return null;
  }
  return neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password));
}
