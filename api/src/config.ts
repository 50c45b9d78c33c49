import { z } from 'zod';

import type { Tolerances } from './models/types.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: logLevelSchema.default('info'),
  NEO4J_URI: z.string().optional(),
  NEO4J_USERNAME: z.string().optional(),
  NEO4J_PASSWORD: z.string().optional(),
  ALLOCATION_SPLIT_TOLERANCE: z.coerce.number().positive().default(1e-5),
  ALLOCATION_MAGNITUDE_TOLERANCE: z.coerce.number().positive().default(1e-2),
  ALLOCATION_SHARE_TOLERANCE: z.coerce.number().positive().default(1e-3)
});

export type Neo4jConfig = {
  uri: string;
  username: string;
  password: string;
};

export type AppConfig = {
  port: number;
  logLevel: LogLevel;
  neo4j: Neo4jConfig | null;
  tolerances: Tolerances;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const { NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD } = parsed;
  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    neo4j:
      NEO4J_URI && NEO4J_USERNAME && NEO4J_PASSWORD
        ? { uri: NEO4J_URI, username: NEO4J_USERNAME, password: NEO4J_PASSWORD }
        : null,
    tolerances: {
      split: parsed.ALLOCATION_SPLIT_TOLERANCE,
      magnitude: parsed.ALLOCATION_MAGNITUDE_TOLERANCE,
      shareSum: parsed.ALLOCATION_SHARE_TOLERANCE
    }
  };
}
