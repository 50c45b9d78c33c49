import { pino } from 'pino';

export const logger = pino({
  name: 'zone-allocation-api',
  level: process.env.LOG_LEVEL ?? 'info'
});
