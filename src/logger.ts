import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
  name: 'billwatch',
  level: config.logLevel,
});
