/**
 * Winston Logger Configuration
 *
 * Structured JSON logging, one line per event, with the service name attached
 * to every entry. Silent under the test runner.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.nodeEnv === 'production' ? 'info' : 'debug',
  silent: config.nodeEnv === 'test',
  defaultMeta: { service: config.service.name },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
