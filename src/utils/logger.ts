// src/utils/logger.ts

import winston from 'winston';

/**
 * Creates the JSON console logger every service writes through.
 * Silent while the test runner is active.
 */
export function createLogger(service: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service },
    silent: process.env.NODE_ENV === 'test',
    transports: [new winston.transports.Console()],
  });
}
