import winston from 'winston';
import { loggingConfig } from '../../config/logging.js';
import type { LogService } from '../../config/logging.js';

function resolveLevel(service: LogService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL ?? 'error';
  }
  return loggingConfig.services[service].level;
}

/**
 * Create a service logger: JSON lines with a timestamp and `service` field, to
 * stderr. Silent under `NODE_ENV=test` unless `TEST_LOG_LEVEL` is set.
 */
export function createLogger(service: LogService, level?: string): winston.Logger {
  const silent = process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL && level === undefined;

  return winston.createLogger({
    level: level ?? resolveLevel(service),
    levels: loggingConfig.levels,
    format: winston.format.combine(
      winston.format.timestamp({ format: loggingConfig.format.timestamp }),
      winston.format.json(),
    ),
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        silent,
        stderrLevels: Object.keys(loggingConfig.levels),
      }),
    ],
  });
}
