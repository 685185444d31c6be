import winston from 'winston';

/** Logging defaults per service. `LOG_LEVEL` overrides them; tests stay silent unless `TEST_LOG_LEVEL` is set. */
export const loggingConfig = {
  levels: winston.config.npm.levels,
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
  },
  services: {
    engine: { level: 'warn' },
    cli: { level: 'warn' },
  },
} as const;

export type LogService = keyof typeof loggingConfig.services;
