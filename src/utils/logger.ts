import winston from 'winston';
import { env } from '../config/env';

// stdout is reserved for command output, so every level goes to stderr.
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'warn' : 'info'),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    env.NODE_ENV === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'clinic-scheduler' },
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});
