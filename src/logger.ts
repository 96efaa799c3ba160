/**
 * Structured logging for the engine.
 *
 * JSON lines with timestamps in production, a compact colorized
 * line in development, silent under test.
 */

import winston from 'winston';
import { loadConfig, type EngineConfig } from './config';

export type Logger = winston.Logger;

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${String(timestamp)} ${level}: ${String(message)} ${metaStr}`;
  }),
);

export function createLogger(config: Pick<EngineConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return winston.createLogger({
    level: config.logLevel,
    format: jsonFormat,
    defaultMeta: { service: 'talent-special-engine' },
    silent: config.nodeEnv === 'test',
    transports: [
      new winston.transports.Console({
        format: config.nodeEnv === 'production' ? jsonFormat : consoleFormat,
      }),
    ],
  });
}

const logger = createLogger(loadConfig());

export default logger;
