import winston from 'winston';
import type { LoggingConfig } from '../config/specialized/logging.config';

/**
 * Build a logger for the given logging configuration.
 * Nothing is created at import time: AppConfig builds the process-wide
 * logger once its settings file has been loaded.
 */
export function createLogger(loggingConfig: LoggingConfig): winston.Logger {
  const isJson = loggingConfig.isJson;

  // Custom format for structured logging
  const structuredFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
    isJson
      ? winston.format.json()
      : winston.format.printf(({ level, message, timestamp, metadata }) => {
          const meta =
            metadata && typeof metadata === 'object' && Object.keys(metadata).length
              ? JSON.stringify(metadata)
              : '';
          const ts = typeof timestamp === 'string' ? timestamp : '';
          const lvl = typeof level === 'string' ? level.toUpperCase() : 'INFO';
          const msg = typeof message === 'string' ? message : String(message);
          return `${ts} [${lvl}]: ${msg} ${meta}`;
        })
  );

  return winston.createLogger({
    level: loggingConfig.level,
    format: structuredFormat,
    defaultMeta: { service: 'settings-accessor' },
    // Jest output stays clean
    silent: loggingConfig.isTest,
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize({ all: !isJson }), structuredFormat),
      }),
    ],
  });
}
