import winston from 'winston';

const useJson = process.env.LOG_FORMAT === 'json';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return `[${timestamp}] ${level}: ${message} ${
      Object.keys(meta).length ? JSON.stringify(meta) : ''
    }`;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleTransport = new winston.transports.Console({
  format: useJson ? jsonFormat : consoleFormat,
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'gmgn-token-api' },
  format: jsonFormat,
  transports: [consoleTransport],
  exitOnError: false,
});

/**
 * Change the level of the shared logger at runtime (e.g. `debug` for verbose clients).
 */
export const setLogLevel = (level: string) => {
  if (logger.level === level) return;
  logger.level = level;
  consoleTransport.level = level;
  logger.debug(`Log level changed to ${level}`);
};
