import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { config } from '../config';

const isProduction = config.server.nodeEnv === 'production';
const isTest = config.server.nodeEnv === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}]: ${stack || message}${details}`;
  }),
);

function buildFileTransports(): winston.transport[] {
  if (!existsSync('logs')) {
    mkdirSync('logs', { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: logFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: logFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

export const logger = winston.createLogger({
  level: config.server.logLevel,
  format: isProduction ? logFormat : consoleFormat,
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
      silent: isTest,
    }),
    ...(isTest ? [] : buildFileTransports()),
  ],
});

export default logger;
