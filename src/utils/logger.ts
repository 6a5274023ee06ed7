import winston from 'winston';
import type { ServerConfig } from '../config/index.js';

export type Logger = winston.Logger;

const { combine, timestamp, errors, json, colorize, printf, splat } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}: ${String(message)}${rest}`;
});

export const createLogger = (server: Pick<ServerConfig, 'nodeEnv' | 'logLevel'>): Logger =>
  winston.createLogger({
    level: server.logLevel,
    format:
      server.nodeEnv === 'production'
        ? combine(timestamp(), errors({ stack: true }), splat(), json())
        : combine(colorize(), timestamp({ format: 'HH:mm:ss' }), errors({ stack: true }), splat(), devFormat),
    defaultMeta: { service: 'risk-register' },
    transports: [new winston.transports.Console({ silent: server.nodeEnv === 'test' })],
  });

// Stream for morgan access logs
export const httpLogStream = (logger: Logger) => ({
  write: (line: string) => {
    logger.http(line.trim());
  },
});
