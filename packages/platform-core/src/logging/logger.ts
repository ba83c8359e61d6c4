/**
 * Logger
 *
 * Winston logger creation and management. The console transport writes to
 * stderr so log output never lands inside the terminal UI on stdout.
 */

import * as winston from 'winston';
import { hostname } from 'os';
import type { LoggerMeta, LoggerOptions } from './types.js';
import { correlationStorage } from './correlation.js';
import { createDevFormat, createProdFormat } from './formatting.js';

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'error';
    default:
      return 'warn';
  }
}

function buildLoggerOptions(serviceName: string, options: LoggerOptions): winston.LoggerOptions {
  const meta: LoggerMeta = {
    service: serviceName,
    env: process.env.NODE_ENV || 'development',
    version: process.env.npm_package_version,
    instanceId: process.env.INSTANCE_ID || hostname() || 'unknown',
    ...options.meta,
  };

  const isProduction = process.env.NODE_ENV === 'production';

  const transports: winston.transport[] = [new winston.transports.Console({ stderrLevels: ALL_LEVELS })];
  if (options.logFile) {
    transports.push(
      new winston.transports.File({
        filename: options.logFile,
        format: createProdFormat(correlationStorage),
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
      })
    );
  }

  return {
    level: options.level ?? resolveLogLevel(),
    defaultMeta: meta,
    format: isProduction ? createProdFormat(correlationStorage) : createDevFormat(correlationStorage),
    transports,
  };
}

/**
 * Create a Winston logger instance
 */
export function createLogger(serviceName: string, options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger(buildLoggerOptions(serviceName, options));
}

const loggers = new Map<string, winston.Logger>();
let defaultOptions: LoggerOptions = {};

/**
 * Options applied to every logger created after this call. Loggers already
 * handed out by getLogger are reconfigured in place.
 */
export function configureLogging(options: LoggerOptions): void {
  defaultOptions = { ...defaultOptions, ...options };
  for (const [name, logger] of loggers) {
    logger.configure(buildLoggerOptions(name, defaultOptions));
  }
}

/**
 * Get or create a logger
 */
export function getLogger(serviceOrModule: string): winston.Logger {
  const existing = loggers.get(serviceOrModule);
  if (existing) return existing;

  const logger = createLogger(serviceOrModule, defaultOptions);
  loggers.set(serviceOrModule, logger);
  return logger;
}
