/**
 * Logging Module
 * Provides centralized logging using Winston
 */

import winston from 'winston';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Level written to the log file */
  level?: LogLevel;
  /** Level shown on the console; defaults to `warn` so only advisories interrupt the wizard */
  consoleLevel?: LogLevel;
  logToFile?: boolean;
  logDir?: string;
  logFileName?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

/**
 * Default log directory
 */
export const getDefaultLogDir = (): string => {
  const homeDir = os.homedir();
  return path.join(homeDir, '.git-onboard', 'logs');
};

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Create a Winston logger instance
 */
const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = LogLevel.INFO,
    consoleLevel = LogLevel.WARN,
    logToFile = true,
    logDir = getDefaultLogDir(),
    logFileName = 'git-onboard.log',
    maxFiles = 5,
    maxSize = 5 * 1024 * 1024, // 5MB
    silent = false,
  } = config;

  const transports: winston.transport[] = [];

  transports.push(
    new winston.transports.Console({
      level: consoleLevel,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${metaStr}`;
        })
      ),
    })
  );

  if (logToFile) {
    ensureLogDir(logDir);

    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, logFileName),
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );

    // Separate error log
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );
  }

  // The logger itself passes everything down to the most verbose transport
  const order = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];
  const loggerLevel = order[Math.max(order.indexOf(level), order.indexOf(consoleLevel))];

  return winston.createLogger({
    level: loggerLevel,
    silent,
    transports,
  });
};

let loggerInstance: winston.Logger | undefined;

/**
 * Initialize the logger with custom configuration
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance = createLogger(config);
  return loggerInstance;
};

/**
 * Get the logger instance
 */
export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

/**
 * Default logger instance (auto-initialized)
 */
export const logger = {
  error: (message: string, meta?: unknown): void => {
    getLogger().error(message, meta);
  },

  warn: (message: string, meta?: unknown): void => {
    getLogger().warn(message, meta);
  },

  info: (message: string, meta?: unknown): void => {
    getLogger().info(message, meta);
  },

  debug: (message: string, meta?: unknown): void => {
    getLogger().debug(message, meta);
  },
};

export type Logger = typeof logger;
