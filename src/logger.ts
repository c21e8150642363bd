/**
 * Logging configuration for the SSH session server
 */

import winston from 'winston';
import config from './config.js';

// Custom format for timestamps
const timestampFormat = winston.format.timestamp({
  format: 'YYYY-MM-DD HH:mm:ss'
});

// Custom format for log messages
const logFormat = winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
  const scope = typeof module === 'string' ? ` - ${module}` : '';
  let logMessage = `${String(timestamp)} - ${level.toUpperCase()}${scope} - ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    logMessage += ` - ${JSON.stringify(meta)}`;
  }

  return logMessage;
});

// stdout carries the MCP protocol, so every level goes to stderr
const consoleLevels = Object.keys(winston.config.npm.levels);

// Create logger instance
const logger = winston.createLogger({
  level: config.logLevel.toLowerCase(),
  silent: config.logSilent,
  format: winston.format.combine(
    timestampFormat,
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: consoleLevels,
      format: winston.format.combine(
        timestampFormat,
        logFormat
      )
    })
  ]
});

// Add file transport if log file is specified
if (config.logFile) {
  logger.add(new winston.transports.File({
    filename: config.logFile,
    format: winston.format.combine(
      timestampFormat,
      logFormat
    )
  }));
}

// Create child loggers for different modules
export const createLogger = (module: string): winston.Logger => {
  return logger.child({ module });
};

export const setLogLevel = (level: string): void => {
  logger.level = level.toLowerCase();
};

// Export default logger
export { logger };
