// src/utils/logger.ts
import * as winston from 'winston';
import { ConfigurableLogger, createLogger } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';
import { parseLoggingConfig } from '../config/logging-config';

let loggingConfig: LoggingConfig | undefined;

if (process.env.LOGGING_CONFIG) {
  try {
    loggingConfig = parseLoggingConfig(process.env.LOGGING_CONFIG);
  } catch (e) {
    console.warn(`Failed to parse LOGGING_CONFIG from environment: ${e}`);
  }
}

const logger: winston.Logger = createLogger(
  loggingConfig ?? { profile: 'Default' }
);

if (!loggingConfig && process.env.LOG_LEVEL) {
  logger.level = process.env.LOG_LEVEL;
}

export default logger;
export { logger };

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
}

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration.
   * Call this at application startup with your config.
   */
  static initialize(config: LoggingConfig): void {
    const newLogger = createLogger(config);

    // Swap transports on the shared instance so existing Logger wrappers follow
    logger.clear();
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });
    logger.level = newLogger.level;
    logger.format = newLogger.format;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error !== undefined) {
      logger.error(`[${this.context}] ${message}: ${describeError(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }

  setLevel(level: string): void {
    logger.level = level;
  }
}

export function getLogFilePaths(): { combined: string; error: string; warning?: string } | null {
  return ConfigurableLogger.getLogFilePaths();
}
