// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  ConsoleOnly: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: false,
    logDirectory: ''
  }
};

const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${message}${stack ? '\n' + stack : ''}`;
});

export class ConfigurableLogger {
  private static config: LoggingProfile = DEFAULT_PROFILES.Default;

  /**
   * Initialize the logger with configuration
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    const logsDir = this.resolveLogDirectory();
    if (logsDir) {
      const files = this.getLogFiles();

      logger.add(new winston.transports.File({
        filename: path.join(logsDir, files.combined),
        format: winston.format.combine(winston.format.timestamp(), lineFormat)
      }));

      logger.add(new winston.transports.File({
        filename: path.join(logsDir, files.error),
        level: 'error',
        format: winston.format.combine(winston.format.timestamp(), lineFormat)
      }));

      if (files.warning) {
        logger.add(new winston.transports.File({
          filename: path.join(logsDir, files.warning),
          level: 'warn',
          format: winston.format.combine(winston.format.timestamp(), lineFormat)
        }));
      }
    }

    return logger;
  }

  /**
   * Resolve the effective logging configuration
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.Default;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using Default`);
      return DEFAULT_PROFILES.Default;
    }

    return {
      appendTimestamp: config.appendTimestamp ?? false,
      timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
      logLevel: config.logLevel || 'info',
      enableWarningLog: config.enableWarningLog !== false,
      logDirectory: config.logDirectory ?? 'logs'
    };
  }

  /**
   * Generate log filename based on configuration
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date = new Date()): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const pad = (n: number) => String(n).padStart(2, '0');
      timestamp = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-` +
        `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);
    return `${name}-${timestamp}${ext}`;
  }

  static getLogFiles(): { combined: string; error: string; warning?: string } {
    const result: { combined: string; error: string; warning?: string } = {
      combined: this.generateLogFilename('combined.log', this.config),
      error: this.generateLogFilename('error.log', this.config)
    };
    if (this.config.enableWarningLog) {
      result.warning = this.generateLogFilename('warning.log', this.config);
    }
    return result;
  }

  static getLogFilePaths(): { combined: string; error: string; warning?: string } | null {
    if (!this.config.logDirectory) {
      return null;
    }
    const files = this.getLogFiles();
    const logsDir = path.join(process.cwd(), this.config.logDirectory);
    return {
      combined: path.join(logsDir, files.combined),
      error: path.join(logsDir, files.error),
      ...(files.warning ? { warning: path.join(logsDir, files.warning) } : {})
    };
  }

  // File logging is skipped under Jest and for console-only profiles
  private static resolveLogDirectory(): string | null {
    if (process.env.NODE_ENV === 'test' || !this.config.logDirectory) {
      return null;
    }
    const logsDir = path.join(process.cwd(), this.config.logDirectory);
    try {
      fs.mkdirSync(logsDir, { recursive: true });
      return logsDir;
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, using console only: ${error}`);
      return null;
    }
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
