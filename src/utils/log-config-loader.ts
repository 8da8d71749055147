// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';
import { Logger } from './logger';
import { parseLoggingConfig } from '../config/logging-config';

/**
 * Load logging configuration from config/log-config.json.
 * Falls back to the configuration passed in when the file is absent or unreadable.
 */
export function loadLoggingConfig(
  fallbackConfig?: LoggingConfig,
  configDir: string = path.join(process.cwd(), 'config')
): LoggingConfig | undefined {
  const logConfigPath = path.join(configDir, 'log-config.json');

  try {
    if (fs.existsSync(logConfigPath)) {
      return parseLoggingConfig(fs.readFileSync(logConfigPath, 'utf-8'));
    }
  } catch (error) {
    console.warn(`Failed to load log-config.json: ${error}`);
  }

  return fallbackConfig;
}

/**
 * Initialize logger with centralized config or fallback.
 * Called at the start of every CLI command.
 */
export function initializeLogger(fallbackConfig?: LoggingConfig, levelOverride?: string): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);
    new Logger('LogConfigLoader').debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }

  if (levelOverride) {
    new Logger('LogConfigLoader').setLevel(levelOverride);
  }
}
