// src/config/logging-config.ts
import { z } from 'zod';
import { LoggingConfig } from '../types/config.types';

const LoggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  enableWarningLog: z.boolean(),
  logDirectory: z.string()
});

const LoggingConfigSchema = LoggingProfileSchema.partial().extend({
  profile: z.string().optional(),
  profiles: z.record(LoggingProfileSchema).optional()
});

/**
 * Parse log-config.json text (or the LOGGING_CONFIG variable). Throws on invalid JSON or shape.
 */
export function parseLoggingConfig(text: string): LoggingConfig {
  return LoggingConfigSchema.parse(JSON.parse(text));
}
