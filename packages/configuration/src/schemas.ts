/**
 * Standard configuration schemas shared by services
 */

import { z } from 'zod';

/**
 * Standard logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('WARN'),
  /** Log format */
  format: z.enum(['json', 'text']).default('text'),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
