// src/config/ConfigValidator.ts

import { z } from 'zod';

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Tracing Configuration Schema
const TracingConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Input Limits Schema
const LimitsConfigSchema = z
  .object({
    maxDocumentLength: z
      .number()
      .int('maxDocumentLength must be a whole number of characters')
      .positive('maxDocumentLength must be positive')
      .optional(),
  })
  .optional();

// Complete Parser Configuration Schema
export const ParserConfigSchema = z.object({
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
  tracing: TracingConfigSchema,
  limits: LimitsConfigSchema,
});

export type ParserConfig = z.infer<typeof ParserConfigSchema>;

/**
 * Validate parser configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ParserConfig {
  return ParserConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: ParserConfig, errors?: string[] }
 */
export function validateConfigSafe(config: unknown) {
  const result = ParserConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['json', 'pretty']);

/**
 * Read logging settings from RSS_LOG_LEVEL / RSS_LOG_FORMAT.
 * Unset or unrecognised values fall back to the logger defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const level = LogLevelSchema.safeParse(env.RSS_LOG_LEVEL);
  const format = LogFormatSchema.safeParse(env.RSS_LOG_FORMAT);

  return validateConfig({
    logging: {
      level: level.success ? level.data : undefined,
      format: format.success ? format.data : undefined,
    },
  });
}
