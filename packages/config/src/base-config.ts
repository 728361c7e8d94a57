/**
 * Base configuration schema
 * Runtime environment, logging and outbound HTTP settings
 */

import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

/**
 * Settings for the default fetch-based transport
 */
export const HttpConfigSchema = z.object({
  HTTP_TIMEOUT_MS: z.number().int().positive().default(10_000),
  HTTP_USER_AGENT: z.string().min(1).default('social-identity'),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;
