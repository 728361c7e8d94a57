/**
 * Identity provider configuration schema
 * Endpoint overrides and field mappings per provider
 */

import { z } from 'zod';

export const ProviderConfigSchema = z.object({
  // Microsoft Graph
  MICROSOFT_ENABLED: z.boolean().default(true),
  MICROSOFT_API_URL: z.string().url().optional(),

  // Google
  GOOGLE_ENABLED: z.boolean().default(true),
  GOOGLE_API_URL: z.string().url().optional(),

  // Generic OpenID Connect style userinfo endpoint
  GENERIC_PROVIDER_ID: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/).optional(),
  GENERIC_API_URL: z.string().url().optional(),
  GENERIC_ID_FIELD: z.string().min(1).optional(),
  GENERIC_EMAIL_FIELD: z.string().min(1).optional(),
  GENERIC_NAME_FIELD: z.string().min(1).optional(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
