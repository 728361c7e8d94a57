/**
 * Shared helpers for reading provider content
 *
 * Error envelopes and profile shapes are matched with zod schemas.
 */

import { z } from 'zod';
import type { ProviderErrorEnvelope } from '../providers/types.js';
import { ProfileParseError } from '../providers/types.js';

const UNKNOWN = 'unknown';

/**
 * Best-effort optional string: absent, `null` or a non-string value all read as `undefined`
 */
export const optionalString = () => z.string().nullish().catch(undefined);

/**
 * `{"error": {"code": 401, "message": "..."}}` as used by Microsoft Graph and Google APIs
 */
const NestedErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.union([z.number(), z.string()]).optional().catch(undefined),
    message: z.string().optional().catch(undefined),
  }),
});

/**
 * `{"error": "invalid_token", "error_description": "..."}` (RFC 6749 / RFC 6750)
 */
const OAuthErrorEnvelopeSchema = z.object({
  error: z.string(),
  error_description: z.string().optional().catch(undefined),
});

export function classifyNestedErrorEnvelope(content: unknown): ProviderErrorEnvelope | null {
  const result = NestedErrorEnvelopeSchema.safeParse(content);
  if (!result.success) {
    return null;
  }
  return {
    code: result.data.error.code ?? UNKNOWN,
    message: result.data.error.message ?? UNKNOWN,
  };
}

export function classifyOAuthErrorEnvelope(content: unknown): ProviderErrorEnvelope | null {
  const result = OAuthErrorEnvelopeSchema.safeParse(content);
  if (!result.success) {
    return null;
  }
  return {
    code: result.data.error,
    message: result.data.error_description ?? result.data.error,
  };
}

/**
 * Validate provider content against a profile schema
 *
 * @throws ProfileParseError naming the offending paths
 */
export function parseProfileContent<T extends z.ZodTypeAny>(
  schema: T,
  content: unknown,
  providerID: string
): z.output<T> {
  const result = schema.safeParse(content);
  if (!result.success) {
    const paths = result.error.issues.map(issue => issue.path.join('.') || '(root)');
    throw new ProfileParseError(
      `Unexpected profile content from ${providerID}: ${paths.join(', ')}`,
      providerID,
      result.error.issues
    );
  }
  return result.data;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
