/**
 * Logger for the auth package
 * Delegates to the shared pino-backed observability logger
 */

import { logger as observabilityLogger } from '@social-identity/observability';

export type { LogLevel } from '@social-identity/observability';

/**
 * Logging surface used by providers, parsers and the transport
 */
export interface AuthLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: Error | unknown): void;
  oauthDebug(message: string, data?: unknown): void;
  oauthInfo(message: string, data?: unknown): void;
  oauthWarn(message: string, data?: unknown): void;
  oauthError(message: string, error?: Error | unknown): void;
}

export const logger: AuthLogger = observabilityLogger;

/**
 * Short, log-safe prefix of an access token
 */
export function tokenPrefix(token: string): string {
  return token.length > 6 ? `${token.substring(0, 6)}…` : '[short]';
}
