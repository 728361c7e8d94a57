/**
 * Environment configuration
 * Combines all configuration schemas and loads them from process.env
 */

import { z } from 'zod';
import { BaseConfigSchema, HttpConfigSchema } from './base-config.js';
import { ProviderConfigSchema } from './provider-config.js';

export * from './base-config.js';
export * from './provider-config.js';

/**
 * Combined environment schema
 */
export const EnvironmentSchema = BaseConfigSchema
  .merge(HttpConfigSchema)
  .merge(ProviderConfigSchema)
  .refine(
    (env) => (env.GENERIC_PROVIDER_ID === undefined) === (env.GENERIC_API_URL === undefined),
    {
      message: 'GENERIC_PROVIDER_ID and GENERIC_API_URL must be set together',
      path: ['GENERIC_API_URL'],
    }
  )
  .refine(
    (env) => !(
      (env.GENERIC_PROVIDER_ID === 'microsoft' && env.MICROSOFT_ENABLED) ||
      (env.GENERIC_PROVIDER_ID === 'google' && env.GOOGLE_ENABLED)
    ),
    {
      message: 'GENERIC_PROVIDER_ID must not reuse the ID of an enabled built-in provider',
      path: ['GENERIC_PROVIDER_ID'],
    }
  );

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: Error | unknown): void;
}

type EnvSource = Record<string, string | undefined>;

// Empty strings count as unset
function readOptional(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

const TRUE_FLAGS = ['true', '1', 'yes', 'on'];
const FALSE_FLAGS = ['false', '0', 'no', 'off'];

// Unrecognised values are passed through so the boolean schema rejects them
function readFlag(source: EnvSource, name: string): boolean | string | undefined {
  const value = readOptional(source, name);
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (TRUE_FLAGS.includes(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.includes(normalized)) {
    return false;
  }
  return value;
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration (cached after the first call)
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }
    this._instance = this.parse(process.env);
    return this._instance;
  }

  /**
   * Validate an explicit variable set without touching the cache
   */
  static parse(source: EnvSource): Environment {
    const env = {
      NODE_ENV: readOptional(source, 'NODE_ENV') ?? 'development',
      LOG_LEVEL: readOptional(source, 'LOG_LEVEL'),

      HTTP_TIMEOUT_MS: Number.parseInt(readOptional(source, 'HTTP_TIMEOUT_MS') ?? '10000', 10),
      HTTP_USER_AGENT: readOptional(source, 'HTTP_USER_AGENT'),

      MICROSOFT_ENABLED: readFlag(source, 'MICROSOFT_ENABLED'),
      MICROSOFT_API_URL: readOptional(source, 'MICROSOFT_API_URL'),

      GOOGLE_ENABLED: readFlag(source, 'GOOGLE_ENABLED'),
      GOOGLE_API_URL: readOptional(source, 'GOOGLE_API_URL'),

      GENERIC_PROVIDER_ID: readOptional(source, 'GENERIC_PROVIDER_ID'),
      GENERIC_API_URL: readOptional(source, 'GENERIC_API_URL'),
      GENERIC_ID_FIELD: readOptional(source, 'GENERIC_ID_FIELD'),
      GENERIC_EMAIL_FIELD: readOptional(source, 'GENERIC_EMAIL_FIELD'),
      GENERIC_NAME_FIELD: readOptional(source, 'GENERIC_NAME_FIELD'),
    };

    try {
      return EnvironmentSchema.parse(env);
    } catch (error) {
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', error);
      }
      throw new Error('Invalid environment configuration', { cause: error });
    }
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Clear the cached configuration (tests and reloads)
   */
  static reset(): void {
    this._instance = null;
  }

  /**
   * IDs of the providers this configuration enables
   */
  static enabledProviders(env: Environment = this.load()): string[] {
    const providers: string[] = [];
    if (env.MICROSOFT_ENABLED) {
      providers.push('microsoft');
    }
    if (env.GOOGLE_ENABLED) {
      providers.push('google');
    }
    if (env.GENERIC_PROVIDER_ID) {
      providers.push(env.GENERIC_PROVIDER_ID);
    }
    return providers;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      console.warn('EnvironmentConfig: Logger not set, skipping configuration logging');
      return;
    }

    const env = this.load();
    this._logger.info('Configuration loaded', {
      nodeEnv: env.NODE_ENV,
      httpTimeoutMs: env.HTTP_TIMEOUT_MS,
      providers: this.enabledProviders(env).join(', ') || 'none',
    });
  }
}
