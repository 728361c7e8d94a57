/**
 * Social provider factory for creating provider instances
 */

import type { Environment } from '@social-identity/config';
import { EnvironmentConfig } from '@social-identity/config';
import type {
  SocialProvider,
  SocialProviderConfig,
  SocialProviderFactoryContract,
  SocialProviderType
} from './providers/types.js';
import { UnsupportedProviderError } from './providers/types.js';
import { createMicrosoftProvider } from './providers/microsoft-provider.js';
import { createGoogleProvider } from './providers/google-provider.js';
import { createGenericProvider } from './providers/generic-provider.js';
import { FetchHttpTransport, type HttpTransport } from './http/transport.js';
import { SocialProviderRegistry } from './registry.js';
import { logger } from './utils/logger.js';

const SUPPORTED_PROVIDERS: readonly SocialProviderType[] = ['microsoft', 'google', 'generic'];

function settingsOf<T extends { type: SocialProviderType }>(config: T): Omit<T, 'type'> {
  const { type: _type, ...settings } = config;
  return settings;
}

/**
 * Factory for creating social provider instances
 */
export class SocialProviderFactory implements SocialProviderFactoryContract {
  private static instance: SocialProviderFactory | null = null;

  /**
   * Get singleton instance of the factory
   */
  static getInstance(): SocialProviderFactory {
    if (!SocialProviderFactory.instance) {
      SocialProviderFactory.instance = new SocialProviderFactory();
    }
    return SocialProviderFactory.instance;
  }

  /**
   * Create a provider instance based on configuration
   */
  createProvider(config: SocialProviderConfig, transport: HttpTransport): SocialProvider {
    switch (config.type) {
      case 'microsoft':
        return createMicrosoftProvider(transport, settingsOf(config));

      case 'google':
        return createGoogleProvider(transport, settingsOf(config));

      case 'generic':
        return createGenericProvider(transport, settingsOf(config));

      default:
        return this.throwUnsupportedProvider(config);
    }
  }

  /**
   * Get list of supported provider types
   */
  getSupportedProviders(): SocialProviderType[] {
    return [...SUPPORTED_PROVIDERS];
  }

  /**
   * Check if a provider type is supported
   */
  isProviderSupported(type: string): type is SocialProviderType {
    return SUPPORTED_PROVIDERS.some(supported => supported === type);
  }

  private throwUnsupportedProvider(configExhaustive: never): never {
    const type: unknown = Reflect.get(Object(configExhaustive), 'type');
    throw new UnsupportedProviderError(String(type ?? 'unknown'));
  }
}

/**
 * Provider configurations for everything the environment enables
 */
export function providerConfigsFromEnvironment(env: Environment): SocialProviderConfig[] {
  const configs: SocialProviderConfig[] = [];

  if (env.MICROSOFT_ENABLED) {
    configs.push({ type: 'microsoft', ...(env.MICROSOFT_API_URL ? { apiURL: env.MICROSOFT_API_URL } : {}) });
  }

  if (env.GOOGLE_ENABLED) {
    configs.push({ type: 'google', ...(env.GOOGLE_API_URL ? { apiURL: env.GOOGLE_API_URL } : {}) });
  }

  if (env.GENERIC_PROVIDER_ID && env.GENERIC_API_URL) {
    configs.push({
      type: 'generic',
      providerID: env.GENERIC_PROVIDER_ID,
      apiURL: env.GENERIC_API_URL,
      fields: {
        ...(env.GENERIC_ID_FIELD ? { id: env.GENERIC_ID_FIELD } : {}),
        ...(env.GENERIC_EMAIL_FIELD ? { email: env.GENERIC_EMAIL_FIELD } : {}),
        ...(env.GENERIC_NAME_FIELD ? { fullName: env.GENERIC_NAME_FIELD } : {}),
      },
    });
  }

  return configs;
}

/**
 * Build a registry holding every provider the environment enables
 */
export function createRegistryFromEnvironment(
  env: Environment = EnvironmentConfig.load(),
  transport: HttpTransport = new FetchHttpTransport({ timeoutMs: env.HTTP_TIMEOUT_MS, userAgent: env.HTTP_USER_AGENT })
): SocialProviderRegistry {
  const factory = SocialProviderFactory.getInstance();
  const providers = providerConfigsFromEnvironment(env).map(config => factory.createProvider(config, transport));

  logger.info('Social providers configured', { providers: providers.map(provider => provider.id) });
  return new SocialProviderRegistry(providers);
}
