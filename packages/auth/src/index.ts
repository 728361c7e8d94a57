/**
 * @social-identity/auth
 *
 * Profile retrieval and normalization for social identity providers
 */

// Canonical profile model
export {
  createLoginInfo,
  loginInfoEquals,
  loginInfoKey,
  type LoginInfo,
} from './profile/login-info.js';
export {
  createSocialProfile,
  type CommonSocialProfile,
  type ProfileFields,
} from './profile/social-profile.js';

// Contracts and settings
export type {
  OAuth2Info,
  OAuth2Settings,
  GenericOAuth2Settings,
  GenericProfileFields,
  ProviderErrorEnvelope,
  ProfileRequest,
  ProfileFetcher,
  ProfileParser,
  SocialProvider,
  SocialProviderType,
  SocialProviderConfig,
  MicrosoftProviderConfig,
  GoogleProviderConfig,
  GenericProviderConfig,
  SocialProviderFactoryContract,
} from './providers/types.js';

// Export error classes as values (not types)
export {
  LIBRARY_NAME,
  formatProfileError,
  SocialIdentityError,
  TransportError,
  ProfileRetrievalError,
  ProfileParseError,
  UnsupportedProviderError,
} from './providers/types.js';

// Provider implementations
export {
  OAuth2Provider,
  ACCESS_TOKEN_PLACEHOLDER,
  formatApiURL,
  buildBearerRequest,
  type ParserResolver,
} from './providers/base-provider.js';
export {
  MICROSOFT_PROVIDER_ID,
  MICROSOFT_API_URL,
  MicrosoftProfileFetcher,
  MicrosoftProfileParser,
  createMicrosoftProvider,
} from './providers/microsoft-provider.js';
export {
  GOOGLE_PROVIDER_ID,
  GOOGLE_API_URL,
  GoogleProfileFetcher,
  GoogleProfileParser,
  createGoogleProvider,
} from './providers/google-provider.js';
export {
  DEFAULT_PROFILE_FIELDS,
  GenericProfileFetcher,
  GenericProfileParser,
  createGenericProvider,
} from './providers/generic-provider.js';

// Shared content helpers
export * from './shared/profile-helpers.js';

// Transport
export {
  FetchHttpTransport,
  type HttpTransport,
  type HttpResponse,
  type FetchHttpTransportOptions,
} from './http/transport.js';

// Factory and registry
export {
  SocialProviderFactory,
  providerConfigsFromEnvironment,
  createRegistryFromEnvironment,
} from './factory.js';
export { SocialProviderRegistry } from './registry.js';

// Utilities
export { sha1 } from './utils/crypt.js';
export { logger, tokenPrefix, type AuthLogger, type LogLevel } from './utils/logger.js';
