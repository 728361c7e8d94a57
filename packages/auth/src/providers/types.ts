/**
 * Social provider contracts, settings and error types
 */

import type { CommonSocialProfile } from '../profile/social-profile.js';
import type { HttpTransport } from '../http/transport.js';

/**
 * Library tag used in provider error messages
 */
export const LIBRARY_NAME = 'SocialIdentity';

/**
 * Built-in provider types
 */
export type SocialProviderType = 'microsoft' | 'google' | 'generic';

/**
 * Credentials from a completed OAuth2 handshake
 */
export interface OAuth2Info {
  readonly accessToken: string;
  readonly tokenType?: string;
  /** Lifetime in seconds */
  readonly expiresIn?: number;
  readonly refreshToken?: string;
  readonly params?: Readonly<Record<string, string>>;
}

/**
 * Settings shared by every OAuth2 profile provider
 */
export interface OAuth2Settings {
  /**
   * Overrides the provider's default profile URL; `%s` is replaced with the
   * URL-encoded access token
   */
  readonly apiURL?: string;
  /** Extra request headers, applied after the defaults */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * JSON property names read by the generic profile parser
 */
export interface GenericProfileFields {
  readonly id: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly fullName: string;
  readonly email: string;
  readonly avatarURL: string;
}

/**
 * Settings for a provider that exposes an OpenID Connect style userinfo endpoint
 */
export interface GenericOAuth2Settings extends OAuth2Settings {
  readonly providerID: string;
  readonly apiURL: string;
  readonly fields?: Partial<GenericProfileFields>;
}

/**
 * Provider-side error extracted from a response body
 */
export interface ProviderErrorEnvelope {
  readonly code: string | number;
  readonly message: string;
}

/**
 * Outbound profile request
 */
export interface ProfileRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Provider-specific request building and error classification
 */
export interface ProfileFetcher<S extends OAuth2Settings = OAuth2Settings> {
  /**
   * Provider ID for the given settings
   */
  providerID(settings: S): string;

  buildRequest(settings: S, authInfo: OAuth2Info): ProfileRequest;

  /**
   * Structural test for the provider's error envelope. Returns `null` when
   * the content is not an error.
   */
  classifyError(content: unknown): ProviderErrorEnvelope | null;
}

/**
 * Turns provider content into a canonical profile
 */
export interface ProfileParser {
  parse(content: unknown, authInfo: OAuth2Info): Promise<CommonSocialProfile>;
}

/**
 * A configured identity provider that can retrieve user profiles
 */
export interface SocialProvider<S extends OAuth2Settings = OAuth2Settings> {
  readonly id: string;
  readonly settings: Readonly<S>;

  retrieveProfile(authInfo: OAuth2Info): Promise<CommonSocialProfile>;

  /**
   * New provider built from `transform(settings)`; this instance is unchanged
   */
  withSettings(transform: (settings: Readonly<S>) => S): SocialProvider<S>;
}

/**
 * Provider configuration accepted by the factory
 */
export type MicrosoftProviderConfig = { type: 'microsoft' } & OAuth2Settings;
export type GoogleProviderConfig = { type: 'google' } & OAuth2Settings;
export type GenericProviderConfig = { type: 'generic' } & GenericOAuth2Settings;

export type SocialProviderConfig =
  | MicrosoftProviderConfig
  | GoogleProviderConfig
  | GenericProviderConfig;

/**
 * Factory interface
 */
export interface SocialProviderFactoryContract {
  createProvider(config: SocialProviderConfig, transport: HttpTransport): SocialProvider;
  getSupportedProviders(): SocialProviderType[];
  isProviderSupported(type: string): type is SocialProviderType;
}

/**
 * Error types
 */
export class SocialIdentityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly providerID?: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SocialIdentityError';
  }
}

export class TransportError extends SocialIdentityError {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, 'transport_error', undefined, status === undefined ? undefined : { status }, options);
    this.name = 'TransportError';
  }
}

export class ProfileRetrievalError extends SocialIdentityError {
  constructor(
    providerID: string,
    public readonly providerErrorCode: string | number,
    public readonly providerErrorMessage: string
  ) {
    super(
      formatProfileError(providerID, providerErrorCode, providerErrorMessage),
      'profile_retrieval_error',
      providerID,
      { code: providerErrorCode, message: providerErrorMessage }
    );
    this.name = 'ProfileRetrievalError';
  }
}

export class ProfileParseError extends SocialIdentityError {
  constructor(message: string, providerID: string, details?: unknown) {
    super(message, 'profile_parse_error', providerID, details);
    this.name = 'ProfileParseError';
  }
}

export class UnsupportedProviderError extends SocialIdentityError {
  constructor(providerID: string) {
    super(`Unsupported social provider: ${providerID}`, 'unsupported_provider', providerID);
    this.name = 'UnsupportedProviderError';
  }
}

export function formatProfileError(providerID: string, code: string | number, message: string): string {
  return `[${LIBRARY_NAME}][${providerID}] Error retrieving profile information. Error code: ${String(code)}, message: ${message}`;
}
