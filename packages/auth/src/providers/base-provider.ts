/**
 * Shared profile retrieval plumbing for OAuth2 providers
 *
 * Each provider contributes a ProfileFetcher (URL, headers, error envelope)
 * and a ProfileParser (JSON shape). This class wires them to a transport.
 */

import type { CommonSocialProfile } from '../profile/social-profile.js';
import type { HttpTransport } from '../http/transport.js';
import type {
  OAuth2Info,
  OAuth2Settings,
  ProfileFetcher,
  ProfileParser,
  ProfileRequest,
  SocialProvider
} from './types.js';
import { ProfileRetrievalError } from './types.js';
import { logger, tokenPrefix } from '../utils/logger.js';

/**
 * Placeholder for the access token in API URL templates
 */
export const ACCESS_TOKEN_PLACEHOLDER = '%s';

/**
 * Substitute the URL-encoded access token into a URL template
 */
export function formatApiURL(template: string, accessToken: string): string {
  const encoded = encodeURIComponent(accessToken);
  return template.split(ACCESS_TOKEN_PLACEHOLDER).join(encoded);
}

/**
 * Bearer-token GET request with JSON accept header plus any configured headers
 */
export function buildBearerRequest(
  template: string,
  authInfo: OAuth2Info,
  extraHeaders?: Readonly<Record<string, string>>
): ProfileRequest {
  return {
    url: formatApiURL(template, authInfo.accessToken),
    headers: {
      'Authorization': `Bearer ${authInfo.accessToken}`,
      'Accept': 'application/json',
      ...extraHeaders,
    },
  };
}

/**
 * Chooses the parser for a settings value; called again on every `withSettings`
 */
export type ParserResolver<S extends OAuth2Settings> = (settings: Readonly<S>) => ProfileParser;

/**
 * OAuth2 profile provider composed of transport, fetcher and parser
 */
export class OAuth2Provider<S extends OAuth2Settings = OAuth2Settings> implements SocialProvider<S> {
  readonly id: string;
  readonly settings: Readonly<S>;
  protected readonly parser: ProfileParser;

  constructor(
    protected readonly transport: HttpTransport,
    protected readonly fetcher: ProfileFetcher<S>,
    protected readonly resolveParser: ParserResolver<S>,
    settings: S
  ) {
    this.settings = freezeSettings(settings);
    this.id = fetcher.providerID(this.settings);
    this.parser = resolveParser(this.settings);
  }

  /**
   * Fetch and normalize the profile for the given credentials
   */
  async retrieveProfile(authInfo: OAuth2Info): Promise<CommonSocialProfile> {
    const request = this.fetcher.buildRequest(this.settings, authInfo);
    logger.oauthDebug('Fetching profile', { provider: this.id, tokenPrefix: tokenPrefix(authInfo.accessToken) });

    // Transport failures propagate unchanged
    const response = await this.transport.get(request.url, request.headers);
    logger.oauthDebug('Profile response received', { provider: this.id, status: response.status });

    const envelope = this.fetcher.classifyError(response.body);
    if (envelope) {
      const error = new ProfileRetrievalError(this.id, envelope.code, envelope.message);
      logger.oauthWarn('Provider rejected profile request', {
        provider: this.id,
        status: response.status,
        code: envelope.code
      });
      throw error;
    }

    return this.parser.parse(response.body, authInfo);
  }

  withSettings(transform: (settings: Readonly<S>) => S): OAuth2Provider<S> {
    return new OAuth2Provider(this.transport, this.fetcher, this.resolveParser, transform(this.settings));
  }
}

function freezeSettings<S extends OAuth2Settings>(settings: S): Readonly<S> {
  const frozen: S = { ...settings };
  // Nested maps (headers, field names) are copied so the caller keeps its own
  for (const [key, value] of Object.entries(settings)) {
    if (typeof value === 'object' && value !== null) {
      Reflect.set(frozen, key, Object.freeze({ ...value }));
    }
  }
  return Object.freeze(frozen);
}
