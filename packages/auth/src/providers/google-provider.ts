/**
 * Google profile provider (OpenID Connect userinfo)
 */

import { z } from 'zod';
import type { HttpTransport } from '../http/transport.js';
import { createLoginInfo } from '../profile/login-info.js';
import { createSocialProfile, type CommonSocialProfile } from '../profile/social-profile.js';
import { OAuth2Provider, buildBearerRequest } from './base-provider.js';
import type {
  OAuth2Info,
  OAuth2Settings,
  ProfileFetcher,
  ProfileParser,
  ProfileRequest,
  ProviderErrorEnvelope
} from './types.js';
import { ProfileParseError } from './types.js';
import {
  classifyNestedErrorEnvelope,
  classifyOAuthErrorEnvelope,
  optionalString,
  parseProfileContent
} from '../shared/profile-helpers.js';

export const GOOGLE_PROVIDER_ID = 'google';
export const GOOGLE_API_URL = 'https://www.googleapis.com/oauth2/v3/userinfo?access_token=%s';

// v3 userinfo uses `sub`, the older v2 endpoint `id`
const GoogleProfileSchema = z.object({
  sub: z.string().min(1).nullish().catch(undefined),
  id: z.string().min(1).nullish().catch(undefined),
  given_name: optionalString(),
  family_name: optionalString(),
  name: optionalString(),
  email: optionalString(),
  picture: optionalString(),
});

export class GoogleProfileFetcher implements ProfileFetcher<OAuth2Settings> {
  providerID(): string {
    return GOOGLE_PROVIDER_ID;
  }

  buildRequest(settings: OAuth2Settings, authInfo: OAuth2Info): ProfileRequest {
    return buildBearerRequest(settings.apiURL ?? GOOGLE_API_URL, authInfo, settings.headers);
  }

  /**
   * Google APIs answer with either a nested `error` object or an OAuth
   * `error` string, depending on the endpoint
   */
  classifyError(content: unknown): ProviderErrorEnvelope | null {
    return classifyNestedErrorEnvelope(content) ?? classifyOAuthErrorEnvelope(content);
  }
}

export class GoogleProfileParser implements ProfileParser {
  async parse(content: unknown, _authInfo: OAuth2Info): Promise<CommonSocialProfile> {
    const user = parseProfileContent(GoogleProfileSchema, content, GOOGLE_PROVIDER_ID);
    const userID = user.sub ?? user.id;
    if (!userID) {
      throw new ProfileParseError(`Unexpected profile content from ${GOOGLE_PROVIDER_ID}: sub`, GOOGLE_PROVIDER_ID);
    }

    return createSocialProfile(createLoginInfo(GOOGLE_PROVIDER_ID, userID), {
      firstName: user.given_name,
      lastName: user.family_name,
      fullName: user.name,
      email: user.email,
      avatarURL: user.picture,
    });
  }
}

export function createGoogleProvider(
  transport: HttpTransport,
  settings: OAuth2Settings = {},
  parser: ProfileParser = new GoogleProfileParser()
): OAuth2Provider<OAuth2Settings> {
  return new OAuth2Provider(transport, new GoogleProfileFetcher(), () => parser, settings);
}
