/**
 * Microsoft Graph profile provider
 *
 * @see https://learn.microsoft.com/en-us/graph/api/user-get
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
import { classifyNestedErrorEnvelope, optionalString, parseProfileContent } from '../shared/profile-helpers.js';

export const MICROSOFT_PROVIDER_ID = 'microsoft';
export const MICROSOFT_API_URL = 'https://graph.microsoft.com/v1.0/me?access_token=%s';

const MicrosoftProfileSchema = z.object({
  id: z.string().min(1),
  givenName: optionalString(),
  surname: optionalString(),
  displayName: optionalString(),
  userPrincipalName: optionalString(),
});

export class MicrosoftProfileFetcher implements ProfileFetcher<OAuth2Settings> {
  providerID(): string {
    return MICROSOFT_PROVIDER_ID;
  }

  buildRequest(settings: OAuth2Settings, authInfo: OAuth2Info): ProfileRequest {
    return buildBearerRequest(settings.apiURL ?? MICROSOFT_API_URL, authInfo, settings.headers);
  }

  classifyError(content: unknown): ProviderErrorEnvelope | null {
    return classifyNestedErrorEnvelope(content);
  }
}

/**
 * Graph user resource → canonical profile. The email is the user principal
 * name; `mail` is not read.
 */
export class MicrosoftProfileParser implements ProfileParser {
  async parse(content: unknown, _authInfo: OAuth2Info): Promise<CommonSocialProfile> {
    const user = parseProfileContent(MicrosoftProfileSchema, content, MICROSOFT_PROVIDER_ID);

    return createSocialProfile(createLoginInfo(MICROSOFT_PROVIDER_ID, user.id), {
      firstName: user.givenName,
      lastName: user.surname,
      fullName: user.displayName,
      email: user.userPrincipalName,
    });
  }
}

export function createMicrosoftProvider(
  transport: HttpTransport,
  settings: OAuth2Settings = {},
  parser: ProfileParser = new MicrosoftProfileParser()
): OAuth2Provider<OAuth2Settings> {
  return new OAuth2Provider(transport, new MicrosoftProfileFetcher(), () => parser, settings);
}
