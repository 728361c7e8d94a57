/**
 * Generic profile provider
 *
 * Supports any OAuth 2.0 / OpenID Connect provider with a userinfo style
 * endpoint. The JSON property behind each profile field is configurable.
 */

import type { HttpTransport } from '../http/transport.js';
import { createLoginInfo } from '../profile/login-info.js';
import { createSocialProfile, type CommonSocialProfile } from '../profile/social-profile.js';
import { OAuth2Provider, buildBearerRequest, type ParserResolver } from './base-provider.js';
import type {
  GenericOAuth2Settings,
  GenericProfileFields,
  OAuth2Info,
  ProfileFetcher,
  ProfileParser,
  ProfileRequest,
  ProviderErrorEnvelope
} from './types.js';
import { ProfileParseError } from './types.js';
import {
  classifyNestedErrorEnvelope,
  classifyOAuthErrorEnvelope,
  isJsonObject
} from '../shared/profile-helpers.js';

/**
 * OpenID Connect standard claim names
 */
export const DEFAULT_PROFILE_FIELDS: Readonly<GenericProfileFields> = Object.freeze({
  id: 'sub',
  firstName: 'given_name',
  lastName: 'family_name',
  fullName: 'name',
  email: 'email',
  avatarURL: 'picture',
});

// Tried when no id field is configured and `sub` is missing
const FALLBACK_ID_FIELD = 'id';

export class GenericProfileFetcher implements ProfileFetcher<GenericOAuth2Settings> {
  providerID(settings: GenericOAuth2Settings): string {
    return settings.providerID;
  }

  buildRequest(settings: GenericOAuth2Settings, authInfo: OAuth2Info): ProfileRequest {
    return buildBearerRequest(settings.apiURL, authInfo, settings.headers);
  }

  classifyError(content: unknown): ProviderErrorEnvelope | null {
    return classifyOAuthErrorEnvelope(content) ?? classifyNestedErrorEnvelope(content);
  }
}

/**
 * Reads profile fields by configured property name. Identifiers may be
 * strings or numbers; other fields must be strings.
 */
export class GenericProfileParser implements ProfileParser {
  private readonly fields: GenericProfileFields;
  private readonly explicitIdField: boolean;

  constructor(
    private readonly providerID: string,
    fields: Partial<GenericProfileFields> = {}
  ) {
    this.fields = {
      id: fields.id ?? DEFAULT_PROFILE_FIELDS.id,
      firstName: fields.firstName ?? DEFAULT_PROFILE_FIELDS.firstName,
      lastName: fields.lastName ?? DEFAULT_PROFILE_FIELDS.lastName,
      fullName: fields.fullName ?? DEFAULT_PROFILE_FIELDS.fullName,
      email: fields.email ?? DEFAULT_PROFILE_FIELDS.email,
      avatarURL: fields.avatarURL ?? DEFAULT_PROFILE_FIELDS.avatarURL,
    };
    this.explicitIdField = fields.id !== undefined;
  }

  async parse(content: unknown, _authInfo: OAuth2Info): Promise<CommonSocialProfile> {
    if (!isJsonObject(content)) {
      throw new ProfileParseError(`Unexpected profile content from ${this.providerID}: (root)`, this.providerID);
    }

    const userID = this.readIdentifier(content[this.fields.id])
      ?? (this.explicitIdField ? undefined : this.readIdentifier(content[FALLBACK_ID_FIELD]));
    if (userID === undefined) {
      throw new ProfileParseError(
        `Unexpected profile content from ${this.providerID}: ${this.fields.id}`,
        this.providerID
      );
    }

    return createSocialProfile(createLoginInfo(this.providerID, userID), {
      firstName: readString(content[this.fields.firstName]),
      lastName: readString(content[this.fields.lastName]),
      fullName: readString(content[this.fields.fullName]),
      email: readString(content[this.fields.email]),
      avatarURL: readString(content[this.fields.avatarURL]),
    });
  }

  private readIdentifier(value: unknown): string | undefined {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return undefined;
  }
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

const resolveGenericParser: ParserResolver<GenericOAuth2Settings> =
  (current) => new GenericProfileParser(current.providerID, current.fields);

/**
 * The parser is resolved from each settings value, so a provider ID changed
 * through `withSettings` reaches the parsed login info.
 */
export function createGenericProvider(
  transport: HttpTransport,
  settings: GenericOAuth2Settings,
  resolveParser: ParserResolver<GenericOAuth2Settings> = resolveGenericParser
): OAuth2Provider<GenericOAuth2Settings> {
  return new OAuth2Provider(transport, new GenericProfileFetcher(), resolveParser, settings);
}
