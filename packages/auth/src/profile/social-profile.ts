/**
 * Canonical user profile built from provider content
 */

import type { LoginInfo } from './login-info.js';

export interface CommonSocialProfile {
  readonly loginInfo: LoginInfo;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly fullName?: string;
  readonly email?: string;
  readonly avatarURL?: string;
}

export type ProfileFields = Omit<CommonSocialProfile, 'loginInfo'>;

type OptionalProfileFields = { [K in keyof ProfileFields]?: string | null | undefined };

/**
 * Build a frozen profile. Fields that are `undefined` or `null` are left out
 * entirely rather than stored as empty values.
 */
export function createSocialProfile(loginInfo: LoginInfo, fields: OptionalProfileFields = {}): CommonSocialProfile {
  const profile: { -readonly [K in keyof CommonSocialProfile]: CommonSocialProfile[K] } = { loginInfo };

  for (const key of ['firstName', 'lastName', 'fullName', 'email', 'avatarURL'] as const) {
    const value = fields[key];
    if (value !== undefined && value !== null) {
      profile[key] = value;
    }
  }

  return Object.freeze(profile);
}
