/**
 * Lookup of configured social providers by ID
 */

import type { CommonSocialProfile } from './profile/social-profile.js';
import type { OAuth2Info, SocialProvider } from './providers/types.js';
import { SocialIdentityError, UnsupportedProviderError } from './providers/types.js';

/**
 * Immutable set of providers keyed by provider ID
 */
export class SocialProviderRegistry {
  private readonly providers: ReadonlyMap<string, SocialProvider>;

  constructor(providers: Iterable<SocialProvider> = []) {
    const byId = new Map<string, SocialProvider>();
    for (const provider of providers) {
      if (byId.has(provider.id)) {
        throw new SocialIdentityError(`Duplicate social provider: ${provider.id}`, 'duplicate_provider', provider.id);
      }
      byId.set(provider.id, provider);
    }
    this.providers = byId;
  }

  get(id: string): SocialProvider | undefined {
    return this.providers.get(id);
  }

  /**
   * @throws UnsupportedProviderError when no provider has this ID
   */
  require(id: string): SocialProvider {
    const provider = this.providers.get(id);
    if (!provider) {
      throw new UnsupportedProviderError(id);
    }
    return provider;
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  ids(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Registry with `provider` added, replacing any provider with the same ID
   */
  withProvider(provider: SocialProvider): SocialProviderRegistry {
    const others = [...this.providers.values()].filter(existing => existing.id !== provider.id);
    return new SocialProviderRegistry([...others, provider]);
  }

  /**
   * Unknown IDs reject with UnsupportedProviderError
   */
  async retrieveProfile(providerID: string, authInfo: OAuth2Info): Promise<CommonSocialProfile> {
    return this.require(providerID).retrieveProfile(authInfo);
  }
}
