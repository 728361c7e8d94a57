import { vi } from 'vitest';
import {
  MICROSOFT_API_URL,
  MICROSOFT_PROVIDER_ID,
  MicrosoftProfileParser,
  ProfileParseError,
  ProfileRetrievalError,
  createMicrosoftProvider,
  type ProfileParser
} from '@social-identity/auth';
import { authInfo, replyingTransport } from '../helpers/fake-transport.js';

const adaLovelace = {
  id: '42',
  givenName: 'Ada',
  surname: 'Lovelace',
  userPrincipalName: 'ada@example.com'
};

const spyParser = () => {
  const parse = vi.fn<ProfileParser['parse']>();
  return { parse };
};

describe('Microsoft provider', () => {
  describe('retrieveProfile', () => {
    it('requests the Graph profile with the access token', async () => {
      const transport = replyingTransport(adaLovelace);
      const provider = createMicrosoftProvider(transport);

      await provider.retrieveProfile(authInfo());

      expect(transport.get).toHaveBeenCalledTimes(1);
      expect(transport.get).toHaveBeenCalledWith(
        'https://graph.microsoft.com/v1.0/me?access_token=test-token',
        { Authorization: 'Bearer test-token', Accept: 'application/json' }
      );
    });

    it('normalizes a Graph user into a canonical profile', async () => {
      const provider = createMicrosoftProvider(replyingTransport(adaLovelace));

      const profile = await provider.retrieveProfile(authInfo());

      expect(profile).toEqual({
        loginInfo: { providerID: 'microsoft', providerKey: '42' },
        firstName: 'Ada',
        lastName: 'Lovelace',
        email: 'ada@example.com'
      });
      expect(Object.keys(profile)).toEqual(['loginInfo', 'firstName', 'lastName', 'email']);
    });

    it('maps the display name to the full name', async () => {
      const provider = createMicrosoftProvider(replyingTransport({ ...adaLovelace, displayName: 'Ada Lovelace' }));

      const profile = await provider.retrieveProfile(authInfo());

      expect(profile.fullName).toBe('Ada Lovelace');
    });

    it('fails with the formatted provider error for an error envelope', async () => {
      const provider = createMicrosoftProvider(replyingTransport({ error: { code: 401, message: 'Invalid token' } }, 401));

      const failure = provider.retrieveProfile(authInfo());

      await expect(failure).rejects.toBeInstanceOf(ProfileRetrievalError);
      await expect(failure).rejects.toThrow(
        '[SocialIdentity][microsoft] Error retrieving profile information. Error code: 401, message: Invalid token'
      );
    });

    it('keeps string error codes verbatim', async () => {
      const provider = createMicrosoftProvider(replyingTransport({
        error: { code: 'InvalidAuthenticationToken', message: 'Access token is empty.' }
      }, 401));

      await expect(provider.retrieveProfile(authInfo())).rejects.toMatchObject({
        providerID: 'microsoft',
        providerErrorCode: 'InvalidAuthenticationToken',
        providerErrorMessage: 'Access token is empty.',
        message: '[SocialIdentity][microsoft] Error retrieving profile information. Error code: InvalidAuthenticationToken, message: Access token is empty.'
      });
    });

    it('never hands an error envelope to the parser', async () => {
      const parser = spyParser();
      const provider = createMicrosoftProvider(
        replyingTransport({ error: { code: 401, message: 'Invalid token' } }),
        {},
        parser
      );

      await expect(provider.retrieveProfile(authInfo())).rejects.toBeInstanceOf(ProfileRetrievalError);
      expect(parser.parse).not.toHaveBeenCalled();
    });

    it('treats an error object without details as an envelope', async () => {
      const provider = createMicrosoftProvider(replyingTransport({ error: {} }));

      await expect(provider.retrieveProfile(authInfo())).rejects.toThrow(
        '[SocialIdentity][microsoft] Error retrieving profile information. Error code: unknown, message: unknown'
      );
    });

    it('parses a profile whose error property is not an object', async () => {
      const provider = createMicrosoftProvider(replyingTransport({ ...adaLovelace, error: 'none' }));

      const profile = await provider.retrieveProfile(authInfo());

      expect(profile.loginInfo.providerKey).toBe('42');
    });

    it('yields equal profiles for repeated calls', async () => {
      const provider = createMicrosoftProvider(replyingTransport(adaLovelace));

      const first = await provider.retrieveProfile(authInfo());
      const second = await provider.retrieveProfile(authInfo());

      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    });

    it('uses an overridden API URL', async () => {
      const transport = replyingTransport(adaLovelace);
      const provider = createMicrosoftProvider(transport, { apiURL: 'https://graph.example.com/beta/me?token=%s' });

      await provider.retrieveProfile(authInfo());

      expect(transport.get.mock.calls[0][0]).toBe('https://graph.example.com/beta/me?token=test-token');
    });
  });

  describe('MicrosoftProfileParser', () => {
    const parser = new MicrosoftProfileParser();

    it('leaves out null and mistyped optional fields', async () => {
      const profile = await parser.parse({ id: '42', givenName: null, surname: 7, userPrincipalName: 'ada@example.com' }, authInfo());

      expect(profile).toEqual({
        loginInfo: { providerID: MICROSOFT_PROVIDER_ID, providerKey: '42' },
        email: 'ada@example.com'
      });
      expect(profile).not.toHaveProperty('firstName');
      expect(profile).not.toHaveProperty('lastName');
    });

    it('ignores the mail property', async () => {
      const profile = await parser.parse({ id: '42', mail: 'ada@mail.example.com' }, authInfo());

      expect(profile).not.toHaveProperty('email');
    });

    it('rejects content without a user id', async () => {
      await expect(parser.parse({ givenName: 'Ada' }, authInfo())).rejects.toThrow(
        new ProfileParseError('Unexpected profile content from microsoft: id', MICROSOFT_PROVIDER_ID)
      );
    });

    it('rejects content that is not an object', async () => {
      await expect(parser.parse(null, authInfo())).rejects.toThrow('Unexpected profile content from microsoft: (root)');
    });

    it('returns a frozen profile', async () => {
      const profile = await parser.parse(adaLovelace, authInfo());

      expect(Object.isFrozen(profile)).toBe(true);
      expect(Object.isFrozen(profile.loginInfo)).toBe(true);
    });
  });

  it('exports the Graph endpoint template', () => {
    expect(MICROSOFT_API_URL).toBe('https://graph.microsoft.com/v1.0/me?access_token=%s');
  });
});
