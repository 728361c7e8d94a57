import {
  LIBRARY_NAME,
  ProfileParseError,
  ProfileRetrievalError,
  SocialIdentityError,
  TransportError,
  UnsupportedProviderError,
  formatProfileError
} from '@social-identity/auth';

describe('Social identity errors', () => {
  it('formats provider error messages', () => {
    expect(LIBRARY_NAME).toBe('SocialIdentity');
    expect(formatProfileError('microsoft', 401, 'Invalid token')).toBe(
      '[SocialIdentity][microsoft] Error retrieving profile information. Error code: 401, message: Invalid token'
    );
  });

  it('ProfileRetrievalError carries the provider error', () => {
    const error = new ProfileRetrievalError('google', 403, 'Forbidden');

    expect(error).toBeInstanceOf(SocialIdentityError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ProfileRetrievalError');
    expect(error.code).toBe('profile_retrieval_error');
    expect(error.providerID).toBe('google');
    expect(error.providerErrorCode).toBe(403);
    expect(error.providerErrorMessage).toBe('Forbidden');
    expect(error.details).toEqual({ code: 403, message: 'Forbidden' });
  });

  it('TransportError keeps the status and cause', () => {
    const cause = new Error('socket hang up');
    const error = new TransportError('Request failed: 503', 503, { cause });

    expect(error.code).toBe('transport_error');
    expect(error.status).toBe(503);
    expect(error.details).toEqual({ status: 503 });
    expect(error.cause).toBe(cause);
    expect(error.providerID).toBeUndefined();
  });

  it('parse and lookup errors are distinct from retrieval errors', () => {
    const parseError = new ProfileParseError('Unexpected profile content from microsoft: id', 'microsoft');
    const lookupError = new UnsupportedProviderError('okta');

    expect(parseError).not.toBeInstanceOf(ProfileRetrievalError);
    expect(parseError.code).toBe('profile_parse_error');
    expect(lookupError.code).toBe('unsupported_provider');
    expect(lookupError.message).toBe('Unsupported social provider: okta');
  });
});
