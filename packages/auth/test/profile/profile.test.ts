import {
  createLoginInfo,
  createSocialProfile,
  loginInfoEquals,
  loginInfoKey
} from '@social-identity/auth';

describe('LoginInfo', () => {
  it('compares by value', () => {
    expect(loginInfoEquals(createLoginInfo('microsoft', '42'), createLoginInfo('microsoft', '42'))).toBe(true);
    expect(loginInfoEquals(createLoginInfo('microsoft', '42'), createLoginInfo('google', '42'))).toBe(false);
    expect(loginInfoEquals(createLoginInfo('microsoft', '42'), createLoginInfo('microsoft', '43'))).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createLoginInfo('microsoft', '42'))).toBe(true);
  });

  it('has a stable key', () => {
    expect(loginInfoKey(createLoginInfo('google', '1001'))).toBe('google:1001');
  });
});

describe('createSocialProfile', () => {
  const loginInfo = createLoginInfo('microsoft', '42');

  it('keeps only fields with values', () => {
    const profile = createSocialProfile(loginInfo, {
      firstName: 'Ada',
      lastName: null,
      fullName: undefined,
      email: 'ada@example.com'
    });

    expect(Object.keys(profile)).toEqual(['loginInfo', 'firstName', 'email']);
  });

  it('builds a profile from login info alone', () => {
    expect(createSocialProfile(loginInfo)).toEqual({ loginInfo: { providerID: 'microsoft', providerKey: '42' } });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createSocialProfile(loginInfo, { email: 'ada@example.com' }))).toBe(true);
  });
});
