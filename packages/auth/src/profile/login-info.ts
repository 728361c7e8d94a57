/**
 * Identity of a user at a specific provider
 */
export interface LoginInfo {
  readonly providerID: string;
  readonly providerKey: string;
}

export function createLoginInfo(providerID: string, providerKey: string): LoginInfo {
  return Object.freeze({ providerID, providerKey });
}

export function loginInfoEquals(a: LoginInfo, b: LoginInfo): boolean {
  return a.providerID === b.providerID && a.providerKey === b.providerKey;
}

/**
 * Stable map key, e.g. `microsoft:42`
 */
export function loginInfoKey(info: LoginInfo): string {
  return `${info.providerID}:${info.providerKey}`;
}
