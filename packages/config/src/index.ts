/**
 * @social-identity/config
 * Validated environment configuration for identity providers
 */

export * from './environment.js';
