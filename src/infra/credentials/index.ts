/**
 * Credential storage - barrel exports
 */

export type { SecretBackend } from './secretStore.js';
export { SecretStore, keyringBackend } from './secretStore.js';
export { CredentialProvider } from './credentialProvider.js';
export { buildCredentialLine, hasCredentialLine, storeGitCredentials } from './gitCredentialHelper.js';
