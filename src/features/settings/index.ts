export { type SaveCredentialsOptions, saveCredentials, clearCredentials, maskToken } from './credentials.js';
