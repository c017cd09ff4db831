/**
 * Credentials entity - public API
 */
export {
  type RedditCredentials,
  type OAuthClientSecrets,
  type OAuthToken,
  REDDIT_CREDENTIALS_FILE,
  YOUTUBE_CLIENT_SECRETS_FILE,
  YOUTUBE_TOKEN_FILE,
} from './types';

export { createCredentialStore, type CredentialStore } from './credential-store';
