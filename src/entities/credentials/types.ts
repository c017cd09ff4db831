/**
 * Credential file types
 *
 * All files live in the configuration directory. The operator provides
 * `reddit.json` and `youtube.json`; `youtube-token.json` is written by the
 * tool after the first authorization.
 */

import { z } from 'zod';

export const REDDIT_CREDENTIALS_FILE = 'reddit.json';
export const YOUTUBE_CLIENT_SECRETS_FILE = 'youtube.json';
export const YOUTUBE_TOKEN_FILE = 'youtube-token.json';

/**
 * Reddit "script" or "web" app credentials
 */
export const RedditCredentialsSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
});

export type RedditCredentials = z.infer<typeof RedditCredentialsSchema>;

const OAuthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
});

/**
 * Google client secrets file as downloaded from the Cloud console
 */
export const OAuthClientSecretsFileSchema = z
  .object({
    installed: OAuthClientSchema.optional(),
    web: OAuthClientSchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'expected an "installed" or "web" client',
  });

export type OAuthClientSecrets = z.infer<typeof OAuthClientSchema>;

/**
 * Cached OAuth token
 */
export const OAuthTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  /** Epoch milliseconds */
  expiry_date: z.number(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export type OAuthToken = z.infer<typeof OAuthTokenSchema>;
