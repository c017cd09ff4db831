/**
 * Google OAuth for the YouTube Data API
 *
 * The first run walks the operator through the installed-app consent flow
 * and caches the resulting token in the configuration directory. Later runs
 * reuse the cached token and refresh it when it is about to expire.
 */

import { createInterface } from 'node:readline/promises';
import { createHttpClient } from '../../../shared/api';
import { ConfigError, logger } from '../../../shared/lib';
import type { CredentialStore, OAuthClientSecrets, OAuthToken } from '../../../entities/credentials';
import type { GoogleTokenResponse } from '../model';

/** Manage-your-YouTube-account scope, needed to insert playlist items */
export const YOUTUBE_SCOPE = 'https://www.googleapis.com/auth/youtube.force-ssl';

const DEFAULT_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const DEFAULT_REDIRECT_URI = 'http://localhost';

/** Refresh the access token this long before it expires */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export interface YouTubeAuthOptions {
  /**
   * Show the consent URL and return what the operator pasted back
   * (the authorization code or the full redirect URL)
   */
  promptForCode?: (authUrl: string) => Promise<string>;
}

/**
 * Build the consent URL for the installed-app flow
 */
export function buildAuthorizationUrl(secrets: OAuthClientSecrets): string {
  const url = new URL(secrets.auth_uri ?? DEFAULT_AUTH_URI);
  url.searchParams.set('client_id', secrets.client_id);
  url.searchParams.set('redirect_uri', redirectUri(secrets));
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('scope', YOUTUBE_SCOPE);
  url.searchParams.set('access_type', 'offline');
  url.searchParams.set('prompt', 'consent');
  return url.toString();
}

/**
 * Pull the authorization code out of what the operator pasted
 *
 * Accepts either the bare code or the whole `http://localhost/?code=...`
 * URL the browser was redirected to.
 */
export function extractAuthorizationCode(input: string): string {
  const trimmed = input.trim();

  if (/^https?:\/\//i.test(trimmed)) {
    const code = new URL(trimmed).searchParams.get('code');
    if (!code) {
      throw new ConfigError('The pasted URL does not contain an authorization code');
    }
    return code;
  }

  if (!trimmed) {
    throw new ConfigError('No authorization code was entered');
  }
  return trimmed;
}

function redirectUri(secrets: OAuthClientSecrets): string {
  return secrets.redirect_uris?.[0] ?? DEFAULT_REDIRECT_URI;
}

export interface ConsoleStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * Ask on the terminal for the authorization code
 *
 * Refuses to prompt when stdin is not a terminal (cron, CI), and rejects if
 * the input ends before a line is read.
 */
export async function promptOnConsole(
  authUrl: string,
  { input, output }: ConsoleStreams = { input: process.stdin, output: process.stdout }
): Promise<string> {
  if (!input.isTTY) {
    throw new ConfigError('No cached YouTube token; run once interactively to authorize');
  }

  const rl = createInterface({ input, output });
  try {
    output.write(`Authorize this app by visiting this URL:\n${authUrl}\n`);
    return await new Promise<string>((resolve, reject) => {
      rl.once('close', () => reject(new ConfigError('Input closed before an authorization code was entered')));
      rl.question('Enter the authorization code (or the URL you were redirected to): ').then(resolve, reject);
    });
  } finally {
    rl.close();
  }
}

/**
 * Create the YouTube authorization provider
 *
 * `getAccessToken` is safe to call before every request; the token is only
 * refreshed (and written back) when it is near expiry.
 */
export function createYouTubeAuth(store: CredentialStore, options: YouTubeAuthOptions = {}) {
  const { promptForCode = promptOnConsole } = options;
  const http = createHttpClient();

  let secrets: OAuthClientSecrets | null = null;
  let token: OAuthToken | null = null;

  async function getSecrets(): Promise<OAuthClientSecrets> {
    if (!secrets) {
      secrets = await store.readYouTubeClientSecrets();
    }
    return secrets;
  }

  function toToken(response: GoogleTokenResponse, refreshToken: string): OAuthToken {
    return {
      access_token: response.access_token,
      refresh_token: response.refresh_token ?? refreshToken,
      expiry_date: Date.now() + response.expires_in * 1000,
      scope: response.scope,
      token_type: response.token_type,
    };
  }

  async function authorize(): Promise<OAuthToken> {
    const client = await getSecrets();
    const input = await promptForCode(buildAuthorizationUrl(client));
    const code = extractAuthorizationCode(input);

    const response = await http.postForm<GoogleTokenResponse>(client.token_uri ?? DEFAULT_TOKEN_URI, {
      code,
      client_id: client.client_id,
      client_secret: client.client_secret,
      redirect_uri: redirectUri(client),
      grant_type: 'authorization_code',
    });

    if (!response.refresh_token) {
      throw new ConfigError('Google did not return a refresh token; revoke the app access and authorize again');
    }

    logger.info('YouTube: authorization complete');
    return toToken(response, response.refresh_token);
  }

  async function refresh(current: OAuthToken): Promise<OAuthToken> {
    const client = await getSecrets();
    const response = await http.postForm<GoogleTokenResponse>(client.token_uri ?? DEFAULT_TOKEN_URI, {
      refresh_token: current.refresh_token,
      client_id: client.client_id,
      client_secret: client.client_secret,
      grant_type: 'refresh_token',
    });

    logger.debug('YouTube: access token refreshed');
    return toToken(response, current.refresh_token);
  }

  return {
    /**
     * Return a valid access token, authorizing or refreshing as needed
     */
    async getAccessToken(): Promise<string> {
      if (!token) {
        token = await store.loadYouTubeToken();
      }

      if (!token) {
        token = await authorize();
        await store.saveYouTubeToken(token);
      } else if (token.expiry_date - TOKEN_EXPIRY_MARGIN_MS <= Date.now()) {
        token = await refresh(token);
        await store.saveYouTubeToken(token);
      }

      return token.access_token;
    },
  };
}

/**
 * Type for the YouTube authorization provider
 */
export type YouTubeAuth = ReturnType<typeof createYouTubeAuth>;
