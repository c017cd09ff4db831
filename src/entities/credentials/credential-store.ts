/**
 * Credential store for the configuration directory
 *
 * Reads operator-provided credentials and keeps the YouTube OAuth token
 * cache. Every file is validated on read; any problem surfaces as a
 * ConfigError naming the file.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import { ConfigError } from '../../shared/lib';
import {
  OAuthClientSecretsFileSchema,
  OAuthTokenSchema,
  RedditCredentialsSchema,
  REDDIT_CREDENTIALS_FILE,
  YOUTUBE_CLIENT_SECRETS_FILE,
  YOUTUBE_TOKEN_FILE,
  type OAuthClientSecrets,
  type OAuthToken,
  type RedditCredentials,
} from './types';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a credential store rooted at the configuration directory
 */
export function createCredentialStore(configDir: string) {
  function parseJson<T>(filePath: string, raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`'${filePath}' is not valid JSON: ${errorMessage(error)}`, filePath);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join('; ');
      throw new ConfigError(`Invalid '${filePath}': ${issues}`, filePath);
    }
    return parsed.data;
  }

  async function readJson<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const filePath = path.join(configDir, fileName);

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigError(`Failed to open '${filePath}': ${errorMessage(error)}`, filePath);
    }
    return parseJson(filePath, raw, schema);
  }

  return {
    /** Directory all credential files live in */
    configDir,

    /**
     * Read the Reddit app credentials
     */
    async readRedditCredentials(): Promise<RedditCredentials> {
      return readJson(REDDIT_CREDENTIALS_FILE, RedditCredentialsSchema);
    },

    /**
     * Read the Google OAuth client secrets ("installed" preferred over "web")
     */
    async readYouTubeClientSecrets(): Promise<OAuthClientSecrets> {
      const file = await readJson(YOUTUBE_CLIENT_SECRETS_FILE, OAuthClientSecretsFileSchema);
      const client = file.installed ?? file.web;
      if (!client) {
        throw new ConfigError(
          `Invalid '${path.join(configDir, YOUTUBE_CLIENT_SECRETS_FILE)}': expected an "installed" or "web" client`
        );
      }
      return client;
    },

    /**
     * Load the cached YouTube token, or null if none has been saved yet
     */
    async loadYouTubeToken(): Promise<OAuthToken | null> {
      const filePath = path.join(configDir, YOUTUBE_TOKEN_FILE);

      let raw: string;
      try {
        raw = await readFile(filePath, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          return null;
        }
        throw new ConfigError(`Failed to open '${filePath}': ${errorMessage(error)}`, filePath);
      }
      return parseJson(filePath, raw, OAuthTokenSchema);
    },

    /**
     * Save the YouTube token, readable by the current user only
     */
    async saveYouTubeToken(token: OAuthToken): Promise<void> {
      await mkdir(configDir, { recursive: true });
      const filePath = path.join(configDir, YOUTUBE_TOKEN_FILE);
      await writeFile(filePath, `${JSON.stringify(token, null, 2)}\n`, { mode: 0o600 });
    },
  };
}

/**
 * Type for the credential store
 */
export type CredentialStore = ReturnType<typeof createCredentialStore>;
