/**
 * Configuration types and defaults
 */

import os from 'node:os';
import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { SyncOptions } from '../features/playlist-sync';

/**
 * Default configuration directory
 */
export const DEFAULT_CONFIG_DIR = '~/.config/subreddit-playlist-sync/';

/**
 * User agent sent to Reddit unless REDDIT_USER_AGENT overrides it
 */
export const DEFAULT_REDDIT_USER_AGENT = 'node:subreddit-playlist-sync:1.0.0';

/**
 * Everything one run needs, built once at startup
 */
export interface SyncConfig extends SyncOptions {
  /** Directory holding the credential files and the token cache */
  configDir: string;

  /** Print debug output */
  verbose: boolean;
}

const EnvSchema = z.object({
  SENTRY_DSN: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined)),
  REDDIT_USER_AGENT: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : DEFAULT_REDDIT_USER_AGENT)),
});

/**
 * Process environment settings
 */
export type Env = z.infer<typeof EnvSchema>;

/**
 * Read settings from the environment (and `.env`, when present)
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (source === process.env) {
    loadDotenv();
  }
  return EnvSchema.parse(source);
}

/**
 * Expand a leading `~` and make the path absolute
 */
export function expandHome(dir: string): string {
  if (dir === '~') {
    return os.homedir();
  }
  if (dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return path.resolve(dir);
}
