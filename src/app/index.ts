/**
 * Subreddit Playlist Sync
 *
 * Scans a subreddit for YouTube links and adds the videos that are not yet
 * in a YouTube playlist. One pass per invocation; scheduling is left to
 * cron or a similar job runner.
 */

import * as Sentry from '@sentry/node';
import { createCredentialStore, type CredentialStore } from '../entities/credentials';
import { createRedditClient } from '../features/reddit-feed';
import { createYouTubeAuth, createYouTubeClient } from '../features/youtube-playlist';
import { syncPlaylist, type SyncDependencies, type SyncResult } from '../features/playlist-sync';
import { ConfigError, logger, setVerbose } from '../shared/lib';
import { parseCliArgs, USAGE } from './cli';
import { loadEnv, type Env, type SyncConfig } from './config';

export type { SyncConfig, Env };

/** Exit code for a completed run, even one that added nothing */
export const EXIT_OK = 0;

/** Exit code for configuration errors, fatal upstream errors and quota exhaustion */
export const EXIT_FAILURE = 1;

/** How long to wait for Sentry to deliver queued events before exiting */
const SENTRY_FLUSH_TIMEOUT_MS = 2000;

export interface MainOptions {
  /** Environment settings (defaults to the process environment) */
  env?: Env;

  /** Build the upstream clients (defaults to the Reddit and YouTube API clients) */
  createDependencies?: (config: SyncConfig, env: Env, store: CredentialStore) => Promise<SyncDependencies>;
}

/**
 * Authenticate against both services and build their clients
 *
 * Reddit credentials are read first so a missing `reddit.json` fails the run
 * before the interactive YouTube authorization starts.
 */
async function createApiDependencies(
  _config: SyncConfig,
  env: Env,
  store: CredentialStore
): Promise<SyncDependencies> {
  const redditCredentials = await store.readRedditCredentials();
  logger.debug(`Using Reddit client ID: ${redditCredentials.clientId}`);
  const feed = createRedditClient(redditCredentials, { userAgent: env.REDDIT_USER_AGENT });

  const auth = createYouTubeAuth(store);
  await auth.getAccessToken();
  const playlist = createYouTubeClient(() => auth.getAccessToken());

  return { feed, playlist };
}

/**
 * Report per-item outcomes and map the result to an exit code
 */
function reportSyncResult(result: SyncResult, config: SyncConfig): number {
  for (const failure of result.failed) {
    Sentry.captureMessage(`Failed to add video: ${failure.videoId}`, {
      level: 'warning',
      tags: { source: 'youtube' },
      extra: {
        playlistId: config.playlistId,
        videoId: failure.videoId,
        error: failure.error.message,
      },
    });
  }

  if (result.quotaExhausted) {
    Sentry.captureMessage('YouTube API quota exhausted', {
      level: 'warning',
      tags: { source: 'youtube' },
      extra: {
        playlistId: config.playlistId,
        videoId: result.quotaExhausted.videoId,
        remaining: result.toAdd.length - result.inserted.length - result.failed.length,
      },
    });
    return EXIT_FAILURE;
  }

  return EXIT_OK;
}

/**
 * Run the tool with command line arguments and return the process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let config: SyncConfig;
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      console.log(USAGE);
      return EXIT_OK;
    }
    config = command.config;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  const env = options.env ?? loadEnv();
  const createDependencies = options.createDependencies ?? createApiDependencies;

  setVerbose(config.verbose);

  if (env.SENTRY_DSN) {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      tracesSampleRate: 1.0,
    });
  }

  let stage: 'setup' | 'sync' = 'setup';
  try {
    const store = createCredentialStore(config.configDir);
    const deps = await createDependencies(config, env, store);

    stage = 'sync';
    logger.info(`Syncing r/${config.feedName} (${config.ranking}) into playlist ${config.playlistId}`);
    const result = await syncPlaylist(deps, config);

    return reportSyncResult(result, config);
  } catch (error) {
    if (error instanceof ConfigError && error.path) {
      logger.error(`${error.message}. Please ensure ${config.configDir} is correctly configured.`);
    } else if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error(`Error during ${stage}:`, error);
    }

    Sentry.captureException(error, {
      tags: { stage },
    });
    return EXIT_FAILURE;
  } finally {
    if (env.SENTRY_DSN) {
      await Sentry.flush(SENTRY_FLUSH_TIMEOUT_MS);
    }
  }
}
