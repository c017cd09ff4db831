/**
 * Command line parsing
 */

import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { RANKING_MODES } from '../entities/feed-entry';
import { DEFAULT_SCAN_LIMIT } from '../features/reddit-feed';
import { ConfigError } from '../shared/lib';
import { DEFAULT_CONFIG_DIR, expandHome, type SyncConfig } from './config';

export const USAGE = `Usage: subreddit-playlist-sync -p <playlist-id> -s <subreddit> [options]

Adds the YouTube videos linked from a subreddit to a YouTube playlist.

Options:
  -p, --playlist-id <id>   YouTube playlist to add videos to (required)
  -s, --subreddit <name>   Subreddit to scan (required)
  -m, --max-videos <n>     Number of submissions to scan (default: ${DEFAULT_SCAN_LIMIT})
  -c, --conf-dir <dir>     Configuration directory (default: ${DEFAULT_CONFIG_DIR})
  -o, --order <order>      ${RANKING_MODES.join(' | ')} (default: hot)
  -v, --verbose            Print debug output
  -h, --help               Show this help`;

const CliOptionsSchema = z.object({
  playlistId: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
  subreddit: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
  maxVideos: z.coerce.number().int().positive().default(DEFAULT_SCAN_LIMIT),
  confDir: z.string().default(DEFAULT_CONFIG_DIR).transform(expandHome),
  order: z.enum(RANKING_MODES).default('hot'),
  verbose: z.boolean().default(false),
});

export type CliCommand = { kind: 'help' } | { kind: 'sync'; config: SyncConfig };

/** `playlistId` -> `--playlist-id` */
function toFlag(key: PropertyKey): string {
  return `--${String(key).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

function createProgram(): Command {
  return new Command()
    .helpOption(false)
    .name('subreddit-playlist-sync')
    .description('Adds the YouTube videos linked from a subreddit to a YouTube playlist')
    .option('-p, --playlist-id <id>', 'YouTube playlist to add videos to')
    .option('-s, --subreddit <name>', 'Subreddit to scan')
    .option('-m, --max-videos <n>', 'Number of submissions to scan')
    .option('-c, --conf-dir <dir>', 'Configuration directory')
    .option('-o, --order <order>', 'Listing order')
    .option('-v, --verbose', 'Print debug output')
    .option('-h, --help', 'Show this help')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ outputError: () => undefined });
}

/**
 * Parse command line arguments into a run configuration
 *
 * @throws ConfigError on unknown options or invalid values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const program = createProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ConfigError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }

  if (program.opts<{ help?: boolean }>().help) {
    return { kind: 'help' };
  }

  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${toFlag(i.path[0])}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid options: ${issues}`);
  }

  const options = parsed.data;
  return {
    kind: 'sync',
    config: {
      playlistId: options.playlistId,
      feedName: options.subreddit,
      ranking: options.order,
      limit: options.maxVideos,
      configDir: options.confDir,
      verbose: options.verbose,
    },
  };
}
