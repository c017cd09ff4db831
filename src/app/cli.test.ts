import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../shared/lib';
import { parseCliArgs } from './cli';
import { expandHome } from './config';

describe('parseCliArgs', () => {
  it('applies defaults to the optional options', () => {
    const command = parseCliArgs(['-p', 'PL-test', '-s', 'videos']);

    expect(command).toEqual({
      kind: 'sync',
      config: {
        playlistId: 'PL-test',
        feedName: 'videos',
        ranking: 'hot',
        limit: 20,
        configDir: path.join(os.homedir(), '.config/subreddit-playlist-sync/'),
        verbose: false,
      },
    });
  });

  it('reads every long option', () => {
    const command = parseCliArgs([
      '--playlist-id',
      'PL-test',
      '--subreddit',
      'music',
      '--max-videos',
      '50',
      '--conf-dir',
      '/etc/playlist-sync',
      '--order',
      'top',
      '--verbose',
    ]);

    expect(command).toEqual({
      kind: 'sync',
      config: {
        playlistId: 'PL-test',
        feedName: 'music',
        ranking: 'top',
        limit: 50,
        configDir: '/etc/playlist-sync',
        verbose: true,
      },
    });
  });

  it('returns help for -h', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('requires the playlist and subreddit', () => {
    expect(() => parseCliArgs(['-s', 'videos'])).toThrow('Invalid options: --playlist-id: is required');
    expect(() => parseCliArgs(['-p', 'PL-test'])).toThrow('Invalid options: --subreddit: is required');
  });

  it.each(['0', '-3', '2.5', 'twenty'])('rejects --max-videos %s', (value) => {
    expect(() => parseCliArgs(['-p', 'PL-test', '-s', 'videos', '-m', value])).toThrow(ConfigError);
  });

  it('rejects an unknown ranking mode', () => {
    expect(() => parseCliArgs(['-p', 'PL-test', '-s', 'videos', '-o', 'best'])).toThrow(/--order/);
  });

  it('rejects an option without its value', () => {
    expect(() => parseCliArgs(['-s', 'videos', '-p'])).toThrow(ConfigError);
  });

  it('rejects positional arguments', () => {
    expect(() => parseCliArgs(['-p', 'PL-test', '-s', 'videos', 'extra'])).toThrow(ConfigError);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['-p', 'PL-test', '-s', 'videos', '--dry-run'])).toThrow(ConfigError);
  });
});

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~/.config/x')).toBe(path.join(os.homedir(), '.config/x'));
    expect(expandHome('~')).toBe(os.homedir());
  });

  it('resolves other paths', () => {
    expect(expandHome('/var/lib/x')).toBe('/var/lib/x');
  });
});
