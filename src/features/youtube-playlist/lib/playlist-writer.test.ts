import { describe, expect, it, vi } from 'vitest';
import { HttpError } from '../../../shared/api';
import { insertPlaylistVideo, type PlaylistTarget } from './playlist-writer';

const QUOTA_BODY = JSON.stringify({
  error: {
    code: 403,
    message: 'The request cannot be completed because you have exceeded your quota.',
    errors: [{ domain: 'youtube.quota', reason: 'quotaExceeded' }],
  },
});

function targetThat(result: 'ok' | Error) {
  const insertPlaylistItem = vi.fn<PlaylistTarget['insertPlaylistItem']>();
  if (result === 'ok') {
    insertPlaylistItem.mockResolvedValue({
      kind: 'youtube#playlistItem',
      etag: 'etag',
      id: 'item-1',
      snippet: {
        playlistId: 'PL-test',
        position: 0,
        title: 'A video',
        resourceId: { kind: 'youtube#video', videoId: 'abc123' },
      },
    });
  } else {
    insertPlaylistItem.mockRejectedValue(result);
  }
  return { insertPlaylistItem };
}

describe('insertPlaylistVideo', () => {
  it('inserts the video at position 0', async () => {
    const target = targetThat('ok');

    const outcome = await insertPlaylistVideo(target, 'PL-test', 'abc123', { insertDelayMs: 0 });

    expect(outcome).toEqual({ status: 'inserted', videoId: 'abc123' });
    expect(target.insertPlaylistItem).toHaveBeenCalledWith('PL-test', 'abc123', 0);
  });

  it('reports quota exhaustion on a 403 quota error', async () => {
    const error = new HttpError(403, 'Forbidden', QUOTA_BODY);

    const outcome = await insertPlaylistVideo(targetThat(error), 'PL-test', 'abc123', { insertDelayMs: 0 });

    expect(outcome).toEqual({ status: 'quota-exhausted', videoId: 'abc123', error });
  });

  it('treats other 403 errors as non-fatal', async () => {
    const error = new HttpError(
      403,
      'Forbidden',
      JSON.stringify({ error: { code: 403, message: 'Forbidden', errors: [{ reason: 'forbidden' }] } })
    );

    const outcome = await insertPlaylistVideo(targetThat(error), 'PL-test', 'abc123');

    expect(outcome.status).toBe('failed');
  });

  it('treats an invalid video reference as non-fatal', async () => {
    const error = new HttpError(
      404,
      'Not Found',
      JSON.stringify({ error: { code: 404, message: 'Video not found.', errors: [{ reason: 'videoNotFound' }] } })
    );

    const outcome = await insertPlaylistVideo(targetThat(error), 'PL-test', 'gone01');

    expect(outcome).toEqual({ status: 'failed', videoId: 'gone01', error });
  });

  it('treats network errors as non-fatal', async () => {
    const error = new TypeError('fetch failed');

    const outcome = await insertPlaylistVideo(targetThat(error), 'PL-test', 'abc123');

    expect(outcome).toEqual({ status: 'failed', videoId: 'abc123', error });
  });

  it('waits after a successful insertion', async () => {
    vi.useFakeTimers();
    try {
      let settled = false;
      const pending = insertPlaylistVideo(targetThat('ok'), 'PL-test', 'abc123', { insertDelayMs: 500 }).then(
        (outcome) => {
          settled = true;
          return outcome;
        }
      );

      await vi.advanceTimersByTimeAsync(499);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toEqual({ status: 'inserted', videoId: 'abc123' });
    } finally {
      vi.useRealTimers();
    }
  });
});
