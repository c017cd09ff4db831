/**
 * Extracts YouTube video identifiers from links
 */

import type { VideoId } from './types';

/**
 * Recognises watch, mobile, short, embed and `/v/` links, with or without a
 * scheme and with or without a `www.` / `m.` prefix.
 *
 * Group 5 holds the identifier; group 6 swallows anything after it
 * (`&t=10s`, `?si=...`).
 */
const YOUTUBE_URL_PATTERN =
  /^((?:https?:)?\/\/)?((?:www|m)\.)?(youtube\.com|youtu\.be)(\/(?:[\w-]+\?v=|embed\/|v\/)?)([\w-]+)(\S+)?$/;

/**
 * Return the video ID a link points to, or null if it is not a YouTube video link
 */
export function matchVideoId(url: string): VideoId | null {
  const match = YOUTUBE_URL_PATTERN.exec(url);
  return match?.[5] ?? null;
}
