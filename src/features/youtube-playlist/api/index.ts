/**
 * YouTube playlist API exports
 */
export { createYouTubeClient, MAX_PAGE_SIZE, type YouTubeClient } from './youtube-client';
export {
  createYouTubeAuth,
  buildAuthorizationUrl,
  extractAuthorizationCode,
  promptOnConsole,
  YOUTUBE_SCOPE,
  type YouTubeAuth,
  type YouTubeAuthOptions,
  type ConsoleStreams,
} from './youtube-auth';
