/**
 * Shared API utilities
 */
export {
  createHttpClient,
  HttpError,
  type HttpClientOptions,
  type RequestOptions,
} from './http-client';
