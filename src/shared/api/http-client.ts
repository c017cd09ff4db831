/**
 * HTTP client utilities for making API requests
 */

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  /**
   * Resolves an OAuth access token before every request.
   * Sent as `Authorization: Bearer <token>`.
   */
  getAccessToken?: () => Promise<string>;
}

export interface RequestOptions extends RequestInit {
  params?: Record<string, string | number | boolean | undefined>;
}

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, path: string, params?: RequestOptions['params']): string {
  const url = new URL(path, baseUrl || undefined);

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Create an HTTP client with default options
 */
export function createHttpClient(options: HttpClientOptions = {}) {
  const { baseUrl = '', headers: defaultHeaders = {}, getAccessToken } = options;

  async function authHeaders(): Promise<Record<string, string>> {
    if (!getAccessToken) {
      return {};
    }
    return { Authorization: `Bearer ${await getAccessToken()}` };
  }

  async function send<T>(url: string, init: RequestInit): Promise<T> {
    const response = await fetch(url, init);

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, await response.text());
    }

    return response.json() as Promise<T>;
  }

  return {
    /**
     * Make a GET request
     */
    async get<T>(path: string, requestOptions: RequestOptions = {}): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      return send<T>(url, {
        method: 'GET',
        headers: {
          ...defaultHeaders,
          ...(await authHeaders()),
          ...headers,
        },
        ...fetchOptions,
      });
    },

    /**
     * Make a POST request with a JSON body
     */
    async post<T>(path: string, body?: unknown, requestOptions: RequestOptions = {}): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      return send<T>(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...defaultHeaders,
          ...(await authHeaders()),
          ...headers,
        },
        body: body ? JSON.stringify(body) : undefined,
        ...fetchOptions,
      });
    },

    /**
     * Make a POST request with a form-encoded body (OAuth token endpoints)
     */
    async postForm<T>(
      path: string,
      form: Record<string, string>,
      requestOptions: RequestOptions = {}
    ): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      return send<T>(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          ...defaultHeaders,
          ...headers,
        },
        body: new URLSearchParams(form).toString(),
        ...fetchOptions,
      });
    },
  };
}

/**
 * Shape of an error body returned by Google and Reddit APIs.
 * Google: `{ error: { code, message, errors: [{ reason }] } }`
 * Reddit: `{ message, error }`
 */
interface ApiErrorBody {
  message?: unknown;
  error?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseErrorBody(body: string): ApiErrorBody | null {
  try {
    const parsed: unknown = JSON.parse(body);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * HTTP error with status code and response body
 */
export class HttpError extends Error {
  /** Human-readable reason reported by the upstream API */
  public readonly reason: string;

  /** Structured reasons (Google `errors[].reason`), e.g. `quotaExceeded` */
  public readonly reasons: string[];

  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';

    const parsed = parseErrorBody(body);
    const nested = parsed?.error;
    const googleError = isRecord(nested) ? nested : undefined;
    const topMessage = parsed?.message;

    if (googleError && typeof googleError.message === 'string') {
      this.reason = googleError.message;
    } else if (typeof topMessage === 'string') {
      this.reason = topMessage;
    } else {
      this.reason = statusText;
    }

    const details: unknown = googleError?.errors;
    this.reasons = Array.isArray(details)
      ? details.flatMap((e: unknown) => (isRecord(e) && typeof e.reason === 'string' ? [e.reason] : []))
      : [];
  }

  /**
   * Check if the upstream refused the call because the daily quota is spent
   */
  isQuotaExceeded(): boolean {
    if (this.status !== 403) {
      return false;
    }
    return (
      this.reason.toLowerCase().includes('quota') ||
      this.reasons.some((r) => r.toLowerCase().includes('quota'))
    );
  }
}
