/**
 * Outbound HTTP transport used to reach provider APIs
 */

import { TransportError } from '../providers/types.js';
import { logger } from '../utils/logger.js';

export interface HttpResponse {
  readonly status: number;
  /** Response body parsed as JSON */
  readonly body: unknown;
}

/**
 * Performs authenticated GET requests. Implementations own retry, timeout
 * and redirect policy and must be safe for concurrent use.
 */
export interface HttpTransport {
  get(url: string, headers: Readonly<Record<string, string>>): Promise<HttpResponse>;
}

export interface FetchHttpTransportOptions {
  /** Abort requests that take longer than this */
  timeoutMs?: number;
  /** Sent unless the caller supplies its own User-Agent */
  userAgent?: string;
  fetch?: typeof globalThis.fetch;
}

/**
 * Transport backed by the global fetch API
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly timeoutMs?: number;
  private readonly userAgent?: string;
  private readonly fetchImpl?: typeof globalThis.fetch;

  constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetch;
  }

  async get(url: string, headers: Readonly<Record<string, string>>): Promise<HttpResponse> {
    const requestHeaders = new Headers(headers);
    if (this.userAgent && !requestHeaders.has('User-Agent')) {
      requestHeaders.set('User-Agent', this.userAgent);
    }

    // Resolved per call so a replaced global fetch is honoured
    const fetchImpl = this.fetchImpl ?? globalThis.fetch;
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'GET',
        headers: requestHeaders,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug('HTTP request failed', { host: hostOf(url), reason });
      throw new TransportError(`Request failed: ${reason}`, undefined, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(`Failed to read response body: ${response.status}`, response.status, { cause: error });
    }

    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch (error) {
      if (!response.ok) {
        throw new TransportError(
          `Request failed: ${response.status} ${response.statusText}`.trim(),
          response.status,
          { cause: error }
        );
      }
      throw new TransportError(`Response is not valid JSON: ${response.status}`, response.status, { cause: error });
    }
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'invalid-url';
  }
}
