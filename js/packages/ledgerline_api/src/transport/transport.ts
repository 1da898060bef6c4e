import { TransportError } from '../errors';

/**
 * Status and body of one HTTP exchange, before any interpretation
 */
export interface RawResponse {
  status: number;
  text: string;
  url: string;
}

/**
 * Issues a single GET. Implementations reject with {@link TransportError} only.
 *
 * One transport may serve any number of concurrent calls.
 */
export interface Transport {
  get(url: string, headers: Record<string, string>): Promise<RawResponse>;
}

export interface FetchTransportOptions {
  /** Abort each request after this many milliseconds */
  timeout?: number;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * Transport over the global `fetch` (undici's pooled agent on Node.js)
 */
export class FetchTransport implements Transport {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async get(url: string, headers: Record<string, string>): Promise<RawResponse> {
    const controller = new AbortController();
    const timer =
      this.options.timeout !== undefined
        ? setTimeout(() => controller.abort(), this.options.timeout)
        : undefined;

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, text, url };
    } catch (error) {
      throw new TransportError(url, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
