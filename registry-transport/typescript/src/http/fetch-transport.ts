/**
 * Default HTTP transport built on the global fetch.
 * @module http/fetch-transport
 */

import { DEFAULT_TIMEOUT } from '../config.js';
import { RegistryTransportError } from '../errors.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './transport.js';

/**
 * Fetch transport options.
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * HttpTransport over fetch. Aborts after the configured timeout; does not
 * retry or follow authentication challenges.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;

  constructor(options?: FetchTransportOptions) {
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body,
        signal: controller.signal,
      });

      const body = new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw RegistryTransportError.timeout(request.url, this.timeout);
      }

      throw RegistryTransportError.connectionFailed(
        request.url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
