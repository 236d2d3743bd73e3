/**
 * The HTTP layer the registry transport delegates to.
 * @module http/transport
 */

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

/**
 * Request body accepted by the transport.
 */
export type RequestBody = string | Uint8Array;

/**
 * A single outgoing HTTP request.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse {
  /** Response status code */
  readonly status: number;
  /** Response status text */
  readonly statusText: string;
  /** Response headers, looked up case-insensitively */
  readonly headers: Headers;
  /** Raw response body */
  readonly body: Uint8Array;
}

/**
 * Performs one HTTP round trip per call. Implementations enforce their own
 * timeouts and never retry.
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}

const decoder = new TextDecoder();
const encoder = new TextEncoder();

/**
 * Decodes a response body as UTF-8.
 */
export function readText(response: Pick<HttpResponse, 'body'>): string {
  return decoder.decode(response.body);
}

/**
 * Encodes a string as a UTF-8 body.
 */
export function encodeBody(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Returns true when a body is present and non-empty.
 */
export function hasBody(body: RequestBody | undefined): body is RequestBody {
  return body !== undefined && body.length > 0;
}
