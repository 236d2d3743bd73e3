/**
 * Request recording for simulation/replay.
 * @module simulation/recorder
 */

import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/transport.js';

/**
 * Recorded request structure.
 */
export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  /** Request headers, sensitive values redacted */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Recorded response structure.
 */
export interface RecordedResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  /** Present when the body is stored as base64 */
  readonly bodyEncoding?: 'base64';
}

/**
 * Recording entry.
 */
export interface RecordingEntry {
  readonly request: RecordedRequest;
  readonly response: RecordedResponse;
}

const SENSITIVE_HEADERS = new Set(['authorization', 'cookie', 'x-auth-token']);

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Wraps a transport and keeps every exchange that passes through it.
 * Nothing is written until {@link save} is called.
 */
export class RecordingTransport implements HttpTransport {
  private readonly inner: HttpTransport;
  private readonly filePath: string;
  private readonly entries: RecordingEntry[] = [];

  constructor(inner: HttpTransport, filePath: string) {
    this.inner = inner;
    this.filePath = filePath;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.inner.request(request);

    this.entries.push({
      request: {
        method: request.method,
        url: request.url,
        headers: sanitizeHeaders(request.headers),
      },
      response: {
        status: response.status,
        statusText: response.statusText,
        headers: headersToObject(response.headers),
        ...encodeRecordedBody(response.body),
      },
    });

    return response;
  }

  getEntries(): readonly RecordingEntry[] {
    return this.entries;
  }

  /**
   * Writes the recording as a JSON array.
   */
  save(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.filePath, `${JSON.stringify(this.entries, null, 2)}\n`, 'utf-8');
  }
}

function sanitizeHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = SENSITIVE_HEADERS.has(key.toLowerCase()) ? '[REDACTED]' : value;
  }

  return sanitized;
}

function headersToObject(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};

  headers.forEach((value, key) => {
    result[key] = value;
  });

  return result;
}

function encodeRecordedBody(body: Uint8Array): Pick<RecordedResponse, 'body' | 'bodyEncoding'> {
  try {
    return { body: strictDecoder.decode(body) };
  } catch {
    return { body: Buffer.from(body).toString('base64'), bodyEncoding: 'base64' };
  }
}
