/**
 * Request replaying for simulation.
 * @module simulation/replayer
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { RegistryTransportError, RegistryTransportErrorKind } from '../errors.js';
import { encodeBody, type HttpRequest, type HttpResponse, type HttpTransport } from '../http/transport.js';
import type { RecordingEntry } from './recorder.js';

const recordingSchema = z.array(
  z.object({
    request: z.object({
      method: z.string(),
      url: z.string(),
      headers: z.record(z.string()),
    }),
    response: z.object({
      status: z.number().int(),
      statusText: z.string(),
      headers: z.record(z.string()),
      body: z.string(),
      bodyEncoding: z.literal('base64').optional(),
    }),
  })
);

/**
 * Serves responses from a recording made by RecordingTransport. Each
 * request is matched by method and URL against the first unused entry.
 */
export class ReplayTransport implements HttpTransport {
  private readonly entries: readonly RecordingEntry[];
  private readonly used: Set<number> = new Set();

  constructor(filePath: string) {
    if (!existsSync(filePath)) {
      throw new RegistryTransportError(
        RegistryTransportErrorKind.SimulationNotFound,
        `Simulation file not found: ${filePath}`
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new RegistryTransportError(
        RegistryTransportErrorKind.SimulationNotFound,
        `Failed to parse simulation file: ${cause.message}`,
        { cause }
      );
    }

    const result = recordingSchema.safeParse(parsed);
    if (!result.success) {
      throw new RegistryTransportError(
        RegistryTransportErrorKind.SimulationNotFound,
        `Invalid simulation file: ${filePath}`
      );
    }
    this.entries = result.data;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const index = this.entries.findIndex(
      (entry, i) =>
        !this.used.has(i) &&
        entry.request.method === request.method &&
        entry.request.url === request.url
    );

    const entry = this.entries[index];
    if (index === -1 || entry === undefined) {
      throw new RegistryTransportError(
        RegistryTransportErrorKind.SimulationMismatch,
        `No recorded response for ${request.method} ${request.url}`
      );
    }

    this.used.add(index);
    const { response } = entry;

    return {
      status: response.status,
      statusText: response.statusText,
      headers: new Headers(response.headers),
      body:
        response.bodyEncoding === 'base64'
          ? new Uint8Array(Buffer.from(response.body, 'base64'))
          : encodeBody(response.body),
    };
  }

  /**
   * Number of recorded entries not yet served.
   */
  remaining(): number {
    return this.entries.length - this.used.size;
  }
}
