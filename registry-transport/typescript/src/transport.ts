/**
 * Authenticated, self-refreshing transport for a Docker Registry v2 API.
 * @module transport
 */

import { z } from 'zod';
import { parseBearerChallenge, type AuthContext } from './auth/challenge.js';
import { CredentialSlot } from './auth/credential-slot.js';
import { BearerCredential, type CredentialProvider } from './auth/credentials.js';
import { DEFAULT_USER_AGENT } from './config.js';
import { BadStateError, DiagnosticError } from './errors.js';
import { parseNextLinkHeader, scheme } from './http/link.js';
import {
  hasBody,
  readText,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
  type RequestBody,
} from './http/transport.js';
import {
  MetricNames,
  NoOpLogger,
  NoOpMetricCollector,
  type Logger,
  type MetricCollector,
} from './observability/index.js';
import { parseAction, type Action } from './types/action.js';
import { DEFAULT_CONTENT_TYPE } from './types/mime.js';
import type { ResourceName } from './types/name.js';

const UNAUTHORIZED = 401;
const OK = 200;

const tokenResponseSchema = z.object({ token: z.string() });

const ABSOLUTE_URL_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Authentication lifecycle. There is no way back to `Unauthenticated`.
 */
export enum TransportState {
  Unauthenticated = 'unauthenticated',
  Pinged = 'pinged',
  Authenticated = 'authenticated',
}

/**
 * Registry transport options.
 */
export interface RegistryTransportOptions {
  /** User-Agent header sent on every request */
  userAgent?: string;
  logger?: Logger;
  metrics?: MetricCollector;
}

/**
 * Per-request options.
 */
export interface RequestOptions {
  /** Defaults to GET without a body and PUT with one */
  method?: HttpMethod;
  body?: RequestBody;
  /** Applied only when a body is present */
  contentType?: string;
  /** Sent comma-joined as `Accept` */
  acceptedMimes?: readonly string[];
}

export type PaginatedRequestOptions = Omit<RequestOptions, 'acceptedMimes'>;

/**
 * Status codes a caller is prepared to receive.
 */
export type AcceptedCodes = ReadonlySet<number> | readonly number[];

/**
 * Speaks to a registry with Bearer tokens obtained by exchanging a basic
 * credential at the realm the registry advertises.
 *
 * Instances come from {@link RegistryTransport.create}, which pings the
 * registry and performs the first token exchange before returning. A 401 on
 * any request triggers one refresh and one retry of that request.
 *
 * @example
 * ```typescript
 * const transport = await RegistryTransport.create(
 *   parseResourceName('registry.example.com/team/app'),
 *   new BasicCredential('robot', 'test-secret'),
 *   new FetchTransport(),
 *   Action.Pull
 * );
 * const response = await transport.request(
 *   'https://registry.example.com/v2/team/app/manifests/latest',
 *   [200],
 *   { acceptedMimes: SUPPORTED_MANIFEST_MIMES }
 * );
 * ```
 */
export class RegistryTransport {
  private readonly name: ResourceName;
  private readonly basicCredential: CredentialProvider;
  private readonly http: HttpTransport;
  private readonly action: Action;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly metrics: MetricCollector;
  private readonly bearer = new CredentialSlot<BearerCredential>();
  private authContext?: AuthContext;
  private state = TransportState.Unauthenticated;

  private constructor(
    name: ResourceName,
    basicCredential: CredentialProvider,
    http: HttpTransport,
    action: Action,
    options: RegistryTransportOptions
  ) {
    this.name = name;
    this.basicCredential = basicCredential;
    this.http = http;
    this.action = action;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? new NoOpLogger();
    this.metrics = options.metrics ?? new NoOpMetricCollector();
  }

  /**
   * Validates the action, pings the registry and exchanges the basic
   * credential for a first Bearer token.
   *
   * @throws BadStateError when the action is unknown or either step fails
   */
  static async create(
    name: ResourceName,
    basicCredential: CredentialProvider,
    http: HttpTransport,
    action: string,
    options: RegistryTransportOptions = {}
  ): Promise<RegistryTransport> {
    const transport = new RegistryTransport(
      name,
      basicCredential,
      http,
      parseAction(action),
      options
    );
    await transport.ping();
    await transport.refresh();
    return transport;
  }

  getState(): TransportState {
    return this.state;
  }

  getName(): ResourceName {
    return this.name;
  }

  getAction(): Action {
    return this.action;
  }

  /**
   * Realm and service discovered by the ping.
   */
  getAuthContext(): AuthContext {
    return this.requireAuthContext();
  }

  /**
   * The Bearer credential requests currently carry.
   */
  getBearerCredential(): BearerCredential | undefined {
    return this.bearer.get();
  }

  /**
   * Authorization scope requested from the realm.
   */
  scope(): string {
    return this.name.scope(this.action);
  }

  /**
   * Establishes realm and service from the registry's challenge.
   */
  private async ping(): Promise<void> {
    const url = `${scheme(this.name.registry)}://${this.name.registry}/v2/`;
    this.logger.debug('Pinging registry', { url });

    const response = await this.http.request({
      url,
      method: 'GET',
      headers: {
        'content-type': DEFAULT_CONTENT_TYPE,
        'user-agent': this.userAgent,
      },
    });

    if (response.status !== UNAUTHORIZED) {
      throw new BadStateError(`Unexpected status: ${response.status}`, {
        statusCode: response.status,
        context: { registry: this.name.registry },
      });
    }

    this.authContext = parseBearerChallenge(
      response.headers.get('www-authenticate'),
      this.name.registry
    );
    this.state = TransportState.Pinged;
    this.logger.debug('Discovered token realm', { ...this.authContext });
  }

  /**
   * Exchanges the basic credential for a new Bearer token and installs it.
   *
   * @throws BadStateError when the exchange is rejected or malformed
   */
  async refresh(): Promise<void> {
    const { realm, service } = this.requireAuthContext();
    const scope = this.scope();
    const query = new URLSearchParams({ scope, service });

    const headers: Record<string, string> = {
      'content-type': DEFAULT_CONTENT_TYPE,
      'user-agent': this.userAgent,
    };
    const authorization = await this.basicCredential.get();
    if (authorization) {
      headers['Authorization'] = authorization;
    }

    this.logger.debug('Exchanging credential for token', { realm, service, scope });
    const response = await this.http.request({
      url: `${realm}?${query.toString()}`,
      method: 'GET',
      headers,
    });

    const content = readText(response);
    this.metrics.incrementCounter(MetricNames.TOKEN_REFRESH_TOTAL, {
      registry: this.name.registry,
      success: response.status === OK,
    });

    if (response.status !== OK) {
      throw new BadStateError(
        `Bad status during token exchange: ${response.status}\n${content}`,
        { statusCode: response.status }
      );
    }

    const token = extractToken(content);
    if (token === undefined) {
      throw new BadStateError(`Malformed JSON response: ${content}`);
    }

    await this.bearer.replace(new BearerCredential(token));
    this.state = TransportState.Authenticated;
  }

  /**
   * Issues an authenticated request. On a 401 the token is refreshed and the
   * request sent once more; the second response is final.
   *
   * @throws DiagnosticError when the final status is not accepted
   */
  async request(
    url: string,
    acceptedCodes: AcceptedCodes,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    const method = options.method ?? (hasBody(options.body) ? 'PUT' : 'GET');

    let response = await this.send(url, method, options);
    if (response.status === UNAUTHORIZED) {
      this.logger.debug('Request unauthorized, refreshing token', { url, method });
      this.metrics.incrementCounter(MetricNames.UNAUTHORIZED_RETRIES_TOTAL, {
        registry: this.name.registry,
      });
      await this.refresh();
      response = await this.send(url, method, options);
    }

    const accepted = new Set(acceptedCodes);
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, {
      registry: this.name.registry,
      method,
      status: response.status,
      success: accepted.has(response.status),
    });

    if (!accepted.has(response.status)) {
      throw new DiagnosticError(response);
    }

    return response;
  }

  /**
   * Yields one response per page, following `rel="next"` links. Lazy and
   * single-pass; each step performs one {@link request}.
   */
  async *paginatedRequest(
    url: string,
    acceptedCodes: AcceptedCodes,
    options: PaginatedRequestOptions = {}
  ): AsyncGenerator<HttpResponse, void, undefined> {
    let nextPage: string | undefined = url;

    while (nextPage !== undefined) {
      const current: string = nextPage;
      const response = await this.request(current, acceptedCodes, options);
      yield response;

      const link = parseNextLinkHeader(response.headers);
      nextPage = link === undefined ? undefined : resolveNextPage(link, current);
    }
  }

  private async send(
    url: string,
    method: HttpMethod,
    options: RequestOptions
  ): Promise<HttpResponse> {
    // Read the slot per attempt: a refresh may have replaced it.
    const bearer = this.bearer.get();
    if (bearer === undefined) {
      throw new BadStateError('Request issued before a token was obtained');
    }

    const headers: Record<string, string> = {
      'Authorization': await bearer.get(),
      'user-agent': this.userAgent,
    };

    const body = hasBody(options.body) ? options.body : undefined;
    if (body !== undefined) {
      headers['content-type'] = options.contentType ?? DEFAULT_CONTENT_TYPE;
    }

    if (options.acceptedMimes !== undefined) {
      headers['Accept'] = options.acceptedMimes.join(',');
    }

    if ((method === 'POST' || method === 'PUT') && body === undefined) {
      headers['content-length'] = '0';
    }

    return this.http.request(
      body === undefined ? { url, method, headers } : { url, method, headers, body }
    );
  }

  private requireAuthContext(): AuthContext {
    if (this.authContext === undefined) {
      throw new BadStateError('Registry has not been pinged');
    }
    return this.authContext;
  }
}

function extractToken(content: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }

  const result = tokenResponseSchema.safeParse(parsed);
  return result.success ? result.data.token : undefined;
}

/**
 * Absolute targets are followed as given; relative ones resolve against the
 * page that carried them.
 */
function resolveNextPage(link: string, current: string): string {
  try {
    return ABSOLUTE_URL_PATTERN.test(link)
      ? new URL(link).toString()
      : new URL(link, current).toString();
  } catch (error) {
    throw new BadStateError(`Cannot follow "link" header target: ${link}`, {
      cause: error instanceof Error ? error : undefined,
      context: { page: current },
    });
  }
}
