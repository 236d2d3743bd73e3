import { describe, it, expect, beforeEach } from 'vitest';
import { AnonymousCredential, type CredentialProvider } from '../auth/credentials.js';
import { BadStateError, DiagnosticError, RegistryTransportErrorKind } from '../errors.js';
import { readText } from '../http/transport.js';
import { InMemoryMetricCollector, MetricNames } from '../observability/index.js';
import { MockHttpTransport } from '../testing/mock-transport.js';
import { RegistryTransport, TransportState } from '../transport.js';
import { Action } from '../types/action.js';
import { MANIFEST_SCHEMA2_MIME, MANIFEST_LIST_MIME } from '../types/mime.js';
import { Registry, Repository } from '../types/name.js';
import {
  BASIC_AUTHORIZATION,
  REALM,
  REGISTRY,
  challengeResponse,
  createTransport,
  repository,
  tokenResponse,
} from './helpers.js';

const MANIFEST_URL = `https://${REGISTRY}/v2/team/app/manifests/latest`;

describe('RegistryTransport', () => {
  let mock: MockHttpTransport;

  beforeEach(() => {
    mock = new MockHttpTransport();
  });

  describe('create', () => {
    it('should ping the registry without credentials', async () => {
      await createTransport(mock);

      const ping = mock.calls[0];
      expect(ping?.url).toBe('https://registry.example.com/v2/');
      expect(ping?.method).toBe('GET');
      expect(ping?.body).toBeUndefined();
      expect(ping?.headers['Authorization']).toBeUndefined();
      expect(ping?.headers['user-agent']).toBe('registry-transport/0.1.0');
    });

    it('should ping localhost registries over http', async () => {
      await createTransport(mock, { name: new Repository('localhost:5000', 'team/app') });

      expect(mock.calls[0]?.url).toBe('http://localhost:5000/v2/');
    });

    it('should exchange the basic credential at the realm', async () => {
      const transport = await createTransport(mock);

      const exchange = mock.calls[1];
      expect(exchange?.url).toBe(
        'https://auth.example.com/token?scope=repository%3Ateam%2Fapp%3Apull&service=registry.example.com'
      );
      expect(exchange?.method).toBe('GET');
      expect(exchange?.headers['Authorization']).toBe(BASIC_AUTHORIZATION);
      expect(transport.getState()).toBe(TransportState.Authenticated);
      expect(transport.getBearerCredential()?.getToken()).toBe('token-1');
      expect(transport.getAuthContext()).toEqual({ realm: REALM, service: REGISTRY });
    });

    it('should request the push scope for push and delete', async () => {
      const push = await createTransport(mock, { action: Action.Push });
      expect(push.scope()).toBe('repository:team/app:push,pull');
      expect(mock.calls[1]?.url).toBe(
        'https://auth.example.com/token?scope=repository%3Ateam%2Fapp%3Apush%2Cpull&service=registry.example.com'
      );

      mock.reset();
      const del = await createTransport(mock, { action: Action.Delete });
      expect(del.scope()).toBe('repository:team/app:push,pull');
    });

    it('should request the catalog scope for a registry', async () => {
      await createTransport(mock, { name: new Registry(REGISTRY), action: Action.Catalog });

      expect(mock.calls[1]?.url).toBe(
        'https://auth.example.com/token?scope=registry%3Acatalog%3A*&service=registry.example.com'
      );
    });

    it('should default the service to the registry host', async () => {
      mock.enqueue(challengeResponse(`Bearer realm="${REALM}"`), tokenResponse('token-1'));

      const transport = await RegistryTransport.create(
        new Repository('localhost:5000', 'team/app'),
        new AnonymousCredential(),
        mock,
        Action.Pull
      );

      expect(transport.getAuthContext().service).toBe('localhost:5000');
      expect(mock.calls[1]?.url).toBe(
        'https://auth.example.com/token?scope=repository%3Ateam%2Fapp%3Apull&service=localhost%3A5000'
      );
    });

    it('should omit the authorization header for anonymous access', async () => {
      await createTransport(mock, { credential: new AnonymousCredential() });

      expect(mock.calls[1]?.headers['Authorization']).toBeUndefined();
    });

    it('should reject an unknown action before any request', async () => {
      const created = RegistryTransport.create(
        repository(),
        new AnonymousCredential(),
        mock,
        'destroy'
      );

      await expect(created).rejects.toBeInstanceOf(BadStateError);
      await expect(created).rejects.toThrow(
        'Invalid action supplied to RegistryTransport: destroy'
      );
      expect(mock.calls).toHaveLength(0);
    });

    it('should fail when the ping is not unauthorized', async () => {
      mock.enqueue({ status: 200, statusText: 'OK' });

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toBeInstanceOf(BadStateError);
      await expect(created).rejects.toThrow('Unexpected status: 200');
      expect(mock.calls).toHaveLength(1);
    });

    it('should fail on a non-Bearer challenge', async () => {
      mock.enqueue(challengeResponse('Basic realm="registry"'));

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toThrow(
        'Unexpected "www-authenticate" header: Basic realm="registry"'
      );
    });

    it('should fail when the challenge has no realm', async () => {
      mock.enqueue(challengeResponse(`Bearer service="${REGISTRY}"`));

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toThrow(
        `Expected a "realm=" in "www-authenticate" header: Bearer service="${REGISTRY}"`
      );
    });

    it('should fail when the token exchange is rejected', async () => {
      mock.enqueue(challengeResponse(), { status: 403, statusText: 'Forbidden', body: 'denied' });

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toThrow('Bad status during token exchange: 403\ndenied');
    });

    it('should fail when the token response has no token', async () => {
      mock.enqueue(challengeResponse(), { status: 200, body: '{"access":"abc"}' });

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toThrow('Malformed JSON response: {"access":"abc"}');
    });

    it('should fail when the token response is not JSON', async () => {
      mock.enqueue(challengeResponse(), { status: 200, body: 'token=abc' });

      const created = RegistryTransport.create(repository(), new AnonymousCredential(), mock, Action.Pull);

      await expect(created).rejects.toBeInstanceOf(BadStateError);
    });
  });

  describe('refresh', () => {
    it('should install the token from the exchange', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(tokenResponse('abc123'));

      await transport.refresh();

      expect(transport.getBearerCredential()?.getToken()).toBe('abc123');
      expect(await transport.getBearerCredential()?.get()).toBe('Bearer abc123');
    });

    it('should re-read the basic credential on every exchange', async () => {
      let calls = 0;
      const rotating: CredentialProvider = {
        async get() {
          calls += 1;
          return `Basic rotated-${calls}`;
        },
      };
      const transport = await createTransport(mock, { credential: rotating });
      mock.enqueue(tokenResponse('token-2'));

      await transport.refresh();

      expect(mock.calls[1]?.headers['Authorization']).toBe('Basic rotated-1');
      expect(mock.calls[2]?.headers['Authorization']).toBe('Basic rotated-2');
    });

    it('should keep the previous token when the exchange fails', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 500, body: 'boom' });

      await expect(transport.refresh()).rejects.toBeInstanceOf(BadStateError);
      expect(transport.getBearerCredential()?.getToken()).toBe('token-1');
      expect(transport.getState()).toBe(TransportState.Authenticated);
    });
  });

  describe('request', () => {
    it('should return the response after ping, exchange and request', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200, statusText: 'OK', body: '{"ok":true}' });

      const response = await transport.request(MANIFEST_URL, new Set([200]));

      expect(readText(response)).toBe('{"ok":true}');
      expect(mock.calls).toHaveLength(3);
      const request = mock.calls[2];
      expect(request?.url).toBe(MANIFEST_URL);
      expect(request?.method).toBe('GET');
      expect(request?.headers).toEqual({
        'Authorization': 'Bearer token-1',
        'user-agent': 'registry-transport/0.1.0',
      });
    });

    it('should refresh once and retry on 401', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 401, statusText: 'Unauthorized' },
        tokenResponse('token-2'),
        { status: 200, statusText: 'OK', body: 'second' }
      );

      const response = await transport.request(MANIFEST_URL, [200]);

      expect(readText(response)).toBe('second');
      expect(mock.calls.map((call) => call.url.startsWith(REALM))).toEqual([
        false, true, false, true, false,
      ]);
      expect(mock.calls[2]?.headers['Authorization']).toBe('Bearer token-1');
      expect(mock.calls[4]?.headers['Authorization']).toBe('Bearer token-2');
    });

    it('should not retry a second time', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 401, statusText: 'Unauthorized' },
        tokenResponse('token-2'),
        { status: 401, statusText: 'Unauthorized', body: '{"errors":[{"code":"UNAUTHORIZED","message":"authentication required"}]}' }
      );

      const request = transport.request(MANIFEST_URL, [200]);

      await expect(request).rejects.toBeInstanceOf(DiagnosticError);
      expect(mock.calls.filter((call) => call.url === MANIFEST_URL)).toHaveLength(2);
      expect(mock.calls).toHaveLength(5);
    });

    it('should accept a 401 that the caller lists after the retry', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 401 },
        tokenResponse('token-2'),
        { status: 401 }
      );

      const response = await transport.request(MANIFEST_URL, [200, 401]);

      expect(response.status).toBe(401);
    });

    it('should raise a diagnostic error for an unaccepted status', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({
        status: 404,
        statusText: 'Not Found',
        body: JSON.stringify({
          errors: [{ code: 'MANIFEST_UNKNOWN', message: 'manifest unknown', detail: { tag: 'v9' } }],
        }),
      });

      const error = await transport.request(MANIFEST_URL, [200]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DiagnosticError);
      if (!(error instanceof DiagnosticError)) return;
      expect(error.httpStatusCode).toBe(404);
      expect(error.kind).toBe(RegistryTransportErrorKind.NotFound);
      expect(error.diagnostics).toEqual([
        { code: 'MANIFEST_UNKNOWN', message: 'manifest unknown', detail: { tag: 'v9' } },
      ]);
      expect(error.message).toBe('response: 404 Not Found\nmanifest unknown: {"tag":"v9"}');
      expect(mock.calls).toHaveLength(3);
    });

    it('should propagate a refresh failure during retry', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 401 }, { status: 503, body: 'unavailable' });

      await expect(transport.request(MANIFEST_URL, [200])).rejects.toThrow(
        'Bad status during token exchange: 503\nunavailable'
      );
      expect(mock.calls).toHaveLength(4);
    });

    it('should default to PUT with a JSON content type when a body is given', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 201 });

      await transport.request(MANIFEST_URL, [201], { body: '{"schemaVersion":2}' });

      const request = mock.calls[2];
      expect(request?.method).toBe('PUT');
      expect(request?.body).toBe('{"schemaVersion":2}');
      expect(request?.headers['content-type']).toBe('application/json');
      expect(request?.headers['content-length']).toBeUndefined();
    });

    it('should use the given content type for a body', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 201 });

      await transport.request(MANIFEST_URL, [201], {
        body: '{}',
        contentType: MANIFEST_SCHEMA2_MIME,
      });

      expect(mock.calls[2]?.headers['content-type']).toBe(MANIFEST_SCHEMA2_MIME);
    });

    it('should treat an empty body as no body', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200 });

      await transport.request(MANIFEST_URL, [200], { body: '', contentType: 'text/plain' });

      const request = mock.calls[2];
      expect(request?.method).toBe('GET');
      expect(request?.body).toBeUndefined();
      expect(request?.headers['content-type']).toBeUndefined();
    });

    it('should send content-length 0 for POST and PUT without a body', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 202 }, { status: 201 });

      await transport.request(`https://${REGISTRY}/v2/team/app/blobs/uploads/`, [202], {
        method: 'POST',
      });
      await transport.request(MANIFEST_URL, [201], { method: 'PUT' });

      expect(mock.calls[2]?.headers['content-length']).toBe('0');
      expect(mock.calls[3]?.headers['content-length']).toBe('0');
    });

    it('should not send content-length for DELETE', async () => {
      const transport = await createTransport(mock, { action: Action.Delete });
      mock.enqueue({ status: 202 });

      await transport.request(MANIFEST_URL, [202], { method: 'DELETE' });

      expect(mock.calls[2]?.headers['content-length']).toBeUndefined();
    });

    it('should join accepted media types into the Accept header', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200 });

      await transport.request(MANIFEST_URL, [200], {
        acceptedMimes: [MANIFEST_SCHEMA2_MIME, MANIFEST_LIST_MIME],
      });

      expect(mock.calls[2]?.headers['Accept']).toBe(
        `${MANIFEST_SCHEMA2_MIME},${MANIFEST_LIST_MIME}`
      );
    });

    it('should let concurrent requests each recover from a 401', async () => {
      let issued = 0;
      const handler = new MockHttpTransport((request) => {
        if (request.url === 'https://registry.example.com/v2/') {
          return challengeResponse();
        }
        if (request.url.startsWith(REALM)) {
          issued += 1;
          return tokenResponse(`token-${issued}`);
        }
        return request.headers['Authorization'] === 'Bearer token-1'
          ? { status: 401 }
          : { status: 200, body: 'ok' };
      });
      const transport = await RegistryTransport.create(
        repository(),
        new AnonymousCredential(),
        handler,
        Action.Pull
      );

      const [first, second] = await Promise.all([
        transport.request(MANIFEST_URL, [200]),
        transport.request(MANIFEST_URL, [200]),
      ]);

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(issued).toBe(3);
    });

    it('should count requests, refreshes and retries', async () => {
      const metrics = new InMemoryMetricCollector();
      const transport = await createTransport(mock, { transportOptions: { metrics } });
      mock.enqueue({ status: 401 }, tokenResponse('token-2'), { status: 200 });

      await transport.request(MANIFEST_URL, [200]);

      expect(
        metrics.getCounter(MetricNames.TOKEN_REFRESH_TOTAL, { registry: REGISTRY, success: true })
      ).toBe(2);
      expect(
        metrics.getCounter(MetricNames.UNAUTHORIZED_RETRIES_TOTAL, { registry: REGISTRY })
      ).toBe(1);
      expect(
        metrics.getCounter(MetricNames.REQUESTS_TOTAL, {
          registry: REGISTRY,
          method: 'GET',
          status: 200,
          success: true,
        })
      ).toBe(1);
    });
  });

  describe('paginatedRequest', () => {
    const CATALOG_URL = `https://${REGISTRY}/v2/_catalog?n=2`;

    it('should follow next links until there are none', async () => {
      const transport = await createTransport(mock, {
        name: new Registry(REGISTRY),
        action: Action.Catalog,
      });
      mock.enqueue(
        {
          status: 200,
          headers: { link: '</v2/_catalog?last=b&n=2>; rel="next"' },
          body: '{"repositories":["a","b"]}',
        },
        { status: 200, body: '{"repositories":["c"]}' }
      );

      const pages: string[] = [];
      for await (const page of transport.paginatedRequest(CATALOG_URL, [200])) {
        pages.push(readText(page));
      }

      expect(pages).toEqual(['{"repositories":["a","b"]}', '{"repositories":["c"]}']);
      expect(mock.calls.slice(2).map((call) => call.url)).toEqual([
        CATALOG_URL,
        'https://registry.example.com/v2/_catalog?last=b&n=2',
      ]);
    });

    it('should fetch each page only when asked for', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 200, headers: { link: '<https://registry.example.com/v2/team/app/tags/list?last=v1>; rel="next"' } },
        { status: 200 }
      );

      const pages = transport.paginatedRequest(`https://${REGISTRY}/v2/team/app/tags/list`, [200]);
      expect(mock.calls).toHaveLength(2);

      await pages.next();
      expect(mock.calls).toHaveLength(3);

      await pages.next();
      expect(mock.calls).toHaveLength(4);
      expect(mock.calls[3]?.url).toBe('https://registry.example.com/v2/team/app/tags/list?last=v1');

      const done = await pages.next();
      expect(done.done).toBe(true);
      expect(mock.calls).toHaveLength(4);
    });

    it('should yield once when only a prev link is present', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200, headers: { link: '</v2/_catalog?n=2>; rel="prev"' } });

      const statuses: number[] = [];
      for await (const page of transport.paginatedRequest(CATALOG_URL, [200])) {
        statuses.push(page.status);
      }

      expect(statuses).toEqual([200]);
      expect(mock.calls).toHaveLength(3);
    });

    it('should stop with the error of a failing page', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 200, headers: { link: '</v2/_catalog?last=b&n=2>; rel="next"' } },
        { status: 500, statusText: 'Internal Server Error', body: 'oops' }
      );

      const statuses: number[] = [];
      const iterate = async (): Promise<void> => {
        for await (const page of transport.paginatedRequest(CATALOG_URL, [200])) {
          statuses.push(page.status);
        }
      };

      await expect(iterate()).rejects.toThrow('response: 500 Internal Server Error\noops: ');
      expect(statuses).toEqual([200]);
    });

    it('should reject a malformed next link with a BadStateError', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200, headers: { link: '<http://[bad>; rel="next"' } });

      const statuses: number[] = [];
      const iterate = async (): Promise<void> => {
        for await (const page of transport.paginatedRequest(CATALOG_URL, [200])) {
          statuses.push(page.status);
        }
      };

      await expect(iterate()).rejects.toBeInstanceOf(BadStateError);
      expect(statuses).toEqual([200]);
      expect(mock.calls).toHaveLength(3);
    });

    it('should name the link target it cannot follow', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200, headers: { link: '<http://[bad>; rel="next"' } });

      const pages = transport.paginatedRequest(CATALOG_URL, [200]);
      await pages.next();

      await expect(pages.next()).rejects.toThrow('Cannot follow "link" header target: http://[bad');
    });

    it('should follow an absolute next link from a relative page URL', async () => {
      const transport = await createTransport(mock);
      mock.enqueue(
        { status: 200, headers: { link: `<https://${REGISTRY}/v2/_catalog?last=b&n=2>; rel="next"` } },
        { status: 200 }
      );

      const statuses: number[] = [];
      for await (const page of transport.paginatedRequest('/v2/_catalog?n=2', [200])) {
        statuses.push(page.status);
      }

      expect(statuses).toEqual([200, 200]);
      expect(mock.calls[3]?.url).toBe('https://registry.example.com/v2/_catalog?last=b&n=2');
    });

    it('should reject a relative next link from a relative page URL', async () => {
      const transport = await createTransport(mock);
      mock.enqueue({ status: 200, headers: { link: '</v2/_catalog?last=b&n=2>; rel="next"' } });

      const pages = transport.paginatedRequest('/v2/_catalog?n=2', [200]);
      await pages.next();

      await expect(pages.next()).rejects.toMatchObject({
        kind: RegistryTransportErrorKind.BadState,
        message: 'Cannot follow "link" header target: /v2/_catalog?last=b&n=2',
      });
    });
  });
});
