/**
 * Parsing of the registry's `www-authenticate` challenge.
 * @module auth/challenge
 */

import { BadStateError } from '../errors.js';

/**
 * Where and for which service Bearer tokens are exchanged. Discovered once
 * by the ping and fixed for the transport's lifetime.
 */
export interface AuthContext {
  /** Token exchange endpoint, including scheme and path */
  readonly realm: string;
  /** Service identifier passed to the exchange */
  readonly service: string;
}

export const BEARER_CHALLENGE = 'Bearer ';

const REALM_PREFIX = 'realm=';
const SERVICE_PREFIX = 'service=';

/**
 * Extracts realm and service from a `Bearer` challenge. The service falls
 * back to `defaultService` when the challenge does not name one; a missing
 * realm is fatal.
 */
export function parseBearerChallenge(
  challenge: string | null,
  defaultService: string
): AuthContext {
  if (challenge === null || !challenge.startsWith(BEARER_CHALLENGE)) {
    throw new BadStateError(`Unexpected "www-authenticate" header: ${challenge ?? ''}`);
  }

  let realm: string | undefined;
  let service = defaultService;

  for (const raw of challenge.slice(BEARER_CHALLENGE.length).split(',')) {
    const token = raw.trim();
    if (token.startsWith(REALM_PREFIX)) {
      realm = unquote(token.slice(REALM_PREFIX.length));
    } else if (token.startsWith(SERVICE_PREFIX)) {
      service = unquote(token.slice(SERVICE_PREFIX.length));
    }
  }

  if (!realm) {
    throw new BadStateError(
      `Expected a "${REALM_PREFIX}" in "www-authenticate" header: ${challenge}`
    );
  }

  return { realm, service };
}

function unquote(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '');
}
