/**
 * Credential providers producing `Authorization` header values.
 * @module auth/credentials
 */

import { RegistryTransportError, RegistryTransportErrorKind } from '../errors.js';
import { SecretString } from './secret.js';

/**
 * Produces an `Authorization` header value. May return a different value on
 * each call when the underlying credential rotates.
 */
export interface CredentialProvider {
  get(): Promise<string>;
}

/**
 * No credential at all. The token exchange is attempted without an
 * `Authorization` header.
 */
export class AnonymousCredential implements CredentialProvider {
  async get(): Promise<string> {
    return '';
  }
}

/**
 * Fixed username and password, sent as HTTP Basic.
 */
export class BasicCredential implements CredentialProvider {
  private readonly username: string;
  private readonly password: SecretString;

  constructor(username: string, password: string) {
    this.username = username;
    this.password = new SecretString(password);
  }

  async get(): Promise<string> {
    return encodeBasic(this.username, this.password.expose());
  }
}

/**
 * A registry-issued token, sent as HTTP Bearer.
 */
export class BearerCredential implements CredentialProvider {
  private readonly token: SecretString;

  constructor(token: string) {
    this.token = new SecretString(token);
  }

  async get(): Promise<string> {
    return `Bearer ${this.token.expose()}`;
  }

  /**
   * The raw token, without the scheme prefix.
   */
  getToken(): string {
    return this.token.expose();
  }
}

/**
 * Basic credential read from environment variables on every call, so a
 * rotated password is picked up by the next token exchange.
 */
export class EnvBasicCredential implements CredentialProvider {
  private readonly usernameVar: string;
  private readonly passwordVar: string;

  constructor(usernameVar: string, passwordVar: string) {
    this.usernameVar = usernameVar;
    this.passwordVar = passwordVar;
  }

  async get(): Promise<string> {
    const username = process.env[this.usernameVar];
    const password = process.env[this.passwordVar];

    if (!username) {
      throw new RegistryTransportError(
        RegistryTransportErrorKind.InvalidCredentials,
        `Environment variable ${this.usernameVar} not set`
      );
    }

    if (!password) {
      throw new RegistryTransportError(
        RegistryTransportErrorKind.InvalidCredentials,
        `Environment variable ${this.passwordVar} not set`
      );
    }

    return encodeBasic(username, password);
  }

  /**
   * Reads REGISTRY_USERNAME and REGISTRY_PASSWORD.
   */
  static fromRegistryEnv(): EnvBasicCredential {
    return new EnvBasicCredential('REGISTRY_USERNAME', 'REGISTRY_PASSWORD');
  }
}

function encodeBasic(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
