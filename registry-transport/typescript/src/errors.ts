/**
 * Error types for the registry transport.
 * @module errors
 */

import { decodeDiagnostics, formatDiagnostic, type Diagnostic } from './diagnostics.js';
import { readText, type HttpResponse } from './http/transport.js';

/**
 * Error kinds for categorizing registry transport errors.
 */
export enum RegistryTransportErrorKind {
  // Protocol state errors
  BadState = 'bad_state',

  // Authentication errors
  Unauthorized = 'unauthorized',
  Forbidden = 'forbidden',
  InvalidCredentials = 'invalid_credentials',

  // Resource errors
  NotFound = 'not_found',
  InvalidName = 'invalid_name',
  BadRequest = 'bad_request',
  RateLimited = 'rate_limited',

  // Server errors
  ServerError = 'server_error',
  ServiceUnavailable = 'service_unavailable',

  // Network errors
  ConnectionFailed = 'connection_failed',
  Timeout = 'timeout',

  // Configuration errors
  InvalidConfig = 'invalid_config',

  // Simulation errors
  SimulationMismatch = 'simulation_mismatch',
  SimulationNotFound = 'simulation_not_found',

  Unknown = 'unknown',
}

/**
 * Maps HTTP status codes to error kinds.
 */
export function errorKindFromStatus(status: number): RegistryTransportErrorKind {
  switch (status) {
    case 400:
      return RegistryTransportErrorKind.BadRequest;
    case 401:
      return RegistryTransportErrorKind.Unauthorized;
    case 403:
      return RegistryTransportErrorKind.Forbidden;
    case 404:
      return RegistryTransportErrorKind.NotFound;
    case 429:
      return RegistryTransportErrorKind.RateLimited;
    case 503:
      return RegistryTransportErrorKind.ServiceUnavailable;
    default:
      if (status >= 500) {
        return RegistryTransportErrorKind.ServerError;
      }
      return RegistryTransportErrorKind.Unknown;
  }
}

/**
 * Error options for RegistryTransportError constructor.
 */
export interface RegistryTransportErrorOptions {
  /** HTTP status code */
  statusCode?: number;
  /** Underlying cause */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Base error for everything the registry transport raises.
 */
export class RegistryTransportError extends Error {
  /** Error kind */
  public readonly kind: RegistryTransportErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Underlying cause */
  public override readonly cause?: Error;
  /** Additional context */
  public readonly context?: Record<string, unknown>;

  constructor(
    kind: RegistryTransportErrorKind,
    message: string,
    options?: RegistryTransportErrorOptions
  ) {
    super(message);
    this.name = 'RegistryTransportError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formats the error for logging.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }

  /**
   * Converts to JSON for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
    };
  }

  static invalidName(message: string): RegistryTransportError {
    return new RegistryTransportError(RegistryTransportErrorKind.InvalidName, message);
  }

  static invalidConfig(message: string): RegistryTransportError {
    return new RegistryTransportError(RegistryTransportErrorKind.InvalidConfig, message);
  }

  static timeout(url: string, timeoutMs: number): RegistryTransportError {
    return new RegistryTransportError(
      RegistryTransportErrorKind.Timeout,
      `Request to ${url} timed out after ${timeoutMs}ms`
    );
  }

  static connectionFailed(url: string, cause: Error): RegistryTransportError {
    return new RegistryTransportError(
      RegistryTransportErrorKind.ConnectionFailed,
      `Request to ${url} failed: ${cause.message}`,
      { cause }
    );
  }
}

/**
 * Raised when the authentication handshake reaches a state it cannot
 * continue from: an unexpected ping status, a malformed challenge, a failed
 * token exchange or an unknown action. No usable transport exists afterwards.
 */
export class BadStateError extends RegistryTransportError {
  constructor(message: string, options?: RegistryTransportErrorOptions) {
    super(RegistryTransportErrorKind.BadState, message, options);
    this.name = 'BadStateError';
  }
}

/**
 * Raised when a request's final status is not among the accepted codes.
 * Carries the response and the diagnostics decoded from its body.
 */
export class DiagnosticError extends RegistryTransportError {
  public readonly response: HttpResponse;
  public readonly diagnostics: readonly Diagnostic[];

  constructor(response: HttpResponse) {
    const diagnostics = decodeDiagnostics(readText(response));
    const lines = [
      `response: ${response.status} ${response.statusText}`.trimEnd(),
      ...diagnostics.map(formatDiagnostic),
    ];

    super(errorKindFromStatus(response.status), lines.join('\n'), {
      statusCode: response.status,
    });
    this.name = 'DiagnosticError';
    this.response = response;
    this.diagnostics = diagnostics;
  }

  get httpStatusCode(): number {
    return this.response.status;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      diagnostics: this.diagnostics,
    };
  }
}

/**
 * Type guard for RegistryTransportError.
 */
export function isRegistryTransportError(error: unknown): error is RegistryTransportError {
  return error instanceof RegistryTransportError;
}
