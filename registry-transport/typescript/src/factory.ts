/**
 * Factory functions for creating registry transports.
 * @module factory
 */

import type { CredentialProvider } from './auth/credentials.js';
import { RegistryTransportConfig } from './config.js';
import { FetchTransport } from './http/fetch-transport.js';
import type { HttpTransport } from './http/transport.js';
import { ConsoleLogger, type Logger, type MetricCollector } from './observability/index.js';
import { RegistryTransport } from './transport.js';
import type { ResourceName } from './types/name.js';

/**
 * Optional collaborators for {@link connect}.
 */
export interface ConnectOptions {
  /** Overrides the fetch transport built from the config */
  http?: HttpTransport;
  /** Overrides the logger chosen by `config.debug` */
  logger?: Logger;
  metrics?: MetricCollector;
}

/**
 * Creates an authenticated transport for the resource using the given
 * configuration, or the REGISTRY_TRANSPORT_* environment when none is given.
 */
export async function connect(
  name: ResourceName,
  credential: CredentialProvider,
  action: string,
  config: RegistryTransportConfig = RegistryTransportConfig.fromEnv(),
  options: ConnectOptions = {}
): Promise<RegistryTransport> {
  RegistryTransportConfig.validate(config);

  const http = options.http ?? new FetchTransport({ timeout: config.timeout });
  const logger =
    options.logger ?? new ConsoleLogger({ minLevel: config.debug ? 'debug' : 'warn' });

  return RegistryTransport.create(name, credential, http, action, {
    userAgent: config.userAgent,
    logger,
    metrics: options.metrics,
  });
}
