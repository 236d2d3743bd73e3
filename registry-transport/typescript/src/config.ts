/**
 * Configuration for the registry transport.
 * @module config
 */

import { z } from 'zod';
import { RegistryTransportError } from './errors.js';

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'registry-transport/0.1.0';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Registry transport configuration.
 */
export interface RegistryTransportConfig {
  /** User-Agent header sent on every request */
  readonly userAgent: string;
  /** Per-request timeout of the fetch transport, in milliseconds */
  readonly timeout: number;
  /** Log handshake and retries to the console */
  readonly debug: boolean;
}

const configSchema = z.object({
  userAgent: z.string().min(1),
  timeout: z.number().int().positive(),
  debug: z.boolean(),
});

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): RegistryTransportConfig {
  return {
    userAgent: DEFAULT_USER_AGENT,
    timeout: DEFAULT_TIMEOUT,
    debug: false,
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: RegistryTransportConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw RegistryTransportError.invalidConfig(`Invalid configuration: ${issues.join(', ')}`);
  }
}

/**
 * Configuration builder.
 */
export class RegistryTransportConfigBuilder {
  private config: RegistryTransportConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  userAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  timeout(value: number): this {
    this.config = { ...this.config, timeout: value };
    return this;
  }

  debug(value: boolean): this {
    this.config = { ...this.config, debug: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): RegistryTransportConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * RegistryTransportConfig namespace with factory methods.
 */
export const RegistryTransportConfig = {
  builder(): RegistryTransportConfigBuilder {
    return new RegistryTransportConfigBuilder();
  },

  default(): RegistryTransportConfig {
    return createDefaultConfig();
  },

  /**
   * Creates configuration from REGISTRY_TRANSPORT_* environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): RegistryTransportConfig {
    const builder = new RegistryTransportConfigBuilder();

    const userAgent = env['REGISTRY_TRANSPORT_USER_AGENT'];
    if (userAgent) {
      builder.userAgent(userAgent);
    }

    const timeoutSecs = env['REGISTRY_TRANSPORT_TIMEOUT_SECS'];
    if (timeoutSecs) {
      builder.timeout(parseInt(timeoutSecs, 10) * 1000);
    }

    const debug = env['REGISTRY_TRANSPORT_DEBUG'];
    if (debug) {
      builder.debug(debug === 'true' || debug === '1');
    }

    return builder.build();
  },

  from(partial: Partial<RegistryTransportConfig>): RegistryTransportConfig {
    const defaults = createDefaultConfig();
    const config: RegistryTransportConfig = {
      userAgent: partial.userAgent ?? defaults.userAgent,
      timeout: partial.timeout ?? defaults.timeout,
      debug: partial.debug ?? defaults.debug,
    };
    validateConfig(config);
    return config;
  },

  validate(config: RegistryTransportConfig): void {
    validateConfig(config);
  },
};
