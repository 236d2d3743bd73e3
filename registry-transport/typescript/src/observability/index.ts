/**
 * Logging and metrics for the registry transport.
 * @module observability
 */

/**
 * Metric names.
 */
export const MetricNames = {
  REQUESTS_TOTAL: 'registry_transport_requests_total',
  TOKEN_REFRESH_TOTAL: 'registry_transport_token_refresh_total',
  UNAUTHORIZED_RETRIES_TOTAL: 'registry_transport_unauthorized_retries_total',
} as const;

/**
 * Labels for metrics.
 */
export interface MetricLabels {
  /** Registry host */
  registry?: string;
  /** HTTP method */
  method?: string;
  /** HTTP status code */
  status?: number;
  /** Success/failure */
  success?: boolean;
}

/**
 * Metric collector interface.
 */
export interface MetricCollector {
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: LogLevel;

  constructor(options?: { prefix?: string; minLevel?: LogLevel }) {
    this.prefix = options?.prefix ?? '[registry-transport]';
    this.minLevel = options?.minLevel ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, context));
    }
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * No-op metric collector for when metrics are disabled.
 */
export class NoOpMetricCollector implements MetricCollector {
  incrementCounter(): void {}
}

/**
 * In-memory counters, keyed by name and sorted labels.
 */
export class InMemoryMetricCollector implements MetricCollector {
  private readonly counters: Map<string, number> = new Map();

  private makeKey(name: string, labels?: MetricLabels): string {
    const labelStr = labels
      ? Object.entries(labels)
          .filter(([, v]) => v !== undefined)
          .map(([k, v]) => `${k}=${String(v)}`)
          .sort()
          .join(',')
      : '';
    return labelStr ? `${name}{${labelStr}}` : name;
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  /** Gets one counter value */
  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  /** Gets all counter values */
  getCounters(): Map<string, number> {
    return new Map(this.counters);
  }

  /** Resets all metrics */
  reset(): void {
    this.counters.clear();
  }
}
