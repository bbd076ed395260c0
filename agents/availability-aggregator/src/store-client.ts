/**
 * Availability Aggregator Agent - Object Store Client
 *
 * HTTP client for the key/value object store that holds the event logs
 * written by the reconciliation layer and the persisted report.
 *
 * Endpoints:
 * - GET {endpoint}/objects?prefix=<prefix>  -> { keys: string[] }
 * - GET {endpoint}/objects/<key>            -> raw value, 404 when absent
 * - PUT {endpoint}/objects/<key>            <- raw value (overwrite)
 * - GET {endpoint}/health
 */

import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import type { StoreConfig } from './config.js';

const ListingSchema = z.object({
  keys: z.array(z.string()),
});

// ============================================================================
// STORE INTERFACE
// ============================================================================

export interface ObjectStore {
  list(prefix: string, signal?: AbortSignal): Promise<string[]>;
  /** Resolves to null when the key does not exist. */
  get(key: string, signal?: AbortSignal): Promise<string | null>;
  put(key: string, body: string, signal?: AbortSignal): Promise<void>;
}

// ============================================================================
// ERRORS
// ============================================================================

export class StoreRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'StoreRequestError';
    this.status = status;
  }

  get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 429;
  }
}

// ============================================================================
// CONNECTION POOL
// ============================================================================

interface ConnectionPool {
  active: number;
  max: number;
}

async function acquireConnection(
  pool: ConnectionPool,
  maxWaitMs: number,
  signal?: AbortSignal
): Promise<void> {
  const startTime = Date.now();

  while (pool.active >= pool.max) {
    if (Date.now() - startTime > maxWaitMs) {
      throw new StoreRequestError('Connection pool exhausted - timeout waiting for available connection');
    }
    await delay(10, undefined, { signal });
  }

  pool.active++;
}

function releaseConnection(pool: ConnectionPool): void {
  pool.active = Math.max(0, pool.active - 1);
}

// ============================================================================
// RETRY LOGIC
// ============================================================================

interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

function isRetryable(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return false;
  if (error instanceof StoreRequestError) return error.retryable;
  // Caller aborts surface as AbortError; per-request timeouts as TimeoutError and are retried.
  if (error instanceof Error && error.name === 'AbortError') return false;
  return true;
}

async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= config.maxRetries || !isRetryable(error, signal)) {
        throw error;
      }

      // Exponential backoff with jitter
      const backoffMs = Math.min(
        config.baseDelayMs * Math.pow(2, attempt) + Math.random() * 100,
        config.maxDelayMs
      );
      await delay(backoffMs, undefined, { signal });
    }
  }
}

// ============================================================================
// HEALTH STATUS
// ============================================================================

export interface StoreHealthStatus {
  healthy: boolean;
  latency_ms: number;
  endpoint: string;
  error?: string;
}

// ============================================================================
// STORE CLIENT
// ============================================================================

export class StoreClient implements ObjectStore {
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly pool: ConnectionPool;

  constructor(config: StoreConfig) {
    this.endpoint = config.endpoint.replace(/\/$/, ''); // Remove trailing slash
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeout_ms;
    this.retryConfig = {
      maxRetries: config.max_retries,
      baseDelayMs: config.retry_base_delay_ms,
      maxDelayMs: 10000,
    };
    this.pool = { active: 0, max: config.pool_size };
  }

  async list(prefix: string, signal?: AbortSignal): Promise<string[]> {
    const params = new URLSearchParams({ prefix });
    const raw = await this.request(
      'GET',
      `/objects?${params}`,
      undefined,
      (response): Promise<unknown> => response.json(),
      signal
    );
    const listing = ListingSchema.safeParse(raw);

    if (!listing.success) {
      throw new StoreRequestError(`Malformed listing for prefix ${prefix}`);
    }
    return listing.data.keys;
  }

  async get(key: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await this.request('GET', this.objectPath(key), undefined, (response) => response.text(), signal);
    } catch (error) {
      if (error instanceof StoreRequestError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, body: string, signal?: AbortSignal): Promise<void> {
    await this.request('PUT', this.objectPath(key), body, async () => undefined, signal);
  }

  /**
   * Health check for object store connectivity.
   */
  async healthCheck(): Promise<StoreHealthStatus> {
    const startTime = Date.now();

    try {
      const response = await fetch(`${this.endpoint}/health`, {
        method: 'GET',
        headers: this.authHeaders(),
        signal: AbortSignal.timeout(5000), // 5 second timeout for health check
      });

      return {
        healthy: response.ok,
        latency_ms: Date.now() - startTime,
        endpoint: this.endpoint,
        error: response.ok ? undefined : `HTTP ${response.status}`,
      };
    } catch (error) {
      return {
        healthy: false,
        latency_ms: Date.now() - startTime,
        endpoint: this.endpoint,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Get pool statistics.
   */
  getPoolStats(): { active: number; max: number; utilization: number } {
    return {
      active: this.pool.active,
      max: this.pool.max,
      utilization: this.pool.max > 0 ? this.pool.active / this.pool.max : 0,
    };
  }

  private objectPath(key: string): string {
    return `/objects/${key.split('/').map(encodeURIComponent).join('/')}`;
  }

  private authHeaders(): Record<string, string> {
    return this.apiKey ? { 'Authorization': `Bearer ${this.apiKey}` } : {};
  }

  /**
   * Send one request and read its body while holding a pool slot. Backoff
   * and pool waits end early when `signal` aborts.
   */
  private async request<T>(
    method: 'GET' | 'PUT',
    path: string,
    body: string | undefined,
    read: (response: Response) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    await acquireConnection(this.pool, this.timeoutMs, signal);

    try {
      return await withRetry(async () => {
        const timeout = AbortSignal.timeout(this.timeoutMs);
        const response = await fetch(`${this.endpoint}${path}`, {
          method,
          headers: body === undefined
            ? this.authHeaders()
            : { ...this.authHeaders(), 'Content-Type': 'application/json' },
          body,
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        });

        if (!response.ok) {
          const errorText = await response.text();
          throw new StoreRequestError(`HTTP ${response.status}: ${errorText}`, response.status);
        }

        return read(response);
      }, this.retryConfig, signal);
    } finally {
      releaseConnection(this.pool);
    }
  }
}
