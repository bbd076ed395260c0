/**
 * Environment Configuration
 *
 * Service-level settings only. The aggregator reads its own settings through
 * the agent package's loadConfig().
 */

export type PlatformEnvironment = 'dev' | 'staging' | 'prod';

const PLATFORM_ENVIRONMENTS: readonly PlatformEnvironment[] = ['dev', 'staging', 'prod'];

export interface ServiceConfig {
  // Service identity
  serviceName: string;
  serviceVersion: string;
  environment: PlatformEnvironment;

  // HTTP
  port: number;

  // Logging
  logLevel: string;
}

function parsePlatformEnvironment(value: string | undefined): PlatformEnvironment {
  return PLATFORM_ENVIRONMENTS.find((env) => env === value) ?? 'dev';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ServiceConfig {
  return {
    serviceName: process.env.SERVICE_NAME || 'availability-monitor',
    serviceVersion: process.env.SERVICE_VERSION || '1.0.0',
    environment: parsePlatformEnvironment(process.env.PLATFORM_ENV),

    port: parseInt(process.env.PORT || '8080', 10),

    logLevel: process.env.LOG_LEVEL || 'info',
  };
}

/**
 * Validate service environment variables
 */
export function validateEnvironment(): string[] {
  const errors: string[] = [];

  const env = process.env.PLATFORM_ENV;
  if (env && !PLATFORM_ENVIRONMENTS.some((known) => known === env)) {
    errors.push(`PLATFORM_ENV must be one of: ${PLATFORM_ENVIRONMENTS.join(', ')} (got: ${env})`);
  }

  const port = process.env.PORT;
  if (port !== undefined) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
      errors.push(`PORT must be an integer between 0 and 65535 (got: ${port})`);
    }
  }

  return errors;
}

// ============================================================================
// LIFECYCLE EVENTS
// ============================================================================

/**
 * Structured lifecycle lines on stderr, written outside the pino logger.
 */
export function logAgentStarted(data: Record<string, unknown> = {}): void {
  console.error(JSON.stringify({
    event: 'agent_started',
    timestamp: new Date().toISOString(),
    service_name: process.env.SERVICE_NAME || 'availability-monitor',
    platform_env: process.env.PLATFORM_ENV || 'dev',
    ...data,
  }));
}

export function logAgentAbort(reason: string, details: string[]): void {
  console.error(JSON.stringify({
    event: 'agent_abort',
    timestamp: new Date().toISOString(),
    reason,
    details,
    service_name: process.env.SERVICE_NAME || 'availability-monitor',
    platform_env: process.env.PLATFORM_ENV || 'unknown',
  }));
}
