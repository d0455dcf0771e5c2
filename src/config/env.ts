export interface SyncDefaults {
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  rateLimit: number;
  rateLimitWindowMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCoolDownMs: number;
  cacheTtlMs: number;
  healthCheckTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  cache: {
    maxEntries: number;
  };
  redis: {
    enabled: boolean;
    url: string;
    keyPrefix: string;
  };
  sync: SyncDefaults & {
    runTimeoutMs: number;
  };
  monitoring: {
    enabled: boolean;
    intervalMs: number;
  };
  security: {
    encryptionKey: string;
    allowedOrigins: string[];
    corsCredentials: boolean;
    maxRequestSize: string;
  };
  auth: {
    enabled: boolean;
    apiKeys: string[];
  };
  metrics: {
    allowReset: boolean;
  };
}

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  if (value.toLowerCase() === 'true') {
    return true;
  }

  if (value.toLowerCase() === 'false') {
    return false;
  }

  return fallback;
};

const listFromEnv = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(s => s.trim()).filter(Boolean);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: numberFromEnv(env.PORT, 5300),
    cache: {
      maxEntries: numberFromEnv(env.CACHE_MAX_ENTRIES, 1000)
    },
    redis: {
      enabled: booleanFromEnv(
        env.REDIS_ENABLED,
        env.NODE_ENV === 'production' // Enable by default in production
      ),
      url: env.REDIS_URL ?? 'redis://localhost:6379',
      keyPrefix: env.REDIS_KEY_PREFIX ?? 'hub:'
    },
    sync: {
      timeoutMs: numberFromEnv(env.SYNC_TIMEOUT_MS, 30_000),
      retryCount: numberFromEnv(env.SYNC_RETRY_COUNT, 3),
      retryDelayMs: numberFromEnv(env.SYNC_RETRY_DELAY_MS, 1000),
      rateLimit: numberFromEnv(env.SYNC_RATE_LIMIT, 1000),
      rateLimitWindowMs: numberFromEnv(env.SYNC_RATE_LIMIT_WINDOW_MS, 60 * 60 * 1000),
      circuitBreakerThreshold: numberFromEnv(env.CIRCUIT_BREAKER_THRESHOLD, 5),
      circuitBreakerCoolDownMs: numberFromEnv(env.CIRCUIT_BREAKER_COOLDOWN_MS, 300_000),
      cacheTtlMs: numberFromEnv(env.SYNC_CACHE_TTL_MS, 300_000),
      healthCheckTimeoutMs: numberFromEnv(env.HEALTH_CHECK_TIMEOUT_MS, 5000),
      runTimeoutMs: numberFromEnv(env.SYNC_RUN_TIMEOUT_MS, 120_000)
    },
    monitoring: {
      enabled: booleanFromEnv(env.MONITORING_ENABLED, env.NODE_ENV !== 'test'),
      intervalMs: numberFromEnv(env.HEALTH_CHECK_INTERVAL_MS, 60_000)
    },
    security: {
      // Dev fallback only; production deployments must set INTEGRATION_ENCRYPTION_KEY
      encryptionKey: env.INTEGRATION_ENCRYPTION_KEY ?? 'local-development-key',
      allowedOrigins: env.ALLOWED_ORIGINS ? listFromEnv(env.ALLOWED_ORIGINS) : ['*'],
      corsCredentials: booleanFromEnv(env.CORS_CREDENTIALS, false),
      maxRequestSize: env.MAX_REQUEST_SIZE ?? '1mb'
    },
    auth: {
      enabled: booleanFromEnv(env.HUB_AUTH_ENABLED, false),
      apiKeys: listFromEnv(env.HUB_API_KEYS)
    },
    metrics: {
      allowReset: booleanFromEnv(env.METRICS_RESET_ENABLED, false)
    }
  };
}

export const config: AppConfig = loadConfig();
