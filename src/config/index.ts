import { getEnv, parseEnv, resetEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logging: {
    level: string;
    pretty: boolean;
  };
  sockets: {
    /** Default input queue bound, 0 for unbounded */
    queueCapacity: number;
  };
  engine: {
    /** Default execute() timeout, 0 for none */
    executeTimeoutMs: number;
    /** Steps slower than this are logged individually */
    slowStepMs: number;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    env: env.NODE_ENV,
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY ?? env.NODE_ENV === 'development',
    },
    sockets: {
      queueCapacity: env.FLOWGRAPH_QUEUE_CAPACITY,
    },
    engine: {
      executeTimeoutMs: env.FLOWGRAPH_EXECUTE_TIMEOUT_MS,
      slowStepMs: env.FLOWGRAPH_SLOW_STEP_MS,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}

/**
 * Drop cached environment and configuration
 * @internal Exported for testing
 */
export function resetConfig(): void {
  resetEnv();
  cachedConfig = null;
}
