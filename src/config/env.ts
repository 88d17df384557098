import { z } from 'zod';

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z
    .enum(['true', 'false'])
    .optional()
    .transform((val) => (val === undefined ? undefined : val === 'true')),

  // Sockets
  FLOWGRAPH_QUEUE_CAPACITY: z.coerce.number().int().min(0).default(0), // 0 = unbounded

  // Engine
  FLOWGRAPH_EXECUTE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0), // 0 = wait forever
  FLOWGRAPH_SLOW_STEP_MS: z.coerce.number().int().min(1).default(1000),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr, the logger is configured from this result
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}

/**
 * Drop the cached environment so the next read parses again
 * @internal Exported for testing
 */
export function resetEnv(): void {
  cachedEnv = null;
}
