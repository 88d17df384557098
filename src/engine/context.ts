import { getConfig, type AppConfig } from '../config/index.js';
import { OperationRegistry } from '../operations/registry.js';
import { createDefaultRegistry } from '../operations/setup.js';
import { createChildLogger, type Logger } from '../utils/logger.js';

/**
 * Everything an engine shares with the graph it runs. Passed explicitly
 * so that several engines can coexist with different registries.
 */
export interface EngineContext {
  registry: OperationRegistry;
  logger: Logger;
  config: AppConfig;
}

/**
 * Build a context, filling what is not given with the built-in registry,
 * an engine child logger and the environment configuration
 */
export function createEngineContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    registry: overrides.registry ?? createDefaultRegistry(),
    logger: overrides.logger ?? createChildLogger({ service: 'engine' }),
    config: overrides.config ?? getConfig(),
  };
}
