/**
 * @lifehooks/core
 *
 * Hook execution engine: declare extension points, collect inline,
 * registered and script implementations, run them in one deterministic
 * order, capture their output and let middleware act on it.
 *
 * @example Basic usage:
 * ```typescript
 * import { HookEngine, contractMiddleware } from '@lifehooks/core';
 *
 * const engine = new HookEngine({ config: { hooksDir: 'ci-cd' } });
 * engine.bootstrap();
 * engine.declare('deploy');
 * engine.useMiddleware('deploy', contractMiddleware);
 * engine.register('deploy', '50_notify', ({ stdout }) => {
 *     stdout.write('deployed\n');
 * });
 *
 * const status = await engine.do('deploy', 'eu-west');
 * ```
 */

// =============================================================================
// Shared types and errors
// =============================================================================

export * from './types.js';
export { isValidHookName, isValidEnvName, toSlug } from './names.js';

// =============================================================================
// Logging
// =============================================================================

export {
    LoggerRegistry,
    createLoggers,
    isTagEnabled,
    type TagLogger,
    type TagOptions,
    type LoggerRegistryOptions,
} from './logger.js';

// =============================================================================
// Configuration
// =============================================================================

export {
    DEFAULT_ENGINE_CONFIG,
    engineConfigSchema,
    parseEngineConfig,
    configFromEnv,
    resolveEngineConfig,
    type EngineConfig,
    type EngineConfigInput,
} from './config.js';

// =============================================================================
// Engine components
// =============================================================================

export * from './signals/index.js';
export * from './capture/index.js';
export * from './middleware/index.js';
export * from './hooks/index.js';
