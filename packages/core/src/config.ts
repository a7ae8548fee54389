/**
 * Engine configuration - hooks directory, default run mode, end-of-life trap
 *
 * Values come in layers (defaults, config files, environment, flags); later
 * layers win key by key. File contents are validated with zod, environment
 * values by hand since they are always strings.
 */

import * as z from 'zod';
import { ConfigError, type ExecMode } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface EngineConfig {
    /** Directory searched for `{hook}-*` / `{hook}_*` scripts */
    hooksDir: string;
    /** Run mode for scripts no pattern matches */
    execMode: ExecMode;
    /** Install the `end` hook on EXIT during bootstrap() */
    autoTrap: boolean;
    /** Inline implementations are looked up as `${functionPrefix}${hook}` */
    functionPrefix: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
    hooksDir: 'ci-cd',
    execMode: 'exec',
    autoTrap: true,
    functionPrefix: 'hook:',
};

export const engineConfigSchema = z
    .object({
        hooksDir: z.string().min(1),
        execMode: z.enum(['exec', 'source']),
        autoTrap: z.boolean(),
        functionPrefix: z.string(),
    })
    .partial()
    .strict();

export type EngineConfigInput = z.infer<typeof engineConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a parsed JSON value as a (partial) engine config.
 *
 * @param source - where the value came from, used in error messages
 * @throws {ConfigError} listing every invalid key
 */
export function parseEngineConfig(input: unknown, source: string): EngineConfigInput {
    const result = engineConfigSchema.safeParse(input);
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError({
            message: `Invalid hooks config in ${source}: ${problems}`,
            details: { source },
        });
    }
    return result.data;
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function parseBoolean(name: string, raw: string): boolean {
    const value = raw.trim().toLowerCase();
    if (TRUE_VALUES.includes(value)) return true;
    if (FALSE_VALUES.includes(value)) return false;
    throw new ConfigError({
        message: `${name} must be true or false, got "${raw}"`,
        details: { variable: name },
    });
}

function isExecMode(value: string): value is ExecMode {
    return value === 'exec' || value === 'source';
}

/**
 * Read HOOKS_DIR, HOOKS_EXEC_MODE, HOOKS_AUTO_TRAP and HOOKS_PREFIX.
 * Unset and empty variables are left out.
 *
 * @throws {ConfigError} for values that cannot be used
 */
export function configFromEnv(env: Record<string, string | undefined>): EngineConfigInput {
    const config: EngineConfigInput = {};

    if (env.HOOKS_DIR) {
        config.hooksDir = env.HOOKS_DIR;
    }

    const mode = env.HOOKS_EXEC_MODE;
    if (mode) {
        if (!isExecMode(mode)) {
            throw new ConfigError({
                message: `HOOKS_EXEC_MODE must be "exec" or "source", got "${mode}"`,
                details: { variable: 'HOOKS_EXEC_MODE' },
            });
        }
        config.execMode = mode;
    }

    if (env.HOOKS_AUTO_TRAP) {
        config.autoTrap = parseBoolean('HOOKS_AUTO_TRAP', env.HOOKS_AUTO_TRAP);
    }

    if (env.HOOKS_PREFIX !== undefined && env.HOOKS_PREFIX !== '') {
        config.functionPrefix = env.HOOKS_PREFIX;
    }

    return config;
}

/**
 * Merge layers over the defaults. Undefined values never override.
 */
export function resolveEngineConfig(...layers: Array<EngineConfigInput | undefined>): EngineConfig {
    const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };
    for (const layer of layers) {
        if (!layer) continue;
        if (layer.hooksDir !== undefined) config.hooksDir = layer.hooksDir;
        if (layer.execMode !== undefined) config.execMode = layer.execMode;
        if (layer.autoTrap !== undefined) config.autoTrap = layer.autoTrap;
        if (layer.functionPrefix !== undefined) config.functionPrefix = layer.functionPrefix;
    }
    return config;
}
