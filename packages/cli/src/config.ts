import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import * as z from 'zod';
import {
    ConfigError,
    configFromEnv,
    engineConfigSchema,
    errorMessage,
    resolveEngineConfig,
    type EngineConfig,
    type EngineConfigInput,
} from '@lifehooks/core';

// User config (personal defaults)
const USER_CONFIG_DIR = join(homedir(), '.config', 'lifehooks');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

// Workspace config, found by walking up from the working directory
const WORKSPACE_CONFIG_DIR = '.lifehooks';
const WORKSPACE_CONFIG_FILE = 'config.json';

// =============================================================================
// Schema
// =============================================================================

const configFileSchema = z
    .object({
        /** Engine settings: hooksDir, execMode, autoTrap, functionPrefix */
        hooks: engineConfigSchema,
        /** Globs matched against script file names */
        patterns: z
            .object({
                source: z.array(z.string()),
                script: z.array(z.string()),
            })
            .partial()
            .strict(),
        /** Hooks that run through the contract middleware */
        contract: z.array(z.string()),
    })
    .partial()
    .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type ConfigScope = 'user' | 'workspace';

/**
 * Everything a command needs, after every layer has been applied
 */
export interface ResolvedConfig {
    engine: EngineConfig;
    sourcePatterns: string[];
    scriptPatterns: string[];
    contract: string[];
    /** Config files that were read, lowest precedence first */
    files: string[];
}

export interface LoadConfigOptions {
    cwd?: string;
    env?: Record<string, string | undefined>;
    /** Highest-precedence layer, from command-line flags */
    flags?: EngineConfigInput;
    /** Overrides the user config location */
    userConfigFile?: string;
}

// =============================================================================
// Object helpers
// =============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects: nested objects merge key by key, arrays and
 * primitives in `override` replace the base value, undefined is ignored.
 * Neither input is modified.
 */
export function deepMergeObjects(
    base: Record<string, unknown>,
    override: Record<string, unknown>
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };
    for (const [key, overrideValue] of Object.entries(override)) {
        if (overrideValue === undefined) continue;

        const baseValue = result[key];
        if (isPlainObject(overrideValue) && isPlainObject(baseValue)) {
            result[key] = deepMergeObjects(baseValue, overrideValue);
        } else {
            result[key] = overrideValue;
        }
    }
    return result;
}

// =============================================================================
// Dotted Path Helpers
// =============================================================================

/**
 * Get a value from an object using a dotted path (e.g., "hooks.execMode")
 */
export function getByPath(obj: Record<string, unknown>, path: string): unknown {
    let current: unknown = obj;

    for (const part of path.split('.')) {
        if (!isPlainObject(current)) return undefined;
        current = current[part];
    }

    return current;
}

function describeType(value: unknown): string {
    if (Array.isArray(value)) return 'an array';
    const type = typeof value;
    return /^[aeiou]/.test(type) ? `an ${type}` : `a ${type}`;
}

/**
 * Set a value in an object using a dotted path (e.g., "patterns.source").
 * Creates intermediate objects as needed.
 *
 * @throws Error when an intermediate value is not an object
 */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    let current = obj;

    for (let i = 0; i < parts.length - 1; i++) {
        const part = parts[i];
        const next = current[part];
        if (next === undefined || next === null) {
            const created: Record<string, unknown> = {};
            current[part] = created;
            current = created;
        } else if (isPlainObject(next)) {
            current = next;
        } else {
            const at = parts.slice(0, i + 1).join('.');
            throw new Error(`Cannot set "${path}": "${at}" is ${describeType(next)}, not an object`);
        }
    }

    current[parts[parts.length - 1]] = value;
}

/**
 * Parse a value string into the appropriate type
 */
export function parseValue(value: string): unknown {
    if (value === 'true') return true;
    if (value === 'false') return false;

    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    // Comma-separated list; a trailing comma makes a one-item list
    if (value.includes(',')) {
        return value.split(',').map(v => v.trim()).filter(v => v !== '');
    }

    return value;
}

// =============================================================================
// Files
// =============================================================================

export function getUserConfigPath(): string {
    return USER_CONFIG_FILE;
}

/**
 * Nearest `.lifehooks/config.json` at or above `start`, or null
 */
export function findWorkspaceConfig(start: string = process.cwd()): string | null {
    let dir = resolve(start);
    for (;;) {
        const candidate = join(dir, WORKSPACE_CONFIG_DIR, WORKSPACE_CONFIG_FILE);
        if (existsSync(candidate)) return candidate;
        const parent = dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
}

/**
 * Where a scope's file lives. A workspace file that does not exist yet goes
 * in the working directory.
 */
export function getConfigPath(scope: ConfigScope, cwd: string = process.cwd()): string {
    if (scope === 'user') return USER_CONFIG_FILE;
    return findWorkspaceConfig(cwd) ?? join(resolve(cwd), WORKSPACE_CONFIG_DIR, WORKSPACE_CONFIG_FILE);
}

/**
 * Validate a parsed JSON value as a config file
 *
 * @throws {ConfigError}
 */
export function parseConfigFile(input: unknown, source: string): ConfigFile {
    const result = configFileSchema.safeParse(input);
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError({
            message: `Invalid config in ${source}: ${problems}`,
            details: { source },
        });
    }
    return result.data;
}

/**
 * Read and validate a config file. A missing file is an empty config.
 *
 * @throws {ConfigError} for unreadable JSON or invalid settings
 */
export function readConfigFile(path: string): ConfigFile {
    if (!existsSync(path)) return {};

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError({
            message: `Cannot read ${path}: ${errorMessage(error)}`,
            details: { source: path },
        });
    }
    return parseConfigFile(data, path);
}

/**
 * Validate then write a config file, creating its directory
 */
export function writeConfigFile(path: string, config: unknown): void {
    const valid = parseConfigFile(config, path);
    const dir = dirname(path);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, JSON.stringify(valid, null, 2) + '\n');
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Merge the file layers: user file, then workspace file (workspace wins)
 */
export function loadConfigFiles(options: LoadConfigOptions = {}): { config: ConfigFile; files: string[] } {
    const files: string[] = [];
    let merged: Record<string, unknown> = {};

    const userFile = options.userConfigFile ?? USER_CONFIG_FILE;
    const workspaceFile = findWorkspaceConfig(options.cwd);
    for (const file of [userFile, workspaceFile]) {
        if (!file || !existsSync(file)) continue;
        merged = deepMergeObjects(merged, readConfigFile(file));
        files.push(file);
    }

    return { config: parseConfigFile(merged, files.join(' + ') || 'defaults'), files };
}

/**
 * Load merged config: defaults → user → workspace → environment → flags
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
    const { config, files } = loadConfigFiles(options);
    const engine = resolveEngineConfig(
        config.hooks,
        configFromEnv(options.env ?? process.env),
        options.flags
    );

    return {
        engine,
        sourcePatterns: config.patterns?.source ?? [],
        scriptPatterns: config.patterns?.script ?? [],
        contract: config.contract ?? [],
        files,
    };
}
