import chalk from 'chalk';
import {
    getByPath,
    getConfigPath,
    isPlainObject,
    loadConfig,
    parseValue,
    readConfigFile,
    setByPath,
    writeConfigFile,
    type ConfigScope,
    type ResolvedConfig,
} from '../config.js';
import { exitWithError } from '../errors.js';
import { validateMutualExclusion } from '../validation.js';

interface ConfigOptions {
    workspace?: boolean;
    user?: boolean;
}

function resolveScope(options: ConfigOptions): ConfigScope {
    return options.workspace ? 'workspace' : 'user';
}

/** The merged config in the shape of a config file */
function effectiveConfig(config: ResolvedConfig): Record<string, unknown> {
    return {
        hooks: { ...config.engine },
        patterns: { source: config.sourcePatterns, script: config.scriptPatterns },
        contract: config.contract,
    };
}

/**
 * Format a config value for display
 */
function formatConfigValue(value: unknown, indent: string = ''): void {
    if (value === null || value === undefined) {
        console.log(`${indent}${chalk.dim('(not set)')}`);
        return;
    }

    if (isPlainObject(value)) {
        for (const [k, v] of Object.entries(value)) {
            if (isPlainObject(v)) {
                console.log(`${indent}${chalk.cyan(k)}:`);
                formatConfigValue(v, indent + '  ');
            } else {
                const displayVal = Array.isArray(v) ? v.join(', ') : String(v);
                console.log(`${indent}${k}: ${displayVal}`);
            }
        }
    } else if (Array.isArray(value)) {
        console.log(`${indent}${value.join(', ')}`);
    } else {
        console.log(`${indent}${String(value)}`);
    }
}

/**
 * Without arguments show the effective config and where it came from;
 * with a dotted key show that value; with a value write it to the user
 * (default) or workspace file. -w/-u without a value show that file alone.
 */
export function configCommand(key: string | undefined, value: string | undefined, options: ConfigOptions = {}): void {
    validateMutualExclusion(['--workspace', '--user'], [options.workspace, options.user]);

    if (key !== undefined && value !== undefined) {
        const scope = resolveScope(options);
        const path = getConfigPath(scope);
        try {
            const current: Record<string, unknown> = { ...readConfigFile(path) };
            setByPath(current, key, parseValue(value));
            writeConfigFile(path, current);
        } catch (error) {
            exitWithError(error);
        }
        console.log(chalk.green('✓'), `Set ${key} in ${scope} config`, chalk.dim(`(${path})`));
        return;
    }

    if (options.workspace || options.user) {
        // One file only, as written
        const scope = resolveScope(options);
        const path = getConfigPath(scope);
        let file: Record<string, unknown>;
        try {
            file = { ...readConfigFile(path) };
        } catch (error) {
            exitWithError(error);
        }
        console.log(chalk.dim(`${scope} config (${path})`));
        formatConfigValue(key === undefined ? file : getByPath(file, key));
        return;
    }

    let config: ResolvedConfig;
    try {
        config = loadConfig();
    } catch (error) {
        exitWithError(error);
    }

    const effective = effectiveConfig(config);
    if (key !== undefined) {
        formatConfigValue(getByPath(effective, key));
        return;
    }

    formatConfigValue(effective);
    console.log();
    if (config.files.length === 0) {
        console.log(chalk.dim('No config files; defaults and HOOKS_* variables apply.'));
    } else {
        console.log(chalk.dim('Config files (later wins):'));
        for (const file of config.files) {
            console.log(chalk.dim(`  ${file}`));
        }
    }
}
