/**
 * CLI Flag Validation Utilities
 *
 * Validation for flags that accept specific values, with clear error
 * messages when invalid values are provided.
 *
 * ## Usage
 *
 * ```typescript
 * import { enumArgParser, validateMutualExclusion, EXEC_MODES } from './validation.js';
 *
 * // As a commander option parser:
 * .option('-m, --mode <mode>', 'Run mode', enumArgParser(EXEC_MODES, '--mode'))
 *
 * // In command handler:
 * validateMutualExclusion(['--workspace', '--user'], [options.workspace, options.user]);
 * ```
 */

import chalk from 'chalk';
import type { ExecMode } from '@lifehooks/core';
import { exit } from './exit.js';

// =============================================================================
// Valid Values
// =============================================================================

/** Valid values for --mode */
export const EXEC_MODES = ['exec', 'source'] as const satisfies readonly ExecMode[];

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
    return allowed.some((candidate) => candidate === value);
}

function reportInvalid(value: string, allowed: readonly string[], flagName: string): void {
    console.error(chalk.red('Error:'), `Invalid value for ${flagName}: "${value}"`);
    console.log('Valid values:', allowed.join(', '));
}

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validate that mutually exclusive flags aren't used together.
 *
 * @param flagValues - Corresponding values (truthy means flag is set)
 * @returns true if valid, false if invalid (only when exitOnError is false)
 */
export function validateMutualExclusion(
    flagNames: string[],
    flagValues: (boolean | string | undefined)[],
    exitOnError = true
): boolean {
    const setFlags = flagNames.filter((_, i) => flagValues[i]);

    if (setFlags.length > 1) {
        console.error(chalk.red('Error:'), `Flags ${setFlags.join(' and ')} cannot be used together`);
        console.log('These flags are mutually exclusive. Use only one.');
        if (exitOnError) {
            exit(1);
        }
        return false;
    }

    return true;
}

/**
 * Create a commander argParser that validates enum values.
 * Use this with .option() to validate during option parsing.
 */
export function enumArgParser<T extends string>(
    allowed: readonly T[],
    flagName: string
): (value: string) => T {
    return (value: string): T => {
        if (!isOneOf(value, allowed)) {
            reportInvalid(value, allowed, flagName);
            exit(1);
        }
        return value;
    };
}
