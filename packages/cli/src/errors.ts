import chalk from 'chalk';
import { HookError, errorMessage } from '@lifehooks/core';
import { exit } from './exit.js';

/**
 * Print an error (with its details, for engine errors) and exit with 1
 */
export function exitWithError(error: unknown): never {
    console.error(chalk.red('Error:'), errorMessage(error));
    if (error instanceof HookError && Object.keys(error.details).length > 0) {
        console.error(chalk.dim(error.toDetailedString()));
    }
    exit(1);
}
