import { resolve } from 'path';
import chalk from 'chalk';
import { hookNamesInDirectory, type HookListing } from '@lifehooks/core';
import { loadConfig } from '../config.js';
import { createCliEngine } from '../engine.js';
import { exitWithError } from '../errors.js';

interface ListOptions {
    dir?: string;
    json?: boolean;
}

/** Names known without declaring them; file names split on them first */
const LIFECYCLE_HOOKS = ['begin', 'end'];

const KIND_COLORS = {
    inline: chalk.magenta,
    registered: chalk.cyan,
    script: chalk.green,
} as const;

function printListing(listing: HookListing): void {
    const middleware = listing.middleware === 'default' ? chalk.dim('default') : chalk.yellow(listing.middleware);
    console.log(`${chalk.bold(listing.name)} ${chalk.dim(`(${listing.contexts.join(', ')})`)} middleware: ${middleware}`);
    if (listing.implementations.length === 0) {
        console.log(chalk.dim('  (no implementations)'));
        return;
    }
    for (const implementation of listing.implementations) {
        const kind = KIND_COLORS[implementation.kind](implementation.kind.padEnd(10));
        console.log(`  ${kind} ${implementation.label} ${chalk.dim(`[${implementation.mode}]`)}`);
    }
}

/**
 * Declare the given hooks (default: every hook with a script in the hooks
 * directory) and show what would run for each, in run order. Without
 * arguments, names containing `-` or `_` are only found when configured
 * under `contract`; name them explicitly otherwise.
 */
export function listCommand(hooks: string[], options: ListOptions): void {
    let listings: HookListing[];
    let hooksDir: string;
    try {
        const config = loadConfig({ flags: { hooksDir: options.dir } });
        hooksDir = resolve(config.engine.hooksDir);
        const engine = createCliEngine(config);
        const names = hooks.length > 0
            ? hooks
            : hookNamesInDirectory(hooksDir, [...LIFECYCLE_HOOKS, ...config.contract]);
        if (names.length > 0) {
            engine.declare(...names);
        }
        listings = engine.list();
    } catch (error) {
        exitWithError(error);
    }

    if (options.json) {
        console.log(JSON.stringify(listings, null, 2));
        return;
    }

    if (listings.length === 0) {
        console.log(chalk.yellow('No hooks found in'), hooksDir);
        return;
    }
    for (const listing of listings) {
        printListing(listing);
    }
}
